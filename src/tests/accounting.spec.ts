import { describe, it, expect } from 'vitest';
import { SeatingEngine } from '../domain/engine';
import { formatTableStatus, formatWaitingGroup } from '../domain/accounting';
import type { VenueSeed } from '../types';

const seed: VenueSeed = {
    rooms: { R: ['A', 'B', 'C'], Bar: ['W'] },
    tables: [
        { id: 'A', capacity: 2, room: 'R' },
        { id: 'B', capacity: 2, room: 'R' },
        { id: 'C', capacity: 2, room: 'R' },
        { id: 'W', capacity: 4, room: 'Bar' }
    ]
};

const seatSmith = (engine: SeatingEngine): number => {
    const outcome = engine.addGroup(5, 'Smith');
    if (!outcome.ok) throw new Error(outcome.message);
    const seated = engine.seatAnywhere(outcome.value.id);
    if (!seated.ok) throw new Error(seated.message);
    return outcome.value.id;
};

describe('Utilization', () => {
    it('should be zero for unknown tables and empty venues', () => {
        const engine = new SeatingEngine({ rooms: {}, tables: [] });
        expect(engine.tableUtilization('nope')).toBe(0);
        expect(engine.overallUtilization()).toBe(0);
    });

    it('should sum occupancy over the capacity of every table record', () => {
        const engine = new SeatingEngine(seed);
        seatSmith(engine);

        // A, B, C (2 each), W (4) and A+B+C (6): 5 of 16
        expect(engine.overallUtilization()).toBe(31.25);
        expect(engine.tableUtilization('A+B+C')).toBeCloseTo(83.333, 3);
        expect(engine.tableUtilization('A')).toBe(0);
    });

    it('should match the ratio over the table status rows', () => {
        const engine = new SeatingEngine({
            rooms: { R: ['A', 'B', 'C'] },
            tables: [
                { id: 'A', capacity: 2, room: 'R' },
                { id: 'B', capacity: 2, room: 'R' },
                { id: 'C', capacity: 2, room: 'R' }
            ]
        });
        seatSmith(engine);

        const rows = engine.tableStatus();
        const occupancy = rows.reduce((sum, r) => sum + r.occupancy, 0);
        const capacity = rows.reduce((sum, r) => sum + r.capacity, 0);

        expect(capacity).toBe(12);
        expect(engine.overallUtilization()).toBe((100 * occupancy) / capacity);
        expect(engine.overallUtilization()).toBeCloseTo(41.667, 3);
    });

    it('should count each physical seat once in seat utilization', () => {
        const engine = new SeatingEngine(seed);
        seatSmith(engine);

        // A+B+C (6) and W (4): 5 of 10
        expect(engine.seatUtilization()).toBe(50);
        expect(new SeatingEngine({ rooms: {}, tables: [] }).seatUtilization()).toBe(0);
    });
});

describe('Room lookup', () => {
    it('should use the catalog, then the table record', () => {
        const engine = new SeatingEngine(seed);
        engine.addTable('X', 2, 'R');
        seatSmith(engine);

        expect(engine.roomForTable('W')).toBe('Bar');
        expect(engine.roomForTable('X')).toBe('R');
        expect(engine.roomForTable('A+B+C')).toBe('R');
        expect(engine.roomForTable('nope')).toBe('Unknown');
    });
});

describe('Status report', () => {
    it('should list tables sorted by id with occupants', () => {
        const engine = new SeatingEngine(seed);
        const smith = seatSmith(engine);

        const rows = engine.tableStatus();

        expect(rows.map(r => r.id)).toEqual(['A', 'A+B+C', 'B', 'C', 'W']);
        expect(rows[1]).toEqual({
            id: 'A+B+C',
            kind: 'combined',
            room: 'R',
            capacity: 6,
            occupied: true,
            combinedInto: null,
            componentTables: ['A', 'B', 'C'],
            occupants: [{ id: smith, name: 'Smith', size: 5 }],
            occupancy: 5,
            utilizationPct: 500 / 6
        });
    });

    it('should format table and waiting lines', () => {
        const engine = new SeatingEngine(seed);
        seatSmith(engine);
        engine.addGroup(9, 'Late');

        expect(engine.statusLines()).toEqual([
            'Table A (Combined) (R, Capacity: 2):  | Occupancy: 0/2 (0.0%)',
            'Table A+B+C (Combined) (R, Capacity: 6): Smith(5) | Occupancy: 5/6 (83.3%)',
            'Table B (Combined) (R, Capacity: 2):  | Occupancy: 0/2 (0.0%)',
            'Table C (Combined) (R, Capacity: 2):  | Occupancy: 0/2 (0.0%)',
            'Table W (Bar, Capacity: 4):  | Occupancy: 0/4 (0.0%)',
            'Late: 9 people'
        ]);
    });

    it('should join several occupants of one table', () => {
        const line = formatTableStatus({
            id: 'T4',
            kind: 'base',
            room: 'RESTAURANT',
            capacity: 4,
            occupied: true,
            combinedInto: null,
            componentTables: [],
            occupants: [{ id: 1, name: 'Ana', size: 2 }, { id: 2, name: 'Group 2', size: 1 }],
            occupancy: 3,
            utilizationPct: 75
        });
        expect(line).toBe('Table T4 (RESTAURANT, Capacity: 4): Ana(2), Group 2(1) | Occupancy: 3/4 (75.0%)');
        expect(formatWaitingGroup({ id: 3, name: 'Bo', size: 1 })).toBe('Bo: 1 people');
    });

    it('should snapshot utilization, tables and waiting groups together', () => {
        const engine = new SeatingEngine(seed);
        engine.addGroup(2, 'Pair');

        const snapshot = engine.snapshot();

        expect(snapshot.overallUtilization).toBe(0);
        expect(snapshot.tables).toHaveLength(4);
        expect(snapshot.waiting).toEqual([{ id: 1, name: 'Pair', size: 2 }]);
    });
});
