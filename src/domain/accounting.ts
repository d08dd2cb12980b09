import { differenceInMinutes, parseISO } from 'date-fns';
import type * as types from '../types';
import type { AssignmentIndex } from './assignments';
import type { GroupLedger } from './ledger';
import type { TableRegistry } from './registry';
import { UNKNOWN_ROOM, type RoomCatalog } from './rooms';

/**
 * Read-only access to the engine state used by the accounting queries
 */
export interface SeatingState {
    rooms: RoomCatalog;
    registry: TableRegistry;
    ledger: GroupLedger;
    assignments: AssignmentIndex;
}

const byId = (a: { id: string }, b: { id: string }): number => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

export const occupantsOf = (state: SeatingState, tableId: string): types.Occupant[] => {
    const occupants: types.Occupant[] = [];
    for (const groupId of state.assignments.groupsAt(tableId)) {
        const group = state.ledger.getSeated(groupId);
        if (group) occupants.push({ id: group.id, name: group.name, size: group.size });
    }
    return occupants;
};

export const occupancyOf = (state: SeatingState, tableId: string): number =>
    occupantsOf(state, tableId).reduce((sum, o) => sum + o.size, 0);

/**
 * Percentage of a table's seats in use; 0 for unknown tables and zero capacity
 */
export const tableUtilization = (state: SeatingState, tableId: string): number => {
    const table = state.registry.get(tableId);
    if (!table || table.capacity === 0) return 0;
    return (100 * occupancyOf(state, tableId)) / table.capacity;
};

const utilizationOver = (state: SeatingState, tables: types.Table[]): number => {
    let capacity = 0;
    let occupancy = 0;
    for (const table of tables) {
        capacity += table.capacity;
        occupancy += occupancyOf(state, table.id);
    }
    if (capacity === 0) return 0;
    return (100 * occupancy) / capacity;
};

/**
 * Occupancy over capacity across every table record, combined tables and held components alike
 */
export const overallUtilization = (state: SeatingState): number =>
    utilizationOver(state, state.registry.all());

/**
 * Like `overallUtilization`, but each physical seat counts once: held components are left out
 */
export const seatUtilization = (state: SeatingState): number =>
    utilizationOver(state, state.registry.all().filter(t => t.kind === 'combined' || t.combinedInto === null));

/**
 * Room of a table: the catalog first, then the table record's own room field
 */
export const roomForTable = (state: SeatingState, tableId: string): string => {
    const catalogued = state.rooms.roomOf(tableId);
    if (catalogued !== UNKNOWN_ROOM) return catalogued;
    return state.registry.get(tableId)?.room ?? UNKNOWN_ROOM;
};

export const tableStatus = (state: SeatingState): types.TableStatusRow[] => {
    return state.registry.all().sort(byId).map(table => {
        const occupants = occupantsOf(state, table.id);
        return {
            id: table.id,
            kind: table.kind,
            room: table.room,
            capacity: table.capacity,
            occupied: table.occupied,
            combinedInto: table.kind === 'base' ? table.combinedInto : null,
            componentTables: table.kind === 'combined' ? [...table.componentTables] : [],
            occupants,
            occupancy: occupants.reduce((sum, o) => sum + o.size, 0),
            utilizationPct: tableUtilization(state, table.id)
        };
    });
};

export const waitingListing = (group: types.WaitingGroup): types.GroupListing => ({
    id: group.id,
    name: group.name,
    size: group.size,
    status: 'Waiting',
    tableId: null,
    seatedAt: null,
    seatedMinutes: null
});

export const seatedListing = (group: types.SeatedGroup, now: Date): types.GroupListing => ({
    id: group.id,
    name: group.name,
    size: group.size,
    status: 'Seated',
    tableId: group.tableId,
    seatedAt: group.seatedAt,
    seatedMinutes: differenceInMinutes(now, parseISO(group.seatedAt))
});

export const allGroups = (state: SeatingState, now: Date): types.GroupListing[] => [
    ...state.ledger.listWaiting().map(waitingListing),
    ...state.ledger.listSeated().map(group => seatedListing(group, now))
];

/**
 * One status line per table, e.g.
 * `Table A+B (Combined) (Terrace, Capacity: 6): Smith(5) | Occupancy: 5/6 (83.3%)`
 */
export const formatTableStatus = (row: types.TableStatusRow): string => {
    const marker = row.kind === 'combined' || row.combinedInto !== null ? ' (Combined)' : '';
    const groups = row.occupants.map(o => `${o.name}(${o.size})`).join(', ');
    return `Table ${row.id}${marker} (${row.room}, Capacity: ${row.capacity}): ${groups} | Occupancy: ${row.occupancy}/${row.capacity} (${row.utilizationPct.toFixed(1)}%)`;
};

export const formatWaitingGroup = (group: types.WaitingGroup): string => `${group.name}: ${group.size} people`;
