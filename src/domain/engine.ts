import type * as types from '../types';
import * as accounting from './accounting';
import { orderForOptimizer, planSeating } from './allocation';
import { AssignmentIndex } from './assignments';
import { fail, isPositiveInteger, succeed } from './errors';
import { GroupLedger } from './ledger';
import { COMBINATION_SEPARATOR, TableRegistry } from './registry';
import { RoomCatalog } from './rooms';

export interface EngineOptions {
    /** Clock used for seating timestamps */
    now?: () => Date;
}

export interface TableRemoval {
    tableId: string;
    /** Groups moved back to the waiting pool */
    requeued: number[];
}

export interface Departure {
    groupId: number;
    tableId: string;
    /** Components freed when the departure broke up a combined table, otherwise null */
    dissolved: string[] | null;
}

const viewOf = (table: types.Table): types.Table =>
    table.kind === 'combined' ? { ...table, componentTables: [...table.componentTables] } : { ...table };

const placementOf = (groupId: number, table: types.Table): types.Placement => ({
    groupId,
    tableId: table.id,
    combined: table.kind === 'combined',
    componentTables: table.kind === 'combined' ? [...table.componentTables] : []
});

/**
 * Seating engine for one venue
 *
 * Holds the table registry, group ledger and assignment index, and keeps them consistent.
 * Every command is synchronous and validates before it mutates: a command that returns a
 * failure leaves the state exactly as it found it.
 */
export class SeatingEngine {
    private readonly state: accounting.SeatingState;
    private readonly now: () => Date;

    /**
     * @param seed - Room catalog and initial table roster
     * @throws {Error} When a roster entry is rejected by `addTable`
     */
    constructor(seed: types.VenueSeed, options: EngineOptions = {}) {
        this.state = {
            rooms: new RoomCatalog(seed.rooms),
            registry: new TableRegistry(),
            ledger: new GroupLedger(),
            assignments: new AssignmentIndex()
        };
        this.now = options.now ?? (() => new Date());

        for (const table of seed.tables) {
            const outcome = this.addTable(table.id, table.capacity, table.room);
            if (!outcome.ok) {
                throw new Error(`Invalid seed table ${table.id}: ${outcome.message}`);
            }
        }
    }

    roomNames(): string[] {
        return this.state.rooms.names();
    }

    getTable(id: string): types.Table | undefined {
        const table = this.state.registry.get(id);
        return table ? viewOf(table) : undefined;
    }

    addTable(id: string, capacity: number, room: string): types.Outcome<types.Table> {
        if (id.length === 0 || id.includes(COMBINATION_SEPARATOR)) {
            return fail('InvalidInput', `Table id must be non-empty and must not contain '${COMBINATION_SEPARATOR}'`);
        }
        if (this.state.registry.has(id)) {
            return fail('DuplicateTable', `Table ${id} already exists`);
        }
        if (!isPositiveInteger(capacity)) {
            return fail('InvalidInput', 'Table capacity must be a positive integer');
        }
        if (!this.state.rooms.has(room)) {
            return fail('UnknownRoom', `Room ${room} does not exist`);
        }
        return succeed(viewOf(this.state.registry.addBase(id, capacity, room)));
    }

    /**
     * Remove a table, sending everyone seated at it back to the waiting pool
     *
     * A combined table gives its components back. A base table held by a combination breaks
     * that combination up first.
     */
    removeTable(id: string): types.Outcome<TableRemoval> {
        const { registry } = this.state;
        const table = registry.get(id);
        if (!table) return fail('TableNotFound', `Table ${id} does not exist`);

        const requeued: number[] = [];
        if (table.kind === 'combined') {
            requeued.push(...this.requeueGroupsAt(table.id));
            registry.dissolve(table);
        } else {
            const holder = table.combinedInto === null ? undefined : registry.get(table.combinedInto);
            if (holder?.kind === 'combined') {
                requeued.push(...this.requeueGroupsAt(holder.id));
                registry.dissolve(holder);
            }
            requeued.push(...this.requeueGroupsAt(id));
            registry.delete(id);
        }

        return succeed({ tableId: id, requeued });
    }

    addGroup(size: number, name?: string): types.Outcome<types.WaitingGroup> {
        if (!isPositiveInteger(size)) {
            return fail('InvalidInput', 'Group size must be a positive integer');
        }
        return succeed({ ...this.state.ledger.add(size, name) });
    }

    rename(groupId: number, name: string): types.Outcome<types.GroupListing> {
        const { ledger } = this.state;
        const waiting = ledger.getWaiting(groupId);
        if (waiting) {
            waiting.name = name;
            return succeed(accounting.waitingListing(waiting));
        }
        const seated = ledger.getSeated(groupId);
        if (seated) {
            seated.name = name;
            return succeed(accounting.seatedListing(seated, this.now()));
        }
        return fail('GroupNotFound', `Group ${groupId} not found`);
    }

    /**
     * Seat a waiting group at a specific table
     *
     * Several groups may share a table while their sizes fit its capacity.
     */
    seat(groupId: number, tableId: string): types.Outcome<types.Placement> {
        const { registry, ledger, assignments } = this.state;

        const table = registry.get(tableId);
        if (!table) return fail('TableNotFound', 'Table does not exist');

        const group = ledger.getWaiting(groupId);
        if (!group) return fail('GroupNotFound', 'Group does not exist');

        if (table.kind === 'base' && table.combinedInto !== null) {
            return fail('TableUnavailable', `Table ${tableId} is part of combined table ${table.combinedInto}`);
        }
        if (group.size > table.capacity) {
            return fail('GroupTooLarge', 'Group too large for table');
        }
        if (table.occupied && table.capacity - accounting.occupancyOf(this.state, tableId) < group.size) {
            return fail('InsufficientSpace', 'Not enough space at table');
        }

        assignments.append(tableId, groupId);
        table.occupied = true;
        ledger.markSeated(group, tableId, this.now().toISOString());

        return succeed(placementOf(groupId, table));
    }

    /**
     * Find a table for a group of the given size, combining free tables in one room if needed
     *
     * A combination is registered immediately and its components are held, so the caller is
     * expected to seat the group there right away.
     *
     * @returns Table id (a `+`-joined id for a new combination), or null when nothing fits
     */
    findTableForGroup(size: number): string | null {
        if (!isPositiveInteger(size)) return null;

        const plan = planSeating(this.state.registry.freeBaseTables(), size);
        if (!plan) return null;
        if (plan.kind === 'single') return plan.table.id;

        const combined = this.state.registry.combine(plan.tables, plan.room);
        this.state.assignments.open(combined.id);
        return combined.id;
    }

    /**
     * Seat a waiting group wherever the table search puts it
     */
    seatAnywhere(groupId: number): types.Outcome<types.Placement> {
        const group = this.state.ledger.getWaiting(groupId);
        if (!group) return fail('GroupNotFound', 'Group not found or not waiting');

        const tableId = this.findTableForGroup(group.size);
        if (tableId === null) {
            return fail('NoTableAvailable', `No single table or combination can seat ${group.size} guests`);
        }

        const outcome = this.seat(groupId, tableId);
        if (!outcome.ok) this.discardEmptyCombination(tableId);
        return outcome;
    }

    /**
     * Mark a seated group as gone
     *
     * The group is deleted, not re-queued. The last group leaving a combined table breaks it up.
     */
    release(groupId: number): types.Outcome<Departure> {
        const { registry, ledger, assignments } = this.state;

        const group = ledger.getSeated(groupId);
        if (!group) return fail('GroupNotFound', 'Group not found or not seated');

        const remaining = assignments.remove(group.tableId, groupId);
        const table = registry.get(group.tableId);
        let dissolved: string[] | null = null;

        if (remaining === 0 && table) {
            table.occupied = false;
            if (table.kind === 'combined') {
                dissolved = [...table.componentTables];
                assignments.clear(table.id);
                registry.dissolve(table);
            }
        }
        ledger.removeSeated(groupId);

        return succeed({ groupId, tableId: group.tableId, dissolved });
    }

    /**
     * Seat every waiting group that fits, largest first
     *
     * Single greedy pass, not optimal packing: a large group seated early can use up the
     * combinable tables of a room that a later group needed.
     *
     * @returns One placement per newly seated group
     */
    optimize(): types.Placement[] {
        const placements: types.Placement[] = [];

        for (const group of orderForOptimizer(this.state.ledger.listWaiting())) {
            if (!this.state.ledger.getWaiting(group.id)) continue;
            const outcome = this.seatAnywhere(group.id);
            if (outcome.ok) placements.push(outcome.value);
        }

        return placements;
    }

    tableUtilization(tableId: string): number {
        return accounting.tableUtilization(this.state, tableId);
    }

    overallUtilization(): number {
        return accounting.overallUtilization(this.state);
    }

    seatUtilization(): number {
        return accounting.seatUtilization(this.state);
    }

    roomForTable(tableId: string): string {
        return accounting.roomForTable(this.state, tableId);
    }

    tableStatus(): types.TableStatusRow[] {
        return accounting.tableStatus(this.state);
    }

    waitingGroups(): types.WaitingGroup[] {
        return this.state.ledger.listWaiting().map(g => ({ ...g }));
    }

    allGroups(): types.GroupListing[] {
        return accounting.allGroups(this.state, this.now());
    }

    snapshot(): types.VenueSnapshot {
        return {
            overallUtilization: this.overallUtilization(),
            tables: this.tableStatus(),
            waiting: this.waitingGroups()
        };
    }

    /**
     * Status report as text lines: one per table, then one per waiting group
     */
    statusLines(): string[] {
        return [
            ...this.tableStatus().map(accounting.formatTableStatus),
            ...this.waitingGroups().map(accounting.formatWaitingGroup)
        ];
    }

    private requeueGroupsAt(tableId: string): number[] {
        const requeued: number[] = [];
        for (const groupId of this.state.assignments.clear(tableId)) {
            if (this.state.ledger.requeue(groupId)) requeued.push(groupId);
        }
        return requeued;
    }

    private discardEmptyCombination(tableId: string): void {
        const table = this.state.registry.get(tableId);
        if (table?.kind === 'combined' && this.state.assignments.groupsAt(tableId).length === 0) {
            this.state.assignments.clear(tableId);
            this.state.registry.dissolve(table);
        }
    }
}
