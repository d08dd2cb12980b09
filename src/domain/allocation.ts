import type * as types from "../types";

/**
 * Where a group of a given size would go, before anything is mutated
 */
export type TablePlan =
    | { kind: 'single'; table: types.BaseTable }
    | { kind: 'combo'; room: string; tables: types.BaseTable[] };

/**
 * Single table phase: first free table (in the given order) large enough for the group
 *
 * @param candidates - Free base tables in registry order
 * @param size - Group size
 * @returns The table, or null when none is large enough on its own
 */
export const findSingleTable = (candidates: types.BaseTable[], size: number): types.BaseTable | null => {
    return candidates.find(table => table.capacity >= size) ?? null;
};

/**
 * Partition tables by room, rooms ordered by first appearance
 */
export const groupByRoom = (candidates: types.BaseTable[]): Map<string, types.BaseTable[]> => {
    const byRoom = new Map<string, types.BaseTable[]>();
    for (const table of candidates) {
        const tables = byRoom.get(table.room);
        if (tables) {
            tables.push(table);
        } else {
            byRoom.set(table.room, [table]);
        }
    }
    return byRoom;
};

/**
 * Combination phase: a run of free tables in one room whose capacities add up to the group size
 *
 * Algorithm:
 * 1. Partition candidates by room (first appearance order)
 * 2. Sort each room's tables by capacity, largest first (stable, so ties keep registry order)
 * 3. For each start index i, add tables i, i+1, ... until the running sum covers the group
 * 4. First room with such a run wins; tables from different rooms are never combined
 *
 * Example: A(2), B(2), C(2) in one room, group of 5 => [A, B, C] (sum 6)
 *
 * @param candidates - Free base tables in registry order
 * @param size - Group size
 * @returns Room and tables in selection order, or null if no room can hold the group
 */
export const findCombination = (
    candidates: types.BaseTable[],
    size: number
): { room: string; tables: types.BaseTable[] } | null => {
    for (const [room, roomTables] of groupByRoom(candidates)) {
        const sorted = [...roomTables].sort((a, b) => b.capacity - a.capacity);

        for (let i = 0; i < sorted.length; i++) {
            let sum = 0;
            const selected: types.BaseTable[] = [];

            for (const table of sorted.slice(i)) {
                sum += table.capacity;
                selected.push(table);
                if (sum >= size) return { room, tables: selected };
            }
        }
    }
    return null;
};

/**
 * Two-phase table search: a single table if one fits, otherwise a same-room combination
 *
 * @param candidates - Free base tables in registry order
 * @param size - Group size
 * @returns Plan to seat the group, or null if the venue cannot take it right now
 */
export function planSeating(candidates: types.BaseTable[], size: number): TablePlan | null {
    const single = findSingleTable(candidates, size);
    if (single) return { kind: 'single', table: single };

    const combo = findCombination(candidates, size);
    if (combo) return { kind: 'combo', room: combo.room, tables: combo.tables };

    return null;
}

/**
 * Optimizer order: largest groups first, ties by id (arrival order)
 */
export function orderForOptimizer(groups: types.WaitingGroup[]): types.WaitingGroup[] {
    return [...groups].sort((a, b) => {
        if (a.size !== b.size) return b.size - a.size;
        return a.id - b.id;
    });
}
