import type { BaseTable, CombinedTable, Table } from '../types';

export const COMBINATION_SEPARATOR = '+';

/**
 * Insertion-ordered table store
 *
 * Iteration order is creation order; the table search depends on it, so it must never be re-sorted.
 */
export class TableRegistry {
    private readonly tables: Map<string, Table> = new Map();

    has(id: string): boolean {
        return this.tables.has(id);
    }

    get(id: string): Table | undefined {
        return this.tables.get(id);
    }

    all(): Table[] {
        return Array.from(this.tables.values());
    }

    addBase(id: string, capacity: number, room: string): BaseTable {
        const table: BaseTable = { kind: 'base', id, capacity, room, occupied: false, combinedInto: null };
        this.tables.set(id, table);
        return table;
    }

    /**
     * Register a combination of base tables and mark every component as held by it
     */
    combine(components: BaseTable[], room: string): CombinedTable {
        const id = components.map(t => t.id).join(COMBINATION_SEPARATOR);
        const combined: CombinedTable = {
            kind: 'combined',
            id,
            capacity: components.reduce((sum, t) => sum + t.capacity, 0),
            room,
            occupied: true,
            componentTables: components.map(t => t.id)
        };
        for (const component of components) {
            component.occupied = true;
            component.combinedInto = id;
        }
        this.tables.set(id, combined);
        return combined;
    }

    /**
     * Delete a combined table and hand its components back as free base tables
     */
    dissolve(combined: CombinedTable): void {
        for (const componentId of combined.componentTables) {
            const component = this.tables.get(componentId);
            if (component?.kind === 'base') {
                component.occupied = false;
                component.combinedInto = null;
            }
        }
        this.tables.delete(combined.id);
    }

    delete(id: string): void {
        this.tables.delete(id);
    }

    /**
     * Base tables a new group could take: not occupied and not held by a combination
     */
    freeBaseTables(): BaseTable[] {
        const free: BaseTable[] = [];
        for (const table of this.tables.values()) {
            if (table.kind === 'base' && table.combinedInto === null && !table.occupied) {
                free.push(table);
            }
        }
        return free;
    }
}
