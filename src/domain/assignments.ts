/**
 * Table id -> group ids seated there, in seating order
 */
export class AssignmentIndex {
    private readonly lists: Map<string, number[]> = new Map();

    groupsAt(tableId: string): readonly number[] {
        return this.lists.get(tableId) ?? [];
    }

    open(tableId: string): void {
        if (!this.lists.has(tableId)) this.lists.set(tableId, []);
    }

    append(tableId: string, groupId: number): void {
        const list = this.lists.get(tableId);
        if (list) {
            list.push(groupId);
        } else {
            this.lists.set(tableId, [groupId]);
        }
    }

    /**
     * @returns Number of groups left at the table
     */
    remove(tableId: string, groupId: number): number {
        const list = this.lists.get(tableId);
        if (!list) return 0;
        const index = list.indexOf(groupId);
        if (index !== -1) list.splice(index, 1);
        return list.length;
    }

    /**
     * Drop the table's entry entirely
     *
     * @returns The group ids that were seated there
     */
    clear(tableId: string): number[] {
        const list = this.lists.get(tableId) ?? [];
        this.lists.delete(tableId);
        return list;
    }
}
