import type { SeatedGroup, WaitingGroup } from '../types';

/**
 * Waiting and seated groups. A group id is in exactly one of the two maps.
 */
export class GroupLedger {
    private readonly waiting: Map<number, WaitingGroup> = new Map();
    private readonly seated: Map<number, SeatedGroup> = new Map();
    private nextId = 1;

    add(size: number, name?: string): WaitingGroup {
        const id = this.nextId++;
        const group: WaitingGroup = { id, name: name ? name : `Group ${id}`, size };
        this.waiting.set(id, group);
        return group;
    }

    getWaiting(id: number): WaitingGroup | undefined {
        return this.waiting.get(id);
    }

    getSeated(id: number): SeatedGroup | undefined {
        return this.seated.get(id);
    }

    /**
     * Waiting groups by id, so re-queued groups keep their place in creation order
     */
    listWaiting(): WaitingGroup[] {
        return Array.from(this.waiting.values()).sort((a, b) => a.id - b.id);
    }

    listSeated(): SeatedGroup[] {
        return Array.from(this.seated.values());
    }

    markSeated(group: WaitingGroup, tableId: string, seatedAt: string): SeatedGroup {
        const seated: SeatedGroup = { id: group.id, name: group.name, size: group.size, tableId, seatedAt };
        this.waiting.delete(group.id);
        this.seated.set(group.id, seated);
        return seated;
    }

    /**
     * Move a seated group back to the waiting pool, keeping its id, name and size
     */
    requeue(id: number): WaitingGroup | undefined {
        const seated = this.seated.get(id);
        if (!seated) return undefined;
        const group: WaitingGroup = { id: seated.id, name: seated.name, size: seated.size };
        this.seated.delete(id);
        this.waiting.set(id, group);
        return group;
    }

    removeSeated(id: number): void {
        this.seated.delete(id);
    }
}
