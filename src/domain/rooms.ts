import type { RoomCatalogSeed } from '../types';

export const UNKNOWN_ROOM = 'Unknown';

/**
 * Static room -> table mapping, read-only after construction
 */
export class RoomCatalog {
    private readonly rooms: Map<string, readonly string[]>;

    constructor(seed: RoomCatalogSeed) {
        this.rooms = new Map(Object.entries(seed).map(([room, tableIds]) => [room, [...tableIds]]));
    }

    names(): string[] {
        return Array.from(this.rooms.keys());
    }

    has(room: string): boolean {
        return this.rooms.has(room);
    }

    /**
     * Reverse lookup of the room a catalogued table belongs to
     *
     * @returns Room name, or `Unknown` for ids the catalog does not list (combined tables included)
     */
    roomOf(tableId: string): string {
        for (const [room, tableIds] of this.rooms) {
            if (tableIds.includes(tableId)) return room;
        }
        return UNKNOWN_ROOM;
    }
}
