import { describe, it, expect, afterEach } from 'vitest';
import { VenueStore } from '../store/db';
import { seedData } from '../store/seed-data';

describe('VenueStore', () => {
    let store: VenueStore | undefined;

    afterEach(() => {
        store?.close();
    });

    it('should build an engine from the default venue', () => {
        store = new VenueStore(seedData);

        expect(store.engine.roomNames()).toEqual(['GREENROOM', 'RESTAURANT', 'BOTTOM BAR', 'SMALL FUNCTION']);
        expect(store.engine.tableStatus()).toHaveLength(19);
        expect(store.engine.roomForTable('T5')).toBe('RESTAURANT');
    });

    it('should keep separate state per store', () => {
        store = new VenueStore(seedData);
        const other = new VenueStore(seedData);

        store.engine.addGroup(2);

        expect(other.engine.waitingGroups()).toEqual([]);
        other.close();
    });

    it('should expire idempotency keys', async () => {
        store = new VenueStore(seedData);
        const group = { id: 1, name: 'Group 1', size: 2 };

        store.setIdempotency('expiring-key-test', group, 10);
        expect(store.getIdempotency('expiring-key-test')).toEqual(group);

        await new Promise(resolve => setTimeout(resolve, 20));

        expect(store.getIdempotency('expiring-key-test')).toBeUndefined();
    });

    it('should forget idempotency keys on close', () => {
        store = new VenueStore(seedData, { idempotencyTtlMs: 60000 });
        store.setIdempotency('key', { id: 1, name: 'Group 1', size: 2 });

        store.close();

        expect(store.getIdempotency('key')).toBeUndefined();
    });
});
