import type * as types from "../types";
import { SeatingEngine, type EngineOptions } from "../domain/engine";

export interface StoreOptions extends EngineOptions {
    /** Idempotency key lifetime in milliseconds (default: 24 hours) */
    idempotencyTtlMs?: number;
}

/**
 * In-memory state of one running venue service
 *
 * Features:
 * - One seating engine built from the injected seed (no module-level singleton)
 * - Idempotency key support for group creation, with expiry
 * - Periodic cleanup of expired idempotency keys, stopped by `close()`
 *
 * Concurrency Strategy:
 * - Engine commands are synchronous, so each request runs its command to completion before the
 *   event loop picks up the next one; no lock is needed around the registry, ledger and index
 * - Idempotency prevents duplicate groups from retried requests
 */
export class VenueStore {
    readonly engine: SeatingEngine;

    private readonly _idempotencyTtlMs: number;
    private _idempotency: Map<string, { group: types.WaitingGroup; expiresAt: number }> = new Map();
    private readonly _cleanup: NodeJS.Timeout;

    /**
     * @param seed - Room catalog and initial table roster
     * @param options - Engine clock and idempotency settings
     */
    constructor(seed: types.VenueSeed, options: StoreOptions = {}) {
        this.engine = new SeatingEngine(seed, { now: options.now });
        this._idempotencyTtlMs = options.idempotencyTtlMs ?? 24 * 60 * 60 * 1000;

        // Cleanup expired idempotency keys periodically
        this._cleanup = setInterval(() => {
            const now = Date.now();
            for (const [key, value] of this._idempotency.entries()) {
                if (value.expiresAt <= now) {
                    this._idempotency.delete(key);
                }
            }
        }, 60000).unref(); // Run every minute, don't hold process open
    }

    /**
     * Retrieve the group created under an idempotency key
     *
     * Automatically cleans up expired entries.
     *
     * @param key - Idempotency key from request header
     * @returns Associated group if found and not expired, undefined otherwise
     */
    getIdempotency(key: string): types.WaitingGroup | undefined {
        const entry = this._idempotency.get(key);
        if (!entry) return undefined;

        if (entry.expiresAt <= Date.now()) {
            this._idempotency.delete(key);
            return undefined;
        }

        return entry.group;
    }

    /**
     * Store a created group under an idempotency key
     *
     * @param key - Idempotency key from request header
     * @param group - Group returned to the first request
     * @param ttlMs - Time-to-live in milliseconds (defaults to the store's setting)
     */
    setIdempotency(key: string, group: types.WaitingGroup, ttlMs: number = this._idempotencyTtlMs) {
        this._idempotency.set(key, {
            group,
            expiresAt: Date.now() + ttlMs
        });
    }

    close() {
        clearInterval(this._cleanup);
        this._idempotency.clear();
    }
}
