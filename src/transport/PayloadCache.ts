/**
 * @file Payload Cache
 *
 * Explicit time-to-live cache of fetched spreadsheet bytes, one entry per
 * source key. At most one fetch per key is in flight; callers arriving while
 * it runs share its promise, and callers inside the TTL get the stored bytes.
 * Only successful fetches are stored.
 *
 * @module transport/cache
 */

import type { FetchOutcome, StrategyId } from './types.js';

export interface PayloadCacheEntry {
    payload: Uint8Array;
    strategy: StrategyId;
    expiresAt: number;
}

export type CachedFetchOutcome = FetchOutcome & { fromCache: boolean };

export type Clock = () => number;

export class PayloadCache {
    private readonly entries: Map<string, PayloadCacheEntry> = new Map();
    private readonly inFlight: Map<string, Promise<FetchOutcome>> = new Map();

    /**
     * @param ttlMs - Entry lifetime; 0 disables reuse (in-flight sharing still applies).
     * @param clock - Millisecond clock, injectable for tests.
     */
    constructor(
        private readonly ttlMs: number,
        private readonly clock: Clock = Date.now
    ) {}

    /**
     * Return the live entry for `key`, dropping it if expired.
     */
    public entry_get(key: string): PayloadCacheEntry | null {
        const entry: PayloadCacheEntry | undefined = this.entries.get(key);
        if (!entry) return null;
        if (this.clock() >= entry.expiresAt) {
            this.entries.delete(key);
            return null;
        }
        return entry;
    }

    /**
     * Serve `key` from cache, or run `fetcher` once and store a success.
     */
    public async payload_get(key: string, fetcher: () => Promise<FetchOutcome>): Promise<CachedFetchOutcome> {
        const entry: PayloadCacheEntry | null = this.entry_get(key);
        if (entry) {
            return {
                ok: true,
                value: { bytes: entry.payload, strategy: entry.strategy, attempts: [] },
                fromCache: true
            };
        }

        const pending: Promise<FetchOutcome> | undefined = this.inFlight.get(key);
        if (pending) {
            return { ...(await pending), fromCache: true };
        }

        const request: Promise<FetchOutcome> = this.fetch_run(key, fetcher);
        this.inFlight.set(key, request);
        try {
            return { ...(await request), fromCache: false };
        } finally {
            this.inFlight.delete(key);
        }
    }

    /**
     * Drop one entry, or every entry when no key is given.
     */
    public invalidate(key?: string): void {
        if (key === undefined) {
            this.entries.clear();
            return;
        }
        this.entries.delete(key);
    }

    private async fetch_run(key: string, fetcher: () => Promise<FetchOutcome>): Promise<FetchOutcome> {
        const outcome: FetchOutcome = await fetcher();
        if (outcome.ok && this.ttlMs > 0) {
            this.entries.set(key, {
                payload: outcome.value.bytes,
                strategy: outcome.value.strategy,
                expiresAt: this.clock() + this.ttlMs
            });
        }
        return outcome;
    }
}
