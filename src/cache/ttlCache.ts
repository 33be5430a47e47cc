/**
 * Namespaced TTL cache
 *
 * One owned instance per service. Each namespace has its own TTL; an entry
 * is served while `now - storedAt < ttl` and removed on the first read after
 * that. Writes replace the entry object, never mutate it, so a caller holding
 * a value from an earlier read keeps a consistent snapshot.
 *
 * Concurrent getOrLoad calls for the same key share one in-flight loader.
 */

import type { CacheEntry } from '../types.js';
import type { CacheNamespaces, CacheStats, Clock, ICache, TtlTable } from './types.js';
import { systemClock } from './types.js';

interface MutableStats {
    hitCount: bigint;
    missCount: bigint;
    evictionCount: bigint;
}

type Tables<N> = { [K in keyof N]?: Map<string, CacheEntry<N[K]>> };
type Pending<N> = { [K in keyof N]?: Map<string, Promise<N[K]>> };

export class TtlCache<N = CacheNamespaces> implements ICache<N> {
    private tables: Tables<N> = {};
    private pending: Pending<N> = {};
    private counters = new Map<keyof N, MutableStats>();

    constructor(
        private readonly ttls: TtlTable<N>,
        private readonly clock: Clock = systemClock
    ) {
        for (const [ns, ttl] of Object.entries(ttls)) {
            if (!(typeof ttl === 'number' && ttl > 0)) {
                throw new RangeError(`TTL for namespace "${ns}" must be > 0`);
            }
        }
    }

    ttl(ns: keyof N & string): number {
        return this.ttls[ns];
    }

    now(): number {
        return this.clock();
    }

    /**
     * Get the fresh value under a key, or undefined (miss or expired)
     */
    get<K extends keyof N & string>(ns: K, key: string): N[K] | undefined {
        return this.getEntry(ns, key)?.state;
    }

    getEntry<K extends keyof N & string>(ns: K, key: string): Readonly<CacheEntry<N[K]>> | undefined {
        const table = this.table(ns);
        const stats = this.counter(ns);
        const entry = table.get(key);
        if (!entry) {
            stats.missCount++;
            return undefined;
        }
        if (this.clock() - entry.storedAt >= this.ttls[ns]) {
            table.delete(key);
            stats.evictionCount++;
            stats.missCount++;
            return undefined;
        }
        stats.hitCount++;
        return entry;
    }

    /**
     * Replace the entry under a key.
     * @param storedAt - defaults to now; pools pass their observedAt
     */
    set<K extends keyof N & string>(ns: K, key: string, value: N[K], storedAt: number = this.clock()): void {
        this.table(ns).set(key, { state: value, storedAt });
    }

    async getOrLoad<K extends keyof N & string>(ns: K, key: string, loader: () => Promise<N[K]>): Promise<N[K]> {
        const cached = this.getEntry(ns, key);
        if (cached) return cached.state;

        const inflight = this.pendingTable(ns);
        const existing = inflight.get(key);
        if (existing) return existing;

        const promise = loader().then(
            value => {
                inflight.delete(key);
                this.set(ns, key, value);
                return value;
            },
            (err: unknown) => {
                inflight.delete(key);
                throw err;
            }
        );
        inflight.set(key, promise);
        return promise;
    }

    delete<K extends keyof N & string>(ns: K, key: string): boolean {
        return this.table(ns).delete(key);
    }

    clear(ns?: keyof N & string): void {
        if (ns !== undefined) {
            this.table(ns).clear();
            return;
        }
        this.tables = {};
        this.counters.clear();
    }

    stats(ns: keyof N & string): CacheStats {
        const stats = this.counter(ns);
        return {
            size: this.table(ns).size,
            hitCount: stats.hitCount,
            missCount: stats.missCount,
            evictionCount: stats.evictionCount,
        };
    }

    /**
     * Hit rate in percent. 100 when nothing has been looked up yet.
     */
    hitRate(ns: keyof N & string): number {
        const stats = this.counter(ns);
        const total = stats.hitCount + stats.missCount;
        if (total === 0n) return 100;
        return Number((stats.hitCount * 10000n) / total) / 100;
    }

    // ========================================================================
    // PRIVATE
    // ========================================================================

    private table<K extends keyof N>(ns: K): Map<string, CacheEntry<N[K]>> {
        let table = this.tables[ns];
        if (!table) {
            table = new Map<string, CacheEntry<N[K]>>();
            this.tables[ns] = table;
        }
        return table;
    }

    private pendingTable<K extends keyof N>(ns: K): Map<string, Promise<N[K]>> {
        let table = this.pending[ns];
        if (!table) {
            table = new Map<string, Promise<N[K]>>();
            this.pending[ns] = table;
        }
        return table;
    }

    private counter(ns: keyof N): MutableStats {
        let stats = this.counters.get(ns);
        if (!stats) {
            stats = { hitCount: 0n, missCount: 0n, evictionCount: 0n };
            this.counters.set(ns, stats);
        }
        return stats;
    }
}

export function createTtlCache(ttls: TtlTable<CacheNamespaces>, clock?: Clock): TtlCache<CacheNamespaces> {
    return new TtlCache<CacheNamespaces>(ttls, clock);
}
