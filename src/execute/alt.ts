/**
 * Address Lookup Table cache
 *
 * Tables are fetched once through the chain source and kept for the life of
 * the service. Concurrent lookups of the same table share one fetch; a failed
 * fetch is not cached.
 */

import type { AddressLookupTableAccount, PublicKey } from '@solana/web3.js';
import type { CacheStats } from '../cache/types.js';
import type { ChainDataSource } from '../rpc/chainSource.js';
import { logger, short } from '../utils/logger.js';

const log = logger.child('alt');

export class LookupTableCache {
    private cache = new Map<string, AddressLookupTableAccount>();
    private pending = new Map<string, Promise<AddressLookupTableAccount | null>>();

    // Metrics
    private hitCount = 0n;
    private missCount = 0n;

    constructor(private readonly source: ChainDataSource) {}

    /**
     * Cached table, or fetch it. null when the account does not exist.
     */
    async get(address: PublicKey): Promise<AddressLookupTableAccount | null> {
        const key = address.toBase58();

        const cached = this.cache.get(key);
        if (cached) {
            this.hitCount++;
            return cached;
        }

        const pendingFetch = this.pending.get(key);
        if (pendingFetch) {
            return pendingFetch;
        }

        this.missCount++;
        const fetchPromise = this.source.getAddressLookupTable(address).then(
            table => {
                this.pending.delete(key);
                if (table) {
                    this.cache.set(key, table);
                } else {
                    log.warn(`lookup table ${short(key)} not found`);
                }
                return table;
            },
            (err: unknown) => {
                this.pending.delete(key);
                throw err;
            }
        );
        this.pending.set(key, fetchPromise);
        return fetchPromise;
    }

    /**
     * Every table that exists, in request order
     */
    async getMany(addresses: readonly PublicKey[]): Promise<AddressLookupTableAccount[]> {
        const tables = await Promise.all(addresses.map(a => this.get(a)));
        return tables.filter((t): t is AddressLookupTableAccount => t !== null);
    }

    stats(): CacheStats {
        return {
            size: this.cache.size,
            hitCount: this.hitCount,
            missCount: this.missCount,
            evictionCount: 0n,
        };
    }

    clear(): void {
        this.cache.clear();
    }
}
