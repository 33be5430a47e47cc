/**
 * Cache module types
 */

import type { CacheEntry, PoolState, QuoteOutcome, TokenRef } from '../types.js';

/** Milliseconds since some fixed origin. Injected so tests control time. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/** Value type stored under each namespace */
export interface CacheNamespaces {
    pools: PoolState;
    tokens: TokenRef;
    quotes: QuoteOutcome;
    /** Pool addresses (base58) discovered for a pair or token */
    discovery: readonly string[];
}

export type Namespace = keyof CacheNamespaces;

export type TtlTable<N> = { readonly [K in keyof N]: number };

/** Cache statistics */
export interface CacheStats {
    size: number;
    hitCount: bigint;
    missCount: bigint;
    evictionCount: bigint;
}

/** Namespaced cache interface */
export interface ICache<N> {
    get<K extends keyof N & string>(ns: K, key: string): N[K] | undefined;
    getEntry<K extends keyof N & string>(ns: K, key: string): Readonly<CacheEntry<N[K]>> | undefined;
    set<K extends keyof N & string>(ns: K, key: string, value: N[K], storedAt?: number): void;
    getOrLoad<K extends keyof N & string>(ns: K, key: string, loader: () => Promise<N[K]>): Promise<N[K]>;
    delete<K extends keyof N & string>(ns: K, key: string): boolean;
    clear(ns?: keyof N & string): void;
    stats(ns: keyof N & string): CacheStats;
    ttl(ns: keyof N & string): number;
}
