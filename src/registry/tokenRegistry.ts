/**
 * Token Registry
 *
 * Resolves mint → TokenRef. Lookup order: the known-token table, the
 * `tokens` cache namespace, then one batched fetch of the mint accounts.
 * Pool decoders that carry decimals seed the cache so most pools never
 * need a mint fetch.
 */

import { readFileSync } from 'node:fs';
import { PublicKey } from '@solana/web3.js';
import type { TtlCache } from '../cache/ttlCache.js';
import type { CacheNamespaces } from '../cache/types.js';
import { decodeMintDecimals, MAX_DECIMALS } from '../decode/programs/splToken.js';
import { DecodeError } from '../errors.js';
import type { ChainDataSource } from '../rpc/chainSource.js';
import type { TokenRef } from '../types.js';
import { logger } from '../utils/logger.js';

const log = logger.child('tokens');

interface KnownTokenEntry {
    mint: string;
    symbol: string;
    decimals: number;
}

function isKnownTokenEntry(value: unknown): value is KnownTokenEntry {
    if (typeof value !== 'object' || value === null) return false;
    const mint: unknown = Reflect.get(value, 'mint');
    const symbol: unknown = Reflect.get(value, 'symbol');
    const decimals: unknown = Reflect.get(value, 'decimals');
    return typeof mint === 'string'
        && typeof symbol === 'string'
        && typeof decimals === 'number'
        && Number.isInteger(decimals)
        && decimals >= 0
        && decimals <= MAX_DECIMALS;
}

function loadKnownTokens(): Map<string, TokenRef> {
    const raw: unknown = JSON.parse(readFileSync(new URL('./knownTokens.json', import.meta.url), 'utf8'));
    if (!Array.isArray(raw)) {
        throw new Error('knownTokens.json must contain an array');
    }
    const out = new Map<string, TokenRef>();
    for (const entry of raw) {
        if (!isKnownTokenEntry(entry)) {
            throw new Error(`knownTokens.json: malformed entry ${JSON.stringify(entry)}`);
        }
        const mint = new PublicKey(entry.mint);
        out.set(mint.toBase58(), Object.freeze({ mint, decimals: entry.decimals, symbol: entry.symbol }));
    }
    return out;
}

export const KNOWN_TOKENS: ReadonlyMap<string, TokenRef> = loadKnownTokens();

export class TokenRegistry {
    constructor(
        private readonly source: ChainDataSource,
        private readonly cache: TtlCache<CacheNamespaces>
    ) {}

    /** Known or cached ref, without I/O */
    peek(mint: PublicKey): TokenRef | undefined {
        const key = mint.toBase58();
        return KNOWN_TOKENS.get(key) ?? this.cache.get('tokens', key);
    }

    /**
     * Record decimals read from a pool account. A ref already known or
     * cached is left alone so its symbol survives.
     */
    seed(mint: PublicKey, decimals: number): void {
        if (this.peek(mint)) return;
        this.store(mint, decimals);
    }

    /** Mints among `mints` that would need a fetch, de-duplicated */
    unresolved(mints: readonly PublicKey[]): PublicKey[] {
        const seen = new Set<string>();
        const out: PublicKey[] = [];
        for (const mint of mints) {
            const key = mint.toBase58();
            if (seen.has(key) || this.peek(mint)) continue;
            seen.add(key);
            out.push(mint);
        }
        return out;
    }

    /**
     * Decode a fetched mint account into the cache
     * @throws DecodeError when the account is missing or malformed
     */
    ingest(mint: PublicKey, data: Uint8Array | null): TokenRef {
        const key = mint.toBase58();
        if (data === null) {
            throw new DecodeError('token', 'mint account not found', key);
        }
        return this.store(mint, decodeMintDecimals(data, key));
    }

    async resolve(mint: PublicKey): Promise<TokenRef> {
        const refs = await this.resolveMany([mint]);
        const ref = refs.get(mint.toBase58());
        if (!ref) {
            throw new DecodeError('token', 'mint could not be resolved', mint.toBase58());
        }
        return ref;
    }

    /**
     * Resolve several mints with at most one upstream call
     * @throws DecodeError when any mint is missing or malformed
     */
    async resolveMany(mints: readonly PublicKey[]): Promise<Map<string, TokenRef>> {
        const missing = this.unresolved(mints);
        if (missing.length > 0) {
            log.debug(`Fetching ${missing.length} mint account(s)`);
            const accounts = await this.source.getAccounts(missing);
            missing.forEach((mint, i) => {
                this.ingest(mint, accounts[i]?.data ?? null);
            });
        }
        const out = new Map<string, TokenRef>();
        for (const mint of mints) {
            const ref = this.peek(mint);
            if (ref) out.set(mint.toBase58(), ref);
        }
        return out;
    }

    private store(mint: PublicKey, decimals: number): TokenRef {
        const ref: TokenRef = Object.freeze({ mint, decimals });
        this.cache.set('tokens', mint.toBase58(), ref);
        return ref;
    }
}
