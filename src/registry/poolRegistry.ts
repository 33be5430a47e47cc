/**
 * Pool Registry
 *
 * Produces PoolState for discovered pools. Fresh cached states are served
 * as-is; the rest are fetched in two batches (pool accounts, then every
 * dependency plus unresolved mints) and decoded. A pool that fails to
 * decode is reported, never fatal to the request.
 *
 * Flow:
 * 1. Candidate addresses from discovery (findPairAddresses)
 * 2. Serve fresh entries (now - observedAt < pool TTL)
 * 3. getAccounts(pools) → preparePool per owner
 * 4. getAccounts(dependencies ∪ missing mints)
 * 5. Assemble, store with observedAt = now
 * 6. Drop pools below the liquidity floor
 */

import { PublicKey } from '@solana/web3.js';
import type { TtlCache } from '../cache/ttlCache.js';
import type { CacheNamespaces } from '../cache/types.js';
import { DecodeError } from '../errors.js';
import type { ChainDataSource } from '../rpc/chainSource.js';
import { poolSpotPrice } from '../sim/engine.js';
import { Dec, toUiAmount, type Decimal } from '../sim/math/pricing.js';
import {
    FailureStage,
    PoolVariant,
    poolKey,
    type PoolState,
    type PoolSummary,
    type QuoteFailure,
    type TokenRef,
} from '../types.js';
import { logger, short } from '../utils/logger.js';
import { DependencySet, preparePool, type DependencyAccount, type PendingPool } from './assemble.js';
import type { PoolDiscovery } from './discovery.js';
import type { TokenRegistry } from './tokenRegistry.js';

const log = logger.child('registry');

export interface RegistryOptions {
    tickArrayRadius: number;
    /** Quote-currency units */
    minLiquidity: number;
    quoteMints: readonly PublicKey[];
}

export interface PoolLookup {
    pools: PoolState[];
    failures: QuoteFailure[];
}

interface LoadResult extends PoolLookup {
    errors: Map<string, DecodeError>;
}

function variantOf(err: DecodeError): PoolVariant | null {
    switch (err.variant) {
        case PoolVariant.ConstantProduct:
        case PoolVariant.Stabilized:
        case PoolVariant.Concentrated:
            return err.variant;
        default:
            return null;
    }
}

function decodeFailure(address: string, err: DecodeError, variant: QuoteFailure['variant']): QuoteFailure {
    return { pool: address, variant, stage: FailureStage.Decode, code: err.code, reason: err.message };
}

export class PoolRegistry {
    private readonly quoteMints: ReadonlySet<string>;

    constructor(
        private readonly source: ChainDataSource,
        private readonly cache: TtlCache<CacheNamespaces>,
        private readonly tokens: TokenRegistry,
        private readonly discovery: PoolDiscovery,
        private readonly options: RegistryOptions
    ) {
        this.quoteMints = new Set(options.quoteMints.map(m => m.toBase58()));
    }

    async getPoolsForPair(a: PublicKey, b: PublicKey): Promise<PoolLookup> {
        return this.getPools(await this.findPairAddresses(a, b));
    }

    /** Discovery step of getPoolsForPair, for callers that bound each step */
    findPairAddresses(a: PublicKey, b: PublicKey): Promise<readonly string[]> {
        return this.discovery.findForPair(a, b);
    }

    /** Load and liquidity-filter known pool addresses */
    async getPools(addresses: readonly string[]): Promise<PoolLookup> {
        const { pools, failures } = await this.load(addresses, false);
        return { pools: this.filterLiquidity(pools), failures };
    }

    async getPoolsForToken(mint: PublicKey): Promise<PoolLookup> {
        const addresses = await this.discovery.findForToken(mint);
        const { pools, failures } = await this.load(addresses, false);
        return { pools: this.filterLiquidity(pools), failures };
    }

    /**
     * Single pool by address, from cache when fresh
     * @throws DecodeError when the account is missing or malformed
     */
    getPool(address: PublicKey): Promise<PoolState> {
        return this.loadOne(address, false);
    }

    /** Refetch regardless of freshness */
    refresh(address: PublicKey): Promise<PoolState> {
        return this.loadOne(address, true);
    }

    /**
     * Liquidity in quote-currency units: 2 × the quote-side reserve.
     * null when neither side is a quote currency.
     */
    liquidityInQuote(pool: PoolState): Decimal | null {
        const side: [TokenRef, bigint] | null = this.quoteMints.has(pool.tokenB.mint.toBase58())
            ? [pool.tokenB, pool.reserveB]
            : this.quoteMints.has(pool.tokenA.mint.toBase58())
                ? [pool.tokenA, pool.reserveA]
                : null;
        if (!side) return null;
        const [token, reserve] = side;
        return toUiAmount(reserve, token.decimals).times(2);
    }

    passesLiquidity(pool: PoolState): boolean {
        if (pool.reserveA === 0n || pool.reserveB === 0n) return false;
        const liquidity = this.liquidityInQuote(pool);
        return liquidity === null || liquidity.gte(new Dec(this.options.minLiquidity));
    }

    summarize(pool: PoolState): PoolSummary {
        return {
            address: poolKey(pool.address),
            variant: pool.variant,
            source: pool.accounts.source,
            tokenA: pool.tokenA,
            tokenB: pool.tokenB,
            reserveA: pool.reserveA,
            reserveB: pool.reserveB,
            feeBps: pool.feeBps,
            liquidityInQuote: this.liquidityInQuote(pool),
            spotPrice: poolSpotPrice(pool),
        };
    }

    // ========================================================================
    // PRIVATE
    // ========================================================================

    private filterLiquidity(pools: PoolState[]): PoolState[] {
        const kept = pools.filter(pool => this.passesLiquidity(pool));
        if (kept.length < pools.length) {
            log.debug(`Dropped ${pools.length - kept.length} pool(s) below the liquidity floor`);
        }
        return kept;
    }

    private async loadOne(address: PublicKey, force: boolean): Promise<PoolState> {
        const key = poolKey(address);
        const result = await this.load([key], force);
        const [pool] = result.pools;
        if (pool) return pool;
        throw result.errors.get(key) ?? new DecodeError('account', 'pool could not be loaded', key);
    }

    private async load(addresses: readonly string[], force: boolean): Promise<LoadResult> {
        const result: LoadResult = { pools: [], failures: [], errors: new Map() };
        const fail = (address: string, err: DecodeError, variant: QuoteFailure['variant']): void => {
            result.failures.push(decodeFailure(address, err, variant));
            result.errors.set(address, err);
            log.debug(`${short(address)} failed to decode: ${err.message}`);
        };

        const stale: PublicKey[] = [];
        for (const address of addresses) {
            const cached = force ? undefined : this.cache.get('pools', address);
            if (cached) {
                result.pools.push(cached);
            } else {
                stale.push(new PublicKey(address));
            }
        }
        if (stale.length === 0) return result;

        // Batch 1: pool accounts
        const accounts = await this.source.getAccounts(stale);
        const pending: PendingPool[] = [];
        stale.forEach((address, i) => {
            const key = poolKey(address);
            const account = accounts[i];
            if (!account) {
                fail(key, new DecodeError('account', 'pool account not found', key), null);
                return;
            }
            try {
                const prepared = preparePool(address, account.owner, account.data, this.options);
                if (prepared.decimals) {
                    const [decimalsA, decimalsB] = prepared.decimals;
                    this.tokens.seed(prepared.mints[0], decimalsA);
                    this.tokens.seed(prepared.mints[1], decimalsB);
                }
                pending.push(prepared);
            } catch (err) {
                if (!(err instanceof DecodeError)) throw err;
                fail(key, err, variantOf(err));
            }
        });
        if (pending.length === 0) return result;

        // Batch 2: vaults, configs, tick arrays, unresolved mints
        const mints = this.tokens.unresolved(pending.flatMap(p => [...p.mints]));
        const wanted = new Map<string, PublicKey>();
        for (const address of [...pending.flatMap(p => [...p.dependencies]), ...mints]) {
            wanted.set(address.toBase58(), address);
        }
        const depKeys = [...wanted.values()];
        const depAccounts = await this.source.getAccounts(depKeys);
        const depData = new Map<string, DependencyAccount | null>();
        depKeys.forEach((address, i) => {
            const account = depAccounts[i];
            depData.set(address.toBase58(), account ? { owner: account.owner, data: account.data } : null);
        });

        const mintErrors = new Map<string, DecodeError>();
        for (const mint of mints) {
            try {
                this.tokens.ingest(mint, depData.get(mint.toBase58())?.data ?? null);
            } catch (err) {
                if (!(err instanceof DecodeError)) throw err;
                mintErrors.set(mint.toBase58(), err);
            }
        }

        const deps = new DependencySet(depData);
        const observedAt = this.cache.now();
        for (const p of pending) {
            const key = poolKey(p.address);
            try {
                const [mintA, mintB] = p.mints;
                const tokenA = this.requireToken(mintA, mintErrors);
                const tokenB = this.requireToken(mintB, mintErrors);
                const pool = Object.freeze(p.assemble(deps, [tokenA, tokenB], observedAt));
                this.cache.set('pools', key, pool, observedAt);
                result.pools.push(pool);
            } catch (err) {
                if (!(err instanceof DecodeError)) throw err;
                fail(key, err, p.variant);
            }
        }

        log.debug(`Loaded ${result.pools.length} pool(s), ${result.failures.length} failure(s)`);
        return result;
    }

    private requireToken(mint: PublicKey, mintErrors: ReadonlyMap<string, DecodeError>): TokenRef {
        const ref = this.tokens.peek(mint);
        if (ref) return ref;
        throw mintErrors.get(mint.toBase58()) ?? new DecodeError('token', 'mint could not be resolved', mint.toBase58());
    }
}
