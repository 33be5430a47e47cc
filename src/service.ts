/**
 * Swap service
 *
 * Caller-facing facade: wires the chain source, caches, registries,
 * selector, builder and submitter from one ServiceConfig.
 *
 *   getQuotes   request → ranked quotes across every venue
 *   getQuote    request → best route with its minimum output
 *   executeSwap request → transaction report
 *   wrapSol / unwrapSol → SOL into or out of the owner's wSOL account
 *   listPools / findPoolsForToken → pool summaries
 */

import type { PublicKey } from '@solana/web3.js';
import { createTtlCache, type TtlCache } from './cache/ttlCache.js';
import { systemClock, type CacheNamespaces, type CacheStats, type Clock, type Namespace } from './cache/types.js';
import type { ServiceConfig } from './config.js';
import { decodeTokenAmount } from './decode/programs/splToken.js';
import { InvalidRequestError, NoRouteFoundError } from './errors.js';
import { LookupTableCache } from './execute/alt.js';
import {
    buildSwapTransaction,
    buildUnwrapTransaction,
    buildWrapTransaction,
    minimumAmountOut,
    type BuildOptions,
} from './execute/builder.js';
import { SwapSubmitter } from './execute/submit.js';
import { deriveAta } from './execute/tokens.js';
import { PoolDiscovery } from './registry/discovery.js';
import { PoolRegistry, type PoolLookup } from './registry/poolRegistry.js';
import { TokenRegistry } from './registry/tokenRegistry.js';
import { DEADLINE, Deadline } from './route/deadline.js';
import { groupByVariant, selectRoute, type QuoteFn } from './route/selector.js';
import { ConnectionChainSource, type ChainDataSource } from './rpc/chainSource.js';
import { ConcurrencyLimiter } from './rpc/limiter.js';
import type { Signer } from './rpc/signer.js';
import { quote } from './sim/engine.js';
import {
    FailureStage,
    NATIVE_MINT,
    poolKey,
    type PoolSummary,
    type QuoteResult,
    type RankedQuotes,
    type Route,
    type SwapRequest,
    type TransactionReport,
    type WrapReport,
} from './types.js';
import { logger, short } from './utils/logger.js';

const log = logger.child('service');

export interface SwapServiceDeps {
    config: ServiceConfig;
    source: ChainDataSource;
    /** Required for executeSwap, wrapSol and unwrapSol only */
    signer?: Signer;
    clock?: Clock;
    sleep?: (ms: number) => Promise<void>;
}

export class SwapService {
    readonly registry: PoolRegistry;
    readonly tokens: TokenRegistry;

    private readonly config: ServiceConfig;
    private readonly source: ChainDataSource;
    private readonly cache: TtlCache<CacheNamespaces>;
    private readonly lookupTables: LookupTableCache;
    private readonly submitter: SwapSubmitter | null;
    private readonly signer: Signer | null;

    constructor(deps: SwapServiceDeps) {
        const { config, source } = deps;
        this.config = config;
        this.source = source;
        this.cache = createTtlCache(
            {
                pools: config.cacheTtlMs.pools,
                tokens: config.cacheTtlMs.tokens,
                quotes: config.cacheTtlMs.quotes,
                discovery: config.cacheTtlMs.pools,
            },
            deps.clock ?? systemClock
        );
        this.tokens = new TokenRegistry(source, this.cache);
        const discovery = new PoolDiscovery(source, this.cache, config.maxPoolsPerType);
        this.registry = new PoolRegistry(source, this.cache, this.tokens, discovery, {
            tickArrayRadius: config.tickArrayRadius,
            minLiquidity: config.minLiquidity,
            quoteMints: config.quoteMints,
        });
        this.lookupTables = new LookupTableCache(source);
        this.signer = deps.signer ?? null;
        this.submitter = deps.signer
            ? new SwapSubmitter(source, deps.signer, {
                  retry: config.retry,
                  confirmIntervalMs: config.confirmIntervalMs,
                  confirmTimeoutMs: config.confirmTimeoutMs,
                  clock: deps.clock,
                  sleep: deps.sleep,
              })
            : null;
    }

    /**
     * Service over a web3.js Connection with the shared limiter
     */
    static fromConfig(config: ServiceConfig, signer?: Signer): SwapService {
        const limiter = new ConcurrencyLimiter(config.rpcConcurrency, {
            baseMs: config.rateLimitBackoffBaseMs,
            maxMs: config.rateLimitBackoffMaxMs,
        });
        const source = ConnectionChainSource.fromUrl(config.rpcUrl, limiter, { timeoutMs: config.rpcTimeoutMs });
        log.info(`RPC ${config.rpcUrl} (concurrency ${config.rpcConcurrency})`);
        return new SwapService({ config, source, signer });
    }

    /**
     * Quote every pool trading the pair. One deadline (quoteDeadlineMs)
     * bounds discovery, the pool load and quoting together.
     * @throws InvalidRequestError before any I/O
     * @throws NoRouteFoundError when no pool quotes
     */
    async getQuotes(request: SwapRequest): Promise<RankedQuotes> {
        this.validate(request);
        const deadline = new Deadline(this.config.quoteDeadlineMs);
        let ranked: RankedQuotes;
        try {
            const { pools, failures } = await this.lookupWithin(deadline, request);
            ranked = await selectRoute(
                pools,
                request,
                { deadlineMs: deadline.ms, poolTtlMs: this.config.cacheTtlMs.pools, quoteFn: this.cachedQuote, deadline },
                failures
            );
        } finally {
            deadline.clear();
        }

        const groups = groupByVariant(ranked.ranked);
        const byType = Object.entries(groups)
            .map(([variant, g]) => `${variant}=${g.count}`)
            .join(' ');
        log.info(
            `${request.amountIn} ${short(poolKey(request.inputMint))} → ${short(poolKey(request.outputMint))}: ` +
            `best ${short(poolKey(ranked.best.pool))} out=${ranked.best.amountOut} [${byType}] failures=${ranked.failures.length}`
        );
        return ranked;
    }

    /**
     * Best route with minimumAmountOut at the request's slippage
     */
    async getQuote(request: SwapRequest): Promise<Route> {
        const { best } = await this.getQuotes(request);
        return this.toRoute(best, request.slippageBps);
    }

    /**
     * Quote, build, simulate, sign, send and confirm.
     * Stage failures come back as the report's status.
     * @param slippageBps - overrides request.slippageBps
     * @throws InvalidRequestError, NoRouteFoundError
     */
    async executeSwap(request: SwapRequest, slippageBps?: number): Promise<TransactionReport> {
        const effective: SwapRequest = slippageBps === undefined ? request : { ...request, slippageBps };
        this.validate(effective);
        const { submitter, signer } = this.requireSigner('executeSwap');

        const route = await this.getQuote(effective);
        const pool = await this.registry.getPool(route.quote.pool);
        const options = await this.buildOptions();

        const report = await submitter.execute(route, blockhash =>
            buildSwapTransaction(route, pool, signer.publicKey, blockhash.blockhash, options)
        );
        log.info(`swap via ${short(poolKey(pool.address))}: ${report.status} after ${report.attempts} attempt(s)`);
        return report;
    }

    /**
     * Move `lamports` of native SOL into the signer's wSOL account,
     * creating the account when it does not exist.
     * @throws InvalidRequestError without a signer or for an amount outside 1..u64
     */
    async wrapSol(lamports: bigint): Promise<WrapReport> {
        const { submitter, signer } = this.requireSigner('wrapSol');
        if (lamports <= 0n || lamports >= 1n << 64n) {
            throw new InvalidRequestError(`lamports must be in 1..u64 (got ${lamports})`);
        }
        const account = deriveAta(signer.publicKey, NATIVE_MINT);
        const options = await this.buildOptions();
        const report = await submitter.executeWrap('wrap', account, lamports, blockhash =>
            buildWrapTransaction(signer.publicKey, lamports, blockhash.blockhash, options)
        );
        log.info(`wrap ${lamports} lamports into ${short(poolKey(account))}: ${report.status}`);
        return report;
    }

    /**
     * Close the signer's wSOL account; its whole balance returns as SOL
     * @throws InvalidRequestError without a signer, or when there is no wSOL to unwrap
     */
    async unwrapSol(): Promise<WrapReport> {
        const { submitter, signer } = this.requireSigner('unwrapSol');
        const account = deriveAta(signer.publicKey, NATIVE_MINT);
        const [existing] = await this.source.getAccounts([account]);
        const balance = existing ? decodeTokenAmount(existing.data, poolKey(account)) : 0n;
        if (balance === 0n) {
            throw new InvalidRequestError(`no wSOL to unwrap in ${poolKey(account)}`);
        }
        const options = await this.buildOptions();
        const report = await submitter.executeWrap('unwrap', account, balance, blockhash =>
            buildUnwrapTransaction(signer.publicKey, blockhash.blockhash, options)
        );
        log.info(`unwrap ${balance} lamports from ${short(poolKey(account))}: ${report.status}`);
        return report;
    }

    async listPools(tokenA: PublicKey, tokenB: PublicKey): Promise<PoolSummary[]> {
        const { pools } = await this.registry.getPoolsForPair(tokenA, tokenB);
        return pools.map(p => this.registry.summarize(p));
    }

    async findPoolsForToken(mint: PublicKey): Promise<PoolSummary[]> {
        const { pools } = await this.registry.getPoolsForToken(mint);
        return pools.map(p => this.registry.summarize(p));
    }

    cacheStats(): Record<Namespace, CacheStats> {
        return {
            pools: this.cache.stats('pools'),
            tokens: this.cache.stats('tokens'),
            quotes: this.cache.stats('quotes'),
            discovery: this.cache.stats('discovery'),
        };
    }

    /** Drop every cached value */
    close(): void {
        this.cache.clear();
        this.lookupTables.clear();
    }

    // ========================================================================
    // PRIVATE
    // ========================================================================

    /** Quotes keyed by pool snapshot, so a refreshed pool is requoted */
    private readonly cachedQuote: QuoteFn = (pool, request) => {
        const key = [
            poolKey(pool.address),
            pool.observedAt,
            poolKey(request.inputMint),
            poolKey(request.outputMint),
            request.amountIn,
        ].join(':');
        const cached = this.cache.get('quotes', key);
        if (cached) return cached;
        const outcome = quote(pool, request, this.config.cacheTtlMs.pools);
        this.cache.set('quotes', key, outcome);
        return outcome;
    };

    /**
     * Discovery and pool load, bounded by the request deadline. Pools whose
     * load is unfinished at the deadline are reported, not waited for; the
     * load still completes in the background and fills the pool cache.
     * @throws NoRouteFoundError when discovery itself misses the deadline
     */
    private async lookupWithin(deadline: Deadline, request: SwapRequest): Promise<PoolLookup> {
        const { inputMint, outputMint } = request;
        const addresses = await deadline.race(this.registry.findPairAddresses(inputMint, outputMint));
        if (addresses === DEADLINE) {
            throw new NoRouteFoundError([{
                pool: `${poolKey(inputMint)}/${poolKey(outputMint)}`,
                variant: null,
                stage: FailureStage.Deadline,
                code: 'DeadlineExceeded',
                reason: `pool discovery unfinished within ${deadline.ms}ms`,
            }]);
        }

        const lookup = await deadline.race(this.registry.getPools(addresses));
        if (lookup !== DEADLINE) return lookup;
        log.warn(`pool load for ${addresses.length} pool(s) missed the ${deadline.ms}ms deadline`);
        return {
            pools: [],
            failures: addresses.map(pool => ({
                pool,
                variant: null,
                stage: FailureStage.Deadline,
                code: 'DeadlineExceeded',
                reason: `pool state unfinished within ${deadline.ms}ms`,
            })),
        };
    }

    private requireSigner(operation: string): { submitter: SwapSubmitter; signer: Signer } {
        const { submitter, signer } = this;
        if (!submitter || !signer) {
            throw new InvalidRequestError(`${operation} needs a signer`);
        }
        return { submitter, signer };
    }

    private async buildOptions(): Promise<BuildOptions> {
        const lookupTables = this.config.lookupTables.length > 0
            ? await this.lookupTables.getMany(this.config.lookupTables)
            : [];
        return {
            computeUnitLimit: this.config.computeUnitLimit,
            priorityFeeMicroLamports: this.config.priorityFeeMicroLamports,
            lookupTables,
        };
    }

    private toRoute(best: QuoteResult, slippageBps: number): Route {
        return Object.freeze({
            quote: best,
            slippageBps,
            minimumAmountOut: minimumAmountOut(best.amountOut, slippageBps),
        });
    }

    /**
     * @throws InvalidRequestError
     */
    private validate(request: SwapRequest): void {
        if (request.amountIn <= 0n) {
            throw new InvalidRequestError(`amountIn must be > 0 (got ${request.amountIn})`);
        }
        if (request.amountIn >= 1n << 64n) {
            throw new InvalidRequestError(`amountIn ${request.amountIn} exceeds u64`);
        }
        const { slippageBps } = request;
        if (!Number.isInteger(slippageBps) || slippageBps < 0 || slippageBps > this.config.maxSlippageBps) {
            throw new InvalidRequestError(`slippageBps must be an integer in 0..${this.config.maxSlippageBps} (got ${slippageBps})`);
        }
        if (request.inputMint.equals(request.outputMint)) {
            throw new InvalidRequestError('input and output mints are the same');
        }
    }
}
