/**
 * Service configuration
 *
 * Values come from the environment (optionally a .env file). Everything the
 * core consumes is a plain value on ServiceConfig, so tests build configs
 * directly with `defaultConfig()` and overrides.
 */

import dotenv from 'dotenv';
import { PublicKey } from '@solana/web3.js';
import { ConfigError } from './errors.js';

export type Env = Record<string, string | undefined>;

export interface CacheTtls {
    pools: number;
    tokens: number;
    quotes: number;
}

export interface RetryConfig {
    /** Retries after the first attempt */
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export interface ServiceConfig {
    rpcUrl: string;
    rpcTimeoutMs: number;
    rpcConcurrency: number;
    rateLimitBackoffBaseMs: number;
    rateLimitBackoffMaxMs: number;

    defaultSlippageBps: number;
    maxSlippageBps: number;

    cacheTtlMs: CacheTtls;
    maxPoolsPerType: number;
    /** Minimum pool liquidity in quote-currency units */
    minLiquidity: number;
    quoteMints: PublicKey[];
    tickArrayRadius: number;
    quoteDeadlineMs: number;

    retry: RetryConfig;
    confirmIntervalMs: number;
    confirmTimeoutMs: number;

    computeUnitLimit: number;
    priorityFeeMicroLamports: number;
    lookupTables: PublicKey[];
}

export const USDC_MINT = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';
export const USDT_MINT = 'Es9vMFrzaCERmJfrF4H2FYD4KCoNkY11McCe8BenwNYB';

const DEFAULT_RPC_URL = 'https://api.mainnet-beta.solana.com';

export function defaultConfig(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
    return {
        rpcUrl: DEFAULT_RPC_URL,
        rpcTimeoutMs: 30_000,
        rpcConcurrency: 8,
        rateLimitBackoffBaseMs: 500,
        rateLimitBackoffMaxMs: 8_000,
        defaultSlippageBps: 50,
        maxSlippageBps: 1_000,
        cacheTtlMs: { pools: 30_000, tokens: 3_600_000, quotes: 10_000 },
        maxPoolsPerType: 10,
        minLiquidity: 1_000,
        quoteMints: [new PublicKey(USDC_MINT), new PublicKey(USDT_MINT)],
        tickArrayRadius: 3,
        quoteDeadlineMs: 2_000,
        retry: { maxRetries: 3, baseDelayMs: 1_000, maxDelayMs: 10_000 },
        confirmIntervalMs: 1_000,
        confirmTimeoutMs: 60_000,
        computeUnitLimit: 200_000,
        priorityFeeMicroLamports: 0,
        lookupTables: [],
        ...overrides,
    };
}

function readInt(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw new ConfigError(`${key} must be an integer, got "${raw}"`);
    }
    return value;
}

function readNumber(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigError(`${key} must be a number, got "${raw}"`);
    }
    return value;
}

function readKeys(env: Env, key: string, fallback: PublicKey[]): PublicKey[] {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    return raw
        .split(',')
        .map(s => s.trim())
        .filter(s => s.length > 0)
        .map(s => {
            try {
                return new PublicKey(s);
            } catch (err) {
                throw new ConfigError(`${key} contains an invalid address "${s}": ${String(err)}`);
            }
        });
}

/**
 * Build a config from environment variables.
 * With no argument, `.env` is loaded into process.env first.
 */
export function loadConfig(env?: Env): ServiceConfig {
    if (env === undefined) {
        dotenv.config();
    }
    const source: Env = env ?? process.env;
    const base = defaultConfig();

    const poolTtl = source.POOL_CACHE_TTL_MS !== undefined
        ? readInt(source, 'POOL_CACHE_TTL_MS', base.cacheTtlMs.pools)
        : readInt(source, 'CACHE_TTL_SECS', base.cacheTtlMs.pools / 1000) * 1000;

    const rpcTimeoutMs = source.RPC_TIMEOUT_MS !== undefined
        ? readInt(source, 'RPC_TIMEOUT_MS', base.rpcTimeoutMs)
        : readInt(source, 'TIMEOUT_SECS', base.rpcTimeoutMs / 1000) * 1000;

    const config: ServiceConfig = {
        rpcUrl: source.RPC_URL ?? source.HELIUS_RPC_URL ?? base.rpcUrl,
        rpcTimeoutMs,
        rpcConcurrency: readInt(source, 'RPC_CONCURRENCY', base.rpcConcurrency),
        rateLimitBackoffBaseMs: readInt(source, 'RATE_LIMIT_BACKOFF_BASE_MS', base.rateLimitBackoffBaseMs),
        rateLimitBackoffMaxMs: readInt(source, 'RATE_LIMIT_BACKOFF_MAX_MS', base.rateLimitBackoffMaxMs),
        defaultSlippageBps: readInt(source, 'DEFAULT_SLIPPAGE_BPS', base.defaultSlippageBps),
        maxSlippageBps: readInt(source, 'MAX_SLIPPAGE_BPS', base.maxSlippageBps),
        cacheTtlMs: {
            pools: poolTtl,
            tokens: readInt(source, 'TOKEN_CACHE_TTL_MS', base.cacheTtlMs.tokens),
            quotes: readInt(source, 'QUOTE_CACHE_TTL_MS', base.cacheTtlMs.quotes),
        },
        maxPoolsPerType: readInt(source, 'MAX_POOLS_PER_TYPE', base.maxPoolsPerType),
        minLiquidity: readNumber(source, 'MIN_LIQUIDITY_USD', base.minLiquidity),
        quoteMints: readKeys(source, 'QUOTE_MINTS', base.quoteMints),
        tickArrayRadius: readInt(source, 'TICK_ARRAY_RADIUS', base.tickArrayRadius),
        quoteDeadlineMs: readInt(source, 'QUOTE_DEADLINE_MS', base.quoteDeadlineMs),
        retry: {
            maxRetries: readInt(source, 'MAX_TRANSACTION_RETRIES', base.retry.maxRetries),
            baseDelayMs: readInt(source, 'RETRY_BASE_DELAY_MS', base.retry.baseDelayMs),
            maxDelayMs: readInt(source, 'RETRY_MAX_DELAY_MS', base.retry.maxDelayMs),
        },
        confirmIntervalMs: readInt(source, 'CONFIRM_INTERVAL_MS', base.confirmIntervalMs),
        confirmTimeoutMs: readInt(source, 'TRANSACTION_TIMEOUT_SECS', base.confirmTimeoutMs / 1000) * 1000,
        computeUnitLimit: readInt(source, 'COMPUTE_UNIT_LIMIT', base.computeUnitLimit),
        priorityFeeMicroLamports: readInt(source, 'PRIORITY_FEE_MICRO_LAMPORTS', base.priorityFeeMicroLamports),
        lookupTables: readKeys(source, 'LOOKUP_TABLES', base.lookupTables),
    };

    validateConfig(config);
    return config;
}

export function validateConfig(config: ServiceConfig): void {
    if (config.maxSlippageBps < 0 || config.maxSlippageBps > 10_000) {
        throw new ConfigError(`MAX_SLIPPAGE_BPS must be within 0..10000 (got ${config.maxSlippageBps})`);
    }
    if (config.defaultSlippageBps < 0 || config.defaultSlippageBps > config.maxSlippageBps) {
        throw new ConfigError(
            `DEFAULT_SLIPPAGE_BPS (${config.defaultSlippageBps}) must be within 0..MAX_SLIPPAGE_BPS (${config.maxSlippageBps})`
        );
    }
    const positive: Array<[string, number]> = [
        ['RPC timeout', config.rpcTimeoutMs],
        ['RPC concurrency', config.rpcConcurrency],
        ['pool cache TTL', config.cacheTtlMs.pools],
        ['token cache TTL', config.cacheTtlMs.tokens],
        ['quote cache TTL', config.cacheTtlMs.quotes],
        ['quote deadline', config.quoteDeadlineMs],
        ['confirmation interval', config.confirmIntervalMs],
        ['confirmation timeout', config.confirmTimeoutMs],
        ['max pools per type', config.maxPoolsPerType],
        ['compute unit limit', config.computeUnitLimit],
    ];
    for (const [name, value] of positive) {
        if (!(value > 0)) {
            throw new ConfigError(`${name} must be > 0 (got ${value})`);
        }
    }
    if (config.retry.maxRetries < 0 || config.retry.baseDelayMs < 0 || config.retry.maxDelayMs < config.retry.baseDelayMs) {
        throw new ConfigError('retry settings must be non-negative with max delay >= base delay');
    }
    if (config.tickArrayRadius < 0 || config.minLiquidity < 0 || config.priorityFeeMicroLamports < 0) {
        throw new ConfigError('tick array radius, minimum liquidity and priority fee must be non-negative');
    }
}
