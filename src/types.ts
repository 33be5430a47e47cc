/**
 * Core type definitions for the swap router
 * These interfaces define the boundaries between registry, quote engines,
 * selector and executor.
 */

import { PublicKey } from '@solana/web3.js';
import type { Decimal } from 'decimal.js';

// ============================================================================
// POOL VARIANTS & VENUES
// ============================================================================

/** Swap math family. Every PoolState carries exactly one. */
export const PoolVariant = {
    ConstantProduct: 'ConstantProduct',
    Stabilized: 'Stabilized',
    Concentrated: 'Concentrated',
} as const;

export type PoolVariant = (typeof PoolVariant)[keyof typeof PoolVariant];

/** On-chain program a pool lives in */
export const PoolSource = {
    RaydiumAmmV4: 'RaydiumAmmV4',
    RaydiumCpSwap: 'RaydiumCpSwap',
    RaydiumStable: 'RaydiumStable',
    RaydiumClmm: 'RaydiumClmm',
} as const;

export type PoolSource = (typeof PoolSource)[keyof typeof PoolSource];

export const PROGRAM_IDS: Record<PoolSource, PublicKey> = {
    [PoolSource.RaydiumAmmV4]: new PublicKey('675kPX9MHTjS2zt1qfr1NYHuzeLXfQM9H24wFSUt1Mp8'),
    [PoolSource.RaydiumCpSwap]: new PublicKey('CPMDWBwJDtYax9qW7AyRuVC19Cc4L4Vcy4n2BHAbHkCW'),
    [PoolSource.RaydiumStable]: new PublicKey('5quBtoiQqxF9Jv6KYKctB59NT3gtJD2Y65kdnB1Uev3h'),
    [PoolSource.RaydiumClmm]: new PublicKey('CAMMCzo5YL8w4VFF8KVHrK22GGUsp5VTaW7grrKgrWqK'),
};

export const VARIANT_OF_SOURCE: Record<PoolSource, PoolVariant> = {
    [PoolSource.RaydiumAmmV4]: PoolVariant.ConstantProduct,
    [PoolSource.RaydiumCpSwap]: PoolVariant.ConstantProduct,
    [PoolSource.RaydiumStable]: PoolVariant.Stabilized,
    [PoolSource.RaydiumClmm]: PoolVariant.Concentrated,
};

export const NATIVE_MINT = new PublicKey('So11111111111111111111111111111111111111112');

export const BPS_DENOMINATOR = 10_000n;

// ============================================================================
// TOKENS
// ============================================================================

export interface TokenRef {
    readonly mint: PublicKey;
    /** 0..=18 */
    readonly decimals: number;
    readonly symbol?: string;
}

// ============================================================================
// POOL STATE
// ============================================================================

/** Accounts the AMM V4 swap instruction needs */
export interface AmmV4Accounts {
    readonly source: typeof PoolSource.RaydiumAmmV4;
    readonly authority: PublicKey;
    readonly vaultA: PublicKey;
    readonly vaultB: PublicKey;
}

export interface CpSwapAccounts {
    readonly source: typeof PoolSource.RaydiumCpSwap;
    readonly authority: PublicKey;
    readonly ammConfig: PublicKey;
    readonly vaultA: PublicKey;
    readonly vaultB: PublicKey;
    readonly tokenProgramA: PublicKey;
    readonly tokenProgramB: PublicKey;
    readonly observation: PublicKey;
}

export interface StableAccounts {
    readonly source: typeof PoolSource.RaydiumStable;
    readonly authority: PublicKey;
    readonly vaultA: PublicKey;
    readonly vaultB: PublicKey;
}

export interface ClmmAccounts {
    readonly source: typeof PoolSource.RaydiumClmm;
    readonly ammConfig: PublicKey;
    readonly vaultA: PublicKey;
    readonly vaultB: PublicKey;
    readonly observation: PublicKey;
    /** Owner program of each mint: classic token or Token-2022 */
    readonly tokenProgramA: PublicKey;
    readonly tokenProgramB: PublicKey;
    /** Loaded tick arrays keyed by start tick index */
    readonly tickArrays: ReadonlyMap<number, PublicKey>;
}

export type PoolAccounts = AmmV4Accounts | CpSwapAccounts | StableAccounts | ClmmAccounts;

interface PoolBase {
    readonly address: PublicKey;
    readonly programId: PublicKey;
    readonly tokenA: TokenRef;
    readonly tokenB: TokenRef;
    /** 0..=10000 */
    readonly feeBps: number;
    /** Clock reading (ms) when the account bytes were fetched */
    readonly observedAt: number;
    /** Spendable vault balances */
    readonly reserveA: bigint;
    readonly reserveB: bigint;
}

export interface ConstantProductPool extends PoolBase {
    readonly variant: typeof PoolVariant.ConstantProduct;
    readonly accounts: AmmV4Accounts | CpSwapAccounts;
}

export interface StabilizedPool extends PoolBase {
    readonly variant: typeof PoolVariant.Stabilized;
    /** Amplification coefficient at observedAt */
    readonly amp: bigint;
    readonly accounts: StableAccounts;
}

/** Half-open range [lower, upper) of tick indexes whose arrays were loaded */
export interface TickRange {
    readonly lower: number;
    readonly upper: number;
}

export interface ConcentratedPool extends PoolBase {
    readonly variant: typeof PoolVariant.Concentrated;
    readonly sqrtPriceX64: bigint;
    readonly tickCurrent: number;
    readonly tickSpacing: number;
    /** Active liquidity at tickCurrent */
    readonly liquidity: bigint;
    /** Initialized tick index -> liquidityNet */
    readonly ticks: ReadonlyMap<number, bigint>;
    readonly tickRange: TickRange;
    readonly accounts: ClmmAccounts;
}

export type PoolState = ConstantProductPool | StabilizedPool | ConcentratedPool;

// ============================================================================
// REQUESTS & QUOTES
// ============================================================================

export interface SwapRequest {
    readonly inputMint: PublicKey;
    readonly outputMint: PublicKey;
    /** Smallest on-chain unit, > 0 */
    readonly amountIn: bigint;
    readonly slippageBps: number;
}

export interface QuoteResult {
    readonly pool: PublicKey;
    readonly variant: PoolVariant;
    readonly source: PoolSource;
    readonly inputToken: TokenRef;
    readonly outputToken: TokenRef;
    readonly amountIn: bigint;
    readonly amountOut: bigint;
    readonly feeAmount: bigint;
    /** Percent, >= 0 */
    readonly priceImpactPct: Decimal;
    /** Output per input in whole-token units */
    readonly effectivePrice: Decimal;
    readonly spotPrice: Decimal;
    /** observedAt + pool TTL */
    readonly validUntil: number;
}

export const QuoteErrorCode = {
    InsufficientLiquidity: 'InsufficientLiquidity',
    ConvergenceError: 'ConvergenceError',
    MissingTickData: 'MissingTickData',
    TokenMismatch: 'TokenMismatch',
} as const;

export type QuoteErrorCode = (typeof QuoteErrorCode)[keyof typeof QuoteErrorCode];

export interface QuoteError {
    readonly code: QuoteErrorCode;
    readonly pool: PublicKey;
    readonly variant: PoolVariant;
    readonly message: string;
}

export type QuoteOutcome =
    | { readonly ok: true; readonly quote: QuoteResult }
    | { readonly ok: false; readonly error: QuoteError };

export const FailureStage = {
    Decode: 'decode',
    Quote: 'quote',
    Deadline: 'deadline',
} as const;

export type FailureStage = (typeof FailureStage)[keyof typeof FailureStage];

/** Per-pool failure reported next to successful quotes */
export interface QuoteFailure {
    readonly pool: string;
    readonly variant: PoolVariant | null;
    readonly stage: FailureStage;
    readonly code: string;
    readonly reason: string;
}

export interface RankedQuotes {
    readonly best: QuoteResult;
    readonly ranked: readonly QuoteResult[];
    readonly failures: readonly QuoteFailure[];
}

export interface Route {
    readonly quote: QuoteResult;
    readonly slippageBps: number;
    readonly minimumAmountOut: bigint;
}

export interface PoolSummary {
    readonly address: string;
    readonly variant: PoolVariant;
    readonly source: PoolSource;
    readonly tokenA: TokenRef;
    readonly tokenB: TokenRef;
    readonly reserveA: bigint;
    readonly reserveB: bigint;
    readonly feeBps: number;
    /** null when neither side is a quote currency */
    readonly liquidityInQuote: Decimal | null;
    /** tokenB per tokenA */
    readonly spotPrice: Decimal;
}

// ============================================================================
// EXECUTION
// ============================================================================

export const TxState = {
    Built: 'Built',
    Simulated: 'Simulated',
    Submitted: 'Submitted',
    Confirmed: 'Confirmed',
    Failed: 'Failed',
    TimedOut: 'TimedOut',
    SimulationFailed: 'SimulationFailed',
} as const;

export type TxState = (typeof TxState)[keyof typeof TxState];

export type TerminalTxState =
    | typeof TxState.Confirmed
    | typeof TxState.Failed
    | typeof TxState.TimedOut
    | typeof TxState.SimulationFailed;

export type TxFormat = 'legacy' | 'v0';

export interface TxFailure {
    readonly code: string;
    readonly stage: TxState;
    readonly reason: string;
}

export interface TransactionReport {
    readonly route: Route;
    readonly status: TerminalTxState;
    readonly transitions: readonly TxState[];
    readonly format: TxFormat;
    readonly signature?: string;
    readonly expectedAmountOut: bigint;
    readonly simulatedAmountOut?: bigint;
    readonly actualAmountOut?: bigint;
    readonly expectedPrice: Decimal;
    readonly actualPrice?: Decimal;
    /** Shortfall of actual vs expected output in bps (negative = better than quoted) */
    readonly realizedSlippageBps?: number;
    readonly attempts: number;
    readonly confirmationTimeMs?: number;
    readonly error?: TxFailure;
}

export type WrapKind = 'wrap' | 'unwrap';

/** Outcome of moving SOL into or out of the owner's wSOL account */
export interface WrapReport {
    readonly kind: WrapKind;
    /** The owner's wSOL associated token account */
    readonly account: PublicKey;
    /** Lamports wrapped, or the wSOL balance unwrapped */
    readonly amount: bigint;
    readonly status: TerminalTxState;
    readonly transitions: readonly TxState[];
    readonly format: TxFormat;
    readonly signature?: string;
    /** Simulated credit to the wSOL account (wrap only) */
    readonly simulatedAmount?: bigint;
    readonly attempts: number;
    readonly confirmationTimeMs?: number;
    readonly error?: TxFailure;
}

// ============================================================================
// CACHE
// ============================================================================

export interface CacheEntry<T> {
    readonly state: T;
    /** Clock reading when the entry was written */
    readonly storedAt: number;
}

export function poolKey(address: PublicKey): string {
    return address.toBase58();
}
