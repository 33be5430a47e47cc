/**
 * Concentrated Liquidity AMM Math
 *
 * Raydium CLMM exact-input traversal in Q64.64 fixed point (sqrtPriceX64).
 *
 * Key formulas:
 * - sqrtPrice = 1.0001^(tick/2) * 2^64
 * - Δx = L * (1/√P_lower - 1/√P_upper)
 * - Δy = L * (√P_upper - √P_lower)
 *
 * Ticks are only known inside the loaded range; a swap that would need to
 * move past it stops with MissingTickData rather than guessing.
 */

import { QuoteErrorCode, type TickRange } from '../../types.js';
import { mathFailure, type MathFailure } from '../types.js';
import { assertFeeBps, FEE_DENOMINATOR } from './fees.js';

// Q64 fixed-point constants
export const Q64 = 1n << 64n;
const U128_MAX = (1n << 128n) - 1n;

// Tick bounds
export const MIN_TICK = -443636;
export const MAX_TICK = 443636;

export const MIN_SQRT_PRICE_X64 = 4295048016n;
export const MAX_SQRT_PRICE_X64 = 79226673515401279992447579055n;

/** 1/sqrt(1.0001^(2^i)) in Q64, for bit i = 1..18 of |tick| */
const TICK_BIT_RATIOS: ReadonlyArray<readonly [number, bigint]> = [
    [0x2, 0xfff97272373d4000n],
    [0x4, 0xfff2e50f5f657000n],
    [0x8, 0xffe5caca7e10f000n],
    [0x10, 0xffcb9843d60f7000n],
    [0x20, 0xff973b41fa98e800n],
    [0x40, 0xff2ea16466c9b000n],
    [0x80, 0xfe5dee046a9a3800n],
    [0x100, 0xfcbe86c7900bb000n],
    [0x200, 0xf987a7253ac65800n],
    [0x400, 0xf3392b0822bb6000n],
    [0x800, 0xe7159475a2caf000n],
    [0x1000, 0xd097f3bdfd2f2000n],
    [0x2000, 0xa9f746462d9f8000n],
    [0x4000, 0x70d869a156f31c00n],
    [0x8000, 0x31be135f97ed3200n],
    [0x10000, 0x9aa508b5b85a500n],
    [0x20000, 0x5d6af8dedc582cn],
    [0x40000, 0x2216e584f5fan],
];

/**
 * Convert tick to sqrt price in Q64 format
 * Binary decomposition of |tick|, inverted for positive ticks.
 */
export function tickToSqrtPriceX64(tick: number): bigint {
    if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
        throw new RangeError(`Tick ${tick} out of bounds [${MIN_TICK}, ${MAX_TICK}]`);
    }

    const absTick = Math.abs(tick);
    let ratio = (absTick & 0x1) !== 0 ? 0xfffcb933bd6fb800n : Q64;
    for (const [bit, multiplier] of TICK_BIT_RATIOS) {
        if ((absTick & bit) !== 0) ratio = (ratio * multiplier) >> 64n;
    }

    if (tick > 0) {
        ratio = U128_MAX / ratio;
    }
    return ratio;
}

/**
 * Greatest tick whose sqrt price is <= sqrtPriceX64 (binary search)
 */
export function sqrtPriceX64ToTick(sqrtPriceX64: bigint): number {
    if (sqrtPriceX64 < MIN_SQRT_PRICE_X64 || sqrtPriceX64 > MAX_SQRT_PRICE_X64) {
        throw new RangeError(`Sqrt price ${sqrtPriceX64} out of bounds`);
    }

    let low = MIN_TICK;
    let high = MAX_TICK;
    while (low < high) {
        const mid = low + Math.floor((high - low + 1) / 2);
        if (tickToSqrtPriceX64(mid) <= sqrtPriceX64) {
            low = mid;
        } else {
            high = mid - 1;
        }
    }
    return low;
}

function ceilDiv(numerator: bigint, denominator: bigint): bigint {
    return (numerator + denominator - 1n) / denominator;
}

/**
 * Δx = L * (√P_upper - √P_lower) / (√P_lower * √P_upper)
 */
export function getAmount0Delta(
    sqrtPriceAX64: bigint,
    sqrtPriceBX64: bigint,
    liquidity: bigint,
    roundUp: boolean
): bigint {
    const [lower, upper] = sqrtPriceAX64 <= sqrtPriceBX64 ? [sqrtPriceAX64, sqrtPriceBX64] : [sqrtPriceBX64, sqrtPriceAX64];
    if (lower === 0n) throw new RangeError('sqrt price must be > 0');

    const numerator = liquidity * (upper - lower) * Q64;
    const denominator = lower * upper;
    return roundUp ? ceilDiv(numerator, denominator) : numerator / denominator;
}

/**
 * Δy = L * (√P_upper - √P_lower) / 2^64
 */
export function getAmount1Delta(
    sqrtPriceAX64: bigint,
    sqrtPriceBX64: bigint,
    liquidity: bigint,
    roundUp: boolean
): bigint {
    const diff = sqrtPriceAX64 <= sqrtPriceBX64 ? sqrtPriceBX64 - sqrtPriceAX64 : sqrtPriceAX64 - sqrtPriceBX64;
    return roundUp ? ceilDiv(liquidity * diff, Q64) : (liquidity * diff) / Q64;
}

/**
 * Get next sqrt price from input amount
 *
 * zeroForOne (sell token0, price falls, rounded up):
 *   sqrtPrice_new = L * sqrtPrice / (L + Δx * sqrtPrice)
 * oneForZero (sell token1, price rises, rounded down):
 *   sqrtPrice_new = sqrtPrice + Δy / L
 */
export function getNextSqrtPriceFromInput(
    sqrtPriceX64: bigint,
    liquidity: bigint,
    amountIn: bigint,
    zeroForOne: boolean
): bigint {
    if (sqrtPriceX64 <= 0n || liquidity <= 0n) {
        throw new RangeError('sqrt price and liquidity must be > 0');
    }
    if (amountIn === 0n) return sqrtPriceX64;

    if (zeroForOne) {
        const numerator = liquidity << 64n;
        const denominator = numerator + amountIn * sqrtPriceX64;
        return ceilDiv(numerator * sqrtPriceX64, denominator);
    }
    return sqrtPriceX64 + (amountIn << 64n) / liquidity;
}

export interface SwapStepResult {
    sqrtPriceNextX64: bigint;
    amountIn: bigint;
    amountOut: bigint;
    feeAmount: bigint;
}

/**
 * Exact-input swap step within one range of constant liquidity
 * amountIn + feeAmount never exceeds amountRemaining.
 */
export function computeSwapStep(
    sqrtPriceCurrentX64: bigint,
    sqrtPriceTargetX64: bigint,
    liquidity: bigint,
    amountRemaining: bigint,
    feeBps: number
): SwapStepResult {
    const zeroForOne = sqrtPriceCurrentX64 >= sqrtPriceTargetX64;
    const fee = BigInt(feeBps);
    const amountRemainingLessFee = (amountRemaining * (FEE_DENOMINATOR - fee)) / FEE_DENOMINATOR;

    const amountToTarget = zeroForOne
        ? getAmount0Delta(sqrtPriceTargetX64, sqrtPriceCurrentX64, liquidity, true)
        : getAmount1Delta(sqrtPriceCurrentX64, sqrtPriceTargetX64, liquidity, true);

    const reachesTarget = amountRemainingLessFee >= amountToTarget;
    const sqrtPriceNextX64 = reachesTarget
        ? sqrtPriceTargetX64
        : getNextSqrtPriceFromInput(sqrtPriceCurrentX64, liquidity, amountRemainingLessFee, zeroForOne);

    let amountIn: bigint;
    if (reachesTarget) {
        amountIn = amountToTarget;
    } else {
        amountIn = zeroForOne
            ? getAmount0Delta(sqrtPriceNextX64, sqrtPriceCurrentX64, liquidity, true)
            : getAmount1Delta(sqrtPriceCurrentX64, sqrtPriceNextX64, liquidity, true);
        if (amountIn > amountRemainingLessFee) amountIn = amountRemainingLessFee;
    }

    const amountOut = zeroForOne
        ? getAmount1Delta(sqrtPriceNextX64, sqrtPriceCurrentX64, liquidity, false)
        : getAmount0Delta(sqrtPriceCurrentX64, sqrtPriceNextX64, liquidity, false);

    // Partial step: whatever input is left over is the fee
    const feeAmount = reachesTarget
        ? ceilDiv(amountIn * fee, FEE_DENOMINATOR - fee)
        : amountRemaining - amountIn;

    return { sqrtPriceNextX64, amountIn, amountOut, feeAmount };
}

// ============================================================================
// TRAVERSAL
// ============================================================================

export interface ClmmSwapState {
    sqrtPriceX64: bigint;
    tickCurrent: number;
    liquidity: bigint;
    feeBps: number;
    /** Initialized tick -> liquidityNet */
    ticks: ReadonlyMap<number, bigint>;
    tickRange: TickRange;
}

/** One constant-liquidity segment of a swap */
export interface ClmmStep {
    sqrtPriceStartX64: bigint;
    sqrtPriceEndX64: bigint;
    /** Tick the step aimed for */
    tickTarget: number;
    /** Whether an initialized tick was crossed at the end of the step */
    crossed: boolean;
    /** Active liquidity during the step */
    liquidity: bigint;
    amountIn: bigint;
    amountOut: bigint;
    feeAmount: bigint;
}

export interface ClmmSwapSuccess {
    success: true;
    amountOut: bigint;
    feePaid: bigint;
    sqrtPriceAfterX64: bigint;
    tickAfter: number;
    liquidityAfter: bigint;
    steps: ClmmStep[];
}

export type ClmmSwapResult = ClmmSwapSuccess | (MathFailure & { steps: ClmmStep[] });

/**
 * Sorted initialized ticks of a state, cached per ticks map
 */
const sortedTicksCache = new WeakMap<ReadonlyMap<number, bigint>, number[]>();

function sortedTicks(ticks: ReadonlyMap<number, bigint>): number[] {
    let sorted = sortedTicksCache.get(ticks);
    if (!sorted) {
        sorted = [...ticks.keys()].sort((a, b) => a - b);
        sortedTicksCache.set(ticks, sorted);
    }
    return sorted;
}

/**
 * Next initialized tick in the swap direction:
 * zeroForOne → greatest t <= tick; otherwise smallest t > tick
 */
export function nextInitializedTick(ticks: ReadonlyMap<number, bigint>, tick: number, zeroForOne: boolean): number | null {
    const sorted = sortedTicks(ticks);
    if (zeroForOne) {
        for (let i = sorted.length - 1; i >= 0; i--) {
            const t = sorted[i];
            if (t !== undefined && t <= tick) return t;
        }
        return null;
    }
    for (const t of sorted) {
        if (t > tick) return t;
    }
    return null;
}

const MAX_STEPS = 10_000;

/**
 * Exact-input swap across initialized ticks
 *
 * Each step targets the nearer of the next initialized tick and the edge of
 * the loaded range. Crossing a tick adds its liquidityNet (negated when the
 * price falls).
 */
export function simulateClmm(state: ClmmSwapState, amountIn: bigint, zeroForOne: boolean): ClmmSwapResult {
    assertFeeBps(state.feeBps);
    const steps: ClmmStep[] = [];
    const fail = (error: QuoteErrorCode, reason: string) => ({ ...mathFailure(error, reason), steps });

    if (state.feeBps >= 10_000) {
        return fail(QuoteErrorCode.InsufficientLiquidity, 'pool fee consumes the whole input');
    }

    const lowerBound = Math.max(state.tickRange.lower, MIN_TICK);
    const upperBound = Math.min(state.tickRange.upper, MAX_TICK);

    let sqrtPriceX64 = state.sqrtPriceX64;
    let tick = state.tickCurrent;
    let liquidity = state.liquidity;
    let remaining = amountIn;
    let amountOut = 0n;
    let feePaid = 0n;

    while (remaining > 0n) {
        if (steps.length >= MAX_STEPS) {
            return fail(QuoteErrorCode.InsufficientLiquidity, `swap did not finish within ${MAX_STEPS} steps`);
        }

        // Left the loaded window
        const atLimit = zeroForOne ? lowerBound <= MIN_TICK : upperBound >= MAX_TICK;
        if (zeroForOne ? tick < lowerBound : tick >= upperBound) {
            return atLimit
                ? fail(QuoteErrorCode.InsufficientLiquidity, `price limit reached with ${remaining} input left`)
                : fail(QuoteErrorCode.MissingTickData, `tick ${tick} is outside loaded range [${state.tickRange.lower}, ${state.tickRange.upper})`);
        }

        const next = nextInitializedTick(state.ticks, tick, zeroForOne);
        const nextInRange = next !== null && (zeroForOne ? next >= lowerBound : next < upperBound);

        // Nothing loaded can add liquidity; only the price limit proves none exists
        if (liquidity === 0n && !nextInRange) {
            return atLimit
                ? fail(QuoteErrorCode.InsufficientLiquidity, `no liquidity left with ${remaining} input remaining`)
                : fail(QuoteErrorCode.MissingTickData, `no liquidity inside loaded range [${state.tickRange.lower}, ${state.tickRange.upper})`);
        }

        const tickTarget = nextInRange && next !== null ? next : zeroForOne ? lowerBound : upperBound;
        const sqrtPriceTargetX64 = tickToSqrtPriceX64(tickTarget);

        const step = computeSwapStep(sqrtPriceX64, sqrtPriceTargetX64, liquidity, remaining, state.feeBps);
        const reached = step.sqrtPriceNextX64 === sqrtPriceTargetX64;
        const crossed = reached && state.ticks.has(tickTarget);

        steps.push({
            sqrtPriceStartX64: sqrtPriceX64,
            sqrtPriceEndX64: step.sqrtPriceNextX64,
            tickTarget,
            crossed,
            liquidity,
            amountIn: step.amountIn,
            amountOut: step.amountOut,
            feeAmount: step.feeAmount,
        });

        sqrtPriceX64 = step.sqrtPriceNextX64;
        remaining -= step.amountIn + step.feeAmount;
        amountOut += step.amountOut;
        feePaid += step.feeAmount;

        if (reached) {
            if (crossed) {
                const net = state.ticks.get(tickTarget) ?? 0n;
                liquidity += zeroForOne ? -net : net;
                if (liquidity < 0n) {
                    return fail(QuoteErrorCode.InsufficientLiquidity, `liquidity went negative crossing tick ${tickTarget}`);
                }
            }
            tick = zeroForOne ? tickTarget - 1 : tickTarget;
        } else {
            tick = sqrtPriceX64ToTick(sqrtPriceX64);
        }
    }

    if (amountOut === 0n) {
        return fail(QuoteErrorCode.InsufficientLiquidity, `input ${amountIn} yields zero output`);
    }

    return {
        success: true,
        amountOut,
        feePaid,
        sqrtPriceAfterX64: sqrtPriceX64,
        tickAfter: tick,
        liquidityAfter: liquidity,
        steps,
    };
}
