/**
 * Price helpers on decimal.js
 *
 * Prices are quoted in whole-token units (amount / 10^decimals) with 40
 * significant digits. All amount math stays in bigint; only the derived
 * price fields go through Decimal.
 */

import { Decimal } from 'decimal.js';

export const Dec = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });
export type { Decimal };

const ONE_HUNDRED = new Dec(100);

/** amount / 10^decimals */
export function toUiAmount(amount: bigint, decimals: number): Decimal {
    return new Dec(amount.toString()).div(new Dec(10).pow(decimals));
}

/**
 * Output per input in whole-token units
 * @returns 0 when the input is zero
 */
export function unitPrice(amountOut: bigint, decimalsOut: number, amountIn: bigint, decimalsIn: number): Decimal {
    if (amountIn === 0n) return new Dec(0);
    return toUiAmount(amountOut, decimalsOut).div(toUiAmount(amountIn, decimalsIn));
}

/**
 * (1 − effective/spot) × 100, clamped to >= 0
 */
export function priceImpactPct(spot: Decimal, effective: Decimal): Decimal {
    if (spot.lte(0)) return new Dec(0);
    const impact = new Dec(1).minus(effective.div(spot)).times(ONE_HUNDRED);
    return impact.isNegative() ? new Dec(0) : impact;
}

/**
 * Q64.64 sqrt price → token1 per token0 in whole-token units
 */
export function sqrtPriceX64ToPrice(sqrtPriceX64: bigint, decimals0: number, decimals1: number): Decimal {
    const sqrt = new Dec(sqrtPriceX64.toString()).div(new Dec(2).pow(64));
    return sqrt.times(sqrt).times(new Dec(10).pow(decimals0 - decimals1));
}

/** Shortfall of `actual` against `expected` in bps (negative when better) */
export function shortfallBps(expected: bigint, actual: bigint): number {
    if (expected === 0n) return 0;
    return new Dec((expected - actual).toString()).times(10_000).div(expected.toString()).toDecimalPlaces(2).toNumber();
}
