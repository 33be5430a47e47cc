/**
 * Constant Product AMM Math
 *
 * x * y = k
 *
 * Used by: Raydium AMM V4, Raydium CP-Swap
 *
 * Key formulas:
 * - dy = (y * dx) / (x + dx)  [exact output for input]
 * - dx = (x * dy) / (y - dy)  [exact input for output]
 * - Fee applied BEFORE swap calculation
 */

import { QuoteErrorCode } from '../../types.js';
import { mathFailure, type MathResult } from '../types.js';
import { assertFeeBps, calculateFee, FEE_DENOMINATOR } from './fees.js';

/**
 * Get output amount WITH fees applied to input
 * out = inAfterFee * reserveOut / (reserveIn * 10000 + inAfterFee)
 */
export function getAmountOut(
    amountIn: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    feeBps: number
): bigint {
    if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) {
        return 0n;
    }
    assertFeeBps(feeBps);

    const amountInWithFee = amountIn * (FEE_DENOMINATOR - BigInt(feeBps));
    const numerator = amountInWithFee * reserveOut;
    const denominator = reserveIn * FEE_DENOMINATOR + amountInWithFee;

    return numerator / denominator;
}

/**
 * Input required for a desired output, rounded up
 * dx = (x * dy * 10000) / ((y - dy) * (10000 - fee))
 * @returns null when the output is unreachable
 */
export function getAmountIn(
    amountOut: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    feeBps: number
): bigint | null {
    if (amountOut <= 0n) return 0n;
    if (reserveIn <= 0n || amountOut >= reserveOut || feeBps >= 10_000) return null;

    const numerator = reserveIn * amountOut * FEE_DENOMINATOR;
    const denominator = (reserveOut - amountOut) * (FEE_DENOMINATOR - BigInt(feeBps));
    return numerator / denominator + 1n;
}

/**
 * Quote an exact-input swap against a constant-product pool
 */
export function simulateConstantProduct(
    amountIn: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    feeBps: number
): MathResult {
    if (reserveIn <= 0n || reserveOut <= 0n) {
        return mathFailure(QuoteErrorCode.InsufficientLiquidity, `empty reserves (${reserveIn}/${reserveOut})`);
    }

    const amountOut = getAmountOut(amountIn, reserveIn, reserveOut, feeBps);

    if (amountOut >= reserveOut) {
        return mathFailure(QuoteErrorCode.InsufficientLiquidity, `output ${amountOut} would drain reserve ${reserveOut}`);
    }
    if (amountOut === 0n) {
        return mathFailure(QuoteErrorCode.InsufficientLiquidity, `input ${amountIn} yields zero output`);
    }

    return { success: true, amountOut, feePaid: calculateFee(amountIn, feeBps).feePaid };
}

/**
 * k = x * y should not decrease across a swap (fees make it grow)
 */
export function validateInvariant(
    reserveInBefore: bigint,
    reserveOutBefore: bigint,
    reserveInAfter: bigint,
    reserveOutAfter: bigint
): boolean {
    return reserveInAfter * reserveOutAfter >= reserveInBefore * reserveOutBefore;
}
