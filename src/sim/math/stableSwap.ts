/**
 * StableSwap Math (two-token invariant)
 *
 *   A·n^n·(x + y) + D = A·D·n^n + D^3 / (n^n·x·y),  n = 2
 *
 * Used by: Raydium stable pools
 *
 * Reserves of tokens with different decimals are scaled to the larger
 * precision before solving, and the output is scaled back down (floor).
 * Fee is deducted from the input before the curve.
 */

import { QuoteErrorCode } from '../../types.js';
import { mathFailure, type MathResult } from '../types.js';
import { calculateFee } from './fees.js';
import { Dec, type Decimal } from './pricing.js';

export const MAX_ITERATIONS = 255;
export const MIN_AMP = 1n;
export const MAX_AMP = 1_000_000n;

const N_COINS = 2n;

function absDiff(a: bigint, b: bigint): bigint {
    return a > b ? a - b : b - a;
}

/** A·n^n */
function annOf(amp: bigint): bigint {
    return amp * N_COINS * N_COINS;
}

/**
 * Invariant D by Newton iteration
 * @returns null when the iteration does not settle within MAX_ITERATIONS
 */
export function computeD(amp: bigint, x: bigint, y: bigint): bigint | null {
    const sum = x + y;
    if (sum === 0n) return 0n;
    if (x === 0n || y === 0n) return null;

    const ann = annOf(amp);
    let d = sum;
    for (let i = 0; i < MAX_ITERATIONS; i++) {
        let dP = d;
        dP = (dP * d) / (x * N_COINS);
        dP = (dP * d) / (y * N_COINS);
        const prev = d;
        d = ((ann * sum + dP * N_COINS) * d) / ((ann - 1n) * d + (N_COINS + 1n) * dP);
        if (absDiff(d, prev) <= 1n) return d;
    }
    return null;
}

/**
 * Balance of the other token that keeps D constant when this one is `x`
 * Solves y² + (b − D)·y = c with b = x + D/Ann, c = D³ / (4·x·Ann)
 */
export function computeY(amp: bigint, x: bigint, d: bigint): bigint | null {
    if (x === 0n) return null;
    const ann = annOf(amp);

    let c = (d * d) / (x * N_COINS);
    c = (c * d) / (ann * N_COINS);
    const b = x + d / ann;

    let y = d;
    for (let i = 0; i < MAX_ITERATIONS; i++) {
        const prev = y;
        const denominator = 2n * y + b - d;
        if (denominator <= 0n) return null;
        y = (y * y + c) / denominator;
        if (absDiff(y, prev) <= 1n) return y;
    }
    return null;
}

function scaleFactors(decimalsIn: number, decimalsOut: number): [bigint, bigint] {
    const target = Math.max(decimalsIn, decimalsOut);
    return [10n ** BigInt(target - decimalsIn), 10n ** BigInt(target - decimalsOut)];
}

function ampInRange(amp: bigint): boolean {
    return amp >= MIN_AMP && amp <= MAX_AMP;
}

/**
 * Quote an exact-input swap against a stable pool
 */
export function simulateStableSwap(
    amountIn: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    amp: bigint,
    feeBps: number,
    decimalsIn: number,
    decimalsOut: number
): MathResult {
    if (!ampInRange(amp)) {
        return mathFailure(QuoteErrorCode.ConvergenceError, `amplification ${amp} outside ${MIN_AMP}..${MAX_AMP}`);
    }
    if (reserveIn <= 0n || reserveOut <= 0n) {
        return mathFailure(QuoteErrorCode.InsufficientLiquidity, `empty reserves (${reserveIn}/${reserveOut})`);
    }

    const { amountAfterFee, feePaid } = calculateFee(amountIn, feeBps);
    const [scaleIn, scaleOut] = scaleFactors(decimalsIn, decimalsOut);
    const x = reserveIn * scaleIn;
    const y = reserveOut * scaleOut;

    const d = computeD(amp, x, y);
    if (d === null) {
        return mathFailure(QuoteErrorCode.ConvergenceError, `invariant D did not converge in ${MAX_ITERATIONS} iterations`);
    }
    const newY = computeY(amp, x + amountAfterFee * scaleIn, d);
    if (newY === null) {
        return mathFailure(QuoteErrorCode.ConvergenceError, `output balance did not converge in ${MAX_ITERATIONS} iterations`);
    }

    // One unit kept back for Newton rounding
    const dyScaled = y - newY - 1n;
    const amountOut = dyScaled > 0n ? dyScaled / scaleOut : 0n;

    if (amountOut >= reserveOut) {
        return mathFailure(QuoteErrorCode.InsufficientLiquidity, `output ${amountOut} would drain reserve ${reserveOut}`);
    }
    if (amountOut === 0n) {
        return mathFailure(QuoteErrorCode.InsufficientLiquidity, `input ${amountIn} yields zero output`);
    }

    return { success: true, amountOut, feePaid };
}

/**
 * Marginal price (output per input, whole-token units) from the invariant's
 * derivative: dy/dx = (Ann + D³/(4x²y)) / (Ann + D³/(4xy²))
 * @returns null when D does not converge or amp is out of range
 */
export function stableSpotPrice(
    amp: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    decimalsIn: number,
    decimalsOut: number
): Decimal | null {
    if (!ampInRange(amp) || reserveIn <= 0n || reserveOut <= 0n) return null;
    const [scaleIn, scaleOut] = scaleFactors(decimalsIn, decimalsOut);
    const xBig = reserveIn * scaleIn;
    const yBig = reserveOut * scaleOut;
    const dBig = computeD(amp, xBig, yBig);
    if (dBig === null) return null;

    const ann = new Dec(annOf(amp).toString());
    const x = new Dec(xBig.toString());
    const y = new Dec(yBig.toString());
    const d3 = new Dec(dBig.toString()).pow(3);

    const dFdx = ann.plus(d3.div(x.times(x).times(y).times(4)));
    const dFdy = ann.plus(d3.div(x.times(y).times(y).times(4)));
    return dFdx.div(dFdy);
}
