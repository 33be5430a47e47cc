/**
 * Fee helpers
 *
 * All pool variants carry their trade fee as integer basis points. Programs
 * that store a numerator/denominator pair or a rate in millionths are
 * converted when decoded.
 *
 * Fee application order differs by variant:
 * - Constant product / stable: fee deducted from input before the curve
 * - CLMM: fee collected inside each swap step
 */

export const FEE_DENOMINATOR = 10_000n;
export const MAX_FEE_BPS = 10_000;

/** Rates stored in millionths (CLMM and CP-Swap AmmConfig) */
export const FEE_RATE_DENOMINATOR_PPM = 1_000_000;

export interface FeeResult {
    amountAfterFee: bigint;
    feePaid: bigint;
}

export function assertFeeBps(feeBps: number): void {
    if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > MAX_FEE_BPS) {
        throw new RangeError(`Fee ${feeBps} bps outside 0..${MAX_FEE_BPS}`);
    }
}

/**
 * Input-side fee: feePaid = amount - floor(amount * (10000 - fee) / 10000)
 */
export function calculateFee(amount: bigint, feeBps: number): FeeResult {
    assertFeeBps(feeBps);
    if (feeBps === 0) {
        return { amountAfterFee: amount, feePaid: 0n };
    }
    const amountAfterFee = (amount * (FEE_DENOMINATOR - BigInt(feeBps))) / FEE_DENOMINATOR;
    return { amountAfterFee, feePaid: amount - amountAfterFee };
}

/**
 * numerator/denominator -> bps, rounded to nearest
 * @returns null when the ratio is not a valid fee
 */
export function ratioToBps(numerator: bigint, denominator: bigint): number | null {
    if (denominator <= 0n || numerator < 0n || numerator > denominator) return null;
    const scaled = numerator * FEE_DENOMINATOR;
    return Number((scaled + denominator / 2n) / denominator);
}

/**
 * Millionths -> bps, rounded to nearest (2500 -> 25)
 */
export function ppmToBps(rate: number | bigint): number | null {
    const value = Number(rate);
    if (!Number.isFinite(value) || value < 0 || value > FEE_RATE_DENOMINATOR_PPM) return null;
    return Math.round(value / 100);
}
