/**
 * Result shapes shared by the per-variant math modules
 */

import type { QuoteErrorCode } from '../types.js';

export interface MathFailure {
    success: false;
    error: QuoteErrorCode;
    reason: string;
}

export interface MathSuccess {
    success: true;
    amountOut: bigint;
    feePaid: bigint;
}

export type MathResult<T extends object = object> = (MathSuccess & T) | MathFailure;

export function mathFailure(error: QuoteErrorCode, reason: string): MathFailure {
    return { success: false, error, reason };
}
