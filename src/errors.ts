/**
 * Error classes
 *
 * Per-pool problems (decode, quote) are captured and reported next to
 * successful results. Request-level problems are thrown as one of these.
 */

import type { PoolVariant, QuoteFailure, TxState } from './types.js';

export const ErrorCode = {
    Decode: 'DecodeError',
    NoRouteFound: 'NoRouteFound',
    InvalidRequest: 'InvalidRequest',
    SimulationFailed: 'SimulationFailed',
    TransactionFailed: 'Failed',
    TimedOut: 'TimedOut',
    TransactionTooLarge: 'TransactionTooLarge',
    Rpc: 'RpcError',
    Config: 'ConfigError',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class SwapError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        cause?: unknown
    ) {
        super(message);
        this.name = 'SwapError';
        if (cause !== undefined) this.cause = cause;
    }
}

/** Account bytes that do not match the declared layout */
export class DecodeError extends SwapError {
    constructor(
        public readonly variant: PoolVariant | 'token' | 'tickArray' | 'config' | 'account',
        reason: string,
        public readonly address?: string
    ) {
        super(ErrorCode.Decode, address ? `${variant} ${address}: ${reason}` : `${variant}: ${reason}`);
        this.name = 'DecodeError';
    }
}

export class NoRouteFoundError extends SwapError {
    constructor(public readonly failures: readonly QuoteFailure[]) {
        const detail = failures.length === 0
            ? 'no pools found'
            : failures.map(f => `${f.pool.slice(0, 8)}… ${f.stage}/${f.code}: ${f.reason}`).join('; ');
        super(ErrorCode.NoRouteFound, `No route found (${detail})`);
        this.name = 'NoRouteFoundError';
    }
}

export class InvalidRequestError extends SwapError {
    constructor(reason: string) {
        super(ErrorCode.InvalidRequest, reason);
        this.name = 'InvalidRequestError';
    }
}

/** Thrown inside the executor; surfaced to callers as a report status */
export class SimulationFailedError extends SwapError {
    constructor(reason: string, public readonly logs: readonly string[] = []) {
        super(ErrorCode.SimulationFailed, reason);
        this.name = 'SimulationFailedError';
    }
}

export class TransactionTooLargeError extends SwapError {
    constructor(
        public readonly size: number,
        public readonly limit: number,
        public readonly unit: 'bytes' | 'accounts' = 'bytes'
    ) {
        super(ErrorCode.TransactionTooLarge, `Transaction uses ${size} ${unit}, limit ${limit}`);
        this.name = 'TransactionTooLargeError';
    }
}

/**
 * Upstream failure. `transient` decides whether the submitter retries.
 */
export class RpcError extends SwapError {
    constructor(
        message: string,
        public readonly transient: boolean,
        cause?: unknown
    ) {
        super(ErrorCode.Rpc, message, cause);
        this.name = 'RpcError';
    }
}

export class ConfigError extends SwapError {
    constructor(reason: string) {
        super(ErrorCode.Config, reason);
        this.name = 'ConfigError';
    }
}

export class TransactionStageError extends SwapError {
    constructor(
        code: typeof ErrorCode.TransactionFailed | typeof ErrorCode.TimedOut,
        public readonly stage: TxState,
        reason: string,
        cause?: unknown
    ) {
        super(code, reason, cause);
        this.name = 'TransactionStageError';
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === 'string') return err;
    try {
        return JSON.stringify(err);
    } catch {
        return String(err);
    }
}
