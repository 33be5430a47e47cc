/**
 * Upstream error classifier
 *
 * Decides whether a failed RPC call or transaction may be retried. Matching
 * is on the lower-cased message text since web3.js surfaces most failures
 * as plain Errors.
 */

import { RpcError, errorMessage } from '../errors.js';

export const ErrorClass = {
    RateLimited: 'RateLimited',
    Network: 'Network',
    BlockhashExpired: 'BlockhashExpired',
    Slippage: 'Slippage',
    InsufficientFunds: 'InsufficientFunds',
    ProgramError: 'ProgramError',
    Unknown: 'Unknown',
} as const;

export type ErrorClass = (typeof ErrorClass)[keyof typeof ErrorClass];

export interface ClassifiedError {
    class: ErrorClass;
    transient: boolean;
    message: string;
}

const TRANSIENT: ReadonlySet<ErrorClass> = new Set<ErrorClass>([
    ErrorClass.RateLimited,
    ErrorClass.Network,
    ErrorClass.BlockhashExpired,
]);

const RATE_LIMIT_PATTERNS = ['429', 'too many requests', 'rate limit'];
const NETWORK_PATTERNS = [
    'timeout',
    'timed out',
    'econnreset',
    'econnrefused',
    'socket hang up',
    'connection',
    'fetch failed',
    '502',
    '503',
    '504',
    'node is behind',
    'service unavailable',
];
const BLOCKHASH_PATTERNS = ['blockhash not found', 'block height exceeded'];
const SLIPPAGE_PATTERNS = ['slippage', 'exceeds desired slippage', 'amount out below minimum', 'too little output'];
const FUNDS_PATTERNS = ['insufficient funds', 'insufficient lamports', 'attempt to debit an account but found no record'];
const PROGRAM_PATTERNS = ['custom program error', 'instructionerror', 'program failed', 'invalid account data'];

function matches(msg: string, patterns: readonly string[]): boolean {
    return patterns.some(p => msg.includes(p));
}

export function classifyMessage(message: string): ClassifiedError {
    const msg = message.toLowerCase();
    let cls: ErrorClass = ErrorClass.Unknown;

    // Terminal causes first: an on-chain rejection message may also mention a timeout
    if (matches(msg, SLIPPAGE_PATTERNS)) cls = ErrorClass.Slippage;
    else if (matches(msg, FUNDS_PATTERNS)) cls = ErrorClass.InsufficientFunds;
    else if (matches(msg, PROGRAM_PATTERNS)) cls = ErrorClass.ProgramError;
    else if (matches(msg, RATE_LIMIT_PATTERNS)) cls = ErrorClass.RateLimited;
    else if (matches(msg, BLOCKHASH_PATTERNS)) cls = ErrorClass.BlockhashExpired;
    else if (matches(msg, NETWORK_PATTERNS)) cls = ErrorClass.Network;

    return { class: cls, transient: TRANSIENT.has(cls), message };
}

export function classifyError(err: unknown): ClassifiedError {
    if (err instanceof RpcError) {
        const classified = classifyMessage(err.message);
        return { ...classified, transient: err.transient };
    }
    return classifyMessage(errorMessage(err));
}

export function isTransientError(err: unknown): boolean {
    return classifyError(err).transient;
}

export function isRateLimitError(err: unknown): boolean {
    return classifyError(err).class === ErrorClass.RateLimited;
}
