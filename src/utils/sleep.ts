export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/** Exponential backoff: base, 2*base, 4*base ... capped at max. attempt starts at 1. */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
    if (attempt < 1) return 0;
    return Math.min(baseMs * Math.pow(2, attempt - 1), maxMs);
}
