/**
 * Shared upstream concurrency limiter
 *
 * Every RPC call issued by the registry, token registry, lookup-table cache
 * and submitter passes through one instance. At most `maxConcurrent` calls
 * run at once; the rest wait FIFO. A rate-limited response doubles the
 * hand-off delay (base..max) until a call succeeds again.
 *
 * A call given a timeout rejects its caller when the timer fires, but its
 * slot stays taken until the underlying request settles.
 */

import { isRateLimitError } from './classify.js';
import { logger } from '../utils/logger.js';

const log = logger.child('limiter');

export interface LimiterBackoff {
    baseMs: number;
    maxMs: number;
}

export interface LimiterTimeout {
    ms: number;
    error: () => Error;
}

export interface LimiterStats {
    active: number;
    queued: number;
    peakActive: number;
    completed: number;
    rateLimited: number;
    backoffMs: number;
}

export class ConcurrencyLimiter {
    private active = 0;
    private peakActive = 0;
    private completed = 0;
    private rateLimitedCount = 0;
    private currentBackoffMs = 0;
    private readonly waiters: Array<() => void> = [];

    constructor(
        private readonly maxConcurrent: number,
        private readonly backoff: LimiterBackoff = { baseMs: 500, maxMs: 8_000 }
    ) {
        if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
            throw new RangeError(`maxConcurrent must be a positive integer (got ${maxConcurrent})`);
        }
    }

    async run<T>(task: () => Promise<T>, timeout?: LimiterTimeout): Promise<T> {
        await this.acquire();
        const held = this.hold(task);
        return timeout ? raceTimeout(held, timeout) : held;
    }

    stats(): LimiterStats {
        return {
            active: this.active,
            queued: this.waiters.length,
            peakActive: this.peakActive,
            completed: this.completed,
            rateLimited: this.rateLimitedCount,
            backoffMs: this.currentBackoffMs,
        };
    }

    // ========================================================================
    // PRIVATE
    // ========================================================================

    /** Runs `task` in the acquired slot and releases it once the task settles */
    private async hold<T>(task: () => Promise<T>): Promise<T> {
        try {
            const result = await task();
            this.clearBackoff();
            return result;
        } catch (err) {
            if (isRateLimitError(err)) {
                this.applyBackoff();
            }
            throw err;
        } finally {
            this.completed++;
            this.release();
        }
    }

    private acquire(): Promise<void> {
        if (this.active < this.maxConcurrent && this.waiters.length === 0) {
            this.occupy();
            return Promise.resolve();
        }
        // The releasing call hands its slot straight to the waiter
        return new Promise<void>(resolve => {
            this.waiters.push(resolve);
        });
    }

    private occupy(): void {
        this.active++;
        if (this.active > this.peakActive) this.peakActive = this.active;
    }

    private release(): void {
        const next = this.waiters.shift();
        if (!next) {
            this.active--;
            return;
        }
        if (this.currentBackoffMs > 0) {
            setTimeout(next, this.currentBackoffMs);
        } else {
            next();
        }
    }

    private applyBackoff(): void {
        this.currentBackoffMs = this.currentBackoffMs === 0
            ? this.backoff.baseMs
            : Math.min(this.currentBackoffMs * 2, this.backoff.maxMs);
        this.rateLimitedCount++;
        log.info(`Rate limited, backing off for ${this.currentBackoffMs}ms`);
    }

    private clearBackoff(): void {
        this.currentBackoffMs = 0;
    }
}

function raceTimeout<T>(work: Promise<T>, timeout: LimiterTimeout): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(timeout.error()), timeout.ms);
    });
    return Promise.race([work, expired]).finally(() => clearTimeout(timer));
}
