/**
 * Route Selector
 *
 * Quotes every candidate pool concurrently against one shared deadline and
 * ranks the successes:
 *   1. amountOut, descending
 *   2. priceImpactPct, ascending
 *   3. pool address (base58), ascending
 * The order depends only on the quotes, never on completion order.
 */

import { NoRouteFoundError, errorMessage } from '../errors.js';
import { quote } from '../sim/engine.js';
import { DEADLINE, Deadline, type Raced } from './deadline.js';
import {
    FailureStage,
    PoolVariant,
    poolKey,
    type PoolState,
    type QuoteFailure,
    type QuoteOutcome,
    type QuoteResult,
    type RankedQuotes,
    type SwapRequest,
} from '../types.js';
import { logger } from '../utils/logger.js';

const log = logger.child('selector');

export type QuoteFn = (pool: PoolState, request: SwapRequest) => QuoteOutcome | Promise<QuoteOutcome>;

export interface SelectOptions {
    deadlineMs: number;
    /** Sets validUntil on the default quote function */
    poolTtlMs: number;
    quoteFn?: QuoteFn;
    /** Request-wide deadline already running; `deadlineMs` starts a new one otherwise */
    deadline?: Deadline;
}

type TaskResult = { quote: QuoteResult } | { failure: QuoteFailure };

export function compareQuotes(a: QuoteResult, b: QuoteResult): number {
    if (a.amountOut !== b.amountOut) return a.amountOut > b.amountOut ? -1 : 1;
    const impact = a.priceImpactPct.comparedTo(b.priceImpactPct);
    if (impact !== 0) return impact;
    const ka = poolKey(a.pool);
    const kb = poolKey(b.pool);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
}

async function runQuote(pool: PoolState, request: SwapRequest, quoteFn: QuoteFn): Promise<TaskResult> {
    try {
        const outcome = await quoteFn(pool, request);
        if (outcome.ok) return { quote: outcome.quote };
        const { error } = outcome;
        return {
            failure: { pool: poolKey(pool.address), variant: pool.variant, stage: FailureStage.Quote, code: error.code, reason: error.message },
        };
    } catch (err) {
        return {
            failure: { pool: poolKey(pool.address), variant: pool.variant, stage: FailureStage.Quote, code: 'Error', reason: errorMessage(err) },
        };
    }
}

/**
 * Quote and rank
 * @param priorFailures - decode failures from the registry, reported alongside
 * @throws NoRouteFoundError when no pool produced a quote
 */
export async function selectRoute(
    pools: readonly PoolState[],
    request: SwapRequest,
    options: SelectOptions,
    priorFailures: readonly QuoteFailure[] = []
): Promise<RankedQuotes> {
    const quoteFn: QuoteFn = options.quoteFn ?? ((pool, req) => quote(pool, req, options.poolTtlMs));

    const deadline = options.deadline ?? new Deadline(options.deadlineMs);

    let settled: Array<Raced<TaskResult>>;
    try {
        settled = await Promise.all(pools.map(pool => deadline.race(runQuote(pool, request, quoteFn))));
    } finally {
        if (!options.deadline) deadline.clear();
    }

    const ranked: QuoteResult[] = [];
    const failures: QuoteFailure[] = [...priorFailures];
    settled.forEach((result, i) => {
        const pool = pools[i];
        if (!pool) return;
        if (result === DEADLINE) {
            failures.push({
                pool: poolKey(pool.address),
                variant: pool.variant,
                stage: FailureStage.Deadline,
                code: 'DeadlineExceeded',
                reason: `no quote within ${deadline.ms}ms`,
            });
        } else if ('quote' in result) {
            ranked.push(result.quote);
        } else {
            failures.push(result.failure);
        }
    });

    ranked.sort(compareQuotes);
    const [best] = ranked;
    if (!best) {
        throw new NoRouteFoundError(failures);
    }

    log.debug(`${ranked.length} quote(s), ${failures.length} failure(s); best ${poolKey(best.pool)} out=${best.amountOut}`);
    return { best, ranked, failures };
}

export interface VariantSummary {
    count: number;
    best: QuoteResult | null;
}

/** Best quote and count per variant over a ranked list */
export function groupByVariant(ranked: readonly QuoteResult[]): Record<PoolVariant, VariantSummary> {
    const out: Record<PoolVariant, VariantSummary> = {
        [PoolVariant.ConstantProduct]: { count: 0, best: null },
        [PoolVariant.Stabilized]: { count: 0, best: null },
        [PoolVariant.Concentrated]: { count: 0, best: null },
    };
    for (const q of ranked) {
        const entry = out[q.variant];
        entry.count++;
        if (!entry.best || compareQuotes(q, entry.best) < 0) entry.best = q;
    }
    return out;
}
