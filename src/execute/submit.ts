/**
 * Swap submitter
 *
 * Drives one swap through Built → Simulated → Submitted → Confirmed, ending
 * in Confirmed, Failed, TimedOut or SimulationFailed. Nothing is signed or
 * sent unless simulation credits at least minimumAmountOut. SOL wrap and
 * unwrap transactions take the same path and report in their own shape.
 *
 * Transient upstream errors (see rpc/classify.ts) are retried with
 * exponential backoff. Sends and status polls share one retry budget.
 */

import type { PublicKey } from '@solana/web3.js';
import { systemClock, type Clock } from '../cache/types.js';
import type { RetryConfig } from '../config.js';
import { decodeTokenAmount } from '../decode/programs/splToken.js';
import {
    ErrorCode,
    SimulationFailedError,
    SwapError,
    TransactionStageError,
    errorMessage,
} from '../errors.js';
import type { BlockhashInfo, ChainDataSource } from '../rpc/chainSource.js';
import { ErrorClass, classifyError } from '../rpc/classify.js';
import type { Signer } from '../rpc/signer.js';
import { shortfallBps, unitPrice } from '../sim/math/pricing.js';
import {
    TxState,
    type Route,
    type TerminalTxState,
    type TransactionReport,
    type TxFailure,
    type TxFormat,
    type WrapKind,
    type WrapReport,
} from '../types.js';
import { logger, short } from '../utils/logger.js';
import { backoffDelay, sleep } from '../utils/sleep.js';
import type { BuiltSwap } from './builder.js';

const log = logger.child('submit');

/** Builds the transaction against a given blockhash; called again when it expires */
export type BuildFn = (blockhash: BlockhashInfo) => BuiltSwap;

export interface SubmitterOptions {
    retry: RetryConfig;
    confirmIntervalMs: number;
    confirmTimeoutMs: number;
    clock?: Clock;
    sleep?: (ms: number) => Promise<void>;
}

export interface SubmitterStats {
    executions: bigint;
    sent: bigint;
    retries: bigint;
    confirmed: bigint;
    failed: bigint;
    timedOut: bigint;
    simulationFailed: bigint;
}

/** Mutable progress of one execution */
class Progress {
    readonly transitions: TxState[] = [];
    format: TxFormat = 'legacy';
    attempts = 0;
    retries = 0;
    signature?: string;
    simulatedAmountOut?: bigint;
    /** Stage being attempted */
    stage: TxState = TxState.Built;

    enter(state: TxState): void {
        this.transitions.push(state);
    }
}

/** Where one run through the stages ended */
interface RunOutcome {
    progress: Progress;
    status: TerminalTxState;
    built?: BuiltSwap;
    confirmationTimeMs?: number;
    error?: TxFailure;
}

function terminalFor(err: unknown): { status: TerminalTxState; code: string } {
    if (err instanceof SimulationFailedError) return { status: TxState.SimulationFailed, code: err.code };
    if (err instanceof TransactionStageError && err.code === ErrorCode.TimedOut) {
        return { status: TxState.TimedOut, code: err.code };
    }
    if (err instanceof SwapError) return { status: TxState.Failed, code: err.code };
    return { status: TxState.Failed, code: ErrorCode.TransactionFailed };
}

export class SwapSubmitter {
    private readonly clock: Clock;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly counters: SubmitterStats = {
        executions: 0n,
        sent: 0n,
        retries: 0n,
        confirmed: 0n,
        failed: 0n,
        timedOut: 0n,
        simulationFailed: 0n,
    };

    constructor(
        private readonly source: ChainDataSource,
        private readonly signer: Signer,
        private readonly options: SubmitterOptions
    ) {
        this.clock = options.clock ?? systemClock;
        this.sleep = options.sleep ?? sleep;
    }

    /**
     * Run the swap to a terminal state. Stage failures become the report's
     * status and error; nothing is thrown for them.
     */
    async execute(route: Route, build: BuildFn): Promise<TransactionReport> {
        const { progress, status, built, confirmationTimeMs, error } = await this.run('swap', build);
        const { signature } = progress;
        const actualAmountOut =
            status === TxState.Confirmed && built && !built.unwrapsOutput && signature
                ? await this.actualOutput(route, signature)
                : null;
        return this.report(route, progress, status, { actualAmountOut, confirmationTimeMs, error });
    }

    /** Wrap `amount` lamports into, or unwrap `amount` out of, `account` */
    async executeWrap(kind: WrapKind, account: PublicKey, amount: bigint, build: BuildFn): Promise<WrapReport> {
        const { progress, status, confirmationTimeMs, error } = await this.run(kind, build);
        return Object.freeze({
            kind,
            account,
            amount,
            status,
            transitions: Object.freeze([...progress.transitions]),
            format: progress.format,
            signature: progress.signature,
            simulatedAmount: progress.simulatedAmountOut,
            attempts: progress.attempts,
            confirmationTimeMs,
            error,
        });
    }

    stats(): Readonly<SubmitterStats> {
        return { ...this.counters };
    }

    // ========================================================================
    // STAGES
    // ========================================================================

    /**
     * One transaction to a terminal state. Stage failures become the
     * outcome's status and error; nothing is thrown for them.
     */
    private async run(label: string, build: BuildFn): Promise<RunOutcome> {
        this.counters.executions++;
        const progress = new Progress();
        let built: BuiltSwap | undefined;
        try {
            const blockhash = await this.withRetry(progress, () => this.source.getLatestBlockhash());
            built = build(blockhash);
            progress.format = built.format;
            progress.enter(TxState.Built);

            progress.stage = TxState.Simulated;
            progress.simulatedAmountOut = await this.simulate(progress, built);
            progress.enter(TxState.Simulated);

            progress.stage = TxState.Submitted;
            const signature = await this.send(progress, built, build);
            progress.signature = signature;
            const submittedAt = this.clock();
            progress.enter(TxState.Submitted);
            log.info(`submitted ${short(signature)} (${progress.format}, attempt ${progress.attempts})`);

            progress.stage = TxState.Confirmed;
            await this.confirm(progress, signature);
            progress.enter(TxState.Confirmed);
            this.counters.confirmed++;

            const confirmationTimeMs = this.clock() - submittedAt;
            log.info(`confirmed ${short(signature)} in ${confirmationTimeMs}ms`);
            return { progress, status: TxState.Confirmed, built, confirmationTimeMs };
        } catch (err) {
            const { status, code } = terminalFor(err);
            progress.enter(status);
            this.countFailure(status);
            const error: TxFailure = { code, stage: progress.stage, reason: errorMessage(err) };
            log.warn(`${label} ${status} at ${error.stage}: ${error.reason}`);
            return { progress, status, built, error };
        }
    }

    /**
     * Simulated credit to the destination account
     * @returns undefined when the output is unwrapped to SOL in the same transaction
     * @throws SimulationFailedError on a program error or output below the minimum
     */
    private async simulate(progress: Progress, built: BuiltSwap): Promise<bigint | undefined> {
        if (built.unwrapsOutput) {
            const outcome = await this.withRetry(progress, () => this.source.simulateTransaction(built.transaction, []));
            if (outcome.err !== null) {
                throw new SimulationFailedError(`simulation failed: ${outcome.err}`, outcome.logs);
            }
            return undefined;
        }

        const pre = await this.withRetry(progress, () => this.tokenBalance(built.destination));
        const outcome = await this.withRetry(progress, () =>
            this.source.simulateTransaction(built.transaction, [built.destination])
        );
        if (outcome.err !== null) {
            throw new SimulationFailedError(`simulation failed: ${outcome.err}`, outcome.logs);
        }
        const postData = outcome.accounts[0];
        const post = postData ? decodeTokenAmount(postData, built.destination.toBase58()) : 0n;
        const credited = post - pre;
        if (credited < built.minimumAmountOut) {
            throw new SimulationFailedError(
                `simulated output ${credited} below minimum ${built.minimumAmountOut}`,
                outcome.logs
            );
        }
        log.debug(`simulated output ${credited} (min ${built.minimumAmountOut})`);
        return credited;
    }

    private async send(progress: Progress, built: BuiltSwap, build: BuildFn): Promise<string> {
        let current = await this.signer.sign(built.transaction);
        return this.withRetry(
            progress,
            () => {
                progress.attempts++;
                this.counters.sent++;
                return this.source.sendTransaction(current);
            },
            async err => {
                if (classifyError(err).class !== ErrorClass.BlockhashExpired) return;
                const blockhash = await this.withRetry(progress, () => this.source.getLatestBlockhash());
                const rebuilt = build(blockhash);
                progress.format = rebuilt.format;
                current = await this.signer.sign(rebuilt.transaction);
            }
        );
    }

    private async confirm(progress: Progress, signature: string): Promise<void> {
        const started = this.clock();
        for (;;) {
            const status = await this.withRetry(progress, () => this.source.getSignatureStatus(signature));
            if (status?.err) {
                throw new TransactionStageError(ErrorCode.TransactionFailed, TxState.Confirmed, `transaction failed on chain: ${status.err}`);
            }
            if (status?.confirmation === 'confirmed' || status?.confirmation === 'finalized') {
                return;
            }
            const elapsed = this.clock() - started;
            if (elapsed >= this.options.confirmTimeoutMs) {
                throw new TransactionStageError(
                    ErrorCode.TimedOut,
                    TxState.Confirmed,
                    `${short(signature)} not confirmed within ${this.options.confirmTimeoutMs}ms`
                );
            }
            await this.sleep(this.options.confirmIntervalMs);
        }
    }

    private async actualOutput(route: Route, signature: string): Promise<bigint | null> {
        if (!this.source.getTransactionBalanceChange) return null;
        try {
            return await this.source.getTransactionBalanceChange(signature, this.signer.publicKey, route.quote.outputToken.mint);
        } catch (err) {
            log.warn(`balance change for ${short(signature)} unavailable: ${errorMessage(err)}`);
            return null;
        }
    }

    // ========================================================================
    // PRIVATE
    // ========================================================================

    private async tokenBalance(address: PublicKey): Promise<bigint> {
        const [account] = await this.source.getAccounts([address]);
        return account ? decodeTokenAmount(account.data, address.toBase58()) : 0n;
    }

    /**
     * Run `fn`, retrying transient failures with backoff.
     * Non-transient → Failed; retry budget exhausted → TimedOut.
     */
    private async withRetry<T>(
        progress: Progress,
        fn: () => Promise<T>,
        beforeRetry?: (err: unknown) => Promise<void>
    ): Promise<T> {
        const { maxRetries, baseDelayMs, maxDelayMs } = this.options.retry;
        for (;;) {
            try {
                return await fn();
            } catch (err) {
                const classified = classifyError(err);
                if (!classified.transient) {
                    throw new TransactionStageError(ErrorCode.TransactionFailed, progress.stage, classified.message, err);
                }
                if (progress.retries >= maxRetries) {
                    throw new TransactionStageError(
                        ErrorCode.TimedOut,
                        progress.stage,
                        `gave up after ${progress.retries} retries: ${classified.message}`,
                        err
                    );
                }
                progress.retries++;
                this.counters.retries++;
                const delay = backoffDelay(progress.retries, baseDelayMs, maxDelayMs);
                log.warn(`${progress.stage}: ${classified.class} (${classified.message}), retry ${progress.retries}/${maxRetries} in ${delay}ms`);
                await this.sleep(delay);
                if (beforeRetry) await beforeRetry(err);
            }
        }
    }

    private countFailure(status: TerminalTxState): void {
        if (status === TxState.TimedOut) this.counters.timedOut++;
        else if (status === TxState.SimulationFailed) this.counters.simulationFailed++;
        else this.counters.failed++;
    }

    private report(
        route: Route,
        progress: Progress,
        status: TerminalTxState,
        extra: { actualAmountOut?: bigint | null; confirmationTimeMs?: number; error?: TxFailure }
    ): TransactionReport {
        const { quote } = route;
        const actual = extra.actualAmountOut ?? undefined;
        return Object.freeze({
            route,
            status,
            transitions: Object.freeze([...progress.transitions]),
            format: progress.format,
            signature: progress.signature,
            expectedAmountOut: quote.amountOut,
            simulatedAmountOut: progress.simulatedAmountOut,
            actualAmountOut: actual,
            expectedPrice: quote.effectivePrice,
            actualPrice:
                actual === undefined
                    ? undefined
                    : unitPrice(actual, quote.outputToken.decimals, quote.amountIn, quote.inputToken.decimals),
            realizedSlippageBps: actual === undefined ? undefined : shortfallBps(quote.amountOut, actual),
            attempts: progress.attempts,
            confirmationTimeMs: extra.confirmationTimeMs,
            error: extra.error,
        });
    }
}
