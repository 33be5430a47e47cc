import test from 'node:test';
import assert from 'node:assert/strict';
import { Keypair, type PublicKey, type VersionedTransaction } from '@solana/web3.js';

import { TransactionTooLargeError } from '../errors.js';
import type { Signer } from '../rpc/signer.js';
import { quote } from '../sim/engine.js';
import { FakeChain } from '../testing/fakeChain.js';
import { encodeTokenAccount, key, makeCpPool, makeRequest } from '../testing/fixtures.js';
import { NATIVE_MINT, TxState, type Route } from '../types.js';
import { buildSwapTransaction, buildUnwrapTransaction, buildWrapTransaction, minimumAmountOut } from './builder.js';
import { SwapSubmitter, type BuildFn } from './submit.js';
import { deriveAta } from './tokens.js';

class CountingSigner implements Signer {
    signed = 0;
    private readonly keypair = Keypair.fromSeed(new Uint8Array(32).fill(9));

    get publicKey(): PublicKey {
        return this.keypair.publicKey;
    }

    async sign(tx: VersionedTransaction): Promise<VersionedTransaction> {
        this.signed++;
        tx.sign([this.keypair]);
        return tx;
    }
}

function setup() {
    const chain = new FakeChain();
    const signer = new CountingSigner();
    const clock = { t: 0 };
    const delays: number[] = [];
    const submitter = new SwapSubmitter(chain, signer, {
        retry: { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 250 },
        confirmIntervalMs: 1_000,
        confirmTimeoutMs: 5_000,
        clock: () => clock.t,
        sleep: async ms => {
            delays.push(ms);
            clock.t += ms;
        },
    });

    const pool = makeCpPool();
    const outcome = quote(pool, makeRequest(), 30_000);
    assert.ok(outcome.ok);
    if (!outcome.ok) throw new Error('unreachable');
    // 1992 out, 1982 minimum at 50 bps
    const route: Route = { quote: outcome.quote, slippageBps: 50, minimumAmountOut: minimumAmountOut(outcome.quote.amountOut, 50) };
    const options = { computeUnitLimit: 200_000, priorityFeeMicroLamports: 0, lookupTables: [] };
    const build: BuildFn = blockhash => buildSwapTransaction(route, pool, signer.publicKey, blockhash.blockhash, options);
    const destination = deriveAta(signer.publicKey, key(2));

    /** Simulation credits `amount` on top of `pre` */
    const credit = (amount: bigint, pre = 0n) => {
        chain.simulate = () => ({
            err: null,
            logs: [],
            accounts: [encodeTokenAccount(key(2), signer.publicKey, pre + amount)],
        });
    };
    return { chain, signer, clock, delays, submitter, route, build, destination, credit };
}

test('submit: output below the minimum in simulation is never signed or sent', async () => {
    const { chain, signer, submitter, route, build, credit } = setup();
    credit(1_981n);

    const report = await submitter.execute(route, build);

    assert.equal(report.status, TxState.SimulationFailed);
    assert.deepEqual(report.transitions, [TxState.Built, TxState.SimulationFailed]);
    assert.equal(report.error?.code, 'SimulationFailed');
    assert.equal(report.error?.stage, TxState.Simulated);
    assert.equal(report.expectedAmountOut, 1_992n);
    assert.equal(chain.calls.sendTransaction, 0);
    assert.equal(signer.signed, 0);
    assert.equal(report.attempts, 0);
});

test('submit: a program error in simulation aborts the swap', async () => {
    const { chain, submitter, route, build } = setup();
    chain.simulate = () => ({ err: '{"InstructionError":[2,{"Custom":30}]}', logs: ['Program log: slippage'], accounts: [] });
    const report = await submitter.execute(route, build);
    assert.equal(report.status, TxState.SimulationFailed);
    assert.match(report.error?.reason ?? '', /InstructionError/);
    assert.equal(chain.calls.sendTransaction, 0);
});

test('submit: a confirmed swap reports simulated and actual output', async () => {
    const { chain, clock, submitter, route, build, credit, destination } = setup();
    chain.setAccount(destination, { owner: key(99), data: encodeTokenAccount(key(2), key(90), 500n) });
    credit(1_992n, 500n);
    chain.statusResults = [null, { slot: 5, confirmation: 'confirmed', err: null }];
    chain.balanceChange = 1_990n;

    const report = await submitter.execute(route, build);

    assert.equal(report.status, TxState.Confirmed);
    assert.deepEqual(report.transitions, [TxState.Built, TxState.Simulated, TxState.Submitted, TxState.Confirmed]);
    assert.equal(report.signature, 'sig-1');
    assert.equal(report.format, 'legacy');
    assert.equal(report.attempts, 1);
    assert.equal(report.simulatedAmountOut, 1_992n);
    assert.equal(report.actualAmountOut, 1_990n);
    // 0.00199 BBB per 0.000001 AAA
    assert.equal(report.actualPrice?.toString(), '1990');
    assert.equal(report.realizedSlippageBps, 10.04);
    assert.equal(report.confirmationTimeMs, 1_000);
    assert.equal(clock.t, 1_000);
    assert.equal(report.error, undefined);
});

test('submit: transient send errors back off base, 2·base, then the cap', async () => {
    const { chain, delays, submitter, route, build, credit } = setup();
    credit(1_992n);
    const unavailable = new Error('503 Service Unavailable');
    chain.sendResults = [unavailable, unavailable, unavailable, 'sig-ok'];

    const report = await submitter.execute(route, build);

    assert.equal(report.status, TxState.Confirmed);
    assert.equal(report.signature, 'sig-ok');
    assert.equal(report.attempts, 4);
    assert.deepEqual(delays, [100, 200, 250]);
});

test('submit: a non-transient send error fails without retry', async () => {
    const { chain, delays, submitter, route, build, credit } = setup();
    credit(1_992n);
    chain.sendResults = [new Error('Transaction simulation failed: custom program error: 0x1')];

    const report = await submitter.execute(route, build);

    assert.equal(report.status, TxState.Failed);
    assert.deepEqual(report.transitions, [TxState.Built, TxState.Simulated, TxState.Failed]);
    assert.equal(report.error?.code, 'Failed');
    assert.equal(report.error?.stage, TxState.Submitted);
    assert.equal(chain.calls.sendTransaction, 1);
    assert.deepEqual(delays, []);
});

test('submit: exhausting the retry budget times out', async () => {
    const { chain, delays, submitter, route, build, credit } = setup();
    credit(1_992n);
    chain.sendResults = [new Error('429 Too Many Requests')];

    const report = await submitter.execute(route, build);

    assert.equal(report.status, TxState.TimedOut);
    assert.equal(report.error?.code, 'TimedOut');
    assert.equal(report.attempts, 4);
    assert.equal(chain.calls.sendTransaction, 4);
    assert.deepEqual(delays, [100, 200, 250]);
});

test('submit: an expired blockhash rebuilds and re-signs before resending', async () => {
    const { chain, signer, submitter, route, build, credit } = setup();
    credit(1_992n);
    chain.sendResults = [new Error('Blockhash not found'), 'sig-2'];

    const report = await submitter.execute(route, build);

    assert.equal(report.status, TxState.Confirmed);
    assert.equal(report.signature, 'sig-2');
    assert.equal(chain.calls.getLatestBlockhash, 2);
    assert.equal(signer.signed, 2);
    assert.equal(chain.calls.sendTransaction, 2);
});

test('submit: no confirmation within the timeout is TimedOut', async () => {
    const { chain, submitter, route, build, credit } = setup();
    credit(1_992n);
    chain.statusResults = [null];

    const report = await submitter.execute(route, build);

    assert.equal(report.status, TxState.TimedOut);
    assert.deepEqual(report.transitions, [TxState.Built, TxState.Simulated, TxState.Submitted, TxState.TimedOut]);
    assert.equal(report.error?.stage, TxState.Confirmed);
    // polls at 0, 1000, ... 5000
    assert.equal(chain.calls.getSignatureStatus, 6);
    assert.equal(report.signature, 'sig-1');
});

test('submit: an on-chain error is Failed at confirmation', async () => {
    const { chain, submitter, route, build, credit } = setup();
    credit(1_992n);
    chain.statusResults = [{ slot: 7, confirmation: 'confirmed', err: '{"InstructionError":[2,{"Custom":6005}]}' }];

    const report = await submitter.execute(route, build);

    assert.equal(report.status, TxState.Failed);
    assert.equal(report.error?.stage, TxState.Confirmed);
    assert.equal(report.actualAmountOut, undefined);
});

test('submit: polling errors draw on the same retry budget as sends', async () => {
    const { chain, delays, submitter, route, build, credit } = setup();
    credit(1_992n);
    const reset = new Error('read ECONNRESET');
    chain.sendResults = [reset, reset, 'sig-3'];
    chain.statusResults = [reset, reset, { slot: 1, confirmation: 'confirmed', err: null }];

    const report = await submitter.execute(route, build);

    assert.equal(report.status, TxState.TimedOut);
    assert.equal(report.error?.stage, TxState.Confirmed);
    assert.deepEqual(delays, [100, 200, 250]);
    assert.equal(submitter.stats().timedOut, 1n);
});

test('submit: a transaction over the size limit fails at build', async () => {
    const { chain, submitter, route } = setup();
    const report = await submitter.execute(route, () => {
        throw new TransactionTooLargeError(1_400, 1_232);
    });
    assert.equal(report.status, TxState.Failed);
    assert.deepEqual(report.transitions, [TxState.Failed]);
    assert.equal(report.error?.code, 'TransactionTooLarge');
    assert.equal(report.error?.stage, TxState.Built);
    assert.equal(chain.calls.simulateTransaction, 0);
});

test('submit: wrapping SOL confirms once simulation credits the wSOL account', async () => {
    const { chain, signer, submitter } = setup();
    const wsol = deriveAta(signer.publicKey, NATIVE_MINT);
    chain.simulate = () => ({ err: null, logs: [], accounts: [encodeTokenAccount(NATIVE_MINT, signer.publicKey, 5_000n)] });
    const options = { computeUnitLimit: 200_000, priorityFeeMicroLamports: 0, lookupTables: [] };

    const report = await submitter.executeWrap('wrap', wsol, 5_000n, blockhash =>
        buildWrapTransaction(signer.publicKey, 5_000n, blockhash.blockhash, options)
    );

    assert.equal(report.kind, 'wrap');
    assert.ok(report.account.equals(wsol));
    assert.equal(report.amount, 5_000n);
    assert.equal(report.status, TxState.Confirmed);
    assert.deepEqual(report.transitions, [TxState.Built, TxState.Simulated, TxState.Submitted, TxState.Confirmed]);
    assert.equal(report.simulatedAmount, 5_000n);
    assert.equal(report.signature, 'sig-1');
    assert.equal(chain.calls.getTransactionBalanceChange, 0);
    assert.equal(submitter.stats().confirmed, 1n);
});

test('submit: a wrap the simulation under-credits is never sent', async () => {
    const { chain, signer, submitter } = setup();
    const wsol = deriveAta(signer.publicKey, NATIVE_MINT);
    chain.simulate = () => ({ err: null, logs: [], accounts: [encodeTokenAccount(NATIVE_MINT, signer.publicKey, 4_999n)] });
    const options = { computeUnitLimit: 200_000, priorityFeeMicroLamports: 0, lookupTables: [] };

    const report = await submitter.executeWrap('wrap', wsol, 5_000n, blockhash =>
        buildWrapTransaction(signer.publicKey, 5_000n, blockhash.blockhash, options)
    );

    assert.equal(report.status, TxState.SimulationFailed);
    assert.equal(report.error?.stage, TxState.Simulated);
    assert.equal(chain.calls.sendTransaction, 0);
    assert.equal(signer.signed, 0);
});

test('submit: unwrapping only checks simulation for a program error', async () => {
    const { chain, signer, submitter } = setup();
    const wsol = deriveAta(signer.publicKey, NATIVE_MINT);
    const watched: number[] = [];
    chain.simulate = (_tx, watch) => {
        watched.push(watch.length);
        return { err: null, logs: [], accounts: [] };
    };
    const options = { computeUnitLimit: 200_000, priorityFeeMicroLamports: 0, lookupTables: [] };

    const report = await submitter.executeWrap('unwrap', wsol, 7_000n, blockhash =>
        buildUnwrapTransaction(signer.publicKey, blockhash.blockhash, options)
    );

    assert.equal(report.kind, 'unwrap');
    assert.equal(report.status, TxState.Confirmed);
    assert.equal(report.simulatedAmount, undefined);
    assert.deepEqual(watched, [0]);
    assert.equal(chain.calls.getAccounts, 0);
    assert.equal(chain.calls.sendTransaction, 1);
});
