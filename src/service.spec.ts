import test from 'node:test';
import assert from 'node:assert/strict';
import { Keypair, type PublicKey, type VersionedTransaction } from '@solana/web3.js';

import { defaultConfig } from './config.js';
import { TOKEN_PROGRAM_ID } from './decode/programs/splToken.js';
import { InvalidRequestError, NoRouteFoundError } from './errors.js';
import { deriveAta } from './execute/tokens.js';
import type { AccountData, ProgramAccountFilters } from './rpc/chainSource.js';
import type { Signer } from './rpc/signer.js';
import { CLMM_POOL, CP_POOL, STABLE_POOL, V4_POOL, seedRaydiumPools } from './testing/chainFixtures.js';
import { FakeChain } from './testing/fakeChain.js';
import { encodeTokenAccount, key, makeRequest } from './testing/fixtures.js';
import { FailureStage, NATIVE_MINT, PoolSource, TxState } from './types.js';
import { SwapService } from './service.js';
import { sleep } from './utils/sleep.js';

class TestSigner implements Signer {
    private readonly keypair = Keypair.fromSeed(new Uint8Array(32).fill(3));

    get publicKey(): PublicKey {
        return this.keypair.publicKey;
    }

    async sign(tx: VersionedTransaction): Promise<VersionedTransaction> {
        tx.sign([this.keypair]);
        return tx;
    }
}

/** Upstream that answers one kind of call late */
class SlowChain extends FakeChain {
    constructor(
        private readonly slow: 'accounts' | 'programAccounts',
        private readonly delayMs: number
    ) {
        super();
    }

    override async getAccounts(addresses: readonly PublicKey[]): Promise<(AccountData | null)[]> {
        if (this.slow === 'accounts') await sleep(this.delayMs);
        return super.getAccounts(addresses);
    }

    override async getProgramAccounts(programId: PublicKey, filters: ProgramAccountFilters): Promise<AccountData[]> {
        if (this.slow === 'programAccounts') await sleep(this.delayMs);
        return super.getProgramAccounts(programId, filters);
    }
}

function slowService(chain: SlowChain): SwapService {
    seedRaydiumPools(chain);
    return new SwapService({
        config: defaultConfig({ quoteMints: [key(2)], tickArrayRadius: 3, quoteDeadlineMs: 50 }),
        source: chain,
        clock: () => 1_000_000,
    });
}

function setup(withSigner = true) {
    const chain = new FakeChain();
    seedRaydiumPools(chain);
    const clock = { t: 1_000_000 };
    const signer = new TestSigner();
    const service = new SwapService({
        config: defaultConfig({ quoteMints: [key(2)], tickArrayRadius: 3 }),
        source: chain,
        signer: withSigner ? signer : undefined,
        clock: () => clock.t,
        sleep: async () => undefined,
    });
    return { chain, clock, signer, service };
}

// 0.001 AAA
const REQUEST = makeRequest({ amountIn: 1_000_000n });

test('service: quotes every venue for the pair, concentrated pool first', async () => {
    const { service } = setup();
    const { best, ranked, failures } = await service.getQuotes(REQUEST);

    assert.deepEqual(failures, []);
    assert.equal(best.source, PoolSource.RaydiumClmm);
    assert.ok(best.pool.equals(CLMM_POOL));
    assert.deepEqual(
        ranked.map(q => q.pool.toBase58()),
        [CLMM_POOL, CP_POOL, V4_POOL].map(k => k.toBase58())
    );
});

test('service: getQuote applies slippage to the best output', async () => {
    const { service } = setup();
    const route = await service.getQuote({ ...REQUEST, slippageBps: 100 });
    assert.equal(route.slippageBps, 100);
    assert.equal(route.minimumAmountOut, (route.quote.amountOut * 9_900n) / 10_000n);
});

test('service: repeated quotes reuse cached results for unchanged pools', async () => {
    const { service } = setup();
    await service.getQuotes(REQUEST);
    const first = service.cacheStats().quotes;
    assert.equal(first.size, 3);
    await service.getQuotes(REQUEST);
    assert.equal(service.cacheStats().quotes.hitCount, first.hitCount + 3n);
});

test('service: invalid requests are rejected before any upstream call', async () => {
    const { chain, service } = setup();
    await assert.rejects(service.getQuotes(makeRequest({ amountIn: 0n })), InvalidRequestError);
    await assert.rejects(service.getQuotes(makeRequest({ slippageBps: 1_001 })), InvalidRequestError);
    await assert.rejects(service.getQuotes(makeRequest({ outputMint: key(1) })), InvalidRequestError);
    assert.equal(chain.calls.getProgramAccounts, 0);
    assert.equal(chain.calls.getAccounts, 0);
});

test('service: a pair with no pools is no route', async () => {
    const { service } = setup();
    await assert.rejects(
        service.getQuotes(makeRequest({ outputMint: key(9) })),
        (err: unknown) => err instanceof NoRouteFoundError && /no pools found/.test(err.message)
    );
});

test('service: pool listings summarize each venue', async () => {
    const { service } = setup();
    const pair = await service.listPools(key(1), key(2));
    assert.equal(pair.length, 3);
    const stable = await service.findPoolsForToken(key(3));
    assert.deepEqual(stable.map(s => s.address), [STABLE_POOL.toBase58()]);
    assert.equal(stable[0]?.source, PoolSource.RaydiumStable);
});

test('service: executeSwap confirms through the best pool', async () => {
    const { chain, signer, service } = setup();
    chain.simulate = () => ({
        err: null,
        logs: [],
        accounts: [encodeTokenAccount(key(2), signer.publicKey, 10n ** 12n)],
    });

    const report = await service.executeSwap(REQUEST, 75);

    assert.equal(report.status, TxState.Confirmed);
    assert.equal(report.route.slippageBps, 75);
    assert.ok(report.route.quote.pool.equals(CLMM_POOL));
    assert.equal(report.signature, 'sig-1');
    assert.equal(chain.calls.sendTransaction, 1);
});

test('service: a swap short of the minimum in simulation is reported, not sent', async () => {
    const { chain, service } = setup();
    const report = await service.executeSwap(REQUEST);
    // default simulation credits nothing
    assert.equal(report.status, TxState.SimulationFailed);
    assert.equal(chain.calls.sendTransaction, 0);
});

test('service: executeSwap without a signer is an invalid request', async () => {
    const { service } = setup(false);
    await assert.rejects(service.executeSwap(REQUEST), /needs a signer/);
});

test('service: the quote deadline bounds a slow pool load', async () => {
    const service = slowService(new SlowChain('accounts', 400));
    const started = Date.now();

    await assert.rejects(service.getQuotes(REQUEST), (err: unknown) => {
        assert.ok(err instanceof NoRouteFoundError);
        assert.equal(err.failures.length, 3);
        assert.ok(err.failures.every(f => f.stage === FailureStage.Deadline));
        return true;
    });
    assert.ok(Date.now() - started < 200);

    // the load finishes in the background (two 400ms batches) and fills the pool cache
    await sleep(1_000);
    const { ranked, failures } = await service.getQuotes(REQUEST);
    assert.equal(ranked.length, 3);
    assert.deepEqual(failures, []);
});

test('service: discovery slower than the deadline is no route', async () => {
    const service = slowService(new SlowChain('programAccounts', 300));
    await assert.rejects(service.getQuotes(REQUEST), (err: unknown) => {
        assert.ok(err instanceof NoRouteFoundError);
        assert.equal(err.failures.length, 1);
        assert.equal(err.failures[0]?.stage, FailureStage.Deadline);
        assert.equal(err.failures[0]?.pool, `${key(1).toBase58()}/${key(2).toBase58()}`);
        return true;
    });
});

test('service: wrapSol moves lamports into the signer\'s wSOL account', async () => {
    const { chain, signer, service } = setup();
    const wsol = deriveAta(signer.publicKey, NATIVE_MINT);
    chain.simulate = () => ({ err: null, logs: [], accounts: [encodeTokenAccount(NATIVE_MINT, signer.publicKey, 2_000_000n)] });

    const report = await service.wrapSol(2_000_000n);

    assert.equal(report.kind, 'wrap');
    assert.ok(report.account.equals(wsol));
    assert.equal(report.status, TxState.Confirmed);
    assert.equal(report.simulatedAmount, 2_000_000n);
    assert.equal(chain.calls.sendTransaction, 1);
});

test('service: wrapSol rejects amounts outside 1..u64 and a missing signer', async () => {
    const { chain, service } = setup();
    await assert.rejects(service.wrapSol(0n), InvalidRequestError);
    await assert.rejects(service.wrapSol(1n << 64n), InvalidRequestError);
    assert.equal(chain.calls.getLatestBlockhash, 0);
    await assert.rejects(setup(false).service.wrapSol(1_000n), /wrapSol needs a signer/);
});

test('service: unwrapSol closes the whole wSOL balance', async () => {
    const { chain, signer, service } = setup();
    const wsol = deriveAta(signer.publicKey, NATIVE_MINT);
    chain.setAccount(wsol, { owner: TOKEN_PROGRAM_ID, data: encodeTokenAccount(NATIVE_MINT, signer.publicKey, 3_500n) });

    const report = await service.unwrapSol();

    assert.equal(report.kind, 'unwrap');
    assert.equal(report.amount, 3_500n);
    assert.equal(report.status, TxState.Confirmed);
    assert.equal(chain.calls.sendTransaction, 1);
});

test('service: unwrapSol with no wSOL is an invalid request', async () => {
    const { chain, signer, service } = setup();
    await assert.rejects(service.unwrapSol(), /no wSOL to unwrap/);

    chain.setAccount(deriveAta(signer.publicKey, NATIVE_MINT), {
        owner: TOKEN_PROGRAM_ID,
        data: encodeTokenAccount(NATIVE_MINT, signer.publicKey, 0n),
    });
    await assert.rejects(service.unwrapSol(), InvalidRequestError);
    assert.equal(chain.calls.sendTransaction, 0);
    await assert.rejects(setup(false).service.unwrapSol(), /unwrapSol needs a signer/);
});
