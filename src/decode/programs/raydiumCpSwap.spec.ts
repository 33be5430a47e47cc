import test from 'node:test';
import assert from 'node:assert/strict';

import { DecodeError } from '../../errors.js';
import { encodeCpSwapConfig, encodeCpSwapPool, key } from '../../testing/fixtures.js';
import { cpSwapReserves, decodeCpSwapAmmConfig, decodeRaydiumCpSwapPool } from './raydiumCpSwap.js';

test('raydiumCpSwap: decodes keys, decimals and fee counters', () => {
    const pool = decodeRaydiumCpSwapPool(encodeCpSwapPool({ protocolFees0: 5n, fundFees1: 3n, mint0Decimals: 9, mint1Decimals: 6 }));

    assert.ok(pool.ammConfig.equals(key(30)));
    assert.ok(pool.token0Vault.equals(key(31)));
    assert.ok(pool.token1Vault.equals(key(32)));
    assert.ok(pool.token0Mint.equals(key(1)));
    assert.ok(pool.token1Mint.equals(key(2)));
    assert.ok(pool.observationKey.equals(key(33)));
    assert.equal(pool.mint0Decimals, 9);
    assert.equal(pool.mint1Decimals, 6);
    assert.equal(pool.protocolFeesToken0, 5n);
    assert.equal(pool.fundFeesToken1, 3n);
});

test('raydiumCpSwap: reserves exclude protocol and fund fees', () => {
    const pool = decodeRaydiumCpSwapPool(
        encodeCpSwapPool({ protocolFees0: 100n, fundFees0: 50n, protocolFees1: 10n, fundFees1: 5n })
    );
    assert.deepEqual(cpSwapReserves(pool, 1_000n, 2_000n), [850n, 1_985n]);
    assert.deepEqual(cpSwapReserves(pool, 100n, 2_000n), [0n, 1_985n]);
});

test('raydiumCpSwap: rejects wrong discriminator, short data and disabled swaps', () => {
    const data = encodeCpSwapPool();
    const wrongDisc = Uint8Array.from(data);
    wrongDisc[0] = 0;
    assert.throws(() => decodeRaydiumCpSwapPool(wrongDisc), DecodeError);
    assert.throws(() => decodeRaydiumCpSwapPool(data.subarray(0, 600)), /must be >= 637/);
    assert.throws(() => decodeRaydiumCpSwapPool(encodeCpSwapPool({ status: 4 })), /swaps disabled/);
});

test('raydiumCpSwap: AmmConfig carries the trade fee in millionths', () => {
    assert.equal(decodeCpSwapAmmConfig(encodeCpSwapConfig(2_500n)).tradeFeeRate, 2_500n);
    assert.throws(() => decodeCpSwapAmmConfig(new Uint8Array(236)), DecodeError);
});
