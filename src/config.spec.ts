import test from 'node:test';
import assert from 'node:assert/strict';

import { USDC_MINT, defaultConfig, loadConfig, validateConfig } from './config.js';
import { ConfigError } from './errors.js';

test('config: an empty environment yields the defaults', () => {
    const config = loadConfig({});
    assert.equal(config.rpcUrl, 'https://api.mainnet-beta.solana.com');
    assert.equal(config.cacheTtlMs.pools, 30_000);
    assert.equal(config.rpcTimeoutMs, 30_000);
    assert.equal(config.confirmTimeoutMs, 60_000);
    assert.equal(config.retry.maxRetries, 3);
    assert.equal(config.quoteMints[0]?.toBase58(), USDC_MINT);
});

test('config: RPC_URL wins over the provider fallback', () => {
    assert.equal(loadConfig({ HELIUS_RPC_URL: 'http://fallback.test' }).rpcUrl, 'http://fallback.test');
    assert.equal(loadConfig({ RPC_URL: 'http://primary.test', HELIUS_RPC_URL: 'http://fallback.test' }).rpcUrl, 'http://primary.test');
});

test('config: second-based settings are converted, millisecond overrides win', () => {
    const config = loadConfig({ CACHE_TTL_SECS: '60', TIMEOUT_SECS: '5', TRANSACTION_TIMEOUT_SECS: '90' });
    assert.equal(config.cacheTtlMs.pools, 60_000);
    assert.equal(config.rpcTimeoutMs, 5_000);
    assert.equal(config.confirmTimeoutMs, 90_000);
    assert.equal(loadConfig({ CACHE_TTL_SECS: '60', POOL_CACHE_TTL_MS: '1500' }).cacheTtlMs.pools, 1_500);
});

test('config: address lists are split on commas', () => {
    const config = loadConfig({ LOOKUP_TABLES: ` ${USDC_MINT} ,, ` });
    assert.deepEqual(config.lookupTables.map(k => k.toBase58()), [USDC_MINT]);
});

test('config: malformed values are config errors', () => {
    assert.throws(() => loadConfig({ RPC_CONCURRENCY: 'many' }), ConfigError);
    assert.throws(() => loadConfig({ MIN_LIQUIDITY_USD: 'lots' }), ConfigError);
    assert.throws(() => loadConfig({ QUOTE_MINTS: 'not-an-address' }), /QUOTE_MINTS contains an invalid address/);
});

test('config: default slippage above the maximum is rejected', () => {
    assert.throws(() => loadConfig({ DEFAULT_SLIPPAGE_BPS: '2000' }), /DEFAULT_SLIPPAGE_BPS \(2000\)/);
    assert.throws(() => validateConfig(defaultConfig({ quoteDeadlineMs: 0 })), /quote deadline must be > 0/);
    assert.throws(
        () => validateConfig(defaultConfig({ retry: { maxRetries: 3, baseDelayMs: 500, maxDelayMs: 100 } })),
        ConfigError
    );
});
