import test from 'node:test';
import assert from 'node:assert/strict';

import { ConcurrencyLimiter } from './limiter.js';
import { setLogLevel } from '../utils/logger.js';

setLogLevel('silent');

function deferred() {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

test('limiter: never runs more than maxConcurrent tasks and queues the rest', async () => {
    const limiter = new ConcurrencyLimiter(3);
    let running = 0;
    let peak = 0;
    const gates = Array.from({ length: 10 }, () => deferred());

    const runs = gates.map((gate, i) =>
        limiter.run(async () => {
            running++;
            peak = Math.max(peak, running);
            await gate.promise;
            running--;
            return i;
        })
    );

    await new Promise(r => setImmediate(r));
    assert.equal(running, 3);
    assert.equal(limiter.stats().queued, 7);

    for (const gate of gates) gate.resolve();
    assert.deepEqual(await Promise.all(runs), [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    assert.equal(peak, 3);
    assert.equal(limiter.stats().peakActive, 3);
    assert.equal(limiter.stats().active, 0);
    assert.equal(limiter.stats().completed, 10);
});

test('limiter: queued tasks start in arrival order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: number[] = [];
    await Promise.all(
        [0, 1, 2, 3].map(i =>
            limiter.run(async () => {
                order.push(i);
            })
        )
    );
    assert.deepEqual(order, [0, 1, 2, 3]);
});

test('limiter: rate-limit errors double the backoff up to the cap and success clears it', async () => {
    const limiter = new ConcurrencyLimiter(2, { baseMs: 1, maxMs: 3 });
    const fail = () =>
        limiter.run(async () => {
            throw new Error('429 Too Many Requests');
        });

    await assert.rejects(fail(), /429/);
    assert.equal(limiter.stats().backoffMs, 1);
    await assert.rejects(fail(), /429/);
    assert.equal(limiter.stats().backoffMs, 2);
    await assert.rejects(fail(), /429/);
    assert.equal(limiter.stats().backoffMs, 3);
    assert.equal(limiter.stats().rateLimited, 3);

    await limiter.run(async () => 'ok');
    assert.equal(limiter.stats().backoffMs, 0);
});

test('limiter: other errors propagate without backoff', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await assert.rejects(
        limiter.run(async () => {
            throw new Error('custom program error: 0x1');
        }),
        /custom program error/
    );
    assert.equal(limiter.stats().backoffMs, 0);
    assert.equal(limiter.stats().active, 0);
});

test('limiter: rejects a non-positive concurrency', () => {
    assert.throws(() => new ConcurrencyLimiter(0), RangeError);
});

test('limiter: a timed out task rejects its caller but keeps its slot until it settles', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const gate = deferred();
    let secondStarted = false;

    const stalled = limiter.run(() => gate.promise, { ms: 5, error: () => new Error('timed out') });
    await assert.rejects(stalled, /timed out/);
    assert.equal(limiter.stats().active, 1);

    const second = limiter.run(async () => {
        secondStarted = true;
        return 'second';
    });
    await new Promise(r => setImmediate(r));
    assert.equal(secondStarted, false);
    assert.equal(limiter.stats().queued, 1);

    gate.resolve();
    assert.equal(await second, 'second');
    assert.equal(limiter.stats().active, 0);
    assert.equal(limiter.stats().completed, 2);
});

test('limiter: a task that finishes in time clears its timer', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const value = await limiter.run(async () => 7, { ms: 60_000, error: () => new Error('timed out') });
    assert.equal(value, 7);
});
