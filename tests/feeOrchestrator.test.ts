/**
 * Fee Orchestrator Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Test Cases:
 *   A. Zero short-horizon volatility → minFee
 *   B. 100% short-horizon volatility → maxFee
 *   C. Unconfigured pool → base fee, whatever the feeds do
 *   D. Rising volatility 1% → 5% → 10% → 20% → non-decreasing fees
 *   Feed failures and stale readings abort the computation
 *   Reconfiguration during a read never mixes feed pairs
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { createConfig } from '../src/fee/config';
import { FeeOrchestrator } from '../src/fee/orchestrator';
import { FeedRegistry } from '../src/fee/registry';
import { StaticVolatilityFeed } from '../src/feeds/staticFeed';
import type { FeedReading, VolatilityFeed } from '../src/feeds/types';
import { FeedReadFailure } from '../src/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

const PERCENT = 10n ** 5n;
const NOW = 1_700_000_000;

/**
 * Feed whose reads stay pending until released.
 */
class DeferredFeed implements VolatilityFeed {
    private pending: Array<(reading: FeedReading) => void> = [];
    public reads = 0;

    constructor(public readonly id: string, private readonly value: bigint) {}

    latestReading(): Promise<FeedReading> {
        this.reads++;
        return new Promise(resolve => this.pending.push(resolve));
    }

    release(): void {
        for (const resolve of this.pending) {
            resolve({ value: this.value, timestamp: NOW, roundId: 1n });
        }
        this.pending = [];
    }
}

function setup(shortValue: bigint, longValue: bigint, maxReadingAgeSeconds = 0) {
    const registry = new FeedRegistry();
    const shortFeed = new StaticVolatilityFeed('vol-24h', shortValue, NOW);
    const longFeed = new StaticVolatilityFeed('vol-7d', longValue, NOW);
    registry.setBinding('pool-a', shortFeed, longFeed, 5);
    const orchestrator = new FeeOrchestrator(createConfig(), registry, {
        maxReadingAgeSeconds,
        clock: () => NOW,
    });
    return { registry, shortFeed, longFeed, orchestrator };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCENARIOS
// ═══════════════════════════════════════════════════════════════════════════════

describe('FeeOrchestrator', () => {
    test('A: zero volatility returns minFee', async () => {
        const { orchestrator } = setup(0n, 0n);
        await expect(orchestrator.getFee('pool-a')).resolves.toBe(3000);
    });

    test('B: 100% volatility returns maxFee', async () => {
        const { orchestrator } = setup(100n * PERCENT, 50n * PERCENT);
        await expect(orchestrator.getFee('pool-a')).resolves.toBe(10000);
    });

    test('C: unconfigured pool returns the base fee', async () => {
        const { orchestrator, shortFeed, longFeed } = setup(10n * PERCENT, 10n * PERCENT);
        shortFeed.fail(new Error('feed offline'));
        longFeed.fail(new Error('feed offline'));

        await expect(orchestrator.getFee('pool-unknown')).resolves.toBe(5000);
        await expect(orchestrator.quote('pool-unknown')).resolves.toEqual({
            source: 'BASE_FEE',
            poolId: 'pool-unknown',
            fee: 5000,
            timestamp: NOW,
        });
    });

    test('C: removed binding falls back to the base fee', async () => {
        const { orchestrator, registry } = setup(15n * PERCENT, 10n * PERCENT);
        registry.deleteBinding('pool-a');
        await expect(orchestrator.getFee('pool-a')).resolves.toBe(5000);
    });

    test('D: rising volatility never lowers the fee', async () => {
        const { orchestrator, shortFeed, longFeed } = setup(0n, 0n);
        const fees: number[] = [];

        for (const percent of [1n, 5n, 10n, 20n]) {
            shortFeed.update(percent * PERCENT, NOW);
            longFeed.update((percent * PERCENT) / 2n, NOW);
            fees.push(await orchestrator.getFee('pool-a'));
        }

        expect(fees).toEqual([3036, 3667, 8723, 10000]);
        for (let i = 1; i < fees.length; i++) {
            expect(fees[i]).toBeGreaterThanOrEqual(fees[i - 1]);
        }
    });

    test('trend direction changes the fee at the same short-horizon volatility', async () => {
        const flat = setup(10n * PERCENT, 10n * PERCENT);
        const falling = setup(10n * PERCENT, 15n * PERCENT);
        const rising = setup(10n * PERCENT, 5n * PERCENT);

        await expect(flat.orchestrator.getFee('pool-a')).resolves.toBe(6500);
        await expect(falling.orchestrator.getFee('pool-a')).resolves.toBe(5642);
        await expect(rising.orchestrator.getFee('pool-a')).resolves.toBe(8723);
    });

    test('quote reports the inputs and curve path', async () => {
        const { orchestrator } = setup(10n * PERCENT, 5n * PERCENT);
        await expect(orchestrator.quote('pool-a')).resolves.toEqual({
            source: 'SIGMOID',
            poolId: 'pool-a',
            fee: 8723,
            trend: 'RISING',
            alpha: '0.75',
            beta: '8',
            shortHorizonVolatility: 1_000_000n,
            longHorizonVolatility: 500_000n,
            decimals: 5,
            timestamp: NOW,
        });
    });

    test('quote timestamps come from the injected clock in seconds', async () => {
        const registry = new FeedRegistry();
        const orchestrator = new FeeOrchestrator(createConfig(), registry, { clock: () => 1234 });
        await expect(orchestrator.quote('pool-a')).resolves.toMatchObject({ source: 'BASE_FEE', timestamp: 1234 });

        registry.setBinding(
            'pool-a',
            new StaticVolatilityFeed('vol-24h', 10n * PERCENT, 1200),
            new StaticVolatilityFeed('vol-7d', 10n * PERCENT, 1200),
            5
        );
        await expect(orchestrator.quote('pool-a')).resolves.toMatchObject({ source: 'SIGMOID', timestamp: 1234 });
    });

    test('high-precision feeds saturate instead of overflowing', async () => {
        const registry = new FeedRegistry();
        registry.setBinding(
            'pool-a',
            new StaticVolatilityFeed('vol-24h', 100n * 10n ** 18n, NOW),
            new StaticVolatilityFeed('vol-7d', 50n * 10n ** 18n, NOW),
            18
        );
        const orchestrator = new FeeOrchestrator(createConfig(), registry, { clock: () => NOW });
        await expect(orchestrator.getFee('pool-a')).resolves.toBe(10000);
    });

    test('saturated quotes name their path', async () => {
        const high = setup(25n * PERCENT, 30n * PERCENT);
        const zero = setup(0n, 1n);

        await expect(high.orchestrator.quote('pool-a')).resolves.toMatchObject({
            source: 'SATURATED_MAX',
            fee: 10000,
            trend: 'FALLING',
        });
        await expect(zero.orchestrator.quote('pool-a')).resolves.toMatchObject({
            source: 'SATURATED_MIN',
            fee: 3000,
        });
    });

    describe('feed failures', () => {
        test('failing long-horizon feed aborts with FeedReadFailure', async () => {
            const { orchestrator, longFeed } = setup(10n * PERCENT, 10n * PERCENT);
            longFeed.fail(new Error('round not complete'));

            await expect(orchestrator.getFee('pool-a')).rejects.toThrow(FeedReadFailure);
            await expect(orchestrator.getFee('pool-a')).rejects.toThrow(
                '[FEED_READ_FAILURE] Feed vol-7d: round not complete'
            );
        });

        test('FeedReadFailure from a feed is passed through unchanged', async () => {
            const { orchestrator, shortFeed } = setup(10n * PERCENT, 10n * PERCENT);
            const failure = new FeedReadFailure('vol-24h', 'no answer');
            shortFeed.fail(failure);

            await expect(orchestrator.getFee('pool-a')).rejects.toBe(failure);
        });

        test('feed recovers after the next update', async () => {
            const { orchestrator, shortFeed } = setup(10n * PERCENT, 10n * PERCENT);
            shortFeed.fail(new Error('offline'));
            await expect(orchestrator.getFee('pool-a')).rejects.toThrow(FeedReadFailure);

            shortFeed.update(10n * PERCENT, NOW);
            await expect(orchestrator.getFee('pool-a')).resolves.toBe(6500);
        });
    });

    describe('staleness', () => {
        test('disabled by default', async () => {
            const registry = new FeedRegistry();
            registry.setBinding(
                'pool-a',
                new StaticVolatilityFeed('vol-24h', 10n * PERCENT, 0),
                new StaticVolatilityFeed('vol-7d', 10n * PERCENT, 0),
                5
            );
            const orchestrator = new FeeOrchestrator(createConfig(), registry);
            await expect(orchestrator.getFee('pool-a')).resolves.toBe(6500);
        });

        test('rejects readings older than the limit', async () => {
            const { orchestrator, shortFeed } = setup(10n * PERCENT, 10n * PERCENT, 60);
            shortFeed.update(10n * PERCENT, NOW - 120);

            await expect(orchestrator.getFee('pool-a')).rejects.toThrow(
                '[FEED_READ_FAILURE] Feed vol-24h: reading of round 2 is 120s old (max 60s)'
            );
        });

        test('accepts a reading exactly at the limit', async () => {
            const { orchestrator, longFeed } = setup(10n * PERCENT, 10n * PERCENT, 60);
            longFeed.update(10n * PERCENT, NOW - 60);
            await expect(orchestrator.getFee('pool-a')).resolves.toBe(6500);
        });
    });

    describe('reconfiguration', () => {
        test('an in-flight computation keeps the binding it started with', async () => {
            const registry = new FeedRegistry();
            const oldShort = new DeferredFeed('old-24h', 10n * PERCENT);
            const oldLong = new DeferredFeed('old-7d', 5n * PERCENT);
            registry.setBinding('pool-a', oldShort, oldLong, 5);

            const orchestrator = new FeeOrchestrator(createConfig(), registry);
            const inFlight = orchestrator.quote('pool-a');

            registry.setBinding(
                'pool-a',
                new StaticVolatilityFeed('new-24h', 0n),
                new StaticVolatilityFeed('new-7d', 0n),
                5
            );

            oldShort.release();
            oldLong.release();

            await expect(inFlight).resolves.toMatchObject({
                fee: 8723,
                shortHorizonVolatility: 1_000_000n,
                longHorizonVolatility: 500_000n,
            });
            await expect(orchestrator.getFee('pool-a')).resolves.toBe(3000);
        });

        test('each feed is read once per computation', async () => {
            const registry = new FeedRegistry();
            const shortFeed = new DeferredFeed('vol-24h', 10n * PERCENT);
            const longFeed = new DeferredFeed('vol-7d', 10n * PERCENT);
            registry.setBinding('pool-a', shortFeed, longFeed, 5);

            const pending = new FeeOrchestrator(createConfig(), registry).getFee('pool-a');
            shortFeed.release();
            longFeed.release();

            await expect(pending).resolves.toBe(6500);
            expect(shortFeed.reads).toBe(1);
            expect(longFeed.reads).toBe(1);
        });
    });
});
