/**
 * Volatility Fee - Orchestrator
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * getFee(pool):
 *   1. No binding          → baseFee
 *   2. Read short + long feeds once each (any failure aborts)
 *   3. Trend-adjust alpha / beta
 *   4. Evaluate the sigmoid curve on the short-horizon sample
 *
 * Never mutates the registry. No caching and no retries.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { FEE_CONFIG } from '../config/constants';
import { FeedReadFailure } from '../errors';
import type { FeedReading, VolatilityFeed } from '../feeds/types';
import logger from '../utils/logger';
import { FeedRegistry } from './registry';
import { evaluateSigmoidFeeDetailed } from './sigmoid';
import { adjustCurveForTrend } from './trend';
import { FeeCurveConfig, FeeQuote, PoolId } from './types';

export interface OrchestratorOptions {
    /**
     * Reject readings older than this many seconds. 0 disables the check.
     */
    maxReadingAgeSeconds?: number;

    /** Current unix time in seconds */
    clock?: () => number;
}

const systemClock = (): number => Math.floor(Date.now() / 1000);

export class FeeOrchestrator {
    private readonly maxReadingAgeSeconds: number;
    private readonly clock: () => number;

    constructor(
        private readonly curve: FeeCurveConfig,
        private readonly registry: FeedRegistry,
        options: OrchestratorOptions = {}
    ) {
        this.maxReadingAgeSeconds = options.maxReadingAgeSeconds ?? FEE_CONFIG.MAX_READING_AGE_SECONDS;
        this.clock = options.clock ?? systemClock;
    }

    async getFee(poolId: PoolId): Promise<number> {
        const quote = await this.quote(poolId);
        return quote.fee;
    }

    /**
     * Fee with the inputs and curve path that produced it.
     */
    async quote(poolId: PoolId): Promise<FeeQuote> {
        const binding = this.registry.getBinding(poolId);

        if (!binding) {
            return {
                source: 'BASE_FEE',
                poolId,
                fee: this.curve.baseFee,
                timestamp: this.clock(),
            };
        }

        const [shortReading, longReading] = await Promise.all([
            this.read(binding.shortHorizonFeed),
            this.read(binding.longHorizonFeed),
        ]);

        const adjusted = adjustCurveForTrend(
            longReading.value,
            shortReading.value,
            this.curve.alpha,
            this.curve.beta
        );

        const evaluation = evaluateSigmoidFeeDetailed(
            shortReading.value,
            binding.decimals,
            adjusted.alpha,
            adjusted.beta,
            this.curve.minFee,
            this.curve.maxFee
        );

        logger.debug(
            `[FEE] ${poolId} fee=${evaluation.fee} path=${evaluation.path} trend=${adjusted.trend} ` +
            `short=${shortReading.value} long=${longReading.value} decimals=${binding.decimals}`
        );

        return {
            source: evaluation.path,
            poolId,
            fee: evaluation.fee,
            trend: adjusted.trend,
            alpha: adjusted.alpha.toString(),
            beta: adjusted.beta.toString(),
            shortHorizonVolatility: shortReading.value,
            longHorizonVolatility: longReading.value,
            decimals: binding.decimals,
            timestamp: this.clock(),
        };
    }

    private async read(feed: VolatilityFeed): Promise<FeedReading> {
        let reading: FeedReading;
        try {
            reading = await feed.latestReading();
        } catch (error) {
            if (error instanceof FeedReadFailure) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            throw new FeedReadFailure(feed.id, message, error);
        }

        if (this.maxReadingAgeSeconds > 0) {
            const age = this.clock() - reading.timestamp;
            if (age > this.maxReadingAgeSeconds) {
                throw new FeedReadFailure(
                    feed.id,
                    `reading of round ${reading.roundId} is ${age}s old (max ${this.maxReadingAgeSeconds}s)`
                );
            }
        }

        return reading;
    }
}
