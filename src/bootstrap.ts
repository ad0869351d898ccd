import dotenv from "dotenv";
dotenv.config();

/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * BOOTSTRAP — HOOK FACTORY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Builds a VolatilityFeeHook from the environment:
 *   1. Parse and validate the curve settings (fatal on an invalid fee band)
 *   2. Bind every POOL_FEEDS entry to HTTP feeds served by FEED_API_URL
 *
 * No feed is read here.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { loadFeeEngineConfig } from './config/env';
import { ConfigurationError } from './errors';
import { createFeeCurveConfig } from './fee/config';
import { VolatilityFeeHook } from './fee/hook';
import { HttpVolatilityFeed } from './feeds/httpFeed';
import logger from './utils/logger';

export function bootstrap(env: Record<string, string | undefined> = process.env): VolatilityFeeHook {
    logger.info('[BOOTSTRAP] Step 1: Loading fee curve configuration...');
    const config = loadFeeEngineConfig(env);
    const curve = createFeeCurveConfig(config.curve);

    logger.info(
        `[BOOTSTRAP] ✅ Curve: fee=[${curve.minFee.toString()}, ${curve.maxFee.toString()}] ` +
        `base=${curve.baseFee} alpha=${curve.alpha.toString()} beta=${curve.beta.toString()}`
    );

    const hook = new VolatilityFeeHook(curve, {
        maxReadingAgeSeconds: config.maxReadingAgeSeconds,
    });

    if (config.poolFeeds.length === 0) {
        logger.info('[BOOTSTRAP] Step 2: No POOL_FEEDS configured, all pools use the base fee');
        return hook;
    }

    const feedApiUrl = config.feedApiUrl;
    if (feedApiUrl === null) {
        throw new ConfigurationError('POOL_FEEDS requires FEED_API_URL', {
            pools: config.poolFeeds.map(spec => spec.poolId),
        });
    }

    logger.info(`[BOOTSTRAP] Step 2: Binding ${config.poolFeeds.length} pool(s) to ${feedApiUrl}...`);
    for (const spec of config.poolFeeds) {
        hook.configureFeed(
            spec.poolId,
            new HttpVolatilityFeed({ baseUrl: feedApiUrl, feedId: spec.shortFeedId, timeoutMs: config.feedTimeoutMs }),
            new HttpVolatilityFeed({ baseUrl: feedApiUrl, feedId: spec.longFeedId, timeoutMs: config.feedTimeoutMs }),
            spec.decimals
        );
    }

    return hook;
}
