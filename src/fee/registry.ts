/**
 * Volatility Fee - Feed Registry
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Per-pool feed bindings.
 *
 * A binding is a frozen object replaced with a single Map.set, so a fee
 * computation that captured a binding keeps a consistent short/long pair
 * even if the pool is reconfigured while its feeds are being read.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { FEE_CONFIG } from '../config/constants';
import { ConfigurationError, NotConfiguredError } from '../errors';
import type { VolatilityFeed } from '../feeds/types';
import logger from '../utils/logger';
import { FeedBinding, PoolId } from './types';

export class FeedRegistry {
    private readonly bindings: Map<PoolId, FeedBinding> = new Map();

    /**
     * Bind a feed pair to a pool, replacing any previous binding.
     * Feeds are not read here.
     */
    setBinding(
        poolId: PoolId,
        shortHorizonFeed: VolatilityFeed,
        longHorizonFeed: VolatilityFeed,
        decimals: number
    ): void {
        if (!Number.isInteger(decimals) || decimals < 0 || decimals > FEE_CONFIG.MAX_FEED_DECIMALS) {
            throw new ConfigurationError(
                `decimals must be an integer in [0, ${FEE_CONFIG.MAX_FEED_DECIMALS}]`,
                { poolId, decimals }
            );
        }

        const replaced = this.bindings.has(poolId);
        this.bindings.set(poolId, Object.freeze({ shortHorizonFeed, longHorizonFeed, decimals }));

        logger.info(
            `[FEED-REGISTRY] ${replaced ? 'Replaced' : 'Set'} binding for ${poolId}: ` +
            `short=${shortHorizonFeed.id} long=${longHorizonFeed.id} decimals=${decimals}`
        );
    }

    getBinding(poolId: PoolId): FeedBinding | undefined {
        return this.bindings.get(poolId);
    }

    hasBinding(poolId: PoolId): boolean {
        return this.bindings.has(poolId);
    }

    /**
     * @throws NotConfiguredError if the pool has no binding
     */
    deleteBinding(poolId: PoolId): void {
        if (!this.bindings.delete(poolId)) {
            throw new NotConfiguredError(poolId);
        }
        logger.info(`[FEED-REGISTRY] Removed binding for ${poolId}`);
    }

    listPools(): PoolId[] {
        return Array.from(this.bindings.keys());
    }

    get size(): number {
        return this.bindings.size;
    }
}
