/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * VOLATILITY FEE HOOK — HOST ENTRY POINTS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * onPoolInitialize  → rejects pools not created with DYNAMIC_FEE_FLAG
 * onBeforeTrade     → fee for one trade, tagged with OVERRIDE_FEE_FLAG
 * configureFeed     → bind short/long feeds to a pool
 * removeFeed        → drop a binding (pool falls back to the base fee)
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { DYNAMIC_FEE_FLAG, OVERRIDE_FEE_FLAG } from '../config/constants';
import { FeeModeNotDynamicError } from '../errors';
import type { VolatilityFeed } from '../feeds/types';
import logger from '../utils/logger';
import { FeeOrchestrator, OrchestratorOptions } from './orchestrator';
import { FeedRegistry } from './registry';
import { FeeCurveConfig, FeeOverride, PoolId } from './types';

export interface HookOptions extends OrchestratorOptions {
    registry?: FeedRegistry;
}

export function isDynamicFee(poolFee: number): boolean {
    return poolFee === DYNAMIC_FEE_FLAG;
}

export class VolatilityFeeHook {
    public readonly registry: FeedRegistry;
    public readonly orchestrator: FeeOrchestrator;

    constructor(
        public readonly config: FeeCurveConfig,
        options: HookOptions = {}
    ) {
        this.registry = options.registry ?? new FeedRegistry();
        this.orchestrator = new FeeOrchestrator(config, this.registry, options);
    }

    /**
     * @throws FeeModeNotDynamicError unless poolFee is DYNAMIC_FEE_FLAG
     */
    onPoolInitialize(poolId: PoolId, poolFee: number): void {
        if (!isDynamicFee(poolFee)) {
            throw new FeeModeNotDynamicError(poolId, poolFee);
        }
        logger.info(`[HOOK] Pool ${poolId} initialized with dynamic fees`);
    }

    async onBeforeTrade(poolId: PoolId): Promise<FeeOverride> {
        const fee = await this.orchestrator.getFee(poolId);
        return {
            poolId,
            fee,
            encodedFee: fee | OVERRIDE_FEE_FLAG,
        };
    }

    getFee(poolId: PoolId): Promise<number> {
        return this.orchestrator.getFee(poolId);
    }

    configureFeed(
        poolId: PoolId,
        shortHorizonFeed: VolatilityFeed,
        longHorizonFeed: VolatilityFeed,
        decimals: number
    ): void {
        this.registry.setBinding(poolId, shortHorizonFeed, longHorizonFeed, decimals);
    }

    removeFeed(poolId: PoolId): void {
        this.registry.deleteBinding(poolId);
    }
}
