/**
 * Volatility Fee Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Per-trade fee for a pool from short- and long-horizon volatility.
 *
 * INTEGRATION:
 *   const hook = new VolatilityFeeHook(createConfig());
 *   hook.configureFeed(poolId, shortFeed, longFeed, 5);
 *   const { encodedFee } = await hook.onBeforeTrade(poolId);
 * ═══════════════════════════════════════════════════════════════════════════════
 */

// Type exports
export type {
    PoolId,
    FeedBinding,
    FeeCurveSettings,
    FeeCurveConfig,
    TrendDirection,
    AdjustedCurve,
    CurvePath,
    CurveEvaluation,
    BaseFeeQuote,
    CurveFeeQuote,
    FeeQuote,
    FeeOverride,
} from './types';

// Config exports
export {
    DEFAULT_FEE_CURVE_SETTINGS,
    createFeeCurveConfig,
    createConfig,
} from './config';

// Curve exports
export {
    descaleVolatility,
    logistic,
    evaluateSigmoidFee,
    evaluateSigmoidFeeDetailed,
} from './sigmoid';

export { computeTrend, adjustCurveForTrend } from './trend';

export { FeedRegistry } from './registry';
export { FeeOrchestrator } from './orchestrator';
export type { OrchestratorOptions } from './orchestrator';
export { VolatilityFeeHook, isDynamicFee } from './hook';
export type { HookOptions } from './hook';
