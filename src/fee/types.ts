/**
 * Volatility Fee - Type Definitions
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Price each trade of a pool from two volatility feeds.
 *
 * FLOW:
 *   binding lookup → read short + long feed → trend adjustment → sigmoid curve
 *
 * Pools without a binding are charged the configured base fee.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { FixedPoint } from '../math/fixedPoint';
import type { VolatilityFeed } from '../feeds/types';

/** Opaque pool identifier assigned by the host */
export type PoolId = string;

/**
 * Feeds bound to one pool. Always replaced as a whole.
 */
export interface FeedBinding {
    /** Recent-window (24h) volatility */
    readonly shortHorizonFeed: VolatilityFeed;

    /** Longer-window (7d) volatility */
    readonly longHorizonFeed: VolatilityFeed;

    /** Both feeds report values scaled by 10^decimals */
    readonly decimals: number;
}

/**
 * Raw construction-time settings.
 */
export interface FeeCurveSettings {
    minFee: number;
    maxFee: number;
    /** Defaults to FEE_CONFIG.BASE_FEE */
    baseFee?: number;
    /** Curve steepness, descaled percent units */
    alpha: string | number;
    /** Curve midpoint, descaled percent units */
    beta: string | number;
}

/**
 * Validated curve configuration.
 */
export interface FeeCurveConfig {
    readonly minFee: FixedPoint;
    readonly maxFee: FixedPoint;
    readonly baseFee: number;
    readonly alpha: FixedPoint;
    readonly beta: FixedPoint;
}

/**
 * Sign of (longHorizon - shortHorizon).
 * FALLING: long above short. RISING: short above long.
 */
export type TrendDirection = 'FALLING' | 'RISING' | 'FLAT';

export interface AdjustedCurve {
    alpha: FixedPoint;
    beta: FixedPoint;
    trend: TrendDirection;
}

/** How the sigmoid curve produced its fee */
export type CurvePath = 'SATURATED_MAX' | 'SATURATED_MIN' | 'SIGMOID';

export interface CurveEvaluation {
    fee: number;
    path: CurvePath;
}

export interface BaseFeeQuote {
    source: 'BASE_FEE';
    poolId: PoolId;
    fee: number;
    /** Unix seconds */
    timestamp: number;
}

export interface CurveFeeQuote {
    source: CurvePath;
    poolId: PoolId;
    fee: number;
    trend: TrendDirection;
    /** Adjusted parameters, decimal strings */
    alpha: string;
    beta: string;
    shortHorizonVolatility: bigint;
    longHorizonVolatility: bigint;
    decimals: number;
    timestamp: number;
}

export type FeeQuote = BaseFeeQuote | CurveFeeQuote;

/**
 * Fee returned to the host for a single trade.
 */
export interface FeeOverride {
    poolId: PoolId;
    fee: number;
    /** fee | OVERRIDE_FEE_FLAG */
    encodedFee: number;
}
