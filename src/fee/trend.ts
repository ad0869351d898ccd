/**
 * Volatility Fee - Trend Adjustment
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * trend = longHorizon - shortHorizon (raw samples, same decimals)
 *
 *   FALLING (trend > 0): alpha -= alpha/2, beta += beta/5  → lower fees
 *   RISING  (trend < 0): alpha += alpha/2, beta -= beta/5  → higher fees
 *   FLAT    (trend = 0): unchanged
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { FixedPoint } from '../math/fixedPoint';
import { AdjustedCurve, TrendDirection } from './types';

const TWO = FixedPoint.fromInt(2);
const FIVE = FixedPoint.fromInt(5);

export function computeTrend(longHorizonVolatility: bigint, shortHorizonVolatility: bigint): TrendDirection {
    const trend = longHorizonVolatility - shortHorizonVolatility;
    if (trend > 0n) return 'FALLING';
    if (trend < 0n) return 'RISING';
    return 'FLAT';
}

export function adjustCurveForTrend(
    longHorizonVolatility: bigint,
    shortHorizonVolatility: bigint,
    baseAlpha: FixedPoint,
    baseBeta: FixedPoint
): AdjustedCurve {
    const trend = computeTrend(longHorizonVolatility, shortHorizonVolatility);

    switch (trend) {
        case 'FALLING':
            return {
                alpha: baseAlpha.sub(baseAlpha.div(TWO)),
                beta: baseBeta.add(baseBeta.div(FIVE)),
                trend,
            };
        case 'RISING':
            return {
                alpha: baseAlpha.add(baseAlpha.div(TWO)),
                beta: baseBeta.sub(baseBeta.div(FIVE)),
                trend,
            };
        case 'FLAT':
            return { alpha: baseAlpha, beta: baseBeta, trend };
    }
}
