/**
 * Volatility Fee - Sigmoid Curve
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * fee = minFee + (maxFee - minFee) * sigmoid(alpha * (v - beta))
 *
 * SATURATION (checked on the raw integer sample, before descaling):
 *   sample == 0                                       → minFee
 *   sample >= HIGH_VOLATILITY_THRESHOLD * 10^decimals → maxFee
 *
 * The logistic term is evaluated as 1 / (1 + e^-z) for z >= 0 and as
 * e^z / (1 + e^z) for z < 0, so exp() only ever sees a non-positive input.
 * The result is clamped to [minFee, maxFee] and truncated to an integer.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { FEE_CONFIG } from '../config/constants';
import { FixedPoint } from '../math/fixedPoint';
import { CurveEvaluation } from './types';

const HIGH_VOLATILITY_THRESHOLD = BigInt(FEE_CONFIG.HIGH_VOLATILITY_THRESHOLD);

/**
 * Convert a feed sample scaled by 10^decimals into percent units.
 *
 * @throws ArithmeticOverflowError if the percent value itself leaves the 64.64 range
 */
export function descaleVolatility(sample: bigint, decimals: number): FixedPoint {
    return FixedPoint.fromRatio(sample, 10n ** BigInt(decimals));
}

/**
 * Logistic function 1 / (1 + e^-z), in (0, 1].
 */
export function logistic(z: FixedPoint): FixedPoint {
    if (z.isNegative()) {
        const ez = z.exp();
        return ez.div(FixedPoint.ONE.add(ez));
    }
    return FixedPoint.ONE.div(FixedPoint.ONE.add(z.neg().exp()));
}

export function evaluateSigmoidFeeDetailed(
    shortHorizonVolatility: bigint,
    decimals: number,
    alpha: FixedPoint,
    beta: FixedPoint,
    minFee: FixedPoint,
    maxFee: FixedPoint
): CurveEvaluation {
    if (shortHorizonVolatility === 0n) {
        return { fee: Number(minFee.toInteger()), path: 'SATURATED_MIN' };
    }

    if (shortHorizonVolatility >= HIGH_VOLATILITY_THRESHOLD * 10n ** BigInt(decimals)) {
        return { fee: Number(maxFee.toInteger()), path: 'SATURATED_MAX' };
    }

    const volatility = descaleVolatility(shortHorizonVolatility, decimals);

    const sigmoid = logistic(alpha.mul(volatility.sub(beta)));
    const fee = minFee
        .add(maxFee.sub(minFee).mul(sigmoid))
        .clamp(minFee, maxFee);

    return { fee: Number(fee.toInteger()), path: 'SIGMOID' };
}

/**
 * Map a short-horizon volatility sample to a fee in [minFee, maxFee].
 *
 * @throws ArithmeticOverflowError if an intermediate value leaves the 64.64 range
 */
export function evaluateSigmoidFee(
    shortHorizonVolatility: bigint,
    decimals: number,
    alpha: FixedPoint,
    beta: FixedPoint,
    minFee: FixedPoint,
    maxFee: FixedPoint
): number {
    return evaluateSigmoidFeeDetailed(shortHorizonVolatility, decimals, alpha, beta, minFee, maxFee).fee;
}
