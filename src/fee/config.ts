/**
 * Volatility Fee - Configuration
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Curve parameters are fixed at construction. An invalid fee band is fatal:
 * no configuration object is produced.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { FEE_CONFIG } from '../config/constants';
import { ConfigurationError } from '../errors';
import { FixedPoint } from '../math/fixedPoint';
import { FeeCurveConfig, FeeCurveSettings } from './types';

// Re-export the types for use in other modules
export type { FeeCurveConfig, FeeCurveSettings } from './types';

/**
 * Default settings
 */
export const DEFAULT_FEE_CURVE_SETTINGS: FeeCurveSettings = {
    minFee: FEE_CONFIG.MIN_FEE,
    maxFee: FEE_CONFIG.MAX_FEE,
    baseFee: FEE_CONFIG.BASE_FEE,
    alpha: FEE_CONFIG.ALPHA,
    beta: FEE_CONFIG.BETA,
};

function requireFee(name: string, value: number): void {
    if (!Number.isSafeInteger(value) || value < 0 || value > FEE_CONFIG.MAX_FEE_UNITS) {
        throw new ConfigurationError(
            `${name} must be an integer in [0, ${FEE_CONFIG.MAX_FEE_UNITS}]`,
            { [name]: value }
        );
    }
}

function parseParameter(name: string, value: string | number): FixedPoint {
    try {
        return FixedPoint.fromDecimal(value);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`${name} is not a valid decimal: ${message}`, { [name]: value });
    }
}

/**
 * Validate settings and build the curve configuration.
 *
 * @throws ConfigurationError when minFee >= maxFee, a fee is out of range,
 * alpha is not positive, or beta is negative
 */
export function createFeeCurveConfig(settings: FeeCurveSettings): FeeCurveConfig {
    const baseFee = settings.baseFee ?? FEE_CONFIG.BASE_FEE;

    requireFee('minFee', settings.minFee);
    requireFee('maxFee', settings.maxFee);
    requireFee('baseFee', baseFee);

    if (settings.minFee >= settings.maxFee) {
        throw new ConfigurationError(
            `minFee (${settings.minFee}) must be below maxFee (${settings.maxFee})`,
            { minFee: settings.minFee, maxFee: settings.maxFee }
        );
    }

    const alpha = parseParameter('alpha', settings.alpha);
    const beta = parseParameter('beta', settings.beta);

    if (alpha.lte(FixedPoint.ZERO)) {
        throw new ConfigurationError(`alpha must be positive, got ${alpha.toString()}`, { alpha: settings.alpha });
    }
    if (beta.isNegative()) {
        throw new ConfigurationError(`beta must not be negative, got ${beta.toString()}`, { beta: settings.beta });
    }

    return Object.freeze({
        minFee: FixedPoint.fromInt(settings.minFee),
        maxFee: FixedPoint.fromInt(settings.maxFee),
        baseFee,
        alpha,
        beta,
    });
}

/**
 * Create configuration with overrides on top of the defaults
 */
export function createConfig(overrides: Partial<FeeCurveSettings> = {}): FeeCurveConfig {
    return createFeeCurveConfig({
        ...DEFAULT_FEE_CURVE_SETTINGS,
        ...overrides,
    });
}
