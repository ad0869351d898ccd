/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * FEE ENGINE FAILURES
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Every failure aborts the current invocation and surfaces to the caller.
 * Nothing here is recovered internally. The only non-error fallback in the
 * engine is the base fee returned for a pool without a feed binding.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export class FeeEngineError extends Error {
    constructor(
        tag: string,
        public readonly reason: string,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(`[${tag}] ${reason}`);
        this.name = 'FeeEngineError';
    }
}

/**
 * Invalid construction-time configuration (e.g. minFee >= maxFee).
 */
export class ConfigurationError extends FeeEngineError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('CONFIGURATION', reason, context);
        this.name = 'ConfigurationError';
    }
}

/**
 * Pool was not created with the dynamic-fee flag.
 */
export class FeeModeNotDynamicError extends FeeEngineError {
    constructor(poolId: string, poolFee: number) {
        super('FEE_MODE_NOT_DYNAMIC', `Pool ${poolId} does not use dynamic fees`, { poolId, poolFee });
        this.name = 'FeeModeNotDynamicError';
    }
}

/**
 * Removal of a feed binding that does not exist.
 */
export class NotConfiguredError extends FeeEngineError {
    constructor(poolId: string) {
        super('NOT_CONFIGURED', `No feed binding for pool ${poolId}`, { poolId });
        this.name = 'NotConfiguredError';
    }
}

/**
 * A volatility feed could not produce a usable reading.
 */
export class FeedReadFailure extends FeeEngineError {
    constructor(
        public readonly feedId: string,
        reason: string,
        public readonly cause?: unknown
    ) {
        super('FEED_READ_FAILURE', `Feed ${feedId}: ${reason}`, { feedId });
        this.name = 'FeedReadFailure';
    }
}

export class ArithmeticOverflowError extends FeeEngineError {
    constructor(operation: string, context: Record<string, unknown> = {}) {
        super('ARITHMETIC_OVERFLOW', `${operation} exceeds the 64.64 fixed-point range`, context);
        this.name = 'ArithmeticOverflowError';
    }
}

export class DivisionByZeroError extends FeeEngineError {
    constructor(context: Record<string, unknown> = {}) {
        super('DIVISION_BY_ZERO', 'Fixed-point division by zero', context);
        this.name = 'DivisionByZeroError';
    }
}
