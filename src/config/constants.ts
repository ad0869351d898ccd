// Configuration Constants for the Volatility Fee Engine

export const FEE_CONFIG = {
    // Fee band (host fee units; 3000 = 0.30% in hundredths of a bip)
    MIN_FEE: 3000,
    MAX_FEE: 10000,

    // Fee charged by pools that have no feed binding
    BASE_FEE: 5000,

    // Largest fee the host accepts (100%)
    MAX_FEE_UNITS: 1_000_000,

    // ═══════════════════════════════════════════════════════════════════════════
    // SIGMOID CURVE
    // fee = min + (max - min) / (1 + exp(-alpha * (volatility - beta)))
    // alpha and beta are in descaled percent units
    // ═══════════════════════════════════════════════════════════════════════════
    ALPHA: '0.5',   // steepness
    BETA: '10',     // midpoint (10% volatility)

    // Descaled volatility at or above which the curve returns MAX_FEE directly
    HIGH_VOLATILITY_THRESHOLD: 20, // 20%

    // ═══════════════════════════════════════════════════════════════════════════
    // FEEDS
    // ═══════════════════════════════════════════════════════════════════════════
    MAX_READING_AGE_SECONDS: 0, // 0 = staleness check disabled
    FEED_TIMEOUT_MS: 5000,
    MAX_FEED_DECIMALS: 255,
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// HOST FEE FLAGS
// ═══════════════════════════════════════════════════════════════════════════════

/** Pool fee value marking a pool whose fee is supplied per trade */
export const DYNAMIC_FEE_FLAG = 0x800000;

/** Set on a returned fee to mark it as a single-trade override */
export const OVERRIDE_FEE_FLAG = 0x400000;
