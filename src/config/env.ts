/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * ENVIRONMENT CONFIGURATION
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * FEE_MIN, FEE_MAX, FEE_BASE    integer fees
 * FEE_ALPHA, FEE_BETA           decimal curve parameters
 * FEED_MAX_AGE_SECONDS          staleness limit, 0 = off
 * FEED_API_URL                  oracle API serving /feeds/{id}/latest
 * FEED_TIMEOUT_MS               per-request timeout
 * POOL_FEEDS                    pool:shortFeed:longFeed:decimals[;...]
 *
 * Unset variables fall back to FEE_CONFIG. Malformed values are fatal.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ConfigurationError } from '../errors';
import type { FeeCurveSettings } from '../fee/types';
import { FEE_CONFIG } from './constants';

export interface PoolFeedSpec {
    poolId: string;
    shortFeedId: string;
    longFeedId: string;
    decimals: number;
}

export interface FeeEngineEnvConfig {
    curve: FeeCurveSettings;
    maxReadingAgeSeconds: number;
    feedApiUrl: string | null;
    feedTimeoutMs: number;
    poolFeeds: PoolFeedSpec[];
}

type Env = Record<string, string | undefined>;

function readVar(env: Env, name: string): string | null {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return null;
    return raw.trim();
}

function readInteger(env: Env, name: string, fallback: number): number {
    const raw = readVar(env, name);
    if (raw === null) return fallback;
    if (!/^\d+$/.test(raw)) {
        throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`, { [name]: raw });
    }
    const value = Number(raw);
    if (!Number.isSafeInteger(value)) {
        throw new ConfigurationError(`${name} is too large`, { [name]: raw });
    }
    return value;
}

/**
 * Parse POOL_FEEDS entries of the form pool:shortFeed:longFeed:decimals,
 * separated by ';' or ','.
 */
export function parsePoolFeeds(raw: string): PoolFeedSpec[] {
    return raw
        .split(/[;,]/)
        .map(entry => entry.trim())
        .filter(entry => entry !== '')
        .map(entry => {
            const parts = entry.split(':').map(part => part.trim());
            if (parts.length !== 4 || parts.some(part => part === '')) {
                throw new ConfigurationError(
                    `POOL_FEEDS entry "${entry}" must be pool:shortFeed:longFeed:decimals`,
                    { entry }
                );
            }
            const [poolId, shortFeedId, longFeedId, decimalsRaw] = parts;
            if (!/^\d+$/.test(decimalsRaw) || Number(decimalsRaw) > FEE_CONFIG.MAX_FEED_DECIMALS) {
                throw new ConfigurationError(
                    `POOL_FEEDS entry "${entry}" has invalid decimals "${decimalsRaw}"`,
                    { entry }
                );
            }
            return { poolId, shortFeedId, longFeedId, decimals: Number(decimalsRaw) };
        });
}

export function loadFeeEngineConfig(env: Env = process.env): FeeEngineEnvConfig {
    const poolFeedsRaw = readVar(env, 'POOL_FEEDS');

    return {
        curve: {
            minFee: readInteger(env, 'FEE_MIN', FEE_CONFIG.MIN_FEE),
            maxFee: readInteger(env, 'FEE_MAX', FEE_CONFIG.MAX_FEE),
            baseFee: readInteger(env, 'FEE_BASE', FEE_CONFIG.BASE_FEE),
            alpha: readVar(env, 'FEE_ALPHA') ?? FEE_CONFIG.ALPHA,
            beta: readVar(env, 'FEE_BETA') ?? FEE_CONFIG.BETA,
        },
        maxReadingAgeSeconds: readInteger(env, 'FEED_MAX_AGE_SECONDS', FEE_CONFIG.MAX_READING_AGE_SECONDS),
        feedApiUrl: readVar(env, 'FEED_API_URL'),
        feedTimeoutMs: readInteger(env, 'FEED_TIMEOUT_MS', FEE_CONFIG.FEED_TIMEOUT_MS),
        poolFeeds: poolFeedsRaw === null ? [] : parsePoolFeeds(poolFeedsRaw),
    };
}
