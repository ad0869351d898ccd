import axios, { AxiosInstance } from 'axios';
import { FeedReadFailure } from '../errors';
import logger from '../utils/logger';
import { FeedReading, VolatilityFeed } from './types';

/**
 * Body of GET {baseUrl}/feeds/{feedId}/latest
 */
interface LatestReadingResponse {
    value: string | number;
    timestamp: number;
    roundId: string | number;
}

export interface HttpFeedOptions {
    baseUrl: string;
    feedId: string;
    timeoutMs?: number;
    /** Pre-built client; baseUrl and timeout are ignored when given */
    client?: AxiosInstance;
}

const INTEGER_PATTERN = /^-?\d+$/;

function parseInteger(raw: unknown): bigint | null {
    if (typeof raw === 'number' && Number.isSafeInteger(raw)) {
        return BigInt(raw);
    }
    if (typeof raw === 'string' && INTEGER_PATTERN.test(raw.trim())) {
        return BigInt(raw.trim());
    }
    return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Volatility feed served by an oracle HTTP API.
 * One GET per read, no retries and no caching.
 */
export class HttpVolatilityFeed implements VolatilityFeed {
    public readonly id: string;
    private readonly client: AxiosInstance;

    constructor(options: HttpFeedOptions) {
        this.id = options.feedId;
        this.client = options.client ?? axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs ?? 5000,
            headers: { Accept: 'application/json' },
        });
    }

    async latestReading(): Promise<FeedReading> {
        let body: unknown;
        try {
            const response = await this.client.get<LatestReadingResponse>(
                `/feeds/${encodeURIComponent(this.id)}/latest`
            );
            body = response.data;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`[FEED] ${this.id} request failed: ${message}`);
            throw new FeedReadFailure(this.id, `request failed: ${message}`, error);
        }

        if (!isRecord(body)) {
            throw new FeedReadFailure(this.id, 'response body is not an object');
        }

        const value = parseInteger(body.value);
        const roundId = parseInteger(body.roundId);
        const timestamp = body.timestamp;

        if (value === null) {
            throw new FeedReadFailure(this.id, `invalid value ${String(body.value)}`);
        }
        if (roundId === null) {
            throw new FeedReadFailure(this.id, `invalid roundId ${String(body.roundId)}`);
        }
        if (typeof timestamp !== 'number' || !Number.isSafeInteger(timestamp) || timestamp < 0) {
            throw new FeedReadFailure(this.id, `invalid timestamp ${String(timestamp)}`);
        }

        return { value, timestamp, roundId };
    }
}
