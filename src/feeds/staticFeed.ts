import { FeedReading, VolatilityFeed } from './types';

/**
 * In-memory feed holding the latest answer.
 * Every update starts a new round.
 */
export class StaticVolatilityFeed implements VolatilityFeed {
    private reading: FeedReading;
    private failure: Error | null = null;

    constructor(
        public readonly id: string,
        initialValue: bigint,
        timestamp: number = Math.floor(Date.now() / 1000)
    ) {
        this.reading = { value: initialValue, timestamp, roundId: 1n };
    }

    update(value: bigint, timestamp: number = Math.floor(Date.now() / 1000)): void {
        this.reading = { value, timestamp, roundId: this.reading.roundId + 1n };
        this.failure = null;
    }

    /**
     * Make subsequent reads reject until the next update.
     */
    fail(error: Error): void {
        this.failure = error;
    }

    async latestReading(): Promise<FeedReading> {
        if (this.failure) {
            throw this.failure;
        }
        return { ...this.reading };
    }
}
