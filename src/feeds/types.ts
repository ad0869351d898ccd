/**
 * Volatility feed contract.
 *
 * A feed reports a signed volatility value scaled by the decimals of the
 * binding that uses it (decimals 5: 400000 = 4%).
 */

export interface FeedReading {
    /** Scaled volatility value */
    value: bigint;

    /** Unix seconds at which the value was produced */
    timestamp: number;

    /** Monotonic round counter of the source */
    roundId: bigint;
}

export interface VolatilityFeed {
    /** Identifier used in logs and errors */
    readonly id: string;

    /** One read of the current value. Rejects if the source has no value. */
    latestReading(): Promise<FeedReading>;
}
