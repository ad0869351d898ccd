export type { FeedReading, VolatilityFeed } from './types';
export { StaticVolatilityFeed } from './staticFeed';
export { HttpVolatilityFeed } from './httpFeed';
export type { HttpFeedOptions } from './httpFeed';
