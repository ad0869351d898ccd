export * from './fee';
export * from './feeds';
export * from './errors';
export { FixedPoint } from './math/fixedPoint';
export { FEE_CONFIG, DYNAMIC_FEE_FLAG, OVERRIDE_FEE_FLAG } from './config/constants';
export { loadFeeEngineConfig, parsePoolFeeds } from './config/env';
export type { FeeEngineEnvConfig, PoolFeedSpec } from './config/env';
export { default as logger } from './utils/logger';
