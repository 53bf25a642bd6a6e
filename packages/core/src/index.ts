export * from './errors/index.js';
export * from './model/pricing.js';
export * from './model/swap.js';
export * from './utils/decimal-utils.js';
export * from './utils/time-utils.js';
export * from './utils/type-guard-utils.js';
