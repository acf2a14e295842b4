export * from './utils/decimal-utils.js';
export * from './utils/type-guard-utils.js';
export * from './utils/zod-utils.js';
export * from './schemas/primitives.js';
export * from './schemas/venue-catalog.js';
export * from './schemas/identity-match.js';
