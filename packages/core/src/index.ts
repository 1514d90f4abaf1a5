/**
 * @quotapass/core: Shared types, validation schemas, and utilities
 */

export * from './types.js';
export * from './schemas.js';
export * from './constants.js';
export * from './errors.js';
export * from './plans.js';
export * from './quota-day.js';
