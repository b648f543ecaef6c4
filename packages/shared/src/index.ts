/**
 * @readycheck/shared - Shared Types, Schemas, Constants & Errors
 * Central package for all shared definitions across readycheck
 */

// Types
export * from './types/index.js';

// Schemas
export * from './schemas/index.js';

// Constants
export * from './constants/index.js';

// Errors
export * from './errors/index.js';
