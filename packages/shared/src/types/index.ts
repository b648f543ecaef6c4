export * from './readiness.js';
export * from './runtime.js';
export * from './exec.js';
export * from './logger.js';
