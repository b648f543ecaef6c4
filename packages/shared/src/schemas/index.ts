export * from './target.js';
export * from './config.js';
