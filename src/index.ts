export * from './core/index.js';
export * from './types/index.js';
