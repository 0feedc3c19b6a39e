export * from './youtube.js';
export * from './transcript.js';
export * from './summary.js';
export * from './cache.js';
export * from './pipeline.js';
