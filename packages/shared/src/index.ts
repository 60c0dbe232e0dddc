export * from './types/benchmark.js';
export * from './schemas/index.js';
