export * from './types/index.js';
export * from './utils/record.js';
