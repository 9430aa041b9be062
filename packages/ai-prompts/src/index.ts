export * from './vc-extraction.js';
