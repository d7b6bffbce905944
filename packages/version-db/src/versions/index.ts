export * from './types.js';
export * from './dot-version.js';
export * from './date-version.js';
export * from './compare.js';
export * from './scheme-check.js';
