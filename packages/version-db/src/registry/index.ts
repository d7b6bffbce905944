export * from './paths.js';
export * from './schema.js';
export * from './version-history-store.js';
export * from './baseline-registry.js';
