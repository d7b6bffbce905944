export * from './types.js';
export * from './decide.js';
export * from './tree-source.js';
export * from './reconcile-port.js';
export * from './add-versions.js';
