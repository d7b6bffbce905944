export * from './types.js';
export * from './paragraphs.js';
export * from './control-file.js';
export * from './manifest-schema.js';
export * from './manifest-parser.js';
export * from './manifest-serializer.js';
export * from './port-loader.js';
