export * from './schema.js';
export * from './paths.js';
export * from './validator.js';
export * from './loader.js';
