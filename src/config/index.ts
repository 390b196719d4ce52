export * from './types.js';
export * from './loader.js';
export * from './validator.js';
export * from './naming.js';
export * from './manifest.js';
