export * from './types.js';
export * from './environment-generators.js';
export * from './template-engine.js';
export * from './summary-report.js';
export * from './starter-config.js';
