export * from './types.js';
export * from './dispatcher.js';
export * from './provisioning-orchestrator.js';
