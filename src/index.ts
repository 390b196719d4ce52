// Main entry point for the SIF provisioner
export * from './types/index.js';
export * from './config/index.js';
export * from './provisioning/index.js';
export * from './orchestration/index.js';
export * from './reporting/index.js';
export * from './templates/index.js';

// Main provisioning function
export { provision } from './orchestration/provisioning-orchestrator.js';
