export * from './types.js';
export * from './store-inspector.js';
export * from './artifact-worker.js';
export * from './apptainer-fetcher.js';
