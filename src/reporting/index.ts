export * from './logger.js';
export * from './aggregator.js';
