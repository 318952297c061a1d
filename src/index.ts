// Backup Mail Monitor - Main exports
export * from './types.js';
export * from './window.js';
export * from './classifier.js';
export * from './aggregator.js';
export * from './parser.js';
export * from './connector.js';
export * from './scanner.js';
export * from './reconciler.js';
export * from './report.js';
export * from './dispatcher.js';
export * from './scheduler.js';
export * from './settings.js';
export * from './storage.js';
export * from './config.js';
export * from './logging.js';
export * from './errors.js';
export { ErrorClassifier, describeTransportError } from './error-classifier.js';
export * from './engine.js';
