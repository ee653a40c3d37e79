export * from './reporter.js';
export * from './console-observer.js';
