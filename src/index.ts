// Main entry point for the Cloud Run deployment pipeline
export * from './types/index.js';
export * from './config/index.js';
export * from './provisioning/index.js';
export * from './orchestration/index.js';
export * from './reporting/index.js';
export { createProgram } from './program.js';
