export * from './types.js';
export * from './confirmation-gate.js';
export * from './preflight-checker.js';
export * from './deployment-orchestrator.js';
