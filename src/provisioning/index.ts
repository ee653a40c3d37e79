export * from './types.js';
export * from './command-runner.js';
export * from './gcloud-cli.js';
export * from './build-manager.js';
export * from './service-manager.js';
export * from './health-prober.js';
