export * from './benchmark-runner.js';
export * from './run-context.js';
