export * from './capability.js';
export * from './config.js';
export * from './document.js';
export * from './operation.js';
export * from './result.js';
