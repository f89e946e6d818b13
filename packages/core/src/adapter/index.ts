export * from './adapter.js';
export * from './base-adapter.js';
export * from './base-connection.js';
export * from './timing.js';
