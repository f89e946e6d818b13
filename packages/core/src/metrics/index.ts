export * from './breakdown-recorder.js';
export * from './histogram.js';
export * from './metrics-collector.js';
export * from './overhead-breakdown.js';
