// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Time
export * from './time/time-source.js';

// Metrics
export * from './metrics/index.js';

// Correlation
export * from './correlation/correlation-tracker.js';

// Traversal
export * from './traversal/traversal-timer.js';

// Adapter SPI
export * from './adapter/index.js';

// Runs
export * from './run/index.js';

// Observability
export * from './observability/index.js';
