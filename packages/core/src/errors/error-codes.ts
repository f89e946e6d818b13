/**
 * Benchmark Error Codes
 *
 * Error codes are structured as BENCH_[CATEGORY][NUMBER]:
 * - F: Configuration and input errors (F100-F199)
 * - C: Connection errors (C200-C299)
 * - O: Operation errors (O300-O399)
 * - K: Capability errors (K400-K499)
 * - S: Setup errors (S500-S599)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Configuration errors (F100-F199)
  BENCH_F100: {
    code: 'BENCH_F100',
    message: 'Invalid configuration',
    suggestion: 'Fix every listed configuration problem before connecting.',
  },
  BENCH_F101: {
    code: 'BENCH_F101',
    message: 'Invalid breakdown duration',
    suggestion: 'Durations must be finite, non-negative nanosecond values.',
  },
  BENCH_F102: {
    code: 'BENCH_F102',
    message: 'Invalid operation',
    suggestion: 'Operation ids, document ids and update paths must be non-empty strings.',
  },

  // Connection errors (C200-C299)
  BENCH_C200: {
    code: 'BENCH_C200',
    message: 'Connection failed',
    suggestion: 'Check that the endpoint is reachable from this host.',
  },
  BENCH_C201: {
    code: 'BENCH_C201',
    message: 'Authentication failed',
    suggestion: 'Check the username and password for this endpoint.',
  },
  BENCH_C202: {
    code: 'BENCH_C202',
    message: 'Connection is closed',
    suggestion: 'Open a new connection with connect() before executing operations.',
  },

  // Operation errors (O300-O399)
  BENCH_O300: {
    code: 'BENCH_O300',
    message: 'Operation failed',
    suggestion: 'Inspect the cause for the backend error.',
  },
  BENCH_O301: {
    code: 'BENCH_O301',
    message: 'Document not found',
    suggestion: 'Load the workload documents before reading, updating or deleting them.',
  },
  BENCH_O302: {
    code: 'BENCH_O302',
    message: 'Duplicate document id',
    suggestion: 'Use unique document ids or drop the collection during setup.',
  },
  BENCH_O303: {
    code: 'BENCH_O303',
    message: 'Invalid aggregation pipeline',
    suggestion: 'Each pipeline stage must be a JSON object with a single stage operator.',
  },

  // Capability errors (K400-K499)
  BENCH_K400: {
    code: 'BENCH_K400',
    message: 'Capability not supported',
    suggestion: 'Check adapter.hasCapability() before relying on optional behavior.',
  },

  // Setup errors (S500-S599)
  BENCH_S500: {
    code: 'BENCH_S500',
    message: 'Test environment setup failed',
    suggestion: 'Check that the user may create and drop collections or tables.',
  },
  BENCH_S501: {
    code: 'BENCH_S501',
    message: 'Not connected',
    suggestion: 'Call connect() before setting up the test environment.',
  },

  // Internal errors (X900-X999)
  BENCH_X900: {
    code: 'BENCH_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory =
  | 'configuration'
  | 'connection'
  | 'operation'
  | 'capability'
  | 'setup'
  | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(6);
  switch (letter) {
    case 'F':
      return 'configuration';
    case 'C':
      return 'connection';
    case 'O':
      return 'operation';
    case 'K':
      return 'capability';
    case 'S':
      return 'setup';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
