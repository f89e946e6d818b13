import { describe, expect, it } from 'vitest';
import {
  BenchError,
  CapabilityNotSupportedError,
  ConfigurationError,
  ConnectionError,
  ensureBenchError,
  OperationError,
  SetupError,
} from '../errors/bench-error.js';
import { getErrorCategory } from '../errors/error-codes.js';

describe('BenchError', () => {
  it('should derive the category from the code', () => {
    expect(getErrorCategory('BENCH_F100')).toBe('configuration');
    expect(getErrorCategory('BENCH_C202')).toBe('connection');
    expect(getErrorCategory('BENCH_O301')).toBe('operation');
    expect(getErrorCategory('BENCH_K400')).toBe('capability');
    expect(getErrorCategory('BENCH_S500')).toBe('setup');
    expect(getErrorCategory('BENCH_X900')).toBe('internal');
  });

  it('should fill message and suggestion from the code table', () => {
    const error = BenchError.fromCode('BENCH_S501');
    expect(error.message).toBe('Not connected');
    expect(error.suggestion).toBe('Call connect() before setting up the test environment.');
  });

  it('should format code, context and suggestion', () => {
    const error = new CapabilityNotSupportedError('explain-plan', 'memory');
    expect(error.format()).toBe(
      [
        '[BENCH_K400] Capability "explain-plan" not supported by adapter: memory',
        'Context: {"capability":"explain-plan","adapterId":"memory"}',
        'Suggestion: Check adapter.hasCapability() before relying on optional behavior.',
      ].join('\n')
    );
  });

  it('should serialize its cause', () => {
    const cause = new Error('ECONNREFUSED');
    const json = new ConnectionError('mongodb', 'Failed to connect', { cause }).toJSON();

    expect(json.code).toBe('BENCH_C200');
    expect(json.category).toBe('connection');
    expect(json.cause).toMatchObject({ name: 'Error', message: 'ECONNREFUSED' });
    expect(json.context).toEqual({ adapterId: 'mongodb' });
  });

  it('should aggregate configuration issues into one message', () => {
    const error = new ConfigurationError([
      { path: 'uri', message: 'is required' },
      { path: 'database', message: 'must not be empty' },
    ]);

    expect(error.message).toBe('Configuration validation failed: uri: is required; database: must not be empty');
    expect(error.issues).toHaveLength(2);
  });

  it('should carry operation identity', () => {
    const error = new OperationError('op-7', 'update', 'Document not found', { code: 'BENCH_O301' });
    expect(error).toMatchObject({ operationId: 'op-7', operationType: 'update', code: 'BENCH_O301' });
    expect(BenchError.isCategory(error, 'operation')).toBe(true);
  });

  it('should keep subclass identity for instanceof checks', () => {
    const error = new SetupError('boom');
    expect(error).toBeInstanceOf(SetupError);
    expect(error).toBeInstanceOf(BenchError);
    expect(error.name).toBe('SetupError');
  });

  describe('ensureBenchError', () => {
    it('should pass BenchErrors through', () => {
      const error = new SetupError('boom');
      expect(ensureBenchError(error)).toBe(error);
    });

    it('should wrap plain errors', () => {
      const wrapped = ensureBenchError(new TypeError('bad'));
      expect(wrapped.code).toBe('BENCH_X900');
      expect(wrapped.cause).toBeInstanceOf(TypeError);
    });

    it('should stringify other thrown values', () => {
      expect(ensureBenchError('nope').message).toBe('nope');
    });
  });
});
