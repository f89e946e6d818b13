import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors/bench-error.js';
import {
  connectionConfigSchema,
  getBooleanOption,
  getIntOption,
  getStringOption,
  parseTestEnvironmentConfig,
  requireValid,
  validateWith,
  type ConnectionConfig,
} from '../types/config.js';

function config(options: ConnectionConfig['options']): ConnectionConfig {
  return { database: 'bench', options };
}

describe('connection configuration', () => {
  it('should default options to an empty record', () => {
    const result = validateWith(connectionConfigSchema, { database: 'bench' });
    expect(result.valid).toBe(true);
    if (result.valid) expect(result.value.options).toEqual({});
  });

  it('should report every problem with its path', () => {
    const result = validateWith(connectionConfigSchema, { uri: '', options: { poolSize: [] } });

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.path).sort()).toEqual(['database', 'options.poolSize', 'uri']);
  });

  it('should throw one ConfigurationError listing all issues', () => {
    const result = validateWith(connectionConfigSchema, { uri: '' });
    try {
      requireValid(result);
      expect.unreachable('validation should fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toHaveLength(2);
        expect(error.code).toBe('BENCH_F100');
      }
    }
  });
});

describe('option accessors', () => {
  it('should fall back to defaults', () => {
    expect(getIntOption(config({}), 'maxPoolSize', 100)).toBe(100);
    expect(getStringOption(config({}), 'tableName', 'benchmark_docs')).toBe('benchmark_docs');
    expect(getBooleanOption(config({}), 'directConnection', false)).toBe(false);
  });

  it('should accept numeric strings for integers', () => {
    expect(getIntOption(config({ maxPoolSize: '25' }), 'maxPoolSize', 100)).toBe(25);
    expect(getIntOption(config({ maxPoolSize: 10 }), 'maxPoolSize', 100)).toBe(10);
  });

  it('should reject non-integer values', () => {
    expect(() => getIntOption(config({ maxPoolSize: 'many' }), 'maxPoolSize', 100)).toThrow(ConfigurationError);
    expect(() => getIntOption(config({ maxPoolSize: 2.5 }), 'maxPoolSize', 100)).toThrow(/options\.maxPoolSize/);
  });

  it('should parse boolean strings', () => {
    expect(getBooleanOption(config({ directConnection: 'true' }), 'directConnection', false)).toBe(true);
    expect(() => getBooleanOption(config({ directConnection: 'yes' }), 'directConnection', false)).toThrow(
      ConfigurationError
    );
  });
});

describe('test environment configuration', () => {
  it('should apply defaults', () => {
    expect(parseTestEnvironmentConfig()).toEqual({
      collectionName: 'benchmark_docs',
      dropExisting: true,
      indexes: [],
    });
  });

  it('should reject unsafe collection names', () => {
    expect(() => parseTestEnvironmentConfig({ collectionName: 'docs; DROP TABLE x' })).toThrow(ConfigurationError);
  });
});
