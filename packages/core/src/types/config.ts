/**
 * Connection and test-environment configuration.
 *
 * Shapes are declared once as zod schemas; the TypeScript types are inferred
 * from them. Adapters extend {@link connectionConfigSchema} with
 * `superRefine` so every problem is reported in one pass.
 *
 * @module types/config
 */

import { z } from 'zod';
import { ConfigurationError, type FieldIssue } from '../errors/bench-error.js';

export const optionValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export type OptionValue = z.infer<typeof optionValueSchema>;

export const connectionConfigSchema = z.object({
  /** Endpoint URI or connect string */
  uri: z.string().min(1, 'must not be empty').optional(),
  database: z.string({ required_error: 'is required' }).min(1, 'must not be empty'),
  username: z.string().optional(),
  password: z.string().optional(),
  /** Adapter-specific tuning options */
  options: z.record(optionValueSchema).default({}),
});

/**
 * Validated connection parameters
 */
export type ConnectionConfig = z.infer<typeof connectionConfigSchema>;

/**
 * Connection parameters as callers write them (`options` may be omitted)
 */
export type ConnectionConfigInput = z.input<typeof connectionConfigSchema>;

export const indexDefinitionSchema = z.object({
  name: z.string().min(1).optional(),
  /** Dotted document paths, in key order */
  fields: z.array(z.string().min(1)).min(1, 'must name at least one field'),
});

export type IndexDefinition = z.infer<typeof indexDefinitionSchema>;

export const testEnvironmentConfigSchema = z.object({
  collectionName: z
    .string()
    .min(1, 'must not be empty')
    .regex(/^[A-Za-z][A-Za-z0-9_]*$/, 'must start with a letter and contain only letters, digits and _')
    .default('benchmark_docs'),
  dropExisting: z.boolean().default(true),
  indexes: z.array(indexDefinitionSchema).default([]),
});

export type TestEnvironmentConfig = z.infer<typeof testEnvironmentConfigSchema>;

export type TestEnvironmentConfigInput = z.input<typeof testEnvironmentConfigSchema>;

/**
 * Outcome of validating configuration
 */
export type ValidationResult<T> =
  | { readonly valid: true; readonly value: T; readonly errors: readonly FieldIssue[] }
  | { readonly valid: false; readonly errors: readonly FieldIssue[] };

/**
 * Run a schema and collect every issue with its field path
 */
export function validateWith<S extends z.ZodTypeAny>(schema: S, input: unknown): ValidationResult<z.infer<S>> {
  const result = schema.safeParse(input);

  if (result.success) {
    return { valid: true, value: result.data, errors: [] };
  }

  const errors: FieldIssue[] = result.error.errors.map((e) => ({
    path: e.path.length > 0 ? e.path.join('.') : '(root)',
    message: e.message,
  }));

  return { valid: false, errors };
}

/**
 * Return the validated value or throw one {@link ConfigurationError} naming every issue
 */
export function requireValid<T>(result: ValidationResult<T>, context?: Record<string, unknown>): T {
  if (result.valid) return result.value;
  throw new ConfigurationError([...result.errors], context);
}

export function parseTestEnvironmentConfig(input: TestEnvironmentConfigInput = {}): TestEnvironmentConfig {
  return requireValid(validateWith(testEnvironmentConfigSchema, input));
}

// ── Option accessors ─────────────────────────────────────────────────

function invalidOption(name: string, expected: string, value: OptionValue): ConfigurationError {
  return new ConfigurationError([
    { path: `options.${name}`, message: `expected ${expected}, got ${JSON.stringify(value)}` },
  ]);
}

/**
 * Integer option; numeric strings are accepted
 */
export function getIntOption(config: ConnectionConfig, name: string, defaultValue: number): number {
  const value = config.options[name];
  if (value === undefined) return defaultValue;

  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  if (!Number.isInteger(parsed) || (typeof value === 'string' && value.trim() === '')) {
    throw invalidOption(name, 'an integer', value);
  }
  return parsed;
}

export function getStringOption(config: ConnectionConfig, name: string, defaultValue: string): string {
  const value = config.options[name];
  if (value === undefined) return defaultValue;
  return String(value);
}

/**
 * Boolean option; `"true"` and `"false"` strings are accepted
 */
export function getBooleanOption(config: ConnectionConfig, name: string, defaultValue: boolean): boolean {
  const value = config.options[name];
  if (value === undefined) return defaultValue;
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw invalidOption(name, 'a boolean', value);
}

/**
 * Integer option that must be zero or more
 */
export function intOptionIssue(options: Record<string, OptionValue>, name: string): FieldIssue | undefined {
  const value = options[name];
  if (value === undefined) return undefined;
  const parsed = typeof value === 'number' ? value : Number(String(value).trim());
  if (String(value).trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    return { path: `options.${name}`, message: 'must be a non-negative integer' };
  }
  return undefined;
}
