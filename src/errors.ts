export type AssertionErrorKind =
  | 'length_mismatch'
  | 'value_mismatch'
  | 'schema_mismatch'
  | 'pattern_not_found';

export type LifecycleMisuseKind =
  | 'not_started'
  | 'already_started'
  | 'context_stopped'
  | 'scratch_missing';

type ErrorDetails = Record<string, unknown>;

export class HarnessAssertionError extends Error {
  readonly kind: AssertionErrorKind;
  readonly details?: ErrorDetails;

  constructor(kind: AssertionErrorKind, message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'HarnessAssertionError';
    this.kind = kind;
    if (details !== undefined) {
      this.details = details;
    }
  }
}

export class LengthMismatchError extends HarnessAssertionError {
  readonly actualLength: number;
  readonly expectedLength: number;

  constructor(actualLength: number, expectedLength: number) {
    super('length_mismatch', `expected ${String(expectedLength)} elements but got ${String(actualLength)}`);
    this.name = 'LengthMismatchError';
    this.actualLength = actualLength;
    this.expectedLength = expectedLength;
  }
}

export class ValueMismatchError extends HarnessAssertionError {
  readonly index: number;
  readonly actual: unknown;
  readonly expected: unknown;

  constructor(index: number, actual: unknown, expected: unknown, reason?: string) {
    const suffix = reason !== undefined ? ` (${reason})` : '';
    super(
      'value_mismatch',
      `element ${String(index)}: ${describeValue(actual)} not equal ${describeValue(expected)}${suffix}`,
    );
    this.name = 'ValueMismatchError';
    this.index = index;
    this.actual = actual;
    this.expected = expected;
  }
}

export class SchemaMismatchError extends HarnessAssertionError {
  readonly actualSchema: string;
  readonly expectedSchema: string;

  constructor(actualSchema: string, expectedSchema: string) {
    super('schema_mismatch', `schema "${actualSchema}" does not equal expected "${expectedSchema}"`);
    this.name = 'SchemaMismatchError';
    this.actualSchema = actualSchema;
    this.expectedSchema = expectedSchema;
  }
}

export class PatternNotFoundError extends HarnessAssertionError {
  readonly haystack: string;
  readonly pattern: RegExp;

  constructor(haystack: string, pattern: RegExp) {
    super('pattern_not_found', `"${haystack}" does not match ${pattern.toString()}`);
    this.name = 'PatternNotFoundError';
    this.haystack = haystack;
    this.pattern = pattern;
  }
}

export class LifecycleMisuseError extends Error {
  readonly kind: LifecycleMisuseKind;

  constructor(kind: LifecycleMisuseKind, message: string) {
    super(message);
    this.name = 'LifecycleMisuseError';
    this.kind = kind;
  }
}

export class SchemaParseError extends Error {
  readonly entry: string;

  constructor(entry: string, message: string) {
    super(`invalid schema entry "${entry}": ${message}`);
    this.name = 'SchemaParseError';
    this.entry = entry;
  }
}

export class DataParseError extends Error {
  readonly row: number;

  constructor(row: number, message: string) {
    super(`row ${String(row)}: ${message}`);
    this.name = 'DataParseError';
    this.row = row;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const isHarnessAssertionError = (value: unknown): value is HarnessAssertionError =>
  value instanceof HarnessAssertionError;

export const isLifecycleMisuseError = (value: unknown): value is LifecycleMisuseError =>
  value instanceof LifecycleMisuseError;

export const describeError = (value: unknown): string => {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  return describeValue(value);
};

export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) return value.toISOString();
  try {
    return JSON.stringify(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}
