import type { Dataset } from './dataset/dataset.js';

import { renderRow, stripBrackets } from './dataset/cells.js';
import { schemaOf } from './dataset/dataset.js';
import { parseSchema, renderSchema, type SchemaSeparators } from './dataset/schema.js';
import {
  describeValue,
  LengthMismatchError,
  PatternNotFoundError,
  SchemaMismatchError,
  ValueMismatchError,
} from './errors.js';

export const DEFAULT_EPSILON = 0.01;

// Separator between expected row renderings in an expectation string.
export const EXPECTED_ROW_SEPARATOR = ';';

export type Comparator<T> = (left: T, right: T) => number;

/**
 * Numeric widening used by tolerance comparison. Anything that is not a number
 * lands in `fallback` and compares as the most negative finite double, so a
 * wrongly typed element shows up as an ordinary value mismatch.
 */
export type NumericCoercion =
  | { kind: 'real'; value: number }
  | { kind: 'integer'; value: number }
  | { kind: 'bigint'; value: bigint }
  | { kind: 'fallback'; original: unknown };

export const FALLBACK_REAL = -Number.MAX_VALUE;

export function coerceNumeric(value: unknown): NumericCoercion {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { kind: 'integer', value } : { kind: 'real', value };
  }
  if (typeof value === 'bigint') return { kind: 'bigint', value };
  return { kind: 'fallback', original: value };
}

export function toReal(coerced: NumericCoercion): number {
  switch (coerced.kind) {
    case 'real':
    case 'integer':
      return coerced.value;
    case 'bigint':
      return Number(coerced.value);
    case 'fallback':
      return FALLBACK_REAL;
  }
}

export function assertToleranceEqual(
  actual: readonly unknown[],
  expected: readonly number[],
  epsilon: number = DEFAULT_EPSILON,
): void {
  if (actual.length !== expected.length) throw new LengthMismatchError(actual.length, expected.length);
  actual.forEach((item, idx) => {
    const real = toReal(coerceNumeric(item));
    const want = expected[idx];
    if (!(Math.abs(real - want) < epsilon)) {
      throw new ValueMismatchError(idx, real, want, `epsilon ${String(epsilon)}`);
    }
  });
}

const TYPE_RANK: Record<string, number> = {
  undefined: 0,
  boolean: 1,
  number: 2,
  bigint: 2,
  string: 3,
  object: 4,
};

/**
 * Total order over plain values: null/undefined first, then booleans, numbers
 * (bigint included, NaN last among them), strings by code unit, Dates by time.
 * Any other pair of distinct values throws a `TypeError`.
 */
export const naturalOrder: Comparator<unknown> = (left, right) => {
  if (left === right) return 0;
  if (left === null || left === undefined) return right === null || right === undefined ? 0 : -1;
  if (right === null || right === undefined) return 1;
  const leftRank = TYPE_RANK[typeof left] ?? 5;
  const rightRank = TYPE_RANK[typeof right] ?? 5;
  if (leftRank !== rightRank) return leftRank - rightRank;
  if ((typeof left === 'number' || typeof left === 'bigint') && (typeof right === 'number' || typeof right === 'bigint')) {
    const leftNaN = typeof left === 'number' && Number.isNaN(left);
    const rightNaN = typeof right === 'number' && Number.isNaN(right);
    if (leftNaN || rightNaN) return leftNaN === rightNaN ? 0 : leftNaN ? 1 : -1;
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (typeof left === 'boolean' && typeof right === 'boolean') return Number(left) - Number(right);
  if (typeof left === 'string' && typeof right === 'string') return left < right ? -1 : 1;
  if (left instanceof Date && right instanceof Date) return left.getTime() - right.getTime();
  throw new TypeError(
    `no natural order between ${describeValue(left)} and ${describeValue(right)}; pass a comparator`,
  );
};

/**
 * Multiset equality: both sides are sorted and compared pairwise. A mismatch is
 * reported by its position in the sorted order.
 */
export function assertUnorderedEqual<T>(
  actual: readonly T[],
  expected: readonly T[],
  compare: Comparator<T> = naturalOrder,
): void {
  if (actual.length !== expected.length) throw new LengthMismatchError(actual.length, expected.length);
  const sortedActual = [...actual].sort(compare);
  const sortedExpected = [...expected].sort(compare);
  sortedActual.forEach((item, idx) => {
    const want = sortedExpected[idx];
    if (compare(item, want) !== 0) throw new ValueMismatchError(idx, item, want);
  });
}

/** Rows rendered as `v1,v2,...`; nulls as `null`, floating types with a fraction. */
export function renderDatasetRows(dataset: Dataset): string[] {
  const schema = schemaOf(dataset);
  return dataset.collect().map((row) => stripBrackets(renderRow(row, schema)));
}

export const splitExpectedRows = (expected: string): string[] =>
  expected.split(EXPECTED_ROW_SEPARATOR).map((line) => line.trim());

/** Compares rows with a `;`-separated expectation, ignoring row order. */
export function assertDatasetEqual(dataset: Dataset, expected: string): void {
  assertUnorderedEqual(renderDatasetRows(dataset), splitExpectedRows(expected));
}

/** Field order matters here, unlike row order in {@link assertDatasetEqual}. */
export function assertSchemaEqual(dataset: Dataset, expectedSchema: string, separators?: SchemaSeparators): void {
  const expectedText = renderSchema(parseSchema(expectedSchema, separators));
  const actualText = renderSchema(schemaOf(dataset));
  if (actualText !== expectedText) throw new SchemaMismatchError(actualText, expectedText);
}

/** Same schema, same rows in any order. */
export function assertDatasetsSame(expected: Dataset, actual: Dataset): void {
  const expectedText = renderSchema(schemaOf(expected));
  const actualText = renderSchema(schemaOf(actual));
  if (actualText !== expectedText) throw new SchemaMismatchError(actualText, expectedText);
  assertUnorderedEqual(renderDatasetRows(actual), renderDatasetRows(expected));
}

export function assertMatchesPattern(haystack: string, pattern: RegExp | string): void {
  const source = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
  // a global or sticky regex would resume from lastIndex
  const probe = new RegExp(source.source, source.flags.replace(/[gy]/g, ''));
  if (!probe.test(haystack)) throw new PatternNotFoundError(haystack, source);
}
