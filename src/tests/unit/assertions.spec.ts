import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  assertDatasetEqual,
  assertDatasetsSame,
  assertMatchesPattern,
  assertSchemaEqual,
  assertToleranceEqual,
  assertUnorderedEqual,
  coerceNumeric,
  FALLBACK_REAL,
  renderDatasetRows,
  toReal,
} from '../../assertions.js';
import { DRIVER_PORT_ENV, LocalComputeContext } from '../../compute/compute-context.js';
import { QuerySession } from '../../compute/query-session.js';
import {
  LengthMismatchError,
  PatternNotFoundError,
  SchemaMismatchError,
  ValueMismatchError,
} from '../../errors.js';

const captureError = (fn: () => void): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('assertToleranceEqual', () => {
  it('accepts values within epsilon', () => {
    expect(() => { assertToleranceEqual([1.001, 2.0], [1.0, 2.0], 0.01); }).not.toThrow();
  });

  it('reports the first pair outside epsilon', () => {
    const error = captureError(() => { assertToleranceEqual([1.02, 2.0], [1.0, 2.0], 0.01); });
    expect(error).toBeInstanceOf(ValueMismatchError);
    expect(error).toMatchObject({ kind: 'value_mismatch', index: 0, actual: 1.02, expected: 1 });
    expect(error).toHaveProperty('message', 'element 0: 1.02 not equal 1 (epsilon 0.01)');
  });

  it('uses a strict bound', () => {
    expect(() => { assertToleranceEqual([0.5], [0], 0.5); }).toThrow(ValueMismatchError);
  });

  it('defaults epsilon to 0.01', () => {
    expect(() => { assertToleranceEqual([3.005], [3]); }).not.toThrow();
    expect(() => { assertToleranceEqual([3.5], [3]); }).toThrow(ValueMismatchError);
  });

  it('widens integers and bigints', () => {
    expect(() => { assertToleranceEqual([1, 2n, 3.5], [1, 2, 3.5]); }).not.toThrow();
  });

  it('turns non-numeric elements into a value mismatch', () => {
    const error = captureError(() => { assertToleranceEqual([1, '2'], [1, 2]); });
    expect(error).toBeInstanceOf(ValueMismatchError);
    expect(error).toMatchObject({ index: 1, actual: FALLBACK_REAL, expected: 2 });
  });

  it('fails on length before comparing values', () => {
    const error = captureError(() => { assertToleranceEqual([1, 'x', 3], [1, 2]); });
    expect(error).toBeInstanceOf(LengthMismatchError);
    expect(error).toMatchObject({ kind: 'length_mismatch', actualLength: 3, expectedLength: 2 });
  });
});

describe('coerceNumeric', () => {
  it('tags each representation', () => {
    expect(coerceNumeric(4)).toEqual({ kind: 'integer', value: 4 });
    expect(coerceNumeric(4.5)).toEqual({ kind: 'real', value: 4.5 });
    expect(coerceNumeric(7n)).toEqual({ kind: 'bigint', value: 7n });
    expect(coerceNumeric('4')).toEqual({ kind: 'fallback', original: '4' });
    expect(coerceNumeric(null)).toEqual({ kind: 'fallback', original: null });
  });

  it('maps the fallback to the most negative double', () => {
    expect(toReal({ kind: 'fallback', original: true })).toBe(-Number.MAX_VALUE);
    expect(toReal({ kind: 'bigint', value: 9n })).toBe(9);
  });
});

describe('assertUnorderedEqual', () => {
  it('accepts permutations', () => {
    expect(() => { assertUnorderedEqual([3, 1, 2, 1], [1, 1, 2, 3]); }).not.toThrow();
    expect(() => { assertUnorderedEqual(['b', 'a'], ['a', 'b']); }).not.toThrow();
  });

  it('reports mismatches by position in sorted order', () => {
    const error = captureError(() => { assertUnorderedEqual(['b', 'a', 'a'], ['a', 'b', 'b']); });
    expect(error).toBeInstanceOf(ValueMismatchError);
    expect(error).toMatchObject({ index: 1, actual: 'a', expected: 'b' });
  });

  it('treats multiplicity as significant', () => {
    expect(() => { assertUnorderedEqual([1, 1, 2], [1, 2, 2]); }).toThrow(ValueMismatchError);
  });

  it('fails on length', () => {
    expect(() => { assertUnorderedEqual([1], [1, 1]); }).toThrow(LengthMismatchError);
  });

  it('does not reorder the caller arrays', () => {
    const actual = [2, 1];
    assertUnorderedEqual(actual, [1, 2]);
    expect(actual).toEqual([2, 1]);
  });

  it('sorts numbers numerically rather than as text', () => {
    expect(() => { assertUnorderedEqual([10, 9], [9, 10]); }).not.toThrow();
  });

  it('refuses structured elements without a comparator', () => {
    expect(() => { assertUnorderedEqual<unknown>([{ a: 1 }, [1, 2]], [{ a: 2 }, ['1,2']]); }).toThrow(TypeError);
    expect(() => { assertUnorderedEqual<unknown>([{ a: 1 }], [{ a: 1 }]); }).toThrow(
      'no natural order between {"a":1} and {"a":1}; pass a comparator',
    );
  });

  it('orders dates by time', () => {
    const early = new Date(Date.UTC(2024, 0, 1));
    const late = new Date(Date.UTC(2024, 5, 1));
    expect(() => { assertUnorderedEqual([late, early], [new Date(early.getTime()), new Date(late.getTime())]); }).not.toThrow();
  });

  it('accepts a comparator for structured elements', () => {
    const byId = (left: { id: number }, right: { id: number }): number => left.id - right.id;
    expect(() => { assertUnorderedEqual([{ id: 2 }, { id: 1 }], [{ id: 1 }, { id: 2 }], byId); }).not.toThrow();
    expect(() => { assertUnorderedEqual([{ id: 2 }], [{ id: 3 }], byId); }).toThrow(ValueMismatchError);
  });
});

describe('dataset assertions', () => {
  let ctx: LocalComputeContext;
  let session: QuerySession;

  beforeEach(() => {
    ctx = new LocalComputeContext({ name: 'assertions', parallelism: 2 });
    session = new QuerySession(ctx);
  });

  afterEach(() => {
    ctx.stop();
    delete process.env[DRIVER_PORT_ENV];
  });

  it('ignores row order', () => {
    const dataset = session.fromStrings('k:Integer;v:String', '1,a;2,b');
    expect(() => { assertDatasetEqual(dataset, '2,b; 1,a'); }).not.toThrow();
  });

  it('gives the same verdict for any row order in the dataset', () => {
    const expected = '1,a;2,b;3,c;4,d';
    const forward = session.fromStrings('k:Integer;v:String', '1,a;2,b;3,c;4,d');
    const backward = session.fromStrings('k:Integer;v:String', '4,d;3,c;2,b;1,a');
    const shuffled = session.fromStrings('k:Integer;v:String', '3,c;1,a;4,d;2,b');
    [forward, backward, shuffled].forEach((dataset) => {
      expect(() => { assertDatasetEqual(dataset, expected); }).not.toThrow();
      expect(() => { assertDatasetEqual(dataset, '1,a;2,b;3,c;4,x'); }).toThrow(ValueMismatchError);
    });
  });

  it('renders floating fields with a fraction and nulls as null', () => {
    const dataset = session.fromStrings('a:Integer; b:Double; c:String', '1,2.0,hello; 2,,hello2; ,10.5,');
    expect(renderDatasetRows(dataset).sort()).toEqual(['1,2.0,hello', '2,null,hello2', 'null,10.5,null']);
    expect(() => { assertDatasetEqual(dataset, 'null,10.5,null;1,2.0,hello;2,null,hello2'); }).not.toThrow();
  });

  it('reports the mismatching rendered row', () => {
    const dataset = session.fromStrings('k:Integer;v:String', '1,a;2,b');
    const error = captureError(() => { assertDatasetEqual(dataset, '1,a; 3,c'); });
    expect(error).toMatchObject({ index: 1, actual: '2,b', expected: '3,c' });
  });

  it('fails when the row counts differ', () => {
    const dataset = session.fromStrings('k:Integer', '1;2');
    expect(() => { assertDatasetEqual(dataset, '1'); }).toThrow(LengthMismatchError);
  });

  it('compares schemas with field order', () => {
    const dataset = session.fromStrings('b:Integer;a:String', '1,x');
    const error = captureError(() => { assertSchemaEqual(dataset, 'a:String;b:Integer'); });
    expect(error).toBeInstanceOf(SchemaMismatchError);
    expect(error).toMatchObject({
      kind: 'schema_mismatch',
      actualSchema: 'b: Integer; a: String',
      expectedSchema: 'a: String; b: Integer',
    });
  });

  it('accepts equivalent schema spellings', () => {
    const dataset = session.fromStrings('b:Integer;a:String', '1,x');
    expect(() => { assertSchemaEqual(dataset, ' b : integer ;a:string; '); }).not.toThrow();
  });

  it('compares two datasets by schema and rows', () => {
    const expected = session.fromStrings('a:String;b:Integer', 'x,1;y,2');
    const same = session.fromStrings('a:String;b:Integer', 'y,2;x,1');
    const otherRows = session.fromStrings('a:String;b:Integer', 'y,2;x,3');
    const otherSchema = session.fromStrings('a:String;b:Long', 'x,1;y,2');

    expect(() => { assertDatasetsSame(expected, same); }).not.toThrow();
    expect(() => { assertDatasetsSame(expected, otherRows); }).toThrow(ValueMismatchError);
    expect(() => { assertDatasetsSame(expected, otherSchema); }).toThrow(SchemaMismatchError);
  });
});

describe('assertMatchesPattern', () => {
  it('finds a match anywhere in the haystack', () => {
    expect(() => { assertMatchesPattern('context local[2] started', /local\[\d\]/); }).not.toThrow();
    expect(() => { assertMatchesPattern('context local[2] started', 'started$'); }).not.toThrow();
  });

  it('reports both the haystack and the pattern', () => {
    const error = captureError(() => { assertMatchesPattern('abc', /z+/); });
    expect(error).toBeInstanceOf(PatternNotFoundError);
    expect(error).toHaveProperty('message', '"abc" does not match /z+/');
  });

  it('ignores the lastIndex of global patterns', () => {
    const pattern = /a/g;
    pattern.lastIndex = 2;
    expect(() => { assertMatchesPattern('abc', pattern); }).not.toThrow();
  });
});
