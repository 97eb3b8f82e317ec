import type { CellValue, FieldType, Row, SchemaDescription } from '../types.js';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(\.\d{1,3})?$/;

/** Converts one trimmed text field; empty input is null. Returns an error string on bad input. */
export function parseCell(raw: string, type: FieldType): { value: CellValue } | { error: string } {
  if (raw.length === 0) return { value: null };
  switch (type) {
    case 'String':
      return { value: raw };
    case 'Integer': {
      if (!INTEGER_PATTERN.test(raw)) return { error: `'${raw}' is not an Integer` };
      const parsed = Number.parseInt(raw, 10);
      if (parsed < INT32_MIN || parsed > INT32_MAX) return { error: `'${raw}' is out of Integer range` };
      return { value: parsed };
    }
    case 'Long': {
      if (!INTEGER_PATTERN.test(raw)) return { error: `'${raw}' is not a Long` };
      const big = BigInt(raw);
      if (big >= BigInt(Number.MIN_SAFE_INTEGER) && big <= BigInt(Number.MAX_SAFE_INTEGER)) {
        return { value: Number(big) };
      }
      return { value: big };
    }
    case 'Float':
    case 'Double': {
      const parsed = Number(raw);
      if (Number.isNaN(parsed) && raw !== 'NaN') return { error: `'${raw}' is not a ${type}` };
      return { value: parsed };
    }
    case 'Boolean': {
      const lowered = raw.toLowerCase();
      if (lowered === 'true') return { value: true };
      if (lowered === 'false') return { value: false };
      return { error: `'${raw}' is not a Boolean` };
    }
    case 'Decimal':
      if (!DECIMAL_PATTERN.test(raw)) return { error: `'${raw}' is not a Decimal` };
      return { value: raw };
    case 'Date': {
      const match = DATE_PATTERN.exec(raw);
      if (match === null) return { error: `'${raw}' is not a Date (yyyy-MM-dd)` };
      return { value: new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]))) };
    }
    case 'Timestamp': {
      const match = TIMESTAMP_PATTERN.exec(raw);
      if (match === null) return { error: `'${raw}' is not a Timestamp (yyyy-MM-dd HH:mm:ss)` };
      const millis = match[7] !== undefined ? Math.round(Number(match[7]) * 1000) : 0;
      return {
        value: new Date(Date.UTC(
          Number(match[1]),
          Number(match[2]) - 1,
          Number(match[3]),
          Number(match[4]),
          Number(match[5]),
          Number(match[6]),
          millis,
        )),
      };
    }
  }
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

function renderDate(value: Date): string {
  return `${pad(value.getUTCFullYear(), 4)}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
}

function renderTimestamp(value: Date): string {
  const time = `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`;
  const fraction = value.getUTCMilliseconds() === 0
    ? '0'
    : pad(value.getUTCMilliseconds(), 3).replace(/0+$/, '');
  return `${renderDate(value)} ${time}.${fraction}`;
}

function renderNumber(value: number, type: FieldType | undefined): string {
  if ((type === 'Double' || type === 'Float') && Number.isInteger(value)) return value.toFixed(1);
  return String(value);
}

/** Text form of a single cell; floating types always carry a fraction (`2.0`). */
export function renderCell(value: CellValue, type?: FieldType): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return renderNumber(value, type);
  if (value instanceof Date) return type === 'Date' ? renderDate(value) : renderTimestamp(value);
  return String(value);
}

/** Bracketed row rendering, e.g. `[1,a,2.0]`. */
export function renderRow(row: Row, schema: SchemaDescription): string {
  const cells = row.map((value, idx) => renderCell(value, schema.fields[idx]?.type));
  return `[${cells.join(',')}]`;
}

export function stripBrackets(rendered: string): string {
  const withoutPrefix = rendered.startsWith('[') ? rendered.slice(1) : rendered;
  return withoutPrefix.endsWith(']') ? withoutPrefix.slice(0, -1) : withoutPrefix;
}
