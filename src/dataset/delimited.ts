import type { CsvAttributes, Row, SchemaDescription } from '../types.js';

import { DataParseError } from '../errors.js';

import { parseCell } from './cells.js';

export const DEFAULT_CSV_ATTRIBUTES: CsvAttributes = {
  delimiter: ',',
  quoteChar: '"',
  hasHeader: true,
};

// Inline data strings have no header row.
export const INLINE_DATA_ATTRIBUTES: CsvAttributes = {
  delimiter: ',',
  quoteChar: '"',
  hasHeader: false,
};

export const INLINE_ROW_SEPARATOR = ';';

/**
 * Splits one record on `delimiter`, honouring `quoteChar` quoting with doubled
 * quotes as the escape. Unquoted fields are trimmed; quoted ones are kept verbatim.
 */
export function splitDelimited(line: string, delimiter: string, quoteChar: string): string[] {
  if (delimiter.length === 0) throw new TypeError('delimiter must not be empty');
  const fields: string[] = [];
  let current = '';
  let quoted = false;
  let wasQuoted = false;
  let idx = 0;
  while (idx < line.length) {
    const ch = line[idx];
    if (quoted) {
      if (ch === quoteChar) {
        if (line[idx + 1] === quoteChar) {
          current += quoteChar;
          idx += 2;
          continue;
        }
        quoted = false;
        idx += 1;
        continue;
      }
      current += ch;
      idx += 1;
      continue;
    }
    if (quoteChar.length > 0 && ch === quoteChar && current.trim().length === 0) {
      quoted = true;
      wasQuoted = true;
      current = '';
      idx += 1;
      continue;
    }
    if (line.startsWith(delimiter, idx)) {
      fields.push(wasQuoted ? current : current.trim());
      current = '';
      wasQuoted = false;
      idx += delimiter.length;
      continue;
    }
    current += ch;
    idx += 1;
  }
  fields.push(wasQuoted ? current : current.trim());
  return fields;
}

export function parseRecords(
  records: readonly string[],
  schema: SchemaDescription,
  attributes: CsvAttributes,
): Row[] {
  const arity = schema.fields.length;
  return records.map((record, rowIdx) => {
    const raw = splitDelimited(record, attributes.delimiter, attributes.quoteChar);
    if (raw.length !== arity) {
      throw new DataParseError(rowIdx, `expected ${String(arity)} fields but found ${String(raw.length)} in "${record}"`);
    }
    return raw.map((text, fieldIdx) => {
      const field = schema.fields[fieldIdx];
      const parsed = parseCell(text, field.type);
      if ('error' in parsed) {
        throw new DataParseError(rowIdx, `field '${field.name}': ${parsed.error}`);
      }
      return parsed.value;
    });
  });
}

/** Rows of an inline data string: records separated by `;`, blank records skipped. */
export function parseInlineData(data: string, schema: SchemaDescription): Row[] {
  const records = data
    .split(INLINE_ROW_SEPARATOR)
    .map((record) => record.trim())
    .filter((record) => record.length > 0);
  return parseRecords(records, schema, INLINE_DATA_ATTRIBUTES);
}

/** Rows of a delimited file body; blank lines are skipped, the header too when present. */
export function parseDelimitedText(text: string, schema: SchemaDescription, attributes: CsvAttributes): Row[] {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const records = attributes.hasHeader ? lines.slice(1) : lines;
  return parseRecords(records, schema, attributes);
}
