import type { FieldType, SchemaDescription, SchemaField } from '../types.js';

import { SchemaParseError } from '../errors.js';

/**
 * Compact schema strings list fields as `name:Type` entries separated by `;`
 * (newlines also separate entries, so `.schema` files may hold one per line).
 * Entries starting with `#` are comments. The canonical rendering is
 * `name: Type; name: Type` and parses back to the same schema.
 */
export const DEFAULT_FIELD_SEPARATOR = ';';
export const DEFAULT_TYPE_SEPARATOR = ':';

export const FIELD_TYPES: readonly FieldType[] = [
  'String',
  'Integer',
  'Long',
  'Float',
  'Double',
  'Boolean',
  'Decimal',
  'Date',
  'Timestamp',
];

const FIELD_TYPE_BY_LOWER = new Map<string, FieldType>(FIELD_TYPES.map((type) => [type.toLowerCase(), type]));

export interface SchemaSeparators {
  fieldSeparator?: string;
  typeSeparator?: string;
}

export function parseFieldType(raw: string): FieldType | undefined {
  return FIELD_TYPE_BY_LOWER.get(raw.trim().toLowerCase());
}

export function parseSchema(text: string, separators: SchemaSeparators = {}): SchemaDescription {
  const fieldSeparator = separators.fieldSeparator ?? DEFAULT_FIELD_SEPARATOR;
  const typeSeparator = separators.typeSeparator ?? DEFAULT_TYPE_SEPARATOR;
  const entries = text
    .split(/\r?\n/)
    .flatMap((line) => line.split(fieldSeparator))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0 && !entry.startsWith('#'));

  const seen = new Set<string>();
  const fields = entries.map((entry): SchemaField => {
    const idx = entry.indexOf(typeSeparator);
    if (idx === -1) throw new SchemaParseError(entry, `missing '${typeSeparator}' between name and type`);
    const name = entry.slice(0, idx).trim();
    const rawType = entry.slice(idx + typeSeparator.length).trim();
    if (name.length === 0) throw new SchemaParseError(entry, 'empty field name');
    const type = parseFieldType(rawType);
    if (type === undefined) throw new SchemaParseError(entry, `unknown type '${rawType}'`);
    if (seen.has(name)) throw new SchemaParseError(entry, `duplicate field '${name}'`);
    seen.add(name);
    return { name, type };
  });
  return { fields };
}

/** Canonical rendering; with custom separators the result parses back under the same separators. */
export function renderSchema(schema: SchemaDescription, separators: SchemaSeparators = {}): string {
  const fieldJoin = `${separators.fieldSeparator ?? DEFAULT_FIELD_SEPARATOR} `;
  const typeJoin = `${separators.typeSeparator ?? DEFAULT_TYPE_SEPARATOR} `;
  return schema.fields.map((field) => `${field.name}${typeJoin}${field.type}`).join(fieldJoin);
}

export const schemasEqual = (left: SchemaDescription, right: SchemaDescription): boolean =>
  renderSchema(left) === renderSchema(right);
