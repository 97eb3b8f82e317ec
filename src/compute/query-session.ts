import type { CsvAttributes, Row, SchemaDescription } from '../types.js';
import type { ComputeContext } from './compute-context.js';

import { InMemoryDataset, partitionRows } from '../dataset/dataset.js';
import { DEFAULT_CSV_ATTRIBUTES, parseDelimitedText, parseInlineData } from '../dataset/delimited.js';
import { parseSchema, type SchemaSeparators } from '../dataset/schema.js';
import { nodeFileSystem, type FileSystemProvider } from '../fs-provider.js';

export interface QuerySessionOptions {
  fileSystem?: FileSystemProvider;
  separators?: SchemaSeparators;
}

/** `data/in.csv` → `data/in.schema` */
export const schemaPathFor = (dataPath: string): string => {
  const slash = Math.max(dataPath.lastIndexOf('/'), dataPath.lastIndexOf('\\'));
  const dot = dataPath.lastIndexOf('.');
  const stem = dot > slash ? dataPath.slice(0, dot) : dataPath;
  return `${stem}.schema`;
};

/**
 * Dataset construction layered on a compute context. Every dataset it creates
 * is spread over the context's workers and becomes unusable once the context stops.
 */
export class QuerySession {
  readonly context: ComputeContext;
  private readonly fileSystem: FileSystemProvider;
  private readonly separators: SchemaSeparators;

  constructor(context: ComputeContext, options: QuerySessionOptions = {}) {
    context.ensureActive();
    this.context = context;
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.separators = options.separators ?? {};
  }

  parseSchema(schemaText: string): SchemaDescription {
    return parseSchema(schemaText, this.separators);
  }

  createDataset(schema: SchemaDescription, rows: readonly Row[]): InMemoryDataset {
    this.context.ensureActive();
    return new InMemoryDataset(schema, partitionRows(rows, this.context.parallelism), {
      guard: () => { this.context.ensureActive(); },
    });
  }

  /** Builds a dataset from a compact schema string and `;`-separated data records. */
  fromStrings(schemaText: string, data: string): InMemoryDataset {
    const schema = this.parseSchema(schemaText);
    return this.createDataset(schema, parseInlineData(data, schema));
  }

  /**
   * Loads a delimited file. Without an explicit schema the schema is read from the
   * `.schema` file beside the data file.
   */
  readCsv(
    dataPath: string,
    attributes: CsvAttributes = DEFAULT_CSV_ATTRIBUTES,
    schema?: SchemaDescription,
  ): InMemoryDataset {
    const resolvedSchema = schema ?? this.parseSchema(this.fileSystem.readText(schemaPathFor(dataPath)));
    const text = this.fileSystem.readText(dataPath);
    return this.createDataset(resolvedSchema, parseDelimitedText(text, resolvedSchema, attributes));
  }
}
