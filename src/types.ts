export type LogSeverity = 'TRC' | 'VRB' | 'WRN' | 'ERR';

// Logger thresholds: a severity, or OFF to drop everything.
export type LogLevel = LogSeverity | 'OFF';

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: LogSeverity;
  logger: string;                       // Name of the emitting logger ('root' for the root logger)
  message: string;                      // Human readable message
  // Optional key/value context rendered as labels
  details?: Record<string, string | number | boolean>;
  stack?: string;
}

export type FieldType =
  | 'String'
  | 'Integer'
  | 'Long'
  | 'Float'
  | 'Double'
  | 'Boolean'
  | 'Decimal'
  | 'Date'
  | 'Timestamp';

export interface SchemaField {
  name: string;
  type: FieldType;
}

export interface SchemaDescription {
  fields: readonly SchemaField[];
}

// Long values outside the safe integer range are carried as bigint.
export type CellValue = string | number | bigint | boolean | Date | null;

export type Row = readonly CellValue[];

export type LifecycleState = 'uninitialized' | 'active' | 'stopped';

export interface CsvAttributes {
  delimiter: string;
  quoteChar: string;
  hasHeader: boolean;
}

export interface HarnessConfiguration {
  testDataDir: string;
  parallelism: number;
  disableLogging: boolean;
  logFormat: 'logfmt' | 'json' | 'console' | 'none';
  schemaFieldSeparator: string;
  schemaTypeSeparator: string;
}
