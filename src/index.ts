// Main library exports for programmatic use
export { ComputeContextLifecycle } from './compute/compute-context-lifecycle.js';
export { LocalComputeContext, createLocalComputeContext, DRIVER_PORT_ENV, DEFAULT_PARALLELISM, localMaster } from './compute/compute-context.js';
export { QuerySession, schemaPathFor } from './compute/query-session.js';
export { AppScopedHarness, defaultAppArgs } from './app/app-scoped-harness.js';
export { TabularApp, createAppInitializer, initTabularApp } from './app/tabular-app.js';
export { parseAppArgs } from './app/app-args.js';
export { ScratchSpace, sanitizeIdentity, DEFAULT_TEST_DATA_DIR } from './scratch-space.js';
export { LogLevelController, createProcessLogLevelController } from './log-level-controller.js';
export { LoggerRegistry, Logger, getProcessLoggerRegistry, ROOT_LOGGER_NAME } from './logging/logger-registry.js';
export { StructuredLogger, createStructuredLogger } from './logging/structured-logger.js';
export { nodeFileSystem } from './fs-provider.js';
export { loadHarnessConfig, CONFIG_FILE_NAME } from './config.js';
export { buildHarnessParts, createLifecycle, createAppHarness } from './harness-factory.js';

// Assertions
export {
  assertToleranceEqual,
  assertUnorderedEqual,
  assertDatasetEqual,
  assertSchemaEqual,
  assertDatasetsSame,
  assertMatchesPattern,
  coerceNumeric,
  toReal,
  naturalOrder,
  renderDatasetRows,
  DEFAULT_EPSILON,
} from './assertions.js';

// Datasets and schemas
export { InMemoryDataset, partitionRows, schemaOf } from './dataset/dataset.js';
export { parseSchema, renderSchema, schemasEqual, FIELD_TYPES } from './dataset/schema.js';
export { renderCell, renderRow } from './dataset/cells.js';
export { DEFAULT_CSV_ATTRIBUTES, parseInlineData, parseDelimitedText, splitDelimited } from './dataset/delimited.js';

// Errors
export {
  HarnessAssertionError,
  LengthMismatchError,
  ValueMismatchError,
  SchemaMismatchError,
  PatternNotFoundError,
  LifecycleMisuseError,
  SchemaParseError,
  DataParseError,
  ConfigError,
  isHarnessAssertionError,
  isLifecycleMisuseError,
} from './errors.js';

// Type exports
export type {
  CellValue,
  CsvAttributes,
  FieldType,
  HarnessConfiguration,
  LifecycleState,
  LogEntry,
  LogLevel,
  LogSeverity,
  Row,
  SchemaDescription,
  SchemaField,
} from './types.js';
export type { ComputeContext, ComputeContextFactory, ComputeContextSpec } from './compute/compute-context.js';
export type { ComputeContextLifecycleOptions } from './compute/compute-context-lifecycle.js';
export type { Dataset } from './dataset/dataset.js';
export type { SchemaSeparators } from './dataset/schema.js';
export type { AppArgs } from './app/app-args.js';
export type { AppInitializer } from './app/tabular-app.js';
export type { AppScopedHarnessOptions } from './app/app-scoped-harness.js';
export type { FileSystemProvider } from './fs-provider.js';
export type { LevelledLogger, LoggingProvider } from './logging/logger-registry.js';
export type { LogFormat } from './logging/structured-logger.js';
export type { Comparator, NumericCoercion } from './assertions.js';
export type { AssertionErrorKind, LifecycleMisuseKind } from './errors.js';
export type { HarnessParts } from './harness-factory.js';
