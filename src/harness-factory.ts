import type { HarnessConfiguration } from './types.js';

import { AppScopedHarness, type AppScopedHarnessOptions } from './app/app-scoped-harness.js';
import { createAppInitializer } from './app/tabular-app.js';
import { ComputeContextLifecycle, type ComputeContextLifecycleOptions } from './compute/compute-context-lifecycle.js';
import { loadHarnessConfig } from './config.js';
import { LogLevelController } from './log-level-controller.js';
import { getProcessLoggerRegistry, LoggerRegistry } from './logging/logger-registry.js';
import { ScratchSpace } from './scratch-space.js';

export interface HarnessParts {
  config: HarnessConfiguration;
  registry: LoggerRegistry;
  scratch: ScratchSpace;
  lifecycleOptions: ComputeContextLifecycleOptions;
}

/**
 * Wires configuration into the harness collaborators. The process registry is
 * used unless a log format other than the default asks for a dedicated one.
 */
export function buildHarnessParts(config: HarnessConfiguration = loadHarnessConfig(), registry?: LoggerRegistry): HarnessParts {
  const resolvedRegistry = registry ?? (config.logFormat === 'logfmt'
    ? getProcessLoggerRegistry()
    : new LoggerRegistry({ format: config.logFormat, color: process.stderr.isTTY }));
  const logger = resolvedRegistry.getLogger('harness');
  return {
    config,
    registry: resolvedRegistry,
    scratch: new ScratchSpace({ rootDir: config.testDataDir, logger }),
    lifecycleOptions: {
      levelController: new LogLevelController(resolvedRegistry),
      logger,
      parallelism: config.parallelism,
      disableLogging: config.disableLogging,
      session: {
        separators: {
          fieldSeparator: config.schemaFieldSeparator,
          typeSeparator: config.schemaTypeSeparator,
        },
      },
    },
  };
}

export const createLifecycle = (parts: HarnessParts = buildHarnessParts()): ComputeContextLifecycle =>
  new ComputeContextLifecycle(parts.lifecycleOptions);

export function createAppHarness(
  parts: HarnessParts = buildHarnessParts(),
  options: Pick<AppScopedHarnessOptions, 'initializer' | 'appArgs'> = {},
): AppScopedHarness {
  return new AppScopedHarness({
    lifecycle: createLifecycle(parts),
    scratch: parts.scratch,
    initializer: options.initializer ?? createAppInitializer(parts.lifecycleOptions.session),
    appArgs: options.appArgs,
  });
}
