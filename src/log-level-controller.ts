import type { LogLevel } from './types.js';

import { getProcessLoggerRegistry, type LevelledLogger, type LoggingProvider } from './logging/logger-registry.js';

/**
 * Forces every logger known to a provider, the root logger included, to one level.
 *
 * There is no save/restore: a caller that raises verbosity for a while must call
 * `setLevel` again with the level it wants afterwards. The change is visible to
 * everything sharing the provider and outlives the test that made it.
 */
export class LogLevelController {
  private readonly provider?: LoggingProvider;

  constructor(provider?: LoggingProvider) {
    this.provider = provider;
  }

  setLevel(level: LogLevel): void {
    const provider = this.provider;
    if (provider === undefined) return;
    const loggers = collectLoggers(provider);
    loggers.forEach((logger) => {
      try {
        logger.setLevel(level);
      } catch {
        // a logger that refuses the level keeps its own; the rest still change
      }
    });
  }
}

function collectLoggers(provider: LoggingProvider): LevelledLogger[] {
  try {
    return [provider.rootLogger(), ...provider.currentLoggers()];
  } catch {
    // logging subsystem unavailable: setting a level is a no-op
    return [];
  }
}

export const createProcessLogLevelController = (): LogLevelController =>
  new LogLevelController(getProcessLoggerRegistry());
