import type { InMemoryDataset } from '../dataset/dataset.js';
import type { CsvAttributes } from '../types.js';

import { ComputeContextLifecycle, type ComputeContextLifecycleOptions } from '../compute/compute-context-lifecycle.js';
import { DEFAULT_CSV_ATTRIBUTES } from '../dataset/delimited.js';
import { LifecycleMisuseError } from '../errors.js';
import { ScratchSpace } from '../scratch-space.js';

import { initTabularApp, type AppInitializer, type TabularApp } from './tabular-app.js';

export interface AppScopedHarnessOptions {
  lifecycle?: ComputeContextLifecycle;
  lifecycleOptions?: ComputeContextLifecycleOptions;
  scratch?: ScratchSpace;
  initializer?: AppInitializer;
  // Argument vector for the app; defaults to no modules and the scratch directory as data dir.
  appArgs?: (scratchDir: string) => readonly string[];
}

export const defaultAppArgs = (scratchDir: string): string[] => ['-m', 'None', '--data-dir', scratchDir];

/**
 * Compute context lifecycle plus one application handle per test case. The app
 * is created right after the context and dropped before the context stops.
 */
export class AppScopedHarness {
  readonly lifecycle: ComputeContextLifecycle;
  readonly scratch: ScratchSpace;
  private readonly initializer: AppInitializer;
  private readonly appArgs: (scratchDir: string) => readonly string[];
  private currentApp?: TabularApp;

  constructor(options: AppScopedHarnessOptions = {}) {
    this.lifecycle = options.lifecycle ?? new ComputeContextLifecycle(options.lifecycleOptions);
    this.scratch = options.scratch ?? new ScratchSpace();
    this.initializer = options.initializer ?? initTabularApp;
    this.appArgs = options.appArgs ?? defaultAppArgs;
  }

  get app(): TabularApp {
    if (this.currentApp === undefined) {
      throw new LifecycleMisuseError(
        this.lifecycle.state === 'stopped' ? 'context_stopped' : 'not_started',
        'app is only available between start and stop',
      );
    }
    return this.currentApp;
  }

  start(testIdentity: string, disableLogging?: boolean): TabularApp {
    const ctx = this.lifecycle.start(testIdentity, disableLogging);
    try {
      const argv = this.appArgs(this.scratch.temporaryDirectoryFor(testIdentity));
      this.currentApp = this.initializer(argv, ctx);
    } catch (error) {
      this.lifecycle.stop();
      throw error;
    }
    return this.currentApp;
  }

  stop(): void {
    this.currentApp = undefined;
    this.lifecycle.stop();
  }

  run<T>(testIdentity: string, body: (app: TabularApp) => T, disableLogging?: boolean): T {
    const app = this.start(testIdentity, disableLogging);
    try {
      return body(app);
    } finally {
      this.stop();
    }
  }

  /** Loads a delimited file relative to the working directory. */
  open(relativePath: string, attributes: CsvAttributes = DEFAULT_CSV_ATTRIBUTES): InMemoryDataset {
    return this.app.session.readCsv(`./${relativePath}`, attributes);
  }

  createDataset(schemaText: string, data: string): InMemoryDataset {
    return this.app.createDataset(schemaText, data);
  }
}
