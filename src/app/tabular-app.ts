import path from 'node:path';

import type { ComputeContext } from '../compute/compute-context.js';
import type { InMemoryDataset } from '../dataset/dataset.js';
import type { CsvAttributes } from '../types.js';

import { QuerySession, type QuerySessionOptions } from '../compute/query-session.js';

import { parseAppArgs, type AppArgs } from './app-args.js';

/**
 * Application handle bound to an externally supplied compute context. It is
 * returned from `initTabularApp` and owned by whoever started the context.
 */
export class TabularApp {
  readonly args: AppArgs;
  readonly session: QuerySession;

  constructor(args: AppArgs, session: QuerySession) {
    this.args = args;
    this.session = session;
  }

  get context(): ComputeContext {
    return this.session.context;
  }

  /** Run configuration property, or undefined when not given. */
  getProp(key: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.args.props, key) ? this.args.props[key] : undefined;
  }

  createDataset(schemaText: string, data: string): InMemoryDataset {
    return this.session.fromStrings(schemaText, data);
  }

  /** Path of `relative` inside the app's data directory. */
  dataPath(relative: string): string {
    return path.join(this.args.dataDir, relative);
  }

  readCsv(relative: string, attributes?: CsvAttributes): InMemoryDataset {
    return this.session.readCsv(this.dataPath(relative), attributes);
  }
}

export type AppInitializer = (argv: readonly string[], context: ComputeContext) => TabularApp;

export const createAppInitializer = (options: QuerySessionOptions = {}): AppInitializer =>
  (argv, context) => new TabularApp(parseAppArgs(argv), new QuerySession(context, options));

export const initTabularApp: AppInitializer = createAppInitializer();
