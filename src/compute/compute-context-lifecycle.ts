import type { LifecycleState } from '../types.js';

import { describeError, LifecycleMisuseError } from '../errors.js';
import { createProcessLogLevelController, type LogLevelController } from '../log-level-controller.js';
import { getProcessLoggerRegistry, type Logger } from '../logging/logger-registry.js';

import {
  createLocalComputeContext,
  DEFAULT_PARALLELISM,
  DRIVER_PORT_ENV,
  type ComputeContext,
  type ComputeContextFactory,
} from './compute-context.js';
import { QuerySession, type QuerySessionOptions } from './query-session.js';

export interface ComputeContextLifecycleOptions {
  contextFactory?: ComputeContextFactory;
  levelController?: LogLevelController;
  logger?: Logger;
  parallelism?: number;
  disableLogging?: boolean;
  session?: QuerySessionOptions;
}

/**
 * Owns one compute context for the duration of one test case:
 * `uninitialized → active → stopped`. `stopped` is terminal; a new test case
 * needs a new lifecycle.
 *
 * Logging is forced to ERR on start (OFF when `disableLogging`). On stop a
 * silenced run is put back to ERR, not to whatever level was set before start.
 */
export class ComputeContextLifecycle {
  private readonly contextFactory: ComputeContextFactory;
  private readonly levelController: LogLevelController;
  private readonly logger: Logger;
  private readonly parallelism: number;
  private readonly defaultDisableLogging: boolean;
  private readonly sessionOptions?: QuerySessionOptions;
  private currentState: LifecycleState = 'uninitialized';
  private ctx?: ComputeContext;
  private querySession?: QuerySession;
  private loggingDisabled = false;

  constructor(options: ComputeContextLifecycleOptions = {}) {
    this.contextFactory = options.contextFactory ?? createLocalComputeContext;
    this.levelController = options.levelController ?? createProcessLogLevelController();
    this.logger = options.logger ?? getProcessLoggerRegistry().getLogger('harness');
    this.parallelism = options.parallelism ?? DEFAULT_PARALLELISM;
    this.defaultDisableLogging = options.disableLogging ?? false;
    this.sessionOptions = options.session;
  }

  get state(): LifecycleState {
    return this.currentState;
  }

  get context(): ComputeContext {
    if (this.currentState !== 'active' || this.ctx === undefined) throw this.misuse('context');
    return this.ctx;
  }

  get session(): QuerySession {
    if (this.currentState !== 'active' || this.querySession === undefined) throw this.misuse('session');
    return this.querySession;
  }

  start(testIdentity: string, disableLogging: boolean = this.defaultDisableLogging): ComputeContext {
    if (this.currentState === 'active') {
      throw new LifecycleMisuseError('already_started', `lifecycle for '${testIdentity}' is already active`);
    }
    if (this.currentState === 'stopped') {
      throw new LifecycleMisuseError('context_stopped', 'lifecycle has already been stopped; create a new one');
    }
    this.loggingDisabled = disableLogging;
    this.levelController.setLevel(disableLogging ? 'OFF' : 'ERR');

    let ctx: ComputeContext;
    try {
      ctx = this.contextFactory({ name: testIdentity, parallelism: this.parallelism });
      this.ctx = ctx;
      this.querySession = new QuerySession(ctx, this.sessionOptions);
    } catch (error) {
      this.release();
      this.currentState = 'stopped';
      this.logger.error(`compute context start failed for '${testIdentity}': ${describeError(error)}`, error);
      throw error;
    }
    this.currentState = 'active';
    this.logger.verbose('compute context started', { name: testIdentity, parallelism: this.parallelism });
    return ctx;
  }

  /** Releases the context. Failures while stopping are logged, never thrown. */
  stop(): void {
    if (this.currentState !== 'active') {
      throw new LifecycleMisuseError(
        this.currentState === 'stopped' ? 'context_stopped' : 'not_started',
        `cannot stop a lifecycle that is ${this.currentState}`,
      );
    }
    this.release();
    this.currentState = 'stopped';
  }

  /** start → body → stop, with stop guaranteed on every exit path. */
  run<T>(testIdentity: string, body: (ctx: ComputeContext, session: QuerySession) => T, disableLogging?: boolean): T {
    const ctx = this.start(testIdentity, disableLogging);
    try {
      return body(ctx, this.session);
    } finally {
      this.stopIfActive();
    }
  }

  async runAsync<T>(
    testIdentity: string,
    body: (ctx: ComputeContext, session: QuerySession) => Promise<T>,
    disableLogging?: boolean,
  ): Promise<T> {
    const ctx = this.start(testIdentity, disableLogging);
    try {
      return await body(ctx, this.session);
    } finally {
      this.stopIfActive();
    }
  }

  // the body may already have stopped the lifecycle itself
  private stopIfActive(): void {
    if (this.currentState === 'active') this.stop();
  }

  private release(): void {
    // restored first so a failing stop below is still logged
    if (this.loggingDisabled) this.levelController.setLevel('ERR');
    this.querySession = undefined;
    const ctx = this.ctx;
    this.ctx = undefined;
    if (ctx !== undefined) {
      try {
        ctx.stop();
      } catch (error) {
        this.logger.error(`compute context '${ctx.name}' failed to stop: ${describeError(error)}`, error);
      }
      this.logger.verbose('compute context stopped', { name: ctx.name });
    }
    delete process.env[DRIVER_PORT_ENV];
  }

  private misuse(what: string): LifecycleMisuseError {
    if (this.currentState === 'stopped') {
      return new LifecycleMisuseError('context_stopped', `${what} is no longer available after stop`);
    }
    return new LifecycleMisuseError('not_started', `${what} is not available before start`);
  }
}
