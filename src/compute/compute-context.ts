import type { LifecycleState } from '../types.js';

import { LifecycleMisuseError } from '../errors.js';

// Environment marker a running context leaves behind; cleared by the lifecycle on stop.
export const DRIVER_PORT_ENV = 'TABULAR_DRIVER_PORT';

export const DEFAULT_PARALLELISM = 2;

const BASE_DRIVER_PORT = 47100;

export interface ComputeContextSpec {
  name: string;
  parallelism: number;
}

export interface ComputeContext {
  readonly name: string;
  readonly master: string;
  readonly parallelism: number;
  readonly state: LifecycleState;
  /** Throws LifecycleMisuseError unless the context is active. */
  ensureActive(): void;
  stop(): void;
}

export type ComputeContextFactory = (spec: ComputeContextSpec) => ComputeContext;

export const localMaster = (parallelism: number): string => `local[${String(parallelism)}]`;

let contextsCreated = 0;

/** In-process context; only one should be active per process at a time. */
export class LocalComputeContext implements ComputeContext {
  readonly name: string;
  readonly parallelism: number;
  readonly master: string;
  readonly driverPort: number;
  private currentState: LifecycleState = 'uninitialized';

  constructor(spec: ComputeContextSpec) {
    if (!Number.isInteger(spec.parallelism) || spec.parallelism < 1) {
      throw new Error(`parallelism must be a positive integer, got ${String(spec.parallelism)}`);
    }
    this.name = spec.name;
    this.parallelism = spec.parallelism;
    this.master = localMaster(spec.parallelism);
    contextsCreated += 1;
    this.driverPort = BASE_DRIVER_PORT + contextsCreated;
    process.env[DRIVER_PORT_ENV] = String(this.driverPort);
    this.currentState = 'active';
  }

  get state(): LifecycleState {
    return this.currentState;
  }

  ensureActive(): void {
    if (this.currentState === 'active') return;
    if (this.currentState === 'stopped') {
      throw new LifecycleMisuseError('context_stopped', `compute context '${this.name}' has been stopped`);
    }
    throw new LifecycleMisuseError('not_started', `compute context '${this.name}' is not initialized`);
  }

  stop(): void {
    this.ensureActive();
    this.currentState = 'stopped';
  }
}

export const createLocalComputeContext: ComputeContextFactory = (spec) => new LocalComputeContext(spec);
