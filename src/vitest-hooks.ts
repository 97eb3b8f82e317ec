import { afterAll, beforeAll } from 'vitest';

import type { AppScopedHarness } from './app/app-scoped-harness.js';
import type { ComputeContextLifecycle } from './compute/compute-context-lifecycle.js';

import { createAppHarness, createLifecycle } from './harness-factory.js';

export interface HookOptions {
  disableLogging?: boolean;
  resetScratch?: boolean;
}

/**
 * Registers suite hooks that start a compute context before the suite's tests and
 * stop it afterwards, whether or not they passed.
 */
export function useComputeContext(
  testIdentity: string,
  options: HookOptions = {},
  lifecycle: ComputeContextLifecycle = createLifecycle(),
): ComputeContextLifecycle {
  beforeAll(() => {
    lifecycle.start(testIdentity, options.disableLogging);
  });
  afterAll(() => {
    if (lifecycle.state === 'active') lifecycle.stop();
  });
  return lifecycle;
}

/** Same as {@link useComputeContext}, with an app handle started on the context. */
export function useAppHarness(
  testIdentity: string,
  options: HookOptions = {},
  harness: AppScopedHarness = createAppHarness(),
): AppScopedHarness {
  beforeAll(() => {
    if (options.resetScratch === true) harness.scratch.reset(testIdentity);
    harness.start(testIdentity, options.disableLogging);
  });
  afterAll(() => {
    if (harness.lifecycle.state === 'active') harness.stop();
  });
  return harness;
}
