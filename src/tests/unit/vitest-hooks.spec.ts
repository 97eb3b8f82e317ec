import { afterAll, describe, expect, it } from 'vitest';

import { ComputeContextLifecycle } from '../../compute/compute-context-lifecycle.js';
import { DRIVER_PORT_ENV } from '../../compute/compute-context.js';
import { LogLevelController } from '../../log-level-controller.js';
import { LoggerRegistry } from '../../logging/logger-registry.js';
import { useComputeContext } from '../../vitest-hooks.js';

const registry = new LoggerRegistry({ sink: () => undefined });
const lifecycle = new ComputeContextLifecycle({
  levelController: new LogLevelController(registry),
  logger: registry.getLogger('harness'),
});

describe('useComputeContext', () => {
  useComputeContext('org.example.HookSuite', { disableLogging: true }, lifecycle);

  it('starts the context before the tests run', () => {
    expect(lifecycle.state).toBe('active');
    expect(lifecycle.context.name).toBe('org.example.HookSuite');
    expect(registry.rootLogger().level).toBe('OFF');
  });

  it('shares the context across the suite', () => {
    const dataset = lifecycle.session.fromStrings('k:Integer', '1;2');
    expect(dataset.count()).toBe(2);
  });
});

afterAll(() => {
  expect(lifecycle.state).toBe('stopped');
  expect(registry.rootLogger().level).toBe('ERR');
  expect(process.env[DRIVER_PORT_ENV]).toBeUndefined();
});
