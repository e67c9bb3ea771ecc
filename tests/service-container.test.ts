import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';

vi.mock('../src/main/services/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
  setLogLevel: vi.fn(),
}));

import { ServiceContainer } from '../src/main/services/service-container';
import { InstanceGuard } from '../src/main/services/instance-guard';
import { FakeClipboard, OutputSink, makeTempPaths, removeTempPaths } from './helpers/fakes';
import type { AppPaths } from '../src/main/services/app-paths';

describe('ServiceContainer', () => {
  let paths: AppPaths;
  let container: ServiceContainer;

  beforeEach(() => {
    paths = makeTempPaths('cliplog-container-');
  });

  afterEach(async () => {
    await container.shutdown();
    removeTempPaths(paths);
  });

  it('applies a reloaded busy timeout to the open store', async () => {
    container = new ServiceContainer(paths, { clipboard: new FakeClipboard('x'), viewOutput: new OutputSink() });
    await container.init();
    expect(container.get('store').getBusyTimeout()).toBe(2000);

    fs.writeFileSync(paths.configPath, JSON.stringify({ busyTimeoutMs: 250 }));

    expect(container.get('config').reload()).toEqual(['busyTimeoutMs']);
    expect(container.get('store').getBusyTimeout()).toBe(250);
  });

  it('uses a guard the caller already holds', async () => {
    const guard = new InstanceGuard(paths.socketPath);
    expect(await guard.acquire()).toEqual({ status: 'acquired' });

    container = new ServiceContainer(paths, {
      clipboard: new FakeClipboard('x'),
      viewOutput: new OutputSink(),
      guard,
      startHidden: true,
    });
    await container.init();

    expect(container.get('guard')).toBe(guard);
    expect(await container.get('lifecycle').start()).toBe('started');

    await container.shutdown();
    expect(guard.isHeld()).toBe(false);
  });
});
