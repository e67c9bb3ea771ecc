/**
 * ServiceContainer: lightweight DI container for the agent's services.
 *
 * Provides typed access, centralized init, config wiring, and ordered
 * graceful shutdown.
 *
 * Usage:
 *   const container = new ServiceContainer(resolveAppPaths());
 *   await container.init();
 *   await container.get('lifecycle').start();
 *   ...
 *   await container.shutdown();
 */

import { createLogger, setLogLevel } from './logger';
import { ConfigService } from './config';
import { HistoryStore } from './history-store';
import { SystemClipboard } from './clipboard-access';
import { ClipboardWatcher } from './clipboard-watcher';
import { InstanceGuard } from './instance-guard';
import { ConsoleHistoryView } from './history-view';
import { LifecycleController } from './lifecycle-controller';
import { HistoryCommands } from './history-commands';
import { setupIPC } from '../ipc';
import type { AppPaths } from './app-paths';
import type { ClipboardAccess } from './clipboard-access';
import type { ViewOutput } from './history-view';

const log = createLogger('Container');

// ─── Service Map: typed registry of all services ───

export interface ServiceMap {
  config: ConfigService;
  store: HistoryStore;
  clipboard: ClipboardAccess;
  watcher: ClipboardWatcher;
  guard: InstanceGuard;
  view: ConsoleHistoryView;
  lifecycle: LifecycleController;
  commands: HistoryCommands;
}

export type ServiceKey = keyof ServiceMap;

export interface ContainerOptions {
  /** Overrides config startHidden */
  startHidden?: boolean;
  /** Replaces the system clipboard */
  clipboard?: ClipboardAccess;
  /** Where the history view prints */
  viewOutput?: ViewOutput;
  /** A guard the caller already acquired */
  guard?: InstanceGuard;
}

export class ServiceContainer {
  private services: Partial<ServiceMap> = {};
  private unsubscribers: Array<() => void> = [];
  private initialized = false;

  constructor(
    private readonly paths: AppPaths,
    private readonly options: ContainerOptions = {},
  ) {}

  /**
   * Get a registered service by key (typed).
   * Throws if the container hasn't been initialized yet or service doesn't exist.
   */
  get<K extends ServiceKey>(key: K): ServiceMap[K] {
    if (!this.initialized) {
      throw new Error(`ServiceContainer not initialized: call init() first`);
    }
    const svc = this.services[key];
    if (!svc) {
      throw new Error(`Service '${key}' not found in container`);
    }
    return svc;
  }

  has(key: ServiceKey): boolean {
    return this.services[key] !== undefined;
  }

  /**
   * Initialize all services in dependency order.
   */
  async init(): Promise<void> {
    if (this.initialized) {
      throw new Error('ServiceContainer already initialized');
    }

    log.info('Initializing services...');
    const t0 = Date.now();

    // ── Phase 1: Core (no deps) ──
    const config = new ConfigService(this.paths.configPath);
    this.set('config', config);
    setLogLevel(config.get('logLevel'));

    const store = new HistoryStore(this.paths.databasePath, { busyTimeoutMs: config.get('busyTimeoutMs') });
    this.set('store', store);
    store.initialize();

    // ── Phase 2: Services depending on core ──
    const clipboard =
      this.options.clipboard ?? new SystemClipboard({ readTimeoutMs: config.get('clipboardReadTimeoutMs') });
    const watcher = new ClipboardWatcher(clipboard, store, { pollIntervalMs: config.get('pollIntervalMs') });
    const guard =
      this.options.guard ?? new InstanceGuard(this.paths.socketPath, { signalTimeoutMs: config.get('signalTimeoutMs') });
    const view = new ConsoleHistoryView(store, {
      limit: config.get('viewLimit'),
      refreshMs: config.get('viewRefreshMs'),
      output: this.options.viewOutput,
    });
    this.set('clipboard', clipboard);
    this.set('watcher', watcher);
    this.set('guard', guard);
    this.set('view', view);

    // ── Phase 3: Lifecycle and command surface ──
    const lifecycle = new LifecycleController(guard, watcher, view, {
      stopTimeoutMs: config.get('stopTimeoutMs'),
      startHidden: this.options.startHidden ?? config.get('startHidden'),
    });
    const commands = new HistoryCommands(store, clipboard, watcher, lifecycle);
    this.set('lifecycle', lifecycle);
    this.set('commands', commands);

    setupIPC(guard, { commands, lifecycle, configService: config });

    // ── Phase 4: Config → services ──
    this.unsubscribers.push(
      config.onChange('logLevel', (level) => setLogLevel(level)),
      config.onChange('pollIntervalMs', (ms) => watcher.setPollInterval(ms)),
      config.onChange('signalTimeoutMs', (ms) => guard.setSignalTimeout(ms)),
      config.onChange('stopTimeoutMs', (ms) => lifecycle.setStopTimeout(ms)),
      config.onChange('viewLimit', (limit) => view.setLimit(limit)),
      config.onChange('viewRefreshMs', (ms) => view.setRefreshInterval(ms)),
      config.onChange('busyTimeoutMs', (ms) => store.setBusyTimeout(ms)),
    );
    if (clipboard instanceof SystemClipboard) {
      this.unsubscribers.push(config.onChange('clipboardReadTimeoutMs', (ms) => clipboard.setReadTimeout(ms)));
    }

    this.initialized = true;
    log.info(`All services initialized in ${Date.now() - t0}ms`);
  }

  /**
   * Graceful shutdown: stops services in reverse dependency order.
   */
  async shutdown(): Promise<void> {
    if (!this.initialized) return;

    log.info('Graceful shutdown started');
    const t0 = Date.now();

    // ── Phase 1: Stop the watcher and release the guard ──
    await this.tryAsync('lifecycle', (s) => s.quit());
    this.trySync('view', (s) => s.hide());

    // ── Phase 2: Persist config ──
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    await this.tryAsync('config', (s) => s.shutdown());

    // ── Phase 3: Close database (must be last) ──
    this.trySync('store', (s) => s.close());

    this.initialized = false;
    log.info(`Graceful shutdown completed in ${Date.now() - t0}ms`);
  }

  // ─── Private helpers ───

  private set<K extends ServiceKey>(key: K, service: ServiceMap[K]): void {
    this.services[key] = service;
  }

  /** Safely call a sync method on a service, logging errors. */
  private trySync<K extends ServiceKey>(key: K, fn: (service: ServiceMap[K]) => void): void {
    const svc = this.services[key];
    if (!svc) return;
    try {
      fn(svc);
    } catch (err) {
      log.error(`${key} shutdown error:`, err);
    }
  }

  /** Safely call an async method on a service, logging errors. */
  private async tryAsync<K extends ServiceKey>(key: K, fn: (service: ServiceMap[K]) => Promise<unknown>): Promise<void> {
    const svc = this.services[key];
    if (!svc) return;
    try {
      await fn(svc);
    } catch (err) {
      log.error(`${key} shutdown error:`, err);
    }
  }
}
