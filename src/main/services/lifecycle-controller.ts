/**
 * LifecycleController: process-wide run state of the agent.
 *
 *   starting → running(visible) ⇄ running(hidden) → stopping → terminated
 *
 * Owns the watcher's start/stop boundary. Visibility only touches the display
 * surface; monitorStart/monitorStop only touch the watcher.
 */

import { createLogger } from './logger';
import { ClipLogError, ErrorCode } from '../../shared/types/errors';
import { Ch } from '../../shared/ipc-schema';
import type { AcquireResult, LifecycleState, StartOutcome, Visibility } from '../../shared/types/lifecycle';
import type { IpcRequest, IpcResponse } from '../../shared/ipc-schema';

const log = createLogger('Lifecycle');

/** Default bound on waiting for the watcher to acknowledge stop (ms) */
const DEFAULT_STOP_TIMEOUT = 5_000;

/** What the controller needs from the instance guard */
export interface GuardHandle {
  acquire(): Promise<AcquireResult>;
  release(): Promise<void>;
  signal(request: IpcRequest): Promise<IpcResponse | null>;
}

/** What the controller needs from the clipboard watcher */
export interface WatcherHandle {
  start(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
}

/** The thing shown or hidden: the terminal history view */
export interface DisplaySurface {
  show(): void;
  hide(): void;
}

export interface LifecycleOptions {
  stopTimeoutMs?: number;
  startHidden?: boolean;
}

export class LifecycleController {
  private state: LifecycleState = { phase: 'starting', visibility: 'visible' };
  private shutdown: Promise<void> | null = null;
  private resolveTerminated: (() => void) | null = null;
  private readonly terminated: Promise<void>;
  private stopTimeoutMs: number;
  private readonly startHidden: boolean;

  constructor(
    private readonly guard: GuardHandle,
    private readonly watcher: WatcherHandle,
    private readonly surface: DisplaySurface,
    options: LifecycleOptions = {},
  ) {
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT;
    this.startHidden = options.startHidden ?? false;
    this.terminated = new Promise<void>((resolve) => {
      this.resolveTerminated = resolve;
    });
  }

  getState(): LifecycleState {
    return { ...this.state };
  }

  isRunning(): boolean {
    return this.state.phase === 'running';
  }

  setStopTimeout(ms: number): void {
    this.stopTimeoutMs = ms;
  }

  /** Resolves once the controller reaches `terminated` */
  whenTerminated(): Promise<void> {
    return this.terminated;
  }

  // ─── Transitions ───

  async start(): Promise<StartOutcome> {
    if (this.state.phase !== 'starting') {
      throw new ClipLogError(`Cannot start from ${this.state.phase}`, ErrorCode.INVALID_STATE);
    }

    const result = await this.guard.acquire();
    if (this.shutdown) {
      await this.shutdown;
      if (result.status === 'acquired') await this.guard.release();
      return 'started';
    }
    if (result.status === 'already-running') {
      log.info('Another cliplog agent is running, asking it to come forward');
      const response = await this.guard.signal({ channel: Ch.WINDOW_FOCUS, args: [] });
      if (!response) {
        log.warn('Running agent did not answer the focus request');
      }
      this.enterTerminated();
      return 'already-running';
    }

    try {
      await this.watcher.start();
    } catch (err) {
      await this.guard.release();
      this.enterTerminated();
      throw ClipLogError.from(err, ErrorCode.INVALID_STATE);
    }

    // quit() arrived while the watcher was starting; its stop may have run first
    if (this.shutdown) {
      await this.watcher.stop();
      await this.shutdown;
      return 'started';
    }

    const visibility: Visibility = this.startHidden ? 'hidden' : 'visible';
    this.state = { phase: 'running', visibility };
    this.applyVisibility(visibility);
    log.info(`Agent running (${visibility})`);
    return 'started';
  }

  show(): void {
    this.setVisibility('visible');
  }

  hide(): void {
    this.setVisibility('hidden');
  }

  async monitorStart(): Promise<void> {
    this.requireRunning('monitor:start');
    if (this.watcher.isRunning()) return;
    await this.watcher.start();
  }

  async monitorStop(): Promise<void> {
    this.requireRunning('monitor:stop');
    await this.watcher.stop();
  }

  /**
   * Stop the watcher (bounded wait), release the guard, terminate.
   * Every caller shares the same shutdown.
   */
  quit(): Promise<void> {
    if (this.shutdown) return this.shutdown;
    if (this.state.phase === 'terminated') return Promise.resolve();

    this.state = { ...this.state, phase: 'stopping' };
    log.info('Stopping agent');

    this.shutdown = this.runShutdown();
    return this.shutdown;
  }

  // ─── Private ───

  private async runShutdown(): Promise<void> {
    try {
      this.surface.hide();
    } catch (err) {
      log.warn('Display surface failed to hide:', err);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.stopTimeoutMs);
    });

    try {
      const outcome = await Promise.race([this.watcher.stop().then(() => 'stopped' as const), timedOut]);
      if (outcome === 'timeout') {
        const err = new ClipLogError(
          `Watcher did not acknowledge stop within ${this.stopTimeoutMs}ms`,
          ErrorCode.ACQUIRE_TIMEOUT,
          { severity: 'warning', context: { stopTimeoutMs: this.stopTimeoutMs } },
        );
        log.error('Proceeding with shutdown:', err.message);
      }
    } catch (err) {
      log.error('Watcher stop failed, proceeding with shutdown:', err);
    } finally {
      clearTimeout(timer);
    }

    try {
      await this.guard.release();
    } catch (err) {
      log.error('Failed to release instance guard:', err);
    }

    this.enterTerminated();
  }

  private setVisibility(visibility: Visibility): void {
    this.requireRunning(visibility === 'visible' ? 'show' : 'hide');
    if (this.state.visibility === visibility) return;
    this.state = { ...this.state, visibility };
    this.applyVisibility(visibility);
  }

  private applyVisibility(visibility: Visibility): void {
    if (visibility === 'visible') {
      this.surface.show();
    } else {
      this.surface.hide();
    }
  }

  private requireRunning(operation: string): void {
    if (this.state.phase !== 'running') {
      throw new ClipLogError(`Cannot ${operation} while ${this.state.phase}`, ErrorCode.INVALID_STATE, {
        context: { phase: this.state.phase },
      });
    }
  }

  private enterTerminated(): void {
    this.state = { ...this.state, phase: 'terminated' };
    this.resolveTerminated?.();
    this.resolveTerminated = null;
    log.info('Agent terminated');
  }
}
