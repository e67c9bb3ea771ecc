/**
 * Agent run state. Phase and visibility are independent: hiding the display
 * surface never touches the watcher.
 */

export type LifecyclePhase = 'starting' | 'running' | 'stopping' | 'terminated';

export type Visibility = 'visible' | 'hidden';

export interface LifecycleState {
  phase: LifecyclePhase;
  /** Only meaningful while running */
  visibility: Visibility;
}

export type AcquireResult = { status: 'acquired' } | { status: 'already-running' };

export type StartOutcome = 'started' | 'already-running';

/** Process exit codes */
export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
  ALREADY_RUNNING: 3,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];
