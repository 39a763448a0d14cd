import type { CommandSpec } from '../plan/types.js';

/** One line of merged stdout/stderr; seq counts from 0 per process. */
export interface LogLine {
  readonly seq: number;
  readonly text: string;
}

export type ExitOutcome =
  | { readonly kind: 'exited'; readonly exitCode: number; readonly signal?: string }
  | { readonly kind: 'terminated' };

export interface StartOptions {
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Exclusive handle on one live child process. The child is reaped before wait()
 * resolves, and wait() resolves on every path, cancellation included.
 */
export interface RunningProcess {
  readonly command: CommandSpec;
  readonly pid: number | undefined;
  /** Merged output lines. Finite; may be iterated once. */
  lines(): AsyncIterable<LogLine>;
  /** Idempotent; a no-op once the process has exited on its own. */
  cancel(): void;
  wait(): Promise<ExitOutcome>;
}

export interface ProcessRunner {
  start(command: CommandSpec, options?: StartOptions): Promise<RunningProcess>;
}
