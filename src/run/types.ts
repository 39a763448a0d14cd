import type { CommandSpec } from '../plan/types.js';
import type { RunSummary } from '../results/types.js';

export type RunState =
  | { readonly status: 'idle' }
  | { readonly status: 'running'; readonly commandIndex: number; readonly commandCount: number; readonly command: CommandSpec }
  | { readonly status: 'cancelling'; readonly commandIndex: number; readonly commandCount: number }
  | TerminalRunState;

export type TerminalRunState =
  | { readonly status: 'completed'; readonly cancelled: boolean }
  | { readonly status: 'failed'; readonly commandIndex: number; readonly exitCode: number | null; readonly reason: string };

export type RunStatus = RunState['status'];

/** A streamed line; seq keeps increasing across commands and across runs of one supervisor. */
export interface RunLogLine {
  readonly seq: number;
  readonly commandIndex: number;
  readonly text: string;
}

export interface RunObserver {
  onLine?(line: RunLogLine): void;
  onStateChange?(state: RunState): void;
  /** summary is undefined when the post-run scan itself failed. */
  onComplete?(state: TerminalRunState, summary: RunSummary | undefined): void;
}
