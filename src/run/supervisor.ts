// RunSupervisor — the state machine behind every test run.
// One run at a time: start() validates and returns immediately, drive() executes the plan
// command by command on the event loop. Cancellation is a flag plus a signal forwarded to
// the live child; drive() checks the flag before each command and after each exit.
import type { RunPlan } from '../plan/types.js';
import { formatCommand } from '../plan/command-plan.js';
import type { ProcessRunner, RunningProcess } from '../process/types.js';
import type { RunSummary, SummaryScanner } from '../results/types.js';
import { HTSError, HTSErrorCode, describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { RunLogLine, RunObserver, RunState, TerminalRunState } from './types.js';

export interface RunSupervisorOptions {
  runner: ProcessRunner;
  scanner: SummaryScanner;
  resultsRoot: string;
  /** Working directory for every command of the plan. */
  cwd?: string;
}

const IDLE: RunState = Object.freeze({ status: 'idle' });

export class RunSupervisor {
  private state: RunState = IDLE;
  private readonly observers = new Set<RunObserver>();
  private active: RunningProcess | undefined;
  private cancelRequested = false;
  private nextSeq = 0;
  private current: Promise<TerminalRunState> | undefined;
  private summary: RunSummary | undefined;

  constructor(private readonly options: RunSupervisorOptions) {}

  getState(): RunState {
    return this.state;
  }

  get lastSummary(): RunSummary | undefined {
    return this.summary;
  }

  isBusy(): boolean {
    return this.state.status === 'running' || this.state.status === 'cancelling';
  }

  subscribe(observer: RunObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  start(plan: RunPlan): void {
    if (this.isBusy()) {
      throw new HTSError(HTSErrorCode.ALREADY_RUNNING, 'A test run is already in progress', {
        state: this.state.status,
      });
    }
    if (plan.commands.length === 0) {
      throw new HTSError(HTSErrorCode.INVALID_MODE, `Plan for mode ${plan.mode} has no commands`);
    }

    this.cancelRequested = false;
    const first = plan.commands[0];
    this.transition({ status: 'running', commandIndex: 0, commandCount: plan.commands.length, command: first });
    logger.info({ mode: plan.mode, commands: plan.commands.map(formatCommand) }, 'run started');
    this.current = this.drive(plan);
  }

  /** Resolves with the terminal state of the latest run; rejects if no run was started. */
  completion(): Promise<TerminalRunState> {
    if (!this.current) {
      return Promise.reject(new Error('No run has been started'));
    }
    return this.current;
  }

  /** Returns true when the request took effect. */
  requestCancel(): boolean {
    const state = this.state;
    if (state.status !== 'running') return false;
    this.cancelRequested = true;
    this.transition({ status: 'cancelling', commandIndex: state.commandIndex, commandCount: state.commandCount });
    this.active?.cancel();
    return true;
  }

  private async drive(plan: RunPlan): Promise<TerminalRunState> {
    let terminal: TerminalRunState;
    try {
      terminal = await this.executePlan(plan);
    } catch (err) {
      const commandIndex = 'commandIndex' in this.state ? this.state.commandIndex : 0;
      logger.error({ err, commandIndex }, 'run aborted');
      terminal = { status: 'failed', commandIndex, exitCode: null, reason: describeError(err) };
    }
    this.transition(terminal);

    let summary: RunSummary | undefined;
    try {
      summary = this.options.scanner.scan(this.options.resultsRoot);
      this.summary = summary;
    } catch (err) {
      logger.error({ err, resultsRoot: this.options.resultsRoot }, 'results scan failed');
    }

    logger.info({ state: terminal }, 'run finished');
    this.notify(o => o.onComplete?.(terminal, summary));
    return terminal;
  }

  private async executePlan(plan: RunPlan): Promise<TerminalRunState> {
    const commandCount = plan.commands.length;

    for (const [commandIndex, command] of plan.commands.entries()) {
      if (this.cancelRequested) {
        return { status: 'completed', cancelled: true };
      }
      if (commandIndex > 0) {
        this.transition({ status: 'running', commandIndex, commandCount, command });
      }
      logger.info({ commandIndex, argv: command.argv }, 'starting command');

      let proc: RunningProcess;
      try {
        proc = await this.options.runner.start(command, { cwd: this.options.cwd });
      } catch (err) {
        if (err instanceof HTSError && err.code === HTSErrorCode.LAUNCH_FAILED) {
          logger.error({ commandIndex, argv: command.argv, context: err.context }, err.message);
          return { status: 'failed', commandIndex, exitCode: null, reason: err.message };
        }
        throw err;
      }

      this.active = proc;
      // A cancel that arrived while the child was spawning had nothing to signal yet.
      if (this.cancelRequested) proc.cancel();

      let readError: unknown;
      try {
        for await (const line of proc.lines()) {
          this.emitLine(commandIndex, line.text);
        }
      } catch (err) {
        readError = err;
        proc.cancel();
      }
      const outcome = await proc.wait();
      this.active = undefined;
      if (readError !== undefined) throw readError;

      if (this.cancelRequested || outcome.kind === 'terminated') {
        return { status: 'completed', cancelled: true };
      }
      if (outcome.exitCode !== 0) {
        return {
          status: 'failed',
          commandIndex,
          exitCode: outcome.exitCode,
          reason: `${formatCommand(command)} exited with code ${outcome.exitCode}`,
        };
      }
    }

    return { status: 'completed', cancelled: false };
  }

  private emitLine(commandIndex: number, text: string): void {
    const line: RunLogLine = { seq: this.nextSeq++, commandIndex, text };
    this.notify(o => o.onLine?.(line));
  }

  private transition(next: RunState): void {
    const frozen = Object.freeze(next);
    this.state = frozen;
    logger.debug({ state: frozen }, 'run state');
    this.notify(o => o.onStateChange?.(frozen));
  }

  private notify(call: (observer: RunObserver) => void): void {
    for (const observer of this.observers) {
      try {
        call(observer);
      } catch (err) {
        logger.warn({ err }, 'run observer threw');
      }
    }
  }
}
