// Process layer for build-tool invocations. Every command of a run plan goes through
// ExecaProcessRunner.start(); the supervisor never touches child_process directly.
import readline from 'readline';
import execa from 'execa';
import type { CommandSpec } from '../plan/types.js';
import { HTSError, HTSErrorCode, describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ExitOutcome, LogLine, ProcessRunner, RunningProcess, StartOptions } from './types.js';

export interface ProcessRunnerOptions {
  /** Delay between SIGTERM and SIGKILL when a run is cancelled. */
  cancelGraceMs?: number;
  /** How long lines() keeps reading after exit before closing the pipe. */
  drainTimeoutMs?: number;
}

const DEFAULT_CANCEL_GRACE_MS = 5_000;
const DEFAULT_DRAIN_TIMEOUT_MS = 1_000;

type Subprocess = execa.ExecaChildProcess<string>;

export class ExecaProcessRunner implements ProcessRunner {
  private readonly cancelGraceMs: number;
  private readonly drainTimeoutMs: number;

  constructor(options: ProcessRunnerOptions = {}) {
    this.cancelGraceMs = options.cancelGraceMs ?? DEFAULT_CANCEL_GRACE_MS;
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
  }

  async start(command: CommandSpec, options: StartOptions = {}): Promise<RunningProcess> {
    const [file, ...args] = command.argv;
    if (!file) {
      throw new HTSError(HTSErrorCode.LAUNCH_FAILED, 'Empty command');
    }

    const subprocess = execa(file, args, {
      cwd: options.cwd,
      env: options.env,
      stdin: 'ignore',
      all: true,
      buffer: false,
      reject: false,
    });

    try {
      await waitForSpawn(subprocess);
    } catch (err) {
      throw new HTSError(HTSErrorCode.LAUNCH_FAILED, `Failed to launch ${command.argv.join(' ')}`, {
        cause: describeError(err),
        cwd: options.cwd,
      });
    }

    logger.debug({ argv: command.argv, pid: subprocess.pid }, 'process started');
    return new ExecaRunningProcess(command, subprocess, this.cancelGraceMs, this.drainTimeoutMs);
  }
}

// A synchronous spawn failure (e.g. a NUL byte in an argument) surfaces only as a
// rejection of the execa promise; the child object then emits neither event.
function waitForSpawn(subprocess: Subprocess): Promise<void> {
  const spawnFailed = subprocess.then(() => new Promise<never>(() => undefined));
  const spawned = new Promise<void>((resolve, reject) => {
    const onSpawn = (): void => {
      subprocess.off('error', onError);
      resolve();
    };
    const onError = (err: Error): void => {
      subprocess.off('spawn', onSpawn);
      reject(err);
    };
    subprocess.once('spawn', onSpawn);
    subprocess.once('error', onError);
  });
  return Promise.race([spawned, spawnFailed]);
}

class ExecaRunningProcess implements RunningProcess {
  private cancelRequested = false;
  private exited = false;
  private linesTaken = false;
  private drainExpired = false;
  private reader?: readline.Interface;
  private readonly outcome: Promise<ExitOutcome>;

  constructor(
    readonly command: CommandSpec,
    private readonly subprocess: Subprocess,
    private readonly cancelGraceMs: number,
    private readonly drainTimeoutMs: number,
  ) {
    // execa resolves (reject: false) once the child has exited and been reaped.
    this.outcome = subprocess.then(result => {
      this.exited = true;
      this.scheduleDrainCutoff();
      if (this.cancelRequested) {
        return { kind: 'terminated' } as const;
      }
      const signal = result.signal ?? undefined;
      const exitCode = typeof result.exitCode === 'number' ? result.exitCode : 128;
      return signal ? { kind: 'exited', exitCode, signal } as const : { kind: 'exited', exitCode } as const;
    });
  }

  get pid(): number | undefined {
    return this.subprocess.pid;
  }

  async *lines(): AsyncGenerator<LogLine> {
    if (this.linesTaken) {
      throw new Error(`Output of ${this.command.argv.join(' ')} has already been consumed`);
    }
    this.linesTaken = true;
    const output = this.subprocess.all;
    if (!output) return;

    const rl = readline.createInterface({ input: output, crlfDelay: Infinity });
    this.reader = rl;
    if (this.drainExpired) rl.close();
    let seq = 0;
    try {
      for await (const text of rl) {
        yield { seq: seq++, text };
      }
    } finally {
      rl.close();
      // Whatever is left is discarded so the child never blocks on a full pipe.
      output.resume();
    }
  }

  cancel(): void {
    if (this.cancelRequested || this.exited) return;
    this.cancelRequested = true;
    logger.info({ argv: this.command.argv, pid: this.pid }, 'cancelling process');
    this.subprocess.kill('SIGTERM', { forceKillAfterTimeout: this.cancelGraceMs });
  }

  wait(): Promise<ExitOutcome> {
    if (!this.linesTaken) {
      this.linesTaken = true;
      this.subprocess.all?.resume();
    }
    return this.outcome;
  }

  // A grandchild that inherited the pipe can keep it open after the child exits.
  private scheduleDrainCutoff(): void {
    const output = this.subprocess.all;
    if (!output || output.readableEnded || output.destroyed) return;
    const timer = setTimeout(() => {
      if (output.readableEnded) return;
      logger.warn({ argv: this.command.argv }, 'output still open after exit, closing it');
      this.drainExpired = true;
      this.reader?.close();
      output.destroy();
    }, this.drainTimeoutMs);
    timer.unref();
    output.once('close', () => clearTimeout(timer));
  }
}
