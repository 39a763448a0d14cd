import execa from 'execa';
import { HTSError, HTSErrorCode } from './errors.js';
import { logger } from './logger.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

export async function run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  logger.debug({ command, args, cwd: options?.cwd }, 'exec');
  const result = await execa(command, args, {
    cwd: options?.cwd,
    env: options?.env,
    timeout: options?.timeoutMs,
    reject: false,
  });
  // reject: false turns a spawn failure into a failed result with no exit code
  if (result.failed && typeof result.exitCode !== 'number' && !result.signal) {
    throw new HTSError(HTSErrorCode.LAUNCH_FAILED, `Command failed to spawn: ${command}`, {
      command: result.command,
    });
  }
  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    exitCode: typeof result.exitCode === 'number' ? result.exitCode : 128,
    signal: result.signal ?? undefined,
  };
}

export async function runOrThrow(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  const result = await run(command, args, options);
  if (result.exitCode !== 0) {
    throw new HTSError(
      HTSErrorCode.COMMAND_FAILED,
      `Command exited with ${result.exitCode}: ${[command, ...args].join(' ')}`,
      {
        stdout: result.stdout,
        stderr: result.stderr,
      }
    );
  }
  return result;
}
