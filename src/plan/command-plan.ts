// Maps a selected test mode to the ordered build-tool invocations for one run.
// The target table is fixed; the Makefile of the verification project defines these names.
import { HTSError, HTSErrorCode } from '../shared/errors.js';
import { DEFAULT_TESTBENCHES, TEST_MODES } from './types.js';
import type { CommandSpec, RunPlan, TestMode } from './types.js';

export const DEFAULT_BUILD_TOOL = 'make';
export const REPORT_TARGET = 'html-report';
export const CLEAN_TARGET = 'clean';
export const CHECK_ENV_TARGET = 'check-env';

const MODE_TARGETS: Record<Exclude<TestMode, 'testbench'>, string> = {
  all: 'all',
  simulation: 'sim',
  synthesis: 'syn',
  coverage: 'cov',
  parallel: 'parallel-all',
  fast: 'fast-build',
};

export interface PlanOptions {
  testbench?: string;
  autoReport: boolean;
  tool?: string;
  testbenches?: readonly string[];
}

export function isTestMode(value: string): value is TestMode {
  return TEST_MODES.some(m => m === value);
}

export function buildPlan(mode: TestMode, options: PlanOptions): RunPlan {
  const tool = options.tool ?? DEFAULT_BUILD_TOOL;
  const command = (target: string): CommandSpec => ({ argv: [tool, target] });

  let primary: CommandSpec;
  if (mode === 'testbench') {
    primary = command(`sim-${resolveTestbench(options.testbench, options.testbenches ?? DEFAULT_TESTBENCHES)}`);
  } else if (isTestMode(mode)) {
    primary = command(MODE_TARGETS[mode]);
  } else {
    throw new HTSError(HTSErrorCode.INVALID_MODE, `Unknown test mode: ${String(mode)}`);
  }

  const commands = options.autoReport ? [primary, command(REPORT_TARGET)] : [primary];
  return mode === 'testbench'
    ? { mode, testbench: options.testbench, commands }
    : { mode, commands };
}

function resolveTestbench(name: string | undefined, known: readonly string[]): string {
  if (!name) {
    throw new HTSError(HTSErrorCode.INVALID_MODE, 'Individual testbench mode requires a testbench name');
  }
  if (!known.includes(name)) {
    throw new HTSError(HTSErrorCode.INVALID_MODE, `Unknown testbench: ${name}`, { known: known.join(', ') });
  }
  return name;
}

export function formatCommand(command: CommandSpec): string {
  return command.argv.join(' ');
}
