// One-shot build-tool targets that sit outside a run plan. They buffer their output
// instead of streaming it; none of them is long-running.
import { CHECK_ENV_TARGET, CLEAN_TARGET, REPORT_TARGET } from '../plan/command-plan.js';
import { run, runOrThrow } from '../shared/exec.js';
import type { ExecResult } from '../shared/exec.js';
import { logger } from '../shared/logger.js';
import type { SupervisorConfig } from '../types/config.js';

const MAINTENANCE_TIMEOUT_MS = 120_000;

type ProjectSettings = Pick<SupervisorConfig, 'project_root' | 'build_tool'>;

export async function clearResults(settings: ProjectSettings): Promise<void> {
  await runOrThrow(settings.build_tool, [CLEAN_TARGET], {
    cwd: settings.project_root,
    timeoutMs: MAINTENANCE_TIMEOUT_MS,
  });
  logger.info({ projectRoot: settings.project_root }, 'results cleared');
}

export async function generateReport(settings: ProjectSettings): Promise<ExecResult> {
  return runOrThrow(settings.build_tool, [REPORT_TARGET], {
    cwd: settings.project_root,
    timeoutMs: MAINTENANCE_TIMEOUT_MS,
  });
}

/** Runs the environment check; a failing check is reported, not thrown. */
export async function checkEnvironment(settings: ProjectSettings): Promise<ExecResult> {
  return run(settings.build_tool, [CHECK_ENV_TARGET], {
    cwd: settings.project_root,
    timeoutMs: MAINTENANCE_TIMEOUT_MS,
  });
}
