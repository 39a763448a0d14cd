// Config loader — reads hts.config.yaml (or $HTS_CONFIG) and deep-merges it over defaults.
// No file means defaults. A file that fails to parse or validate is logged and ignored;
// the server still starts with defaults.
import { readFileSync, existsSync } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_TESTBENCHES } from '../plan/types.js';
import { DEFAULT_BUILD_TOOL } from '../plan/command-plan.js';
import { logger } from '../shared/logger.js';
import { describeError } from '../shared/errors.js';
import { supervisorConfigSchema } from '../types/config.js';
import type { SupervisorConfig } from '../types/config.js';

export const CONFIG_FILE_NAME = 'hts.config.yaml';

export function defaultConfig(cwd: string = process.cwd()): SupervisorConfig {
  return {
    project_root: cwd,
    results_dir: 'results',
    build_tool: DEFAULT_BUILD_TOOL,
    auto_report: true,
    testbenches: [...DEFAULT_TESTBENCHES],
    cancel_grace_ms: 5_000,
    drain_timeout_ms: 1_000,
    run_timeout_seconds: 0,
    log_buffer_lines: 500,
  };
}

export interface ConfigResult {
  config: SupervisorConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string, cwd: string = process.cwd()): ConfigResult {
  const configPath = path.resolve(cwd, explicitPath ?? process.env['HTS_CONFIG'] ?? CONFIG_FILE_NAME);
  const defaults = defaultConfig(cwd);

  if (!existsSync(configPath)) {
    logger.info({ configPath }, 'No config file found, using defaults');
    return { config: defaults, configPath, fromFile: false };
  }

  try {
    const parsed: unknown = parseYaml(readFileSync(configPath, 'utf-8'));
    const merged = deepMerge(defaults, isRecord(parsed) ? parsed : {});
    const config = supervisorConfigSchema.parse(merged);
    // project_root in the file is relative to the file itself
    config.project_root = path.resolve(path.dirname(configPath), config.project_root);
    return { config, configPath, fromFile: true };
  } catch (err) {
    logger.error({ configPath, error: describeError(err) }, 'Invalid config, using defaults');
    return { config: defaults, configPath, fromFile: false };
  }
}

export function resolveResultsRoot(config: SupervisorConfig): string {
  return path.resolve(config.project_root, config.results_dir);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
