// Rebuilds a RunSummary from the results tree on every call. Nothing is cached:
// the build tool rewrites these directories between runs.
import fs from 'fs';
import path from 'path';
import type { RunSummary, SummaryScanner, TestResult } from './types.js';

export const SIMULATION_LOG_DIR = path.join('simulation', 'logs');
export const WAVEFORM_DIR = path.join('simulation', 'waveforms');
export const SYNTHESIS_DIR = 'synthesis';
export const COVERAGE_DIR = 'coverage';

export const SYNTHESIS_SUFFIX = '_synth.v';

// Substring match only: a failing log that mentions the word elsewhere still passes.
export const SIMULATION_SUCCESS_MARKER = 'successful';

export class ArtifactScanner implements SummaryScanner {
  scan(resultsRoot: string, now: Date = new Date()): RunSummary {
    const simulationLogs = listFiles(path.join(resultsRoot, SIMULATION_LOG_DIR), '.log');
    const results = simulationLogs.map((file): TestResult => ({
      name: path.basename(file, '.log'),
      status: fs.readFileSync(file, 'utf-8').includes(SIMULATION_SUCCESS_MARKER) ? 'pass' : 'fail',
      category: 'simulation',
    }));

    return {
      counts: {
        simulation: simulationLogs.length,
        synthesis: listFiles(path.join(resultsRoot, SYNTHESIS_DIR), SYNTHESIS_SUFFIX).length,
        coverage: listFiles(path.join(resultsRoot, COVERAGE_DIR), '.log').length,
      },
      results,
      timestamp: now,
    };
  }
}

export function listWaveforms(resultsRoot: string): string[] {
  return listFiles(path.join(resultsRoot, WAVEFORM_DIR), '.vcd');
}

/** Regular files in dir ending with suffix, sorted by name. A missing dir yields []. */
function listFiles(dir: string, suffix: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR') return [];
    throw err;
  }
  return entries
    .filter(e => e.isFile() && e.name.endsWith(suffix) && e.name.length > suffix.length)
    .map(e => e.name)
    .sort()
    .map(name => path.join(dir, name));
}
