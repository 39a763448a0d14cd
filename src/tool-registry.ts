import { z } from 'zod';
import { TEST_MODES } from './plan/types.js';

export interface ToolDef {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
}

export const runTestsInput = z.object({
  mode: z.enum(TEST_MODES).describe('all | simulation | synthesis | coverage | parallel | fast | testbench'),
  testbench: z.string().optional().describe('Testbench name, required when mode is "testbench", e.g. tb_jtag_controller'),
  autoReport: z.boolean().optional().describe('Append the HTML report target to the plan. Defaults to the auto_report config value.'),
});

export const runStatusInput = z.object({
  sinceSeq: z.number().int().min(-1).optional().default(-1)
    .describe('Only return output lines with a sequence number greater than this. Numbering continues across runs.'),
});

export const exportResultsInput = z.object({
  destination: z.string().min(1).describe('Path of the JSON file to write, relative to the project root or absolute'),
});

export const emptyInput = z.object({});

// ── Run control ────────────────────────────────────────────────

const runTools: ToolDef[] = [
  {
    name: 'hts_run_tests',
    description: 'Start a test run for the selected mode. Commands run sequentially in the background; the first failure aborts the rest.',
    inputSchema: runTestsInput,
  },
  {
    name: 'hts_cancel_run',
    description: 'Cancel the run in progress. The current command is terminated and no further commands start.',
    inputSchema: emptyInput,
  },
  {
    name: 'hts_get_run_status',
    description: 'Get the run state and the streamed build output since a sequence number.',
    inputSchema: runStatusInput,
  },
];

// ── Results ────────────────────────────────────────────────────

const resultTools: ToolDef[] = [
  {
    name: 'hts_get_results',
    description: 'Scan the results directory: simulation pass/fail per testbench, synthesis and coverage counts.',
    inputSchema: emptyInput,
  },
  {
    name: 'hts_export_results',
    description: 'Write the current results summary to a JSON file.',
    inputSchema: exportResultsInput,
  },
  {
    name: 'hts_list_waveforms',
    description: 'List the VCD waveform files produced by simulation.',
    inputSchema: emptyInput,
  },
];

// ── Project ────────────────────────────────────────────────────

const projectTools: ToolDef[] = [
  {
    name: 'hts_clear_results',
    description: 'Delete all results by running the clean target. Rejected while a run is in progress.',
    inputSchema: emptyInput,
  },
  {
    name: 'hts_generate_report',
    description: 'Generate the HTML report from the current results.',
    inputSchema: emptyInput,
  },
  {
    name: 'hts_check_environment',
    description: 'Run the environment check target and return its output.',
    inputSchema: emptyInput,
  },
  {
    name: 'hts_list_testbenches',
    description: 'List the testbenches that can be run individually.',
    inputSchema: emptyInput,
  },
];

export class ToolRegistry {
  getAllTools(): ToolDef[] {
    return [...runTools, ...resultTools, ...projectTools];
  }

  get(name: string): ToolDef | undefined {
    return this.getAllTools().find(t => t.name === name);
  }
}
