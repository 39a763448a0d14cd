import { z } from 'zod';

/** Supervisor configuration as read from hts.config.yaml. */
export const supervisorConfigSchema = z.object({
  project_root: z.string().min(1),
  // Relative paths resolve against project_root.
  results_dir: z.string().min(1),
  build_tool: z.string().min(1),
  auto_report: z.boolean(),
  testbenches: z.array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'testbench names must be identifiers')).min(1),
  cancel_grace_ms: z.number().int().nonnegative(),
  drain_timeout_ms: z.number().int().nonnegative(),
  run_timeout_seconds: z.number().nonnegative(),
  log_buffer_lines: z.number().int().positive(),
});

export type SupervisorConfig = z.infer<typeof supervisorConfigSchema>;
