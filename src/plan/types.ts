export const TEST_MODES = ['all', 'simulation', 'synthesis', 'coverage', 'parallel', 'fast', 'testbench'] as const;

export type TestMode = typeof TEST_MODES[number];

export const TEST_MODE_LABELS: Record<TestMode, string> = {
  all: 'All Tests',
  simulation: 'Simulation Only',
  synthesis: 'Synthesis Only',
  coverage: 'Coverage Only',
  parallel: 'Parallel Build',
  fast: 'Fast Build',
  testbench: 'Individual Testbench',
};

export const DEFAULT_TESTBENCHES: readonly string[] = [
  'tb_jtag_controller',
  'tb_ieee1500_wrapper',
  'tb_ieee1687_network',
  'tb_boundary_scan_chain',
  'tb_loopback_module',
  'tb_top_module',
];

/** One external invocation; argv[0] is the executable. */
export interface CommandSpec {
  readonly argv: readonly string[];
}

export interface RunPlan {
  readonly mode: TestMode;
  readonly testbench?: string;
  readonly commands: readonly CommandSpec[];
}
