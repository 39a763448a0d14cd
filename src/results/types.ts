export type ArtifactCategory = 'simulation' | 'synthesis' | 'coverage';

export type TestStatus = 'pass' | 'fail';

export interface TestResult {
  readonly name: string;
  readonly status: TestStatus;
  readonly category: ArtifactCategory;
}

export interface RunSummary {
  readonly counts: Readonly<Record<ArtifactCategory, number>>;
  // Only simulation produces per-item results; synthesis and coverage are counts.
  readonly results: readonly TestResult[];
  readonly timestamp: Date;
}

export interface SummaryScanner {
  scan(resultsRoot: string): RunSummary;
}
