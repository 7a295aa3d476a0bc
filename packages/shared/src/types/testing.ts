/**
 * Overall status of one test-command run.
 * `timed-out` and `execution-error` are results, not exceptions.
 */
export type TestStatus = 'passed' | 'failed' | 'timed-out' | 'execution-error';

/**
 * A single test case recovered from the command output.
 */
export interface TestCaseResult {
  name: string;
  passed: boolean;
  /** Output attributed to this test, if the format allows it */
  output: string;
}

export interface TestResult {
  status: TestStatus;
  /** Process exit code; null when the process never exited on its own */
  exitCode: number | null;
  tests: TestCaseResult[];
  /** Combined stdout and stderr */
  output: string;
  durationMs: number;
  /** Output exceeded the capture limit */
  truncated: boolean;
}
