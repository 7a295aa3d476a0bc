import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import { withDir } from 'tmp-promise';
import {
  ExecutionError,
  TimeoutError,
  type Logger,
  type TestResult,
  type TestsConfig,
} from '@patchloop/shared';
import { checkout, type Snapshot } from '@patchloop/repo';
import { ProcessRunner, type RunResult } from '../runner/runner';
import { parseTestOutput } from './output-parser';

export type HarnessOptions = Pick<
  TestsConfig,
  | 'command'
  | 'timeoutMs'
  | 'gracePeriodMs'
  | 'maxOutputBytes'
  | 'linkPaths'
  | 'pathPrepend'
  | 'envAllowlist'
  | 'env'
> & {
  /** Directory `linkPaths` are resolved against */
  projectRoot?: string;
  /** Snapshot paths materialized with the executable bit */
  executables?: readonly string[];
};

/** Shells report a command they cannot find with this exit code. */
const COMMAND_NOT_FOUND = 127;

function freeze(result: TestResult): TestResult {
  for (const test of result.tests) Object.freeze(test);
  Object.freeze(result.tests);
  return Object.freeze(result);
}

/**
 * Runs the project's test command against a snapshot materialized in a
 * scoped temporary directory. Never throws for failing, hanging or
 * unstartable commands; those become statuses on the result.
 */
export class TestHarness {
  constructor(
    private readonly options: HarnessOptions,
    private readonly runner: ProcessRunner = new ProcessRunner(),
    private readonly logger?: Logger,
  ) {}

  async run(snapshot: Snapshot): Promise<TestResult> {
    const started = Date.now();
    return withDir(
      async ({ path: tmpPath }) => {
        const dir = await fs.realpath(tmpPath);
        await checkout(snapshot, dir, { executables: this.options.executables });
        await this.linkProjectPaths(snapshot, dir);
        void this.logger?.debug(
          `Running "${this.options.command}" against snapshot ${snapshot.generation} in ${dir}`,
        );
        try {
          const result = await this.runner.run({
            command: this.options.command,
            cwd: dir,
            timeoutMs: this.options.timeoutMs,
            gracePeriodMs: this.options.gracePeriodMs,
            maxOutputBytes: this.options.maxOutputBytes,
            env: this.options.env,
            envAllowlist: this.options.envAllowlist,
            pathPrepend: this.options.pathPrepend.map((p) => path.resolve(dir, p)),
          });
          return this.fromRun(result);
        } catch (error) {
          return this.fromError(error, Date.now() - started);
        }
      },
      { unsafeCleanup: true, prefix: 'patchloop-run-' },
    );
  }

  private async linkProjectPaths(snapshot: Snapshot, dir: string): Promise<void> {
    const { projectRoot } = this.options;
    if (!projectRoot) return;
    for (const relPath of this.options.linkPaths) {
      if (snapshot.has(relPath)) continue;
      const source = path.resolve(projectRoot, relPath);
      let stats: Stats;
      try {
        stats = await fs.stat(source);
      } catch (error) {
        void this.logger?.warn(`Skipping link path ${relPath}: ${String(error)}`);
        continue;
      }
      const target = path.join(dir, relPath);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.symlink(source, target, stats.isDirectory() ? 'junction' : 'file');
    }
  }

  private fromRun(run: RunResult): TestResult {
    const status =
      run.exitCode === 0
        ? 'passed'
        : run.exitCode === COMMAND_NOT_FOUND
          ? 'execution-error'
          : 'failed';
    return freeze({
      status,
      exitCode: run.exitCode,
      tests: parseTestOutput(run.output),
      output: run.output,
      durationMs: run.durationMs,
      truncated: run.truncated,
    });
  }

  private fromError(error: unknown, durationMs: number): TestResult {
    if (error instanceof TimeoutError) {
      return freeze({
        status: 'timed-out',
        exitCode: null,
        tests: parseTestOutput(error.partialOutput),
        output: `${error.partialOutput}\n${error.message}`.trimStart(),
        durationMs,
        truncated: false,
      });
    }
    if (error instanceof ExecutionError) {
      return freeze({
        status: 'execution-error',
        exitCode: null,
        tests: [],
        output: error.message,
        durationMs,
        truncated: false,
      });
    }
    throw error;
  }
}
