import {
  AppError,
  BudgetExhaustedError,
  CancelledError,
  ConfigError,
  isTerminalError,
  ExecutionError,
  NoProgressError,
  TimeoutError,
  type ApplySummary,
  type GenerationOutcome,
  type IterationRecord,
  type Logger,
  type LoopState,
  type SessionStatus,
  type TestResult,
  type ValidationReason,
} from '@patchloop/shared';
import {
  parseResponse,
  summarizeResult,
  type PatchEngine,
  type PatchEngineResult,
  type Snapshot,
  type SnapshotStore,
} from '@patchloop/repo';
import type { ProviderAdapter } from '@patchloop/adapters';
import { compose, type ComposeOptions, type GenerationRequest } from '../feedback';
import type { TranscriptStream } from '../transcript';
import type { Session } from './session';
import { assertTransition } from './transitions';

/**
 * Runs the test command against a snapshot. Implemented by the exec package's TestHarness.
 */
export interface TestRunner {
  run(snapshot: Snapshot): Promise<TestResult>;
}

export interface ControllerDeps {
  store: SnapshotStore;
  engine: PatchEngine;
  harness: TestRunner;
  adapter: ProviderAdapter;
  stream: TranscriptStream;
  logger: Logger;
}

export interface ControllerOptions {
  compose: ComposeOptions;
  generationTimeoutMs: number;
  /** Extra attempts for a test command that could not be started */
  maxExecutionRetries: number;
  /** Cancels the session at the next state boundary */
  signal?: AbortSignal;
  /** Asked before every round after the first; false stops the session */
  confirmContinue?: (session: Session) => Promise<boolean>;
  now?: () => number;
}

export type FinalStatus = Exclude<SessionStatus, 'running'>;

export interface SessionResult {
  sessionId: string;
  status: FinalStatus;
  initialSnapshot: Snapshot;
  /** Last applied snapshot, or the initial one if nothing was ever applied */
  finalSnapshot: Snapshot;
  transcript: readonly IterationRecord[];
  iterations: number;
  error?: AppError;
}

const CANCELLED = Symbol('cancelled');

function rejected(reason: ValidationReason, message: string): GenerationOutcome {
  return { kind: 'malformed', reason, message };
}

function firstLine(text: string): string {
  return text.trim().split('\n')[0] ?? '';
}

function describeApply(result: PatchEngineResult): string {
  switch (result.status) {
    case 'applied':
      return `applied ${result.filesChanged.join(', ')}`;
    case 'conflict':
      return result.conflicts.map((c) => `${c.path}: ${c.reason}`).join('; ');
    case 'rejected':
      return result.issues.map((i) => i.message).join('; ');
  }
}

function harnessFailure(error: unknown): TestResult {
  const result: TestResult = {
    status: 'execution-error',
    exitCode: null,
    tests: [],
    output: error instanceof Error ? error.message : String(error),
    durationMs: 0,
    truncated: false,
  };
  return Object.freeze(result);
}

/**
 * Drives one session through generate, apply, test and evaluate until the
 * tests pass, the budget runs out or the session is cancelled. Every
 * accepted transition is appended to the transcript stream.
 */
export class IterationController {
  private current: LoopState = 'idle';
  private terminalError: AppError | undefined;

  constructor(
    private readonly deps: ControllerDeps,
    private readonly options: ControllerOptions,
  ) {}

  get state(): LoopState {
    return this.current;
  }

  private get aborted(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  private now(): number {
    return this.options.now ? this.options.now() : Date.now();
  }

  async run(session: Session): Promise<SessionResult> {
    if (this.current !== 'idle') {
      throw new AppError('UnknownError', 'An iteration controller runs a single session');
    }

    try {
      if (this.aborted) {
        await this.end(session, 'aborted', new CancelledError());
      } else {
        await this.transition(session, 'generating');
        let again = true;
        while (again) {
          again = await this.round(session);
        }
      }
    } catch (unexpected: unknown) {
      const error =
        unexpected instanceof AppError
          ? unexpected
          : new AppError(
              'UnknownError',
              unexpected instanceof Error ? unexpected.message : String(unexpected),
              { cause: unexpected },
            );
      await this.end(session, 'failed', error);
    }

    return {
      sessionId: session.id,
      status: session.status === 'running' ? 'failed' : session.status,
      initialSnapshot: session.initial,
      finalSnapshot: session.current,
      transcript: [...session.transcript],
      iterations: session.iterations,
      ...(this.terminalError ? { error: this.terminalError } : {}),
    };
  }

  /**
   * One round, entered in `generating`. Returns true when the controller is
   * back in `generating` for another round.
   */
  private async round(session: Session): Promise<boolean> {
    const request = compose(session, this.options.compose);
    const outcome = await this.generate(session, request);
    if (outcome === CANCELLED || this.aborted) {
      await this.end(session, 'aborted', new CancelledError());
      return false;
    }

    if (outcome.kind === 'no-change') {
      return this.finishUnchanged(session, request);
    }

    await this.transition(session, 'applying');
    const result = this.deps.engine.apply(session.current, outcome);
    const apply: ApplySummary = summarizeResult(result);
    const patchSet = outcome.kind === 'patch' ? outcome.patchSet : null;

    if (result.status !== 'applied') {
      const record = this.appendRecord(session, request, {
        outcome: outcome.kind,
        patchSet,
        apply,
        test: null,
      });
      return this.next(session, record, describeApply(result));
    }

    this.deps.store.verify(result.snapshot);
    session.current = result.snapshot;
    session.lastTest = null;

    if (this.aborted) {
      const record = this.appendRecord(session, request, { outcome: 'patch', patchSet, apply, test: null });
      await this.end(session, 'aborted', new CancelledError(), record);
      return false;
    }

    await this.transition(session, 'testing', { detail: describeApply(result) });
    const test = await this.runTests(session.current);
    session.lastTest = test;
    const record = this.appendRecord(session, request, { outcome: 'patch', patchSet, apply, test });
    await this.transition(session, 'evaluating', { record, detail: test.status });
    return this.evaluate(session, test);
  }

  /**
   * A no-change answer makes the current snapshot final. An untested
   * snapshot is tested first.
   */
  private async finishUnchanged(session: Session, request: GenerationRequest): Promise<boolean> {
    let test = session.lastTest;
    if (!test) {
      await this.transition(session, 'testing', { detail: 'no change proposed' });
      test = await this.runTests(session.current);
      session.lastTest = test;
    }
    const record = this.appendRecord(session, request, {
      outcome: 'no-change',
      patchSet: null,
      apply: null,
      test,
    });
    await this.transition(session, 'evaluating', { record, detail: 'no change proposed' });

    if (this.aborted) {
      await this.end(session, 'aborted', new CancelledError());
    } else if (test.status === 'passed') {
      await this.end(session, 'succeeded');
    } else if (test.status === 'execution-error') {
      await this.end(session, 'failed', this.executionFailure(session, test));
    } else {
      await this.end(
        session,
        'failed',
        new NoProgressError(`No further changes proposed; last test run ${test.status}`),
      );
    }
    return false;
  }

  private async generate(
    session: Session,
    request: GenerationRequest,
  ): Promise<GenerationOutcome | typeof CANCELLED> {
    const timeoutMs = this.options.generationTimeoutMs;
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    this.options.signal?.addEventListener('abort', onAbort);

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError(`Generation timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      const response = await Promise.race([
        this.deps.adapter.generate(
          { messages: request.messages, tools: request.tools, toolChoice: 'auto' },
          {
            sessionId: session.id,
            logger: this.deps.logger,
            abortSignal: controller.signal,
            timeoutMs,
          },
        ),
        timeout,
      ]);
      return parseResponse(response);
    } catch (error: unknown) {
      if (this.aborted || error instanceof CancelledError) {
        return CANCELLED;
      }
      if (error instanceof ConfigError || isTerminalError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      await this.deps.logger.warn(`Generation failed in round ${request.iteration}: ${message}`);
      return error instanceof TimeoutError
        ? rejected('generation-timeout', message)
        : rejected('generation-error', message);
    } finally {
      clearTimeout(timer);
      this.options.signal?.removeEventListener('abort', onAbort);
    }
  }

  private async runTests(snapshot: Snapshot): Promise<TestResult> {
    const maxRetries = this.options.maxExecutionRetries;
    for (let attempt = 0; ; attempt++) {
      const result = await this.deps.harness
        .run(snapshot)
        .catch((error: unknown) => harnessFailure(error));
      if (result.status !== 'execution-error' || attempt >= maxRetries) {
        return result;
      }
      await this.deps.logger.warn(
        `Test command could not be run (attempt ${attempt + 1} of ${maxRetries + 1}): ${firstLine(result.output)}`,
      );
    }
  }

  private async evaluate(session: Session, test: TestResult): Promise<boolean> {
    if (this.aborted) {
      await this.end(session, 'aborted', new CancelledError());
      return false;
    }
    if (test.status === 'passed') {
      await this.end(session, 'succeeded');
      return false;
    }
    if (test.status === 'execution-error') {
      await this.end(session, 'failed', this.executionFailure(session, test));
      return false;
    }
    return this.next(session, undefined, `tests ${test.status}`);
  }

  private executionFailure(session: Session, test: TestResult): ExecutionError {
    return new ExecutionError(
      `Test command "${session.testCommand}" could not be run: ${firstLine(test.output)}`,
    );
  }

  /**
   * Leaves `applying` or `evaluating` for another round, or ends the session.
   */
  private async next(
    session: Session,
    record: IterationRecord | undefined,
    detail: string,
  ): Promise<boolean> {
    const { maxIterations, maxWallTimeMs } = session.budget;

    if (this.aborted) {
      await this.end(session, 'aborted', new CancelledError(), record);
      return false;
    }
    if (session.iterations >= maxIterations) {
      await this.end(
        session,
        'failed',
        new BudgetExhaustedError(`${session.iterations} of ${maxIterations} iterations used`),
        record,
      );
      return false;
    }
    if (maxWallTimeMs !== undefined && this.now() - session.startedAt >= maxWallTimeMs) {
      await this.end(
        session,
        'failed',
        new BudgetExhaustedError(`wall time of ${maxWallTimeMs}ms exceeded`),
        record,
      );
      return false;
    }
    if (this.options.confirmContinue && !(await this.options.confirmContinue(session))) {
      await this.end(
        session,
        'aborted',
        new CancelledError(`Stopped before round ${session.iterations + 1}`),
        record,
      );
      return false;
    }

    await this.transition(session, 'generating', { record, detail });
    return true;
  }

  private appendRecord(
    session: Session,
    request: GenerationRequest,
    fields: Pick<IterationRecord, 'outcome' | 'patchSet' | 'apply' | 'test'>,
  ): IterationRecord {
    const record: IterationRecord = {
      iteration: session.iterations + 1,
      ...fields,
      snapshotGeneration: session.current.generation,
      requestDigest: request.digest,
      timestamp: new Date(this.now()).toISOString(),
    };
    Object.freeze(record);
    session.transcript.push(record);
    session.iterations = session.transcript.length;
    return record;
  }

  private async end(
    session: Session,
    state: FinalStatus,
    error?: AppError,
    record?: IterationRecord,
  ): Promise<void> {
    await this.transition(session, state, { record, detail: error?.message });
    session.status = state;
    this.terminalError = error;
  }

  private async transition(
    session: Session,
    to: LoopState,
    extra: { record?: IterationRecord; detail?: string } = {},
  ): Promise<void> {
    const from = this.current;
    assertTransition(from, to);
    this.current = to;

    const event = this.deps.stream.append({
      type: 'StateChanged',
      from,
      state: to,
      iteration: session.iterations,
      ...(extra.record ? { record: extra.record } : {}),
      ...(extra.detail ? { detail: extra.detail } : {}),
    });
    await this.deps.logger.log(event);
    await this.deps.logger.debug(
      `${from} -> ${to} (iteration ${session.iterations})${extra.detail ? `: ${extra.detail}` : ''}`,
    );
  }
}
