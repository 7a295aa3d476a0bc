import { promises as fs } from 'fs';
import * as path from 'path';
import { pathExists } from 'fs-extra';
import { JsonlLogger, UsageError, type Config, type Logger } from '@patchloop/shared';
import {
  PatchEngine,
  SnapshotStore,
  checkout,
  scanTree,
  type CheckoutResult,
} from '@patchloop/repo';
import { TestHarness } from '@patchloop/exec';
import { IterationController, createSession, type Session, type SessionResult } from './controller';
import { createProviderRegistry, type ProviderRegistry } from './registry';
import { SessionRecorder, type SessionSummary } from './session';
import { TranscriptStream } from './transcript';
import type { UserInterface } from './ui';

export interface PrototyperOptions {
  config: Config;
  projectRoot: string;
  logger: Logger;
  registry?: ProviderRegistry;
  /** Asked between rounds when `session.interactive` is set */
  ui?: UserInterface;
}

export interface PrototypeRunOptions {
  sessionId?: string;
  signal?: AbortSignal;
  /** Called with the session's event stream before the first round */
  onStream?: (stream: TranscriptStream) => void;
}

export interface PrototypeResult {
  result: SessionResult;
  summary: SessionSummary;
  sessionDir: string;
  /** Present when the final snapshot was written back to the project */
  checkout?: CheckoutResult;
}

/**
 * Runs one prototyping session against a project directory: loads the
 * specification and the files, iterates until the tests pass or the budget
 * runs out, records the session and writes the result back.
 */
export class Prototyper {
  private readonly config: Config;
  private readonly projectRoot: string;
  private readonly logger: Logger;
  private readonly registry: ProviderRegistry;
  private readonly ui?: UserInterface;

  constructor(options: PrototyperOptions) {
    this.config = options.config;
    this.projectRoot = options.projectRoot;
    this.logger = options.logger;
    this.registry = options.registry ?? createProviderRegistry(options.config.agent);
    this.ui = options.ui;
  }

  async run(options: PrototypeRunOptions = {}): Promise<PrototypeResult> {
    const { config } = this;
    const specText = await this.readSpec();
    const adapter = this.registry.getAdapter();

    const scan = await scanTree(this.projectRoot, {
      excludes: config.context.excludes,
      maxFileBytes: config.context.maxFileBytes,
    });
    for (const warning of scan.warnings) {
      await this.logger.warn(warning);
    }

    const store = new SnapshotStore();
    const session = createSession({
      id: options.sessionId,
      specText,
      testCommand: config.tests.command,
      initial: store.create(scan.tree),
      budget: {
        maxIterations: config.agent.maxIterations,
        maxWallTimeMs: config.agent.maxWallTimeMs,
      },
    });
    const logger = this.logger.child({ sessionId: session.id });
    await logger.info(
      `Session ${session.id}: ${session.initial.size} files, up to ${session.budget.maxIterations} rounds`,
    );

    const recorder = await SessionRecorder.create(this.projectRoot, session.id, config, logger);
    const stream = new TranscriptStream(session.id, undefined, logger);
    recorder.attach(stream);
    options.onStream?.(stream);

    const harness = new TestHarness(
      {
        command: config.tests.command,
        timeoutMs: config.tests.timeoutMs,
        gracePeriodMs: config.tests.gracePeriodMs,
        maxOutputBytes: config.tests.maxOutputBytes,
        linkPaths: config.tests.linkPaths,
        pathPrepend: config.tests.pathPrepend,
        envAllowlist: config.tests.envAllowlist,
        env: config.tests.env,
        projectRoot: this.projectRoot,
        executables: scan.executables,
      },
      undefined,
      logger,
    );

    const controller = new IterationController(
      {
        store,
        engine: new PatchEngine(store, { ...config.patch, linkedPaths: scan.symlinks }),
        harness,
        adapter,
        stream,
        logger: new JsonlLogger(recorder.paths.trace, logger),
      },
      {
        compose: {
          maxTreeChars: config.context.maxTreeChars,
          maxFeedbackChars: config.context.maxFeedbackChars,
        },
        generationTimeoutMs: config.agent.generationTimeoutMs,
        maxExecutionRetries: config.tests.maxExecutionRetries,
        signal: options.signal,
        confirmContinue: this.confirmContinue(),
      },
    );

    let result: SessionResult;
    try {
      result = await controller.run(session);
    } finally {
      stream.close();
    }

    let written: CheckoutResult | undefined;
    let checkoutError: unknown;
    try {
      if (config.session.checkout && result.finalSnapshot.id !== result.initialSnapshot.id) {
        written = await checkout(result.finalSnapshot, this.projectRoot, {
          base: result.initialSnapshot,
        });
        await logger.info(
          `Wrote ${written.written.length} files and removed ${written.removed.length} in ${this.projectRoot}`,
        );
      }
    } catch (error) {
      checkoutError = error;
    }

    // The session record is complete even when writing back failed.
    const summary = await recorder.finish(result, session.startedAt);
    if (checkoutError !== undefined) {
      throw checkoutError;
    }

    return {
      result,
      summary,
      sessionDir: recorder.paths.root,
      ...(written ? { checkout: written } : {}),
    };
  }

  private async readSpec(): Promise<string> {
    const specPath = path.resolve(this.projectRoot, this.config.project.specPath);
    if (!(await pathExists(specPath))) {
      throw new UsageError(`Specification not found at ${specPath}`);
    }
    const specText = await fs.readFile(specPath, 'utf8');
    if (!specText.trim()) {
      throw new UsageError(`Specification at ${specPath} is empty`);
    }
    return specText;
  }

  private confirmContinue(): ((session: Session) => Promise<boolean>) | undefined {
    const { ui } = this;
    if (!this.config.session.interactive || !ui) return undefined;
    return (session) =>
      ui.confirm(
        `Round ${session.iterations} did not pass the tests. Start round ${session.iterations + 1} of ${session.budget.maxIterations}?`,
      );
  }
}
