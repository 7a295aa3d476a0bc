import {
  JsonlEventWriter,
  appendLine,
  atomicWrite,
  redact,
  type Config,
  type EventWriter,
  type Logger,
  type LoopEvent,
} from '@patchloop/shared';
import { ConfigLoader } from '../config/loader';
import type { SessionResult } from '../controller';
import type { TranscriptStream } from '../transcript';
import { createSessionDir, type SessionPaths } from './paths';
import { buildSessionSummary, type SessionSummary } from './summary';

/**
 * Mirrors a session's event stream onto disk: every event goes to
 * `events.jsonl`, every completed round to `transcript.jsonl`, and the
 * outcome to `summary.json` once the session ends.
 */
export class SessionRecorder {
  private pending: Promise<void> = Promise.resolve();
  private detach?: () => void;

  private constructor(
    readonly paths: SessionPaths,
    private readonly events: EventWriter,
    private readonly logger: Logger,
  ) {}

  static async create(
    projectRoot: string,
    sessionId: string,
    config: Config,
    logger: Logger,
  ): Promise<SessionRecorder> {
    const paths = await createSessionDir(projectRoot, sessionId);
    ConfigLoader.writeEffectiveConfig(redact(config), paths.root);
    return new SessionRecorder(paths, new JsonlEventWriter(paths.events, logger), logger);
  }

  attach(stream: TranscriptStream): void {
    this.detach?.();
    this.detach = stream.on((event) => this.record(event));
  }

  private record(event: LoopEvent): void {
    this.events.write(event);
    const { record } = event;
    if (!record) return;
    const line = JSON.stringify(redact(record));
    this.pending = this.pending
      .then(() => appendLine(this.paths.transcript, line))
      .catch((error: unknown) =>
        this.logger.error(
          error instanceof Error ? error : new Error(String(error)),
          `Failed to append round ${record.iteration} to ${this.paths.transcript}`,
        ),
      );
  }

  /**
   * Flushes pending writes, writes the summary and closes the event log.
   */
  async finish(result: SessionResult, startedAt: number, finishedAt = Date.now()): Promise<SessionSummary> {
    this.detach?.();
    this.detach = undefined;
    await this.pending;
    const summary = buildSessionSummary(result, startedAt, finishedAt);
    await atomicWrite(this.paths.summary, JSON.stringify(redact(summary), null, 2));
    await this.events.close();
    return summary;
  }
}
