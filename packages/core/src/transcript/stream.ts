import { EventEmitter } from 'events';
import {
  EVENT_SCHEMA_VERSION,
  UsageError,
  type Logger,
  type LoopEvent,
  type StateChanged,
} from '@patchloop/shared';

export type EventInput = Omit<StateChanged, 'schemaVersion' | 'seq' | 'timestamp' | 'sessionId'>;

export type EventListener = (event: LoopEvent) => void;

const CHANGED = 'changed';

/**
 * Durable, replayable log of one session's events. A single writer appends;
 * any number of readers attach at any time and receive everything from the
 * sequence number they ask for, then live events until the stream closes.
 * A reader that throws is reported and skipped; the writer never sees it.
 */
export class TranscriptStream {
  private readonly history: LoopEvent[] = [];
  private readonly emitter = new EventEmitter();
  private isClosed = false;

  constructor(
    readonly sessionId: string,
    private readonly clock: () => Date = () => new Date(),
    private readonly logger?: Logger,
  ) {
    this.emitter.setMaxListeners(0);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get length(): number {
    return this.history.length;
  }

  events(): readonly LoopEvent[] {
    return [...this.history];
  }

  append(input: EventInput): LoopEvent {
    if (this.isClosed) {
      throw new UsageError(`Transcript for session ${this.sessionId} is closed`);
    }
    const event: LoopEvent = {
      schemaVersion: EVENT_SCHEMA_VERSION,
      seq: this.history.length,
      timestamp: this.clock().toISOString(),
      sessionId: this.sessionId,
      ...input,
    };
    this.history.push(event);
    this.emitter.emit(CHANGED);
    return event;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.emitter.emit(CHANGED);
    this.emitter.removeAllListeners(CHANGED);
  }

  /**
   * Replays events from `fromSeq`, then yields live ones until the stream is closed.
   */
  async *subscribe(fromSeq = 0): AsyncGenerator<LoopEvent, void, undefined> {
    let next = Math.max(0, fromSeq);
    while (true) {
      if (next < this.history.length) {
        yield this.history[next++];
        continue;
      }
      if (this.isClosed) return;
      await new Promise<void>((resolve) => this.emitter.once(CHANGED, resolve));
    }
  }

  /**
   * Callback form of {@link subscribe}: history is delivered synchronously,
   * then every appended event as it arrives. Returns an unsubscribe function.
   */
  on(listener: EventListener, fromSeq = 0): () => void {
    let next = Math.max(0, fromSeq);
    const deliver = () => {
      while (next < this.history.length) {
        const event = this.history[next++];
        try {
          listener(event);
        } catch (error: unknown) {
          this.reportListenerError(error, event);
        }
      }
    };
    deliver();
    if (this.isClosed) return () => undefined;
    this.emitter.on(CHANGED, deliver);
    return () => {
      this.emitter.off(CHANGED, deliver);
    };
  }

  private reportListenerError(error: unknown, event: LoopEvent): void {
    const failure = error instanceof Error ? error : new Error(String(error));
    const message = `Transcript listener failed on event ${event.seq} of session ${this.sessionId}`;
    if (this.logger) {
      void this.logger.error(failure, message);
    } else {
      process.emitWarning(`${message}: ${failure.message}`);
    }
  }
}
