import fs from 'fs';
import { type LoopEvent, type EventWriter } from '../types/events';
import type { Logger } from '../logger/types';
import { redact } from '../redaction';

/**
 * Streams loop events to an append-only JSONL file, one redacted event per line.
 */
export class JsonlEventWriter implements EventWriter {
  private readonly stream: fs.WriteStream;
  private closed = false;
  private failure?: Error;

  constructor(
    private readonly logPath: string,
    private readonly logger?: Logger,
  ) {
    this.stream = fs.createWriteStream(this.logPath, { flags: 'a' });
    this.stream.on('error', (error) => {
      this.failure = error;
      void this.logger?.error(error, `Event log ${this.logPath} is no longer writable`);
    });
  }

  write(event: LoopEvent): void {
    if (this.closed || this.failure) {
      void this.logger?.warn(`Dropped event ${event.seq}: writer for ${this.logPath} is closed`);
      return;
    }
    this.stream.write(JSON.stringify(redact(event)) + '\n');
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      if (this.closed) {
        resolve();
        return;
      }
      this.closed = true;
      this.stream.end(() => resolve());
    });
  }
}
