import * as fs from 'fs/promises';
import type { LoopEvent } from '../types/events';
import { redact } from '../redaction';
import type { Logger } from './types';
import { formatBindings } from './consoleLogger';

/**
 * Appends events to a JSONL file and forwards plain messages to a delegate
 * (usually the console logger), so a session keeps one durable trace.
 */
export class JsonlLogger implements Logger {
  constructor(
    private readonly filePath: string,
    private readonly delegate: Logger,
    private readonly bindings: Record<string, unknown> = {},
  ) {}

  async log(event: LoopEvent): Promise<void> {
    const line = JSON.stringify(redact(event)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging never fails the session.
      this.delegate.error(
        error instanceof Error ? error : new Error(String(error)),
        `Failed to write to log file at ${this.filePath}`,
      );
    }
  }

  async trace(event: LoopEvent, message: string): Promise<void> {
    await this.log(event);
    await this.delegate.debug(formatBindings(this.bindings, message));
  }

  debug(message: string) {
    return this.delegate.debug(formatBindings(this.bindings, message));
  }

  info(message: string) {
    return this.delegate.info(formatBindings(this.bindings, message));
  }

  warn(message: string) {
    return this.delegate.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string) {
    return this.delegate.error(
      error,
      message ? formatBindings(this.bindings, message) : undefined,
    );
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, this.delegate, { ...this.bindings, ...bindings });
  }
}
