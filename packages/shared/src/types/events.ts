import type { IterationRecord, LoopState } from './session';

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Base interface for all loop events.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** Position in the session's event log, starting at 0 */
  seq: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the session */
  sessionId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted on every accepted state transition of the iteration controller.
 */
export interface StateChanged extends BaseEvent {
  type: 'StateChanged';
  from: LoopState;
  state: LoopState;
  /** Completed rounds when the transition happened */
  iteration: number;
  /** Record completed by this transition, if any */
  record?: IterationRecord;
  /** Short human-readable note (conflict reason, failing tests, error message) */
  detail?: string;
}

export type LoopEvent = StateChanged;

/**
 * Interface for writing events to persistent storage.
 */
export interface EventWriter {
  /**
   * Write an event to storage.
   * @param event - The event to write
   */
  write(event: LoopEvent): void;
  /**
   * Close the writer and flush any pending events.
   */
  close(): Promise<void>;
}
