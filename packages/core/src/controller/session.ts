import { randomBytes } from 'crypto';
import type { IterationRecord, SessionStatus, TestResult } from '@patchloop/shared';
import type { Snapshot } from '@patchloop/repo';

export interface SessionBudget {
  /** Rounds allowed before the session fails */
  maxIterations: number;
  maxWallTimeMs?: number;
}

/**
 * State of one prototyping session. Only the iteration controller mutates it.
 */
export interface Session {
  readonly id: string;
  readonly specText: string;
  readonly testCommand: string;
  readonly initial: Snapshot;
  current: Snapshot;
  /** Append-only */
  readonly transcript: IterationRecord[];
  readonly budget: SessionBudget;
  /** Completed rounds; always equal to `transcript.length` */
  iterations: number;
  status: SessionStatus;
  /** Most recent test result for `current`, if it was ever tested */
  lastTest: TestResult | null;
  readonly startedAt: number;
}

export interface CreateSessionOptions {
  id?: string;
  specText: string;
  testCommand: string;
  initial: Snapshot;
  budget: SessionBudget;
  startedAt?: number;
}

export function createSessionId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\..*$/, '').replace('T', '-');
  return `${stamp}-${randomBytes(3).toString('hex')}`;
}

export function createSession(options: CreateSessionOptions): Session {
  return {
    id: options.id ?? createSessionId(),
    specText: options.specText,
    testCommand: options.testCommand,
    initial: options.initial,
    current: options.initial,
    transcript: [],
    budget: options.budget,
    iterations: 0,
    status: 'running',
    lastTest: null,
    startedAt: options.startedAt ?? Date.now(),
  };
}
