import type { PatchConflict, PatchSet, ValidationIssue } from './patch';
import type { TestResult } from './testing';

/**
 * States of the iteration controller.
 */
export type LoopState =
  | 'idle'
  | 'generating'
  | 'applying'
  | 'testing'
  | 'evaluating'
  | 'succeeded'
  | 'failed'
  | 'aborted';

export type SessionStatus = 'running' | 'succeeded' | 'failed' | 'aborted';

export const TERMINAL_STATES: ReadonlySet<LoopState> = new Set(['succeeded', 'failed', 'aborted']);

/**
 * Serializable form of a patch-engine result, as kept in the transcript.
 */
export type ApplySummary =
  | {
      status: 'applied';
      snapshotId: string;
      generation: number;
      filesChanged: string[];
    }
  | {
      status: 'conflict';
      conflicts: PatchConflict[];
    }
  | {
      status: 'rejected';
      issues: ValidationIssue[];
    };

/**
 * What the generation step produced in a round.
 */
export type RoundOutcome = 'patch' | 'no-change' | 'malformed';

/**
 * One generate/apply/test round. Records are appended, never rewritten.
 */
export interface IterationRecord {
  /** 1-based round index */
  iteration: number;
  outcome: RoundOutcome;
  patchSet: PatchSet | null;
  apply: ApplySummary | null;
  test: TestResult | null;
  /** Generation of the session's current snapshot once the round ended */
  snapshotGeneration: number;
  /** Hash of the generation request that produced this round */
  requestDigest: string;
  timestamp: string;
}
