import { UsageError, type LoopState } from '@patchloop/shared';

/**
 * Every state change the iteration controller may make.
 */
export const TRANSITIONS: Readonly<Record<LoopState, readonly LoopState[]>> = {
  idle: ['generating', 'aborted'],
  generating: ['applying', 'testing', 'evaluating', 'failed', 'aborted'],
  applying: ['testing', 'generating', 'failed', 'aborted'],
  testing: ['evaluating'],
  evaluating: ['generating', 'succeeded', 'failed', 'aborted'],
  succeeded: [],
  failed: [],
  aborted: [],
};

export function canTransition(from: LoopState, to: LoopState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: LoopState, to: LoopState): void {
  if (!canTransition(from, to)) {
    throw new UsageError(`Illegal state transition: ${from} -> ${to}`);
  }
}
