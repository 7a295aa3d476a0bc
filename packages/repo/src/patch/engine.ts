import type { ApplySummary, GenerationOutcome, ValidationIssue } from '@patchloop/shared';
import type { Snapshot } from '../workspace/snapshot';
import type { ApplyResult, SnapshotStore } from '../workspace/store';
import { validatePatchSet, type PatchLimits } from './validator';

export type PatchEngineResult = ApplyResult | { status: 'rejected'; issues: ValidationIssue[] };

/**
 * Validates a generation outcome and, when it carries an acceptable patch
 * set, derives a new snapshot from `base`. Conflicts are returned as is;
 * the caller decides whether to re-prompt.
 */
export class PatchEngine {
  constructor(
    private readonly store: SnapshotStore,
    private readonly limits: PatchLimits,
  ) {}

  apply(base: Snapshot, outcome: GenerationOutcome): PatchEngineResult {
    if (outcome.kind === 'malformed') {
      return { status: 'rejected', issues: [{ reason: outcome.reason, message: outcome.message }] };
    }
    if (outcome.kind === 'no-change') {
      return {
        status: 'rejected',
        issues: [{ reason: 'empty-patch', message: 'No changes were proposed' }],
      };
    }

    const issues = validatePatchSet(outcome.patchSet, this.limits);
    if (issues.length > 0) {
      return { status: 'rejected', issues };
    }
    return this.store.derive(base, outcome.patchSet);
  }
}

/**
 * Serializable form of a result for transcripts and events.
 */
export function summarizeResult(result: PatchEngineResult): ApplySummary {
  switch (result.status) {
    case 'applied':
      return {
        status: 'applied',
        snapshotId: result.snapshot.id,
        generation: result.snapshot.generation,
        filesChanged: result.filesChanged,
      };
    case 'conflict':
      return { status: 'conflict', conflicts: result.conflicts };
    case 'rejected':
      return { status: 'rejected', issues: result.issues };
  }
}
