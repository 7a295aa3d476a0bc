import type { AppError } from '@patchloop/shared';
import type { Snapshot } from '@patchloop/repo';
import type { SessionResult } from '../controller';

export const SUMMARY_SCHEMA_VERSION = 1;

export interface SessionSummary {
  schemaVersion: typeof SUMMARY_SCHEMA_VERSION;
  sessionId: string;
  status: SessionResult['status'];
  iterations: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  initialSnapshot: string;
  finalSnapshot: string;
  /** Paths that differ between the initial and final snapshots */
  filesChanged: string[];
  /** Outcome of the last test run, if any */
  lastTestStatus: string | null;
  error?: { code: string; message: string };
}

/**
 * Sorted paths added, removed or changed between two snapshots.
 */
export function diffPaths(before: Snapshot, after: Snapshot): string[] {
  const changed = new Set<string>();
  for (const path of after.paths) {
    if (before.blobDigest(path) !== after.blobDigest(path)) changed.add(path);
  }
  for (const path of before.paths) {
    if (!after.has(path)) changed.add(path);
  }
  return [...changed].sort();
}

function describeError(error: AppError | undefined): SessionSummary['error'] {
  return error ? { code: error.code, message: error.message } : undefined;
}

export function buildSessionSummary(
  result: SessionResult,
  startedAt: number,
  finishedAt: number,
): SessionSummary {
  const lastTest = [...result.transcript].reverse().find((r) => r.test !== null)?.test ?? null;
  const error = describeError(result.error);
  return {
    schemaVersion: SUMMARY_SCHEMA_VERSION,
    sessionId: result.sessionId,
    status: result.status,
    iterations: result.iterations,
    startedAt: new Date(startedAt).toISOString(),
    finishedAt: new Date(finishedAt).toISOString(),
    durationMs: finishedAt - startedAt,
    initialSnapshot: result.initialSnapshot.id,
    finalSnapshot: result.finalSnapshot.id,
    filesChanged: diffPaths(result.initialSnapshot, result.finalSnapshot),
    lastTestStatus: lastTest?.status ?? null,
    ...(error ? { error } : {}),
  };
}
