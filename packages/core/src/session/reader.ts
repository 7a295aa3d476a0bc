import { promises as fs } from 'fs';
import { pathExists } from 'fs-extra';
import { z } from 'zod';
import { UsageError, normalizeNewlines } from '@patchloop/shared';
import { getSessionPaths } from './paths';
import { SUMMARY_SCHEMA_VERSION, type SessionSummary } from './summary';

const TestSchema = z.object({
  status: z.enum(['passed', 'failed', 'timed-out', 'execution-error']),
  exitCode: z.number().nullable(),
  tests: z.array(z.object({ name: z.string(), passed: z.boolean(), output: z.string() })),
  output: z.string(),
  durationMs: z.number(),
  truncated: z.boolean(),
});

const ApplySchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('applied'),
    snapshotId: z.string(),
    generation: z.number(),
    filesChanged: z.array(z.string()),
  }),
  z.object({
    status: z.literal('conflict'),
    conflicts: z.array(z.object({ path: z.string(), reason: z.string(), message: z.string() })),
  }),
  z.object({
    status: z.literal('rejected'),
    issues: z.array(
      z.object({ path: z.string().optional(), reason: z.string(), message: z.string() }),
    ),
  }),
]);

/**
 * A transcript line as read back from disk. Patch bodies are kept opaque.
 */
export const TranscriptEntrySchema = z.object({
  iteration: z.number().int().positive(),
  outcome: z.enum(['patch', 'no-change', 'malformed']),
  patchSet: z.object({ operations: z.array(z.object({ op: z.string(), path: z.string() }).passthrough()) }).nullable(),
  apply: ApplySchema.nullable(),
  test: TestSchema.nullable(),
  snapshotGeneration: z.number(),
  requestDigest: z.string(),
  timestamp: z.string(),
});

export type TranscriptEntry = z.infer<typeof TranscriptEntrySchema>;

const SummarySchema = z.object({
  schemaVersion: z.literal(SUMMARY_SCHEMA_VERSION),
  sessionId: z.string(),
  status: z.enum(['succeeded', 'failed', 'aborted']),
  iterations: z.number(),
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number(),
  initialSnapshot: z.string(),
  finalSnapshot: z.string(),
  filesChanged: z.array(z.string()),
  lastTestStatus: z.string().nullable(),
  error: z.object({ code: z.string(), message: z.string() }).optional(),
}) satisfies z.ZodType<SessionSummary>;

export interface StoredSession {
  sessionId: string;
  transcript: TranscriptEntry[];
  /** Absent while the session is still running or if it crashed */
  summary: SessionSummary | null;
}

function parseLine(line: string, file: string, lineNo: number): TranscriptEntry {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    throw new UsageError(`${file}:${lineNo}: not valid JSON`, { cause: error });
  }
  const parsed = TranscriptEntrySchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UsageError(
      `${file}:${lineNo}: unexpected transcript entry (${issue.path.join('.') || '(root)'}: ${issue.message})`,
    );
  }
  return parsed.data;
}

/**
 * Loads a persisted session from `<project>/.patchloop/sessions/<id>`.
 */
export async function readSession(projectRoot: string, sessionId: string): Promise<StoredSession> {
  const paths = getSessionPaths(projectRoot, sessionId);
  if (!(await pathExists(paths.root))) {
    throw new UsageError(`No session '${sessionId}' under ${projectRoot}`);
  }

  const transcript: TranscriptEntry[] = [];
  if (await pathExists(paths.transcript)) {
    const lines = normalizeNewlines(await fs.readFile(paths.transcript, 'utf8')).split('\n');
    lines.forEach((line, index) => {
      if (line.trim()) transcript.push(parseLine(line, paths.transcript, index + 1));
    });
  }

  let summary: SessionSummary | null = null;
  if (await pathExists(paths.summary)) {
    const parsed = SummarySchema.safeParse(JSON.parse(await fs.readFile(paths.summary, 'utf8')));
    if (!parsed.success) {
      throw new UsageError(`${paths.summary}: unexpected session summary`);
    }
    summary = parsed.data;
  }

  return { sessionId, transcript, summary };
}
