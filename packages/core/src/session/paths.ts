import * as path from 'path';
import { ensureDir } from 'fs-extra';
import { PROJECT_DIR } from '@patchloop/repo';

export const SESSIONS_DIR = 'sessions';

export interface SessionPaths {
  root: string;
  events: string;
  transcript: string;
  summary: string;
  /** Controller log, one redacted event per line */
  trace: string;
  effectiveConfig: string;
}

export function getSessionPaths(projectRoot: string, sessionId: string): SessionPaths {
  const root = path.join(projectRoot, PROJECT_DIR, SESSIONS_DIR, sessionId);
  return {
    root,
    events: path.join(root, 'events.jsonl'),
    transcript: path.join(root, 'transcript.jsonl'),
    summary: path.join(root, 'summary.json'),
    trace: path.join(root, 'trace.jsonl'),
    effectiveConfig: path.join(root, 'effective-config.json'),
  };
}

export async function createSessionDir(projectRoot: string, sessionId: string): Promise<SessionPaths> {
  const paths = getSessionPaths(projectRoot, sessionId);
  await ensureDir(paths.root);
  return paths;
}
