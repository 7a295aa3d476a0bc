import * as fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { JsonlEventWriter } from './jsonl-event-writer';
import type { StateChanged } from '../types/events';
import type { Logger } from '../logger/types';

const event: StateChanged = {
  schemaVersion: 1,
  seq: 0,
  timestamp: '2026-02-18T00:00:00.000Z',
  sessionId: 'session-1',
  type: 'StateChanged',
  from: 'idle',
  state: 'generating',
  iteration: 0,
};

function recordingLogger(warnings: string[]): Logger {
  const logger: Logger = {
    log: () => undefined,
    trace: () => undefined,
    debug: () => undefined,
    info: () => undefined,
    warn: (message) => {
      warnings.push(message);
    },
    error: () => undefined,
    child: () => logger,
  };
  return logger;
}

describe('JsonlEventWriter', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchloop-evt-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('writes JSONL events and is safe to close multiple times', async () => {
    const logPath = path.join(tmpDir, 'events.jsonl');
    const writer = new JsonlEventWriter(logPath);

    writer.write(event);
    writer.write({ ...event, seq: 1, from: 'generating', state: 'applying' });
    await writer.close();
    await writer.close();

    const lines = (await fs.readFile(logPath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(event);
    expect(JSON.parse(lines[1]).state).toBe('applying');
  });

  it('redacts secrets in event details', async () => {
    const logPath = path.join(tmpDir, 'events.jsonl');
    const writer = new JsonlEventWriter(logPath);

    writer.write({ ...event, detail: 'API_KEY=test-secret leaked' });
    await writer.close();

    const written = JSON.parse((await fs.readFile(logPath, 'utf8')).trim());
    expect(written.detail).toBe('[REDACTED] leaked');
  });

  it('warns and does not write after being closed', async () => {
    const logPath = path.join(tmpDir, 'events.jsonl');
    const warnings: string[] = [];
    const writer = new JsonlEventWriter(logPath, recordingLogger(warnings));
    await writer.close();

    writer.write(event);

    expect(warnings).toEqual([`Dropped event 0: writer for ${logPath} is closed`]);
    expect(await fs.readFile(logPath, 'utf8')).toBe('');
  });
});
