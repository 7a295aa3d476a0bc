import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigSchema, UsageError, type ConfigInput, type Logger, type LoopEvent } from '@patchloop/shared';
import { Prototyper } from './prototype';
import { readSession } from './session';
import type { UserInterface } from './ui';

const logger: Logger = {
  log: vi.fn(),
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: () => logger,
};

const CHECK_SCRIPT = [
  "const fs = require('fs');",
  "const ok = fs.existsSync('a.txt') && fs.readFileSync('a.txt', 'utf8') === 'x';",
  "console.log(ok ? 'ok 1 - a.txt' : 'not ok 1 - a.txt');",
  'process.exit(ok ? 0 : 1);',
  '',
].join('\n');

const CREATE_A = JSON.stringify({ operations: [{ op: 'create', path: 'a.txt', content: 'x' }] });
const CREATE_B = JSON.stringify({ operations: [{ op: 'create', path: 'b.txt', content: 'y' }] });

describe('Prototyper', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'patchloop-proto-')));
    await fs.mkdir(path.join(root, '.patchloop'));
    await fs.writeFile(path.join(root, '.patchloop', 'spec.md'), 'Create a.txt containing x.\n');
    await fs.writeFile(path.join(root, 'check.js'), CHECK_SCRIPT);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  function configFor(overrides: ConfigInput = {}) {
    return ConfigSchema.parse({
      ...overrides,
      agent: { provider: 'fake', script: [CREATE_A], ...overrides.agent },
      tests: {
        command: `${JSON.stringify(process.execPath)} check.js`,
        timeoutMs: 10_000,
        ...overrides.tests,
      },
    });
  }

  it('runs a session to success and writes the result into the project', async () => {
    const prototyper = new Prototyper({ config: configFor(), projectRoot: root, logger });
    const seen: LoopEvent[] = [];

    const outcome = await prototyper.run({
      sessionId: 'proto-1',
      onStream: (stream) => {
        stream.on((event) => seen.push(event));
      },
    });

    expect(outcome.result.status).toBe('succeeded');
    expect(outcome.summary.filesChanged).toEqual(['a.txt']);
    expect(outcome.checkout?.written).toEqual(['a.txt']);
    expect(await fs.readFile(path.join(root, 'a.txt'), 'utf8')).toBe('x');
    expect(seen.at(-1)?.state).toBe('succeeded');
    expect(outcome.sessionDir).toBe(path.join(root, '.patchloop', 'sessions', 'proto-1'));

    const stored = await readSession(root, 'proto-1');
    expect(stored.transcript).toHaveLength(1);
    expect(stored.transcript[0].test?.status).toBe('passed');
    expect(stored.transcript[0].test?.tests).toEqual([{ name: 'a.txt', passed: true, output: '' }]);
    expect(stored.summary?.status).toBe('succeeded');

    const trace = (await fs.readFile(path.join(outcome.sessionDir, 'trace.jsonl'), 'utf8')).trim().split('\n');
    expect(JSON.parse(trace[trace.length - 1]).state).toBe('succeeded');
  });

  it('leaves the project untouched when checkout is disabled', async () => {
    const prototyper = new Prototyper({
      config: configFor({ session: { checkout: false } }),
      projectRoot: root,
      logger,
    });

    const outcome = await prototyper.run({ sessionId: 'proto-2' });

    expect(outcome.result.status).toBe('succeeded');
    expect(outcome.checkout).toBeUndefined();
    await expect(fs.access(path.join(root, 'a.txt'))).rejects.toThrow();
  });

  it('asks before further rounds in interactive mode', async () => {
    const ui: UserInterface = { confirm: vi.fn().mockResolvedValue(false) };
    const prototyper = new Prototyper({
      config: configFor({ agent: { script: [CREATE_B] }, session: { interactive: true } }),
      projectRoot: root,
      logger,
      ui,
    });

    const outcome = await prototyper.run({ sessionId: 'proto-3' });

    expect(ui.confirm).toHaveBeenCalledWith(
      'Round 1 did not pass the tests. Start round 2 of 15?',
    );
    expect(outcome.result.status).toBe('aborted');
    expect(outcome.summary.filesChanged).toEqual(['b.txt']);
  });

  it('refuses patches that write through a symbolic link in the project', async () => {
    const outside = await fs.mkdtemp(path.join(os.tmpdir(), 'patchloop-outside-'));
    try {
      await fs.symlink(outside, path.join(root, 'link'), 'dir');
      const escape = JSON.stringify({
        operations: [{ op: 'create', path: 'link/escaped.txt', content: 'x' }],
      });
      const prototyper = new Prototyper({
        config: configFor({ agent: { script: [escape], maxIterations: 1 } }),
        projectRoot: root,
        logger,
      });

      const outcome = await prototyper.run({ sessionId: 'proto-4' });

      expect(outcome.result.status).toBe('failed');
      expect(outcome.result.transcript[0].apply).toEqual({
        status: 'rejected',
        issues: [
          {
            path: 'link/escaped.txt',
            reason: 'path-traversal',
            message: 'link/escaped.txt goes through the symbolic link link',
          },
        ],
      });
      await expect(fs.access(path.join(outside, 'escaped.txt'))).rejects.toThrow();
    } finally {
      await fs.rm(outside, { recursive: true, force: true });
    }
  });

  it('writes the session summary even when writing back fails', async () => {
    // A directory where the patch puts a file makes the final write fail.
    await fs.mkdir(path.join(root, 'a.txt'));
    const prototyper = new Prototyper({ config: configFor(), projectRoot: root, logger });

    await expect(prototyper.run({ sessionId: 'proto-5' })).rejects.toThrow();

    const stored = await readSession(root, 'proto-5');
    expect(stored.summary?.status).toBe('succeeded');
    expect(stored.summary?.filesChanged).toEqual(['a.txt']);
  });

  it('requires a specification file', async () => {
    await fs.rm(path.join(root, '.patchloop', 'spec.md'));
    const prototyper = new Prototyper({ config: configFor(), projectRoot: root, logger });

    await expect(prototyper.run()).rejects.toThrow(UsageError);
    await expect(prototyper.run()).rejects.toThrow(
      `Specification not found at ${path.join(root, '.patchloop', 'spec.md')}`,
    );
  });
});
