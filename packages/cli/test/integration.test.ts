import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { main } from '../src/program';

const CHECK_SCRIPT = [
  "const fs = require('fs');",
  "const ok = fs.existsSync('a.txt') && fs.readFileSync('a.txt', 'utf8') === 'x';",
  "console.log(ok ? 'ok 1 - a.txt' : 'not ok 1 - a.txt');",
  'process.exit(ok ? 0 : 1);',
  '',
].join('\n');

const CREATE_A = JSON.stringify({ operations: [{ op: 'create', path: 'a.txt', content: 'x' }] });
const CREATE_B = JSON.stringify({ operations: [{ op: 'create', path: 'b.txt', content: 'y' }] });

async function setupProject(dir: string, script: string[]): Promise<void> {
  await fs.mkdir(path.join(dir, '.patchloop'), { recursive: true });
  await fs.writeFile(path.join(dir, '.patchloop', 'spec.md'), 'Create a.txt containing x.\n');
  await fs.writeFile(path.join(dir, 'check.js'), CHECK_SCRIPT);
  // JSON is valid YAML.
  const config = {
    agent: { provider: 'fake', script },
    tests: { command: `${JSON.stringify(process.execPath)} check.js`, timeoutMs: 10_000 },
  };
  await fs.writeFile(path.join(dir, '.patchloop', 'config.yaml'), JSON.stringify(config, null, 2));
}

describe('CLI Integration Tests', () => {
  let testRepoPath: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    testRepoPath = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'patchloop-cli-')));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testRepoPath, { recursive: true, force: true });
  });

  function lastJson(): Record<string, unknown> {
    const calls = logSpy.mock.calls;
    return JSON.parse(String(calls[calls.length - 1][0]));
  }

  it('runs a session to success and shows its transcript', async () => {
    await setupProject(testRepoPath, [CREATE_A]);

    const code = await main(['node', 'patchloop', '--json', 'prototype', '--cwd', testRepoPath]);

    expect(code).toBe(0);
    const result = lastJson();
    expect(result.status).toBe('succeeded');
    expect(result.filesChanged).toEqual(['a.txt']);
    expect(await fs.readFile(path.join(testRepoPath, 'a.txt'), 'utf8')).toBe('x');

    const sessionId = String(result.sessionId);
    const transcriptCode = await main([
      'node',
      'patchloop',
      '--json',
      'transcript',
      sessionId,
      '--cwd',
      testRepoPath,
    ]);

    expect(transcriptCode).toBe(0);
    const stored = lastJson();
    expect(stored.sessionId).toBe(sessionId);
    expect(stored.transcript).toHaveLength(1);
  }, 30_000);

  it('exits 1 when the budget runs out', async () => {
    // The repeated answer conflicts with the file it created in round 1.
    await setupProject(testRepoPath, [CREATE_B]);

    const code = await main([
      'node',
      'patchloop',
      'prototype',
      '--cwd',
      testRepoPath,
      '--max-iters',
      '2',
      '--json',
    ]);

    expect(code).toBe(1);
    const result = lastJson();
    expect(result.status).toBe('failed');
    expect(result.iterations).toBe(2);
    expect(result.error).toEqual({
      code: 'BudgetExhausted',
      message: 'Budget exhausted: 2 of 2 iterations used',
    });
  });

  it('exits 2 with a readable error for an invalid flag value', async () => {
    await setupProject(testRepoPath, [CREATE_A]);

    const code = await main(['node', 'patchloop', 'prototype', '--cwd', testRepoPath, '--max-iters', '0']);

    expect(code).toBe(2);
    expect(errSpy).toHaveBeenCalledWith('❌ Error: Invalid --max-iters value: 0');
  });

  it('reports an unknown session as a JSON error', async () => {
    await setupProject(testRepoPath, [CREATE_A]);

    const code = await main([
      'node',
      'patchloop',
      '--json',
      'transcript',
      'nope',
      '--cwd',
      testRepoPath,
    ]);

    expect(code).toBe(2);
    expect(lastJson()).toEqual({
      error: { code: 'UsageError', message: `No session 'nope' under ${testRepoPath}` },
    });
  });
});
