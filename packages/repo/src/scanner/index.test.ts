import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { TreeScanner, scanTree } from './index';

describe('TreeScanner', () => {
  let tmpDir: string;
  let scanner: TreeScanner;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchloop-scanner-test-'));
    scanner = new TreeScanner();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string | Buffer>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  it('scans a simple project', async () => {
    await createFiles({
      'README.md': '# Hello',
      'src/main.py': 'print("hi")\n',
      'src/tests.py': 'def test_x(): pass\n',
    });

    const result = await scanner.scan(tmpDir);
    expect(result.root).toBe(tmpDir);
    expect([...result.tree.keys()].sort()).toEqual(['README.md', 'src/main.py', 'src/tests.py']);
    expect(result.tree.get('src/main.py')?.toString('utf8')).toBe('print("hi")\n');
    expect(result.warnings).toEqual([]);
  });

  it('respects default ignores', async () => {
    await createFiles({
      'node_modules/foo/index.js': 'ignored',
      '.git/config': 'ignored',
      '__pycache__/main.cpython-311.pyc': 'ignored',
      '.venv/bin/python': 'ignored',
      '.patchloop/spec.md': 'ignored',
      'src/main.py': 'kept',
    });

    const result = await scanner.scan(tmpDir);
    expect([...result.tree.keys()]).toEqual(['src/main.py']);
  });

  it('respects .gitignore', async () => {
    await createFiles({
      '.gitignore': '*.log\nsecret/',
      'app.log': 'ignored',
      'secret/data.txt': 'ignored',
      'other.txt': 'kept',
    });

    const result = await scanner.scan(tmpDir);
    expect([...result.tree.keys()].sort()).toEqual(['.gitignore', 'other.txt']);
  });

  it('respects .patchloopignore and config excludes', async () => {
    await createFiles({
      '.patchloopignore': 'foo.txt',
      'foo.txt': 'ignored',
      'data.csv': 'ignored',
      'bar.txt': 'kept',
    });

    const result = await scanTree(tmpDir, { excludes: ['*.csv'] });
    expect([...result.tree.keys()].sort()).toEqual(['.patchloopignore', 'bar.txt']);
  });

  it('keeps binary files as raw bytes', async () => {
    await createFiles({ 'data.bin': Buffer.from([0x00, 0x01, 0x02]) });

    const result = await scanner.scan(tmpDir);
    expect(result.tree.get('data.bin')).toEqual(Buffer.from([0x00, 0x01, 0x02]));
  });

  it('skips files over maxFileBytes with a warning', async () => {
    await createFiles({
      'small.txt': 'small',
      'large.txt': 'a'.repeat(200),
    });

    const result = await scanner.scan(tmpDir, { maxFileBytes: 100 });
    expect([...result.tree.keys()]).toEqual(['small.txt']);
    expect(result.warnings).toEqual(['Skipping large file: large.txt (200 bytes)']);
  });

  it.skipIf(process.platform === 'win32')('records executable files and symbolic links', async () => {
    await createFiles({ 'run.sh': '#!/bin/sh\n', 'notes.txt': 'n' });
    await fs.chmod(path.join(tmpDir, 'run.sh'), 0o755);
    await fs.mkdir(path.join(tmpDir, 'real'));
    await fs.symlink(path.join(tmpDir, 'real'), path.join(tmpDir, 'linked'), 'dir');

    const result = await scanner.scan(tmpDir);

    expect(result.executables).toEqual(['run.sh']);
    expect(result.symlinks).toEqual(['linked']);
    expect(result.warnings).toEqual(['Skipping symlink: linked']);
  });
});
