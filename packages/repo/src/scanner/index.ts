import nodeFs from 'fs/promises';
import path from 'path';
import ignore from 'ignore';
import { ScanOptions, ScanResult } from './types';
import { DEFAULT_IGNORES, IGNORE_FILES } from './utils';

export * from './types';
export { DEFAULT_IGNORES } from './utils';

type Fs = typeof nodeFs;

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Loads a project directory into an in-memory tree, the input of the
 * first snapshot of a session.
 */
export class TreeScanner {
  private fs: Fs;

  constructor(fs: Fs = nodeFs) {
    this.fs = fs;
  }

  async scan(root: string, options: ScanOptions = {}): Promise<ScanResult> {
    const ig = ignore();
    const warnings: string[] = [];

    ig.add(DEFAULT_IGNORES);

    for (const name of IGNORE_FILES) {
      try {
        ig.add(await this.fs.readFile(path.join(root, name), 'utf-8'));
      } catch (error) {
        if (!isMissing(error)) throw error;
      }
    }

    if (options.excludes && options.excludes.length > 0) {
      ig.add(options.excludes);
    }

    const tree = new Map<string, Buffer>();
    const executables: string[] = [];
    const symlinks: string[] = [];

    const walk = async (dir: string, relativeDir: string): Promise<void> => {
      const entries = await this.fs.readdir(dir, { withFileTypes: true });
      entries.sort((a, b) => a.name.localeCompare(b.name));

      for (const entry of entries) {
        const relPath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
        const absPath = path.join(dir, entry.name);

        if (entry.isDirectory()) {
          // Directory patterns only match with a trailing slash.
          if (ig.ignores(relPath + '/')) continue;
          await walk(absPath, relPath);
        } else if (entry.isFile()) {
          if (ig.ignores(relPath)) continue;
          const stats = await this.fs.stat(absPath);
          if (options.maxFileBytes !== undefined && stats.size > options.maxFileBytes) {
            warnings.push(`Skipping large file: ${relPath} (${stats.size} bytes)`);
            continue;
          }
          tree.set(relPath, await this.fs.readFile(absPath));
          if (stats.mode & 0o111) executables.push(relPath);
        } else if (entry.isSymbolicLink()) {
          symlinks.push(relPath);
          warnings.push(`Skipping symlink: ${relPath}`);
        }
      }
    };

    await walk(root, '');

    return { root, tree, executables, symlinks, warnings };
  }
}

export function scanTree(root: string, options: ScanOptions = {}): Promise<ScanResult> {
  return new TreeScanner().scan(root, options);
}
