import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

export async function ensureParentDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

export interface AtomicWriteOptions {
  /** Permission bits of the written file; the process umask applies otherwise */
  mode?: number;
}

/**
 * Writes through a temporary sibling and renames it into place, so readers
 * never observe a half-written file.
 */
export async function atomicWrite(
  path: string,
  content: string | Uint8Array,
  options: AtomicWriteOptions = {},
): Promise<void> {
  await ensureParentDir(path);
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.patchloop-' });
  try {
    await fs.writeFile(tempPath, content);
    if (options.mode !== undefined) {
      await fs.chmod(tempPath, options.mode);
    }
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function appendLine(path: string, line: string): Promise<void> {
  await ensureParentDir(path);
  await fs.appendFile(path, line.endsWith('\n') ? line : `${line}\n`, 'utf8');
}
