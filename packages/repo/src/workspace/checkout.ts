import { promises as fs } from 'fs';
import path from 'path';
import { remove } from 'fs-extra';
import { PatchValidationError, atomicWrite } from '@patchloop/shared';
import type { Snapshot } from './snapshot';

export interface CheckoutOptions {
  /**
   * Snapshot the directory currently reflects. Files it holds unchanged are
   * left alone; its files missing from the target are removed.
   */
  base?: Snapshot;
  /** Paths created with the executable bit when nothing exists there yet */
  executables?: readonly string[];
}

export interface CheckoutResult {
  written: string[];
  removed: string[];
}

const EXECUTABLE_MODE = 0o755;

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Resolves `relPath` under `root`, following symbolic links in the part of
 * the path that already exists. Refuses anything that lands outside `root`.
 */
async function resolveInside(root: string, relPath: string): Promise<string> {
  const target = path.join(root, relPath);
  let existing = path.dirname(target);
  let resolved: string | undefined;
  while (resolved === undefined) {
    try {
      resolved = await fs.realpath(existing);
    } catch (error) {
      if (!isMissing(error) || existing === root) throw error;
      existing = path.dirname(existing);
    }
  }
  if (resolved !== root && !resolved.startsWith(root + path.sep)) {
    throw new PatchValidationError(`Refusing to write ${relPath}: it resolves outside ${root}`, {
      details: { path: relPath, resolved },
    });
  }
  return target;
}

async function fileMode(target: string): Promise<number | undefined> {
  try {
    const stats = await fs.lstat(target);
    return stats.isFile() ? stats.mode & 0o777 : undefined;
  } catch (error) {
    if (isMissing(error)) return undefined;
    throw error;
  }
}

/**
 * Writes a snapshot into a real directory. This is the only place the
 * workspace layer touches the filesystem. Rewritten files keep their
 * permission bits.
 */
export async function checkout(
  snapshot: Snapshot,
  dir: string,
  options: CheckoutOptions = {},
): Promise<CheckoutResult> {
  const root = await fs.realpath(dir);
  const { base } = options;
  const executables = new Set(options.executables ?? []);

  const written: string[] = [];
  for (const relPath of snapshot.paths) {
    if (base && base.blobDigest(relPath) === snapshot.blobDigest(relPath)) continue;
    const body = snapshot.read(relPath);
    if (!body) continue;
    const target = await resolveInside(root, relPath);
    const mode =
      (await fileMode(target)) ?? (executables.has(relPath) ? EXECUTABLE_MODE : undefined);
    await atomicWrite(target, body, { mode });
    written.push(relPath);
  }

  const removed: string[] = [];
  for (const relPath of base?.paths ?? []) {
    if (snapshot.has(relPath)) continue;
    await remove(await resolveInside(root, relPath));
    removed.push(relPath);
  }

  return { written, removed };
}
