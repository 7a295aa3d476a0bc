import * as fs from 'fs/promises';
import * as path from 'path';
import { UsageError } from '@patchloop/shared';

export const PROJECT_DIR = '.patchloop';

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Finds the project root starting from `cwd`: the nearest parent holding a
 * `.patchloop` directory, else the nearest one holding `.git`.
 */
export async function findProjectRoot(cwd: string = process.cwd()): Promise<string> {
  const start = path.resolve(cwd);
  const fsRoot = path.parse(start).root;

  for (const marker of [PROJECT_DIR, '.git']) {
    let currentDir = start;
    while (true) {
      if (await exists(path.join(currentDir, marker))) {
        return currentDir;
      }
      if (currentDir === fsRoot) break;
      currentDir = path.dirname(currentDir);
    }
  }

  throw new UsageError(
    `No project found from ${start}. Create ${PROJECT_DIR}/spec.md in the project directory or pass --cwd.`,
  );
}
