import ignore from 'ignore';
import isBinaryPath from 'is-binary-path';
import {
  touchedPaths,
  type FileEdit,
  type FileOperation,
  type PatchConfig,
  type PatchSet,
  type ValidationIssue,
} from '@patchloop/shared';
import { PROJECT_DIR } from '../project';

export type PatchLimits = Pick<
  PatchConfig,
  'maxEditBytes' | 'maxFilesChanged' | 'protectedPaths' | 'allowBinary'
> & {
  /** Symbolic links in the project; paths at or under them are refused */
  linkedPaths?: readonly string[];
};

const MAX_DECODE_ROUNDS = 5;
const WINDOWS_DEVICE = /^(con|prn|aux|nul|com[0-9]|lpt[0-9])(\..*)?$/i;

/**
 * Returns a message when a path could escape the project root or name
 * something other than a plain relative file.
 */
export function checkPathSecurity(filePath: string): string | undefined {
  if (filePath.includes('\0') || filePath.includes('%00')) {
    return `Null byte injection detected in path: ${filePath}`;
  }

  // Repeated decoding catches double and triple encoding.
  let decodedPath = filePath;
  let previousPath = '';
  for (let round = 0; decodedPath !== previousPath && round < MAX_DECODE_ROUNDS; round++) {
    previousPath = decodedPath;
    try {
      decodedPath = decodeURIComponent(decodedPath);
    } catch {
      break;
    }
  }

  const normalizedPath = decodedPath.replace(/\\/g, '/');

  if (/%(?:2f|5c)/i.test(filePath)) {
    return `Encoded path separator detected (potential traversal): ${filePath}`;
  }

  if (normalizedPath.startsWith('//') || filePath.startsWith('\\\\')) {
    return `UNC path not allowed: ${filePath}`;
  }

  if (normalizedPath.startsWith('/')) {
    return `Absolute path not allowed: ${filePath}`;
  }

  if (/^[a-zA-Z]:/.test(normalizedPath)) {
    return `Absolute Windows path not allowed: ${filePath}`;
  }

  const segments = normalizedPath.split('/');
  if (segments.some((segment) => segment === '..')) {
    return `Path traversal detected: ${filePath}`;
  }

  if (segments.some((segment) => WINDOWS_DEVICE.test(segment))) {
    return `Reserved Windows device name detected: ${filePath}`;
  }

  if (segments.some((segment) => segment === '' || segment === '.')) {
    return `Path must be a normalized relative file path: ${filePath}`;
  }

  return undefined;
}

/**
 * Names the tool-owned directory a path falls in: `.git` at any depth, or
 * the project's own `.patchloop` directory.
 */
export function internalDirectory(filePath: string): string | undefined {
  const segments = filePath.replace(/\\/g, '/').toLowerCase().split('/');
  if (segments.includes('.git')) return '.git';
  if (segments[0] === PROJECT_DIR) return PROJECT_DIR;
  return undefined;
}

function editBytes(edit: FileEdit | undefined): number {
  if (!edit) return 0;
  if (edit.kind === 'content') return Buffer.byteLength(edit.content, 'utf8');
  let total = 0;
  for (const hunk of edit.hunks) {
    for (const line of hunk.lines) total += Buffer.byteLength(line.text, 'utf8') + 1;
  }
  return total;
}

function operationBytes(operation: FileOperation): number {
  switch (operation.op) {
    case 'create':
      return Buffer.byteLength(operation.content, 'utf8');
    case 'modify':
    case 'rename':
      return editBytes(operation.edit);
    case 'delete':
      return 0;
  }
}

/**
 * Checks a patch set before it reaches the snapshot store. Returns every
 * issue found; an empty list means the set may be applied.
 */
export function validatePatchSet(patchSet: PatchSet, limits: PatchLimits): ValidationIssue[] {
  const { operations } = patchSet;
  if (operations.length === 0) {
    return [{ reason: 'empty-patch', message: 'The patch set contains no operations' }];
  }

  const issues: ValidationIssue[] = [];
  const protectedMatcher = ignore().add(limits.protectedPaths);
  const seen = new Set<string>();

  for (const operation of operations) {
    for (const filePath of touchedPaths(operation)) {
      const securityError = checkPathSecurity(filePath);
      if (securityError) {
        issues.push({ path: filePath, reason: 'path-traversal', message: securityError });
        continue;
      }

      const link = limits.linkedPaths?.find(
        (linked) => filePath === linked || filePath.startsWith(`${linked}/`),
      );
      if (link !== undefined) {
        issues.push({
          path: filePath,
          reason: 'path-traversal',
          message: `${filePath} goes through the symbolic link ${link}`,
        });
        continue;
      }

      const internal = internalDirectory(filePath);
      if (internal) {
        issues.push({
          path: filePath,
          reason: 'protected-path',
          message: `${filePath} is inside ${internal}, which patches may not change`,
        });
      } else if (limits.protectedPaths.length > 0 && protectedMatcher.ignores(filePath)) {
        issues.push({
          path: filePath,
          reason: 'protected-path',
          message: `${filePath} is protected and may not be changed`,
        });
      }

      if (!limits.allowBinary && isBinaryPath(filePath)) {
        issues.push({
          path: filePath,
          reason: 'binary-path',
          message: `Binary file patch detected: ${filePath}`,
        });
      }

      if (seen.has(filePath)) {
        issues.push({
          path: filePath,
          reason: 'duplicate-path',
          message: `${filePath} is touched by more than one operation`,
        });
      }
      seen.add(filePath);
    }
  }

  if (seen.size > limits.maxFilesChanged) {
    issues.push({
      reason: 'too-large',
      message: `Too many files changed (${seen.size} > ${limits.maxFilesChanged})`,
    });
  }

  const totalBytes = operations.reduce((sum, operation) => sum + operationBytes(operation), 0);
  if (totalBytes > limits.maxEditBytes) {
    issues.push({
      reason: 'too-large',
      message: `Edit size ${totalBytes} bytes exceeds the limit of ${limits.maxEditBytes}`,
    });
  }

  return issues;
}
