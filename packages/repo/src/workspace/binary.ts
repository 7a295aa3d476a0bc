import isBinaryPath from 'is-binary-path';

const SAMPLE_BYTES = 1024;

/**
 * Treats a file as binary if its extension says so or its first kilobyte
 * holds a NUL byte.
 */
export function isBinaryContent(filePath: string, content: Uint8Array): boolean {
  if (isBinaryPath(filePath)) return true;
  const end = Math.min(content.length, SAMPLE_BYTES);
  for (let i = 0; i < end; i++) {
    if (content[i] === 0) return true;
  }
  return false;
}
