import type { DiffHunk, HunkLine } from '@patchloop/shared';

export type HunkApplyResult = { ok: true; content: string } | { ok: false; message: string };

type LineMatcher = (fileLine: string, hunkLine: string) => boolean;

const MATCHERS: LineMatcher[] = [
  (a, b) => a === b,
  (a, b) => a.trimEnd() === b.trimEnd(),
  (a, b) => a.trim() === b.trim(),
];

function splitLines(content: string): string[] {
  if (content === '') return [];
  const body = content.endsWith('\n') ? content.slice(0, -1) : content;
  return body.split('\n');
}

function oldSide(lines: HunkLine[]): string[] {
  return lines.filter((l) => l.op !== '+').map((l) => l.text);
}

function matchesAt(file: string[], old: string[], at: number, matcher: LineMatcher): boolean {
  if (at < 0 || at + old.length > file.length) return false;
  return old.every((text, i) => matcher(file[at + i], text));
}

function findAnchor(file: string[], anchor: string, from: number): number {
  const wanted = anchor.trim();
  for (let i = from; i < file.length; i++) {
    if (file[i].trim() === wanted) return i;
  }
  for (let i = from; i < file.length; i++) {
    if (file[i].includes(wanted)) return i;
  }
  return -1;
}

/**
 * Applies hunks in order. Pinned hunks (`oldStart`) must match exactly at
 * their offset, shifted by the line delta of earlier hunks; unpinned hunks are
 * searched forward from the end of the previous hunk.
 */
export function applyHunks(content: string, hunks: DiffHunk[]): HunkApplyResult {
  const file = splitLines(content);
  const trailingNewline = content === '' || content.endsWith('\n');
  let cursor = 0;
  let delta = 0;

  for (const [index, hunk] of hunks.entries()) {
    const label = `hunk ${index + 1}`;
    const old = oldSide(hunk.lines);

    if (old.length === 0) {
      const added = hunk.lines.map((l) => l.text);
      file.push(...added);
      cursor = file.length;
      continue;
    }

    let at = -1;
    if (hunk.oldStart !== undefined) {
      const expected = hunk.oldStart - 1 + delta;
      if (!matchesAt(file, old, expected, MATCHERS[0])) {
        return {
          ok: false,
          message: `${label} does not match the file at line ${hunk.oldStart}`,
        };
      }
      at = expected;
    } else {
      let from = cursor;
      if (hunk.anchor) {
        const anchorAt = findAnchor(file, hunk.anchor, cursor);
        if (anchorAt < 0) {
          return { ok: false, message: `${label}: anchor "${hunk.anchor.trim()}" not found` };
        }
        from = anchorAt;
      }
      search: for (const matcher of MATCHERS) {
        for (let i = from; i + old.length <= file.length; i++) {
          if (matchesAt(file, old, i, matcher)) {
            at = i;
            break search;
          }
        }
      }
      if (at < 0) {
        return {
          ok: false,
          message: `${label}: context not found after line ${from + 1} (first expected line: ${JSON.stringify(old[0])})`,
        };
      }
    }

    // Context lines keep the file's own spelling when matched loosely.
    const replacement: string[] = [];
    let offset = 0;
    for (const line of hunk.lines) {
      if (line.op === '+') {
        replacement.push(line.text);
        continue;
      }
      if (line.op === ' ') replacement.push(file[at + offset]);
      offset++;
    }

    file.splice(at, old.length, ...replacement);
    cursor = at + replacement.length;
    delta += replacement.length - old.length;
  }

  if (file.length === 0) return { ok: true, content: '' };
  return { ok: true, content: file.join('\n') + (trailingNewline ? '\n' : '') };
}
