import type { DiffHunk, FileEdit, FileOperation, HunkLine, PatchSet } from '@patchloop/shared';

export const BEGIN_PATCH = '*** Begin Patch';
export const END_PATCH = '*** End Patch';

const ADD_FILE = '*** Add File: ';
const UPDATE_FILE = '*** Update File: ';
const DELETE_FILE = '*** Delete File: ';
const MOVE_TO = '*** Move to: ';
const END_OF_FILE = '*** End of File';

const UNIFIED_HEADER = /^@@ -(\d+)(?:,\d+)? \+\d+(?:,\d+)? @@ ?(.*)$/;

export class EnvelopeParseError extends Error {
  constructor(
    message: string,
    readonly line: number,
  ) {
    super(`${message} (line ${line})`);
    this.name = 'EnvelopeParseError';
  }
}

/**
 * Parses a patch envelope:
 *
 * ```text
 * *** Begin Patch
 * *** Add File: src/app.py
 * +print("hi")
 * *** Update File: src/util.py
 * *** Move to: src/helpers.py
 * @@ def helper():
 * -    return 1
 * +    return 2
 * *** Delete File: old.py
 * *** End Patch
 * ```
 *
 * Text before `*** Begin Patch` and after `*** End Patch` is ignored.
 */
export function parseEnvelope(text: string): PatchSet {
  const lines = text.replace(/\r\n/g, '\n').split('\n');
  const begin = lines.findIndex((l) => l.trim() === BEGIN_PATCH);
  if (begin < 0) throw new EnvelopeParseError(`Missing "${BEGIN_PATCH}"`, 1);

  const operations: FileOperation[] = [];
  let i = begin + 1;

  const fileHeader = (line: string) =>
    line.startsWith(ADD_FILE) ||
    line.startsWith(UPDATE_FILE) ||
    line.startsWith(DELETE_FILE) ||
    line.trim() === END_PATCH;

  while (i < lines.length) {
    const line = lines[i];
    const lineNo = i + 1;

    if (line.trim() === END_PATCH) {
      return { operations };
    }

    if (line.startsWith(ADD_FILE)) {
      const path = line.slice(ADD_FILE.length).trim();
      const body: string[] = [];
      // Bare blank lines count only when more content follows them.
      let blanks = 0;
      i++;
      while (i < lines.length && !fileHeader(lines[i])) {
        const bodyLine = lines[i];
        i++;
        if (bodyLine === '') {
          blanks++;
          continue;
        }
        if (!bodyLine.startsWith('+')) {
          throw new EnvelopeParseError(`Added file ${path} has a line not starting with "+"`, i);
        }
        body.push(...new Array<string>(blanks).fill(''), bodyLine.slice(1));
        blanks = 0;
      }
      operations.push({ op: 'create', path, content: body.length ? body.join('\n') + '\n' : '' });
      continue;
    }

    if (line.startsWith(DELETE_FILE)) {
      operations.push({ op: 'delete', path: line.slice(DELETE_FILE.length).trim() });
      i++;
      continue;
    }

    if (line.startsWith(UPDATE_FILE)) {
      const path = line.slice(UPDATE_FILE.length).trim();
      i++;
      let to: string | undefined;
      if (i < lines.length && lines[i].startsWith(MOVE_TO)) {
        to = lines[i].slice(MOVE_TO.length).trim();
        i++;
      }
      const hunks: DiffHunk[] = [];
      let current: DiffHunk | undefined;
      let blanks = 0;
      while (i < lines.length && !fileHeader(lines[i])) {
        const bodyLine = lines[i];
        i++;
        if (bodyLine === '') {
          blanks++;
          continue;
        }
        if (bodyLine.startsWith('@@')) {
          current = parseHunkHeader(bodyLine);
          hunks.push(current);
        } else if (bodyLine.trim() !== END_OF_FILE) {
          if (!current) {
            current = { lines: [] };
            hunks.push(current);
          }
          for (; blanks > 0; blanks--) current.lines.push({ op: ' ', text: '' });
          current.lines.push(parseHunkLine(bodyLine, i));
        }
        blanks = 0;
      }
      const nonEmpty = hunks.filter((h) => h.lines.length > 0);
      const edit: FileEdit | undefined = nonEmpty.length ? { kind: 'diff', hunks: nonEmpty } : undefined;
      if (to !== undefined) {
        operations.push(edit ? { op: 'rename', path, to, edit } : { op: 'rename', path, to });
      } else if (edit) {
        operations.push({ op: 'modify', path, edit });
      } else {
        throw new EnvelopeParseError(`Update of ${path} has no hunks`, lineNo);
      }
      continue;
    }

    if (line.trim() === '') {
      i++;
      continue;
    }

    throw new EnvelopeParseError(`Unexpected line ${JSON.stringify(line)}`, lineNo);
  }

  throw new EnvelopeParseError(`Missing "${END_PATCH}"`, lines.length);
}

function parseHunkHeader(line: string): DiffHunk {
  const unified = UNIFIED_HEADER.exec(line);
  if (unified) {
    const anchor = unified[2].trim();
    return { oldStart: Number(unified[1]), ...(anchor ? { anchor } : {}), lines: [] };
  }
  const anchor = line.slice(2).trim();
  return anchor ? { anchor, lines: [] } : { lines: [] };
}

/**
 * Reads one hunk body line. A completely empty line is taken as empty
 * context, which is how generators usually emit blank lines.
 */
export function parseHunkLine(line: string, lineNo: number): HunkLine {
  if (line === '') return { op: ' ', text: '' };
  const op = line[0];
  if (op === ' ' || op === '-' || op === '+') {
    return { op, text: line.slice(1) };
  }
  throw new EnvelopeParseError(`Hunk line must start with " ", "-" or "+"`, lineNo);
}
