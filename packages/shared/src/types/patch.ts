/**
 * One line of a diff hunk: context (' '), removal ('-') or addition ('+').
 */
export interface HunkLine {
  op: ' ' | '-' | '+';
  text: string;
}

/**
 * A contiguous region of changes within one file.
 */
export interface DiffHunk {
  /** Line to locate before searching for the hunk body (the text after "@@ ") */
  anchor?: string;
  /** Expected 1-based line of the first old line; pins the hunk to that offset */
  oldStart?: number;
  lines: HunkLine[];
}

/**
 * How a modified file gets its new content.
 */
export type FileEdit =
  | {
      /** Replace the whole file */
      kind: 'content';
      content: string;
    }
  | {
      /** Apply hunks against the existing content */
      kind: 'diff';
      hunks: DiffHunk[];
    };

export interface CreateOperation {
  op: 'create';
  path: string;
  content: string;
  /** Replace the file if it already exists */
  overwrite?: boolean;
}

export interface ModifyOperation {
  op: 'modify';
  path: string;
  edit: FileEdit;
}

export interface DeleteOperation {
  op: 'delete';
  path: string;
}

export interface RenameOperation {
  op: 'rename';
  path: string;
  /** Destination path */
  to: string;
  /** Edit applied to the content while moving it */
  edit?: FileEdit;
  overwrite?: boolean;
}

export type FileOperation = CreateOperation | ModifyOperation | DeleteOperation | RenameOperation;

/**
 * One proposed, atomically-applied batch of file edits.
 * Operations are applied in order.
 */
export interface PatchSet {
  operations: FileOperation[];
}

/**
 * Why a patch could not be applied to its base snapshot.
 */
export type ConflictReason = 'path-not-found' | 'path-exists' | 'context-mismatch';

export interface PatchConflict {
  path: string;
  reason: ConflictReason;
  message: string;
}

/**
 * Why a patch was rejected before it reached the snapshot store.
 */
export type ValidationReason =
  | 'empty-patch'
  | 'malformed-response'
  | 'generation-timeout'
  | 'generation-error'
  | 'path-traversal'
  | 'protected-path'
  | 'binary-path'
  | 'duplicate-path'
  | 'too-large';

export interface ValidationIssue {
  path?: string;
  reason: ValidationReason;
  message: string;
}

/**
 * What the generation service asked for, resolved once at the patch boundary.
 */
export type GenerationOutcome =
  | { kind: 'patch'; patchSet: PatchSet }
  | { kind: 'no-change' }
  | { kind: 'malformed'; reason: ValidationReason; message: string };

/**
 * Returns every path an operation reads or writes.
 */
export function touchedPaths(operation: FileOperation): string[] {
  return operation.op === 'rename' ? [operation.path, operation.to] : [operation.path];
}
