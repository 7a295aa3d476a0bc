import { z } from 'zod';
import type { DiffHunk, FileEdit, FileOperation, PatchSet } from '@patchloop/shared';
import { parseHunkLine } from './envelope';

const HunkSchema = z.object({
  anchor: z.string().optional(),
  oldStart: z.number().int().min(1).optional(),
  /** Each line carries its op as the first character: " ", "-" or "+" */
  lines: z.array(z.string()),
});

const EditFields = {
  content: z.string().optional(),
  hunks: z.array(HunkSchema).optional(),
};

const OperationSchema = z.discriminatedUnion('op', [
  z.object({
    op: z.literal('create'),
    path: z.string().min(1),
    content: z.string(),
    overwrite: z.boolean().optional(),
  }),
  z.object({ op: z.literal('modify'), path: z.string().min(1), ...EditFields }),
  z.object({ op: z.literal('delete'), path: z.string().min(1) }),
  z.object({
    op: z.literal('rename'),
    path: z.string().min(1),
    to: z.string().min(1),
    overwrite: z.boolean().optional(),
    ...EditFields,
  }),
]);

export const OperationsPayloadSchema = z.object({
  operations: z.array(OperationSchema),
});

export const NoChangePayloadSchema = z.object({
  action: z.literal('no_change'),
  reason: z.string().optional(),
});

export type OperationsPayload = z.infer<typeof OperationsPayloadSchema>;

export class OperationsParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OperationsParseError';
  }
}

function toHunk(hunk: z.infer<typeof HunkSchema>): DiffHunk {
  return {
    ...(hunk.anchor !== undefined ? { anchor: hunk.anchor } : {}),
    ...(hunk.oldStart !== undefined ? { oldStart: hunk.oldStart } : {}),
    lines: hunk.lines.map((line, i) => parseHunkLine(line, i + 1)),
  };
}

function toEdit(
  path: string,
  fields: { content?: string; hunks?: z.infer<typeof HunkSchema>[] },
): FileEdit | undefined {
  if (fields.content !== undefined && fields.hunks !== undefined) {
    throw new OperationsParseError(`${path}: give either "content" or "hunks", not both`);
  }
  if (fields.content !== undefined) return { kind: 'content', content: fields.content };
  if (fields.hunks !== undefined) return { kind: 'diff', hunks: fields.hunks.map(toHunk) };
  return undefined;
}

/**
 * Converts a validated JSON operations payload into a PatchSet.
 */
export function toPatchSet(payload: OperationsPayload): PatchSet {
  const operations = payload.operations.map((operation): FileOperation => {
    switch (operation.op) {
      case 'create':
        return operation.overwrite
          ? { op: 'create', path: operation.path, content: operation.content, overwrite: true }
          : { op: 'create', path: operation.path, content: operation.content };
      case 'delete':
        return { op: 'delete', path: operation.path };
      case 'modify': {
        const edit = toEdit(operation.path, operation);
        if (!edit) {
          throw new OperationsParseError(`${operation.path}: modify needs "content" or "hunks"`);
        }
        return { op: 'modify', path: operation.path, edit };
      }
      case 'rename': {
        const edit = toEdit(operation.path, operation);
        return {
          op: 'rename',
          path: operation.path,
          to: operation.to,
          ...(edit ? { edit } : {}),
          ...(operation.overwrite ? { overwrite: true } : {}),
        };
      }
    }
  });
  return { operations };
}

/**
 * JSON schema advertised to tool-calling models for `apply_operations`.
 */
export const OPERATIONS_JSON_SCHEMA: Record<string, unknown> = {
  type: 'object',
  properties: {
    operations: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          op: { type: 'string', enum: ['create', 'modify', 'delete', 'rename'] },
          path: { type: 'string' },
          to: { type: 'string' },
          content: { type: 'string' },
          overwrite: { type: 'boolean' },
          hunks: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                anchor: { type: 'string' },
                oldStart: { type: 'integer', minimum: 1 },
                lines: { type: 'array', items: { type: 'string' } },
              },
              required: ['lines'],
            },
          },
        },
        required: ['op', 'path'],
      },
    },
  },
  required: ['operations'],
};
