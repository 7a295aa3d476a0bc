import { describe, it, expect } from 'vitest';
import { parseResponse } from './response';

const ENVELOPE = '*** Begin Patch\n*** Add File: a.txt\n+x\n*** End Patch';

describe('parseResponse', () => {
  it('reads an apply_patch tool call', () => {
    const outcome = parseResponse({
      toolCalls: [{ name: 'apply_patch', arguments: { input: ENVELOPE } }],
    });
    expect(outcome).toEqual({
      kind: 'patch',
      patchSet: { operations: [{ op: 'create', path: 'a.txt', content: 'x\n' }] },
    });
  });

  it('reads apply_operations with object or string arguments', () => {
    const payload = {
      operations: [
        { op: 'modify', path: 'a.py', hunks: [{ oldStart: 2, lines: ['-x', '+y'] }] },
        { op: 'rename', path: 'b.py', to: 'c.py' },
      ],
    };
    const expected = {
      kind: 'patch',
      patchSet: {
        operations: [
          {
            op: 'modify',
            path: 'a.py',
            edit: {
              kind: 'diff',
              hunks: [
                {
                  oldStart: 2,
                  lines: [
                    { op: '-', text: 'x' },
                    { op: '+', text: 'y' },
                  ],
                },
              ],
            },
          },
          { op: 'rename', path: 'b.py', to: 'c.py' },
        ],
      },
    };

    expect(
      parseResponse({ toolCalls: [{ name: 'apply_operations', arguments: payload }] }),
    ).toEqual(expected);
    expect(
      parseResponse({
        toolCalls: [{ name: 'apply_operations', arguments: JSON.stringify(payload) }],
      }),
    ).toEqual(expected);
  });

  it('reads the no_change tool', () => {
    expect(parseResponse({ toolCalls: [{ name: 'no_change', arguments: {} }] })).toEqual({
      kind: 'no-change',
    });
  });

  it('treats unknown tools as malformed', () => {
    expect(parseResponse({ toolCalls: [{ name: 'shell', arguments: {} }] })).toEqual({
      kind: 'malformed',
      reason: 'malformed-response',
      message: 'Unknown tool "shell"',
    });
  });

  it('reads an envelope from free text', () => {
    const outcome = parseResponse({ text: `Sure.\n${ENVELOPE}\n` });
    expect(outcome.kind).toBe('patch');
  });

  it('reads a fenced JSON block', () => {
    const text = 'Nothing left to do.\n```json\n{"action": "no_change"}\n```';
    expect(parseResponse({ text })).toEqual({ kind: 'no-change' });

    const ops = '```json\n{"operations": [{"op": "delete", "path": "a.txt"}]}\n```';
    expect(parseResponse({ text: ops })).toEqual({
      kind: 'patch',
      patchSet: { operations: [{ op: 'delete', path: 'a.txt' }] },
    });
  });

  it('keeps an empty operations list as a patch for validation to reject', () => {
    expect(parseResponse({ text: '{"operations": []}' })).toEqual({
      kind: 'patch',
      patchSet: { operations: [] },
    });
  });

  it('reports prose and empty responses as malformed', () => {
    expect(parseResponse({ text: 'I think the bug is in main.py' })).toEqual({
      kind: 'malformed',
      reason: 'malformed-response',
      message: 'Response contains neither a patch envelope nor a JSON block',
    });
    expect(parseResponse({})).toEqual({
      kind: 'malformed',
      reason: 'malformed-response',
      message: 'Empty response',
    });
  });

  it('reports invalid payloads as malformed instead of throwing', () => {
    const missingEdit = parseResponse({ text: '{"operations": [{"op": "modify", "path": "a"}]}' });
    expect(missingEdit).toEqual({
      kind: 'malformed',
      reason: 'malformed-response',
      message: 'a: modify needs "content" or "hunks"',
    });

    const unknownOp = parseResponse({ text: '{"operations": [{"op": "explode", "path": "a"}]}' });
    expect(unknownOp.kind === 'malformed' && unknownOp.message).toMatch(
      /^Invalid operations: operations\.0\.op/,
    );

    const badJson = parseResponse({ text: '{"operations": [' });
    expect(badJson.kind === 'malformed' && badJson.message).toMatch(/^Invalid JSON: /);

    const brokenEnvelope = parseResponse({
      toolCalls: [{ name: 'apply_patch', arguments: { input: '*** Begin Patch' } }],
    });
    expect(brokenEnvelope.kind === 'malformed' && brokenEnvelope.message).toMatch(
      /Missing "\*\*\* End Patch"/,
    );
  });
});
