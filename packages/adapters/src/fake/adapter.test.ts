import { describe, it, expect, vi } from 'vitest';
import type { Logger } from '@patchloop/shared';
import { FakeAdapter, NO_CHANGE_RESPONSE } from './adapter';
import type { AdapterContext } from '../types';

const logger: Logger = {
  log: vi.fn(),
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: () => logger,
};
const ctx: AdapterContext = { sessionId: 'test-session', logger };
const request = { messages: [{ role: 'user' as const, content: 'spec' }] };

describe('FakeAdapter', () => {
  it('replays the script in order and then repeats the last entry', async () => {
    const adapter = new FakeAdapter(['first', { toolCalls: [{ name: 'no_change', arguments: {} }] }]);

    expect(await adapter.generate(request, ctx)).toEqual({ text: 'first' });
    expect(await adapter.generate(request, ctx)).toEqual({
      toolCalls: [{ name: 'no_change', arguments: {} }],
    });
    expect(await adapter.generate(request, ctx)).toEqual({
      toolCalls: [{ name: 'no_change', arguments: {} }],
    });
    expect(adapter.calls).toBe(3);
  });

  it('answers "no change" when it has no script', async () => {
    const adapter = new FakeAdapter();
    expect(await adapter.generate(request, ctx)).toEqual({ text: NO_CHANGE_RESPONSE });
  });

  it('records every request it receives', async () => {
    const adapter = new FakeAdapter(['x']);
    await adapter.generate(request, ctx);
    expect(adapter.requests).toEqual([request]);
  });
});
