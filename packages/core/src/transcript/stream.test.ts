import { describe, it, expect, vi } from 'vitest';
import { UsageError, type Logger, type LoopEvent } from '@patchloop/shared';
import { TranscriptStream, type EventInput } from './stream';

const fixedClock = () => new Date('2026-01-01T00:00:00.000Z');

function transition(from: EventInput['from'], state: EventInput['state'], iteration = 0): EventInput {
  return { type: 'StateChanged', from, state, iteration };
}

async function collect(iterable: AsyncIterable<LoopEvent>): Promise<number[]> {
  const seqs: number[] = [];
  for await (const event of iterable) seqs.push(event.seq);
  return seqs;
}

describe('TranscriptStream', () => {
  it('assigns sequence numbers from 0 and stamps every event', () => {
    const stream = new TranscriptStream('s1', fixedClock);
    const first = stream.append(transition('idle', 'generating'));
    const second = stream.append(transition('generating', 'applying', 0));

    expect(first).toEqual({
      schemaVersion: 1,
      seq: 0,
      timestamp: '2026-01-01T00:00:00.000Z',
      sessionId: 's1',
      type: 'StateChanged',
      from: 'idle',
      state: 'generating',
      iteration: 0,
    });
    expect(second.seq).toBe(1);
    expect(stream.length).toBe(2);
  });

  it('replays history to a late subscriber, then live events, until closed', async () => {
    const stream = new TranscriptStream('s1', fixedClock);
    stream.append(transition('idle', 'generating'));
    stream.append(transition('generating', 'applying'));

    const seen = collect(stream.subscribe());
    await Promise.resolve();
    stream.append(transition('applying', 'testing'));
    stream.append(transition('testing', 'evaluating'));
    stream.close();

    expect(await seen).toEqual([0, 1, 2, 3]);
  });

  it('starts a subscription at the requested sequence number', async () => {
    const stream = new TranscriptStream('s1', fixedClock);
    stream.append(transition('idle', 'generating'));
    stream.append(transition('generating', 'applying'));
    stream.append(transition('applying', 'testing'));
    stream.close();

    expect(await collect(stream.subscribe(1))).toEqual([1, 2]);
  });

  it('serves many concurrent readers the same order', async () => {
    const stream = new TranscriptStream('s1', fixedClock);
    const readers = [collect(stream.subscribe()), collect(stream.subscribe())];
    for (let i = 0; i < 5; i++) {
      stream.append(transition('generating', 'applying', i));
      await Promise.resolve();
    }
    stream.close();

    expect(await Promise.all(readers)).toEqual([
      [0, 1, 2, 3, 4],
      [0, 1, 2, 3, 4],
    ]);
  });

  it('delivers history synchronously to callback listeners, then live events', () => {
    const stream = new TranscriptStream('s1', fixedClock);
    stream.append(transition('idle', 'generating'));

    const seen: number[] = [];
    const unsubscribe = stream.on((event) => seen.push(event.seq));
    expect(seen).toEqual([0]);

    stream.append(transition('generating', 'applying'));
    unsubscribe();
    stream.append(transition('applying', 'testing'));

    expect(seen).toEqual([0, 1]);
  });

  it('keeps appending and delivering when a listener throws', () => {
    const logger: Logger = {
      log: vi.fn(),
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: () => logger,
    };
    const stream = new TranscriptStream('s1', fixedClock, logger);
    const seen: number[] = [];
    stream.on((event) => {
      if (event.seq === 0) throw new Error('reader broke');
      seen.push(event.seq);
    });
    const healthy: number[] = [];
    stream.on((event) => healthy.push(event.seq));

    stream.append(transition('idle', 'generating'));
    const second = stream.append(transition('generating', 'applying'));

    expect(second.seq).toBe(1);
    expect(seen).toEqual([1]);
    expect(healthy).toEqual([0, 1]);
    expect(logger.error).toHaveBeenCalledWith(
      new Error('reader broke'),
      'Transcript listener failed on event 0 of session s1',
    );
  });

  it('refuses appends after close', () => {
    const stream = new TranscriptStream('s1', fixedClock);
    stream.close();
    expect(stream.closed).toBe(true);
    expect(() => stream.append(transition('idle', 'generating'))).toThrow(UsageError);
  });

  it('returns a copy of its history', () => {
    const stream = new TranscriptStream('s1', fixedClock);
    stream.append(transition('idle', 'generating'));
    const events = stream.events();
    stream.append(transition('generating', 'applying'));
    expect(events).toHaveLength(1);
  });
});
