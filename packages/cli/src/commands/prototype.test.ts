import { describe, it, expect } from 'vitest';
import { UsageError } from '@patchloop/shared';
import { buildConfigFlags } from './prototype';

describe('buildConfigFlags', () => {
  it('is empty when no flags are given', () => {
    expect(buildConfigFlags({ checkout: true })).toEqual({});
  });

  it('maps every flag onto its configuration section', () => {
    expect(
      buildConfigFlags({
        provider: 'fake',
        model: 'test-model',
        maxIters: 4,
        budget: { time: 60_000 },
        testCommand: 'npm test',
        interactive: true,
        checkout: false,
      }),
    ).toEqual({
      agent: { provider: 'fake', model: 'test-model', maxIterations: 4, maxWallTimeMs: 60_000 },
      tests: { command: 'npm test' },
      session: { interactive: true, checkout: false },
    });
  });

  it('prefers --max-iters over the iter budget', () => {
    expect(buildConfigFlags({ maxIters: 2, budget: { iter: 9 } }).agent).toEqual({ maxIterations: 2 });
    expect(buildConfigFlags({ budget: { iter: 9 } }).agent).toEqual({ maxIterations: 9 });
  });

  it('rejects an unknown provider', () => {
    expect(() => buildConfigFlags({ provider: 'other' })).toThrow(UsageError);
    expect(() => buildConfigFlags({ provider: 'other' })).toThrow(
      "Unknown provider 'other'. Expected one of: openai, fake",
    );
  });
});
