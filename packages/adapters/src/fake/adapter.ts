import type { ModelRequest, ModelResponse, ProviderCapabilities } from '@patchloop/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';

export const NO_CHANGE_RESPONSE = '{"action":"no_change"}';

/**
 * Either a text answer or a full response (tool calls included).
 */
export type ScriptedResponse = string | ModelResponse;

/**
 * Replays a fixed list of responses, one per call. Once the script runs out the
 * last entry is repeated; an empty script always answers "no change".
 */
export class FakeAdapter implements ProviderAdapter {
  private cursor = 0;
  readonly requests: ModelRequest[] = [];

  constructor(private readonly script: readonly ScriptedResponse[] = []) {}

  id(): string {
    return 'fake';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsToolCalling: true,
      latencyClass: 'fast',
    };
  }

  async generate(request: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    this.requests.push(request);
    const entry =
      this.script.length === 0
        ? NO_CHANGE_RESPONSE
        : this.script[Math.min(this.cursor, this.script.length - 1)];
    this.cursor++;
    await ctx.logger.debug(`fake provider answering call ${this.cursor}`);
    return typeof entry === 'string' ? { text: entry } : entry;
  }

  get calls(): number {
    return this.cursor;
  }
}
