import type { ModelRequest, ModelResponse, ProviderCapabilities } from '@patchloop/shared';
import type { AdapterContext } from './types';

/**
 * Interface for generation-service adapters.
 * The iteration controller only ever talks to the service through this.
 *
 * @example
 * ```typescript
 * class MyAdapter implements ProviderAdapter {
 *   id() { return 'my-adapter'; }
 *   capabilities() { return { supportsToolCalling: false, latencyClass: 'fast' }; }
 *   async generate(req, ctx) { return { text: '{"action":"no_change"}' }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  /**
   * Returns the unique identifier for this adapter instance.
   */
  id(): string;
  capabilities(): ProviderCapabilities;
  /**
   * Generate a response from the model.
   * Rejects with a ProviderError, a ConfigError or a TimeoutError from `@patchloop/shared`.
   */
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}
