import { ConfigError, type AgentConfig } from '@patchloop/shared';
import { FakeAdapter, OpenAIAdapter, type ProviderAdapter } from '@patchloop/adapters';

/**
 * Agent settings with the API key already looked up.
 */
export type ResolvedAgentConfig = AgentConfig & { apiKey?: string };

export type AdapterFactory = (config: ResolvedAgentConfig) => ProviderAdapter;

interface FactoryEntry {
  create: AdapterFactory;
  requiresApiKey: boolean;
}

/**
 * Builds the generation adapter named by the `agent.provider` setting.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry(config.agent);
 * registry.registerFactory('openai', (cfg) => new OpenAIAdapter(cfg), { requiresApiKey: true });
 * const adapter = registry.getAdapter();
 * ```
 */
export class ProviderRegistry {
  private factories = new Map<string, FactoryEntry>();
  private adapters = new Map<string, ProviderAdapter>();

  constructor(
    private config: AgentConfig,
    private env: NodeJS.ProcessEnv = process.env,
  ) {}

  registerFactory(type: string, factory: AdapterFactory, options: { requiresApiKey?: boolean } = {}) {
    this.factories.set(type, { create: factory, requiresApiKey: options.requiresApiKey ?? false });
  }

  /**
   * Returns the adapter for `type` (the configured provider by default),
   * creating it on first use.
   *
   * @throws {ConfigError} If no factory is registered or a required key is missing
   */
  getAdapter(type: string = this.config.provider): ProviderAdapter {
    const cached = this.adapters.get(type);
    if (cached) return cached;

    const entry = this.factories.get(type);
    if (!entry) {
      throw new ConfigError(
        `Unknown provider type '${type}'. Known providers: ${[...this.factories.keys()].join(', ') || '(none)'}`,
      );
    }

    const apiKey = this.env[this.config.apiKeyEnv];
    if (entry.requiresApiKey && !apiKey) {
      throw new ConfigError(
        `Missing environment variable '${this.config.apiKeyEnv}' for provider '${type}'`,
      );
    }

    const adapter = entry.create({ ...this.config, ...(apiKey ? { apiKey } : {}) });
    this.adapters.set(type, adapter);
    return adapter;
  }
}

/**
 * A registry with the built-in OpenAI and scripted providers.
 */
export function createProviderRegistry(
  config: AgentConfig,
  env: NodeJS.ProcessEnv = process.env,
): ProviderRegistry {
  const registry = new ProviderRegistry(config, env);
  registry.registerFactory(
    'openai',
    (cfg) =>
      new OpenAIAdapter({
        model: cfg.model,
        apiKey: cfg.apiKey,
        apiKeyEnv: cfg.apiKeyEnv,
        baseUrl: cfg.baseUrl,
        temperature: cfg.temperature,
        maxTokens: cfg.maxTokens,
      }),
    { requiresApiKey: true },
  );
  registry.registerFactory('fake', (cfg) => new FakeAdapter(cfg.script ?? []));
  return registry;
}
