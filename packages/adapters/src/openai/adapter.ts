import OpenAI, { APIConnectionTimeoutError, APIError } from 'openai';
import {
  AppError,
  ChatMessage,
  ConfigError,
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  ProviderError,
  TimeoutError,
  ToolCall,
  ToolSpec,
} from '@patchloop/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import { executeProviderRequest } from '../common';
import { ProviderHttpError, RateLimitError } from '../errors';

export interface OpenAIAdapterOptions {
  model: string;
  /** Key used as is; takes precedence over `apiKeyEnv` */
  apiKey?: string;
  /** Environment variable holding the key */
  apiKeyEnv?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
}

function parseArguments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    // The patch parser reports unparseable arguments as a malformed response.
    return raw;
  }
}

function retryAfterMs(error: APIError): number | undefined {
  const header = error.headers?.['retry-after'];
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

export class OpenAIAdapter implements ProviderAdapter {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(private readonly options: OpenAIAdapterOptions) {
    const apiKey = options.apiKey ?? (options.apiKeyEnv ? process.env[options.apiKeyEnv] : undefined);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API key for the OpenAI provider. Set the ${options.apiKeyEnv ?? 'OPENAI_API_KEY'} environment variable.`,
      );
    }
    this.model = options.model;
    // Retries are handled by executeProviderRequest.
    this.client = new OpenAI({ apiKey, baseURL: options.baseUrl, maxRetries: 0 });
  }

  id(): string {
    return 'openai';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsToolCalling: true,
      latencyClass: 'medium',
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    const tools = this.mapTools(req.tools);
    const temperature = req.temperature ?? this.options.temperature;
    const maxTokens = req.maxTokens ?? this.options.maxTokens;

    const completion = await executeProviderRequest(ctx, 'openai', this.model, (signal) =>
      this.client.chat.completions
        .create(
          {
            model: this.model,
            messages: this.mapMessages(req.messages),
            ...(tools.length > 0 ? { tools, tool_choice: req.toolChoice ?? 'auto' } : {}),
            ...(maxTokens !== undefined ? { max_completion_tokens: maxTokens } : {}),
            ...(temperature !== undefined ? { temperature } : {}),
          },
          { signal },
        )
        .catch((error: unknown) => {
          throw this.mapError(error);
        }),
    );

    const choice = completion.choices[0];
    if (!choice) {
      throw new ProviderError('OpenAI returned no choices');
    }

    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      arguments: parseArguments(tc.function.arguments),
    }));

    return {
      text: choice.message.content ?? undefined,
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      usage: completion.usage
        ? {
            inputTokens: completion.usage.prompt_tokens,
            outputTokens: completion.usage.completion_tokens,
            totalTokens: completion.usage.total_tokens,
          }
        : undefined,
    };
  }

  private mapMessages(messages: ChatMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((m): OpenAI.Chat.ChatCompletionMessageParam => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content };
        case 'assistant':
          return { role: 'assistant', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
      }
    });
  }

  private mapTools(tools?: ToolSpec[]): OpenAI.Chat.ChatCompletionTool[] {
    if (!tools) return [];
    return tools.map((t) => ({
      type: 'function',
      function: {
        name: t.name,
        description: t.description,
        parameters: t.inputSchema,
      },
    }));
  }

  private mapError(error: unknown): Error {
    if (error instanceof APIConnectionTimeoutError) {
      return new TimeoutError(error.message, { cause: error });
    }
    if (error instanceof APIError && typeof error.status === 'number') {
      if (error.status === 429) {
        return new RateLimitError(error.message, retryAfterMs(error), { cause: error });
      }
      if (error.status === 401 || error.status === 403) {
        return new ConfigError(`OpenAI rejected the credentials: ${error.message}`, { cause: error });
      }
      return new ProviderHttpError(error.message, error.status, { cause: error });
    }
    if (error instanceof AppError) return error;
    return new ProviderError(error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
}
