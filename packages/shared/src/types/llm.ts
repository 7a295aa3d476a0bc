/**
 * A message in a conversation with the generation service.
 */
export interface ChatMessage {
  /** The role of the message sender */
  role: 'system' | 'user' | 'assistant';
  /** The text content of the message */
  content: string;
}

/**
 * Specification for a tool that the model can call to hand back a patch.
 *
 * @example
 * ```typescript
 * const noChange: ToolSpec = {
 *   name: 'no_change',
 *   description: 'Signal that the project needs no further edits',
 *   inputSchema: { type: 'object', properties: {} },
 * };
 * ```
 */
export interface ToolSpec {
  /** Unique identifier for the tool */
  name: string;
  /** Human-readable description of what the tool does */
  description?: string;
  /** JSON Schema defining the tool's input parameters */
  inputSchema: Record<string, unknown>;
}

/**
 * Represents a tool call made by the model.
 */
export interface ToolCall {
  /** Name of the tool being called */
  name: string;
  /** Arguments to pass to the tool (parsed from JSON when possible) */
  arguments: unknown;
  /** Unique identifier for this tool call */
  id?: string;
}

/**
 * Request payload for generating a model response.
 */
export interface ModelRequest {
  /** Conversation history to send to the model */
  messages: ChatMessage[];
  /** Available tools the model can call */
  tools?: ToolSpec[];
  /** How the model should use tools */
  toolChoice?: 'auto' | 'none' | 'required';
  /** Maximum tokens to generate in the response */
  maxTokens?: number;
  /** Sampling temperature (0-2, higher = more random) */
  temperature?: number;
}

/**
 * Token usage statistics from a model response.
 */
export interface Usage {
  /** Number of tokens in the input/prompt */
  inputTokens?: number;
  /** Number of tokens generated in the output */
  outputTokens?: number;
  /** Total tokens (input + output) */
  totalTokens?: number;
}

/**
 * Response from a model generation request.
 */
export interface ModelResponse {
  /** Generated text content */
  text?: string;
  /** Tool calls requested by the model */
  toolCalls?: ToolCall[];
  /** Token usage statistics */
  usage?: Usage;
}

/**
 * Describes the capabilities of a provider adapter.
 */
export interface ProviderCapabilities {
  /** Whether the provider supports tool/function calling */
  supportsToolCalling: boolean;
  /** Maximum context window size in tokens */
  maxContextTokens?: number;
  /** Expected response latency classification */
  latencyClass: 'fast' | 'medium' | 'slow';
}
