/**
 * A message in a conversation with an LLM provider.
 */
export interface ChatMessage {
  /** The role of the message sender */
  role: 'system' | 'user' | 'assistant';
  /** The text content of the message */
  content: string;
}

/**
 * Request payload for generating a model response.
 *
 * @example
 * ```typescript
 * const request: ModelRequest = {
 *   messages: [{ role: 'user', content: 'Write a debounce helper' }],
 *   maxTokens: 1000,
 *   temperature: 0.5,
 *   seed: 43,
 * };
 * ```
 */
export interface ModelRequest {
  /** Conversation history to send to the model */
  messages: ChatMessage[];
  /** Maximum tokens to generate in the response */
  maxTokens?: number;
  /** Sampling temperature (0-2, higher = more random) */
  temperature?: number;
  /** Sampling seed; honoured by providers that support deterministic sampling */
  seed?: number;
  /** Request JSON-formatted output */
  jsonMode?: boolean;
  /** Additional metadata to pass through */
  metadata?: Record<string, unknown>;
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
  /** Token usage statistics */
  usage?: Usage;
  /** Raw provider-specific response data */
  raw?: unknown;
}

/**
 * Events emitted during streaming responses.
 */
export type StreamEvent =
  /** Incremental text content */
  | { type: 'text-delta'; content: string }
  /** Final usage statistics */
  | { type: 'usage'; usage: Usage };

/**
 * Describes the capabilities of an LLM provider adapter.
 */
export interface ProviderCapabilities {
  /** Whether the provider supports streaming responses */
  supportsStreaming: boolean;
  /** Whether the provider honours `ModelRequest.seed` */
  supportsSeed: boolean;
  /** Whether the provider supports JSON mode output */
  supportsJsonMode: boolean;
  /** Maximum context window size in tokens */
  maxContextTokens?: number;
  /** Expected response latency classification */
  latencyClass: 'fast' | 'medium' | 'slow';
  /** Pricing information per million tokens */
  pricing?: ModelPricing;
}

export interface ModelPricing {
  inputPerMTokUsd?: number;
  outputPerMTokUsd?: number;
}
