import OpenAI, { APIConnectionTimeoutError, APIError } from 'openai';
import {
  ConfigError,
  type ChatMessage,
  type ModelRequest,
  type ModelResponse,
  type ProviderCapabilities,
  type ProviderConfig,
  type StreamEvent,
  type Usage,
} from '@crucible/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import { BaseProviderAdapter, resolveApiKey, type APIErrorLike, type ErrorTypeConfig } from '../base-adapter';
import { executeProviderRequest } from '../common';

/** Sent to OpenAI-compatible local servers that ignore authentication */
const LOCAL_SERVER_API_KEY = 'not-needed';

/**
 * Chat-completions adapter. With `baseURL` set it talks to any OpenAI-compatible
 * server (vLLM, Ollama, llama.cpp), which is how local code models are served.
 */
export class OpenAIAdapter extends BaseProviderAdapter implements ProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike => error instanceof APIError,
    isTimeoutError: (error: unknown) => error instanceof APIConnectionTimeoutError,
  };

  private client: OpenAI;
  private readonly modelName: string;
  private readonly defaultMaxTokens?: number;
  private readonly pricing: ProviderConfig['pricing'];

  constructor(config: ProviderConfig) {
    super();
    const apiKey = resolveApiKey(config) ?? (config.baseURL ? LOCAL_SERVER_API_KEY : undefined);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for OpenAI provider. Checked config.api_key and env var ${config.api_key_env}`,
      );
    }
    this.modelName = config.model;
    this.defaultMaxTokens = config.maxTokens;
    this.pricing = config.pricing;
    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      // Retries are handled by executeProviderRequest
      maxRetries: 0,
    });
  }

  id(): string {
    return 'openai';
  }

  model(): string {
    return this.modelName;
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsStreaming: true,
      supportsSeed: true,
      supportsJsonMode: true,
      latencyClass: 'medium',
      pricing: this.pricing,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, this.id(), this.modelName, async (signal) => {
      try {
        const completion = await this.client.chat.completions.create(
          {
            model: this.modelName,
            messages: this.mapMessages(req.messages),
            max_tokens: req.maxTokens ?? this.defaultMaxTokens,
            temperature: req.temperature ?? 0.2,
            seed: req.seed,
            response_format: req.jsonMode ? { type: 'json_object' } : undefined,
          },
          { signal },
        );

        const choice = completion.choices[0];
        const usage: Usage | undefined = completion.usage
          ? {
              inputTokens: completion.usage.prompt_tokens,
              outputTokens: completion.usage.completion_tokens,
              totalTokens: completion.usage.total_tokens,
            }
          : undefined;

        return {
          text: choice?.message.content || undefined,
          usage,
          raw: completion,
        };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }

  async *stream(req: ModelRequest, ctx: AdapterContext): AsyncIterable<StreamEvent> {
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: this.modelName,
          messages: this.mapMessages(req.messages),
          max_tokens: req.maxTokens ?? this.defaultMaxTokens,
          temperature: req.temperature ?? 0.2,
          seed: req.seed,
          stream: true,
          stream_options: { include_usage: true },
        },
        {
          signal: ctx.abortSignal,
          timeout: ctx.timeoutMs,
        },
      );

      for await (const chunk of stream) {
        if (chunk.usage) {
          yield {
            type: 'usage',
            usage: {
              inputTokens: chunk.usage.prompt_tokens,
              outputTokens: chunk.usage.completion_tokens,
              totalTokens: chunk.usage.total_tokens,
            },
          };
        }

        const content = chunk.choices[0]?.delta?.content;
        if (content) {
          yield { type: 'text-delta', content };
        }
      }
    } catch (error) {
      throw this.mapError(error);
    }
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
}
