import Anthropic from '@anthropic-ai/sdk';
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

const DEFAULT_MAX_TOKENS = 1024;

export class AnthropicAdapter extends BaseProviderAdapter implements ProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike => error instanceof Anthropic.APIError,
    isTimeoutError: (error: unknown) => error instanceof Anthropic.APIConnectionTimeoutError,
  };

  private client: Anthropic;
  private readonly modelName: string;
  private readonly defaultMaxTokens: number;
  private readonly pricing: ProviderConfig['pricing'];

  constructor(config: ProviderConfig) {
    super();
    const apiKey = resolveApiKey(config);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for Anthropic provider. Checked config.api_key and env var ${config.api_key_env}`,
      );
    }
    this.modelName = config.model;
    this.defaultMaxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.pricing = config.pricing;
    this.client = new Anthropic({
      apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      // Retries are handled by executeProviderRequest
      maxRetries: 0,
    });
  }

  id(): string {
    return 'anthropic';
  }

  model(): string {
    return this.modelName;
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsStreaming: true,
      supportsSeed: false,
      supportsJsonMode: false,
      latencyClass: 'medium',
      pricing: this.pricing,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, this.id(), this.modelName, async (signal) => {
      try {
        const { system, messages } = this.mapMessages(req.messages);

        const response = await this.client.messages.create(
          {
            model: this.modelName,
            max_tokens: req.maxTokens ?? this.defaultMaxTokens,
            system,
            messages,
            temperature: req.temperature,
          },
          { signal },
        );

        const text = response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('');

        const usage: Usage = {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens,
        };

        return { text, usage, raw: response };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }

  async *stream(req: ModelRequest, ctx: AdapterContext): AsyncIterable<StreamEvent> {
    try {
      const stream = await executeProviderRequest(ctx, this.id(), this.modelName, async (signal) => {
        try {
          const { system, messages } = this.mapMessages(req.messages);
          return await this.client.messages.create(
            {
              model: this.modelName,
              max_tokens: req.maxTokens ?? this.defaultMaxTokens,
              system,
              messages,
              temperature: req.temperature,
              stream: true,
            },
            { signal },
          );
        } catch (error) {
          throw this.mapError(error);
        }
      });

      for await (const chunk of stream) {
        if (chunk.type === 'message_start') {
          yield {
            type: 'usage',
            usage: {
              inputTokens: chunk.message.usage.input_tokens,
              outputTokens: chunk.message.usage.output_tokens,
              totalTokens: chunk.message.usage.input_tokens + chunk.message.usage.output_tokens,
            },
          };
        } else if (chunk.type === 'content_block_delta' && chunk.delta.type === 'text_delta') {
          yield { type: 'text-delta', content: chunk.delta.text };
        } else if (chunk.type === 'message_delta') {
          yield { type: 'usage', usage: { outputTokens: chunk.usage.output_tokens } };
        }
      }
    } catch (error) {
      throw this.mapError(error);
    }
  }

  /**
   * System messages are concatenated into the top-level `system` field; the rest
   * keep their order.
   */
  private mapMessages(messages: ChatMessage[]): {
    system?: string;
    messages: Anthropic.MessageParam[];
  } {
    let system: string | undefined;
    const mapped: Anthropic.MessageParam[] = [];

    for (const m of messages) {
      if (m.role === 'system') {
        system = system ? system + '\n' + m.content : m.content;
      } else {
        mapped.push({ role: m.role, content: m.content });
      }
    }

    return { system, messages: mapped };
  }
}
