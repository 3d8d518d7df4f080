import Anthropic from '@anthropic-ai/sdk';
import { ApiError, TransportError } from '../errors.js';
import { DEFAULT_TIMEOUT_MS, type CompletionClient, type CompletionRequest } from './client.js';
import { resolveModel } from './models.js';

/** The part of the SDK's messages resource this client calls. */
export interface MessagesApi {
  create(
    body: Anthropic.MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal },
  ): PromiseLike<{ content: ReadonlyArray<{ type: string; text?: string }> }>;
}

export interface AnthropicClientConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  timeoutMs?: number;
  /** Replaces the SDK's messages resource, e.g. in tests. */
  messages?: MessagesApi;
}

/**
 * Same contract as the HTTP client, over the Anthropic SDK. SDK retries are
 * off: a failed call fails the turn.
 */
export class AnthropicCompletionClient implements CompletionClient {
  readonly provider = 'anthropic';
  private messages: MessagesApi;
  private model: string;
  private maxTokens: number;

  constructor(config: AnthropicClientConfig) {
    this.messages = config.messages ?? new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 0,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    }).messages;
    this.model = resolveModel('anthropic', config.model);
    this.maxTokens = config.maxTokens ?? 2048;
  }

  resolveModel(requested?: string): string {
    return requested ? resolveModel('anthropic', requested) : this.model;
  }

  async complete(request: CompletionRequest): Promise<string> {
    try {
      const response = await this.messages.create(
        {
          model: this.resolveModel(request.model),
          max_tokens: this.maxTokens,
          temperature: request.temperature,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal: request.signal },
      );

      return response.content
        .flatMap((b) => (b.type === 'text' && b.text !== undefined ? [b.text] : []))
        .join('');
    } catch (err) {
      if (err instanceof Anthropic.APIConnectionError || err instanceof Anthropic.APIUserAbortError) {
        throw new TransportError(`Completion request failed: ${err.message}`, { cause: err });
      }
      if (err instanceof Anthropic.APIError) {
        const body = err.error === undefined ? err.message : JSON.stringify(err.error);
        throw new ApiError(err.status ?? 0, body);
      }
      throw err;
    }
  }
}
