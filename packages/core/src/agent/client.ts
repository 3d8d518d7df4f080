import { z } from 'zod';
import { ApiError, TransportError } from '../errors.js';
import { resolveModel } from './models.js';

export interface CompletionRequest {
  prompt: string;
  temperature: number;
  /** Falls back to the client's default when absent or not whitelisted. */
  model?: string;
  signal?: AbortSignal;
}

export interface CompletionClient {
  readonly provider: string;
  /** The model a request for `requested` will actually run on. */
  resolveModel(requested?: string): string;
  complete(request: CompletionRequest): Promise<string>;
}

export interface OpenAIClientConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const ChatCompletionBodySchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullish(),
    }).optional(),
  })).optional(),
});

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * OpenAI-compatible chat completions over fetch. One user message per call;
 * the prompt carries all context.
 */
export class OpenAICompletionClient implements CompletionClient {
  readonly provider = 'openai';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: OpenAIClientConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.model = resolveModel('openai', config.model);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  resolveModel(requested?: string): string {
    return requested ? resolveModel('openai', requested) : this.model;
  }

  async complete(request: CompletionRequest): Promise<string> {
    let url: URL;
    try {
      url = new URL(`${this.baseUrl}/chat/completions`);
    } catch {
      throw new TransportError(`Invalid completion URL: ${this.baseUrl}`);
    }

    const ctrl = new AbortController();
    const onAbort = () => ctrl.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });
    const timeout = setTimeout(() => ctrl.abort(), this.timeoutMs);

    try {
      let resp: Response;
      try {
        resp = await this.fetchImpl(url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiKey}`,
          },
          body: JSON.stringify({
            model: this.resolveModel(request.model),
            messages: [{ role: 'user', content: request.prompt }],
            temperature: request.temperature,
          }),
          signal: ctrl.signal,
        });
      } catch (err) {
        if (ctrl.signal.aborted && !request.signal?.aborted) {
          throw new TransportError(`Completion timed out after ${this.timeoutMs}ms`, { cause: err });
        }
        const msg = err instanceof Error ? err.message : String(err);
        throw new TransportError(`Completion request failed: ${msg}`, { cause: err });
      }

      let text: string;
      try {
        text = await resp.text();
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        throw new TransportError(`Completion response interrupted: ${msg}`, { cause: err });
      }
      if (resp.status !== 200) {
        throw new ApiError(resp.status, text);
      }

      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch {
        throw new ApiError(resp.status, text, 'Completion API returned a body that is not JSON');
      }
      const body = ChatCompletionBodySchema.safeParse(json);
      if (!body.success) {
        throw new ApiError(resp.status, text, 'Completion API returned an unexpected body');
      }

      return body.data.choices?.[0]?.message?.content ?? '';
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}
