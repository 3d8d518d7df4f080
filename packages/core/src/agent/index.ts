export type { CompletionClient, CompletionRequest, OpenAIClientConfig } from './client.js';
export { OpenAICompletionClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './client.js';
export type { AnthropicClientConfig, MessagesApi } from './anthropic.js';
export { AnthropicCompletionClient } from './anthropic.js';
export type { Provider } from './models.js';
export { MODELS, resolveModel, assertModel } from './models.js';
