export { BaseLlmProvider } from "./base.js";
export { EndpointModeCache } from "./endpoint-cache.js";
export { OllamaProvider, auto_select_model, flatten_messages_to_prompt } from "./ollama.provider.js";
export type { OllamaProviderOptions } from "./ollama.provider.js";
export { LlmResponse, parse_json_record } from "./types.js";
export type {
  ChatMessage,
  ChatOptions,
  ChatRole,
  EndpointMode,
  FetchLike,
  LlmProvider,
  LlmUsage,
  ProviderId,
} from "./types.js";
