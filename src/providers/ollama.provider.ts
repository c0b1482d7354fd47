import { BaseLlmProvider } from "./base.js";
import { EndpointModeCache } from "./endpoint-cache.js";
import {
  LlmResponse,
  parse_json_record,
  type ChatMessage,
  type ChatOptions,
  type EndpointMode,
  type FetchLike,
} from "./types.js";
import { create_logger, type Logger } from "../logger.js";

const MODEL_PREFERENCES = ["llama3", "mistral", "gemma", "phi", "qwen"];

export type OllamaProviderOptions = {
  api_base: string;
  default_model?: string;
  temperature?: number;
  num_predict?: number;
  request_timeout_ms?: number;
  probe_timeout_ms?: number;
  endpoint_cache?: EndpointModeCache;
  fetch_impl?: FetchLike;
  logger?: Logger;
};

/** 선호 모델 계열을 먼저, 없으면 첫 번째 모델. */
export function auto_select_model(models: string[]): string | null {
  if (models.length === 0) return null;
  for (const pref of MODEL_PREFERENCES) {
    const hit = models.find((m) => m.toLowerCase().includes(pref));
    if (hit) return hit;
  }
  return models[0] ?? null;
}

/** generate 엔드포인트용 평문 프롬프트. 역할 태그 블록 뒤에 ASSISTANT: 로 끝난다. */
export function flatten_messages_to_prompt(messages: ChatMessage[]): string {
  const parts = messages.map((m) => `${m.role.toUpperCase()}:\n${m.content}`);
  parts.push("ASSISTANT:");
  return parts.join("\n\n");
}

function error_text(error: unknown): string {
  if (error instanceof Error) return error.name === "TimeoutError" ? "request_timeout" : error.message;
  return String(error);
}

export class OllamaProvider extends BaseLlmProvider {
  private readonly request_timeout_ms: number;
  private readonly probe_timeout_ms: number;
  private readonly endpoint_cache: EndpointModeCache;
  private readonly fetch_impl: FetchLike;
  private readonly logger: Logger;

  constructor(options: OllamaProviderOptions) {
    super({
      id: "ollama",
      api_base: options.api_base,
      default_model: options.default_model ?? "",
      temperature: options.temperature,
      num_predict: options.num_predict,
    });
    this.request_timeout_ms = Math.max(1_000, options.request_timeout_ms ?? 180_000);
    this.probe_timeout_ms = Math.max(500, options.probe_timeout_ms ?? 20_000);
    this.endpoint_cache = options.endpoint_cache ?? new EndpointModeCache();
    this.fetch_impl = options.fetch_impl ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? create_logger("ollama");
  }

  /** /api/tags 에 응답하면 서비스가 떠 있는 것으로 본다. */
  async is_running(): Promise<boolean> {
    try {
      const response = await this.fetch_impl(`${this.api_base}/api/tags`, {
        method: "GET",
        signal: AbortSignal.timeout(2_000),
      });
      return response.status === 200;
    } catch {
      return false;
    }
  }

  async list_models(): Promise<string[]> {
    try {
      const response = await this.fetch_impl(`${this.api_base}/api/tags`, {
        method: "GET",
        signal: AbortSignal.timeout(2_000),
      });
      if (response.status !== 200) return [];
      const raw = parse_json_record(await response.text());
      const models: unknown = raw?.models;
      const rows: unknown[] = Array.isArray(models) ? models : [];
      const names: string[] = [];
      for (const row of rows) {
        if (row && typeof row === "object" && "name" in row && typeof row.name === "string") names.push(row.name);
      }
      return names;
    } catch (error) {
      this.logger.debug("list_models failed", { error: error_text(error) });
      return [];
    }
  }

  /** 모델당 한 번, 1토큰 chat 호출로 지원 엔드포인트를 판별해 캐시에 기록. */
  async resolve_endpoint(model: string): Promise<EndpointMode> {
    const cached = this.endpoint_cache.get(model);
    if (cached) return cached;
    let mode: EndpointMode = "generate";
    try {
      const response = await this.fetch_impl(`${this.api_base}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model,
          messages: [{ role: "user", content: "hi" }],
          stream: false,
          options: { num_predict: 1 },
        }),
        signal: AbortSignal.timeout(this.probe_timeout_ms),
      });
      if (response.status === 200) mode = "chat";
    } catch (error) {
      this.logger.debug("endpoint probe failed", { model, error: error_text(error) });
    }
    this.logger.info("endpoint resolved", { model, mode });
    return this.endpoint_cache.remember(model, mode);
  }

  async chat(options: ChatOptions): Promise<LlmResponse> {
    const model = String(options.model || this.default_model).trim();
    if (!model) return LlmResponse.failure("model_missing");
    const mode = await this.resolve_endpoint(model);
    const normalized = this.normalize_options(options);
    const messages = this.sanitize_messages(options.messages);
    const body: Record<string, unknown> = mode === "chat"
      ? { model, messages, stream: false }
      : { model, prompt: flatten_messages_to_prompt(messages), stream: false };
    body.options = { temperature: normalized.temperature, num_predict: normalized.num_predict };

    const signals = [AbortSignal.timeout(this.request_timeout_ms)];
    if (options.abort_signal) signals.push(options.abort_signal);

    try {
      const response = await this.fetch_impl(`${this.api_base}/api/${mode}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.any(signals),
      });
      const text = await response.text();
      if (!response.ok) {
        return LlmResponse.failure(`http_${response.status}: ${text.slice(0, 200)}`);
      }
      const raw = parse_json_record(text);
      if (!raw) return LlmResponse.failure("invalid_json_body");
      const content = mode === "chat" ? read_chat_content(raw) : raw.response;
      if (typeof content !== "string") return LlmResponse.failure(`missing_content:${mode}`);
      const prompt_tokens = Number(raw.prompt_eval_count || 0);
      const completion_tokens = Number(raw.eval_count || 0);
      return new LlmResponse({
        content: content.trim(),
        finish_reason: typeof raw.done_reason === "string" ? raw.done_reason : "stop",
        usage: { prompt_tokens, completion_tokens, total_tokens: prompt_tokens + completion_tokens },
      });
    } catch (error) {
      return LlmResponse.failure(`request_failed: ${error_text(error)}`);
    }
  }
}

function read_chat_content(raw: Record<string, unknown>): unknown {
  const message = raw.message;
  if (!message || typeof message !== "object" || !("content" in message)) return undefined;
  return message.content;
}
