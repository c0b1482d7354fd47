export type ProviderId = "ollama";

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

/** 모델별로 지원하는 추론 엔드포인트. chat = /api/chat, generate = /api/generate. */
export type EndpointMode = "chat" | "generate";

export type LlmUsage = {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
};

export class LlmResponse {
  readonly content: string | null;
  readonly finish_reason: string;
  readonly usage: LlmUsage;
  readonly error: string | null;

  constructor(args: {
    content?: string | null;
    finish_reason?: string;
    usage?: LlmUsage;
    error?: string | null;
  }) {
    this.content = args.content ?? null;
    this.finish_reason = args.finish_reason ?? "stop";
    this.usage = args.usage ?? {};
    this.error = args.error ?? null;
  }

  get is_error(): boolean {
    return this.finish_reason === "error" || this.content === null;
  }

  static failure(error: string): LlmResponse {
    return new LlmResponse({ content: null, finish_reason: "error", error });
  }
}

export type ChatOptions = {
  messages: ChatMessage[];
  model?: string;
  temperature?: number;
  num_predict?: number;
  abort_signal?: AbortSignal;
};

export interface LlmProvider {
  readonly id: ProviderId;
  chat(options: ChatOptions): Promise<LlmResponse>;
  get_default_model(): string;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** JSON 문자열을 Record로 변환. 객체가 아니거나 파싱 실패 시 null. */
export function parse_json_record(raw: string): Record<string, unknown> | null {
  try {
    const parsed = JSON.parse(raw) as unknown;
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return null;
    return parsed as Record<string, unknown>;
  } catch {
    return null;
  }
}
