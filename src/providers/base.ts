import type { ChatMessage, ChatOptions, LlmProvider, LlmResponse, ProviderId } from "./types.js";

export abstract class BaseLlmProvider implements LlmProvider {
  readonly id: ProviderId;
  protected readonly api_base: string;
  protected readonly default_model: string;
  protected readonly default_temperature: number;
  protected readonly default_num_predict: number;

  constructor(args: {
    id: ProviderId;
    api_base: string;
    default_model: string;
    temperature?: number;
    num_predict?: number;
  }) {
    this.id = args.id;
    this.api_base = args.api_base.replace(/\/+$/, "");
    this.default_model = args.default_model;
    this.default_temperature = args.temperature ?? 0.05;
    this.default_num_predict = args.num_predict ?? 400;
  }

  get_default_model(): string {
    return this.default_model;
  }

  /** 빈 content는 일부 모델이 거부하므로 자리표시 문자열로 채운다. */
  protected sanitize_messages(messages: ChatMessage[]): ChatMessage[] {
    return messages.map((msg) => (msg.content.length === 0 ? { ...msg, content: "(empty)" } : msg));
  }

  protected normalize_options(options: ChatOptions): { temperature: number; num_predict: number } {
    return {
      temperature: Number(options.temperature ?? this.default_temperature),
      num_predict: Math.max(1, Number(options.num_predict ?? this.default_num_predict)),
    };
  }

  abstract chat(options: ChatOptions): Promise<LlmResponse>;
}
