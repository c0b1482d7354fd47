import type { ChatMessage, LlmResponse } from "../providers/index.js";
import type { ConversationContext } from "./context.service.js";
import { parse_decision } from "./decision-parser.js";
import type { Decision, DecisionAction } from "./decision.types.js";
import type { RunState } from "./loop.types.js";
import { RETRY_PROMPT } from "./prompts.js";

export const DEFAULT_MAX_PARSE_RETRIES = 5;
export const DEFAULT_FAILURE_THRESHOLD = 3;

/** attempt 0은 턴의 첫 호출, 1 이상은 재시도. */
export type GenerateFn = (messages: ChatMessage[], attempt: number) => Promise<LlmResponse>;

export type AcquireOutcome =
  | { kind: "decision"; decision: Decision; raw: string; attempts: number }
  | { kind: "missing_field"; action: DecisionAction; field: string; raw: string; attempts: number }
  | { kind: "exhausted"; attempts: number }
  | { kind: "inference_error"; error: string; attempts: number };

export type AcquireHooks = {
  on_retry?: (attempt: number, max: number) => void;
};

/**
 * 턴 단위 파싱 재시도와 턴 간 연속 실패 상한.
 * 상태는 RunState에만 두고 정책 객체 자체는 상태가 없다.
 */
export class RetryPolicy {
  readonly max_parse_retries: number;
  readonly failure_threshold: number;

  constructor(options: { max_parse_retries?: number; failure_threshold?: number } = {}) {
    this.max_parse_retries = Math.max(0, Math.floor(options.max_parse_retries ?? DEFAULT_MAX_PARSE_RETRIES));
    this.failure_threshold = Math.max(1, Math.floor(options.failure_threshold ?? DEFAULT_FAILURE_THRESHOLD));
  }

  /** 한 턴의 결정을 얻는다. 파싱 실패 시 원문과 교정 지시를 context에 남기고 다시 호출. */
  async acquire(context: ConversationContext, generate: GenerateFn, hooks: AcquireHooks = {}): Promise<AcquireOutcome> {
    let attempts = 0;
    let previous_raw: string | null = null;
    for (let attempt = 0; attempt <= this.max_parse_retries; attempt += 1) {
      if (previous_raw !== null) {
        hooks.on_retry?.(attempt, this.max_parse_retries);
        context.append_exchange(previous_raw, RETRY_PROMPT);
      }
      attempts += 1;
      const response = await generate(context.view(), attempt);
      if (response.is_error || response.content === null) {
        return { kind: "inference_error", error: response.error || "empty_response", attempts };
      }
      const raw = response.content;
      const parsed = parse_decision(raw);
      switch (parsed.kind) {
        case "decision":
          return { kind: "decision", decision: parsed.decision, raw, attempts };
        case "missing_field":
          return { kind: "missing_field", action: parsed.action, field: parsed.field, raw, attempts };
        case "none":
          previous_raw = raw;
          break;
      }
    }
    return { kind: "exhausted", attempts };
  }

  register_success(state: RunState): void {
    state.consecutive_failures = 0;
  }

  /** 실패 턴을 기록하고 상한 도달 여부를 반환. */
  register_failure(state: RunState): boolean {
    state.consecutive_failures += 1;
    return state.consecutive_failures >= this.failure_threshold;
  }
}
