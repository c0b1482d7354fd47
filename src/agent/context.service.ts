import type { ChatMessage } from "../providers/index.js";

export const DEFAULT_HISTORY_WINDOW = 16;

/**
 * 실행 중 대화 기록. 첫 원소는 항상 system 메시지 하나이며 제거되지 않는다.
 * 추가만 가능하고, 이전 메시지를 지우는 경로는 hard_reset 하나뿐이다.
 */
export class ConversationContext {
  private readonly system: ChatMessage;
  private history: ChatMessage[] = [];
  private readonly window: number;

  constructor(args: { system_prompt: string; window?: number }) {
    this.system = { role: "system", content: args.system_prompt };
    this.window = Math.max(1, Math.floor(args.window ?? DEFAULT_HISTORY_WINDOW));
  }

  append(message: ChatMessage): void {
    if (message.role === "system") throw new Error("system_message_not_appendable");
    this.history.push({ ...message });
  }

  append_user(content: string): void {
    this.append({ role: "user", content });
  }

  /** 생성기 원문과 그에 대한 피드백을 한 쌍으로 기록. */
  append_exchange(assistant_raw: string, user_feedback: string): void {
    this.append({ role: "assistant", content: assistant_raw });
    this.append({ role: "user", content: user_feedback });
  }

  /** 다음 호출용 뷰: system + 나머지 중 마지막 window개. */
  view(): ChatMessage[] {
    const tail = this.history.length > this.window
      ? this.history.slice(this.history.length - this.window)
      : this.history;
    return [{ ...this.system }, ...tail.map((m) => ({ ...m }))];
  }

  /** 전체 기록 사본. */
  messages(): ChatMessage[] {
    return [{ ...this.system }, ...this.history.map((m) => ({ ...m }))];
  }

  /** 기록을 [system, 재고정 user 메시지]로 교체. */
  hard_reset(anchor: string): void {
    this.history = [{ role: "user", content: anchor }];
  }
}
