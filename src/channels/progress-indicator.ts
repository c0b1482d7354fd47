import type { ProgressScope } from "../agent/loop.types.js";

const FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export type ProgressOutput = {
  isTTY?: boolean;
  write(chunk: string): unknown;
};

/** 블로킹 호출 동안만 도는 표시. TTY가 아니면 아무것도 쓰지 않는다. */
export class ProgressIndicator {
  private timer: NodeJS.Timeout | null = null;
  private frame = 0;
  private label = "";

  constructor(
    private readonly out: ProgressOutput = process.stdout,
    private readonly interval_ms = 100,
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(label: string): void {
    if (this.timer || !this.out.isTTY) return;
    this.label = label;
    this.frame = 0;
    this.render();
    this.timer = setInterval(() => this.render(), this.interval_ms);
    this.timer.unref();
  }

  /** 타이머를 멈추고 표시 줄을 지운다. 멈춘 상태에서 호출해도 무해. */
  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.out.write("\r\x1b[K");
  }

  private render(): void {
    const glyph = FRAMES[this.frame % FRAMES.length];
    this.frame += 1;
    this.out.write(`\r  ${glyph} ${this.label}`);
  }
}

/** fn 실행 동안 표시를 켜고, 성공/실패와 무관하게 끈 뒤 반환한다. */
export function create_progress_scope(indicator: ProgressIndicator): ProgressScope {
  return async (label, fn) => {
    indicator.start(label);
    try {
      return await fn();
    } finally {
      indicator.stop();
    }
  };
}
