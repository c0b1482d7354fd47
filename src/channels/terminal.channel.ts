import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { AgentLoopEvent, RunResult } from "../agent/loop.types.js";
import type { CommandResult } from "../agent/tools/shell-runtime.js";
import { format_duration } from "../agent/tools/shell-runtime.js";
import type { RunOutcome } from "../agent/feedback.js";

export type TerminalChannelOptions = {
  input?: Readable;
  output?: Writable;
  /** false면 명령 출력 줄을 실시간으로 보여주지 않는다. */
  stream_output?: boolean;
};

const RULE = "-".repeat(62);

function describe_exit(result: CommandResult, outcome: RunOutcome): string {
  switch (outcome) {
    case "success": return `ok exit 0 (${format_duration(result.duration_ms)})`;
    case "timeout": return "FAILED timed out";
    case "spawn_error": return "FAILED could not start";
    case "silent_failure": return "FAILED download looks empty";
    case "failed": return `FAILED exit ${result.exit_code} (${format_duration(result.duration_ms)})`;
  }
}

/** 종료 경로마다 구분되는 한 줄 결과. */
export function format_outcome(result: RunResult): string {
  switch (result.status) {
    case "completed": return "Task complete!";
    case "failed":
      return `Stopped after ${result.state.consecutive_failures} consecutive failures (step ${result.state.step}).`;
    case "max_iterations_reached":
      return `Reached step limit (${result.state.step}). Task is incomplete.`;
  }
}

/** 루프 이벤트를 한 줄씩 출력하고, 사람에게 묻는 경로를 제공한다. */
export class TerminalChannel {
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly stream_output: boolean;

  constructor(options: TerminalChannelOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.stream_output = options.stream_output ?? true;
  }

  print(line = ""): void {
    this.output.write(`${line}\n`);
  }

  /** 입력이 EOF에 도달했거나 이미 닫혀 있으면 빈 문자열. */
  prompt_line(prompt: string): Promise<string> {
    if (this.input.readableEnded || this.input.destroyed) return Promise.resolve("");
    return new Promise((resolve) => {
      const rl = createInterface({ input: this.input, output: this.output });
      let answered = false;
      rl.once("close", () => {
        if (!answered) {
          this.print();
          resolve("");
        }
      });
      rl.question(prompt, (answer) => {
        answered = true;
        rl.close();
        resolve(answer.trim());
      });
    });
  }

  /** 질문 문구는 question 이벤트에서 이미 출력된 상태. */
  ask(): Promise<string> {
    return this.prompt_line("  Your answer: ");
  }

  async confirm(prompt: string): Promise<boolean> {
    const answer = await this.prompt_line(`  ${prompt} [y/N]: `);
    return answer.toLowerCase() === "y" || answer.toLowerCase() === "yes";
  }

  render_header(model: string, goal: string, endpoint: string): void {
    this.print(RULE);
    this.print(`  Model: ${model} (${endpoint})`);
    this.print(`  Task:  ${goal}`);
    this.print(RULE);
  }

  readonly handle_event = (event: AgentLoopEvent): void => {
    switch (event.type) {
      case "step_started":
      case "completed":
      case "answer":
        return;
      case "parse_retry":
        this.print(`  ! Bad JSON (attempt ${event.attempt}/${event.max})`);
        return;
      case "turn_failed":
        this.print(event.reason === "inference_error"
          ? `  ! Inference error: ${event.error ?? "unknown"} (failure ${event.consecutive_failures})`
          : `  ! No valid decision after retries (failure ${event.consecutive_failures})`);
        return;
      case "hard_reset":
        this.print("  ! Context reset. Re-anchoring the task.");
        return;
      case "missing_field":
        this.print(`  ! Empty ${event.field} in ${event.action} decision. Asking again.`);
        return;
      case "command_started":
        this.print(RULE);
        this.print(`  Step ${event.step}  ${event.reason}`);
        this.print(`  $ ${event.command}`);
        return;
      case "command_output":
        if (this.stream_output) this.print(event.stream === "stderr" ? `  ! ${event.line}` : `    ${event.line}`);
        return;
      case "command_finished":
        this.print(`  ${describe_exit(event.result, event.outcome)}`);
        if (event.interactive) this.print("  note: command looks interactive");
        return;
      case "web_request":
        this.print(`  ${event.action}: ${event.target}${event.available ? "" : " (web unavailable)"}`);
        return;
      case "web_result":
        this.print(event.result.ok
          ? `  ok ${event.action} (${event.result.text.length} chars)`
          : `  FAILED ${event.action}: ${event.result.reason}`);
        return;
      case "question":
        this.print();
        this.print(`  Agent asks: ${event.question}`);
        return;
      case "terminated":
        this.render_outcome(event.result);
        return;
    }
  };

  render_outcome(result: RunResult): void {
    this.print(RULE.replace(/-/g, "="));
    this.print(`  ${format_outcome(result)}`);
    if (result.summary) {
      this.print();
      this.print(`  ${result.summary}`);
    }
    this.print(RULE.replace(/-/g, "="));
  }
}
