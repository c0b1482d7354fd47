import type { LlmProvider } from "../providers/index.js";
import type { Logger } from "../logger.js";
import type { DecisionAction } from "./decision.types.js";
import type { RunOutcome, StatSize } from "./feedback.js";
import type { CommandResult, OutputStream } from "./tools/shell-runtime.js";
import type { WebGateway, WebResult } from "./tools/web.js";

/** 턴 사이에 유지되는 유일한 상태(대화 제외). */
export type RunState = {
  step: number;
  consecutive_failures: number;
  done: boolean;
};

export type RunStatus = "completed" | "failed" | "max_iterations_reached";

export type TerminationReason = "done" | "failure_threshold" | "max_iterations";

export type RunResult = {
  status: RunStatus;
  termination_reason: TerminationReason;
  summary: string | null;
  state: RunState;
};

export type TurnFailureReason = "parse_exhausted" | "inference_error";

export type AgentLoopEvent =
  | { type: "step_started"; step: number }
  | { type: "parse_retry"; step: number; attempt: number; max: number }
  | { type: "turn_failed"; step: number; reason: TurnFailureReason; consecutive_failures: number; error?: string }
  | { type: "hard_reset"; step: number }
  | { type: "missing_field"; step: number; action: DecisionAction; field: string }
  | { type: "command_started"; step: number; command: string; reason: string }
  | { type: "command_output"; step: number; stream: OutputStream; line: string }
  | { type: "command_finished"; step: number; command: string; result: CommandResult; outcome: RunOutcome; interactive: boolean }
  | { type: "web_request"; step: number; action: "search" | "fetch"; target: string; available: boolean }
  | { type: "web_result"; step: number; action: "search" | "fetch"; result: WebResult }
  | { type: "question"; step: number; question: string }
  | { type: "answer"; step: number; answer: string }
  | { type: "completed"; step: number; summary: string }
  | { type: "terminated"; result: RunResult };

export type AgentEventSink = (event: AgentLoopEvent) => void;

/** 사람에게 질문하고 한 줄 답을 받는다. */
export type AskUser = (question: string) => Promise<string>;

export type CommandRunner = (
  command: string,
  on_line: (stream: OutputStream, line: string) => void,
) => Promise<CommandResult>;

/** 블로킹 호출 하나를 감싸는 진행 표시 범위. fn이 끝나면(실패 포함) 표시가 멈춘 상태여야 한다. */
export type ProgressScope = <T>(label: string, fn: () => Promise<T>) => Promise<T>;

export type DispatcherDeps = {
  run_command: CommandRunner;
  ask_user: AskUser;
  /** null이면 세션의 웹 기능이 꺼진 상태. */
  web: WebGateway | null;
  cwd?: string;
  stat_size?: StatSize;
  emit?: AgentEventSink;
  logger?: Logger;
};

export type AgentLoopOptions = DispatcherDeps & {
  provider: LlmProvider;
  model?: string;
  system_prompt: string;
  max_iterations?: number;
  max_parse_retries?: number;
  failure_threshold?: number;
  history_window?: number;
  progress?: ProgressScope;
};
