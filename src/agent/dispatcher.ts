import { create_logger, type Logger } from "../logger.js";
import type { ConversationContext } from "./context.service.js";
import type { Decision, DecisionAction, FetchDecision, RunDecision, SearchDecision } from "./decision.types.js";
import {
  build_ask_feedback,
  build_missing_field_feedback,
  build_run_feedback,
  build_web_feedback,
  type StatSize,
} from "./feedback.js";
import type { AgentEventSink, AskUser, CommandRunner, DispatcherDeps, RunState } from "./loop.types.js";
import type { WebGateway } from "./tools/web.js";

export type DispatchOutcome =
  | { kind: "continue" }
  | { kind: "done"; summary: string };

/** 검증된 결정 하나를 실행하고, 종료가 아니면 원문과 피드백을 context에 기록한다. */
export class ActionDispatcher {
  private readonly run_command: CommandRunner;
  private readonly ask_user: AskUser;
  private readonly web: WebGateway | null;
  private readonly cwd: string | undefined;
  private readonly stat_size: StatSize | undefined;
  private readonly emit: AgentEventSink;
  private readonly logger: Logger;

  constructor(deps: DispatcherDeps) {
    this.run_command = deps.run_command;
    this.ask_user = deps.ask_user;
    this.web = deps.web;
    this.cwd = deps.cwd;
    this.stat_size = deps.stat_size;
    this.emit = deps.emit ?? (() => {});
    this.logger = deps.logger ?? create_logger("dispatcher");
  }

  async dispatch(decision: Decision, raw: string, context: ConversationContext, state: RunState): Promise<DispatchOutcome> {
    switch (decision.action) {
      case "run":
        await this.handle_run(decision, raw, context, state);
        return { kind: "continue" };
      case "done":
        this.emit({ type: "completed", step: state.step, summary: decision.summary });
        return { kind: "done", summary: decision.summary };
      case "ask": {
        this.emit({ type: "question", step: state.step, question: decision.question });
        const answer = (await this.ask_user(decision.question)).trim();
        this.emit({ type: "answer", step: state.step, answer });
        context.append_exchange(raw, build_ask_feedback(answer));
        return { kind: "continue" };
      }
      case "search":
      case "fetch":
        await this.handle_web(decision, raw, context, state);
        return { kind: "continue" };
    }
  }

  /** 필수 필드가 빈 결정. 교정 피드백 한 번으로 처리하고 실패 턴으로 세지 않는다. */
  handle_missing_field(action: DecisionAction, field: string, raw: string, context: ConversationContext, state: RunState): void {
    this.logger.debug("missing_field", { step: state.step, action, field });
    this.emit({ type: "missing_field", step: state.step, action, field });
    context.append_exchange(raw, build_missing_field_feedback(action, field));
  }

  private async handle_run(decision: RunDecision, raw: string, context: ConversationContext, state: RunState): Promise<void> {
    const { step } = state;
    this.emit({ type: "command_started", step, command: decision.command, reason: decision.reason });
    const result = await this.run_command(decision.command, (stream, line) => {
      this.emit({ type: "command_output", step, stream, line });
    });
    const feedback = build_run_feedback(decision.command, result, { cwd: this.cwd, stat_size: this.stat_size });
    this.logger.debug("command_finished", { step, exit_code: result.exit_code, outcome: feedback.outcome });
    this.emit({
      type: "command_finished",
      step,
      command: decision.command,
      result,
      outcome: feedback.outcome,
      interactive: feedback.interactive,
    });
    context.append_exchange(raw, feedback.text);
  }

  private async handle_web(
    decision: SearchDecision | FetchDecision,
    raw: string,
    context: ConversationContext,
    state: RunState,
  ): Promise<void> {
    const target = decision.action === "search" ? decision.query : decision.url;
    this.emit({ type: "web_request", step: state.step, action: decision.action, target, available: this.web !== null });
    if (!this.web) {
      context.append_exchange(raw, build_web_feedback(decision.action, target, null));
      return;
    }
    const result = decision.action === "search"
      ? await this.web.search(target)
      : await this.web.fetch(target);
    if (!result.ok) this.logger.warn("web_failed", { action: decision.action, reason: result.reason });
    this.emit({ type: "web_result", step: state.step, action: decision.action, result });
    context.append_exchange(raw, build_web_feedback(decision.action, target, result));
  }
}
