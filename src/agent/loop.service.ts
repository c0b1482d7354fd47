import type { LlmProvider } from "../providers/index.js";
import { create_logger, type Logger } from "../logger.js";
import { ConversationContext } from "./context.service.js";
import { ActionDispatcher } from "./dispatcher.js";
import type {
  AgentEventSink,
  AgentLoopOptions,
  ProgressScope,
  RunResult,
  RunState,
  RunStatus,
  TerminationReason,
} from "./loop.types.js";
import { build_resume_message, build_task_message } from "./prompts.js";
import { RetryPolicy, type GenerateFn } from "./retry-policy.js";

export const DEFAULT_MAX_ITERATIONS = 60;

const no_progress: ProgressScope = (_label, fn) => fn();

/**
 * 생성기 호출 → 파싱 → 디스패치를 종료 상태까지 반복한다.
 * 턴은 겹치지 않으며 피드백은 다음 생성기 호출 전에 항상 기록된다.
 */
export class AgentLoop {
  private readonly provider: LlmProvider;
  private readonly model: string | undefined;
  private readonly system_prompt: string;
  private readonly max_iterations: number;
  private readonly history_window: number | undefined;
  private readonly policy: RetryPolicy;
  private readonly dispatcher: ActionDispatcher;
  private readonly progress: ProgressScope;
  private readonly emit: AgentEventSink;
  private readonly logger: Logger;

  constructor(options: AgentLoopOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.system_prompt = options.system_prompt;
    this.max_iterations = Math.max(1, Math.floor(options.max_iterations ?? DEFAULT_MAX_ITERATIONS));
    this.history_window = options.history_window;
    this.policy = new RetryPolicy({
      max_parse_retries: options.max_parse_retries,
      failure_threshold: options.failure_threshold,
    });
    this.emit = options.emit ?? (() => {});
    this.logger = options.logger ?? create_logger("agent-loop");
    this.progress = options.progress ?? no_progress;
    this.dispatcher = new ActionDispatcher({ ...options, emit: this.emit, logger: this.logger.child("dispatcher") });
  }

  async run(goal: string): Promise<RunResult> {
    const context = new ConversationContext({ system_prompt: this.system_prompt, window: this.history_window });
    context.append_user(build_task_message(goal));
    const state: RunState = { step: 0, consecutive_failures: 0, done: false };

    while (state.step < this.max_iterations) {
      state.step += 1;
      const step = state.step;
      this.emit({ type: "step_started", step });

      const generate: GenerateFn = (messages, attempt) => this.progress(
        attempt === 0 ? `Thinking [step ${step}]` : `Retrying [step ${step}]`,
        () => this.provider.chat({ messages, model: this.model }),
      );
      const outcome = await this.policy.acquire(context, generate, {
        on_retry: (attempt, max) => this.emit({ type: "parse_retry", step, attempt, max }),
      });

      switch (outcome.kind) {
        case "inference_error": {
          this.logger.warn("inference_error", { step, error: outcome.error });
          const reached = this.policy.register_failure(state);
          this.emit({
            type: "turn_failed",
            step,
            reason: "inference_error",
            consecutive_failures: state.consecutive_failures,
            error: outcome.error,
          });
          if (reached) return this.finish(state, "failed", "failure_threshold", null);
          break;
        }
        case "exhausted": {
          this.logger.warn("parse_retries_exhausted", { step, attempts: outcome.attempts });
          const reached = this.policy.register_failure(state);
          this.emit({
            type: "turn_failed",
            step,
            reason: "parse_exhausted",
            consecutive_failures: state.consecutive_failures,
          });
          if (reached) return this.finish(state, "failed", "failure_threshold", null);
          context.hard_reset(build_resume_message(goal));
          this.emit({ type: "hard_reset", step });
          break;
        }
        case "missing_field":
          this.policy.register_success(state);
          this.dispatcher.handle_missing_field(outcome.action, outcome.field, outcome.raw, context, state);
          break;
        case "decision": {
          this.policy.register_success(state);
          const dispatched = await this.dispatcher.dispatch(outcome.decision, outcome.raw, context, state);
          if (dispatched.kind === "done") {
            state.done = true;
            return this.finish(state, "completed", "done", dispatched.summary);
          }
          break;
        }
      }
    }
    return this.finish(state, "max_iterations_reached", "max_iterations", null);
  }

  private finish(state: RunState, status: RunStatus, termination_reason: TerminationReason, summary: string | null): RunResult {
    const result: RunResult = { status, termination_reason, summary, state: { ...state } };
    this.logger.info("terminated", { status, step: state.step });
    this.emit({ type: "terminated", result });
    return result;
  }
}
