export { ConversationContext, DEFAULT_HISTORY_WINDOW } from "./context.service.js";
export { parse_decision, strip_code_fence, extract_balanced_object_from } from "./decision-parser.js";
export { DECISION_ACTIONS, DecisionSchema, is_decision_action } from "./decision.types.js";
export type {
  AskDecision,
  Decision,
  DecisionAction,
  DecisionParseResult,
  DoneDecision,
  FetchDecision,
  RunDecision,
  SearchDecision,
} from "./decision.types.js";
export { ActionDispatcher } from "./dispatcher.js";
export type { DispatchOutcome } from "./dispatcher.js";
export * from "./feedback.js";
export { AgentLoop, DEFAULT_MAX_ITERATIONS } from "./loop.service.js";
export type * from "./loop.types.js";
export * from "./prompts.js";
export { RetryPolicy, DEFAULT_FAILURE_THRESHOLD, DEFAULT_MAX_PARSE_RETRIES } from "./retry-policy.js";
export type { AcquireHooks, AcquireOutcome, GenerateFn } from "./retry-policy.js";
export { TaskLibrary } from "./task-store.js";
export type { SavedTask } from "./task-store.js";
export * from "./tools/index.js";
