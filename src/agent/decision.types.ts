import { z } from "zod";

export const DECISION_ACTIONS = ["run", "done", "ask", "search", "fetch"] as const;

export type DecisionAction = (typeof DECISION_ACTIONS)[number];

/** 생성기와의 와이어 계약. 선택 필드는 잘못된 타입이어도 기본값으로 흡수한다. */
export const DecisionSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("run"),
    command: z.string().trim().catch(""),
    reason: z.string().catch(""),
  }),
  z.object({
    action: z.literal("done"),
    summary: z.string().catch(""),
  }),
  z.object({
    action: z.literal("ask"),
    question: z.string().trim().min(1).catch("?"),
  }),
  z.object({
    action: z.literal("search"),
    query: z.string().trim().catch(""),
    reason: z.string().catch(""),
  }),
  z.object({
    action: z.literal("fetch"),
    url: z.string().trim().catch(""),
    reason: z.string().catch(""),
  }),
]);

export type Decision = z.infer<typeof DecisionSchema>;

export type RunDecision = Extract<Decision, { action: "run" }>;
export type DoneDecision = Extract<Decision, { action: "done" }>;
export type AskDecision = Extract<Decision, { action: "ask" }>;
export type SearchDecision = Extract<Decision, { action: "search" }>;
export type FetchDecision = Extract<Decision, { action: "fetch" }>;

export type DecisionParseResult =
  | { kind: "decision"; decision: Decision }
  | { kind: "missing_field"; action: DecisionAction; field: string }
  | { kind: "none" };

export function is_decision_action(value: unknown): value is DecisionAction {
  return typeof value === "string" && (DECISION_ACTIONS as readonly string[]).includes(value);
}
