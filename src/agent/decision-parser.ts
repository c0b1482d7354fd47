import {
  DecisionSchema,
  is_decision_action,
  type Decision,
  type DecisionParseResult,
} from "./decision.types.js";

function as_record(raw: unknown): Record<string, unknown> | null {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) return null;
  return raw as Record<string, unknown>;
}

function normalize_action(raw: unknown): unknown {
  return typeof raw === "string" ? raw.trim().toLowerCase() : raw;
}

/** 판별 필드(action)가 알려진 값인 객체만 후보로 인정. */
function as_candidate(raw: unknown): Record<string, unknown> | null {
  const rec = as_record(raw);
  if (!rec) return null;
  const action = normalize_action(rec.action);
  if (!is_decision_action(action)) return null;
  return { ...rec, action };
}

function try_parse_candidate(text: string): Record<string, unknown> | null {
  try {
    return as_candidate(JSON.parse(text) as unknown);
  } catch {
    return null;
  }
}

/** 앞뒤 ``` / ```json 펜스를 벗긴다. */
export function strip_code_fence(raw: string): string {
  return String(raw || "")
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "")
    .trim();
}

/** start_index의 `{`에서 시작해 깊이가 0으로 돌아오는 지점까지. 문자열 리터럴 안의 중괄호는 무시. */
export function extract_balanced_object_from(text: string, start_index: number): string | null {
  if (text[start_index] !== "{") return null;
  let depth = 0;
  let in_string = false;
  let escaping = false;
  for (let i = start_index; i < text.length; i += 1) {
    const ch = text[i];
    if (in_string) {
      if (escaping) {
        escaping = false;
      } else if (ch === "\\") {
        escaping = true;
      } else if (ch === "\"") {
        in_string = false;
      }
      continue;
    }
    if (ch === "\"") {
      in_string = true;
      continue;
    }
    if (ch === "{") {
      depth += 1;
      continue;
    }
    if (ch === "}") {
      depth -= 1;
      if (depth === 0) return text.slice(start_index, i + 1);
    }
  }
  return null;
}

/** 모든 `{` 위치에서 균형 잡힌 객체를 시도하고, 조건을 만족하는 마지막 것을 고른다. */
function find_last_candidate(text: string): Record<string, unknown> | null {
  let best: Record<string, unknown> | null = null;
  for (let start = text.indexOf("{"); start >= 0; start = text.indexOf("{", start + 1)) {
    const slice = extract_balanced_object_from(text, start);
    if (!slice) continue;
    const candidate = try_parse_candidate(slice);
    if (candidate) best = candidate;
  }
  return best;
}

function validate_candidate(candidate: Record<string, unknown>): DecisionParseResult {
  const parsed = DecisionSchema.safeParse(candidate);
  if (!parsed.success) return { kind: "none" };
  const decision: Decision = parsed.data;
  const field = missing_required_field(decision);
  if (field) return { kind: "missing_field", action: decision.action, field };
  return { kind: "decision", decision };
}

function missing_required_field(decision: Decision): string | null {
  switch (decision.action) {
    case "run": return decision.command ? null : "command";
    case "search": return decision.query ? null : "query";
    case "fetch": return decision.url ? null : "url";
    case "done":
    case "ask":
      return null;
  }
}

/**
 * 생성기 원문에서 결정 객체 하나를 복구한다. 예외를 던지지 않는다.
 * 전체 파싱이 실패하면 중괄호 매칭으로 후보를 찾는다. 뒤에 나온 후보가 앞의 것을 덮어쓴다.
 */
export function parse_decision(raw: string | null | undefined): DecisionParseResult {
  const text = strip_code_fence(String(raw || ""));
  if (!text) return { kind: "none" };
  const whole = try_parse_candidate(text);
  if (whole) return validate_candidate(whole);
  const last = find_last_candidate(text);
  if (!last) return { kind: "none" };
  return validate_candidate(last);
}
