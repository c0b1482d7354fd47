export function now_iso(): string {
  return new Date().toISOString();
}

export function error_message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** 공백 정규화 + trim. */
export function normalize_text(value: unknown): string {
  return String(value || "").replace(/\s+/g, " ").trim();
}

/** CLI 정수 인자. 양의 정수가 아니면 null. */
export function parse_positive_int(raw: string | undefined): number | null {
  const text = String(raw || "").trim();
  if (!/^\d+$/.test(text)) return null;
  const n = Number(text);
  return Number.isSafeInteger(n) && n > 0 ? n : null;
}
