import type { WebCapability } from "../agent/tools/web.js";

export type CheckRow = {
  label: string;
  ok: boolean;
  detail: string;
};

export type ModelSource = {
  is_running(): Promise<boolean>;
  list_models(): Promise<string[]>;
};

export type SystemCheckDeps = {
  api_base: string;
  models: ModelSource;
  web: WebCapability;
  read_instructions: () => string;
  node_version?: string;
};

const MIN_NODE: [number, number] = [20, 3];

export function node_version_ok(version: string): boolean {
  const m = /^v?(\d+)\.(\d+)/.exec(version.trim());
  if (!m) return false;
  const major = Number(m[1]);
  const minor = Number(m[2]);
  return major > MIN_NODE[0] || (major === MIN_NODE[0] && minor >= MIN_NODE[1]);
}

/** 실행 전 점검 항목. 서비스가 내려가 있어도 예외 없이 행으로 보고한다. */
export async function run_system_check(deps: SystemCheckDeps): Promise<CheckRow[]> {
  const node_version = deps.node_version ?? process.version;
  const rows: CheckRow[] = [{
    label: "Node.js",
    ok: node_version_ok(node_version),
    detail: node_version_ok(node_version) ? node_version : `${node_version} (need >= ${MIN_NODE.join(".")})`,
  }];

  const running = await deps.models.is_running();
  rows.push({
    label: "Ollama service",
    ok: running,
    detail: running ? `reachable at ${deps.api_base}` : `not reachable at ${deps.api_base}. Start it with: ollama serve`,
  });

  const models = running ? await deps.models.list_models() : [];
  rows.push({
    label: "Models",
    ok: models.length > 0,
    detail: models.length > 0
      ? `${models.length} installed: ${models.slice(0, 5).join(", ")}${models.length > 5 ? ", ..." : ""}`
      : "none installed. Install one with: ollama pull llama3",
  });

  rows.push({
    label: "Web search/fetch",
    ok: deps.web.available,
    detail: deps.web.available ? `via ${deps.web.binary ?? "agent-browser"}` : `off (${deps.web.reason ?? "unknown"})`,
  });

  const instructions = deps.read_instructions();
  rows.push({
    label: "Custom instructions",
    ok: true,
    detail: instructions ? `set (${instructions.length} chars)` : "not set",
  });
  return rows;
}

export function format_check_rows(rows: CheckRow[]): string[] {
  const width = Math.max(...rows.map((r) => r.label.length));
  return rows.map((r) => `  ${r.ok ? "ok  " : "FAIL"}  ${r.label.padEnd(width)}  ${r.detail}`);
}
