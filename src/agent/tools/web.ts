import { execFile, spawnSync } from "node:child_process";
import { promisify } from "node:util";

const exec_file_async = promisify(execFile);

export type WebResult =
  | { ok: true; text: string }
  | { ok: false; reason: string };

/** 검색/가져오기 협력자. 사용 불가는 정상 결과(ok:false)로 보고한다. */
export interface WebGateway {
  search(query: string): Promise<WebResult>;
  fetch(url: string): Promise<WebResult>;
}

/** 세션 시작 시 한 번 결정되는 웹 기능 가용성. 이후 재탐지하지 않는다. */
export type WebCapability = {
  available: boolean;
  binary: string | null;
  reason: string | null;
};

export type BrowserCliResult = {
  ok: boolean;
  stdout: string;
  stderr: string;
  reason?: string;
};

export type BrowserCliRunner = (bin: string, args: string[], timeout_ms: number) => Promise<BrowserCliResult>;

export function validate_url(url: string): string | null {
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return `invalid_protocol:${parsed.protocol}`;
    }
    const host = parsed.hostname.toLowerCase();
    if (
      host === "localhost" ||
      host === "127.0.0.1" ||
      host === "[::1]" ||
      host.endsWith(".local") ||
      /^10\.\d+\.\d+\.\d+$/.test(host) ||
      /^192\.168\.\d+\.\d+$/.test(host) ||
      /^169\.254\.\d+\.\d+$/.test(host) ||
      /^172\.(1[6-9]|2\d|3[0-1])\.\d+\.\d+$/.test(host)
    ) {
      return "blocked_private_host";
    }
    return null;
  } catch {
    return "invalid_url";
  }
}

const PROMPT_INJECTION_PATTERNS: RegExp[] = [
  /\bignore\s+(all\s+)?previous\s+instructions\b/i,
  /\bdisregard\s+(the\s+)?(system|developer)\s+prompt\b/i,
  /\byou\s+are\s+now\b/i,
  /\breveal\s+(your\s+)?(prompt|instructions)\b/i,
  /\bexecute\s+(this|the)\s+command\b/i,
  /\brun\s+this\s+(shell|bash|powershell)\b/i,
];

/** 웹 본문 중 지시문처럼 보이는 줄을 걷어내고 max_chars로 자른다. */
export function clip_untrusted_text(input: string, max_chars: number): { text: string; stripped_lines: number } {
  const kept: string[] = [];
  let stripped = 0;
  for (const line of String(input || "").split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed && PROMPT_INJECTION_PATTERNS.some((p) => p.test(trimmed))) {
      stripped += 1;
      continue;
    }
    kept.push(line);
  }
  const text = kept.join("\n").trim();
  return {
    text: text.length > max_chars ? `${text.slice(0, max_chars)}\n... (truncated)` : text,
    stripped_lines: stripped,
  };
}

export function parse_last_json_line(raw: string): Record<string, unknown> | null {
  const lines = String(raw || "")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
  for (let i = lines.length - 1; i >= 0; i -= 1) {
    const line = lines[i];
    if (!line.startsWith("{") || !line.endsWith("}")) continue;
    try {
      const parsed = JSON.parse(line) as unknown;
      if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) continue;
      return parsed as Record<string, unknown>;
    } catch {
      // keep searching previous lines
    }
  }
  return null;
}

function cli_data(result: BrowserCliResult): Record<string, unknown> {
  const data = parse_last_json_line(`${result.stdout}\n${result.stderr}`)?.data;
  if (!data || typeof data !== "object" || Array.isArray(data)) return {};
  return data as Record<string, unknown>;
}

export function extract_search_results(snapshot: string, count: number): Array<{ rank: number; title: string }> {
  const results: Array<{ rank: number; title: string }> = [];
  const seen = new Set<string>();
  for (const line of String(snapshot || "").split(/\r?\n/)) {
    if (results.length >= count) break;
    const title = line.trim().match(/\blink\s+"([^"]+)"/i)?.[1]?.trim();
    if (!title || seen.has(title)) continue;
    seen.add(title);
    results.push({ rank: results.length + 1, title });
  }
  return results;
}

function detect_agent_browser_binary(): string | null {
  const bin = process.platform === "win32" ? "agent-browser.cmd" : "agent-browser";
  const checker = process.platform === "win32" ? "where" : "which";
  const checked = spawnSync(checker, [bin], {
    stdio: "ignore",
    windowsHide: true,
    shell: false,
  });
  return checked.status === 0 ? bin : null;
}

/** 설정과 바이너리 존재 여부로 세션당 한 번 가용성을 정한다. */
export function negotiate_web_capability(options: {
  enabled: boolean;
  detect?: () => string | null;
}): WebCapability {
  if (!options.enabled) return { available: false, binary: null, reason: "disabled_by_config" };
  const binary = (options.detect ?? detect_agent_browser_binary)();
  if (!binary) return { available: false, binary: null, reason: "agent_browser_not_installed" };
  return { available: true, binary, reason: null };
}

function quote_cmd_arg(arg: string): string {
  return `"${String(arg).replace(/"/g, "\"\"").replace(/%/g, "%%")}"`;
}

export const run_agent_browser_cli: BrowserCliRunner = async (bin, args, timeout_ms) => {
  try {
    const command = process.platform === "win32" ? "cmd.exe" : bin;
    const command_args = process.platform === "win32"
      ? ["/d", "/s", "/c", [bin, ...args.map(quote_cmd_arg)].join(" ")]
      : args;
    const result = await exec_file_async(command, command_args, {
      timeout: timeout_ms,
      maxBuffer: 1024 * 1024 * 16,
      windowsHide: true,
    });
    return { ok: true, stdout: String(result.stdout || ""), stderr: String(result.stderr || "") };
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    const missing = /enoent|not recognized as an internal or external command/i.test(detail);
    return {
      ok: false,
      stdout: "",
      stderr: detail,
      reason: missing ? "agent_browser_not_installed" : "agent_browser_exec_failed",
    };
  }
};

export type AgentBrowserGatewayOptions = {
  binary: string;
  timeout_ms: number;
  max_chars: number;
  session?: string;
  result_count?: number;
  runner?: BrowserCliRunner;
};

/** agent-browser CLI 기반 검색/페이지 텍스트 추출. */
export class AgentBrowserGateway implements WebGateway {
  private readonly binary: string;
  private readonly timeout_ms: number;
  private readonly max_chars: number;
  private readonly session: string;
  private readonly result_count: number;
  private readonly runner: BrowserCliRunner;

  constructor(options: AgentBrowserGatewayOptions) {
    this.binary = options.binary;
    this.timeout_ms = options.timeout_ms;
    this.max_chars = options.max_chars;
    this.session = options.session || "shell-agent";
    this.result_count = Math.max(1, Math.min(20, options.result_count ?? 5));
    this.runner = options.runner ?? run_agent_browser_cli;
  }

  async search(query: string): Promise<WebResult> {
    const q = String(query || "").trim();
    if (!q) return { ok: false, reason: "query_required" };
    const search_url = new URL("https://duckduckgo.com/");
    search_url.searchParams.set("q", q);
    search_url.searchParams.set("ia", "web");

    const opened = await this.open(search_url.toString());
    if (!opened.ok) return opened;
    const snapshot = await this.cli(["snapshot", "-i", "-c", "-d", "6", "--json"]);
    if (!snapshot.ok) return { ok: false, reason: snapshot.reason || "agent_browser_snapshot_failed" };

    const content = clip_untrusted_text(String(cli_data(snapshot).snapshot || ""), this.max_chars);
    const results = extract_search_results(content.text, this.result_count);
    if (results.length === 0) return { ok: true, text: content.text || "(no results)" };
    return { ok: true, text: results.map((r) => `${r.rank}. ${r.title}`).join("\n") };
  }

  async fetch(url: string): Promise<WebResult> {
    const target = String(url || "").trim();
    const invalid = validate_url(target);
    if (invalid) return { ok: false, reason: invalid };

    const opened = await this.open(target);
    if (!opened.ok) return opened;

    let extracted = "";
    const body = await this.cli(["get", "text", "body", "--json"]);
    if (body.ok) {
      const data = cli_data(body);
      extracted = String(data.text || data.value || "").trim();
    }
    if (!extracted) {
      const snapshot = await this.cli(["snapshot", "-c", "-d", "8", "--json"]);
      if (!snapshot.ok) return { ok: false, reason: snapshot.reason || "agent_browser_snapshot_failed" };
      extracted = String(cli_data(snapshot).snapshot || "").trim();
    }
    const content = clip_untrusted_text(extracted, this.max_chars);
    return { ok: true, text: content.text || "(empty page)" };
  }

  private async open(url: string): Promise<WebResult> {
    const opened = await this.cli(["open", url, "--json"]);
    if (!opened.ok) return { ok: false, reason: opened.reason || "agent_browser_open_failed" };
    await this.cli(["wait", "--load", "domcontentloaded", "--json"]);
    return { ok: true, text: "" };
  }

  private cli(args: string[]): Promise<BrowserCliResult> {
    return this.runner(this.binary, ["--session", this.session, ...args], this.timeout_ms);
  }
}
