export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
  child(name: string): Logger;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function is_log_level(v: string): v is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, v);
}

export function parse_log_level(raw: string | undefined, fallback: LogLevel = "warn"): LogLevel {
  const v = String(raw || "").trim().toLowerCase();
  return is_log_level(v) ? v : fallback;
}

export function format_ctx(ctx: LogContext | undefined): string {
  if (!ctx) return "";
  const parts: string[] = [];
  for (const [k, v] of Object.entries(ctx)) {
    if (v === undefined) continue;
    parts.push(`${k}=${typeof v === "string" ? v : JSON.stringify(v)}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

/** stdout은 명령 출력 전용. 진단 로그는 모두 stderr로 보낸다. */
class StderrLogger implements Logger {
  private readonly prefix: string;

  constructor(private readonly name: string, private readonly level: LogLevel) {
    this.prefix = `[${name}]`;
  }

  debug(msg: string, ctx?: LogContext): void { this.log("debug", msg, ctx); }
  info(msg: string, ctx?: LogContext): void { this.log("info", msg, ctx); }
  warn(msg: string, ctx?: LogContext): void { this.log("warn", msg, ctx); }
  error(msg: string, ctx?: LogContext): void { this.log("error", msg, ctx); }

  child(name: string): Logger {
    return new StderrLogger(`${this.name}:${name}`, this.level);
  }

  private log(level: Exclude<LogLevel, "silent">, msg: string, ctx?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    process.stderr.write(`${this.prefix} ${level} ${msg}${format_ctx(ctx)}\n`);
  }
}

let _log_level: LogLevel = parse_log_level(process.env.LOG_LEVEL);

/** CLI --verbose 등에서 런타임 레벨 변경. 이후 생성되는 로거에만 적용. */
export function set_log_level(level: LogLevel): void {
  _log_level = level;
}

export function create_logger(name: string): Logger {
  return new StderrLogger(name, _log_level);
}
