import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

type EnvSource = NodeJS.ProcessEnv;

function env_bool(env: EnvSource, key: string, fallback: boolean): boolean {
  const v = String(env[key] || "").trim().toLowerCase();
  if (!v) return fallback;
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return fallback;
}

function env_str(env: EnvSource, key: string, fallback: string): string {
  return String(env[key] || "").trim() || fallback;
}

function env_num(env: EnvSource, key: string, fallback: number): number {
  const text = String(env[key] || "").trim();
  if (!text) return fallback;
  const raw = Number(text);
  return Number.isFinite(raw) ? raw : fallback;
}

const OllamaSchema = z.object({
  apiBase: z.string().url(),
  /** 빈 문자열이면 설치된 모델 중 자동 선택. */
  model: z.string(),
  temperature: z.number().min(0).max(2),
  numPredict: z.number().int().min(1),
  requestTimeoutMs: z.number().int().min(1_000),
  probeTimeoutMs: z.number().int().min(500),
});

const AgentSchema = z.object({
  maxIterations: z.number().int().min(1),
  maxParseRetries: z.number().int().min(0),
  historyWindow: z.number().int().min(1),
  failureThreshold: z.number().int().min(1),
});

const ShellSchema = z.object({
  timeoutMs: z.number().int().min(100),
  stdoutTailChars: z.number().int().min(100),
  stderrTailChars: z.number().int().min(100),
  /** 빈 문자열이면 플랫폼 기본 셸. */
  shell: z.string(),
});

const WebSchema = z.object({
  enabled: z.boolean(),
  timeoutMs: z.number().int().min(1_000),
  maxChars: z.number().int().min(200),
});

export const AppConfigSchema = z.object({
  dataDir: z.string().min(1),
  ollama: OllamaSchema,
  agent: AgentSchema,
  shell: ShellSchema,
  web: WebSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/** CLI 플래그 등 환경변수 위에 덮어쓸 값. */
export type AppConfigOverrides = {
  model?: string;
  maxIterations?: number;
  web?: boolean;
};

export function load_config_from_env(overrides?: AppConfigOverrides, env: EnvSource = process.env): AppConfig {
  const raw = {
    dataDir: env_str(env, "SHELL_AGENT_DATA_DIR", join(homedir(), ".shell-agent")),
    ollama: {
      apiBase: env_str(env, "OLLAMA_BASE", "http://localhost:11434").replace(/\/+$/, ""),
      model: overrides?.model?.trim() || env_str(env, "SHELL_AGENT_MODEL", ""),
      temperature: env_num(env, "SHELL_AGENT_TEMPERATURE", 0.05),
      numPredict: env_num(env, "SHELL_AGENT_NUM_PREDICT", 400),
      requestTimeoutMs: env_num(env, "SHELL_AGENT_REQUEST_TIMEOUT_MS", 180_000),
      probeTimeoutMs: env_num(env, "SHELL_AGENT_PROBE_TIMEOUT_MS", 20_000),
    },
    agent: {
      maxIterations: overrides?.maxIterations ?? env_num(env, "SHELL_AGENT_MAX_ITERATIONS", 60),
      maxParseRetries: env_num(env, "SHELL_AGENT_MAX_PARSE_RETRIES", 5),
      historyWindow: env_num(env, "SHELL_AGENT_HISTORY_WINDOW", 16),
      failureThreshold: env_num(env, "SHELL_AGENT_FAILURE_THRESHOLD", 3),
    },
    shell: {
      timeoutMs: env_num(env, "SHELL_AGENT_COMMAND_TIMEOUT_MS", 120_000),
      stdoutTailChars: env_num(env, "SHELL_AGENT_STDOUT_TAIL", 2_000),
      stderrTailChars: env_num(env, "SHELL_AGENT_STDERR_TAIL", 800),
      shell: env_str(env, "SHELL_AGENT_SHELL", ""),
    },
    web: {
      enabled: overrides?.web ?? env_bool(env, "SHELL_AGENT_WEB_ENABLED", true),
      timeoutMs: env_num(env, "SHELL_AGENT_WEB_TIMEOUT_MS", 60_000),
      maxChars: env_num(env, "SHELL_AGENT_WEB_MAX_CHARS", 4_000),
    },
  };

  return AppConfigSchema.parse(raw);
}
