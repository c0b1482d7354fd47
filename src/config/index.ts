import type { AppConfig } from "./schema.js";

export { AppConfigSchema, load_config_from_env } from "./schema.js";
export type { AppConfig, AppConfigOverrides } from "./schema.js";

export interface RuntimeConfig {
  dataDir: string;
  provider: {
    api_base: string;
    /** 빈 문자열이면 설치된 모델 중 자동 선택. */
    default_model: string;
    temperature: number;
    num_predict: number;
    request_timeout_ms: number;
    probe_timeout_ms: number;
  };
  loop: {
    max_iterations: number;
    max_parse_retries: number;
    failure_threshold: number;
    history_window: number;
  };
  shell: {
    timeout_ms: number;
    shell: true | string;
    stdout_tail_chars: number;
    stderr_tail_chars: number;
  };
  web: {
    enabled: boolean;
    timeout_ms: number;
    max_chars: number;
  };
}

/** AppConfig(Zod)에서 컴포넌트 옵션 형태의 RuntimeConfig를 파생. */
export function loadConfig(app_config: AppConfig): RuntimeConfig {
  const c = app_config;
  return {
    dataDir: c.dataDir,
    provider: {
      api_base: c.ollama.apiBase,
      default_model: c.ollama.model,
      temperature: c.ollama.temperature,
      num_predict: c.ollama.numPredict,
      request_timeout_ms: c.ollama.requestTimeoutMs,
      probe_timeout_ms: c.ollama.probeTimeoutMs,
    },
    loop: {
      max_iterations: c.agent.maxIterations,
      max_parse_retries: c.agent.maxParseRetries,
      failure_threshold: c.agent.failureThreshold,
      history_window: c.agent.historyWindow,
    },
    shell: {
      timeout_ms: c.shell.timeoutMs,
      shell: c.shell.shell || true,
      stdout_tail_chars: c.shell.stdoutTailChars,
      stderr_tail_chars: c.shell.stderrTailChars,
    },
    web: {
      enabled: c.web.enabled,
      timeout_ms: c.web.timeoutMs,
      max_chars: c.web.maxChars,
    },
  };
}
