export {
  DEFAULT_STDERR_TAIL_CHARS,
  DEFAULT_STDOUT_TAIL_CHARS,
  format_duration,
  TailBuffer,
  run_shell_command,
  tail_text,
} from "./shell-runtime.js";
export type { CommandExitCode, CommandResult, OutputStream, ShellRunOptions } from "./shell-runtime.js";
export {
  AgentBrowserGateway,
  clip_untrusted_text,
  extract_search_results,
  negotiate_web_capability,
  parse_last_json_line,
  run_agent_browser_cli,
  validate_url,
} from "./web.js";
export type {
  AgentBrowserGatewayOptions,
  BrowserCliResult,
  BrowserCliRunner,
  WebCapability,
  WebGateway,
  WebResult,
} from "./web.js";
