import { spawn, type ChildProcessByStdio } from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

export type OutputStream = "stdout" | "stderr";

export type CommandExitCode = number | "timeout" | "spawn_error";

export type CommandResult = {
  stdout: string;
  stderr: string;
  exit_code: CommandExitCode;
  /** 프로세스가 생성된 경우에만. */
  pid?: number;
  duration_ms: number;
};

export type ShellRunOptions = {
  cwd?: string;
  timeout_ms: number;
  /** true면 플랫폼 기본 셸, 문자열이면 해당 셸 경로. */
  shell?: boolean | string;
  stdout_tail_chars?: number;
  stderr_tail_chars?: number;
  env?: NodeJS.ProcessEnv;
  on_line?: (stream: OutputStream, line: string) => void;
};

export const DEFAULT_STDOUT_TAIL_CHARS = 2_000;
export const DEFAULT_STDERR_TAIL_CHARS = 800;

/** 가장 최근 max_chars 글자만 남긴다. */
export function tail_text(text: string, max_chars: number): string {
  if (max_chars <= 0) return "";
  return text.length > max_chars ? text.slice(text.length - max_chars) : text;
}

/** 줄을 이어 붙이되 최근 max_chars 이상만 보관한다. 보관량은 max_chars의 두 배를 넘지 않는다. */
export class TailBuffer {
  private text = "";
  private started = false;

  constructor(private readonly max_chars: number) {}

  push(line: string): void {
    if (this.max_chars <= 0) return;
    this.text = this.started ? `${this.text}\n${line}` : line;
    this.started = true;
    if (this.text.length > this.max_chars * 2) this.text = tail_text(this.text, this.max_chars);
  }

  get retained_chars(): number {
    return this.text.length;
  }

  value(): string {
    return tail_text(this.text, this.max_chars);
  }
}

/** 스트림 하나를 끝까지 줄 단위로 읽는다. 스트림이 닫히면 resolve. */
function drain_lines(
  input: Readable,
  stream: OutputStream,
  sink: TailBuffer,
  on_line?: (stream: OutputStream, line: string) => void,
): Promise<void> {
  return new Promise((resolve) => {
    const reader = createInterface({ input, crlfDelay: Infinity });
    reader.on("line", (line) => {
      sink.push(line);
      on_line?.(stream, line);
    });
    reader.once("close", () => resolve());
    input.once("error", () => reader.close());
  });
}

export function format_duration(ms: number): string {
  return ms < 1_000 ? `${ms}ms` : `${Math.round(ms / 1_000)}s`;
}

function append_note(text: string, note: string): string {
  return text ? `${text}\n${note}` : note;
}

/** 셸이 띄운 하위 프로세스까지 정리하도록 프로세스 그룹 단위로 종료. */
function kill_process_tree(pid: number | undefined, kill_self: () => void): void {
  if (pid !== undefined && process.platform !== "win32") {
    try {
      process.kill(-pid, "SIGKILL");
      return;
    } catch {
      // group already gone; fall back to the direct child
    }
  }
  kill_self();
}

/**
 * 셸 명령 하나를 실행한다. stdout/stderr는 독립된 리더가 동시에 비우며 줄 단위로 on_line에 전달된다.
 * 항상 CommandResult로 resolve하고, 두 리더가 모두 끝나고 프로세스가 닫힌 뒤에만 반환한다.
 */
export function run_shell_command(command: string, options: ShellRunOptions): Promise<CommandResult> {
  const started_at = Date.now();
  const stdout_tail = options.stdout_tail_chars ?? DEFAULT_STDOUT_TAIL_CHARS;
  const stderr_tail = options.stderr_tail_chars ?? DEFAULT_STDERR_TAIL_CHARS;
  const timeout_ms = Math.max(1, options.timeout_ms);

  return new Promise((resolve) => {
    const spawn_failed = (error: unknown): void => {
      const message = error instanceof Error ? error.message : String(error);
      resolve({
        stdout: "",
        stderr: tail_text(message, stderr_tail),
        exit_code: "spawn_error",
        duration_ms: Date.now() - started_at,
      });
    };

    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawn(command, {
        cwd: options.cwd ?? process.cwd(),
        env: options.env ?? process.env,
        shell: options.shell ?? true,
        detached: process.platform !== "win32",
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      });
    } catch (error) {
      spawn_failed(error);
      return;
    }
    const proc = child;

    const out_tail = new TailBuffer(stdout_tail);
    const err_tail = new TailBuffer(stderr_tail);
    const readers = Promise.all([
      drain_lines(proc.stdout, "stdout", out_tail, options.on_line),
      drain_lines(proc.stderr, "stderr", err_tail, options.on_line),
    ]);

    let settled = false;
    let timed_out = false;
    const timer = setTimeout(() => {
      timed_out = true;
      kill_process_tree(proc.pid, () => proc.kill("SIGKILL"));
    }, timeout_ms);

    proc.on("error", (error) => {
      // pid가 없으면 생성 자체가 실패한 것. 그 외 오류는 close에서 정리된다.
      if (proc.pid !== undefined || settled) return;
      settled = true;
      clearTimeout(timer);
      proc.stdout.destroy();
      proc.stderr.destroy();
      spawn_failed(error);
    });

    proc.once("close", (code, signal) => {
      clearTimeout(timer);
      void readers.then(() => {
        if (settled) return;
        settled = true;
        let stderr = err_tail.value();
        if (timed_out) {
          stderr = append_note(stderr, `[timed out after ${format_duration(timeout_ms)}]`);
        } else if (signal) {
          stderr = append_note(stderr, `[terminated by ${signal}]`);
        }
        resolve({
          stdout: out_tail.value(),
          stderr,
          exit_code: timed_out ? "timeout" : (code ?? -1),
          pid: proc.pid,
          duration_ms: Date.now() - started_at,
        });
      });
    });
  });
}
