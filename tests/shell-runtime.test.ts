import assert from "node:assert/strict";
import test from "node:test";
import {
  format_duration,
  run_shell_command,
  tail_text,
  TailBuffer,
  type OutputStream,
} from "../src/agent/tools/shell-runtime.js";

test("command exiting 0 with small output", async () => {
  const result = await run_shell_command("echo hello", { timeout_ms: 10_000 });
  assert.equal(result.exit_code, 0);
  assert.equal(result.stdout, "hello");
  assert.equal(result.stderr, "");
  assert.equal(typeof result.pid, "number");
});

test("both streams are reported line by line and accumulated", async () => {
  const seen: Array<[OutputStream, string]> = [];
  const result = await run_shell_command("echo one; echo oops 1>&2; echo two", {
    timeout_ms: 10_000,
    on_line: (stream, line) => seen.push([stream, line]),
  });
  assert.equal(result.exit_code, 0);
  assert.equal(result.stdout, "one\ntwo");
  assert.equal(result.stderr, "oops");
  assert.deepEqual(seen.filter(([s]) => s === "stdout").map(([, l]) => l), ["one", "two"]);
  assert.deepEqual(seen.filter(([s]) => s === "stderr").map(([, l]) => l), ["oops"]);
});

test("non-zero exit codes are passed through", async () => {
  const result = await run_shell_command("echo failing 1>&2; exit 3", { timeout_ms: 10_000 });
  assert.equal(result.exit_code, 3);
  assert.equal(result.stderr, "failing");
});

test("timeout kills the process and marks the result", async () => {
  const result = await run_shell_command("sleep 5", { timeout_ms: 200 });
  assert.equal(result.exit_code, "timeout");
  assert.equal(result.stderr, "[timed out after 200ms]");
  assert.ok(result.duration_ms < 4_000);
  const pid = result.pid;
  assert.equal(typeof pid, "number");
  if (pid === undefined) return;
  assert.throws(() => process.kill(pid, 0));
});

test("a missing interpreter yields spawn_error", async () => {
  const result = await run_shell_command("echo hi", { timeout_ms: 5_000, shell: "/nonexistent/interpreter" });
  assert.equal(result.exit_code, "spawn_error");
  assert.match(result.stderr, /ENOENT/);
  assert.equal(result.stdout, "");
  assert.equal(result.pid, undefined);
});

test("heavy stderr output does not stall stdout", async () => {
  let stderr_lines = 0;
  const result = await run_shell_command("seq 1 30000 1>&2; echo finished", {
    timeout_ms: 20_000,
    on_line: (stream) => {
      if (stream === "stderr") stderr_lines += 1;
    },
  });
  assert.equal(result.exit_code, 0);
  assert.equal(result.stdout, "finished");
  assert.equal(stderr_lines, 30_000);
  assert.equal(result.stderr.length, 800);
  assert.ok(result.stderr.endsWith("29999\n30000"));
});

test("stdout is cut to the configured tail", async () => {
  const result = await run_shell_command("printf 'abcdefghij'", { timeout_ms: 10_000, stdout_tail_chars: 4 });
  assert.equal(result.stdout, "ghij");
});

test("endless output keeps only a bounded tail until the timeout", async () => {
  let lines = 0;
  const result = await run_shell_command("yes", {
    timeout_ms: 1_000,
    on_line: () => {
      lines += 1;
    },
  });
  assert.equal(result.exit_code, "timeout");
  assert.ok(lines > 2_000);
  assert.equal(result.stdout, `\n${Array.from({ length: 1_000 }, () => "y").join("\n")}`);
});

test("tail buffer never retains more than twice its limit", () => {
  const buffer = new TailBuffer(10);
  for (let i = 0; i < 50_000; i += 1) {
    buffer.push(`line-${i}`);
    assert.ok(buffer.retained_chars <= 20);
  }
  assert.equal(buffer.value(), "line-49999");

  const empty = new TailBuffer(0);
  empty.push("anything");
  assert.equal(empty.retained_chars, 0);
  assert.equal(empty.value(), "");
});

test("tail buffer matches the tail of the joined lines", () => {
  const buffer = new TailBuffer(5);
  for (const line of ["ab", "cd", "ef", "gh"]) buffer.push(line);
  assert.equal(buffer.value(), tail_text("ab\ncd\nef\ngh", 5));
  assert.equal(buffer.value(), "ef\ngh");
});

test("tail_text and format_duration", () => {
  assert.equal(tail_text("abcdef", 3), "def");
  assert.equal(tail_text("ab", 3), "ab");
  assert.equal(tail_text("ab", 0), "");
  assert.equal(format_duration(250), "250ms");
  assert.equal(format_duration(120_000), "120s");
});
