import assert from "node:assert/strict";
import test from "node:test";
import { create_progress_scope, ProgressIndicator, type ProgressOutput } from "../src/channels/progress-indicator.js";

function fake_output(isTTY: boolean) {
  const writes: string[] = [];
  const out: ProgressOutput = { isTTY, write: (chunk) => writes.push(chunk) };
  return { out, writes };
}

test("indicator draws a frame on start and clears the line on stop", () => {
  const { out, writes } = fake_output(true);
  const indicator = new ProgressIndicator(out, 60_000);
  indicator.start("Thinking [step 1]");
  assert.equal(indicator.running, true);
  indicator.start("ignored while running");
  indicator.stop();
  indicator.stop();
  assert.equal(indicator.running, false);
  assert.deepEqual(writes, ["\r  ⠋ Thinking [step 1]", "\r\x1b[K"]);
});

test("indicator stays silent when output is not a terminal", () => {
  const { out, writes } = fake_output(false);
  const indicator = new ProgressIndicator(out, 60_000);
  indicator.start("Connecting");
  indicator.stop();
  assert.equal(indicator.running, false);
  assert.deepEqual(writes, []);
});

test("scope stops the indicator when the wrapped call fails", async () => {
  const { out, writes } = fake_output(true);
  const indicator = new ProgressIndicator(out, 60_000);
  const scope = create_progress_scope(indicator);
  await assert.rejects(scope("Thinking", async () => {
    throw new Error("boom");
  }), /boom/);
  assert.equal(indicator.running, false);
  assert.equal(writes.at(-1), "\r\x1b[K");
  assert.equal(await scope("Thinking", async () => 42), 42);
  assert.equal(indicator.running, false);
});
