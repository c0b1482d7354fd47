import assert from "node:assert/strict";
import test from "node:test";
import { format_check_rows, node_version_ok, run_system_check } from "../src/ops/system-check.js";

test("node version gate", () => {
  assert.equal(node_version_ok("v20.3.0"), true);
  assert.equal(node_version_ok("v20.2.9"), false);
  assert.equal(node_version_ok("v22.1.0"), true);
  assert.equal(node_version_ok("garbage"), false);
});

test("a stopped service is reported as rows, not thrown", async () => {
  let listed = false;
  const rows = await run_system_check({
    api_base: "http://localhost:11434",
    models: {
      is_running: async () => false,
      list_models: async () => {
        listed = true;
        return [];
      },
    },
    web: { available: false, binary: null, reason: "disabled_by_config" },
    read_instructions: () => "",
    node_version: "v20.11.1",
  });
  assert.equal(listed, false);
  assert.deepEqual(rows.map((r) => [r.label, r.ok]), [
    ["Node.js", true],
    ["Ollama service", false],
    ["Models", false],
    ["Web search/fetch", false],
    ["Custom instructions", true],
  ]);
  assert.equal(rows[3].detail, "off (disabled_by_config)");
});

test("rows are aligned by label", async () => {
  const rows = await run_system_check({
    api_base: "http://localhost:11434",
    models: { is_running: async () => true, list_models: async () => ["llama3:8b"] },
    web: { available: true, binary: "agent-browser", reason: null },
    read_instructions: () => "be brief",
    node_version: "v20.11.1",
  });
  assert.deepEqual(format_check_rows(rows), [
    "  ok    Node.js              v20.11.1",
    "  ok    Ollama service       reachable at http://localhost:11434",
    "  ok    Models               1 installed: llama3:8b",
    "  ok    Web search/fetch     via agent-browser",
    "  ok    Custom instructions  set (8 chars)",
  ]);
});
