import assert from "node:assert/strict";
import test from "node:test";
import { ConversationContext } from "../src/agent/context.service.js";

test("view always starts with the system message and is bounded by 1 + window", () => {
  const ctx = new ConversationContext({ system_prompt: "sys", window: 4 });
  for (let i = 0; i < 10; i += 1) {
    ctx.append_user(`u${i}`);
    const view = ctx.view();
    assert.equal(view[0].role, "system");
    assert.equal(view[0].content, "sys");
    assert.ok(view.length <= 5);
  }
  assert.deepEqual(ctx.view().slice(1).map((m) => m.content), ["u6", "u7", "u8", "u9"]);
  assert.equal(ctx.messages().length, 11);
});

test("default window keeps the last 16 non-system messages in order", () => {
  const ctx = new ConversationContext({ system_prompt: "sys" });
  for (let i = 0; i < 20; i += 1) ctx.append_exchange(`a${i}`, `f${i}`);
  const view = ctx.view();
  assert.equal(view.length, 17);
  assert.deepEqual(view[1], { role: "assistant", content: "a12" });
  assert.deepEqual(view[16], { role: "user", content: "f19" });
});

test("appending never alters earlier messages and the full history is kept", () => {
  const ctx = new ConversationContext({ system_prompt: "sys", window: 2 });
  ctx.append_user("task");
  ctx.append_exchange("{\"action\":\"run\"}", "feedback");
  const all = ctx.messages();
  assert.deepEqual(all.map((m) => m.role), ["system", "user", "assistant", "user"]);
  all[1].content = "mutated";
  assert.equal(ctx.messages()[1].content, "task");
});

test("system messages cannot be appended", () => {
  const ctx = new ConversationContext({ system_prompt: "sys" });
  assert.throws(() => ctx.append({ role: "system", content: "second" }), /system_message_not_appendable/);
});

test("hard_reset leaves exactly the system message and the anchor", () => {
  const ctx = new ConversationContext({ system_prompt: "sys" });
  ctx.append_user("task");
  ctx.append_exchange("bad", "retry");
  ctx.hard_reset("Task (resume): x");
  assert.deepEqual(ctx.messages(), [
    { role: "system", content: "sys" },
    { role: "user", content: "Task (resume): x" },
  ]);
});
