/**
 * Tests for the agent adapter's per-session history.
 *
 * Run: npx tsx --test server/agent-adapter.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { createAnthropicAgent } from "./agent-adapter.js";

import type { ChatTurn, ReplyModel } from "./agent-adapter.js";

// ============================================================================
// HELPERS
// ============================================================================

/** ReplyModel that records a copy of every conversation it is sent */
function recordingModel(replies: string[]): { model: ReplyModel; calls: ChatTurn[][] } {
  const calls: ChatTurn[][] = [];
  let next = 0;

  const model: ReplyModel = async (turns) => {
    calls.push(turns.map((turn) => ({ ...turn })));
    return replies[next++] ?? "";
  };
  return { model, calls };
}

function createAgent(model: ReplyModel) {
  return createAnthropicAgent({ apiKey: "test-secret", model: "test-model", replyModel: model });
}

// ============================================================================
// TESTS
// ============================================================================

test("follow-up questions carry the earlier exchange", async () => {
  const { model, calls } = recordingModel(["  Gold is up one percent.  ", "Silver is flat."]);
  const agent = createAgent(model);

  assert.equal(await agent.respond({ text: "How is gold?", userId: "u1", sessionId: "s1" }), "Gold is up one percent.");
  await agent.respond({ text: "And silver?", userId: "u1", sessionId: "s1" });

  assert.deepEqual(calls[1], [
    { role: "user", content: "How is gold?" },
    { role: "assistant", content: "Gold is up one percent." },
    { role: "user", content: "And silver?" },
  ]);
});

test("sessions keep separate histories", async () => {
  const { model, calls } = recordingModel(["One.", "Two."]);
  const agent = createAgent(model);

  await agent.respond({ text: "first", userId: "u1", sessionId: "s1" });
  await agent.respond({ text: "second", userId: "u2", sessionId: "s2" });

  assert.deepEqual(calls[1], [{ role: "user", content: "second" }]);
});

test("an empty reply is not recorded in history", async () => {
  const { model, calls } = recordingModel(["", "Here is the answer."]);
  const agent = createAgent(model);

  assert.equal(await agent.respond({ text: "first try", userId: "u1", sessionId: "s1" }), "");
  await agent.respond({ text: "second try", userId: "u1", sessionId: "s1" });

  assert.deepEqual(calls[1], [{ role: "user", content: "second try" }]);
});

test("a reply that lands after the caller aborted is returned but not recorded", async () => {
  const calls: ChatTurn[][] = [];
  let releaseLate: (reply: string) => void = () => undefined;
  const model: ReplyModel = (turns) => {
    calls.push(turns.map((turn) => ({ ...turn })));
    if (calls.length === 1) {
      return new Promise<string>((resolve) => {
        releaseLate = resolve;
      });
    }
    return Promise.resolve("Fresh answer.");
  };
  const agent = createAgent(model);
  const controller = new AbortController();

  const late = agent.respond({ text: "first question", userId: "u1", sessionId: "s1", signal: controller.signal });
  controller.abort();
  releaseLate("Stale answer.");
  assert.equal(await late, "Stale answer.");

  await agent.respond({ text: "second question", userId: "u1", sessionId: "s1" });

  assert.deepEqual(calls[1], [{ role: "user", content: "second question" }]);
});

test("the caller's signal is passed to the model", async () => {
  const seen: (AbortSignal | undefined)[] = [];
  const agent = createAgent(async (_turns, _system, signal) => {
    seen.push(signal);
    return "Done.";
  });
  const controller = new AbortController();

  await agent.respond({ text: "hi", userId: "u1", sessionId: "s1", signal: controller.signal });

  assert.equal(seen[0], controller.signal);
});

test("history is trimmed to the most recent twelve messages", async () => {
  const { model, calls } = recordingModel(Array.from({ length: 8 }, (_, i) => `reply ${i}`));
  const agent = createAgent(model);

  for (let i = 0; i < 8; i++) {
    await agent.respond({ text: `question ${i}`, userId: "u1", sessionId: "s1" });
  }

  const last = calls[7];
  assert.equal(last.length, 13);
  assert.deepEqual(last[0], { role: "user", content: "question 1" });
  assert.deepEqual(last[12], { role: "user", content: "question 7" });
});

test("forget drops a session's history", async () => {
  const { model, calls } = recordingModel(["One.", "Two."]);
  const agent = createAgent(model);

  await agent.respond({ text: "first", userId: "u1", sessionId: "s1" });
  agent.forget("s1");
  await agent.respond({ text: "again", userId: "u1", sessionId: "s1" });

  assert.deepEqual(calls[1], [{ role: "user", content: "again" }]);
});

test("without an API key the default model fails every request", async () => {
  const agent = createAnthropicAgent({ apiKey: "", model: "test-model" });

  await assert.rejects(agent.respond({ text: "hi", userId: "u1", sessionId: "s1" }), {
    message: "ANTHROPIC_API_KEY is not set",
  });
});
