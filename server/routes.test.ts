/**
 * Tests for the HTTP status routes, exercised through Hono's app.request().
 *
 * Run: npx tsx --test server/routes.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { statusRoutes } from "./routes.js";
import { createSessionManager } from "./session-manager.js";
import { createStreamingHandler } from "./streaming-handler.js";
import { createFakeAgent, createFakeRecognizer, createFakeSocket, createFakeSynthesizer } from "./test-fakes.js";
import { loadServerConfig } from "../services/config.js";

import type { EnvRecord } from "../services/config.js";

// ============================================================================
// HELPERS
// ============================================================================

function createApp(env: EnvRecord = {}) {
  const config = loadServerConfig(env);
  const manager = createSessionManager({
    handler: createStreamingHandler({
      recognizer: createFakeRecognizer("unused"),
      synthesizer: createFakeSynthesizer(),
      transcriptionTimeoutMs: 1000,
      synthesisTimeoutMs: 1000,
      chunkDurationMs: 100,
    }),
    agent: createFakeAgent("unused"),
    agentTimeoutMs: 1000,
    maxPendingUtterances: 1,
  });
  return { app: statusRoutes(manager, config), manager };
}

/** Read a JSON object body */
async function readJson(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  assert.ok(typeof body === "object" && body !== null && !Array.isArray(body), "expected a JSON object");
  return { ...body };
}

// ============================================================================
// TESTS
// ============================================================================

test("GET / describes the service", async () => {
  const { app } = createApp();
  const res = await app.request("/");

  assert.equal(res.status, 200);
  assert.deepEqual(await readJson(res), { service: "voice-news-agent", status: "running", websocket: "/ws/voice" });
});

test("GET /health is degraded while API keys are missing", async () => {
  const { app } = createApp();
  const body = await readJson(await app.request("/health"));

  assert.equal(body.status, "degraded");
  assert.deepEqual(body.services, {
    stt: { ready: false, reason: "missing_api_key", detail: "ELEVENLABS_API_KEY is not set" },
    tts: { ready: false, reason: "missing_api_key", detail: "ELEVENLABS_API_KEY is not set" },
    agent: { ready: false, reason: "missing_api_key", detail: "ANTHROPIC_API_KEY is not set" },
  });
  assert.equal(body.active_sessions, 0);
});

test("GET /health is healthy once every provider is configured", async () => {
  const { app } = createApp({ ELEVENLABS_API_KEY: "test-secret", ANTHROPIC_API_KEY: "test-secret" });
  const body = await readJson(await app.request("/health"));

  assert.equal(body.status, "healthy");
  assert.deepEqual(body.services, { stt: { ready: true }, tts: { ready: true }, agent: { ready: true } });
});

test("GET /ws/status lists live sessions", async () => {
  const { app, manager } = createApp({ MAX_WEBSOCKET_CONNECTIONS: "5" });
  const sessionId = await manager.connect(createFakeSocket(), "user-1");

  const body = await readJson(await app.request("/ws/status"));

  assert.equal(body.active_connections, 1);
  assert.equal(body.max_connections, 5);
  assert.ok(Array.isArray(body.sessions));
  assert.equal(body.sessions.length, 1);

  const [session] = manager.listSessions();
  assert.equal(session.sessionId, sessionId);
  assert.deepEqual(body.sessions[0], { ...session });
});
