/**
 * HTTP status routes served beside the voice WebSocket.
 *
 * - GET / -- service banner with the WebSocket path
 * - GET /health -- provider readiness and active session count
 * - GET /ws/status -- connection counts and per-session snapshots
 */

import { Hono } from "hono";

import { getSttProviderStatus } from "./stt-provider.js";
import { getTtsProviderStatus } from "./tts-provider.js";

import type { SessionManager } from "./session-manager.js";
import type { ProviderStatus, ServerConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Path the voice WebSocket upgrades on */
export const VOICE_WS_PATH = "/ws/voice";

const SERVICE_NAME = "voice-news-agent";

// ============================================================================
// ROUTES
// ============================================================================

/**
 * Create Hono route group for service status.
 *
 * @param manager - Session manager to report on
 * @param config - Server configuration (limits and provider settings)
 * @returns Hono instance with status routes
 */
export function statusRoutes(manager: SessionManager, config: ServerConfig): Hono {
  const app = new Hono();

  /** Service banner */
  app.get("/", (c) => {
    return c.json({ service: SERVICE_NAME, status: "running", websocket: VOICE_WS_PATH });
  });

  /** Provider readiness; "degraded" while any provider is missing configuration */
  app.get("/health", (c) => {
    const services: Record<string, ProviderStatus> = {
      stt: getSttProviderStatus(config.stt),
      tts: getTtsProviderStatus(config.tts),
      agent: config.agent.apiKey
        ? { ready: true }
        : { ready: false, reason: "missing_api_key", detail: "ANTHROPIC_API_KEY is not set" },
    };
    const healthy = Object.values(services).every((status) => status.ready);

    return c.json({
      status: healthy ? "healthy" : "degraded",
      services,
      active_sessions: manager.size(),
      timestamp: new Date().toISOString(),
    });
  });

  /** Live connection counts and session snapshots */
  app.get("/ws/status", (c) => {
    return c.json({
      active_connections: manager.size(),
      max_connections: config.maxConnections,
      sessions: manager.listSessions(),
    });
  });

  return app;
}
