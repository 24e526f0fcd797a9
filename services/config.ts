/**
 * Server configuration from environment variables.
 *
 * The entry point loads .env through dotenv before calling loadServerConfig;
 * this module only reads an env record and applies defaults:
 * - Parse numeric settings, falling back to defaults on missing or invalid values
 * - Collect provider credentials and model IDs
 */

import { DEFAULT_AGENT_MODEL } from "../server/agent-adapter.js";

import type { ServerConfig } from "../server/types.js";

// ============================================================================
// TYPES
// ============================================================================

/** Key-value record of environment variables */
export type EnvRecord = Record<string, string | undefined>;

// ============================================================================
// CONSTANTS
// ============================================================================

const DEFAULT_PORT = 8000;
const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_MAX_CONNECTIONS = 50;
const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
const DEFAULT_TRANSCRIPTION_TIMEOUT_MS = 15_000;
const DEFAULT_AGENT_TIMEOUT_MS = 30_000;
const DEFAULT_SYNTHESIS_TIMEOUT_MS = 10_000;
const DEFAULT_TTS_CHUNK_MS = 250;
const DEFAULT_MAX_PENDING_UTTERANCES = 1;

const DEFAULT_STT_MODEL_ID = "scribe_v1";
const DEFAULT_VOICE_ID = "JBFqnCBsd6RMkjVDRZzb";
const DEFAULT_TTS_MODEL_ID = "eleven_turbo_v2_5";

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Build the server configuration from an environment record.
 *
 * @param env - Environment variables. Defaults to process.env
 * @returns Complete server configuration
 */
export function loadServerConfig(env: EnvRecord = process.env): ServerConfig {
  const elevenlabsApiKey = env.ELEVENLABS_API_KEY ?? "";

  return {
    port: readInt(env, "PORT", DEFAULT_PORT),
    host: env.HOST || DEFAULT_HOST,
    maxConnections: readInt(env, "MAX_WEBSOCKET_CONNECTIONS", DEFAULT_MAX_CONNECTIONS),
    heartbeatIntervalMs: readInt(env, "WEBSOCKET_HEARTBEAT_INTERVAL_MS", DEFAULT_HEARTBEAT_INTERVAL_MS),
    timeouts: {
      transcriptionMs: readInt(env, "TRANSCRIPTION_TIMEOUT_MS", DEFAULT_TRANSCRIPTION_TIMEOUT_MS),
      agentMs: readInt(env, "AGENT_TIMEOUT_MS", DEFAULT_AGENT_TIMEOUT_MS),
      synthesisMs: readInt(env, "SYNTHESIS_TIMEOUT_MS", DEFAULT_SYNTHESIS_TIMEOUT_MS),
    },
    ttsChunkMs: readInt(env, "TTS_CHUNK_MS", DEFAULT_TTS_CHUNK_MS),
    maxPendingUtterances: readInt(env, "MAX_PENDING_UTTERANCES", DEFAULT_MAX_PENDING_UTTERANCES, 0),
    stt: {
      provider: "elevenlabs",
      elevenlabs: {
        apiKey: elevenlabsApiKey,
        modelId: env.ELEVENLABS_STT_MODEL_ID || DEFAULT_STT_MODEL_ID,
      },
    },
    tts: {
      provider: "elevenlabs",
      elevenlabs: {
        apiKey: elevenlabsApiKey,
        voiceId: env.ELEVENLABS_VOICE_ID || DEFAULT_VOICE_ID,
        modelId: env.ELEVENLABS_MODEL_ID || DEFAULT_TTS_MODEL_ID,
      },
    },
    agent: {
      apiKey: env.ANTHROPIC_API_KEY ?? "",
      model: env.AGENT_MODEL || DEFAULT_AGENT_MODEL,
    },
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Read an integer setting. Missing values use the default silently; values
 * that are not integers at or above `min` use the default with a warning.
 *
 * @param env - Environment record
 * @param key - Variable name
 * @param fallback - Default value
 * @param min - Smallest accepted value (default 1)
 * @returns The parsed or default value
 */
function readInt(env: EnvRecord, key: string, fallback: number, min = 1): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    console.warn(`[config] ${key}="${raw}" is not a valid integer >= ${min}, using ${fallback}`);
    return fallback;
  }
  return value;
}
