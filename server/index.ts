/**
 * Entry point for the voice session server.
 *
 * Loads .env, builds the providers, agent, streaming handler and session
 * manager from config, then starts the HTTP + WebSocket server.
 *
 * Run: npm start
 */

import "dotenv/config";

import { createAnthropicAgent } from "./agent-adapter.js";
import { describeError } from "./errors.js";
import { createSessionManager } from "./session-manager.js";
import { createStreamingHandler } from "./streaming-handler.js";
import { createRecognizerForProvider, getSttProviderStatus } from "./stt-provider.js";
import { createSynthesizerForProvider, getTtsProviderStatus } from "./tts-provider.js";
import { createVoiceServer } from "./voice-server.js";
import { loadServerConfig } from "../services/config.js";

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Build every module from config and start listening.
 * Shuts down cleanly on SIGINT / SIGTERM.
 */
async function main(): Promise<void> {
  const config = loadServerConfig();

  for (const [name, status] of [
    ["stt", getSttProviderStatus(config.stt)],
    ["tts", getTtsProviderStatus(config.tts)],
  ] as const) {
    if (!status.ready) console.warn(`[voice-server] ${name} provider not ready: ${status.detail ?? status.reason}`);
  }
  if (!config.agent.apiKey) console.warn("[voice-server] agent not ready: ANTHROPIC_API_KEY is not set");

  const handler = createStreamingHandler({
    recognizer: createRecognizerForProvider(config.stt),
    synthesizer: createSynthesizerForProvider(config.tts),
    transcriptionTimeoutMs: config.timeouts.transcriptionMs,
    synthesisTimeoutMs: config.timeouts.synthesisMs,
    chunkDurationMs: config.ttsChunkMs,
  });

  const manager = createSessionManager({
    handler,
    agent: createAnthropicAgent({ apiKey: config.agent.apiKey, model: config.agent.model }),
    agentTimeoutMs: config.timeouts.agentMs,
    maxPendingUtterances: config.maxPendingUtterances,
  });

  const voiceServer = createVoiceServer(config, manager);
  await voiceServer.listen();

  /** Stop accepting connections and exit */
  async function shutdown(signal: string): Promise<void> {
    console.log(`[voice-server] ${signal} received, shutting down`);
    await voiceServer.close();
    process.exit(0);
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error(`[voice-server] shutdown failed: ${describeError(err)}`);
        process.exit(1);
      });
    });
  }
}

// ============================================================================
// ENTRY POINT
// ============================================================================

main().catch((err) => {
  console.error(`[voice-server] fatal: ${describeError(err)}`);
  process.exit(1);
});
