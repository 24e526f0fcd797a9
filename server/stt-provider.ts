/**
 * STT provider factory and readiness checks.
 *
 * Routes recognizer creation to the provider implementation named in config
 * and reports provider readiness for the /health route.
 *
 * Responsibilities:
 * - Define the SpeechRecognizer interface the streaming handler depends on
 * - Create a SpeechRecognizer for the configured provider
 * - Check provider readiness (API keys set)
 */

import { createElevenlabsStt } from "./stt-elevenlabs.js";

import type { ProviderStatus, SttProviderConfig } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Batch speech recognizer: one complete utterance in, one transcript out.
 */
export interface SpeechRecognizer {
  /**
   * Transcribe a complete WAV utterance.
   * @param wav - WAV file bytes
   * @param signal - Aborted when the caller gives up (timeout or shutdown)
   * @returns Transcript text (possibly empty)
   */
  transcribe(wav: Uint8Array, signal: AbortSignal): Promise<string>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a SpeechRecognizer for the configured provider.
 *
 * @param providerConfig - Provider selection and per-provider settings
 * @returns A SpeechRecognizer instance
 * @throws Error if the provider is not implemented
 */
export function createRecognizerForProvider(providerConfig: SttProviderConfig): SpeechRecognizer {
  switch (providerConfig.provider) {
    case "elevenlabs":
      return createElevenlabsStt({
        apiKey: providerConfig.elevenlabs.apiKey,
        modelId: providerConfig.elevenlabs.modelId,
      });

    default:
      throw new Error(`Unknown STT provider: ${String(providerConfig.provider)}`);
  }
}

/**
 * Check whether the configured STT provider can be used.
 *
 * @param providerConfig - Provider selection and per-provider settings
 * @returns Readiness status with reason if not ready
 */
export function getSttProviderStatus(providerConfig: SttProviderConfig): ProviderStatus {
  switch (providerConfig.provider) {
    case "elevenlabs":
      if (!providerConfig.elevenlabs.apiKey) {
        return { ready: false, reason: "missing_api_key", detail: "ELEVENLABS_API_KEY is not set" };
      }
      return { ready: true };

    default:
      throw new Error(`Unknown STT provider: ${String(providerConfig.provider)}`);
  }
}
