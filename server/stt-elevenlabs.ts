/**
 * ElevenLabs STT provider via batch transcription API (Scribe).
 *
 * Each utterance arrives as a complete WAV file from the browser, so it is
 * uploaded as-is to the ElevenLabs speech-to-text API in one multipart request.
 *
 * Responsibilities:
 * - POST the WAV to the ElevenLabs batch STT API via multipart/form-data
 * - Parse the JSON response and return the trimmed transcript text
 * - Propagate cancellation through the caller's AbortSignal
 */

import type { SpeechRecognizer } from "./stt-provider.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** ElevenLabs STT API endpoint */
const ELEVENLABS_STT_URL = "https://api.elevenlabs.io/v1/speech-to-text";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Configuration for the ElevenLabs STT provider.
 */
export interface ElevenlabsSttConfig {
  /** ElevenLabs API key for authentication */
  apiKey: string;
  /** ElevenLabs STT model ID (e.g. "scribe_v1") */
  modelId: string;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a SpeechRecognizer that uses the ElevenLabs batch transcription API.
 *
 * A missing API key does not prevent creation; every transcribe() call then
 * fails, which the streaming handler reports as transcription unavailable.
 *
 * @param config - ElevenLabs STT configuration (API key and model ID)
 * @returns A SpeechRecognizer bound to the configured model
 */
export function createElevenlabsStt(config: ElevenlabsSttConfig): SpeechRecognizer {
  const { apiKey, modelId } = config;

  /**
   * Upload one WAV utterance and return its transcript.
   *
   * @param wav - Complete WAV file
   * @param signal - Aborts the request
   * @returns Transcript text, trimmed (may be empty)
   * @throws Error on missing key, non-2xx response, or network failure
   */
  async function transcribe(wav: Uint8Array, signal: AbortSignal): Promise<string> {
    if (!apiKey) throw new Error("ELEVENLABS_API_KEY is not set");

    const wavBlob = new Blob([new Uint8Array(wav)], { type: "audio/wav" });

    const formData = new FormData();
    formData.append("file", wavBlob, "audio.wav");
    formData.append("model_id", modelId);

    const response = await fetch(ELEVENLABS_STT_URL, {
      method: "POST",
      headers: {
        "xi-api-key": apiKey,
      },
      body: formData,
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "unknown error");
      throw new Error(`ElevenLabs STT API error ${response.status}: ${errorText}`);
    }

    const result: unknown = await response.json();
    return readTranscriptText(result).trim();
  }

  return { transcribe };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Pull the `text` field out of an STT response body.
 *
 * @param body - Parsed JSON response
 * @returns The text field, or "" when absent
 */
function readTranscriptText(body: unknown): string {
  if (typeof body !== "object" || body === null || !("text" in body)) return "";
  return typeof body.text === "string" ? body.text : "";
}
