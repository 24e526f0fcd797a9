/**
 * ElevenLabs TTS provider via streaming HTTP API.
 *
 * Calls the ElevenLabs text-to-speech streaming endpoint and yields raw PCM
 * chunks as they arrive. Chunk boundaries follow the HTTP response; callers
 * re-chunk to the size they need.
 *
 * Responsibilities:
 * - POST text to the ElevenLabs TTS streaming API and receive chunked PCM audio
 * - Yield PCM chunks as an async iterable
 * - Cancel the in-flight request when the caller's signal aborts
 */

import type { SpeechSynthesizer } from "./tts-provider.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** ElevenLabs TTS streaming API base URL */
const ELEVENLABS_TTS_BASE_URL = "https://api.elevenlabs.io/v1/text-to-speech";

/** PCM output sample rate in Hz (matches the output_format query) */
const TTS_SAMPLE_RATE = 24000;

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Configuration for the ElevenLabs TTS provider.
 */
export interface ElevenlabsTtsConfig {
  /** ElevenLabs API key for authentication */
  apiKey: string;
  /** ElevenLabs voice ID to use for generation */
  voiceId: string;
  /** ElevenLabs model ID (e.g. "eleven_turbo_v2_5") */
  modelId: string;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a SpeechSynthesizer that uses the ElevenLabs streaming TTS API.
 * Output is 24kHz 16-bit mono PCM.
 *
 * @param config - ElevenLabs TTS configuration (API key, voice, model)
 * @returns A SpeechSynthesizer
 */
export function createElevenlabsTts(config: ElevenlabsTtsConfig): SpeechSynthesizer {
  const { apiKey, voiceId, modelId } = config;

  /**
   * Stream PCM for one piece of text.
   *
   * @param text - The text to synthesize
   * @param signal - Aborts the request and the body read
   * @yields Raw PCM chunks as delivered by the API
   * @throws Error on missing key, non-2xx response, or network failure
   */
  async function* synthesize(text: string, signal: AbortSignal): AsyncGenerator<Uint8Array> {
    if (!apiKey) throw new Error("ELEVENLABS_API_KEY is not set");

    const url = `${ELEVENLABS_TTS_BASE_URL}/${voiceId}/stream?output_format=pcm_${TTS_SAMPLE_RATE}`;

    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "xi-api-key": apiKey,
      },
      body: JSON.stringify({ text, model_id: modelId }),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "unknown error");
      throw new Error(`ElevenLabs TTS API error ${response.status}: ${errorText}`);
    }

    yield* readResponseChunks(response);
  }

  return {
    sampleRate: TTS_SAMPLE_RATE,
    synthesize,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Read chunks from a fetch Response body as an async iterable.
 * The response body is a ReadableStream of Uint8Array chunks.
 *
 * @param response - The fetch Response to read from
 * @yields Uint8Array chunks of raw PCM audio data
 */
async function* readResponseChunks(response: Response): AsyncGenerator<Uint8Array> {
  const body = response.body;
  if (!body) throw new Error("ElevenLabs TTS response has no body");

  const reader = body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (value) yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
