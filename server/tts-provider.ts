/**
 * TTS provider factory, readiness checks, and shared text helpers.
 *
 * Responsibilities:
 * - Define the SpeechSynthesizer interface the streaming handler depends on
 * - Create a SpeechSynthesizer for the configured provider
 * - Check provider readiness (API keys set)
 * - Split reply text into sentences so synthesis can start before the whole reply is voiced
 */

import { createElevenlabsTts } from "./tts-elevenlabs.js";

import type { ProviderStatus, TtsProviderConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Regex matching sentence-ending punctuation followed by whitespace */
const SENTENCE_END_RE = /[.!?][\s]+/;

/** Sentences shorter than this are merged with the next one */
const MIN_SENTENCE_LENGTH = 20;

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Streaming speech synthesizer producing 16-bit little-endian mono PCM.
 */
export interface SpeechSynthesizer {
  /** Sample rate of the PCM this synthesizer yields */
  readonly sampleRate: number;

  /**
   * Synthesize one piece of text.
   * @param text - Text to speak
   * @param signal - Aborts the in-flight request
   * @returns PCM byte chunks of arbitrary size, in playback order
   */
  synthesize(text: string, signal: AbortSignal): AsyncIterable<Uint8Array>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a SpeechSynthesizer for the configured provider.
 *
 * @param providerConfig - Provider selection and per-provider settings
 * @returns A SpeechSynthesizer instance
 * @throws Error if the provider is not implemented
 */
export function createSynthesizerForProvider(providerConfig: TtsProviderConfig): SpeechSynthesizer {
  switch (providerConfig.provider) {
    case "elevenlabs":
      return createElevenlabsTts({
        apiKey: providerConfig.elevenlabs.apiKey,
        voiceId: providerConfig.elevenlabs.voiceId,
        modelId: providerConfig.elevenlabs.modelId,
      });

    default:
      throw new Error(`Unknown TTS provider: ${String(providerConfig.provider)}`);
  }
}

/**
 * Check whether the configured TTS provider can be used.
 *
 * @param providerConfig - Provider selection and per-provider settings
 * @returns Readiness status with reason if not ready
 */
export function getTtsProviderStatus(providerConfig: TtsProviderConfig): ProviderStatus {
  switch (providerConfig.provider) {
    case "elevenlabs":
      if (!providerConfig.elevenlabs.apiKey) {
        return { ready: false, reason: "missing_api_key", detail: "ELEVENLABS_API_KEY is not set" };
      }
      return { ready: true };

    default:
      throw new Error(`Unknown TTS provider: ${String(providerConfig.provider)}`);
  }
}

/**
 * Split reply text into sentences for incremental synthesis.
 * Splits on sentence-ending punctuation, but never yields a sentence shorter
 * than MIN_SENTENCE_LENGTH unless it is the tail of the text.
 *
 * @param text - Full reply text
 * @returns Non-empty trimmed sentences, in order
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let buffer = text;

  while (buffer.length >= MIN_SENTENCE_LENGTH) {
    const match = SENTENCE_END_RE.exec(buffer.slice(MIN_SENTENCE_LENGTH - 1));
    if (!match) break;

    const splitIndex = MIN_SENTENCE_LENGTH - 1 + match.index + match[0].length;
    const sentence = buffer.slice(0, splitIndex).trim();
    buffer = buffer.slice(splitIndex);

    if (sentence) sentences.push(sentence);
  }

  const remaining = buffer.trim();
  if (remaining) sentences.push(remaining);

  return sentences;
}
