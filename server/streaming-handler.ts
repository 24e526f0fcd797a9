/**
 * Streaming/transcription handler: the bridge between a session and the
 * ASR and TTS collaborators.
 *
 * Transcription is one bounded request per utterance. Reply streaming
 * synthesizes sentence by sentence, re-chunks the PCM into fixed-duration
 * pieces, wraps each piece as a standalone WAV, and emits it as a tts_chunk.
 * The interrupt flag is checked before every chunk; once emitted, a chunk is
 * never retracted.
 *
 * Responsibilities:
 * - Transcribe WAV utterances with a timeout, never substituting text on failure
 * - Stream synthesized replies in order with per-chunk interrupt checks
 * - Stop quietly when the session's socket closes mid-stream
 * - Convert synthesis failures and stalls into `error` events
 */

import { SynthesisFailure, InvalidAudioFormat, TranscriptionUnavailable, describeError } from "./errors.js";
import { errorEvent } from "./protocol.js";
import { withIdleTimeout, withTimeout } from "./timeout.js";
import { splitSentences } from "./tts-provider.js";
import { pcmToWav } from "./wav.js";

import type { SpeechRecognizer } from "./stt-provider.js";
import type { SpeechSynthesizer } from "./tts-provider.js";
import type { ServerEvent, StreamOutcome } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Bytes per 16-bit mono PCM sample */
const BYTES_PER_SAMPLE = 2;

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Per-stream view of the session's flags, supplied by the session manager.
 */
export interface StreamControl {
  /** True once the client asked for the in-flight reply to stop */
  interruptRequested(): boolean;
  /** Acknowledge an observed interrupt */
  clearInterrupt(): void;
  /** False once the session's socket has closed */
  isOpen(): boolean;
}

/**
 * Sends one event to the session's client.
 * Resolves false when the socket was already closed.
 */
export type EventSink = (event: ServerEvent) => Promise<boolean>;

export interface StreamingHandlerConfig {
  recognizer: SpeechRecognizer;
  synthesizer: SpeechSynthesizer;
  /** Budget for one transcription request */
  transcriptionTimeoutMs: number;
  /** Budget for each wait on the synthesizer */
  synthesisTimeoutMs: number;
  /** Audio duration carried by one tts_chunk */
  chunkDurationMs: number;
}

export interface StreamingHandler {
  /**
   * Transcribe one utterance.
   * @param audio - Utterance bytes
   * @param format - Container format tag (only "wav" is accepted)
   * @param sampleRate - Sample rate reported by the client, used for logging
   * @returns Non-empty transcript text
   * @throws InvalidAudioFormat for a non-WAV format tag
   * @throws TranscriptionUnavailable if the recognizer fails, times out, or returns no text
   */
  transcribe(audio: Uint8Array, format: string, sampleRate: number): Promise<string>;

  /**
   * Synthesize `text` and stream it to the client as tts_chunk events, ending
   * with streaming_complete, streaming_interrupted, or an error event.
   * Never throws.
   *
   * @param sessionId - Session the chunks belong to
   * @param text - Reply text to speak
   * @param emit - Sends events to the session's socket
   * @param control - The session's interrupt flag and socket state
   * @returns How the stream ended
   */
  streamReply(sessionId: string, text: string, emit: EventSink, control: StreamControl): Promise<StreamOutcome>;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create a streaming handler over the given recognizer and synthesizer.
 *
 * @param config - Collaborators, timeouts, and chunk duration
 * @returns A StreamingHandler
 */
export function createStreamingHandler(config: StreamingHandlerConfig): StreamingHandler {
  const { recognizer, synthesizer, transcriptionTimeoutMs, synthesisTimeoutMs, chunkDurationMs } = config;
  const chunkBytes = bytesForDuration(synthesizer.sampleRate, chunkDurationMs);

  async function transcribe(audio: Uint8Array, format: string, sampleRate: number): Promise<string> {
    if (format !== "wav") {
      throw new InvalidAudioFormat(`Unsupported audio format: ${format}`);
    }

    const controller = new AbortController();
    const t0 = Date.now();
    let text: string;

    try {
      text = await withTimeout(
        recognizer.transcribe(audio, controller.signal),
        transcriptionTimeoutMs,
        "transcription",
        controller
      );
    } catch (err) {
      console.error(`[streaming-handler] transcription failed: ${describeError(err)}`);
      throw new TranscriptionUnavailable(`Transcription unavailable: ${describeError(err)}`, { cause: err });
    }

    const transcript = text.trim();
    if (!transcript) {
      throw new TranscriptionUnavailable("Transcription returned no usable text");
    }

    console.log(
      `[streaming-handler] transcribed ${audio.length} bytes (${sampleRate}Hz) in ${Date.now() - t0}ms: "${preview(transcript)}"`
    );
    return transcript;
  }

  async function streamReply(
    sessionId: string,
    text: string,
    emit: EventSink,
    control: StreamControl
  ): Promise<StreamOutcome> {
    const controller = new AbortController();
    const t0 = Date.now();
    let chunkIndex = 0;

    /**
     * End the stream before the next chunk. Interruption is acknowledged to the
     * client; a closed socket ends silently.
     */
    async function stopEarly(reason: "interrupted" | "closed"): Promise<StreamOutcome> {
      if (reason === "closed") {
        console.log(`[streaming-handler] ${sessionId}: socket closed after ${chunkIndex} chunks`);
        return "closed";
      }

      control.clearInterrupt();
      console.log(`[streaming-handler] ${sessionId}: interrupted after ${chunkIndex} chunks`);
      await emit({ event: "streaming_interrupted", data: { session_id: sessionId, chunks_sent: chunkIndex } });
      return "interrupted";
    }

    const audio = rechunk(
      withIdleTimeout(synthesizeAll(splitSentences(text), controller.signal), synthesisTimeoutMs, "synthesis", controller),
      chunkBytes
    );

    try {
      for await (const pcm of audio) {
        const stop = checkStop(control);
        if (stop) return await stopEarly(stop);

        const delivered = await emit({
          event: "tts_chunk",
          data: {
            audio_chunk: pcmToWav(pcm, synthesizer.sampleRate).toString("base64"),
            chunk_index: chunkIndex,
            format: "wav",
            session_id: sessionId,
          },
        });
        if (!delivered) return await stopEarly("closed");

        chunkIndex++;
      }

      // An interrupt that landed after the last chunk still wins over completion
      const stop = checkStop(control);
      if (stop) return await stopEarly(stop);

      await emit({ event: "streaming_complete", data: { session_id: sessionId, total_chunks: chunkIndex } });
      console.log(`[streaming-handler] ${sessionId}: streamed ${chunkIndex} chunks in ${Date.now() - t0}ms`);
      return "complete";
    } catch (err) {
      if (!control.isOpen()) return "closed";

      const failure = new SynthesisFailure(`Speech synthesis failed: ${describeError(err)}`, { cause: err });
      console.error(`[streaming-handler] ${sessionId}: ${failure.message} (after ${chunkIndex} chunks)`);
      await emit(errorEvent(sessionId, "synthesis_failed", failure.message));
      return "failed";
    } finally {
      controller.abort();
    }
  }

  /**
   * Synthesize sentences one after another as a single PCM stream.
   */
  async function* synthesizeAll(sentences: string[], signal: AbortSignal): AsyncGenerator<Uint8Array> {
    for (const sentence of sentences) {
      yield* synthesizer.synthesize(sentence, signal);
    }
  }

  return { transcribe, streamReply };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Decide whether the stream must stop before emitting another chunk.
 */
function checkStop(control: StreamControl): "interrupted" | "closed" | null {
  if (!control.isOpen()) return "closed";
  if (control.interruptRequested()) return "interrupted";
  return null;
}

/**
 * Byte length of `durationMs` of 16-bit mono PCM, rounded down to whole samples.
 *
 * @param sampleRate - PCM sample rate
 * @param durationMs - Chunk duration
 * @returns Chunk size in bytes (at least one sample)
 */
export function bytesForDuration(sampleRate: number, durationMs: number): number {
  const samples = Math.max(1, Math.floor((sampleRate * durationMs) / 1000));
  return samples * BYTES_PER_SAMPLE;
}

/**
 * Re-slice a PCM stream into fixed-size chunks. The final chunk carries the
 * remainder, trimmed to whole samples.
 *
 * @param source - PCM pieces of arbitrary size
 * @param chunkBytes - Target chunk size (a multiple of BYTES_PER_SAMPLE)
 * @yields PCM chunks of exactly `chunkBytes`, then the remainder
 */
export async function* rechunk(source: AsyncIterable<Uint8Array>, chunkBytes: number): AsyncGenerator<Buffer> {
  let pending: Buffer = Buffer.alloc(0);

  for await (const piece of source) {
    pending = pending.length > 0 ? Buffer.concat([pending, piece]) : Buffer.from(piece);

    while (pending.length >= chunkBytes) {
      yield pending.subarray(0, chunkBytes);
      pending = pending.subarray(chunkBytes);
    }
  }

  const tail = pending.length - (pending.length % BYTES_PER_SAMPLE);
  if (tail > 0) yield pending.subarray(0, tail);
}

/** First 60 characters of a transcript, for logs */
function preview(text: string): string {
  return text.length > 60 ? `${text.slice(0, 60)}...` : text;
}
