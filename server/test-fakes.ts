/**
 * In-process stand-ins for sockets and collaborators, shared by the server tests.
 *
 * - createFakeSocket: records every frame as a parsed envelope
 * - createFakeRecognizer / createFakeSynthesizer / createFakeAgent: scripted collaborators
 * - wavBase64: a 16kHz WAV of a test tone, base64-encoded for audio_chunk frames
 */

import { encodeWav } from "../dashboard/src/voice/wav-encoder.js";

import type { AgentAdapter, AgentRequest } from "./agent-adapter.js";
import type { SessionSocket } from "./session-manager.js";
import type { SpeechRecognizer } from "./stt-provider.js";
import type { SpeechSynthesizer } from "./tts-provider.js";

// ============================================================================
// TYPES
// ============================================================================

/** A frame the server sent, parsed back into an envelope */
export interface SentFrame {
  event: string;
  data: Record<string, unknown>;
}

export interface FakeSocket extends SessionSocket {
  /** Every frame sent while open, in order */
  frames: SentFrame[];
  /** Event names of `frames`, in order */
  events(): string[];
  /** Frames with the given event name */
  framesOf(event: string): SentFrame[];
}

// ============================================================================
// SOCKET
// ============================================================================

/**
 * Create a socket that records frames. `onFrame` runs synchronously inside
 * send(), before the send resolves, so tests can react between two chunks.
 *
 * @param onFrame - Called with each recorded frame
 * @returns A FakeSocket
 */
export function createFakeSocket(onFrame?: (frame: SentFrame, socket: FakeSocket) => void): FakeSocket {
  let open = true;
  const frames: SentFrame[] = [];

  const socket: FakeSocket = {
    frames,
    events: () => frames.map((frame) => frame.event),
    framesOf: (event) => frames.filter((frame) => frame.event === event),
    send(payload: string): Promise<boolean> {
      if (!open) return Promise.resolve(false);
      const frame = parseFrame(payload);
      frames.push(frame);
      onFrame?.(frame, socket);
      return Promise.resolve(true);
    },
    isOpen: () => open,
    close() {
      open = false;
    },
  };

  return socket;
}

/**
 * Parse a sent frame into an envelope.
 * @throws Error if the frame is not an { event, data } object
 */
export function parseFrame(payload: string): SentFrame {
  const value: unknown = JSON.parse(payload);
  if (typeof value !== "object" || value === null || !("event" in value) || !("data" in value)) {
    throw new Error(`Not an envelope: ${payload}`);
  }
  const { event, data } = value;
  if (typeof event !== "string" || typeof data !== "object" || data === null) {
    throw new Error(`Not an envelope: ${payload}`);
  }
  return { event, data: { ...data } };
}

// ============================================================================
// COLLABORATORS
// ============================================================================

/**
 * Recognizer returning a fixed transcript, throwing a fixed error, or running a function.
 */
export function createFakeRecognizer(
  result: string | Error | ((wav: Uint8Array, signal: AbortSignal) => Promise<string>)
): SpeechRecognizer & { calls: number } {
  const recognizer = {
    calls: 0,
    async transcribe(wav: Uint8Array, signal: AbortSignal): Promise<string> {
      recognizer.calls++;
      if (typeof result === "function") return result(wav, signal);
      if (result instanceof Error) throw result;
      return result;
    },
  };
  return recognizer;
}

export interface FakeSynthesizerOptions {
  /** PCM sample rate (default 1000, so 100ms is 200 bytes) */
  sampleRate?: number;
  /** PCM bytes produced per sentence (default 400) */
  bytesPerSentence?: number;
  /** Bytes per yielded piece (default 100) */
  pieceBytes?: number;
  /** Throw after this many bytes in total */
  failAfterBytes?: number;
}

/**
 * Synthesizer yielding silent PCM in fixed pieces, one macrotask apart.
 */
export function createFakeSynthesizer(
  options: FakeSynthesizerOptions = {}
): SpeechSynthesizer & { requests: string[]; abortedRequests: number } {
  const { sampleRate = 1000, bytesPerSentence = 400, pieceBytes = 100, failAfterBytes } = options;
  let produced = 0;
  const requests: string[] = [];

  const synthesizer = {
    sampleRate,
    requests,
    abortedRequests: 0,
    async *synthesize(text: string, signal: AbortSignal): AsyncGenerator<Uint8Array> {
      synthesizer.requests.push(text);
      signal.addEventListener("abort", () => {
        synthesizer.abortedRequests++;
      });

      for (let sent = 0; sent < bytesPerSentence; sent += pieceBytes) {
        await new Promise<void>((resolve) => setImmediate(resolve));
        if (failAfterBytes !== undefined && produced >= failAfterBytes) {
          throw new Error("synthesizer exploded");
        }
        produced += pieceBytes;
        yield new Uint8Array(pieceBytes);
      }
    },
  };
  return synthesizer;
}

/**
 * Agent replying with a fixed text or a function of the request.
 */
export function createFakeAgent(
  reply: string | ((request: AgentRequest) => Promise<string>)
): AgentAdapter & { requests: AgentRequest[]; forgotten: string[] } {
  const requests: AgentRequest[] = [];
  const forgotten: string[] = [];

  const agent = {
    requests,
    forgotten,
    async respond(request: AgentRequest): Promise<string> {
      agent.requests.push(request);
      return typeof reply === "function" ? reply(request) : reply;
    },
    forget(sessionId: string): void {
      agent.forgotten.push(sessionId);
    },
  };
  return agent;
}

// ============================================================================
// AUDIO
// ============================================================================

/**
 * A 220Hz tone encoded as a 16kHz mono 16-bit WAV, base64-encoded.
 *
 * @param durationSeconds - Length of the tone
 * @returns base64 WAV
 */
export function wavBase64(durationSeconds: number): string {
  return Buffer.from(encodeWav(toneSamples(durationSeconds, 16000))).toString("base64");
}

/**
 * Samples of a 220Hz tone at half amplitude.
 */
export function toneSamples(durationSeconds: number, sampleRate: number): Float32Array {
  const samples = new Float32Array(Math.round(durationSeconds * sampleRate));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = 0.5 * Math.sin((2 * Math.PI * 220 * i) / sampleRate);
  }
  return samples;
}

/**
 * Wait until every pending macrotask (fake synthesis steps included) has run.
 */
export function flushMacrotasks(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}
