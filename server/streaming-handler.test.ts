/**
 * Tests for transcription and reply streaming.
 *
 * The fake synthesizer runs at 1000Hz, so with 100ms chunks every tts_chunk
 * carries 200 PCM bytes, and a short reply (one sentence, 400 bytes) streams
 * as exactly two chunks.
 *
 * Run: npx tsx --test server/streaming-handler.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { InvalidAudioFormat, TranscriptionUnavailable } from "./errors.js";
import { bytesForDuration, createStreamingHandler, rechunk } from "./streaming-handler.js";
import { createFakeRecognizer, createFakeSynthesizer } from "./test-fakes.js";
import { parseWav } from "./wav.js";

import type { EventSink, StreamControl, StreamingHandlerConfig } from "./streaming-handler.js";
import type { ServerEvent } from "./types.js";

// ============================================================================
// HELPERS
// ============================================================================

const SHORT_REPLY = "Stocks rose.";

function createHandler(overrides: Partial<StreamingHandlerConfig> = {}) {
  return createStreamingHandler({
    recognizer: createFakeRecognizer("unused"),
    synthesizer: createFakeSynthesizer(),
    transcriptionTimeoutMs: 1000,
    synthesisTimeoutMs: 1000,
    chunkDurationMs: 100,
    ...overrides,
  });
}

/**
 * Control and sink pair that records events. `onEvent` runs after each event
 * is recorded and may flip the interrupt flag or close the socket.
 */
function createStreamHarness(onEvent?: (event: ServerEvent, harness: StreamHarness) => void): StreamHarness {
  const harness: StreamHarness = {
    events: [],
    interrupt: false,
    open: true,
    control: {
      interruptRequested: () => harness.interrupt,
      clearInterrupt: () => {
        harness.interrupt = false;
      },
      isOpen: () => harness.open,
    },
    emit: async (event) => {
      if (!harness.open) return false;
      harness.events.push(event);
      onEvent?.(event, harness);
      return true;
    },
  };
  return harness;
}

interface StreamHarness {
  events: ServerEvent[];
  interrupt: boolean;
  open: boolean;
  control: StreamControl;
  emit: EventSink;
}

function eventNames(events: ServerEvent[]): string[] {
  return events.map((event) => event.event);
}

// ============================================================================
// TRANSCRIPTION
// ============================================================================

test("transcribe returns the trimmed transcript", async () => {
  const recognizer = createFakeRecognizer("  What moved the market today?  ");
  const handler = createHandler({ recognizer });

  assert.equal(await handler.transcribe(new Uint8Array(100), "wav", 16000), "What moved the market today?");
  assert.equal(recognizer.calls, 1);
});

test("transcribe refuses non-WAV formats before calling the recognizer", async () => {
  const recognizer = createFakeRecognizer("text");
  const handler = createHandler({ recognizer });

  await assert.rejects(handler.transcribe(new Uint8Array(100), "mp3", 16000), (err) => {
    assert.ok(err instanceof InvalidAudioFormat);
    assert.equal(err.message, "Unsupported audio format: mp3");
    return true;
  });
  assert.equal(recognizer.calls, 0);
});

test("transcribe reports a recognizer failure without substituting text", async () => {
  const handler = createHandler({ recognizer: createFakeRecognizer(new Error("503 upstream")) });

  await assert.rejects(handler.transcribe(new Uint8Array(100), "wav", 16000), (err) => {
    assert.ok(err instanceof TranscriptionUnavailable);
    assert.equal(err.errorType, "transcription_failed");
    assert.equal(err.message, "Transcription unavailable: 503 upstream");
    return true;
  });
});

test("transcribe treats an empty transcript as a failure", async () => {
  const handler = createHandler({ recognizer: createFakeRecognizer("   ") });

  await assert.rejects(handler.transcribe(new Uint8Array(100), "wav", 16000), {
    name: "TranscriptionUnavailable",
    message: "Transcription returned no usable text",
  });
});

test("transcribe times out and aborts a stalled recognizer", async () => {
  let aborted = false;
  const recognizer = createFakeRecognizer(
    (_wav, signal) =>
      new Promise<string>((_, reject) => {
        signal.addEventListener("abort", () => {
          aborted = true;
          reject(new Error("aborted"));
        });
      })
  );
  const handler = createHandler({ recognizer, transcriptionTimeoutMs: 20 });

  await assert.rejects(handler.transcribe(new Uint8Array(100), "wav", 16000), {
    message: "Transcription unavailable: transcription timed out after 20ms",
  });
  assert.equal(aborted, true);
});

// ============================================================================
// REPLY STREAMING
// ============================================================================

test("streamReply emits ordered WAV chunks and then streaming_complete", async () => {
  const harness = createStreamHarness();
  const handler = createHandler();

  const outcome = await handler.streamReply("s1", SHORT_REPLY, harness.emit, harness.control);

  assert.equal(outcome, "complete");
  assert.deepEqual(eventNames(harness.events), ["tts_chunk", "tts_chunk", "streaming_complete"]);

  const [first, second, done] = harness.events;
  assert.ok(first.event === "tts_chunk" && second.event === "tts_chunk");
  assert.equal(first.data.chunk_index, 0);
  assert.equal(second.data.chunk_index, 1);
  assert.equal(first.data.format, "wav");
  assert.equal(first.data.session_id, "s1");

  const wav = parseWav(Buffer.from(first.data.audio_chunk, "base64"));
  assert.equal(wav.sampleRate, 1000);
  assert.equal(wav.pcm.length, 200);

  assert.deepEqual(done, { event: "streaming_complete", data: { session_id: "s1", total_chunks: 2 } });
});

test("streamReply synthesizes each sentence in order", async () => {
  const synthesizer = createFakeSynthesizer();
  const harness = createStreamHarness();
  const handler = createHandler({ synthesizer });

  await handler.streamReply(
    "s1",
    "The index closed higher today. Energy stocks led the gains.",
    harness.emit,
    harness.control
  );

  assert.deepEqual(synthesizer.requests, ["The index closed higher today.", "Energy stocks led the gains."]);
  assert.equal(harness.events.length, 5);
});

test("an interrupt after the first chunk stops the stream before the second", async () => {
  const synthesizer = createFakeSynthesizer();
  const harness = createStreamHarness((event, h) => {
    if (event.event === "tts_chunk" && event.data.chunk_index === 0) h.interrupt = true;
  });
  const handler = createHandler({ synthesizer });

  const outcome = await handler.streamReply("s1", SHORT_REPLY, harness.emit, harness.control);

  assert.equal(outcome, "interrupted");
  assert.deepEqual(eventNames(harness.events), ["tts_chunk", "streaming_interrupted"]);
  assert.deepEqual(harness.events[1], {
    event: "streaming_interrupted",
    data: { session_id: "s1", chunks_sent: 1 },
  });
  assert.equal(harness.interrupt, false);
  assert.equal(synthesizer.abortedRequests, 1);
});

test("an interrupt after the last chunk still ends as interrupted", async () => {
  const harness = createStreamHarness((event, h) => {
    if (event.event === "tts_chunk" && event.data.chunk_index === 1) h.interrupt = true;
  });
  const handler = createHandler();

  const outcome = await handler.streamReply("s1", SHORT_REPLY, harness.emit, harness.control);

  assert.equal(outcome, "interrupted");
  assert.deepEqual(eventNames(harness.events), ["tts_chunk", "tts_chunk", "streaming_interrupted"]);
});

test("a closed socket ends the stream quietly", async () => {
  const harness = createStreamHarness((event, h) => {
    if (event.event === "tts_chunk") h.open = false;
  });
  const handler = createHandler();

  const outcome = await handler.streamReply("s1", SHORT_REPLY, harness.emit, harness.control);

  assert.equal(outcome, "closed");
  assert.deepEqual(eventNames(harness.events), ["tts_chunk"]);
});

test("a synthesis failure mid-stream becomes a synthesis_failed error", async () => {
  const harness = createStreamHarness();
  const handler = createHandler({ synthesizer: createFakeSynthesizer({ failAfterBytes: 200 }) });

  const outcome = await handler.streamReply("s1", SHORT_REPLY, harness.emit, harness.control);

  assert.equal(outcome, "failed");
  assert.deepEqual(eventNames(harness.events), ["tts_chunk", "error"]);
  assert.deepEqual(harness.events[1], {
    event: "error",
    data: {
      error_type: "synthesis_failed",
      message: "Speech synthesis failed: synthesizer exploded",
      session_id: "s1",
    },
  });
});

test("a stalled synthesizer times out into a synthesis_failed error", async () => {
  const harness = createStreamHarness();
  const handler = createHandler({
    synthesisTimeoutMs: 20,
    synthesizer: {
      sampleRate: 1000,
      async *synthesize(_text: string, signal: AbortSignal): AsyncGenerator<Uint8Array> {
        await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve()));
        yield new Uint8Array(0);
      },
    },
  });

  const outcome = await handler.streamReply("s1", SHORT_REPLY, harness.emit, harness.control);

  assert.equal(outcome, "failed");
  assert.deepEqual(harness.events, [
    {
      event: "error",
      data: {
        error_type: "synthesis_failed",
        message: "Speech synthesis failed: synthesis timed out after 20ms",
        session_id: "s1",
      },
    },
  ]);
});

// ============================================================================
// CHUNKING HELPERS
// ============================================================================

test("bytesForDuration rounds down to whole 16-bit samples", () => {
  assert.equal(bytesForDuration(24000, 250), 12000);
  assert.equal(bytesForDuration(22050, 10), 440);
  assert.equal(bytesForDuration(1000, 0), 2);
});

test("rechunk re-slices PCM into fixed chunks plus an even remainder", async () => {
  async function* pieces(): AsyncGenerator<Uint8Array> {
    yield new Uint8Array(150);
    yield new Uint8Array(150);
    yield new Uint8Array(151);
  }

  const sizes: number[] = [];
  for await (const chunk of rechunk(pieces(), 200)) sizes.push(chunk.length);

  assert.deepEqual(sizes, [200, 200, 50]);
});
