/**
 * End-to-end tests: the browser transport talking to the session manager.
 *
 * The two ends are joined in memory. Server frames reach the client one
 * microtask after they are sent; client frames go to manager.handleMessage,
 * the way the WebSocket upgrade handler routes them.
 *
 * Run: npx tsx --test server/voice-roundtrip.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { createSessionManager } from "./session-manager.js";
import { createStreamingHandler } from "./streaming-handler.js";
import { createFakeAgent, createFakeRecognizer, createFakeSynthesizer, flushMacrotasks, toneSamples } from "./test-fakes.js";
import { parseWav } from "./wav.js";
import { createSessionTransport } from "../dashboard/src/voice/transport.js";
import { encodeWav } from "../dashboard/src/voice/wav-encoder.js";

import type { SessionManager, SessionSocket } from "./session-manager.js";
import type { SpeechRecognizer } from "./stt-provider.js";
import type { SessionTransport, SocketFactory, TtsChunk } from "../dashboard/src/voice/transport.js";

// ============================================================================
// HELPERS
// ============================================================================

const SERVER_URL = "ws://localhost:8000/ws/voice";
const TRANSCRIPT = "How did tech stocks do today?";
const REPLY = "Tech stocks closed higher.";

/**
 * Join client sockets to a session manager. settle() waits until every
 * message the client sent has been fully handled.
 */
function createBridge(manager: SessionManager) {
  const pending: Promise<void>[] = [];

  const socketFactory: SocketFactory = (url, handlers) => {
    let open = true;
    let sessionId: string | null = null;

    const serverSide: SessionSocket = {
      send(payload) {
        if (!open) return Promise.resolve(false);
        queueMicrotask(() => {
          if (open) handlers.onMessage(payload);
        });
        return Promise.resolve(true);
      },
      isOpen: () => open,
      close() {
        open = false;
      },
    };

    const userId = new URL(url).searchParams.get("user_id") ?? "anonymous";
    const connected = manager.connect(serverSide, userId).then((id) => {
      sessionId = id;
    });
    pending.push(connected);

    return {
      send(text) {
        pending.push(connected.then(() => (sessionId ? manager.handleMessage(sessionId, text) : undefined)));
      },
      close() {
        open = false;
        if (sessionId) manager.disconnect(sessionId);
      },
      isOpen: () => open,
    };
  };

  async function settle(): Promise<void> {
    let seen = -1;
    while (seen !== pending.length) {
      seen = pending.length;
      await Promise.all(pending);
    }
    await flushMacrotasks();
  }

  return { socketFactory, settle };
}

interface ClientLog {
  events: string[];
  transcripts: string[];
  replies: string[];
  chunks: TtsChunk[];
  completedWith: number[];
  interruptedAfter: number[];
  acks: boolean[];
}

interface SetupOptions {
  recognizer?: SpeechRecognizer;
  onChunk?(chunk: TtsChunk, transport: SessionTransport): void;
}

function setup(options: SetupOptions = {}) {
  const { onChunk } = options;
  const recognizer = options.recognizer ?? createFakeRecognizer(TRANSCRIPT);
  const synthesizer = createFakeSynthesizer();
  const agent = createFakeAgent(REPLY);
  const manager = createSessionManager({
    handler: createStreamingHandler({
      recognizer,
      synthesizer,
      transcriptionTimeoutMs: 1000,
      synthesisTimeoutMs: 1000,
      chunkDurationMs: 100,
    }),
    agent,
    agentTimeoutMs: 1000,
    maxPendingUtterances: 1,
  });
  const bridge = createBridge(manager);

  const log: ClientLog = {
    events: [],
    transcripts: [],
    replies: [],
    chunks: [],
    completedWith: [],
    interruptedAfter: [],
    acks: [],
  };

  const transport: SessionTransport = createSessionTransport({
    userId: "listener-7",
    socketFactory: bridge.socketFactory,
    handlers: {
      onConnected: () => log.events.push("connected"),
      onTranscription(text) {
        log.events.push("transcription");
        log.transcripts.push(text);
      },
      onAgentResponse(text) {
        log.events.push("agent_response");
        log.replies.push(text);
      },
      onTtsChunk(chunk) {
        log.events.push("tts_chunk");
        log.chunks.push(chunk);
        onChunk?.(chunk, transport);
      },
      onStreamingComplete(total) {
        log.events.push("streaming_complete");
        log.completedWith.push(total);
      },
      onStreamingInterrupted(sent) {
        log.events.push("streaming_interrupted");
        log.interruptedAfter.push(sent);
      },
      onVoiceInterrupted(_reason, wasStreaming) {
        log.events.push("voice_interrupted");
        log.acks.push(wasStreaming);
      },
      onError: (error) => log.events.push(`error:${error.errorType}`),
    },
  });

  return { manager, recognizer, synthesizer, agent, transport, log, settle: bridge.settle };
}

// ============================================================================
// TESTS
// ============================================================================

test("a spoken question comes back as transcript, reply text, and ordered WAV chunks", async () => {
  const uploads: Uint8Array[] = [];
  const recognizer = createFakeRecognizer(async (wav) => {
    uploads.push(wav);
    return TRANSCRIPT;
  });
  const { manager, agent, transport, log, settle } = setup({ recognizer });

  const sessionId = await transport.connect(SERVER_URL);
  assert.equal(transport.sessionId(), sessionId);
  await settle();

  const snapshot = manager.getSession(sessionId);
  assert.ok(snapshot);
  assert.equal(snapshot.userId, "listener-7");

  const wav = encodeWav(toneSamples(2.5, 16000));
  assert.equal(wav.byteLength, 80044);
  assert.equal(transport.sendAudio(wav, sessionId), true);
  await settle();

  assert.equal(recognizer.calls, 1);
  assert.equal(uploads[0].length, 80044);
  assert.deepEqual(Buffer.from(uploads[0]), Buffer.from(wav));

  assert.deepEqual(log.events, [
    "connected",
    "transcription",
    "agent_response",
    "tts_chunk",
    "tts_chunk",
    "streaming_complete",
  ]);
  assert.deepEqual(log.transcripts, [TRANSCRIPT]);
  assert.deepEqual(log.replies, [REPLY]);
  assert.deepEqual(
    log.chunks.map((chunk) => chunk.chunkIndex),
    [0, 1]
  );
  assert.deepEqual(log.completedWith, [2]);

  const first = parseWav(log.chunks[0].audio);
  assert.equal(log.chunks[0].format, "wav");
  assert.equal(log.chunks[0].audio.length, 244);
  assert.equal(first.sampleRate, 1000);
  assert.equal(first.sampleCount, 100);

  assert.equal(agent.requests.length, 1);
  assert.equal(agent.requests[0].text, TRANSCRIPT);
});

test("speaking over the reply stops the stream after the chunk already heard", async () => {
  const { transport, synthesizer, log, settle } = setup({
    onChunk(chunk, client) {
      const sessionId = client.sessionId();
      if (chunk.chunkIndex === 0 && sessionId) client.sendInterrupt(sessionId);
    },
  });

  const sessionId = await transport.connect(SERVER_URL);
  transport.sendAudio(encodeWav(toneSamples(2.5, 16000)), sessionId);
  await settle();

  assert.deepEqual(log.events, [
    "connected",
    "transcription",
    "agent_response",
    "tts_chunk",
    "voice_interrupted",
    "streaming_interrupted",
  ]);
  assert.deepEqual(log.acks, [true]);
  assert.deepEqual(log.interruptedAfter, [1]);
  assert.equal(synthesizer.abortedRequests, 1);
});

test("the session answers again after an interrupted reply", async () => {
  let interrupted = false;
  const { transport, log, settle } = setup({
    onChunk(chunk, client) {
      const sessionId = client.sessionId();
      if (!interrupted && chunk.chunkIndex === 0 && sessionId) {
        interrupted = true;
        client.sendInterrupt(sessionId);
      }
    },
  });

  const sessionId = await transport.connect(SERVER_URL);
  transport.sendCommand(sessionId, "Ignore that");
  await settle();
  transport.sendCommand(sessionId, "Any news on oil?");
  await settle();

  assert.deepEqual(log.events.slice(6), ["transcription", "agent_response", "tts_chunk", "tts_chunk", "streaming_complete"]);
  assert.deepEqual(log.interruptedAfter, [1]);
  assert.deepEqual(log.completedWith, [2]);
});

test("closing the transport ends the server session", async () => {
  const { manager, transport, agent, settle } = setup();
  const sessionId = await transport.connect(SERVER_URL);
  await settle();
  assert.equal(manager.size(), 1);

  transport.close();

  assert.equal(manager.size(), 0);
  assert.equal(transport.isConnected(), false);
  assert.deepEqual(agent.forgotten, [sessionId]);
});
