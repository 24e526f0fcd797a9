/**
 * Voice controller: ties the transport, recorder, VAD, and playback queue
 * into one hands-free conversation.
 *
 * The controller owns the conversation state (idle -> connecting -> listening
 * <-> speaking) and is the only place where a VAD decision turns into a
 * network message. React reads it through useVoiceSession.
 *
 * Responsibilities:
 * - Connect, then start the microphone and VAD once the session id arrives
 * - Send each flushed utterance as WAV and play reply chunks in order
 * - On barge-in, stop playback, tell the server, and drop the old reply's late chunks
 * - Release the microphone, audio, and socket on stop or connection loss
 */

import type { PlaybackHooks, PlaybackQueue } from "./playback-queue.js";
import type { CaptureStream, Recorder } from "./recorder.js";
import type { SessionTransport, TransportHandlers } from "./transport.js";
import type { VadClock, VoiceActivityDetector } from "./vad.js";
import type { VadConfig } from "./voice-settings.js";

import { createVoiceActivityDetector } from "./vad.js";
import { DEFAULT_VAD_CONFIG, PRE_ROLL_MS } from "./voice-settings.js";

// ============================================================================
// TYPES
// ============================================================================

export type VoiceState = "idle" | "connecting" | "listening" | "speaking";

export type VoiceAction =
  | { type: "start" }
  | { type: "session_established" }
  | { type: "reply_audio" }
  | { type: "reply_finished" }
  | { type: "interrupted" }
  | { type: "stopped" };

export interface VoiceSnapshot {
  state: VoiceState;
  sessionId: string | null;
  lastTranscript: string;
  lastReply: string;
  error: string | null;
  /** Bumped on every reported error, so a repeated message still counts as new */
  errorId: number;
}

export interface VoiceControllerDeps {
  url: string;
  vadConfig?: VadConfig;
  requestMicrophone(): Promise<CaptureStream>;
  recorder: Recorder;
  createPlayback(hooks: PlaybackHooks): PlaybackQueue;
  openTransport(handlers: TransportHandlers): SessionTransport;
  clock?: VadClock;
  /** Called after every snapshot change */
  onChange?(snapshot: VoiceSnapshot): void;
}

export interface VoiceController {
  /** Connect and start listening; false if already running or setup failed (see snapshot.error) */
  start(): Promise<boolean>;
  stop(): Promise<void>;
  /** Send typed text in place of speech; false when there is no session */
  sendCommand(text: string): boolean;
  /** Use a new VAD config; applied immediately when listening */
  setVadConfig(config: VadConfig): void;
  getSnapshot(): VoiceSnapshot;
}

// ============================================================================
// STATE MACHINE
// ============================================================================

/**
 * Pure state transition. Actions that do not apply to the current state
 * leave it unchanged.
 */
export function nextVoiceState(state: VoiceState, action: VoiceAction): VoiceState {
  switch (action.type) {
    case "start":
      return state === "idle" ? "connecting" : state;
    case "session_established":
      return state === "connecting" ? "listening" : state;
    case "reply_audio":
      return state === "listening" ? "speaking" : state;
    case "reply_finished":
    case "interrupted":
      return state === "speaking" ? "listening" : state;
    case "stopped":
      return "idle";
  }
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create a voice controller. Nothing is opened until start().
 *
 * @param deps - Transport, recorder, and playback factories plus the server URL
 * @returns A VoiceController in the idle state
 */
export function createVoiceController(deps: VoiceControllerDeps): VoiceController {
  let snapshot: VoiceSnapshot = {
    state: "idle",
    sessionId: null,
    lastTranscript: "",
    lastReply: "",
    error: null,
    errorId: 0,
  };
  let vadConfig = deps.vadConfig ?? DEFAULT_VAD_CONFIG;

  let transport: SessionTransport | null = null;
  let playback: PlaybackQueue | null = null;
  let detector: VoiceActivityDetector | null = null;
  /** Bumped by every start and stop; a start that sees a newer run gives up */
  let run = 0;
  /** The server is still streaming the current reply */
  let replyStreaming = false;
  /** Chunks still arriving for a reply the user talked over */
  let discardingReply = false;

  function update(patch: Partial<VoiceSnapshot>): void {
    snapshot = { ...snapshot, ...patch };
    deps.onChange?.(snapshot);
  }

  function reportError(message: string): void {
    update({ error: message, errorId: snapshot.errorId + 1 });
  }

  function dispatch(action: VoiceAction): void {
    const state = nextVoiceState(snapshot.state, action);
    if (state !== snapshot.state) update({ state });
  }

  // ==========================================================================
  // Transport events
  // ==========================================================================

  const transportHandlers: TransportHandlers = {
    onConnected(sessionId) {
      update({ sessionId, error: null });
      dispatch({ type: "session_established" });
    },
    onTranscription(text) {
      discardingReply = false;
      update({ lastTranscript: text });
    },
    onAgentResponse(text) {
      update({ lastReply: text });
    },
    onTtsChunk(chunk) {
      if (discardingReply || !playback) return;
      replyStreaming = true;
      playback.enqueue(chunk.audio);
      dispatch({ type: "reply_audio" });
    },
    onStreamingComplete() {
      discardingReply = false;
      replyStreaming = false;
      if (!playback?.isPlaying()) dispatch({ type: "reply_finished" });
    },
    onStreamingInterrupted() {
      discardingReply = false;
      replyStreaming = false;
    },
    onVoiceInterrupted(_reason, wasStreaming) {
      if (!wasStreaming) discardingReply = false;
    },
    onError(error) {
      reportError(error.message);
      // The server ends the stream after a synthesis failure without streaming_complete
      if (error.errorType === "synthesis_failed") {
        replyStreaming = false;
        discardingReply = false;
        if (!playback?.isPlaying()) dispatch({ type: "reply_finished" });
      }
    },
    onDisconnected() {
      reportError("Connection to the voice server was lost");
      void shutdown();
    },
  };

  // ==========================================================================
  // VAD hooks
  // ==========================================================================

  function handleFlush(): void {
    const wav = deps.recorder.flush();
    const sessionId = snapshot.sessionId;
    if (!wav || !sessionId || !transport) return;
    transport.sendAudio(wav, sessionId);
  }

  function handleInterrupt(): void {
    playback?.stopAndClear();
    if (replyStreaming) discardingReply = true;
    replyStreaming = false;
    dispatch({ type: "interrupted" });

    const sessionId = snapshot.sessionId;
    if (sessionId && transport) transport.sendInterrupt(sessionId);
  }

  function startDetector(): void {
    detector?.stop();
    detector = createVoiceActivityDetector({
      config: vadConfig,
      levels: deps.recorder,
      utterance: deps.recorder,
      hooks: {
        isPlaybackActive: () => snapshot.state === "speaking",
        onFlush: handleFlush,
        onInterrupt: handleInterrupt,
        onIdleSilence: () => deps.recorder.retainTail(PRE_ROLL_MS),
      },
      clock: deps.clock,
    });
    detector.start();
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async function start(): Promise<boolean> {
    if (snapshot.state !== "idle") return false;

    const myRun = ++run;
    dispatch({ type: "start" });
    update({ error: null, lastTranscript: "", lastReply: "" });

    try {
      playback = deps.createPlayback({
        onIdle: () => {
          if (!replyStreaming) dispatch({ type: "reply_finished" });
        },
      });
      transport = deps.openTransport(transportHandlers);
      await transport.connect(deps.url);
      if (myRun !== run) return false;

      const stream = await deps.requestMicrophone();
      if (myRun !== run) {
        stream.getTracks().forEach((track) => track.stop());
        return false;
      }
      await deps.recorder.start(stream);
      if (myRun !== run) {
        await deps.recorder.stop();
        return false;
      }

      startDetector();
      console.log(`[voice] listening in session ${snapshot.sessionId ?? "?"}`);
      return true;
    } catch (err) {
      if (myRun !== run) return false;
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[voice] could not start: ${message}`);
      reportError(message);
      await shutdown();
      return false;
    }
  }

  /**
   * Release everything this run opened and return to idle.
   */
  async function shutdown(): Promise<void> {
    run++;
    detector?.stop();
    detector = null;
    playback?.stopAndClear();
    playback = null;
    transport?.close();
    transport = null;
    replyStreaming = false;
    discardingReply = false;

    try {
      if (deps.recorder.isRecording()) await deps.recorder.stop();
    } catch (err) {
      console.error(`[voice] error releasing microphone: ${err instanceof Error ? err.message : String(err)}`);
    }

    update({ sessionId: null });
    dispatch({ type: "stopped" });
  }

  function sendCommand(text: string): boolean {
    const command = text.trim();
    const sessionId = snapshot.sessionId;
    if (!command || !sessionId || !transport) return false;
    return transport.sendCommand(sessionId, command);
  }

  function setVadConfig(config: VadConfig): void {
    vadConfig = config;
    if (detector?.isRunning()) startDetector();
  }

  return {
    start,
    stop: shutdown,
    sendCommand,
    setVadConfig,
    getSnapshot: () => snapshot,
  };
}
