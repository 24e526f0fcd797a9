/**
 * Session manager: owns every live voice session and routes its messages.
 *
 * One session exists per WebSocket connection. Each session runs at most one
 * utterance pipeline (transcribe -> agent -> stream reply) at a time; further
 * utterances wait in a short per-session chain. Interrupts never wait: they flip
 * the session's flag, which the streaming loop checks before every chunk.
 *
 * States: connected -> listening -> transcribing -> responding -> streaming_reply
 *         -> (interrupted ->) listening. disconnected is terminal.
 *
 * Responsibilities:
 * - Allocate session ids and send the `connected` event
 * - Validate inbound frames and drop those for unknown or foreign sessions
 * - Run utterance pipelines one at a time per session
 * - Own the isStreaming / interruptRequested flags and reset them on every exit path
 * - Convert collaborator failures into `error` events
 * - Expose read-only session snapshots for status routes
 */

import { randomUUID } from "crypto";

import { AgentFailure, InvalidAudioFormat, SessionNotFound, VoiceError, describeError } from "./errors.js";
import { connectedEvent, decodeAudioPayload, errorEvent, nowIso, parseClientMessage, serializeEvent } from "./protocol.js";
import { withTimeout } from "./timeout.js";
import { parseWav } from "./wav.js";

import type { AgentAdapter } from "./agent-adapter.js";
import type { StreamControl, StreamingHandler } from "./streaming-handler.js";
import type { AudioChunkData, ErrorType, ServerEvent, SessionSnapshot, SessionStatus, StreamOutcome } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Text of the `connected` event */
const CONNECTED_MESSAGE = "Connected to Voice News Agent";

/** Allowed status transitions; anything else is logged */
const ALLOWED_TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  connected: ["listening"],
  listening: ["transcribing", "responding"],
  transcribing: ["responding", "listening"],
  responding: ["streaming_reply", "listening"],
  streaming_reply: ["interrupted", "listening"],
  interrupted: ["listening"],
  disconnected: [],
};

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * The transport a session writes to. Implemented over a `ws` WebSocket in
 * production and by in-memory fakes in tests.
 */
export interface SessionSocket {
  /**
   * Send one text frame.
   * @returns Resolves true once flushed, false if the socket was closed (never rejects)
   */
  send(payload: string): Promise<boolean>;
  /** False once the socket has closed */
  isOpen(): boolean;
  /** Close the socket */
  close(code?: number, reason?: string): void;
}

export interface SessionManagerConfig {
  handler: StreamingHandler;
  agent: AgentAdapter;
  /** Budget for one agent reply */
  agentTimeoutMs: number;
  /** Utterances allowed to wait behind the running one */
  maxPendingUtterances: number;
}

export interface SessionManager {
  /**
   * Register a new connection and send it the `connected` event.
   * @returns The new session id
   */
  connect(socket: SessionSocket, userId: string): Promise<string>;
  /**
   * Handle one inbound text frame from the connection that owns `sessionId`.
   * Resolves when the message (and any pipeline it started) has been handled.
   */
  handleMessage(sessionId: string, raw: string): Promise<void>;
  /** Remove a session; in-flight work for it stops at its next checkpoint */
  disconnect(sessionId: string): void;
  getSession(sessionId: string): SessionSnapshot | null;
  findSessionByUser(userId: string): SessionSnapshot | null;
  listSessions(): SessionSnapshot[];
  size(): number;
}

// ============================================================================
// TYPES
// ============================================================================

/** Mutable per-session record, never exposed outside this module */
interface LiveSession {
  id: string;
  userId: string;
  socket: SessionSocket;
  createdAt: Date;
  status: SessionStatus;
  isStreaming: boolean;
  interruptRequested: boolean;
  /** Tail of this session's pipeline chain */
  pipeline: Promise<void>;
  /** Running plus waiting utterances */
  queuedUtterances: number;
  totalCommands: number;
  totalInterruptions: number;
}

/** One unit of work for the pipeline */
type UtteranceJob =
  | { kind: "audio"; wav: Buffer; format: string; sampleRate: number; durationMs: number }
  | { kind: "command"; text: string };

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create a session manager.
 *
 * @param config - Streaming handler, agent, and pipeline limits
 * @returns A SessionManager
 */
export function createSessionManager(config: SessionManagerConfig): SessionManager {
  const { handler, agent, agentTimeoutMs, maxPendingUtterances } = config;
  const sessions = new Map<string, LiveSession>();

  // --------------------------------------------------------------------------
  // Connection lifecycle
  // --------------------------------------------------------------------------

  async function connect(socket: SessionSocket, userId: string): Promise<string> {
    const session: LiveSession = {
      id: randomUUID(),
      userId,
      socket,
      createdAt: new Date(),
      status: "connected",
      isStreaming: false,
      interruptRequested: false,
      pipeline: Promise.resolve(),
      queuedUtterances: 0,
      totalCommands: 0,
      totalInterruptions: 0,
    };

    sessions.set(session.id, session);
    console.log(`[session-manager] session ${session.id} connected (user ${userId}, ${sessions.size} active)`);

    await sendEvent(session, connectedEvent(session.id, CONNECTED_MESSAGE));
    setStatus(session, "listening");

    return session.id;
  }

  function disconnect(sessionId: string): void {
    const session = sessions.get(sessionId);
    if (!session) return;

    sessions.delete(sessionId);
    session.status = "disconnected";
    agent.forget(sessionId);

    console.log(
      `[session-manager] session ${sessionId} disconnected ` +
      `(${session.totalCommands} commands, ${session.totalInterruptions} interruptions, ${sessions.size} active)`
    );
  }

  // --------------------------------------------------------------------------
  // Message dispatch
  // --------------------------------------------------------------------------

  async function handleMessage(sessionId: string, raw: string): Promise<void> {
    const parsed = parseClientMessage(raw);
    if (!parsed.ok) {
      console.warn(`[session-manager] dropped message on ${sessionId}: ${parsed.reason}`);
      return;
    }

    const { message } = parsed;
    const session = sessions.get(message.data.session_id);

    // A connection may only act on its own session
    if (!session || message.data.session_id !== sessionId) {
      const notFound = new SessionNotFound(message.data.session_id);
      console.warn(`[session-manager] dropped ${message.event} on ${sessionId}: ${notFound.message}`);
      return;
    }

    switch (message.event) {
      case "interrupt":
        return handleInterrupt(session, message.data.reason);

      case "audio_chunk":
        return handleAudioChunk(session, message.data);

      case "voice_command":
        return enqueueUtterance(session, { kind: "command", text: message.data.command });

      case "start_listening":
        await sendEvent(session, { event: "listening_started", data: { session_id: session.id, timestamp: nowIso() } });
        return;

      case "stop_listening":
        await sendEvent(session, { event: "listening_stopped", data: { session_id: session.id, timestamp: nowIso() } });
        return;
    }
  }

  /**
   * Flag the in-flight stream (if any) and acknowledge. The flag is set before
   * the first await so a pipeline mid-send sees it at its next chunk.
   */
  async function handleInterrupt(session: LiveSession, reason: string): Promise<void> {
    const wasStreaming = session.isStreaming;
    if (wasStreaming) session.interruptRequested = true;
    session.totalInterruptions++;

    console.log(`[session-manager] ${session.id}: interrupt (${reason})${wasStreaming ? "" : ", nothing streaming"}`);

    await sendEvent(session, {
      event: "voice_interrupted",
      data: { session_id: session.id, reason, was_streaming: wasStreaming, timestamp: nowIso() },
    });
  }

  /**
   * Validate an uploaded utterance and queue it. Invalid audio is reported
   * before anything reaches the recognizer; a 0-sample WAV is ignored.
   */
  async function handleAudioChunk(session: LiveSession, data: AudioChunkData): Promise<void> {
    let job: UtteranceJob;

    try {
      if (data.format !== "wav") throw new InvalidAudioFormat(`Unsupported audio format: ${data.format}`);

      const wav = decodeAudioPayload(data.audio_chunk);
      const info = parseWav(wav);

      if (info.sampleCount === 0) {
        console.log(`[session-manager] ${session.id}: empty utterance ignored`);
        return;
      }
      if (data.sample_rate && data.sample_rate !== info.sampleRate) {
        console.warn(
          `[session-manager] ${session.id}: sample_rate ${data.sample_rate} disagrees with WAV header ${info.sampleRate}, using header`
        );
      }

      job = { kind: "audio", wav, format: data.format, sampleRate: info.sampleRate, durationMs: info.durationMs };
    } catch (err) {
      if (!(err instanceof InvalidAudioFormat)) throw err;
      console.warn(`[session-manager] ${session.id}: ${err.message}`);
      await sendEvent(session, errorEvent(session.id, "invalid_audio_format", err.message));
      return;
    }

    return enqueueUtterance(session, job);
  }

  // --------------------------------------------------------------------------
  // Pipeline
  // --------------------------------------------------------------------------

  /**
   * Chain an utterance behind the session's running pipeline, or reject it if
   * the chain is full.
   */
  async function enqueueUtterance(session: LiveSession, job: UtteranceJob): Promise<void> {
    if (session.queuedUtterances > maxPendingUtterances) {
      console.warn(`[session-manager] ${session.id}: pipeline busy, utterance rejected`);
      await sendEvent(
        session,
        errorEvent(session.id, "pipeline_busy", "Still answering the previous request, please try again in a moment")
      );
      return;
    }

    session.queuedUtterances++;
    session.totalCommands++;

    const run = session.pipeline
      .then(() => runPipeline(session, job))
      .catch((err) => {
        console.error(`[session-manager] ${session.id}: pipeline crashed: ${describeError(err)}`);
      })
      .finally(() => {
        session.queuedUtterances--;
      });

    session.pipeline = run;
    return run;
  }

  /**
   * transcribe -> transcription event -> agent -> agent_response -> stream reply.
   * Every failure becomes an `error` event and the session returns to listening.
   */
  async function runPipeline(session: LiveSession, job: UtteranceJob): Promise<void> {
    if (!isLive(session)) return;

    try {
      const t0 = Date.now();
      let transcript: string;

      if (job.kind === "audio") {
        setStatus(session, "transcribing");
        console.log(`[session-manager] ${session.id}: transcribing ${Math.round(job.durationMs)}ms of audio`);

        try {
          transcript = await handler.transcribe(job.wav, job.format, job.sampleRate);
        } catch (err) {
          await reportFailure(session, err, "transcription_failed");
          return;
        }
      } else {
        transcript = job.text;
      }

      if (!isLive(session)) return;
      await sendEvent(session, {
        event: "transcription",
        data: { text: transcript, session_id: session.id, processing_time_ms: Date.now() - t0 },
      });

      // Agent
      setStatus(session, "responding");
      const t1 = Date.now();
      let reply: string;

      try {
        reply = await requestReply(session, transcript);
      } catch (err) {
        await reportFailure(session, err, "agent_failed");
        return;
      }

      if (!isLive(session)) return;
      await sendEvent(session, {
        event: "agent_response",
        data: { text: reply, session_id: session.id, processing_time_ms: Date.now() - t1 },
      });

      // Stream
      const outcome = await streamReply(session, reply);
      if (outcome === "interrupted") setStatus(session, "interrupted");
    } finally {
      if (isLive(session)) setStatus(session, "listening");
    }
  }

  /**
   * Ask the agent for a reply under the agent timeout; the request is aborted when the timer wins.
   * @throws AgentFailure on error, timeout, or an empty reply
   */
  async function requestReply(session: LiveSession, transcript: string): Promise<string> {
    const controller = new AbortController();
    let reply: string;
    try {
      reply = await withTimeout(
        agent.respond({ text: transcript, userId: session.userId, sessionId: session.id, signal: controller.signal }),
        agentTimeoutMs,
        "agent",
        controller
      );
    } catch (err) {
      throw new AgentFailure(`Agent failed: ${describeError(err)}`, { cause: err });
    }

    const trimmed = reply.trim();
    if (!trimmed) throw new AgentFailure("Agent returned an empty reply");
    return trimmed;
  }

  /**
   * Run one TTS stream with the session's streaming flags held for its duration.
   */
  async function streamReply(session: LiveSession, reply: string): Promise<StreamOutcome> {
    session.interruptRequested = false;
    session.isStreaming = true;
    setStatus(session, "streaming_reply");

    const control: StreamControl = {
      interruptRequested: () => session.interruptRequested,
      clearInterrupt: () => {
        session.interruptRequested = false;
      },
      isOpen: () => isLive(session),
    };

    try {
      return await handler.streamReply(session.id, reply, (event) => sendEvent(session, event), control);
    } finally {
      session.isStreaming = false;
      session.interruptRequested = false;
    }
  }

  // --------------------------------------------------------------------------
  // Helpers bound to the session map
  // --------------------------------------------------------------------------

  /** A session is live while it is in the map and its socket is open */
  function isLive(session: LiveSession): boolean {
    return sessions.get(session.id) === session && session.socket.isOpen();
  }

  /**
   * Send an event to a session's socket.
   * @returns false if the socket was already closed
   */
  async function sendEvent(session: LiveSession, event: ServerEvent): Promise<boolean> {
    if (!session.socket.isOpen()) return false;
    return session.socket.send(serializeEvent(event));
  }

  /**
   * Send the `error` event for a failed pipeline step.
   */
  async function reportFailure(session: LiveSession, err: unknown, fallbackType: ErrorType): Promise<void> {
    const errorType = err instanceof VoiceError && err.errorType ? err.errorType : fallbackType;
    const message = describeError(err);

    console.error(`[session-manager] ${session.id}: ${errorType}: ${message}`);
    await sendEvent(session, errorEvent(session.id, errorType, message));
  }

  /**
   * Move a session to a new status, logging unexpected transitions.
   */
  function setStatus(session: LiveSession, next: SessionStatus): void {
    const from = session.status;
    if (from === next || from === "disconnected") return;

    if (!ALLOWED_TRANSITIONS[from].includes(next)) {
      console.warn(`[session-manager] ${session.id}: unexpected transition ${from} -> ${next}`);
    }
    session.status = next;
  }

  // --------------------------------------------------------------------------
  // Read-only queries
  // --------------------------------------------------------------------------

  function getSession(sessionId: string): SessionSnapshot | null {
    const session = sessions.get(sessionId);
    return session ? toSnapshot(session) : null;
  }

  function findSessionByUser(userId: string): SessionSnapshot | null {
    for (const session of sessions.values()) {
      if (session.userId === userId) return toSnapshot(session);
    }
    return null;
  }

  function listSessions(): SessionSnapshot[] {
    return [...sessions.values()].map(toSnapshot);
  }

  return {
    connect,
    handleMessage,
    disconnect,
    getSession,
    findSessionByUser,
    listSessions,
    size: () => sessions.size,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/** Copy the public fields of a live session */
function toSnapshot(session: LiveSession): SessionSnapshot {
  return {
    sessionId: session.id,
    userId: session.userId,
    status: session.status,
    createdAt: session.createdAt.toISOString(),
    isStreaming: session.isStreaming,
    interruptRequested: session.interruptRequested,
    totalCommands: session.totalCommands,
    totalInterruptions: session.totalInterruptions,
  };
}
