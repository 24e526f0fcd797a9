/**
 * Session transport: the client end of the voice WebSocket.
 *
 * A session exists only once the server's `connected` event arrives;
 * connect() resolves with that session id, never earlier. Every inbound frame
 * is dispatched by its `event` field to the matching handler.
 *
 * Responsibilities:
 * - Open the socket with the user id and wait for the session id
 * - Send utterances as base64 WAV audio_chunk frames, plus interrupts and typed commands
 * - Validate inbound envelopes and dispatch them to handlers
 * - Report loss of the connection exactly once
 */

import { bytesToBase64, base64ToBytes } from "./base64.js";
import { ConnectionError } from "./errors.js";
import { readWavInfo } from "./wav-encoder.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Time allowed between opening the socket and receiving `connected` */
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

const DEFAULT_INTERRUPT_REASON = "user_interruption";

// ============================================================================
// INTERFACES
// ============================================================================

/** Socket events the transport listens to */
export interface SocketHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onError(): void;
  onClose(code: number, reason: string): void;
}

/** The socket operations the transport needs */
export interface TransportSocket {
  send(text: string): void;
  close(): void;
  isOpen(): boolean;
}

/** Opens a socket to `url` and reports its events to `handlers` */
export type SocketFactory = (url: string, handlers: SocketHandlers) => TransportSocket;

export interface TtsChunk {
  audio: Uint8Array;
  chunkIndex: number;
  format: string;
}

export interface ServerError {
  errorType: string;
  message: string;
}

/** Callbacks for inbound events; all optional */
export interface TransportHandlers {
  onConnected?(sessionId: string, message: string): void;
  onTranscription?(text: string, processingTimeMs: number): void;
  onAgentResponse?(text: string, processingTimeMs: number): void;
  onTtsChunk?(chunk: TtsChunk): void;
  onStreamingComplete?(totalChunks: number): void;
  onStreamingInterrupted?(chunksSent: number): void;
  /** The server acknowledged an interrupt */
  onVoiceInterrupted?(reason: string, wasStreaming: boolean): void;
  onError?(error: ServerError): void;
  /** An established session lost its connection */
  onDisconnected?(): void;
}

export interface SessionTransport {
  /**
   * Open the socket and wait for the session id.
   * @throws ConnectionError on socket error or close before `connected`, or on timeout
   */
  connect(url: string): Promise<string>;
  /** Send one utterance; false when not connected */
  sendAudio(wav: ArrayBuffer, sessionId: string, isFinal?: boolean): boolean;
  /** Ask the server to stop the reply in flight; false when not connected */
  sendInterrupt(sessionId: string, reason?: string): boolean;
  /** Send a typed command that skips transcription; false when not connected */
  sendCommand(sessionId: string, command: string): boolean;
  /** Close the socket without reporting a disconnect */
  close(): void;
  isConnected(): boolean;
  sessionId(): string | null;
}

export interface SessionTransportOptions {
  userId: string;
  handlers: TransportHandlers;
  socketFactory?: SocketFactory;
  connectTimeoutMs?: number;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create a session transport. No socket is opened until connect().
 *
 * @param options - User id, handlers, and socket factory
 * @returns A SessionTransport
 */
export function createSessionTransport(options: SessionTransportOptions): SessionTransport {
  const { userId, handlers } = options;
  const socketFactory = options.socketFactory ?? browserSocketFactory;
  const connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

  let socket: TransportSocket | null = null;
  let currentSessionId: string | null = null;
  /** Bumped on every connect and close; socket events from older generations are ignored */
  let generation = 0;
  let pendingConnect: { resolve(sessionId: string): void; reject(err: ConnectionError): void } | null = null;

  function connect(url: string): Promise<string> {
    teardown();
    const myGeneration = ++generation;

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        failConnect(new ConnectionError(`No session established within ${connectTimeoutMs}ms`));
      }, connectTimeoutMs);

      function failConnect(err: ConnectionError): void {
        if (pendingConnect === null || myGeneration !== generation) return;
        pendingConnect = null;
        clearTimeout(timer);
        console.error(`[voice-transport] ${err.message}`);
        teardown();
        reject(err);
      }

      pendingConnect = {
        resolve(sessionId) {
          pendingConnect = null;
          clearTimeout(timer);
          resolve(sessionId);
        },
        reject: failConnect,
      };

      const isCurrent = () => myGeneration === generation;

      try {
        socket = socketFactory(withUserId(url, userId), {
          onOpen: () => {
            if (isCurrent()) console.log("[voice-transport] socket open, waiting for session");
          },
          onMessage: (text) => {
            if (isCurrent()) handleMessage(text);
          },
          onError: () => {
            if (isCurrent()) handleSocketEnd("WebSocket error");
          },
          onClose: (code, reason) => {
            if (isCurrent()) handleSocketEnd(`WebSocket closed (${code}${reason ? `: ${reason}` : ""})`);
          },
        });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        failConnect(new ConnectionError(`Could not open WebSocket: ${message}`, { cause: err }));
      }
    });
  }

  /**
   * The socket failed or closed: fail a pending connect, or report a lost session.
   */
  function handleSocketEnd(reason: string): void {
    if (pendingConnect) {
      pendingConnect.reject(new ConnectionError(`${reason} before the session was established`));
      return;
    }

    const wasConnected = currentSessionId !== null;

    // Invalidate this socket's remaining events (error is usually followed by close)
    generation++;
    socket = null;
    currentSessionId = null;

    if (wasConnected) {
      console.warn(`[voice-transport] ${reason}, session lost`);
      handlers.onDisconnected?.();
    }
  }

  /**
   * Parse one inbound frame and dispatch it by event name.
   */
  function handleMessage(text: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      console.warn("[voice-transport] ignoring malformed frame");
      return;
    }

    const event = isRecord(parsed) ? parsed.event : undefined;
    const data = isRecord(parsed) ? parsed.data : undefined;
    if (typeof event !== "string" || !isRecord(data)) {
      console.warn("[voice-transport] ignoring frame without { event, data }");
      return;
    }

    switch (event) {
      case "connected": {
        const sessionId = readString(data, "session_id");
        if (!sessionId) return;
        currentSessionId = sessionId;
        console.log(`[voice-transport] session ${sessionId} established`);
        handlers.onConnected?.(sessionId, readString(data, "message"));
        pendingConnect?.resolve(sessionId);
        return;
      }

      case "transcription":
        handlers.onTranscription?.(readString(data, "text"), readNumber(data, "processing_time_ms"));
        return;

      case "agent_response":
        handlers.onAgentResponse?.(readString(data, "text"), readNumber(data, "processing_time_ms"));
        return;

      case "tts_chunk": {
        const payload = readString(data, "audio_chunk");
        let audio: Uint8Array;
        try {
          audio = base64ToBytes(payload);
        } catch {
          console.warn("[voice-transport] ignoring tts_chunk with invalid base64");
          return;
        }
        handlers.onTtsChunk?.({
          audio,
          chunkIndex: readNumber(data, "chunk_index"),
          format: readString(data, "format") || "wav",
        });
        return;
      }

      case "streaming_complete":
        handlers.onStreamingComplete?.(readNumber(data, "total_chunks"));
        return;

      case "streaming_interrupted":
        handlers.onStreamingInterrupted?.(readNumber(data, "chunks_sent"));
        return;

      case "voice_interrupted":
        handlers.onVoiceInterrupted?.(readString(data, "reason"), data.was_streaming === true);
        return;

      case "listening_started":
      case "listening_stopped":
        console.log(`[voice-transport] ${event}`);
        return;

      case "error":
        console.warn(`[voice-transport] server error ${readString(data, "error_type")}: ${readString(data, "message")}`);
        handlers.onError?.({ errorType: readString(data, "error_type"), message: readString(data, "message") });
        return;

      default:
        console.warn(`[voice-transport] ignoring unknown event "${event}"`);
    }
  }

  /**
   * Send one envelope if the session is up.
   */
  function sendEnvelope(event: string, data: Record<string, unknown>): boolean {
    if (!socket || !currentSessionId || !socket.isOpen()) return false;
    socket.send(JSON.stringify({ event, data }));
    return true;
  }

  function sendAudio(wav: ArrayBuffer, sessionId: string, isFinal = true): boolean {
    return sendEnvelope("audio_chunk", {
      session_id: sessionId,
      audio_chunk: bytesToBase64(new Uint8Array(wav)),
      format: "wav",
      sample_rate: readWavInfo(wav)?.sampleRate ?? 0,
      byte_length: wav.byteLength,
      is_final: isFinal,
      user_id: userId,
      timestamp: new Date().toISOString(),
    });
  }

  function sendInterrupt(sessionId: string, reason = DEFAULT_INTERRUPT_REASON): boolean {
    return sendEnvelope("interrupt", { session_id: sessionId, reason });
  }

  function sendCommand(sessionId: string, command: string): boolean {
    return sendEnvelope("voice_command", { session_id: sessionId, command });
  }

  /**
   * Drop the current socket without notifying handlers. A pending connect is
   * rejected first; its rejection path calls back into teardown.
   */
  function teardown(): void {
    if (pendingConnect) {
      pendingConnect.reject(new ConnectionError("Connection closed by the client"));
      return;
    }

    generation++;
    const closing = socket;
    socket = null;
    currentSessionId = null;
    closing?.close();
  }

  return {
    connect,
    sendAudio,
    sendInterrupt,
    sendCommand,
    close: teardown,
    isConnected: () => currentSessionId !== null,
    sessionId: () => currentSessionId,
  };
}

// ============================================================================
// BROWSER SOCKET
// ============================================================================

/**
 * SocketFactory over the browser WebSocket. Binary frames are ignored.
 */
export const browserSocketFactory: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);

  ws.onopen = () => handlers.onOpen();
  ws.onmessage = (event: MessageEvent<unknown>) => {
    if (typeof event.data === "string") handlers.onMessage(event.data);
  };
  ws.onerror = () => handlers.onError();
  ws.onclose = (event) => handlers.onClose(event.code, event.reason);

  return {
    send: (text) => ws.send(text),
    close() {
      ws.onopen = null;
      ws.onmessage = null;
      ws.onerror = null;
      ws.onclose = null;
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) ws.close();
    },
    isOpen: () => ws.readyState === WebSocket.OPEN,
  };
};

/**
 * Build the WebSocket URL for the current page (ws: on http, wss: on https).
 */
export function voiceSocketUrl(path = "/ws/voice"): string {
  const protocol = window.location.protocol === "http:" ? "ws:" : "wss:";
  return `${protocol}//${window.location.host}${path}`;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function withUserId(url: string, userId: string): string {
  const target = new URL(url);
  target.searchParams.set("user_id", userId);
  return target.toString();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(data: Record<string, unknown>, key: string): string {
  const value = data[key];
  return typeof value === "string" ? value : "";
}

function readNumber(data: Record<string, unknown>, key: string): number {
  const value = data[key];
  return typeof value === "number" ? value : 0;
}
