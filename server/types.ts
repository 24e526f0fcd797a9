/**
 * Shared types for the voice session server.
 *
 * Defines the DTOs and interfaces used across the server modules:
 * - Server configuration (timeouts, limits, provider settings)
 * - Session status and session snapshots
 * - Wire envelope shapes for client and server events
 * - Provider readiness status
 */

// ============================================================================
// CONFIGURATION INTERFACES
// ============================================================================

/**
 * Top-level configuration for the voice server.
 * Built by `loadServerConfig` from the environment.
 */
export interface ServerConfig {
  /** HTTP/WebSocket listen port */
  port: number;
  /** Listen address */
  host: string;
  /** Upgrades beyond this many live sessions are refused */
  maxConnections: number;
  /** Interval between ws pings in milliseconds */
  heartbeatIntervalMs: number;
  /** Timeouts for collaborator calls */
  timeouts: CollaboratorTimeouts;
  /** Duration of audio carried by one tts_chunk event, in milliseconds */
  ttsChunkMs: number;
  /** Utterances allowed to wait behind the running pipeline of a session */
  maxPendingUtterances: number;
  /** Speech-to-text provider settings */
  stt: SttProviderConfig;
  /** Text-to-speech provider settings */
  tts: TtsProviderConfig;
  /** Agent (LLM) settings */
  agent: AgentConfig;
}

/**
 * Upper bounds on each external collaborator call, in milliseconds.
 */
export interface CollaboratorTimeouts {
  /** One transcription request */
  transcriptionMs: number;
  /** One agent reply */
  agentMs: number;
  /** Wait for the next piece of synthesized audio */
  synthesisMs: number;
}

/** Supported STT provider identifiers */
export type SttProviderType = "elevenlabs";

/** Supported TTS provider identifiers */
export type TtsProviderType = "elevenlabs";

export interface SttProviderConfig {
  provider: SttProviderType;
  elevenlabs: {
    apiKey: string;
    modelId: string;
  };
}

export interface TtsProviderConfig {
  provider: TtsProviderType;
  elevenlabs: {
    apiKey: string;
    voiceId: string;
    modelId: string;
  };
}

export interface AgentConfig {
  /** Anthropic API key (empty when not configured) */
  apiKey: string;
  /** Anthropic model ID */
  model: string;
}

/**
 * Readiness of an external provider, reported by /health.
 */
export interface ProviderStatus {
  ready: boolean;
  reason?: "missing_api_key";
  detail?: string;
}

// ============================================================================
// SESSION TYPES
// ============================================================================

/**
 * Lifecycle status of one session.
 *
 * connected -> listening -> transcribing -> responding -> streaming_reply -> listening,
 * or streaming_reply -> interrupted -> listening. disconnected is terminal.
 */
export type SessionStatus =
  | "connected"
  | "listening"
  | "transcribing"
  | "responding"
  | "streaming_reply"
  | "interrupted"
  | "disconnected";

/**
 * Read-only copy of a session's state, safe to hand to routes and tests.
 */
export interface SessionSnapshot {
  sessionId: string;
  userId: string;
  status: SessionStatus;
  createdAt: string;
  isStreaming: boolean;
  interruptRequested: boolean;
  totalCommands: number;
  totalInterruptions: number;
}

/** Terminal result of one TTS stream */
export type StreamOutcome = "complete" | "interrupted" | "closed" | "failed";

// ============================================================================
// WIRE TYPES
// ============================================================================

/** Generic `{ event, data }` envelope carried in every text frame */
export interface Envelope<E extends string = string, D = Record<string, unknown>> {
  event: E;
  data: D;
}

/** `audio_chunk` payload sent by the client after each VAD flush */
export interface AudioChunkData {
  session_id: string;
  audio_chunk: string;
  format: string;
  sample_rate: number;
  is_final: boolean;
  user_id?: string;
  byte_length?: number;
  timestamp?: string;
}

/** `interrupt` payload sent by the client on barge-in */
export interface InterruptData {
  session_id: string;
  reason: string;
}

/** `voice_command` payload: a typed command that skips transcription */
export interface VoiceCommandData {
  session_id: string;
  command: string;
}

/** Client events the server understands, after validation */
export type ClientMessage =
  | Envelope<"audio_chunk", AudioChunkData>
  | Envelope<"interrupt", InterruptData>
  | Envelope<"voice_command", VoiceCommandData>
  | Envelope<"start_listening", { session_id: string }>
  | Envelope<"stop_listening", { session_id: string }>;

/** Machine-readable error categories carried in `error` events */
export type ErrorType =
  | "transcription_failed"
  | "agent_failed"
  | "synthesis_failed"
  | "invalid_audio_format"
  | "pipeline_busy";

/** Events the server sends to the client */
export type ServerEvent =
  | Envelope<"connected", { session_id: string; message: string; timestamp: string }>
  | Envelope<"transcription", { text: string; session_id: string; processing_time_ms: number }>
  | Envelope<"agent_response", { text: string; session_id: string; processing_time_ms: number }>
  | Envelope<"tts_chunk", { audio_chunk: string; chunk_index: number; format: "wav"; session_id: string }>
  | Envelope<"streaming_complete", { session_id: string; total_chunks: number }>
  | Envelope<"streaming_interrupted", { session_id: string; chunks_sent: number }>
  | Envelope<"voice_interrupted", { session_id: string; reason: string; was_streaming: boolean; timestamp: string }>
  | Envelope<"listening_started", { session_id: string; timestamp: string }>
  | Envelope<"listening_stopped", { session_id: string; timestamp: string }>
  | Envelope<"error", { error_type: ErrorType; message: string; session_id: string }>;

/** Name of any server event */
export type ServerEventName = ServerEvent["event"];
