/**
 * Error taxonomy for the voice pipeline.
 *
 * Every failure that reaches a client is one of these classes. Each carries the
 * `error_type` string it is reported under in an `error` event.
 */

import type { ErrorType } from "./types.js";

// ============================================================================
// BASE CLASS
// ============================================================================

/**
 * Base class for pipeline errors. `errorType` is null for errors that are never
 * sent to the client (dropped messages).
 */
export class VoiceError extends Error {
  readonly errorType: ErrorType | null;

  constructor(message: string, errorType: ErrorType | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.errorType = errorType;
  }
}

// ============================================================================
// ERROR CLASSES
// ============================================================================

/** ASR unreachable, timed out, or returned no usable text */
export class TranscriptionUnavailable extends VoiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "transcription_failed", options);
  }
}

/** TTS failed or stalled while a reply was streaming */
export class SynthesisFailure extends VoiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "synthesis_failed", options);
  }
}

/** Agent failed, timed out, or returned an empty reply */
export class AgentFailure extends VoiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "agent_failed", options);
  }
}

/** Inbound audio failed format or WAV header validation */
export class InvalidAudioFormat extends VoiceError {
  constructor(message: string) {
    super(message, "invalid_audio_format");
  }
}

/** Message referenced a session id that is not live on this connection */
export class SessionNotFound extends VoiceError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session not found: ${sessionId || "(missing)"}`, null);
    this.sessionId = sessionId;
  }
}

/** A collaborator call exceeded its time budget */
export class CollaboratorTimeout extends VoiceError {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, null);
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Extract a printable message from an unknown thrown value.
 *
 * @param err - Anything caught in a catch block
 * @returns The error message, or the value stringified
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
