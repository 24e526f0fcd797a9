/**
 * JSON envelope codec for the voice WebSocket.
 *
 * Every frame is a text message `{ "event": string, "data": { ... } }`. Inbound
 * frames are validated field by field into a ClientMessage; anything that does
 * not fit is reported as a ParseFailure and dropped by the caller.
 *
 * Responsibilities:
 * - Parse and validate client frames (audio_chunk, interrupt, voice_command, listening toggles)
 * - Build server events with consistent timestamps
 * - Decode base64 audio payloads strictly
 */

import { InvalidAudioFormat } from "./errors.js";

import type { ClientMessage, ErrorType, ServerEvent } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Reason recorded when an interrupt frame carries none */
const DEFAULT_INTERRUPT_REASON = "user_interruption";

/** Standard base64 alphabet with optional padding */
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

// ============================================================================
// TYPES
// ============================================================================

/** Result of parsing one inbound frame */
export type ParseResult =
  | { ok: true; message: ClientMessage }
  | { ok: false; reason: string; sessionId: string | null };

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Parse and validate one inbound text frame.
 *
 * @param raw - Frame contents
 * @returns The validated message, or the reason it was rejected
 */
export function parseClientMessage(raw: string): ParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, reason: "invalid JSON", sessionId: null };
  }

  const event = isRecord(parsed) ? parsed.event : undefined;
  const data = isRecord(parsed) ? parsed.data : undefined;

  if (typeof event !== "string" || !isRecord(data)) {
    return { ok: false, reason: "frame is not an { event, data } envelope", sessionId: null };
  }

  const sessionId = typeof data.session_id === "string" ? data.session_id : null;

  if (!sessionId) {
    return { ok: false, reason: `${event} without session_id`, sessionId: null };
  }

  switch (event) {
    case "audio_chunk": {
      if (typeof data.audio_chunk !== "string") {
        return { ok: false, reason: "audio_chunk without audio_chunk payload", sessionId };
      }
      return {
        ok: true,
        message: {
          event,
          data: {
            session_id: sessionId,
            audio_chunk: data.audio_chunk,
            format: typeof data.format === "string" ? data.format : "wav",
            sample_rate: typeof data.sample_rate === "number" ? data.sample_rate : 0,
            is_final: data.is_final !== false,
            user_id: typeof data.user_id === "string" ? data.user_id : undefined,
            byte_length: typeof data.byte_length === "number" ? data.byte_length : undefined,
            timestamp: typeof data.timestamp === "string" ? data.timestamp : undefined,
          },
        },
      };
    }

    case "interrupt":
      return {
        ok: true,
        message: {
          event,
          data: {
            session_id: sessionId,
            reason: typeof data.reason === "string" && data.reason ? data.reason : DEFAULT_INTERRUPT_REASON,
          },
        },
      };

    case "voice_command": {
      const command = typeof data.command === "string" ? data.command.trim() : "";
      if (!command) return { ok: false, reason: "voice_command without command text", sessionId };
      return { ok: true, message: { event, data: { session_id: sessionId, command } } };
    }

    case "start_listening":
    case "stop_listening":
      return { ok: true, message: { event, data: { session_id: sessionId } } };

    default:
      return { ok: false, reason: `unknown event "${event}"`, sessionId };
  }
}

/**
 * Decode a base64 audio payload. Rejects anything outside the base64 alphabet
 * rather than letting Buffer.from skip invalid characters.
 *
 * @param payload - base64 text
 * @returns Decoded bytes
 * @throws InvalidAudioFormat on an empty or malformed payload
 */
export function decodeAudioPayload(payload: string): Buffer {
  const compact = payload.replace(/\s+/g, "");
  if (!compact || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new InvalidAudioFormat("audio_chunk is not valid base64");
  }
  return Buffer.from(compact, "base64");
}

/**
 * Serialize a server event for sending.
 *
 * @param event - The event to send
 * @returns JSON text frame
 */
export function serializeEvent(event: ServerEvent): string {
  return JSON.stringify(event);
}

// ============================================================================
// EVENT BUILDERS
// ============================================================================

/** Current time as an ISO-8601 string */
export function nowIso(): string {
  return new Date().toISOString();
}

export function connectedEvent(sessionId: string, message: string): ServerEvent {
  return { event: "connected", data: { session_id: sessionId, message, timestamp: nowIso() } };
}

export function errorEvent(sessionId: string, errorType: ErrorType, message: string): ServerEvent {
  return { event: "error", data: { error_type: errorType, message, session_id: sessionId } };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/** Narrow an unknown value to a plain object */
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
