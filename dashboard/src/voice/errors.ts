/**
 * Client-side voice errors.
 */

/** The voice WebSocket could not be established or was lost before a session id arrived */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

/** No usable microphone: no live audio track, or the capture graph could not be built */
export class MicrophoneUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MicrophoneUnavailableError";
  }
}
