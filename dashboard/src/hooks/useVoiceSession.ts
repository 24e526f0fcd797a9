/**
 * React binding for the voice controller.
 *
 * Builds one controller per component instance, wired to the browser's
 * microphone, Web Audio output, and WebSocket, and mirrors its snapshot
 * into React state.
 */

import { useCallback, useEffect, useRef, useState } from "react";

import { MicrophoneUnavailableError } from "../voice/errors.js";
import { createPlaybackQueue, createWebAudioOutput } from "../voice/playback-queue.js";
import { createRecorder } from "../voice/recorder.js";
import { createSessionTransport, voiceSocketUrl } from "../voice/transport.js";
import { createVoiceController } from "../voice/voice-controller.js";
import { VAD_PRESETS } from "../voice/voice-settings.js";

import type { VoiceController, VoiceSnapshot } from "../voice/voice-controller.js";
import type { VadPresetName } from "../voice/voice-settings.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const USER_ID_KEY = "voice-news-user-id";

const INITIAL_SNAPSHOT: VoiceSnapshot = {
  state: "idle",
  sessionId: null,
  lastTranscript: "",
  lastReply: "",
  error: null,
  errorId: 0,
};

// ============================================================================
// HOOK
// ============================================================================

export function useVoiceSession(preset: VadPresetName) {
  const [snapshot, setSnapshot] = useState<VoiceSnapshot>(INITIAL_SNAPSHOT);
  const controllerRef = useRef<VoiceController | null>(null);
  const playbackContextRef = useRef<AudioContext | null>(null);
  const presetRef = useRef(preset);

  /** Create the controller on first use (inside the click that starts it) */
  const getController = useCallback((): VoiceController => {
    if (controllerRef.current) return controllerRef.current;

    const userId = getUserId();
    controllerRef.current = createVoiceController({
      url: voiceSocketUrl(),
      vadConfig: VAD_PRESETS[presetRef.current],
      requestMicrophone,
      recorder: createRecorder(),
      createPlayback: (hooks) => {
        const context = playbackContextRef.current ?? new AudioContext();
        playbackContextRef.current = context;
        return createPlaybackQueue(createWebAudioOutput(context), hooks);
      },
      openTransport: (handlers) => createSessionTransport({ userId, handlers }),
      onChange: setSnapshot,
    });
    return controllerRef.current;
  }, []);

  useEffect(() => {
    presetRef.current = preset;
    controllerRef.current?.setVadConfig(VAD_PRESETS[preset]);
  }, [preset]);

  // Release everything on unmount
  useEffect(() => {
    return () => {
      controllerRef.current?.stop().catch((err) => {
        console.error("[useVoiceSession] stop failed:", err);
      });
      playbackContextRef.current?.close().catch((err) => {
        console.error("[useVoiceSession] closing audio output failed:", err);
      });
      controllerRef.current = null;
      playbackContextRef.current = null;
    };
  }, []);

  const start = useCallback(() => getController().start(), [getController]);

  const stop = useCallback(() => getController().stop(), [getController]);

  const sendCommand = useCallback((text: string) => getController().sendCommand(text), [getController]);

  return { snapshot, start, stop, sendCommand };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/** Stable anonymous id for this browser */
function getUserId(): string {
  const existing = localStorage.getItem(USER_ID_KEY);
  if (existing) return existing;

  const created = crypto.randomUUID();
  localStorage.setItem(USER_ID_KEY, created);
  return created;
}

async function requestMicrophone(): Promise<MediaStream> {
  try {
    return await navigator.mediaDevices.getUserMedia({
      audio: { channelCount: 1, echoCancellation: true, noiseSuppression: true },
    });
  } catch (err) {
    throw new MicrophoneUnavailableError("Microphone access denied. Please allow microphone access and try again.", {
      cause: err,
    });
  }
}
