/**
 * Energy-based voice activity detector for the browser.
 *
 * Polls the microphone's analysis window on its own timer, independent of the
 * audio callback, and decides on each tick whether the user is speaking.
 *
 * Responsibilities:
 * - Measure energy (mean absolute amplitude) of the latest analysis window
 * - Flush the utterance after enough silence following speech
 * - Interrupt agent playback the moment the user speaks over it
 * - Trim idle silence to a short pre-roll so it is never sent
 */

import { DEFAULT_VAD_CONFIG } from "./voice-settings.js";

import type { VadConfig } from "./voice-settings.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** Supplies the latest analysis window (null before capture starts) */
export interface LevelSource {
  readLevels(): Float32Array | null;
}

/** Read-only view of the utterance being recorded */
export interface UtteranceView {
  durationMs(): number;
  isEmpty(): boolean;
}

export interface VadHooks {
  /** True while agent audio is playing */
  isPlaybackActive(): boolean;
  /** Speech has ended: send the buffered utterance */
  onFlush(): void;
  /** The user spoke over playback */
  onInterrupt(): void;
  /** Silence with no speech since the last flush */
  onIdleSilence(): void;
}

/** Time source and repeating timer; returns a function that cancels the timer */
export interface VadClock {
  now(): number;
  every(intervalMs: number, callback: () => void): () => void;
}

export interface VoiceActivityDetector {
  start(): void;
  stop(): void;
  isRunning(): boolean;
  /** Run one detection step (normally called by the timer) */
  tick(): VadDecision;
}

// ============================================================================
// TYPES
// ============================================================================

/** What one tick decided */
export type VadDecision = "speech" | "interrupt" | "flush" | "silence" | "idle";

export interface VadOptions {
  config?: VadConfig;
  levels: LevelSource;
  utterance: UtteranceView;
  hooks: VadHooks;
  clock?: VadClock;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const systemClock: VadClock = {
  now: () => Date.now(),
  every(intervalMs, callback) {
    const timer = setInterval(callback, intervalMs);
    return () => clearInterval(timer);
  },
};

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create a voice activity detector.
 *
 * @param options - Thresholds, level source, utterance view, hooks, and clock
 * @returns A detector that is not yet running
 */
export function createVoiceActivityDetector(options: VadOptions): VoiceActivityDetector {
  const { levels, utterance, hooks } = options;
  const config = options.config ?? DEFAULT_VAD_CONFIG;
  const clock = options.clock ?? systemClock;

  let cancelTimer: (() => void) | null = null;
  let lastSpeechTime = 0;
  let heardSpeech = false;

  function start(): void {
    if (cancelTimer) return;
    lastSpeechTime = clock.now();
    heardSpeech = false;
    cancelTimer = clock.every(config.checkIntervalMs, () => {
      tick();
    });
  }

  function stop(): void {
    cancelTimer?.();
    cancelTimer = null;
  }

  function tick(): VadDecision {
    const now = clock.now();
    const levelWindow = levels.readLevels();
    const speaking = levelWindow !== null && measureEnergy(levelWindow) > config.speechThreshold;

    if (speaking) {
      lastSpeechTime = now;
      heardSpeech = true;

      if (hooks.isPlaybackActive()) {
        console.log("[vad] speech during playback, interrupting");
        hooks.onInterrupt();
        return "interrupt";
      }
      return "speech";
    }

    if (!heardSpeech) {
      if (!utterance.isEmpty()) hooks.onIdleSilence();
      return "idle";
    }

    const silentFor = now - lastSpeechTime;
    if (
      silentFor >= config.silenceThresholdMs &&
      !utterance.isEmpty() &&
      utterance.durationMs() >= config.minRecordingDurationMs
    ) {
      console.log(`[vad] ${silentFor}ms of silence, flushing ${Math.round(utterance.durationMs())}ms utterance`);
      hooks.onFlush();
      heardSpeech = false;
      lastSpeechTime = now;
      return "flush";
    }

    return "silence";
  }

  return { start, stop, isRunning: () => cancelTimer !== null, tick };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Mean absolute amplitude of a window of samples.
 *
 * @param samples - Time-domain samples in [-1, 1]
 * @returns Energy in [0, 1]; 0 for an empty window
 */
export function measureEnergy(samples: Float32Array): number {
  if (samples.length === 0) return 0;

  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    sum += Math.abs(samples[i]);
  }
  return sum / samples.length;
}
