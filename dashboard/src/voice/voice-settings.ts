/**
 * Voice activity detection settings and presets.
 *
 * All VAD thresholds live here so the page can switch presets without
 * touching the detector.
 */

// ============================================================================
// TYPES
// ============================================================================

export interface VadConfig {
  /** Mean absolute amplitude above which a window counts as speech */
  speechThreshold: number;
  /** Silence after speech before the utterance is sent */
  silenceThresholdMs: number;
  /** Utterances shorter than this are never sent */
  minRecordingDurationMs: number;
  /** How often the detector samples the analysis window */
  checkIntervalMs: number;
}

export type VadPresetName = "sensitive" | "balanced" | "strict";

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_VAD_CONFIG: VadConfig = {
  speechThreshold: 0.02,
  silenceThresholdMs: 700,
  minRecordingDurationMs: 500,
  checkIntervalMs: 100,
};

/** Sensitive picks up soft speech (and some noise); strict needs clear speech */
export const VAD_PRESETS: Record<VadPresetName, VadConfig> = {
  sensitive: { ...DEFAULT_VAD_CONFIG, speechThreshold: 0.01, silenceThresholdMs: 500 },
  balanced: DEFAULT_VAD_CONFIG,
  strict: { ...DEFAULT_VAD_CONFIG, speechThreshold: 0.05, silenceThresholdMs: 1500 },
};

/** Audio kept from before the first speech window, so word onsets are not clipped */
export const PRE_ROLL_MS = 300;

/** Sample rate utterances are recorded and sent at */
export const RECORDING_SAMPLE_RATE = 16000;
