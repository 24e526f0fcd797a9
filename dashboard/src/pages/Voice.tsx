/**
 * Hands-free voice page for the news and stock assistant.
 *
 * States: idle -> connecting -> listening <-> speaking
 *
 * Responsibilities:
 * - Start and stop the voice session
 * - Show what was heard and what the assistant answered
 * - Let the user pick a VAD sensitivity preset and type a question instead of speaking
 * - Surface errors as toasts
 */

import { useCallback, useEffect, useState } from "react";

import { Toast } from "../components/Toast.js";
import { useVoiceSession } from "../hooks/useVoiceSession.js";

import type { FormEvent } from "react";
import type { VoiceState } from "../voice/voice-controller.js";
import type { VadPresetName } from "../voice/voice-settings.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const STATUS_LABELS: Record<VoiceState, string> = {
  idle: "Not connected",
  connecting: "Connecting...",
  listening: "Listening",
  speaking: "Speaking",
};

const PRESET_OPTIONS: { value: VadPresetName; label: string }[] = [
  { value: "sensitive", label: "Sensitive (quiet room)" },
  { value: "balanced", label: "Balanced" },
  { value: "strict", label: "Strict (noisy room)" },
];

// ============================================================================
// COMPONENT
// ============================================================================

export function Voice() {
  const [preset, setPreset] = useState<VadPresetName>("balanced");
  const [command, setCommand] = useState("");
  const [toast, setToast] = useState<{ id: number; message: string } | null>(null);
  const { snapshot, start, stop, sendCommand } = useVoiceSession(preset);

  // Keyed on errorId so the same message reported twice shows twice
  useEffect(() => {
    if (snapshot.error) setToast({ id: snapshot.errorId, message: snapshot.error });
  }, [snapshot.errorId, snapshot.error]);

  const dismissToast = useCallback(() => setToast(null), []);

  const handleStart = useCallback(() => {
    start().catch((err) => {
      setToast({ id: -1, message: err instanceof Error ? err.message : String(err) });
    });
  }, [start]);

  const handleStop = useCallback(() => {
    stop().catch((err) => {
      console.error("[Voice] stop failed:", err);
    });
  }, [stop]);

  const handleCommand = (e: FormEvent) => {
    e.preventDefault();
    if (sendCommand(command)) setCommand("");
  };

  const active = snapshot.state === "listening" || snapshot.state === "speaking";

  return (
    <div className="call-container">
      <h1>Voice News</h1>
      <p className="subtitle">Ask about the markets, a stock, or today's headlines</p>

      <div className={`status-pill status-${snapshot.state}`}>{STATUS_LABELS[snapshot.state]}</div>

      {/* STATE: Idle */}
      {snapshot.state === "idle" && (
        <div className="call-state">
          <label className="preset-select">
            Sensitivity
            <select value={preset} onChange={(e) => setPreset(parsePreset(e.target.value))}>
              {PRESET_OPTIONS.map((option) => (
                <option key={option.value} value={option.value}>{option.label}</option>
              ))}
            </select>
          </label>
          <button className="btn btn-call" onClick={handleStart}>Start Talking</button>
        </div>
      )}

      {/* STATE: Connecting */}
      {snapshot.state === "connecting" && (
        <div className="call-state">
          <p className="status-msg">Connecting...</p>
        </div>
      )}

      {/* STATE: Listening / Speaking */}
      {active && (
        <div className="call-state">
          <div className={snapshot.state === "speaking" ? "pulse-ring speaking" : "pulse-ring"} />
          <div className="exchange">
            <div className="exchange-line">
              <span className="exchange-label">You</span>
              <span>{snapshot.lastTranscript || "..."}</span>
            </div>
            <div className="exchange-line">
              <span className="exchange-label">Assistant</span>
              <span>{snapshot.lastReply || "..."}</span>
            </div>
          </div>
          <form className="command-form" onSubmit={handleCommand}>
            <input
              type="text"
              value={command}
              placeholder="Or type a question"
              onChange={(e) => setCommand(e.target.value)}
            />
            <button className="btn" type="submit" disabled={!command.trim()}>Send</button>
          </form>
          <button className="btn btn-hangup" onClick={handleStop}>Stop</button>
        </div>
      )}

      <Toast key={toast?.id} message={toast?.message ?? null} variant="error" onDismiss={dismissToast} />
    </div>
  );
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function parsePreset(value: string): VadPresetName {
  return value === "sensitive" || value === "strict" ? value : "balanced";
}
