/**
 * Playback queue for the agent's reply audio.
 *
 * Chunks play strictly in arrival order, one at a time, each decoded just
 * before it plays. stopAndClear() silences the sounding chunk and drops the
 * rest in one step; a generation counter makes late decodes and `ended`
 * callbacks from the cleared turn no-ops.
 *
 * Responsibilities:
 * - Queue WAV chunks and play them sequentially
 * - Report when the queue drains
 * - Stop and clear atomically on interruption
 */

// ============================================================================
// INTERFACES
// ============================================================================

/** A sound that is playing */
export interface PlayingSound {
  stop(): void;
}

/**
 * Decodes and plays audio. `TDecoded` is whatever the output decodes to
 * (AudioBuffer in the browser).
 */
export interface AudioOutput<TDecoded> {
  decode(bytes: Uint8Array): Promise<TDecoded>;
  /** Start playing; `onEnded` is called once when the sound finishes or is stopped */
  play(audio: TDecoded, onEnded: () => void): PlayingSound;
}

export interface PlaybackHooks {
  /** The queue drained after playing at least one chunk */
  onIdle?(): void;
}

export interface PlaybackQueue {
  enqueue(bytes: Uint8Array): void;
  /** Stop the sounding chunk and drop everything queued; no-op when idle */
  stopAndClear(): void;
  /** True from the first enqueue until the queue drains or is cleared */
  isPlaying(): boolean;
  pendingCount(): number;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create a playback queue over an audio output.
 *
 * @param output - Decoder and player
 * @param hooks - Drain notification
 * @returns A PlaybackQueue
 */
export function createPlaybackQueue<TDecoded>(output: AudioOutput<TDecoded>, hooks: PlaybackHooks = {}): PlaybackQueue {
  let queue: Uint8Array[] = [];
  let playing = false;
  let current: PlayingSound | null = null;
  let generation = 0;

  function enqueue(bytes: Uint8Array): void {
    queue.push(bytes);
    if (!playing) playNext();
  }

  function playNext(): void {
    const next = queue.shift();
    if (!next) {
      playing = false;
      current = null;
      hooks.onIdle?.();
      return;
    }

    playing = true;
    const myGeneration = generation;

    output
      .decode(next)
      .then((audio) => {
        if (myGeneration !== generation) return;
        current = output.play(audio, () => {
          if (myGeneration !== generation) return;
          current = null;
          playNext();
        });
      })
      .catch((err) => {
        if (myGeneration !== generation) return;
        console.error(`[playback] skipping chunk: ${err instanceof Error ? err.message : String(err)}`);
        playNext();
      });
  }

  function stopAndClear(): void {
    if (!playing && queue.length === 0) return;

    generation++;
    const sounding = current;
    queue = [];
    playing = false;
    current = null;
    sounding?.stop();
  }

  return {
    enqueue,
    stopAndClear,
    isPlaying: () => playing,
    pendingCount: () => queue.length,
  };
}

// ============================================================================
// WEB AUDIO OUTPUT
// ============================================================================

/**
 * AudioOutput over a Web Audio context: decodeAudioData for each WAV chunk,
 * one AudioBufferSourceNode per chunk.
 *
 * @param context - Audio context to play through
 * @returns An AudioOutput of AudioBuffers
 */
export function createWebAudioOutput(context: AudioContext): AudioOutput<AudioBuffer> {
  return {
    // decodeAudioData detaches its input, so hand it a copy
    decode: (bytes) => context.decodeAudioData(bytes.slice().buffer),
    play(buffer, onEnded) {
      const source = context.createBufferSource();
      source.buffer = buffer;
      source.connect(context.destination);
      source.onended = () => {
        source.disconnect();
        onEnded();
      };
      source.start();
      return { stop: () => source.stop() };
    },
  };
}
