/**
 * Microphone recorder: captures PCM through an AudioWorklet, keeps the
 * current utterance in memory, and encodes it as WAV on flush or stop.
 *
 * Capture runs at the AudioContext's rate and is downsampled to 16kHz before
 * buffering, so every WAV the recorder produces is 16kHz mono 16-bit.
 *
 * Responsibilities:
 * - Build the capture graph (source -> analyser + worklet) for a microphone stream
 * - Buffer worklet blocks as the current utterance
 * - Flush (encode + clear) while recording continues, and stop (encode + release)
 * - Expose the analyser window for the VAD
 * - Stop every track and close the audio context on every exit path
 */

import { MicrophoneUnavailableError } from "./errors.js";
import { RECORDING_SAMPLE_RATE } from "./voice-settings.js";
import { encodeWav } from "./wav-encoder.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Worklet module served from dashboard/public */
const CAPTURE_PROCESSOR_URL = "/pcm-capture-processor.js";
const CAPTURE_PROCESSOR_NAME = "pcm-capture-processor";

/** Analyser window used for VAD energy */
const ANALYSER_FFT_SIZE = 2048;

// ============================================================================
// INTERFACES
// ============================================================================

/** The parts of a MediaStreamTrack the recorder uses */
export interface CaptureTrack {
  readonly readyState: string;
  stop(): void;
}

/** The parts of a MediaStream the recorder uses */
export interface CaptureStream {
  getAudioTracks(): CaptureTrack[];
  getTracks(): CaptureTrack[];
}

/** A running capture graph */
export interface CaptureGraph {
  /** Rate of the blocks delivered to onBlock */
  readonly sampleRate: number;
  /** Latest analyser window */
  readLevels(): Float32Array;
  /** Disconnect every node and close the audio context */
  close(): Promise<void>;
}

/** Builds a capture graph that calls `onBlock` with each block of samples */
export type CaptureGraphFactory = (
  stream: CaptureStream,
  onBlock: (samples: Float32Array) => void
) => Promise<CaptureGraph>;

/** Samples of the current utterance, at a fixed sample rate */
export interface UtteranceBuffer {
  append(block: Float32Array): void;
  sampleCount(): number;
  durationMs(): number;
  isEmpty(): boolean;
  /** All samples in order, clearing the buffer */
  take(): Float32Array;
  /** Drop everything except the last `ms` of audio */
  retainTail(ms: number): void;
  clear(): void;
}

export interface Recorder {
  /**
   * Start capturing from a microphone stream.
   * @throws MicrophoneUnavailableError if the stream has no live audio track or capture cannot start
   */
  start(stream: CaptureStream): Promise<void>;
  /** Encode and clear the current utterance; null when nothing is buffered */
  flush(): ArrayBuffer | null;
  /** Stop capture, release the microphone, and return whatever was buffered */
  stop(): Promise<ArrayBuffer | null>;
  /** Drop buffered audio older than the last `ms` */
  retainTail(ms: number): void;
  durationMs(): number;
  isEmpty(): boolean;
  isRecording(): boolean;
  /** Latest analyser window, or null when not recording */
  readLevels(): Float32Array | null;
}

export interface RecorderOptions {
  /** Capture graph builder (default: AudioWorklet graph) */
  createGraph?: CaptureGraphFactory;
  /** Rate utterances are buffered and encoded at (default 16000) */
  targetSampleRate?: number;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create a recorder. Nothing is captured until start().
 *
 * @param options - Capture graph factory and target rate
 * @returns A Recorder
 */
export function createRecorder(options: RecorderOptions = {}): Recorder {
  const createGraph = options.createGraph ?? createWorkletCaptureGraph;
  const targetSampleRate = options.targetSampleRate ?? RECORDING_SAMPLE_RATE;

  let graph: CaptureGraph | null = null;
  let stream: CaptureStream | null = null;
  let buffer = createUtteranceBuffer(targetSampleRate);
  let downsample: Downsampler | null = null;

  async function start(input: CaptureStream): Promise<void> {
    if (graph) throw new Error("Recorder already started");

    if (!input.getAudioTracks().some((track) => track.readyState === "live")) {
      stopTracks(input);
      throw new MicrophoneUnavailableError("No live microphone track");
    }

    let built: CaptureGraph;
    try {
      built = await createGraph(input, (samples) => handleBlock(samples));
    } catch (err) {
      stopTracks(input);
      const message = err instanceof Error ? err.message : String(err);
      throw new MicrophoneUnavailableError(`Could not start audio capture: ${message}`, { cause: err });
    }

    graph = built;
    stream = input;
    buffer = createUtteranceBuffer(Math.min(built.sampleRate, targetSampleRate));
    downsample = built.sampleRate > buffer.sampleRate ? createDownsampler(built.sampleRate, buffer.sampleRate) : null;
    console.log(`[recorder] capturing at ${built.sampleRate}Hz, buffering at ${buffer.sampleRate}Hz`);
  }

  /** Downsample a worklet block and append it to the utterance */
  function handleBlock(samples: Float32Array): void {
    if (!graph) return;
    buffer.append(downsample ? downsample(samples) : samples);
  }

  function flush(): ArrayBuffer | null {
    if (buffer.isEmpty()) return null;
    return encodeWav(buffer.take(), { sampleRate: buffer.sampleRate });
  }

  async function stop(): Promise<ArrayBuffer | null> {
    const running = graph;
    const input = stream;
    graph = null;
    stream = null;
    downsample = null;

    try {
      return buffer.isEmpty() ? null : encodeWav(buffer.take(), { sampleRate: buffer.sampleRate });
    } finally {
      buffer.clear();
      if (input) stopTracks(input);
      if (running) await running.close();
    }
  }

  return {
    start,
    flush,
    stop,
    retainTail: (ms) => buffer.retainTail(ms),
    durationMs: () => buffer.durationMs(),
    isEmpty: () => buffer.isEmpty(),
    isRecording: () => graph !== null,
    readLevels: () => graph?.readLevels() ?? null,
  };
}

// ============================================================================
// UTTERANCE BUFFER
// ============================================================================

/**
 * Create an in-memory utterance buffer of sample blocks.
 *
 * @param sampleRate - Rate of the samples appended
 * @returns An UtteranceBuffer with its sample rate attached
 */
export function createUtteranceBuffer(sampleRate: number): UtteranceBuffer & { readonly sampleRate: number } {
  let blocks: Float32Array[] = [];
  let count = 0;

  function take(): Float32Array {
    const samples = new Float32Array(count);
    let offset = 0;
    for (const block of blocks) {
      samples.set(block, offset);
      offset += block.length;
    }
    clear();
    return samples;
  }

  function retainTail(ms: number): void {
    const keep = Math.floor((sampleRate * ms) / 1000);
    if (count <= keep) return;

    const all = take();
    const tail = all.slice(all.length - keep);
    if (tail.length > 0) {
      blocks = [tail];
      count = tail.length;
    }
  }

  function clear(): void {
    blocks = [];
    count = 0;
  }

  return {
    sampleRate,
    append(block) {
      if (block.length === 0) return;
      blocks.push(block);
      count += block.length;
    },
    sampleCount: () => count,
    durationMs: () => (count / sampleRate) * 1000,
    isEmpty: () => count === 0,
    take,
    retainTail,
    clear,
  };
}

// ============================================================================
// CAPTURE GRAPH
// ============================================================================

/**
 * Build the browser capture graph: microphone -> analyser (VAD levels) and
 * microphone -> AudioWorklet (4096-sample blocks posted to the main thread).
 * The worklet feeds a muted gain node so the graph keeps pulling audio
 * without echoing the microphone.
 *
 * @param stream - Microphone stream from getUserMedia
 * @param onBlock - Receives each block of samples at the context's rate
 * @returns The running graph
 */
export async function createWorkletCaptureGraph(
  stream: CaptureStream,
  onBlock: (samples: Float32Array) => void
): Promise<CaptureGraph> {
  if (!(stream instanceof MediaStream)) {
    throw new Error("Audio capture needs a MediaStream");
  }

  const context = new AudioContext();

  try {
    // Browser autoplay policy requires resuming inside a user gesture
    await context.resume();
    await context.audioWorklet.addModule(CAPTURE_PROCESSOR_URL);

    const source = context.createMediaStreamSource(stream);
    const analyser = context.createAnalyser();
    analyser.fftSize = ANALYSER_FFT_SIZE;

    const worklet = new AudioWorkletNode(context, CAPTURE_PROCESSOR_NAME);
    worklet.port.onmessage = (event: MessageEvent<unknown>) => {
      const samples = readCaptureBlock(event.data);
      if (samples) onBlock(samples);
    };

    const mute = context.createGain();
    mute.gain.value = 0;

    source.connect(analyser);
    source.connect(worklet);
    worklet.connect(mute);
    mute.connect(context.destination);

    const levels = new Float32Array(analyser.fftSize);

    return {
      sampleRate: context.sampleRate,
      readLevels() {
        analyser.getFloatTimeDomainData(levels);
        return levels;
      },
      async close() {
        worklet.port.onmessage = null;
        source.disconnect();
        worklet.disconnect();
        mute.disconnect();
        await context.close();
      },
    };
  } catch (err) {
    await context.close();
    throw err;
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/** Stop every track of a stream */
function stopTracks(stream: CaptureStream): void {
  stream.getTracks().forEach((track) => track.stop());
}

/** Extract the samples from a worklet `{ type: "audio", samples }` message */
function readCaptureBlock(data: unknown): Float32Array | null {
  if (typeof data !== "object" || data === null || !("type" in data) || !("samples" in data)) return null;
  return data.type === "audio" && data.samples instanceof Float32Array ? data.samples : null;
}

/** Downsamples consecutive blocks of one stream */
export type Downsampler = (block: Float32Array) => Float32Array;

/**
 * Downsample a stream of capture blocks to a lower rate, using a 3-tap average
 * around each kept sample as a simple low-pass filter.
 *
 * The fractional read position and the last sample carry over between blocks,
 * so block boundaries do not drop samples at non-integer ratios (44.1kHz -> 16kHz).
 *
 * @param fromRate - Capture sample rate
 * @param toRate - Target sample rate
 * @returns A Downsampler holding the stream position
 */
export function createDownsampler(fromRate: number, toRate: number): Downsampler {
  const ratio = fromRate / toRate;
  /** Read position of the next output sample, relative to the next block */
  let position = 0;
  let previous: number | null = null;

  return (input) => {
    const output: number[] = [];

    while (position < input.length) {
      // 3-tap average centered on the decimation point
      const offset = Math.floor(position);
      const s0 = input[offset] ?? 0;
      const s1 = input[offset + 1] ?? s0;
      const s2 = offset > 0 ? (input[offset - 1] ?? 0) : (previous ?? s0);
      output.push((s0 + s1 + s2) / 3);
      position += ratio;
    }

    position -= input.length;
    if (input.length > 0) previous = input[input.length - 1] ?? null;
    return Float32Array.from(output);
  };
}
