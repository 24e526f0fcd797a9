/**
 * WAV encoder for recorded microphone audio.
 *
 * Turns normalized float samples into a complete, standalone WAV file
 * (44-byte header + little-endian integer PCM) ready to base64 and send.
 * A 0-sample WAV is valid and means "nothing recorded".
 *
 * Responsibilities:
 * - Write the RIFF/WAVE/fmt/data header for the requested format
 * - Clamp samples to [-1, 1] and scale them to the target bit depth
 * - Read the header of a canonical WAV back into its format fields
 */

// ============================================================================
// CONSTANTS
// ============================================================================

/** Size of the canonical WAV header in bytes */
export const WAV_HEADER_SIZE = 44;

/** Defaults match what the server's recognizer expects */
const DEFAULT_SAMPLE_RATE = 16000;
const DEFAULT_CHANNELS = 1;
const DEFAULT_BIT_DEPTH = 16;

/** Integer PCM bit depths the encoder can write */
const SUPPORTED_BIT_DEPTHS = [8, 16, 24, 32] as const;

// ============================================================================
// TYPES
// ============================================================================

export type WavBitDepth = (typeof SUPPORTED_BIT_DEPTHS)[number];

export interface WavEncodingOptions {
  /** Samples per second; a positive integer (default 16000) */
  sampleRate?: number;
  /** Interleaved channel count (default 1) */
  channels?: number;
  /** Bits per sample (default 16) */
  bitDepth?: WavBitDepth;
}

/** Format fields read back from a WAV header */
export interface WavInfo {
  sampleRate: number;
  channels: number;
  bitDepth: number;
  /** Size of the data chunk in bytes */
  dataSize: number;
  /** Samples per channel */
  sampleCount: number;
  durationMs: number;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Encode float samples as a WAV file.
 *
 * @param samples - Samples in [-1, 1]; values outside are clamped, interleaved when channels > 1
 * @param options - Sample rate, channel count, and bit depth
 * @returns Complete WAV file
 * @throws RangeError on a non-positive or non-integer sample rate or channel count, or an unsupported bit depth
 */
export function encodeWav(samples: Float32Array, options: WavEncodingOptions = {}): ArrayBuffer {
  const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
  const channels = options.channels ?? DEFAULT_CHANNELS;
  const bitDepth = options.bitDepth ?? DEFAULT_BIT_DEPTH;

  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new RangeError(`Sample rate must be a positive integer, got ${sampleRate}`);
  }
  if (!Number.isInteger(channels) || channels <= 0) {
    throw new RangeError(`Channel count must be a positive integer, got ${channels}`);
  }
  if (!SUPPORTED_BIT_DEPTHS.includes(bitDepth)) {
    throw new RangeError(`Unsupported bit depth: ${bitDepth}`);
  }

  const bytesPerSample = bitDepth / 8;
  const blockAlign = channels * bytesPerSample;
  const dataSize = samples.length * bytesPerSample;

  const buffer = new ArrayBuffer(WAV_HEADER_SIZE + dataSize);
  const view = new DataView(buffer);

  // RIFF header
  writeAscii(view, 0, "RIFF");
  view.setUint32(4, 36 + dataSize, true);
  writeAscii(view, 8, "WAVE");

  // fmt sub-chunk
  writeAscii(view, 12, "fmt ");
  view.setUint32(16, 16, true);                       // Sub-chunk size (16 for PCM)
  view.setUint16(20, 1, true);                        // Audio format (1 = PCM)
  view.setUint16(22, channels, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * blockAlign, true);  // Byte rate
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, bitDepth, true);

  // data sub-chunk
  writeAscii(view, 36, "data");
  view.setUint32(40, dataSize, true);

  writeSamples(view, WAV_HEADER_SIZE, samples, bitDepth);

  return buffer;
}

/**
 * Read the format fields of a canonical 44-byte-header PCM WAV.
 *
 * @param buffer - WAV file bytes
 * @returns Header fields, or null if the buffer is not a canonical PCM WAV
 */
export function readWavInfo(buffer: ArrayBuffer): WavInfo | null {
  if (buffer.byteLength < WAV_HEADER_SIZE) return null;

  const view = new DataView(buffer);
  if (
    readAscii(view, 0) !== "RIFF" ||
    readAscii(view, 8) !== "WAVE" ||
    readAscii(view, 12) !== "fmt " ||
    readAscii(view, 36) !== "data" ||
    view.getUint16(20, true) !== 1
  ) {
    return null;
  }

  const channels = view.getUint16(22, true);
  const sampleRate = view.getUint32(24, true);
  const bitDepth = view.getUint16(34, true);
  const dataSize = view.getUint32(40, true);
  if (channels === 0 || sampleRate === 0 || bitDepth === 0) return null;

  const sampleCount = Math.floor(dataSize / (channels * (bitDepth / 8)));

  return {
    sampleRate,
    channels,
    bitDepth,
    dataSize,
    sampleCount,
    durationMs: (sampleCount / sampleRate) * 1000,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Clamp and scale samples into integer PCM at `offset`.
 * Negative values scale by 2^(bits-1) and positive by 2^(bits-1)-1, so both
 * ends of [-1, 1] map to the extremes without overflow. 8-bit PCM is unsigned.
 */
function writeSamples(view: DataView, offset: number, samples: Float32Array, bitDepth: WavBitDepth): void {
  const negativeScale = 2 ** (bitDepth - 1);
  const positiveScale = negativeScale - 1;
  const bytesPerSample = bitDepth / 8;

  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    const value = Math.round(clamped < 0 ? clamped * negativeScale : clamped * positiveScale);
    const position = offset + i * bytesPerSample;

    switch (bitDepth) {
      case 8:
        view.setUint8(position, value + 128);
        break;
      case 16:
        view.setInt16(position, value, true);
        break;
      case 24:
        view.setUint8(position, value & 0xff);
        view.setUint8(position + 1, (value >> 8) & 0xff);
        view.setUint8(position + 2, (value >> 16) & 0xff);
        break;
      case 32:
        view.setInt32(position, value, true);
        break;
    }
  }
}

function writeAscii(view: DataView, offset: number, text: string): void {
  for (let i = 0; i < text.length; i++) {
    view.setUint8(offset + i, text.charCodeAt(i));
  }
}

function readAscii(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3)
  );
}
