/**
 * WAV parsing and wrapping on the server side.
 *
 * Inbound utterances arrive as complete WAV files and are validated here before
 * anything is sent to the recognizer. Outbound TTS chunks are raw PCM from the
 * synthesizer and are wrapped into standalone WAV files so each one decodes on
 * its own in the browser.
 *
 * Responsibilities:
 * - Walk the RIFF chunk list and read the fmt and data chunks
 * - Reject malformed, truncated, or non-PCM audio with InvalidAudioFormat
 * - Wrap 16-bit mono PCM into a 44-byte-header WAV buffer
 */

import { InvalidAudioFormat } from "./errors.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Size of the canonical WAV header in bytes */
const WAV_HEADER_SIZE = 44;

/** WAVE_FORMAT_PCM */
const PCM_FORMAT = 1;

/** Bit depths accepted for integer PCM */
const SUPPORTED_BIT_DEPTHS = new Set([8, 16, 24, 32]);

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Header fields and PCM payload of a parsed WAV file.
 */
export interface ParsedWav {
  sampleRate: number;
  channels: number;
  bitDepth: number;
  /** Samples per channel */
  sampleCount: number;
  durationMs: number;
  /** View of the data chunk (no copy) */
  pcm: Buffer;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Parse and validate a WAV file.
 *
 * @param bytes - Complete WAV file contents
 * @returns Header fields and a view of the PCM data
 * @throws InvalidAudioFormat if the bytes are not a readable PCM WAV file
 */
export function parseWav(bytes: Uint8Array): ParsedWav {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (buffer.length < WAV_HEADER_SIZE) {
    throw new InvalidAudioFormat(`WAV too short: ${buffer.length} bytes`);
  }
  if (buffer.toString("ascii", 0, 4) !== "RIFF" || buffer.toString("ascii", 8, 12) !== "WAVE") {
    throw new InvalidAudioFormat("Missing RIFF/WAVE header");
  }

  let format: { audioFormat: number; channels: number; sampleRate: number; bitDepth: number } | null = null;
  let offset = 12;

  // Walk chunks until the data chunk; fmt must come first
  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString("ascii", offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const bodyStart = offset + 8;

    if (chunkId === "fmt ") {
      if (chunkSize < 16 || bodyStart + 16 > buffer.length) {
        throw new InvalidAudioFormat("Truncated fmt chunk");
      }
      format = {
        audioFormat: buffer.readUInt16LE(bodyStart),
        channels: buffer.readUInt16LE(bodyStart + 2),
        sampleRate: buffer.readUInt32LE(bodyStart + 4),
        bitDepth: buffer.readUInt16LE(bodyStart + 14),
      };
    } else if (chunkId === "data") {
      if (!format) throw new InvalidAudioFormat("data chunk before fmt chunk");
      return buildParsedWav(format, buffer, bodyStart, chunkSize);
    }

    // Chunks are padded to an even size
    offset = bodyStart + chunkSize + (chunkSize % 2);
  }

  throw new InvalidAudioFormat("No data chunk found");
}

/**
 * Wrap raw 16-bit PCM into a standalone WAV file.
 *
 * @param pcm - Little-endian 16-bit PCM samples
 * @param sampleRate - Sample rate in Hz
 * @param channels - Channel count (default mono)
 * @returns Buffer containing a valid WAV file
 */
export function pcmToWav(pcm: Uint8Array, sampleRate: number, channels = 1): Buffer {
  const bytesPerSample = 2;
  const header = Buffer.alloc(WAV_HEADER_SIZE);
  let offset = 0;

  header.write("RIFF", offset); offset += 4;
  header.writeUInt32LE(WAV_HEADER_SIZE - 8 + pcm.length, offset); offset += 4;
  header.write("WAVE", offset); offset += 4;

  header.write("fmt ", offset); offset += 4;
  header.writeUInt32LE(16, offset); offset += 4;
  header.writeUInt16LE(PCM_FORMAT, offset); offset += 2;
  header.writeUInt16LE(channels, offset); offset += 2;
  header.writeUInt32LE(sampleRate, offset); offset += 4;
  header.writeUInt32LE(sampleRate * channels * bytesPerSample, offset); offset += 4;
  header.writeUInt16LE(channels * bytesPerSample, offset); offset += 2;
  header.writeUInt16LE(16, offset); offset += 2;

  header.write("data", offset); offset += 4;
  header.writeUInt32LE(pcm.length, offset);

  return Buffer.concat([header, pcm]);
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Validate fmt fields against the data chunk and build the result.
 */
function buildParsedWav(
  format: { audioFormat: number; channels: number; sampleRate: number; bitDepth: number },
  buffer: Buffer,
  dataStart: number,
  dataSize: number
): ParsedWav {
  const { audioFormat, channels, sampleRate, bitDepth } = format;

  if (audioFormat !== PCM_FORMAT) {
    throw new InvalidAudioFormat(`Unsupported WAV encoding (format tag ${audioFormat}), expected PCM`);
  }
  if (channels < 1) throw new InvalidAudioFormat("WAV declares zero channels");
  if (sampleRate < 1) throw new InvalidAudioFormat("WAV declares a zero sample rate");
  if (!SUPPORTED_BIT_DEPTHS.has(bitDepth)) {
    throw new InvalidAudioFormat(`Unsupported bit depth: ${bitDepth}`);
  }
  if (dataStart + dataSize > buffer.length) {
    throw new InvalidAudioFormat(
      `Truncated WAV data: header declares ${dataSize} bytes, ${buffer.length - dataStart} present`
    );
  }

  const frameSize = channels * (bitDepth / 8);
  const sampleCount = Math.floor(dataSize / frameSize);

  return {
    sampleRate,
    channels,
    bitDepth,
    sampleCount,
    durationMs: (sampleCount / sampleRate) * 1000,
    pcm: buffer.subarray(dataStart, dataStart + dataSize),
  };
}
