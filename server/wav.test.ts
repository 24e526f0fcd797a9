/**
 * Tests for WAV parsing and wrapping, including files produced by the
 * browser-side encoder.
 *
 * Run: npx tsx --test server/wav.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { encodeWav, readWavInfo } from "../dashboard/src/voice/wav-encoder.js";
import { InvalidAudioFormat } from "./errors.js";
import { toneSamples } from "./test-fakes.js";
import { parseWav, pcmToWav } from "./wav.js";

// ============================================================================
// HELPERS
// ============================================================================

/** Encode a tone and return it as bytes */
function toneWav(durationSeconds: number, sampleRate: number): Uint8Array {
  return new Uint8Array(encodeWav(toneSamples(durationSeconds, sampleRate), { sampleRate }));
}

/** Build a chunk: 4-char id, little-endian size, body */
function riffChunk(id: string, body: Buffer): Buffer {
  const header = Buffer.alloc(8);
  header.write(id, 0, "ascii");
  header.writeUInt32LE(body.length, 4);
  return body.length % 2 === 1 ? Buffer.concat([header, body, Buffer.alloc(1)]) : Buffer.concat([header, body]);
}

/** 16-byte PCM fmt body */
function fmtBody(sampleRate: number, channels: number, bitDepth: number, audioFormat = 1): Buffer {
  const body = Buffer.alloc(16);
  body.writeUInt16LE(audioFormat, 0);
  body.writeUInt16LE(channels, 2);
  body.writeUInt32LE(sampleRate, 4);
  body.writeUInt32LE(sampleRate * channels * (bitDepth / 8), 8);
  body.writeUInt16LE(channels * (bitDepth / 8), 12);
  body.writeUInt16LE(bitDepth, 14);
  return body;
}

/** Assemble a RIFF/WAVE file from chunks */
function riffFile(chunks: Buffer[]): Buffer {
  const body = Buffer.concat([Buffer.from("WAVE", "ascii"), ...chunks]);
  const header = Buffer.alloc(8);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(body.length, 4);
  return Buffer.concat([header, body]);
}

// ============================================================================
// ENCODER -> PARSER
// ============================================================================

for (const sampleRate of [8000, 16000, 24000, 48000]) {
  test(`encoded ${sampleRate}Hz tone parses back with its format fields`, () => {
    const parsed = parseWav(toneWav(0.25, sampleRate));

    assert.equal(parsed.sampleRate, sampleRate);
    assert.equal(parsed.channels, 1);
    assert.equal(parsed.bitDepth, 16);
    assert.equal(parsed.sampleCount, sampleRate / 4);
    assert.equal(parsed.pcm.length, parsed.sampleCount * 2);
    assert.equal(parsed.durationMs, 250);
  });
}

test("2.5 seconds at 16kHz encodes to 80,044 bytes", () => {
  const wav = encodeWav(toneSamples(2.5, 16000));
  assert.equal(wav.byteLength, 80_044);

  const info = readWavInfo(wav);
  assert.ok(info);
  assert.equal(info.dataSize, 80_000);
  assert.equal(info.sampleCount, 40_000);
  assert.equal(info.durationMs, 2500);
});

test("an empty recording is a valid 44-byte WAV with zero samples", () => {
  const wav = encodeWav(new Float32Array(0));
  assert.equal(wav.byteLength, 44);

  const parsed = parseWav(new Uint8Array(wav));
  assert.equal(parsed.sampleCount, 0);
  assert.equal(parsed.durationMs, 0);
});

test("samples outside [-1, 1] are clamped to the int16 extremes", () => {
  const wav = encodeWav(Float32Array.from([2, -2, 1, -1, 0, 0.5]));
  const pcm = parseWav(new Uint8Array(wav)).pcm;

  const values: number[] = [];
  for (let i = 0; i < pcm.length; i += 2) values.push(pcm.readInt16LE(i));

  assert.deepEqual(values, [32767, -32768, 32767, -32768, 0, 16384]);
});

test("8-bit encoding stores silence at the unsigned midpoint", () => {
  const wav = encodeWav(Float32Array.from([0, 1, -1]), { bitDepth: 8 });
  const bytes = new Uint8Array(wav);

  assert.deepEqual([...bytes.subarray(44)], [128, 255, 0]);
  assert.equal(readWavInfo(wav)?.bitDepth, 8);
});

test("encodeWav rejects a zero sample rate and a fractional channel count", () => {
  assert.throws(() => encodeWav(new Float32Array(4), { sampleRate: 0 }), RangeError);
  assert.throws(() => encodeWav(new Float32Array(4), { channels: 1.5 }), RangeError);
});

test("readWavInfo returns null for bytes that are not a WAV", () => {
  assert.equal(readWavInfo(new ArrayBuffer(10)), null);
  assert.equal(readWavInfo(new ArrayBuffer(64)), null);
});

// ============================================================================
// PARSER VALIDATION
// ============================================================================

test("parseWav rejects input shorter than a header", () => {
  assert.throws(() => parseWav(Buffer.from("not a wav")), {
    name: "InvalidAudioFormat",
    message: "WAV too short: 9 bytes",
  });
});

test("parseWav rejects a missing RIFF/WAVE signature", () => {
  const bytes = Buffer.from(toneWav(0.01, 16000));
  bytes.write("RIFX", 0, "ascii");

  assert.throws(() => parseWav(bytes), { message: "Missing RIFF/WAVE header" });
});

test("parseWav rejects non-PCM encodings", () => {
  const bytes = Buffer.from(toneWav(0.01, 16000));
  bytes.writeUInt16LE(3, 20); // IEEE float

  assert.throws(() => parseWav(bytes), {
    message: "Unsupported WAV encoding (format tag 3), expected PCM",
  });
});

test("parseWav rejects a data chunk longer than the file", () => {
  const full = Buffer.from(toneWav(0.01, 16000)); // 160 samples, 320 bytes of data
  const truncated = full.subarray(0, 44 + 100);

  assert.throws(() => parseWav(truncated), {
    message: "Truncated WAV data: header declares 320 bytes, 100 present",
  });
});

test("parseWav rejects a file with no data chunk", () => {
  const bytes = riffFile([riffChunk("fmt ", fmtBody(16000, 1, 16)), riffChunk("LIST", Buffer.alloc(30))]);

  assert.throws(() => parseWav(bytes), { message: "No data chunk found" });
});

test("parseWav rejects data before fmt", () => {
  const bytes = riffFile([riffChunk("data", Buffer.alloc(40)), riffChunk("fmt ", fmtBody(16000, 1, 16))]);

  assert.throws(() => parseWav(bytes), (err) => err instanceof InvalidAudioFormat);
});

test("parseWav rejects an unsupported bit depth", () => {
  const bytes = riffFile([riffChunk("fmt ", fmtBody(16000, 1, 12)), riffChunk("data", Buffer.alloc(12))]);

  assert.throws(() => parseWav(bytes), { message: "Unsupported bit depth: 12" });
});

test("parseWav skips unknown chunks, honoring odd-size padding", () => {
  const data = Buffer.alloc(8);
  data.writeInt16LE(1000, 0);
  const bytes = riffFile([
    riffChunk("fmt ", fmtBody(8000, 1, 16)),
    riffChunk("LIST", Buffer.from("abc", "ascii")),
    riffChunk("data", data),
  ]);

  const parsed = parseWav(bytes);
  assert.equal(parsed.sampleRate, 8000);
  assert.equal(parsed.sampleCount, 4);
  assert.equal(parsed.pcm.readInt16LE(0), 1000);
});

test("stereo files count samples per channel", () => {
  const bytes = riffFile([riffChunk("fmt ", fmtBody(16000, 2, 16)), riffChunk("data", Buffer.alloc(64))]);

  const parsed = parseWav(bytes);
  assert.equal(parsed.channels, 2);
  assert.equal(parsed.sampleCount, 16);
  assert.equal(parsed.durationMs, 1);
});

// ============================================================================
// PCM WRAPPING
// ============================================================================

test("pcmToWav wraps PCM in a header the parser accepts", () => {
  const pcm = Buffer.alloc(480);
  pcm.writeInt16LE(-1234, 2);

  const wav = pcmToWav(pcm, 24000);
  assert.equal(wav.length, 524);
  assert.equal(wav.readUInt32LE(4), 516);

  const parsed = parseWav(wav);
  assert.equal(parsed.sampleRate, 24000);
  assert.equal(parsed.channels, 1);
  assert.equal(parsed.sampleCount, 240);
  assert.equal(parsed.durationMs, 10);
  assert.equal(parsed.pcm.readInt16LE(2), -1234);
});
