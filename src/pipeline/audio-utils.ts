/**
 * Audio format helpers: G.711 µ-law <-> 16-bit PCM, WAV header add/strip, frame energy.
 */

import type { AudioEncoding } from "../config";

const MULAW_BIAS = 0x84;
const MULAW_CLIP = 32635;

/** Decode one µ-law byte to a signed 16-bit sample. */
export function mulawByteToLinear(byte: number): number {
  const u = ~byte & 0xff;
  const sign = u & 0x80;
  const exponent = (u >> 4) & 0x07;
  const mantissa = u & 0x0f;
  const magnitude = (((mantissa << 3) + MULAW_BIAS) << exponent) - MULAW_BIAS;
  return sign ? -magnitude : magnitude;
}

/** Encode one signed 16-bit sample as a µ-law byte. */
export function linearToMulawByte(sample: number): number {
  const sign = sample < 0 ? 0x80 : 0;
  let magnitude = Math.min(Math.abs(sample), MULAW_CLIP) + MULAW_BIAS;
  let exponent = 7;
  for (let mask = 0x4000; (magnitude & mask) === 0 && exponent > 0; mask >>= 1) {
    exponent--;
  }
  const mantissa = (magnitude >> (exponent + 3)) & 0x0f;
  magnitude = sign | (exponent << 4) | mantissa;
  return ~magnitude & 0xff;
}

/** µ-law bytes -> 16-bit little-endian PCM (twice the length). */
export function mulawToPcm16(mulaw: Buffer): Buffer {
  const pcm = Buffer.alloc(mulaw.length * 2);
  for (let i = 0; i < mulaw.length; i++) {
    pcm.writeInt16LE(mulawByteToLinear(mulaw[i]), i * 2);
  }
  return pcm;
}

/** 16-bit little-endian PCM -> µ-law bytes. A trailing odd byte is ignored. */
export function pcm16ToMulaw(pcm: Buffer): Buffer {
  const samples = Math.floor(pcm.length / 2);
  const out = Buffer.alloc(samples);
  for (let i = 0; i < samples; i++) {
    out[i] = linearToMulawByte(pcm.readInt16LE(i * 2));
  }
  return out;
}

/**
 * Prepend a 44-byte WAV header to 16-bit mono PCM.
 */
export function pcmToWav(pcm: Buffer, sampleRateHz: number): Buffer {
  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const dataSize = pcm.length;
  const headerSize = 44;
  const fileSize = headerSize + dataSize;
  const header = Buffer.alloc(headerSize);
  header.write("RIFF", 0);
  header.writeUInt32LE(fileSize - 8, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE((numChannels * bitsPerSample) / 8, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, pcm]);
}

/**
 * Return the sample data of a WAV buffer (walks chunks to find "data").
 * Buffers without a RIFF/WAVE header are returned unchanged.
 */
export function stripWavHeader(buf: Buffer): Buffer {
  if (buf.length < 12 || buf.toString("ascii", 0, 4) !== "RIFF" || buf.toString("ascii", 8, 12) !== "WAVE") {
    return buf;
  }
  let offset = 12;
  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;
    if (id === "data") return buf.subarray(body, Math.min(body + size, buf.length));
    offset = body + size + (size % 2);
  }
  return Buffer.alloc(0);
}

/** Bytes holding `durationMs` of mono audio: one byte per sample for µ-law, two for PCM16. */
export function bytesForDuration(encoding: AudioEncoding, sampleRateHz: number, durationMs: number): number {
  const samples = Math.round((sampleRateHz * durationMs) / 1000);
  return encoding === "mulaw" ? samples : samples * 2;
}

/** RMS of 16-bit little-endian PCM. */
export function rmsPcm16(frame: Buffer): number {
  const samples = Math.floor(frame.length / 2);
  if (samples === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples; i++) {
    const s = frame.readInt16LE(i * 2);
    sum += s * s;
  }
  return Math.sqrt(sum / samples);
}

/** RMS of µ-law bytes, measured on the decoded linear samples. */
export function rmsMulaw(frame: Buffer): number {
  if (frame.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < frame.length; i++) {
    const s = mulawByteToLinear(frame[i]);
    sum += s * s;
  }
  return Math.sqrt(sum / frame.length);
}
