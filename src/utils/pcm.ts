import type { AudioFormat } from '../types.js';

const BYTES_PER_SAMPLE = 2;
const FULL_SCALE = 32768;
const LEVEL_FLOOR_DB = -60;

/** RMS of little-endian PCM16 samples, normalized so a full-scale square wave is 1. */
export function computeRms(pcm: Buffer): number {
  const samples = Math.floor(pcm.length / BYTES_PER_SAMPLE);
  if (samples === 0) return 0;
  let sumSquares = 0;
  for (let i = 0; i < samples; i += 1) {
    const value = pcm.readInt16LE(i * BYTES_PER_SAMPLE) / FULL_SCALE;
    sumSquares += value * value;
  }
  return Math.sqrt(sumSquares / samples);
}

/** Maps an RMS level onto 0..1 for visualization (-60 dBFS and below → 0). */
export function levelFromRms(rms: number): number {
  if (!Number.isFinite(rms) || rms <= 0) return 0;
  const db = 20 * Math.log10(rms);
  if (db <= LEVEL_FLOOR_DB) return 0;
  return Math.min(1, (db - LEVEL_FLOOR_DB) / -LEVEL_FLOOR_DB);
}

export function bytesPerFrame(format: AudioFormat, frameMs: number): number {
  const samples = Math.round((format.sampleRateHz * frameMs) / 1000);
  return Math.max(BYTES_PER_SAMPLE, samples * BYTES_PER_SAMPLE * format.channels);
}

export function pcmDurationMs(byteLength: number, format: AudioFormat): number {
  const bytesPerSecond = format.sampleRateHz * format.channels * BYTES_PER_SAMPLE;
  if (bytesPerSecond <= 0) return 0;
  return (byteLength / bytesPerSecond) * 1000;
}

/** Accepts backend format tags such as `pcm_16000`; returns undefined for anything else. */
export function parsePcmFormatTag(tag: string | undefined): number | undefined {
  if (!tag) return undefined;
  const match = /^pcm(?:16)?_(\d{4,6})$/i.exec(tag.trim());
  if (!match) return undefined;
  const rate = Number(match[1]);
  return Number.isFinite(rate) && rate > 0 ? rate : undefined;
}

export function decodeBase64Audio(value: string): Buffer | null {
  const trimmed = value.trim();
  if (!trimmed || !/^[A-Za-z0-9+/]+={0,2}$/.test(trimmed)) return null;
  const buffer = Buffer.from(trimmed, 'base64');
  return buffer.length > 0 ? buffer : null;
}

/**
 * Strips a canonical 44-byte RIFF/WAVE header when present. Anything else is
 * treated as raw PCM16.
 */
export function stripWavHeader(data: Buffer): Buffer {
  if (data.length < 44) return data;
  if (data.toString('ascii', 0, 4) !== 'RIFF' || data.toString('ascii', 8, 12) !== 'WAVE') {
    return data;
  }
  let offset = 12;
  while (offset + 8 <= data.length) {
    const chunkId = data.toString('ascii', offset, offset + 4);
    const chunkSize = data.readUInt32LE(offset + 4);
    if (chunkId === 'data') {
      return data.subarray(offset + 8, Math.min(data.length, offset + 8 + chunkSize));
    }
    offset += 8 + chunkSize + (chunkSize % 2);
  }
  return data.subarray(44);
}
