import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { LAUNCH_MODES, DEFAULT_SOURCE_SURFACE } from './types.js';

const audioSchema = z
  .object({
    sampleRateHz: z.number().int().min(8_000).max(48_000).default(16_000),
    channels: z.number().int().min(1).max(2).default(1),
    frameMs: z.number().int().min(10).max(500).default(40),
    // ffmpeg demuxer/device names; platform defaults apply when unset
    inputFormat: z.string().min(1).optional(),
    inputDevice: z.string().min(1).optional(),
    outputFormat: z.string().min(1).optional(),
    outputDevice: z.string().min(1).optional(),
  })
  .default({});

const negotiationSchema = z
  .object({
    baseUrl: z.string().url().optional(),
    timeoutMs: z.number().int().min(100).max(120_000).default(15_000),
    launchMode: z.enum(LAUNCH_MODES).default('general'),
    sourceSurface: z.string().min(1).default(DEFAULT_SOURCE_SURFACE),
  })
  .default({});

const transportSchema = z
  .object({
    openTimeoutMs: z.number().int().min(100).max(60_000).default(10_000),
    closeTimeoutMs: z.number().int().min(10).max(30_000).default(2_000),
    pingIntervalMs: z.number().int().min(0).max(300_000).default(15_000),
    sendHighWaterBytes: z.number().int().min(16 * 1024).max(64 * 1024 * 1024).default(1024 * 1024),
  })
  .default({});

const sequencingSchema = z
  .object({
    maxHeldFrames: z.number().int().min(1).max(1024).default(32),
    gapTimeoutMs: z.number().int().min(0).max(10_000).default(250),
    recentTurnMemory: z.number().int().min(1).max(1024).default(16),
  })
  .default({});

const speechSchema = z
  .object({
    minimumSpeechRms: z.number().min(0).max(1).default(0.008),
    immediateSpeechRms: z.number().min(0).max(1).default(0.025),
    initialNoiseFloorRms: z.number().min(0).max(1).default(0.004),
    noiseFloorSmoothing: z.number().min(0).max(1).default(0.04),
    speechOverNoiseMultiplier: z.number().min(1).max(100).default(3),
    noiseCalibrationFrames: z.number().int().min(0).max(500).default(20),
    speechStartConsecutiveFrames: z.number().int().min(1).max(100).default(3),
    minimumSpeechFramesForCommit: z.number().int().min(1).max(1000).default(4),
    trailingSilenceFrames: z.number().int().min(0).max(500).default(8),
    silenceAutoCommitMs: z.number().int().min(100).max(30_000).default(1_700),
    minimumCommitMs: z.number().int().min(0).max(10_000).default(500),
    nearSilentRms: z.number().min(0).max(1).default(0.0003),
    noSignalWarningFrames: z.number().int().min(1).max(10_000).default(120),
    bargeInMinimumRms: z.number().min(0).max(1).default(0.03),
    bargeInThresholdMultiplier: z.number().min(1).max(100).default(2.5),
    bargeInConsecutiveFrames: z.number().int().min(1).max(100).default(6),
  })
  .default({});

const sessionSchema = z
  .object({
    captureQueueFrames: z.number().int().min(1).max(10_000).default(50),
    playbackQueueChunks: z.number().int().min(1).max(10_000).default(64),
    preRollFrames: z.number().int().min(0).max(1_000).default(26),
    preRollReplayFrames: z.number().int().min(0).max(1_000).default(12),
    introWatchdogMs: z.number().int().min(0).max(120_000).default(7_000),
    maxConsecutiveProtocolErrors: z.number().int().min(2).max(1_000).default(5),
    teardownTimeoutMs: z.number().int().min(10).max(30_000).default(2_000),
    timelineSize: z.number().int().min(1).max(1_000).default(36),
    autoTurns: z.boolean().default(true),
    autoReconnect: z.boolean().default(false),
  })
  .default({});

const configSchema = z.object({
  audio: audioSchema,
  negotiation: negotiationSchema,
  transport: transportSchema,
  sequencing: sequencingSchema,
  speech: speechSchema,
  session: sessionSchema,
});

export type VoiceClientConfig = z.infer<typeof configSchema>;
export type AudioConfig = VoiceClientConfig['audio'];
export type NegotiationConfig = VoiceClientConfig['negotiation'];
export type TransportConfig = VoiceClientConfig['transport'];
export type SequencingConfig = VoiceClientConfig['sequencing'];
export type SpeechConfig = VoiceClientConfig['speech'];
export type SessionConfig = VoiceClientConfig['session'];

let cachedConfig: VoiceClientConfig | null = null;

/** Validates a raw config object and fills every default. */
export function parseConfig(raw: unknown = {}): VoiceClientConfig {
  return configSchema.parse(raw);
}

export async function loadConfig(configPath = path.resolve('config.json')): Promise<VoiceClientConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const raw = await readFile(configPath, 'utf-8');
  cachedConfig = parseConfig(JSON.parse(raw));
  return cachedConfig;
}

export function reloadConfig(): void {
  cachedConfig = null;
}
