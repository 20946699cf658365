import { DeviceAudioBridge } from './audio/audioBridge.js';
import type { CaptureDevice, PlaybackDevice } from './audio/audioBridge.js';
import { createFfmpegDevices } from './audio/ffmpegDevices.js';
import type { VoiceClientConfig } from './config.js';
import { NegotiationError } from './errors.js';
import { HttpSessionNegotiator, staticToken } from './negotiation/sessionNegotiator.js';
import type { AccessTokenProvider } from './negotiation/sessionNegotiator.js';
import { getApiBaseUrl, getApiToken } from './utils/env.js';
import { VoiceSessionController } from './voice/sessionController.js';
import { WsVoiceTransport } from './ws/voiceSocket.js';

export * from './types.js';
export * from './errors.js';
export { parseConfig, loadConfig, reloadConfig } from './config.js';
export type {
  VoiceClientConfig,
  AudioConfig,
  NegotiationConfig,
  TransportConfig,
  SequencingConfig,
  SpeechConfig,
  SessionConfig,
} from './config.js';
export { loadEnvironment } from './utils/env.js';
export { logger } from './logger.js';
export type { ReadonlyObservable } from './utils/observable.js';
export { HttpSessionNegotiator, staticToken } from './negotiation/sessionNegotiator.js';
export type { AccessTokenProvider, SessionNegotiator } from './negotiation/sessionNegotiator.js';
export { WsVoiceTransport } from './ws/voiceSocket.js';
export type { ConnectOptions, TransportFrame, VoiceConnection, VoiceTransport } from './ws/voiceSocket.js';
export { decodeTextFrame, decodeBinaryFrame, encodeClientFrame } from './ws/frameCodec.js';
export type { DecodeResult } from './ws/frameCodec.js';
export { DeviceAudioBridge } from './audio/audioBridge.js';
export type { AudioBridge, CaptureDevice, CaptureSink, PlaybackDevice } from './audio/audioBridge.js';
export { FfmpegCaptureDevice, FfmpegPlaybackDevice, createFfmpegDevices } from './audio/ffmpegDevices.js';
export { PcmStreamCaptureDevice, PcmStreamPlaybackDevice } from './audio/pcmStreamDevices.js';
export { SpeechDetector } from './audio/speechDetector.js';
export { TurnSequencer } from './voice/turnSequencer.js';
export { TurnStateMachine } from './voice/turnStateMachine.js';
export type { TranscriptSnapshot, TurnEffect } from './voice/turnStateMachine.js';
export { VoiceSessionController } from './voice/sessionController.js';
export type { SessionPhase, VoiceSessionControllerDeps } from './voice/sessionController.js';

export interface CreateVoiceClientOptions {
  /** Falls back to `negotiation.baseUrl`, then VOICE_API_BASE_URL. */
  baseUrl?: string;
  token?: string;
  tokens?: AccessTokenProvider;
  /** Overrides the ffmpeg microphone and speaker. */
  devices?: { capture: CaptureDevice; playback: PlaybackDevice };
}

/** Wires the HTTP negotiator, websocket transport and device audio into a controller. */
export function createVoiceClient(config: VoiceClientConfig, options: CreateVoiceClientOptions = {}): VoiceSessionController {
  const baseUrl = options.baseUrl ?? config.negotiation.baseUrl ?? getApiBaseUrl();
  if (!baseUrl) {
    throw new NegotiationError('voice API base URL is not configured (set VOICE_API_BASE_URL)');
  }
  let tokens = options.tokens;
  if (!tokens) {
    const token = options.token ?? getApiToken();
    if (!token) {
      throw new NegotiationError('voice API token is not configured (set VOICE_API_TOKEN)');
    }
    tokens = staticToken(token);
  }

  const devices = options.devices ?? createFfmpegDevices(config.audio);
  const audio = new DeviceAudioBridge({
    capture: devices.capture,
    playback: devices.playback,
    format: { sampleRateHz: config.audio.sampleRateHz, channels: config.audio.channels },
    frameMs: config.audio.frameMs,
    captureQueueFrames: config.session.captureQueueFrames,
    playbackQueueChunks: config.session.playbackQueueChunks,
    stopTimeoutMs: config.session.teardownTimeoutMs,
  });

  return new VoiceSessionController({
    negotiator: new HttpSessionNegotiator({ baseUrl, tokens, config: config.negotiation }),
    transport: new WsVoiceTransport(config.transport),
    tokens,
    audio,
    config,
  });
}
