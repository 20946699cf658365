export const LAUNCH_MODES = ['general', 'article_voice', 'dictate_summary'] as const;

export type LaunchMode = (typeof LAUNCH_MODES)[number];

export const DEFAULT_SOURCE_SURFACE = 'knowledge_live';

export interface VoiceSessionRequest {
  /** Resume an existing server session instead of creating a new one. */
  sessionId?: string;
  contentId?: number;
  chatSessionId?: number;
  launchMode: LaunchMode;
  sourceSurface: string;
  sampleRateHz: number;
  requestIntro: boolean;
}

export interface VoiceSessionDescriptor {
  sessionId: string;
  websocketPath: string;
  websocketUrl: string;
  sampleRateHz: number;
  channels: number;
  audioFormat: string;
  ttsOutputFormat: string;
  maxInputSeconds: number;
  chatSessionId: number;
  launchMode: LaunchMode;
  contentContextAttached: boolean;
}

export interface VoiceHealth {
  [flag: string]: boolean | string | number | null;
}

/** What opened the voice screen: the same fields the negotiation request carries, all optional. */
export interface LiveVoiceRoute {
  sessionId?: string;
  contentId?: number;
  chatSessionId?: number;
  launchMode?: LaunchMode;
  sourceSurface?: string;
}

export const INBOUND_EVENT_TYPES = [
  'session.ready',
  'speech.started',
  'turn.started',
  'transcript.partial',
  'transcript.final',
  'assistant.text.delta',
  'assistant.text.final',
  'assistant.audio.chunk',
  'assistant.audio.final',
  'turn.completed',
  'turn.cancelled',
  'response.cancelled',
  'intro.acknowledged',
  'error',
] as const;

export type InboundEventType = (typeof INBOUND_EVENT_TYPES)[number];

export interface TurnEvent {
  type: InboundEventType;
  turnId?: string;
  text?: string;
  seq?: number;
  /** Decoded assistant audio (from `audio_b64` or a binary frame). */
  audio?: Buffer;
  format?: string;
  code?: string;
  message?: string;
  retryable?: boolean;
  latencyMs?: number;
  ttsEnabled?: boolean;
  reason?: string;
  isIntro?: boolean;
  isOnboardingIntro?: boolean;
  turnIndex?: number;
  streamEpoch?: number;
  rollbackTurnIndex?: number;
  chatSessionId?: number;
  sessionId?: string;
}

export type ClientFrame =
  | { type: 'session.start'; session_id: string }
  | { type: 'audio.frame'; seq: number; pcm16_b64: string; sample_rate_hz: number; channels: number }
  | { type: 'audio.commit'; seq: number }
  | { type: 'response.cancel' }
  | { type: 'intro.ack' }
  | { type: 'session.end' };

export type TurnState =
  | 'idle'
  | 'listening'
  | 'userSpeaking'
  | 'thinking'
  | 'assistantSpeaking'
  | 'error'
  | 'closed';

export type ConnectionState =
  | { status: 'idle' }
  | { status: 'connecting' }
  | { status: 'connected' }
  | { status: 'failed'; reason: string }
  | { status: 'closed' };

export type ConnectionStatus = ConnectionState['status'];

export interface PcmChunk {
  pcm: Buffer;
  /** Root-mean-square level in 0..1 (full scale = 1). */
  rms: number;
  captureTs: number;
}

export interface AudioFormat {
  sampleRateHz: number;
  channels: number;
}

export type VoiceNoticeKind =
  | 'remote_error'
  | 'protocol_error'
  | 'no_mic_signal'
  | 'commit_skipped'
  | 'frames_dropped'
  | 'reconnecting';

export interface VoiceNotice {
  kind: VoiceNoticeKind;
  message: string;
  code?: string;
  ts: number;
}
