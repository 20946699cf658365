import { ProtocolError } from '../errors.js';
import { INBOUND_EVENT_TYPES } from '../types.js';
import type { AudioFormat, ClientFrame, InboundEventType, TurnEvent } from '../types.js';
import { decodeBase64Audio } from '../utils/pcm.js';
import { formatZodIssue, inboundFrameSchema, snakeCaseKeys } from '../validation.js';

export type DecodeResult =
  | { kind: 'event'; event: TurnEvent }
  | { kind: 'ignored'; type: string }
  | { kind: 'malformed'; error: ProtocolError };

const EVENT_TYPE_ALIASES: Record<string, InboundEventType> = {
  turn_start: 'turn.started',
  turn_started: 'turn.started',
  turn_end: 'turn.completed',
  turn_completed: 'turn.completed',
  user_speech_start: 'speech.started',
  error_event: 'error',
};

const KNOWN_TYPES = new Set<string>(INBOUND_EVENT_TYPES);

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isInboundEventType(value: string): value is InboundEventType {
  return KNOWN_TYPES.has(value);
}

export function normalizeEventType(raw: string): InboundEventType | null {
  const trimmed = raw.trim();
  if (isInboundEventType(trimmed)) return trimmed;
  return EVENT_TYPE_ALIASES[trimmed.toLowerCase()] ?? null;
}

const malformed = (message: string): DecodeResult => ({ kind: 'malformed', error: new ProtocolError(message) });

export function decodeTextFrame(text: string): DecodeResult {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return malformed('frame is not valid JSON');
  }
  if (!isRecord(payload)) {
    return malformed('frame is not a JSON object');
  }

  const parsed = inboundFrameSchema.safeParse(snakeCaseKeys(payload));
  if (!parsed.success) {
    return malformed(`invalid frame (${formatZodIssue(parsed.error)})`);
  }
  const frame = parsed.data;
  const type = normalizeEventType(frame.type);
  if (!type) {
    return { kind: 'ignored', type: frame.type };
  }

  const event: TurnEvent = { type };
  if (frame.turn_id != null) event.turnId = frame.turn_id;
  if (frame.text != null) event.text = frame.text;
  if (frame.seq != null) event.seq = frame.seq;
  if (frame.format != null) event.format = frame.format;
  if (frame.code != null) event.code = frame.code;
  if (frame.message != null) event.message = frame.message;
  if (frame.retryable != null) event.retryable = frame.retryable;
  if (frame.latency_ms != null) event.latencyMs = frame.latency_ms;
  if (frame.tts_enabled != null) event.ttsEnabled = frame.tts_enabled;
  if (frame.reason != null) event.reason = frame.reason;
  if (frame.is_intro != null) event.isIntro = frame.is_intro;
  if (frame.is_onboarding_intro != null) event.isOnboardingIntro = frame.is_onboarding_intro;
  if (frame.turn_index != null) event.turnIndex = frame.turn_index;
  if (frame.stream_epoch != null) event.streamEpoch = frame.stream_epoch;
  if (frame.rollback_turn_index != null) event.rollbackTurnIndex = frame.rollback_turn_index;
  if (frame.chat_session_id != null) event.chatSessionId = frame.chat_session_id;
  if (frame.session_id != null) event.sessionId = frame.session_id;

  if (type === 'assistant.audio.chunk') {
    const audio = frame.audio_b64 != null ? decodeBase64Audio(frame.audio_b64) : null;
    if (!audio) {
      return malformed('assistant.audio.chunk without decodable audio_b64');
    }
    event.audio = audio;
  }

  if (type === 'error' && !event.message) {
    event.message = event.code ? `Voice error (${event.code})` : 'Voice error';
  }

  return { kind: 'event', event };
}

/** Binary frames carry raw PCM16 for whichever turn is active. */
export function decodeBinaryFrame(data: Buffer): DecodeResult {
  if (data.length === 0) {
    return malformed('empty binary frame');
  }
  return { kind: 'event', event: { type: 'assistant.audio.chunk', audio: data } };
}

export function encodeClientFrame(frame: ClientFrame): string {
  return JSON.stringify(frame);
}

export function buildAudioFrame(seq: number, pcm: Buffer, format: AudioFormat): ClientFrame {
  return {
    type: 'audio.frame',
    seq,
    pcm16_b64: pcm.toString('base64'),
    sample_rate_hz: format.sampleRateHz,
    channels: format.channels,
  };
}

export function isTurnScopedEvent(type: InboundEventType): boolean {
  switch (type) {
    case 'turn.started':
    case 'transcript.final':
    case 'assistant.text.delta':
    case 'assistant.text.final':
    case 'assistant.audio.chunk':
    case 'assistant.audio.final':
    case 'turn.completed':
    case 'turn.cancelled':
      return true;
    default:
      return false;
  }
}

/** Markers after which a turn accepts no more frames. */
export function isAssistantOutputEvent(type: InboundEventType): boolean {
  return (
    type === 'assistant.text.delta' ||
    type === 'assistant.text.final' ||
    type === 'assistant.audio.chunk' ||
    type === 'assistant.audio.final'
  );
}

export function isTurnTerminalEvent(type: InboundEventType): boolean {
  return type === 'turn.completed' || type === 'turn.cancelled';
}
