import { describe, expect, it } from 'vitest';
import { ProtocolError } from '../errors.js';
import {
  buildAudioFrame,
  decodeBinaryFrame,
  decodeTextFrame,
  encodeClientFrame,
  isTurnScopedEvent,
  normalizeEventType,
} from './frameCodec.js';

describe('decodeTextFrame', () => {
  it('maps snake_case fields onto a TurnEvent', () => {
    const result = decodeTextFrame(
      JSON.stringify({
        type: 'assistant.text.delta',
        turn_id: 't1',
        seq: 3,
        text: 'Hello',
        turn_index: 2,
        stream_epoch: 5,
      })
    );
    expect(result).toEqual({
      kind: 'event',
      event: { type: 'assistant.text.delta', turnId: 't1', seq: 3, text: 'Hello', turnIndex: 2, streamEpoch: 5 },
    });
  });

  it('accepts camelCase keys and legacy type aliases', () => {
    const result = decodeTextFrame(JSON.stringify({ type: 'turn_start', turnId: 't9', seq: 0, isIntro: true }));
    expect(result).toEqual({ kind: 'event', event: { type: 'turn.started', turnId: 't9', seq: 0, isIntro: true } });
  });

  it('decodes inline assistant audio', () => {
    const result = decodeTextFrame(JSON.stringify({ type: 'assistant.audio.chunk', turn_id: 't1', audio_b64: 'AQIDBA==' }));
    expect(result.kind).toBe('event');
    if (result.kind === 'event') {
      expect(result.event.audio).toEqual(Buffer.from([1, 2, 3, 4]));
    }
  });

  it('treats an audio chunk without decodable audio as malformed', () => {
    const result = decodeTextFrame(JSON.stringify({ type: 'assistant.audio.chunk', audio_b64: '' }));
    expect(result.kind).toBe('malformed');
  });

  it('gives error events a default message', () => {
    const result = decodeTextFrame(JSON.stringify({ type: 'error', code: 'rate_limited', retryable: true }));
    expect(result).toEqual({
      kind: 'event',
      event: { type: 'error', code: 'rate_limited', retryable: true, message: 'Voice error (rate_limited)' },
    });
  });

  it('ignores unknown types', () => {
    expect(decodeTextFrame(JSON.stringify({ type: 'server.stats', cpu: 3 }))).toEqual({
      kind: 'ignored',
      type: 'server.stats',
    });
  });

  it('reports invalid JSON, non-objects and bad fields as malformed', () => {
    for (const text of ['{', '[1,2]', '"text"', JSON.stringify({ type: 'turn.started', seq: -1 })]) {
      const result = decodeTextFrame(text);
      expect(result.kind).toBe('malformed');
      if (result.kind === 'malformed') {
        expect(result.error).toBeInstanceOf(ProtocolError);
      }
    }
  });

  it('names the offending field', () => {
    const result = decodeTextFrame(JSON.stringify({ type: 'turn.started', seq: 'one' }));
    expect(result.kind === 'malformed' && result.error.message).toMatch(/^invalid frame \(seq: /);
  });
});

describe('decodeBinaryFrame', () => {
  it('wraps PCM as an audio chunk without a turn', () => {
    expect(decodeBinaryFrame(Buffer.from([9, 9]))).toEqual({
      kind: 'event',
      event: { type: 'assistant.audio.chunk', audio: Buffer.from([9, 9]) },
    });
  });

  it('rejects an empty frame', () => {
    expect(decodeBinaryFrame(Buffer.alloc(0)).kind).toBe('malformed');
  });
});

describe('client frames', () => {
  it('encodes audio as base64 with the session format', () => {
    const frame = buildAudioFrame(4, Buffer.from([1, 2, 3, 4]), { sampleRateHz: 16_000, channels: 1 });
    expect(JSON.parse(encodeClientFrame(frame))).toEqual({
      type: 'audio.frame',
      seq: 4,
      pcm16_b64: 'AQIDBA==',
      sample_rate_hz: 16_000,
      channels: 1,
    });
  });
});

describe('event classification', () => {
  it('normalizes aliases and rejects unknown names', () => {
    expect(normalizeEventType('turn_end')).toBe('turn.completed');
    expect(normalizeEventType('USER_SPEECH_START')).toBe('speech.started');
    expect(normalizeEventType('turn.cancelled')).toBe('turn.cancelled');
    expect(normalizeEventType('bogus')).toBeNull();
  });

  it('scopes turn frames but not session-wide events', () => {
    expect(isTurnScopedEvent('assistant.audio.chunk')).toBe(true);
    expect(isTurnScopedEvent('session.ready')).toBe(false);
    expect(isTurnScopedEvent('response.cancelled')).toBe(false);
  });
});
