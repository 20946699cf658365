import { afterEach, describe, expect, it, vi } from 'vitest';
import { NegotiationError } from '../errors.js';
import type { VoiceSessionRequest } from '../types.js';
import { HttpSessionNegotiator, parseBaseUrl, staticToken, toWireRequest } from './sessionNegotiator.js';

const sessionBody = {
  session_id: 'sess-9',
  websocket_path: '/ws/voice/sess-9',
  sample_rate_hz: 16000,
  channels: 1,
  audio_format: 'pcm16',
  tts_output_format: 'pcm_24000',
  max_input_seconds: 30,
  chat_session_id: 12,
  launch_mode: 'article_voice',
  content_context_attached: true,
};

const request: VoiceSessionRequest = {
  contentId: 5,
  launchMode: 'article_voice',
  sourceSurface: 'knowledge_live',
  sampleRateHz: 16000,
  requestIntro: true,
};

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

function negotiator(baseUrl = 'https://api.test', timeoutMs = 1_000) {
  return new HttpSessionNegotiator({ baseUrl, tokens: staticToken('test-token'), config: { timeoutMs } });
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.useRealTimers();
});

describe('HttpSessionNegotiator.requestSession', () => {
  it('posts the snake_case request with a bearer token and returns the descriptor', async () => {
    const fetchMock = vi.fn(async (_url: unknown, _init?: RequestInit) => jsonResponse(sessionBody));
    vi.stubGlobal('fetch', fetchMock);

    const descriptor = await negotiator().requestSession(request);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.test/api/voice/sessions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-token', 'Content-Type': 'application/json' });
    expect(JSON.parse(String(init?.body))).toEqual({
      sample_rate_hz: 16000,
      launch_mode: 'article_voice',
      source_surface: 'knowledge_live',
      request_intro: true,
      content_id: 5,
    });
    expect(descriptor).toEqual({
      sessionId: 'sess-9',
      websocketPath: '/ws/voice/sess-9',
      websocketUrl: 'wss://api.test/ws/voice/sess-9',
      sampleRateHz: 16000,
      channels: 1,
      audioFormat: 'pcm16',
      ttsOutputFormat: 'pcm_24000',
      maxInputSeconds: 30,
      chatSessionId: 12,
      launchMode: 'article_voice',
      contentContextAttached: true,
    });
  });

  it('surfaces HTTP errors with their status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ detail: 'voice disabled' }, 503)));

    const error = await negotiator()
      .requestSession(request)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NegotiationError);
    expect(error).toMatchObject({ status: 503, kind: 'negotiation' });
    expect((error as Error).message).toBe('voice API error (503): {"detail":"voice disabled"}');
  });

  it('rejects a response missing required fields', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ ...sessionBody, session_id: undefined })));

    await expect(negotiator().requestSession(request)).rejects.toThrow(
      'voice session response is malformed (session_id: Required)'
    );
  });

  it('rejects a non-JSON body', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => ({
        ok: true,
        status: 200,
        json: async () => {
          throw new SyntaxError('Unexpected token <');
        },
        text: async () => '<html>',
      }))
    );

    await expect(negotiator().requestSession(request)).rejects.toThrow('voice API returned a non-JSON body');
  });

  it('times out a hanging request', async () => {
    vi.useFakeTimers();
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: unknown, init?: RequestInit) =>
          new Promise((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      )
    );

    const pending = negotiator('https://api.test', 500).requestSession(request);
    const assertion = expect(pending).rejects.toThrow('voice API request timed out after 500ms');
    // the timer is armed once the token resolves
    await Promise.resolve();
    await Promise.resolve();
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });

  it('wraps network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(negotiator().requestSession(request)).rejects.toThrow('voice API request failed: fetch failed');
  });

  it('wraps token provider failures', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const failing = new HttpSessionNegotiator({
      baseUrl: 'https://api.test',
      tokens: {
        getAccessToken: async () => {
          throw new Error('refresh failed');
        },
      },
      config: { timeoutMs: 1_000 },
    });

    await expect(failing.requestSession(request)).rejects.toThrow('could not obtain a voice access token');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('HttpSessionNegotiator.checkHealth', () => {
  it('returns the health flags', async () => {
    const fetchMock = vi.fn(async (_url: unknown, _init?: RequestInit) =>
      jsonResponse({ voice_enabled: true, stt_provider: 'test', queue_depth: 0 })
    );
    vi.stubGlobal('fetch', fetchMock);

    await expect(negotiator().checkHealth()).resolves.toEqual({
      voice_enabled: true,
      stt_provider: 'test',
      queue_depth: 0,
    });
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.test/api/voice/health');
    expect(fetchMock.mock.calls[0][1]?.body).toBeUndefined();
  });
});

describe('URL handling', () => {
  it('maps http to ws and https to wss', () => {
    expect(negotiator('http://localhost:8000').resolveWebSocketUrl('/ws/voice/a')).toBe('ws://localhost:8000/ws/voice/a');
    expect(negotiator('https://api.test').resolveWebSocketUrl('/ws/voice/a')).toBe('wss://api.test/ws/voice/a');
  });

  it('keeps absolute websocket URLs', () => {
    expect(negotiator().resolveWebSocketUrl('wss://rt.api.test/ws/voice/a')).toBe('wss://rt.api.test/ws/voice/a');
  });

  it('refuses credentials in URLs', () => {
    expect(() => negotiator().resolveWebSocketUrl('wss://user:pw@rt.api.test/ws')).toThrow(NegotiationError);
    expect(() => parseBaseUrl('https://user:pw@api.test')).toThrow('must not include credentials');
  });

  it('refuses non-http base URLs', () => {
    expect(() => parseBaseUrl('ftp://api.test')).toThrow('must use http or https');
    expect(() => parseBaseUrl('not a url')).toThrow('not a valid URL');
  });

  it('omits absent optional fields from the wire request', () => {
    expect(toWireRequest({ ...request, contentId: undefined, sessionId: 'sess-1', chatSessionId: 3 })).toEqual({
      sample_rate_hz: 16000,
      launch_mode: 'article_voice',
      source_surface: 'knowledge_live',
      request_intro: true,
      session_id: 'sess-1',
      chat_session_id: 3,
    });
  });
});
