import type { Logger } from 'pino';
import type { NegotiationConfig } from '../config.js';
import { NegotiationError } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { VoiceHealth, VoiceSessionDescriptor, VoiceSessionRequest } from '../types.js';
import { withTimeoutSignal } from '../utils/abort.js';
import { createSessionResponseSchema, formatZodIssue, voiceHealthSchema } from '../validation.js';

const SESSIONS_PATH = '/api/voice/sessions';
const HEALTH_PATH = '/api/voice/health';

/** Supplies the bearer token for negotiation and the realtime socket. */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string> | string;
}

export interface SessionNegotiator {
  requestSession(request: VoiceSessionRequest, signal?: AbortSignal): Promise<VoiceSessionDescriptor>;
  checkHealth(signal?: AbortSignal): Promise<VoiceHealth>;
  resolveWebSocketUrl(path: string): string;
}

export function staticToken(token: string): AccessTokenProvider {
  return { getAccessToken: () => token };
}

export function parseBaseUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new NegotiationError(`voice API base URL is not a valid URL: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new NegotiationError('voice API base URL must use http or https');
  }
  if (url.username || url.password) {
    throw new NegotiationError('voice API base URL must not include credentials');
  }
  return url;
}

export function toWireRequest(request: VoiceSessionRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    sample_rate_hz: request.sampleRateHz,
    launch_mode: request.launchMode,
    source_surface: request.sourceSurface,
    request_intro: request.requestIntro,
  };
  if (request.sessionId) body.session_id = request.sessionId;
  if (request.contentId !== undefined) body.content_id = request.contentId;
  if (request.chatSessionId !== undefined) body.chat_session_id = request.chatSessionId;
  return body;
}

export class HttpSessionNegotiator implements SessionNegotiator {
  #baseUrl: URL;
  #tokens: AccessTokenProvider;
  #timeoutMs: number;
  #logger: Logger;

  constructor(options: {
    baseUrl: string;
    tokens: AccessTokenProvider;
    config: Pick<NegotiationConfig, 'timeoutMs'>;
    logger?: Logger;
  }) {
    this.#baseUrl = parseBaseUrl(options.baseUrl);
    this.#tokens = options.tokens;
    this.#timeoutMs = options.config.timeoutMs;
    this.#logger = options.logger ?? componentLogger('voice_negotiator');
  }

  async requestSession(request: VoiceSessionRequest, signal?: AbortSignal): Promise<VoiceSessionDescriptor> {
    const startedAt = Date.now();
    const data = await this.#fetchJson('POST', SESSIONS_PATH, toWireRequest(request), signal);
    const parsed = createSessionResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new NegotiationError(`voice session response is malformed (${formatZodIssue(parsed.error)})`, {
        cause: parsed.error,
      });
    }
    const body = parsed.data;
    const descriptor: VoiceSessionDescriptor = {
      sessionId: body.session_id,
      websocketPath: body.websocket_path,
      websocketUrl: this.resolveWebSocketUrl(body.websocket_path),
      sampleRateHz: body.sample_rate_hz,
      channels: body.channels,
      audioFormat: body.audio_format,
      ttsOutputFormat: body.tts_output_format,
      maxInputSeconds: body.max_input_seconds,
      chatSessionId: body.chat_session_id,
      launchMode: body.launch_mode,
      contentContextAttached: body.content_context_attached,
    };
    this.#logger.info({
      event: 'voice_session_negotiated',
      sessionId: descriptor.sessionId,
      chatSessionId: descriptor.chatSessionId,
      launchMode: descriptor.launchMode,
      resumed: Boolean(request.sessionId),
      elapsedMs: Date.now() - startedAt,
    });
    return descriptor;
  }

  async checkHealth(signal?: AbortSignal): Promise<VoiceHealth> {
    const data = await this.#fetchJson('GET', HEALTH_PATH, undefined, signal);
    const parsed = voiceHealthSchema.safeParse(data);
    if (!parsed.success) {
      throw new NegotiationError(`voice health response is malformed (${formatZodIssue(parsed.error)})`);
    }
    return parsed.data;
  }

  resolveWebSocketUrl(path: string): string {
    const trimmed = path.trim();
    if (/^wss?:\/\//i.test(trimmed)) {
      const absolute = new URL(trimmed);
      if (absolute.username || absolute.password) {
        throw new NegotiationError('voice websocket URL must not include credentials');
      }
      return absolute.toString();
    }
    const url = new URL(trimmed, this.#baseUrl);
    url.protocol = this.#baseUrl.protocol === 'https:' ? 'wss:' : 'ws:';
    return url.toString();
  }

  async #fetchJson(method: 'GET' | 'POST', path: string, body: unknown, outer?: AbortSignal): Promise<unknown> {
    const url = new URL(path, this.#baseUrl).toString();
    let token: string;
    try {
      token = await this.#tokens.getAccessToken();
    } catch (err) {
      throw new NegotiationError('could not obtain a voice access token', { cause: err });
    }
    const { signal, didTimeout, cleanup } = withTimeoutSignal({ signal: outer, timeoutMs: this.#timeoutMs });

    try {
      const res = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/json',
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal,
      });

      if (!res.ok) {
        const text = await res.text().catch(() => '');
        this.#logger.warn({ event: 'voice_negotiation_http_error', path, status: res.status });
        throw new NegotiationError(`voice API error (${res.status}): ${text.slice(0, 300)}`, { status: res.status });
      }

      try {
        const body: unknown = await res.json();
        return body;
      } catch (err) {
        throw new NegotiationError('voice API returned a non-JSON body', { status: res.status, cause: err });
      }
    } catch (err) {
      if (err instanceof NegotiationError) throw err;
      if (didTimeout()) {
        throw new NegotiationError(`voice API request timed out after ${this.#timeoutMs}ms`, { cause: err });
      }
      if (outer?.aborted) {
        throw new NegotiationError('voice API request aborted', { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new NegotiationError(`voice API request failed: ${message}`, { cause: err });
    } finally {
      cleanup();
    }
  }
}
