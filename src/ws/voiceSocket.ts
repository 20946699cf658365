import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import type { Logger } from 'pino';
import type { TransportConfig } from '../config.js';
import { TransportError, toError } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { ClientFrame } from '../types.js';
import { sleep } from '../utils/abort.js';
import { BoundedChannel } from '../utils/boundedChannel.js';
import { encodeClientFrame } from './frameCodec.js';

export type TransportFrame =
  | { kind: 'text'; data: string }
  | { kind: 'binary'; data: Buffer }
  | { kind: 'error'; error: TransportError };

export interface VoiceConnection {
  readonly isOpen: boolean;
  /** JSON control frames go out as text, buffers as binary. */
  send(frame: ClientFrame | Buffer, signal?: AbortSignal): Promise<void>;
  /** Lazy and single-use: a second call throws. */
  frames(): AsyncIterable<TransportFrame>;
  close(code?: number, reason?: string): Promise<void>;
}

export interface ConnectOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface VoiceTransport {
  connect(url: string, options?: ConnectOptions): Promise<VoiceConnection>;
}

const NORMAL_CLOSE_CODES = new Set([1000, 1001, 1005]);
const SEND_POLL_MS = 10;

const CLOSE_CODE_MESSAGES: Record<number, string> = {
  4401: 'voice socket rejected the access token',
  4404: 'voice session was not found',
};

function rawDataToBuffer(raw: RawData): Buffer {
  if (Buffer.isBuffer(raw)) return raw;
  if (raw instanceof ArrayBuffer) return Buffer.from(raw);
  return Buffer.concat(raw);
}

export function assertSocketUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (err) {
    throw new TransportError(`invalid voice socket URL: ${url}`, { cause: err });
  }
  if (parsed.protocol !== 'ws:' && parsed.protocol !== 'wss:') {
    throw new TransportError(`voice socket URL must use ws or wss: ${parsed.protocol}`);
  }
  if (parsed.username || parsed.password) {
    throw new TransportError('voice socket URL must not include credentials');
  }
  return parsed;
}

class WsVoiceConnection implements VoiceConnection {
  #ws: WebSocket;
  #config: TransportConfig;
  #logger: Logger;
  #inbound = new BoundedChannel<TransportFrame>(Number.POSITIVE_INFINITY);
  #framesTaken = false;
  #closeRequested = false;
  #closed: Promise<void>;
  #pingTimer: NodeJS.Timeout | null = null;

  constructor(ws: WebSocket, config: TransportConfig, logger: Logger) {
    this.#ws = ws;
    this.#config = config;
    this.#logger = logger;

    this.#closed = new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
    });

    ws.on('message', (raw, isBinary) => {
      const data = rawDataToBuffer(raw);
      this.#inbound.push(isBinary ? { kind: 'binary', data } : { kind: 'text', data: data.toString('utf8') });
    });

    ws.on('error', (err) => {
      this.#logger.warn({ event: 'voice_ws_error', message: err.message });
      this.#fail(new TransportError(err.message || 'voice socket error', { cause: err }));
    });

    ws.on('close', (code, reason) => {
      if (this.#pingTimer) clearInterval(this.#pingTimer);
      const reasonText = reason.toString();
      this.#logger.info({ event: 'voice_ws_close', code, reason: reasonText, requested: this.#closeRequested });
      if (this.#closeRequested || NORMAL_CLOSE_CODES.has(code)) {
        this.#inbound.close();
        return;
      }
      const message = CLOSE_CODE_MESSAGES[code] ?? (reasonText || `voice socket closed abnormally (${code})`);
      this.#fail(new TransportError(message, { code }));
    });

    if (config.pingIntervalMs > 0) {
      this.#pingTimer = setInterval(() => {
        if (ws.readyState !== WebSocket.OPEN) return;
        try {
          ws.ping();
        } catch (err) {
          this.#logger.debug({ event: 'voice_ws_ping_error', message: toError(err).message });
        }
      }, config.pingIntervalMs);
      this.#pingTimer.unref?.();
    }
  }

  get isOpen(): boolean {
    return this.#ws.readyState === WebSocket.OPEN && !this.#closeRequested;
  }

  async send(frame: ClientFrame | Buffer, signal?: AbortSignal): Promise<void> {
    const payload = Buffer.isBuffer(frame) ? frame : encodeClientFrame(frame);
    while (this.#ws.bufferedAmount > this.#config.sendHighWaterBytes) {
      if (!this.isOpen) break;
      if (signal?.aborted) {
        throw new TransportError('send aborted', { cause: signal.reason });
      }
      await sleep(SEND_POLL_MS, signal);
    }
    if (!this.isOpen) {
      throw new TransportError('voice socket is not open');
    }
    await new Promise<void>((resolve, reject) => {
      this.#ws.send(payload, (err) => {
        if (err) {
          reject(new TransportError(err.message || 'voice socket send failed', { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  frames(): AsyncIterable<TransportFrame> {
    if (this.#framesTaken) {
      throw new TransportError('inbound frame sequence was already consumed');
    }
    this.#framesTaken = true;
    return this.#inbound;
  }

  async close(code = 1000, reason = 'client closing'): Promise<void> {
    if (!this.#closeRequested) {
      this.#closeRequested = true;
      if (this.#pingTimer) clearInterval(this.#pingTimer);
      const state = this.#ws.readyState;
      if (state === WebSocket.OPEN || state === WebSocket.CONNECTING) {
        try {
          this.#ws.close(code, reason);
        } catch (err) {
          this.#logger.debug({ event: 'voice_ws_close_error', message: toError(err).message });
          this.#ws.terminate();
        }
      }
    }
    if (this.#ws.readyState === WebSocket.CLOSED) {
      this.#inbound.close();
      return;
    }

    let timer: NodeJS.Timeout | null = null;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.#config.closeTimeoutMs);
      timer.unref?.();
    });
    const outcome = await Promise.race([this.#closed.then(() => 'closed' as const), timedOut]);
    if (timer) clearTimeout(timer);
    if (outcome === 'timeout') {
      this.#logger.warn({ event: 'voice_ws_close_timeout', timeoutMs: this.#config.closeTimeoutMs });
      this.#ws.terminate();
    }
    this.#inbound.close();
  }

  #fail(error: TransportError): void {
    if (this.#inbound.closed) return;
    this.#inbound.push({ kind: 'error', error });
    this.#inbound.close();
  }
}

export class WsVoiceTransport implements VoiceTransport {
  #config: TransportConfig;
  #logger: Logger;

  constructor(config: TransportConfig, logger: Logger = componentLogger('voice_transport')) {
    this.#config = config;
    this.#logger = logger;
  }

  connect(url: string, options: ConnectOptions = {}): Promise<VoiceConnection> {
    let target: URL;
    try {
      target = assertSocketUrl(url);
    } catch (err) {
      return Promise.reject(err);
    }
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new TransportError('connect aborted', { cause: signal.reason }));
    }

    this.#logger.info({ event: 'voice_ws_connect', host: target.host, path: target.pathname });
    const ws = new WebSocket(target.toString(), {
      headers: options.headers,
      handshakeTimeout: this.#config.openTimeoutMs,
    });

    return new Promise<VoiceConnection>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        settle(new TransportError(`voice socket did not open within ${this.#config.openTimeoutMs}ms`));
      }, this.#config.openTimeoutMs);
      timer.unref?.();

      const onAbort = () => settle(new TransportError('connect aborted', { cause: signal?.reason }));
      const onError = (err: Error) => settle(new TransportError(err.message || 'voice socket error', { cause: err }));
      const onClose = (code: number) =>
        settle(new TransportError(CLOSE_CODE_MESSAGES[code] ?? `voice socket closed before open (${code})`, { code }));
      const onUnexpectedResponse = (_req: unknown, res: { statusCode?: number }) => {
        settle(
          new TransportError(`voice socket upgrade rejected (HTTP ${res.statusCode ?? 'unknown'})`, {
            code: res.statusCode,
          })
        );
      };
      const onOpen = () => {
        if (settled) return;
        settled = true;
        cleanup();
        this.#logger.info({ event: 'voice_ws_open', host: target.host });
        resolve(new WsVoiceConnection(ws, this.#config, this.#logger));
      };

      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        ws.off('open', onOpen);
        ws.off('error', onError);
        ws.off('close', onClose);
        ws.off('unexpected-response', onUnexpectedResponse);
      };

      const logger = this.#logger;
      function settle(error: TransportError) {
        if (settled) return;
        settled = true;
        cleanup();
        // terminate() on a connecting socket emits one more error
        ws.on('error', (err) => logger.debug({ event: 'voice_ws_abandoned_error', message: err.message }));
        ws.terminate();
        reject(error);
      }

      ws.once('open', onOpen);
      ws.once('error', onError);
      ws.once('close', onClose);
      ws.once('unexpected-response', onUnexpectedResponse);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
