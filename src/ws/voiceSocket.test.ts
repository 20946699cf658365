import { afterEach, describe, expect, it, vi } from 'vitest';
import { parseConfig } from '../config.js';
import { TransportError } from '../errors.js';
import type { TransportFrame, VoiceConnection } from './voiceSocket.js';

interface FakeSocket {
  url: string;
  options: Record<string, unknown>;
  sent: Array<string | Buffer>;
  bufferedAmount: number;
  silentClose: boolean;
  closeCalls: number;
  terminateCalls: number;
  open(): void;
  remoteClose(code: number, reason?: string): void;
  emit(event: string, ...args: unknown[]): boolean;
}

const wsState = vi.hoisted(() => {
  const instances: FakeSocket[] = [];
  return { instances };
});

function lastSocket(): FakeSocket {
  const socket = wsState.instances.at(-1);
  if (!socket) throw new Error('no socket was created');
  return socket;
}

vi.mock('ws', async () => {
  const { EventEmitter } = await import('node:events');
  class FakeWebSocket extends EventEmitter {
    static CONNECTING = 0;
    static OPEN = 1;
    static CLOSING = 2;
    static CLOSED = 3;
    url: string;
    options: Record<string, unknown>;
    sent: Array<string | Buffer> = [];
    readyState = 0;
    bufferedAmount = 0;
    silentClose = false;
    closeCalls = 0;
    terminateCalls = 0;

    constructor(url: string, options: Record<string, unknown>) {
      super();
      this.url = url;
      this.options = options;
      wsState.instances.push(this);
    }

    open() {
      this.readyState = FakeWebSocket.OPEN;
      this.emit('open');
    }

    send(data: string | Buffer, cb: (err?: Error) => void) {
      this.sent.push(data);
      cb();
    }

    close(code: number, reason: string) {
      this.closeCalls += 1;
      if (this.silentClose) {
        this.readyState = FakeWebSocket.CLOSING;
        return;
      }
      this.remoteClose(code, reason);
    }

    remoteClose(code: number, reason = '') {
      this.readyState = FakeWebSocket.CLOSED;
      this.emit('close', code, Buffer.from(reason));
    }

    terminate() {
      this.terminateCalls += 1;
      this.remoteClose(1006);
    }

    ping() {
      // no-op
    }
  }

  return { WebSocket: FakeWebSocket };
});

const transportConfig = parseConfig({ transport: { pingIntervalMs: 0, openTimeoutMs: 100, closeTimeoutMs: 10 } }).transport;

async function openConnection(url = 'ws://voice.test/ws/voice/a') {
  const { WsVoiceTransport } = await import('./voiceSocket.js');
  const transport = new WsVoiceTransport(transportConfig);
  const pending = transport.connect(url, { headers: { Authorization: 'Bearer test-token' } });
  const ws = lastSocket();
  ws.open();
  const connection = await pending;
  return { ws, connection };
}

async function collect(connection: VoiceConnection): Promise<TransportFrame[]> {
  const frames: TransportFrame[] = [];
  for await (const frame of connection.frames()) {
    frames.push(frame);
  }
  return frames;
}

afterEach(() => {
  wsState.instances.length = 0;
  vi.useRealTimers();
});

describe('WsVoiceTransport.connect', () => {
  it('opens the socket with the auth header and handshake timeout', async () => {
    const { ws, connection } = await openConnection();

    expect(ws.url).toBe('ws://voice.test/ws/voice/a');
    expect(ws.options).toEqual({ headers: { Authorization: 'Bearer test-token' }, handshakeTimeout: 100 });
    expect(connection.isOpen).toBe(true);
  });

  it('rejects non-websocket URLs and embedded credentials', async () => {
    const { WsVoiceTransport } = await import('./voiceSocket.js');
    const transport = new WsVoiceTransport(transportConfig);

    await expect(transport.connect('http://voice.test/ws')).rejects.toThrow('must use ws or wss');
    await expect(transport.connect('wss://user:pw@voice.test/ws')).rejects.toThrow('must not include credentials');
    expect(wsState.instances).toHaveLength(0);
  });

  it('maps an auth close during the handshake to a readable error', async () => {
    const { WsVoiceTransport } = await import('./voiceSocket.js');
    const pending = new WsVoiceTransport(transportConfig).connect('ws://voice.test/ws');
    lastSocket().remoteClose(4401);

    await expect(pending).rejects.toMatchObject({ code: 4401, message: 'voice socket rejected the access token' });
  });

  it('reports a rejected upgrade with its HTTP status', async () => {
    const { WsVoiceTransport } = await import('./voiceSocket.js');
    const pending = new WsVoiceTransport(transportConfig).connect('ws://voice.test/ws');
    const ws = lastSocket();
    ws.emit('unexpected-response', {}, { statusCode: 403 });

    await expect(pending).rejects.toThrow('voice socket upgrade rejected (HTTP 403)');
    expect(ws.terminateCalls).toBe(1);
  });

  it('gives up when the socket does not open in time', async () => {
    vi.useFakeTimers();
    const { WsVoiceTransport } = await import('./voiceSocket.js');
    const pending = new WsVoiceTransport(transportConfig).connect('ws://voice.test/ws');
    const assertion = expect(pending).rejects.toThrow('voice socket did not open within 100ms');

    await vi.advanceTimersByTimeAsync(100);
    await assertion;
    expect(lastSocket().terminateCalls).toBe(1);
  });

  it('aborts a pending connect', async () => {
    const { WsVoiceTransport } = await import('./voiceSocket.js');
    const controller = new AbortController();
    const pending = new WsVoiceTransport(transportConfig).connect('ws://voice.test/ws', { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toThrow('connect aborted');
  });
});

describe('WsVoiceConnection', () => {
  it('yields text and binary frames until a normal close', async () => {
    const { ws, connection } = await openConnection();
    const frames = collect(connection);

    ws.emit('message', Buffer.from('{"type":"session.ready"}'), false);
    ws.emit('message', Buffer.from([1, 2]), true);
    ws.remoteClose(1000);

    await expect(frames).resolves.toEqual([
      { kind: 'text', data: '{"type":"session.ready"}' },
      { kind: 'binary', data: Buffer.from([1, 2]) },
    ]);
  });

  it('ends with one error marker on an abnormal close', async () => {
    const { ws, connection } = await openConnection();
    const frames = collect(connection);

    ws.remoteClose(4404);

    const received = await frames;
    expect(received).toHaveLength(1);
    const [marker] = received;
    expect(marker.kind).toBe('error');
    if (marker.kind === 'error') {
      expect(marker.error).toBeInstanceOf(TransportError);
      expect(marker.error.message).toBe('voice session was not found');
    }
  });

  it('does not emit a second marker when an error is followed by close', async () => {
    const { ws, connection } = await openConnection();
    const frames = collect(connection);

    ws.emit('error', new Error('read ECONNRESET'));
    ws.remoteClose(1006);

    const received = await frames;
    expect(received.map((frame) => frame.kind)).toEqual(['error']);
  });

  it('refuses to hand out the frame stream twice', async () => {
    const { connection } = await openConnection();
    connection.frames();
    expect(() => connection.frames()).toThrow('already consumed');
  });

  it('sends control frames as JSON text and buffers as binary', async () => {
    const { ws, connection } = await openConnection();

    await connection.send({ type: 'audio.commit', seq: 3 });
    await connection.send(Buffer.from([7]));

    expect(ws.sent).toEqual(['{"type":"audio.commit","seq":3}', Buffer.from([7])]);
  });

  it('waits for the send buffer to drain below the high-water mark', async () => {
    const { ws, connection } = await openConnection();
    ws.bufferedAmount = transportConfig.sendHighWaterBytes + 1;

    const pending = connection.send({ type: 'intro.ack' });
    await new Promise((resolve) => setTimeout(resolve, 25));
    expect(ws.sent).toHaveLength(0);

    ws.bufferedAmount = 0;
    await pending;
    expect(ws.sent).toEqual(['{"type":"intro.ack"}']);
  });

  it('rejects sends after close', async () => {
    const { connection } = await openConnection();
    await connection.close();

    expect(connection.isOpen).toBe(false);
    await expect(connection.send({ type: 'session.end' })).rejects.toThrow('voice socket is not open');
  });

  it('closes once however often close is called', async () => {
    const { ws, connection } = await openConnection();

    await Promise.all([connection.close(), connection.close()]);
    await connection.close();

    expect(ws.closeCalls).toBe(1);
    expect(ws.terminateCalls).toBe(0);
  });

  it('terminates a socket that does not finish closing', async () => {
    const { ws, connection } = await openConnection();
    ws.silentClose = true;

    await connection.close();

    expect(ws.terminateCalls).toBe(1);
  });
});
