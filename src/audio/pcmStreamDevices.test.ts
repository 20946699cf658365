import { describe, expect, it } from 'vitest';
import { Readable, Writable } from 'node:stream';
import type { CaptureSink } from './audioBridge.js';
import { PcmStreamCaptureDevice, PcmStreamPlaybackDevice } from './pcmStreamDevices.js';

// 8 kHz mono at 10 ms frames: 160 bytes per frame.
const format = { sampleRateHz: 8_000, channels: 1 };

function wavFile(data: Buffer): Buffer {
  const header = Buffer.alloc(44);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + data.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(1, 22);
  header.writeUInt32LE(8_000, 24);
  header.writeUInt32LE(16_000, 28);
  header.writeUInt16LE(2, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(data.length, 40);
  return Buffer.concat([header, data]);
}

function recordingSink() {
  const data: Buffer[] = [];
  const errors: Error[] = [];
  let ended = 0;
  let finish: () => void = () => undefined;
  let firstData: () => void = () => undefined;
  const done = new Promise<void>((resolve) => {
    finish = resolve;
  });
  const started = new Promise<void>((resolve) => {
    firstData = resolve;
  });
  const sink: CaptureSink = {
    onData: (pcm) => {
      data.push(pcm);
      firstData();
    },
    onError: (err) => {
      errors.push(err);
      finish();
    },
    onEnd: () => {
      ended += 1;
      finish();
    },
  };
  return { sink, data, errors, done, started, ended: () => ended };
}

describe('PcmStreamCaptureDevice', () => {
  it('splits the stream into frames, flushes the tail and appends silence', async () => {
    const device = new PcmStreamCaptureDevice(() => Readable.from([Buffer.alloc(100, 1), Buffer.alloc(300, 1)]), {
      frameMs: 10,
      realtime: false,
      trailingSilenceMs: 20,
    });
    const recorded = recordingSink();

    await device.start(format, recorded.sink);
    await recorded.done;

    expect(recorded.data.map((frame) => frame.length)).toEqual([160, 160, 80, 160, 160]);
    expect(recorded.data[3]).toEqual(Buffer.alloc(160));
    expect(recorded.ended()).toBe(1);
  });

  it('strips a WAV header before framing', async () => {
    const samples = Buffer.alloc(160, 7);
    const device = new PcmStreamCaptureDevice(() => Readable.from([wavFile(samples)]), { frameMs: 10, realtime: false });
    const recorded = recordingSink();

    await device.start(format, recorded.sink);
    await recorded.done;

    expect(recorded.data).toEqual([samples]);
  });

  it('stops mid-stream and still ends once', async () => {
    const device = new PcmStreamCaptureDevice(() => Readable.from([Buffer.alloc(1_600)]), { frameMs: 10, realtime: true });
    const recorded = recordingSink();

    await device.start(format, recorded.sink);
    await recorded.started;
    await device.stop();

    expect(recorded.data).toHaveLength(1);
    expect(recorded.ended()).toBe(1);
  });

  it('refuses a second start while running', async () => {
    const device = new PcmStreamCaptureDevice(() => Readable.from([Buffer.alloc(1_600)]), { frameMs: 10 });
    const recorded = recordingSink();

    await device.start(format, recorded.sink);
    await expect(device.start(format, recordingSink().sink)).rejects.toThrow('capture stream already running: pcm-stream');
    await device.stop();
  });

  it('reports a failing source as an error instead of an end', async () => {
    const source = () =>
      new Readable({
        read() {
          this.destroy(new Error('disk gone'));
        },
      });
    const device = new PcmStreamCaptureDevice(source, { frameMs: 10, realtime: false });
    const recorded = recordingSink();

    await device.start(format, recorded.sink);
    await recorded.done;

    expect(recorded.errors.map((err) => err.message)).toEqual(['capture stream failed: disk gone']);
    expect(recorded.ended()).toBe(0);
  });
});

describe('PcmStreamPlaybackDevice', () => {
  function memorySink() {
    const chunks: Buffer[] = [];
    const writable = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });
    return { chunks, writable };
  }

  it('writes chunks and counts the bytes', async () => {
    const { chunks, writable } = memorySink();
    const device = new PcmStreamPlaybackDevice(() => writable);

    await device.open(format);
    await device.write(Buffer.from([1, 2]));
    await device.write(Buffer.from([3]));
    await device.flush();
    await device.close();

    expect(Buffer.concat(chunks)).toEqual(Buffer.from([1, 2, 3]));
    expect(device.bytesWritten).toBe(3);
    expect(writable.writableEnded).toBe(true);
  });

  it('rejects writes before open and after close', async () => {
    const device = new PcmStreamPlaybackDevice(() => memorySink().writable, 'file-out');

    await expect(device.write(Buffer.from([1]))).rejects.toThrow('playback stream is not open: file-out');
    await device.open(format);
    await device.close();
    await expect(device.write(Buffer.from([1]))).rejects.toThrow('playback stream is not open: file-out');
  });
});
