import { once } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import { HardwareError, toError } from '../errors.js';
import type { AudioFormat } from '../types.js';
import { sleep } from '../utils/abort.js';
import { bytesPerFrame, stripWavHeader } from '../utils/pcm.js';
import type { CaptureDevice, CaptureSink, PlaybackDevice } from './audioBridge.js';

export interface PcmStreamCaptureOptions {
  id?: string;
  frameMs?: number;
  /** Emit frames at wall-clock pace; off delivers as fast as the stream reads. */
  realtime?: boolean;
  /** Milliseconds of silence appended after the stream ends. */
  trailingSilenceMs?: number;
}

/**
 * Capture device fed from a PCM16LE (or WAV) stream. Used by the smoke script
 * and tests in place of a microphone.
 */
export class PcmStreamCaptureDevice implements CaptureDevice {
  readonly id: string;
  #open: () => Readable;
  #options: Required<Omit<PcmStreamCaptureOptions, 'id'>>;
  #abort: AbortController | null = null;
  #pump: Promise<void> | null = null;

  constructor(open: () => Readable, options: PcmStreamCaptureOptions = {}) {
    this.#open = open;
    this.id = options.id ?? 'pcm-stream';
    this.#options = {
      frameMs: options.frameMs ?? 40,
      realtime: options.realtime ?? true,
      trailingSilenceMs: options.trailingSilenceMs ?? 0,
    };
  }

  async start(format: AudioFormat, sink: CaptureSink): Promise<void> {
    if (this.#abort) {
      throw new HardwareError(`capture stream already running: ${this.id}`);
    }
    let source: Readable;
    try {
      source = this.#open();
    } catch (err) {
      throw new HardwareError(`could not open capture stream: ${toError(err).message}`, { cause: err });
    }
    const abort = new AbortController();
    this.#abort = abort;
    this.#pump = this.#run(source, format, sink, abort.signal).finally(() => {
      if (this.#abort === abort) this.#abort = null;
    });
  }

  async stop(): Promise<void> {
    this.#abort?.abort();
    await this.#pump;
    this.#pump = null;
  }

  async #run(source: Readable, format: AudioFormat, sink: CaptureSink, signal: AbortSignal): Promise<void> {
    const frameBytes = bytesPerFrame(format, this.#options.frameMs);
    let pending: Buffer = Buffer.alloc(0);
    let headerChecked = false;
    const emit = async (frame: Buffer) => {
      sink.onData(frame);
      if (this.#options.realtime) {
        await sleep(this.#options.frameMs, signal);
      }
    };

    try {
      for await (const chunk of source) {
        if (signal.aborted) break;
        const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        pending = pending.length > 0 ? Buffer.concat([pending, data]) : data;
        if (!headerChecked && pending.length >= 44) {
          pending = stripWavHeader(pending);
          headerChecked = true;
        }
        if (!headerChecked) continue;
        while (pending.length >= frameBytes && !signal.aborted) {
          await emit(Buffer.from(pending.subarray(0, frameBytes)));
          pending = pending.subarray(frameBytes);
        }
      }
      if (!signal.aborted && pending.length > 0) {
        await emit(Buffer.from(pending));
      }
      const silenceFrames = Math.ceil(this.#options.trailingSilenceMs / this.#options.frameMs);
      for (let i = 0; i < silenceFrames && !signal.aborted; i += 1) {
        await emit(Buffer.alloc(frameBytes));
      }
    } catch (err) {
      if (!signal.aborted) {
        sink.onError(new HardwareError(`capture stream failed: ${toError(err).message}`, { cause: err }));
        return;
      }
    } finally {
      source.destroy();
    }
    sink.onEnd();
  }
}

/** Playback device that writes PCM into a Writable (a file, or a buffer in tests). */
export class PcmStreamPlaybackDevice implements PlaybackDevice {
  readonly id: string;
  #open: () => Writable;
  #target: Writable | null = null;
  #written = 0;

  constructor(open: () => Writable, id = 'pcm-sink') {
    this.#open = open;
    this.id = id;
  }

  get bytesWritten(): number {
    return this.#written;
  }

  async open(_format: AudioFormat): Promise<void> {
    try {
      this.#target = this.#open();
    } catch (err) {
      throw new HardwareError(`could not open playback stream: ${toError(err).message}`, { cause: err });
    }
  }

  async write(pcm: Buffer): Promise<void> {
    const target = this.#target;
    if (!target || target.destroyed) {
      throw new HardwareError(`playback stream is not open: ${this.id}`);
    }
    this.#written += pcm.length;
    if (!target.write(pcm)) {
      await once(target, 'drain');
    }
  }

  async flush(): Promise<void> {
    // Written bytes cannot be recalled from a stream.
  }

  async close(): Promise<void> {
    const target = this.#target;
    this.#target = null;
    if (!target || target.destroyed || target.writableEnded) return;
    await new Promise<void>((resolve) => target.end(() => resolve()));
  }
}
