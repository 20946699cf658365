import type { Logger } from 'pino';
import { HardwareError, toError } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { AudioFormat, PcmChunk } from '../types.js';
import { settleWithin } from '../utils/abort.js';
import { BoundedChannel } from '../utils/boundedChannel.js';
import { ListenerSet } from '../utils/observable.js';
import { bytesPerFrame, computeRms, levelFromRms } from '../utils/pcm.js';

export interface CaptureSink {
  onData(pcm: Buffer): void;
  onError(err: Error): void;
  onEnd(): void;
}

/** Microphone-like source of raw PCM16LE. */
export interface CaptureDevice {
  readonly id: string;
  start(format: AudioFormat, sink: CaptureSink): Promise<void>;
  stop(): Promise<void>;
}

/** Speaker-like sink of raw PCM16LE. */
export interface PlaybackDevice {
  readonly id: string;
  open(format: AudioFormat): Promise<void>;
  /** Resolves once the device accepted the chunk. */
  write(pcm: Buffer): Promise<void>;
  /** Drops audio the device has buffered but not yet played. */
  flush(): Promise<void>;
  close(): Promise<void>;
}

export interface AudioBridge {
  acquire(): Promise<void>;
  startCapture(): Promise<AsyncIterable<PcmChunk>>;
  stopCapture(): Promise<void>;
  playback(pcm: Buffer): void;
  flushPlayback(): void;
  /** Normalized 0..1 energy of each chunk handed to the speaker. */
  onPlaybackEnergy(listener: (energy: number) => void): () => void;
  /** Device failures after acquisition. */
  onFault(listener: (error: HardwareError) => void): () => void;
  stop(): Promise<void>;
}

export interface DeviceAudioBridgeOptions {
  capture: CaptureDevice;
  playback: PlaybackDevice;
  format: AudioFormat;
  frameMs: number;
  captureQueueFrames: number;
  playbackQueueChunks: number;
  stopTimeoutMs?: number;
  now?: () => number;
  logger?: Logger;
}

// Devices are process-wide hardware; a device id can be leased by one bridge at a time.
const leasedDevices = new Set<string>();

/**
 * Owns one capture and one playback device for the length of a session.
 * Playback is queued and written by its own pump so callers never wait on the
 * speaker.
 */
export class DeviceAudioBridge implements AudioBridge {
  #options: DeviceAudioBridgeOptions;
  #logger: Logger;
  #now: () => number;
  #frameBytes: number;

  #leased = false;
  #stopping: Promise<void> | null = null;

  #captureChannel: BoundedChannel<PcmChunk> | null = null;
  #captureRemainder: Buffer = Buffer.alloc(0);
  #capturing = false;

  #playbackQueue: BoundedChannel<Buffer> | null = null;
  #playbackPump: Promise<void> | null = null;
  #pendingFlush: Promise<void> | null = null;
  #flushEpoch = 0;

  #energyListeners = new ListenerSet<number>('playback_energy');
  #faultListeners = new ListenerSet<HardwareError>('audio_fault');

  constructor(options: DeviceAudioBridgeOptions) {
    this.#options = options;
    this.#logger = options.logger ?? componentLogger('voice_audio');
    this.#now = options.now ?? Date.now;
    this.#frameBytes = bytesPerFrame(options.format, options.frameMs);
  }

  get isLeased(): boolean {
    return this.#leased;
  }

  get isCapturing(): boolean {
    return this.#capturing;
  }

  async acquire(): Promise<void> {
    const { capture, playback, format } = this.#options;
    if (this.#leased || this.#stopping) {
      throw new HardwareError('audio bridge is already acquired');
    }
    for (const id of [capture.id, playback.id]) {
      if (leasedDevices.has(id)) {
        throw new HardwareError(`audio device is in use: ${id}`);
      }
    }
    leasedDevices.add(capture.id);
    leasedDevices.add(playback.id);
    this.#leased = true;

    try {
      await playback.open(format);
    } catch (err) {
      this.#releaseLease();
      throw new HardwareError(`could not open playback device ${playback.id}: ${toError(err).message}`, { cause: err });
    }

    const queue = new BoundedChannel<Buffer>(this.#options.playbackQueueChunks, () => {
      this.#logger.debug({ event: 'voice_playback_chunk_dropped', dropped: queue.dropped });
    });
    this.#playbackQueue = queue;
    this.#playbackPump = this.#pumpPlayback(queue);
    this.#logger.info({ event: 'voice_audio_acquired', capture: capture.id, playback: playback.id });
  }

  async startCapture(): Promise<AsyncIterable<PcmChunk>> {
    if (!this.#leased || this.#stopping) {
      throw new HardwareError('audio bridge is not acquired');
    }
    if (this.#captureChannel && !this.#captureChannel.closed) {
      return this.#captureChannel;
    }

    const channel = new BoundedChannel<PcmChunk>(this.#options.captureQueueFrames);
    this.#captureChannel = channel;
    this.#captureRemainder = Buffer.alloc(0);
    const { capture, format } = this.#options;
    try {
      await capture.start(format, {
        onData: (pcm) => this.#onCaptureData(channel, pcm),
        onError: (err) => {
          channel.close();
          this.#capturing = false;
          this.#faultListeners.emit(
            err instanceof HardwareError ? err : new HardwareError(`capture failed: ${err.message}`, { cause: err })
          );
        },
        onEnd: () => {
          channel.close();
          this.#capturing = false;
        },
      });
    } catch (err) {
      channel.close({ discard: true });
      this.#captureChannel = null;
      throw new HardwareError(`could not start capture device ${capture.id}: ${toError(err).message}`, { cause: err });
    }
    this.#capturing = true;
    this.#logger.debug({ event: 'voice_capture_started', device: capture.id });
    return channel;
  }

  async stopCapture(): Promise<void> {
    const channel = this.#captureChannel;
    this.#captureChannel = null;
    if (!channel) return;
    const wasCapturing = this.#capturing;
    this.#capturing = false;
    channel.close({ discard: true });
    if (!wasCapturing) return;
    try {
      await this.#options.capture.stop();
    } catch (err) {
      this.#logger.warn({ event: 'voice_capture_stop_failed', message: toError(err).message });
    }
  }

  playback(pcm: Buffer): void {
    if (pcm.length === 0) return;
    this.#playbackQueue?.push(pcm);
  }

  flushPlayback(): void {
    const queue = this.#playbackQueue;
    if (!queue) return;
    const discarded = queue.drain().length;
    this.#flushEpoch += 1;
    const previous = this.#pendingFlush ?? Promise.resolve();
    this.#pendingFlush = previous.then(() =>
      this.#options.playback.flush().catch((err: unknown) => {
        this.#logger.warn({ event: 'voice_playback_flush_failed', message: toError(err).message });
      })
    );
    this.#energyListeners.emit(0);
    this.#logger.debug({ event: 'voice_playback_flushed', discarded });
  }

  onPlaybackEnergy(listener: (energy: number) => void): () => void {
    return this.#energyListeners.add(listener);
  }

  onFault(listener: (error: HardwareError) => void): () => void {
    return this.#faultListeners.add(listener);
  }

  stop(): Promise<void> {
    if (!this.#stopping) {
      this.#stopping = this.#teardown().finally(() => {
        this.#stopping = null;
      });
    }
    return this.#stopping;
  }

  async #teardown(): Promise<void> {
    if (!this.#leased) return;
    const timeoutMs = this.#options.stopTimeoutMs ?? 2_000;
    await this.stopCapture();

    this.#playbackQueue?.close({ discard: true });
    const pump = this.#playbackPump;
    this.#playbackQueue = null;
    this.#playbackPump = null;
    if (pump) {
      await settleWithin(pump, timeoutMs);
    }

    try {
      await settleWithin(this.#options.playback.close(), timeoutMs);
    } catch (err) {
      this.#logger.warn({ event: 'voice_playback_close_failed', message: toError(err).message });
    }
    this.#releaseLease();
    this.#energyListeners.emit(0);
    this.#logger.info({ event: 'voice_audio_released' });
  }

  #releaseLease(): void {
    leasedDevices.delete(this.#options.capture.id);
    leasedDevices.delete(this.#options.playback.id);
    this.#leased = false;
  }

  #onCaptureData(channel: BoundedChannel<PcmChunk>, pcm: Buffer): void {
    if (channel.closed) return;
    let buffered = this.#captureRemainder.length > 0 ? Buffer.concat([this.#captureRemainder, pcm]) : pcm;
    while (buffered.length >= this.#frameBytes) {
      const frame = Buffer.from(buffered.subarray(0, this.#frameBytes));
      buffered = buffered.subarray(this.#frameBytes);
      channel.push({ pcm: frame, rms: computeRms(frame), captureTs: this.#now() });
    }
    this.#captureRemainder = Buffer.from(buffered);
  }

  async #pumpPlayback(queue: BoundedChannel<Buffer>): Promise<void> {
    for await (const chunk of queue) {
      if (this.#pendingFlush) {
        const flushing = this.#pendingFlush;
        this.#pendingFlush = null;
        await flushing;
      }
      const epoch = this.#flushEpoch;
      try {
        await this.#options.playback.write(chunk);
      } catch (err) {
        // a flush that lands mid-write may tear down the sink under it
        if (epoch !== this.#flushEpoch) {
          this.#logger.debug({ event: 'voice_playback_write_superseded', message: toError(err).message });
          continue;
        }
        const error = new HardwareError(`playback failed: ${toError(err).message}`, { cause: err });
        this.#logger.error({ event: 'voice_playback_failed', message: error.message });
        this.#faultListeners.emit(error);
        return;
      }
      this.#energyListeners.emit(levelFromRms(computeRms(chunk)));
    }
  }
}
