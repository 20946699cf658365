import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { once } from 'node:events';
import type { Writable } from 'node:stream';
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import type { Logger } from 'pino';
import type { AudioConfig } from '../config.js';
import { HardwareError, toError } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { AudioFormat } from '../types.js';
import type { CaptureDevice, CaptureSink, PlaybackDevice } from './audioBridge.js';

export interface FfmpegDeviceSpec {
  format: string;
  device: string;
}

const STDERR_TAIL_BYTES = 2_000;

export function defaultInputDevice(platform: NodeJS.Platform = process.platform): FfmpegDeviceSpec | null {
  switch (platform) {
    case 'linux':
      return { format: 'pulse', device: 'default' };
    case 'darwin':
      return { format: 'avfoundation', device: ':0' };
    case 'win32':
      return { format: 'dshow', device: 'audio=default' };
    default:
      return null;
  }
}

export function defaultOutputDevice(platform: NodeJS.Platform = process.platform): FfmpegDeviceSpec | null {
  switch (platform) {
    case 'linux':
      return { format: 'pulse', device: 'default' };
    case 'darwin':
      return { format: 'audiotoolbox', device: '0' };
    default:
      return null;
  }
}

export function buildCaptureArgs(input: FfmpegDeviceSpec, format: AudioFormat): string[] {
  return [
    '-nostdin',
    '-hide_banner',
    '-v',
    'error',
    '-f',
    input.format,
    '-i',
    input.device,
    '-ac',
    String(format.channels),
    '-ar',
    String(format.sampleRateHz),
    '-f',
    's16le',
    'pipe:1',
  ];
}

export function buildPlaybackArgs(output: FfmpegDeviceSpec, format: AudioFormat): string[] {
  return [
    '-nostdin',
    '-hide_banner',
    '-v',
    'error',
    '-f',
    's16le',
    '-ar',
    String(format.sampleRateHz),
    '-ac',
    String(format.channels),
    '-i',
    'pipe:0',
    '-f',
    output.format,
    output.device,
  ];
}

function collectStderr(proc: ChildProcess): () => string {
  let tail = '';
  proc.stderr?.on('data', (chunk: Buffer) => {
    tail = (tail + chunk.toString('utf8')).slice(-STDERR_TAIL_BYTES);
  });
  return () => tail.trim();
}

async function waitForSpawn(proc: ChildProcess): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const onSpawn = () => {
      proc.off('error', onError);
      resolve();
    };
    const onError = (err: Error) => {
      proc.off('spawn', onSpawn);
      reject(err);
    };
    proc.once('spawn', onSpawn);
    proc.once('error', onError);
  });
}

async function stopProcess(proc: ChildProcess, timeoutMs: number): Promise<void> {
  if (proc.exitCode !== null || proc.signalCode !== null) return;
  const exited = once(proc, 'close').then(() => undefined);
  proc.kill('SIGTERM');
  let timer: NodeJS.Timeout | null = null;
  const timedOut = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), timeoutMs);
    timer.unref?.();
  });
  const outcome = await Promise.race([exited.then(() => 'exited' as const), timedOut]);
  if (timer) clearTimeout(timer);
  if (outcome === 'timeout') {
    proc.kill('SIGKILL');
  }
}

/** Resolves on `drain`; rejects when the stream errors or closes first. */
function waitForDrain(stream: Writable): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const cleanup = () => {
      stream.off('drain', onDrain);
      stream.off('error', onError);
      stream.off('close', onClose);
    };
    const onDrain = () => {
      cleanup();
      resolve();
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    const onClose = () => {
      cleanup();
      reject(new Error('stream closed before drain'));
    };
    stream.on('drain', onDrain);
    stream.on('error', onError);
    stream.on('close', onClose);
  });
}

/** Microphone capture through an ffmpeg input device. */
export class FfmpegCaptureDevice implements CaptureDevice {
  readonly id: string;
  #spec: FfmpegDeviceSpec;
  #logger: Logger;
  #proc: ChildProcess | null = null;
  #stopping = false;

  constructor(spec: FfmpegDeviceSpec, logger: Logger = componentLogger('voice_audio')) {
    this.#spec = spec;
    this.#logger = logger;
    this.id = `ffmpeg-in:${spec.format}:${spec.device}`;
  }

  async start(format: AudioFormat, sink: CaptureSink): Promise<void> {
    if (this.#proc) {
      throw new HardwareError(`capture device already running: ${this.id}`);
    }
    this.#stopping = false;
    const args = buildCaptureArgs(this.#spec, format);
    const proc = spawn(ffmpegInstaller.path, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stderrTail = collectStderr(proc);
    try {
      await waitForSpawn(proc);
    } catch (err) {
      throw new HardwareError(`ffmpeg capture could not start: ${toError(err).message}`, { cause: err });
    }
    this.#proc = proc;
    this.#logger.info({ event: 'voice_ffmpeg_capture_started', device: this.id, pid: proc.pid });

    proc.stdout?.on('data', (chunk: Buffer) => sink.onData(chunk));
    proc.once('error', (err) => sink.onError(new HardwareError(`ffmpeg capture failed: ${err.message}`, { cause: err })));
    proc.once('close', (code) => {
      this.#proc = null;
      if (this.#stopping || code === 0) {
        sink.onEnd();
        return;
      }
      const detail = stderrTail();
      sink.onError(new HardwareError(`ffmpeg capture exited with code ${code ?? 'null'}${detail ? `: ${detail}` : ''}`));
    });
  }

  async stop(): Promise<void> {
    const proc = this.#proc;
    if (!proc) return;
    this.#stopping = true;
    await stopProcess(proc, 1_000);
    this.#proc = null;
  }
}

/** Speaker output through an ffmpeg output device. */
export class FfmpegPlaybackDevice implements PlaybackDevice {
  readonly id: string;
  #spec: FfmpegDeviceSpec;
  #logger: Logger;
  #format: AudioFormat | null = null;
  #proc: ChildProcess | null = null;

  constructor(spec: FfmpegDeviceSpec, logger: Logger = componentLogger('voice_audio')) {
    this.#spec = spec;
    this.#logger = logger;
    this.id = `ffmpeg-out:${spec.format}:${spec.device}`;
  }

  async open(format: AudioFormat): Promise<void> {
    this.#format = format;
    await this.#spawn(format);
  }

  async write(pcm: Buffer): Promise<void> {
    const proc = this.#proc;
    const stdin = proc?.stdin;
    if (!stdin || stdin.destroyed) {
      throw new HardwareError(`playback device is not open: ${this.id}`);
    }
    if (stdin.write(pcm)) return;
    try {
      await waitForDrain(stdin);
    } catch (err) {
      // flush or close replaced the process; the pending audio is meant to be dropped
      if (this.#proc !== proc) return;
      throw new HardwareError(`playback write failed: ${toError(err).message}`, { cause: err });
    }
  }

  /** ffmpeg has no flush; the process is restarted so queued audio stops at once. */
  async flush(): Promise<void> {
    const format = this.#format;
    if (!format || !this.#proc) return;
    await this.#kill();
    await this.#spawn(format);
  }

  async close(): Promise<void> {
    const proc = this.#proc;
    if (!proc) return;
    this.#proc = null;
    this.#format = null;
    proc.stdin?.end();
    await stopProcess(proc, 1_000);
  }

  async #spawn(format: AudioFormat): Promise<void> {
    const proc = spawn(ffmpegInstaller.path, buildPlaybackArgs(this.#spec, format), {
      stdio: ['pipe', 'ignore', 'pipe'],
    });
    const stderrTail = collectStderr(proc);
    try {
      await waitForSpawn(proc);
    } catch (err) {
      throw new HardwareError(`ffmpeg playback could not start: ${toError(err).message}`, { cause: err });
    }
    proc.stdin?.on('error', (err) => {
      this.#logger.debug({ event: 'voice_ffmpeg_playback_stdin_error', message: err.message });
    });
    proc.once('close', (code) => {
      if (this.#proc === proc) this.#proc = null;
      if (code !== 0 && code !== null) {
        this.#logger.warn({ event: 'voice_ffmpeg_playback_exit', code, stderr: stderrTail() });
      }
    });
    this.#proc = proc;
  }

  async #kill(): Promise<void> {
    const proc = this.#proc;
    this.#proc = null;
    if (proc) {
      await stopProcess(proc, 500);
    }
  }
}

/** Resolves the configured (or platform default) ffmpeg input and output devices. */
export function createFfmpegDevices(
  audio: Pick<AudioConfig, 'inputFormat' | 'inputDevice' | 'outputFormat' | 'outputDevice'>,
  platform: NodeJS.Platform = process.platform
): { capture: FfmpegCaptureDevice; playback: FfmpegPlaybackDevice } {
  const inputDefault = defaultInputDevice(platform);
  const outputDefault = defaultOutputDevice(platform);
  const inputFormat = audio.inputFormat ?? inputDefault?.format;
  const inputDevice = audio.inputDevice ?? inputDefault?.device;
  const outputFormat = audio.outputFormat ?? outputDefault?.format;
  const outputDevice = audio.outputDevice ?? outputDefault?.device;
  if (!inputFormat || !inputDevice) {
    throw new HardwareError(`no default microphone for platform ${platform}; set audio.inputFormat and audio.inputDevice`);
  }
  if (!outputFormat || !outputDevice) {
    throw new HardwareError(`no default speaker for platform ${platform}; set audio.outputFormat and audio.outputDevice`);
  }
  return {
    capture: new FfmpegCaptureDevice({ format: inputFormat, device: inputDevice }),
    playback: new FfmpegPlaybackDevice({ format: outputFormat, device: outputDevice }),
  };
}
