import type { Logger } from 'pino';
import type { AudioBridge } from '../audio/audioBridge.js';
import { SpeechDetector } from '../audio/speechDetector.js';
import type { VoiceClientConfig } from '../config.js';
import { ProtocolError, TransportError, VoiceClientError, describeError, toError } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { AccessTokenProvider, SessionNegotiator } from '../negotiation/sessionNegotiator.js';
import type {
  ClientFrame,
  ConnectionState,
  LaunchMode,
  LiveVoiceRoute,
  PcmChunk,
  TurnEvent,
  TurnState,
  VoiceNotice,
  VoiceNoticeKind,
  VoiceSessionDescriptor,
} from '../types.js';
import { settleWithin } from '../utils/abort.js';
import { BoundedChannel } from '../utils/boundedChannel.js';
import { ListenerSet, ObservableValue } from '../utils/observable.js';
import type { ReadonlyObservable } from '../utils/observable.js';
import { levelFromRms } from '../utils/pcm.js';
import { EventTimeline } from '../utils/timeline.js';
import { buildAudioFrame, decodeBinaryFrame, decodeTextFrame } from '../ws/frameCodec.js';
import type { DecodeResult } from '../ws/frameCodec.js';
import type { VoiceConnection, VoiceTransport } from '../ws/voiceSocket.js';
import { TurnSequencer } from './turnSequencer.js';
import { TurnStateMachine } from './turnStateMachine.js';
import type { TranscriptSnapshot, TurnEffect } from './turnStateMachine.js';

export type SessionPhase = 'idle' | 'connecting' | 'active' | 'ended' | 'failed';

export interface VoiceSessionControllerDeps {
  negotiator: SessionNegotiator;
  transport: VoiceTransport;
  tokens: AccessTokenProvider;
  audio: AudioBridge;
  config: VoiceClientConfig;
  logger?: Logger;
  now?: () => number;
}

interface EstablishParams {
  sessionId?: string;
  chatSessionId?: number;
  requestIntro: boolean;
  cause: 'connect' | 'reconnect' | 'auto_reconnect';
}

/** Everything that belongs to one open socket. */
interface ActiveRun {
  generation: number;
  descriptor: VoiceSessionDescriptor;
  connection: VoiceConnection;
  abort: AbortController;
  outbound: BoundedChannel<ClientFrame>;
  workers: Promise<void>[];
  shutdown: Promise<void> | null;
  autoStartOnReady: boolean;
  listening: boolean;
  frameSeq: number;
  preRoll: Buffer[];
  protocolErrors: number;
  noSignalNotified: boolean;
  introWatchdog: NodeJS.Timeout | null;
}

// session.end is a courtesy; it must not hold up teardown
const SESSION_END_BUDGET_MS = 250;
const DROP_NOTICE_INTERVAL = 50;

const sameConnectionState = (a: ConnectionState, b: ConnectionState) =>
  a.status === b.status && (a.status !== 'failed' || b.status !== 'failed' || a.reason === b.reason);

/**
 * Drives one live voice session: negotiation, socket, audio, and turn-taking.
 * The controller is the only writer of the connection state; turn state is
 * written by its TurnStateMachine.
 */
export class VoiceSessionController {
  #deps: VoiceSessionControllerDeps;
  #config: VoiceClientConfig;
  #logger: Logger;
  #now: () => number;

  #phase: SessionPhase = 'idle';
  #connection = new ObservableValue<ConnectionState>({ status: 'idle' }, {
    label: 'connection_state',
    equals: sameConnectionState,
  });
  #level = new ObservableValue<number>(0, { label: 'level' });
  #turns: TurnStateMachine;
  #sequencer: TurnSequencer;
  #detector: SpeechDetector;
  #timeline: EventTimeline;
  #notices = new ListenerSet<VoiceNotice>('voice_notice');
  #events = new ListenerSet<TurnEvent>('voice_event');

  #route: LiveVoiceRoute = {};
  #descriptor: VoiceSessionDescriptor | null = null;
  #lastError: VoiceClientError | null = null;
  #generation = 0;
  #run: ActiveRun | null = null;
  #attempt: AbortController | null = null;
  #establishing: Promise<void> | null = null;
  #cancelling: Promise<void> | null = null;

  constructor(deps: VoiceSessionControllerDeps) {
    this.#deps = deps;
    this.#config = deps.config;
    this.#logger = deps.logger ?? componentLogger('voice_session');
    this.#now = deps.now ?? Date.now;
    this.#turns = new TurnStateMachine(this.#logger.child({ component: 'voice_turns' }));
    this.#detector = new SpeechDetector(deps.config.speech);
    this.#timeline = new EventTimeline(deps.config.session.timelineSize, this.#now);
    this.#sequencer = new TurnSequencer(
      {
        deliver: (event) => this.#applyEvent(event),
        superseded: (turnId) => {
          this.#timeline.push(`turn superseded ${turnId}`);
          this.#turns.superseded(turnId);
        },
        dropped: (event, reason) => this.#timeline.push(`ignored ${reason} ${event.type}`),
      },
      deps.config.sequencing,
      this.#logger.child({ component: 'voice_turns' })
    );

    this.#turns.state.subscribe((state, previous) => {
      this.#timeline.push(`state ${previous} -> ${state}`);
      if (state !== 'listening' && state !== 'userSpeaking' && state !== 'assistantSpeaking') {
        this.#level.set(0);
      }
    });
    deps.audio.onPlaybackEnergy((energy) => {
      if (this.#turns.current === 'assistantSpeaking') {
        this.#level.set(energy);
      }
    });
    deps.audio.onFault((error) => {
      const run = this.#run;
      if (run) {
        void this.#fail(run, error).catch((err: unknown) => this.#logUnexpected(err));
      }
    });
  }

  get connectionState(): ReadonlyObservable<ConnectionState> {
    return this.#connection.asReadonly();
  }

  get turnState(): ReadonlyObservable<TurnState> {
    return this.#turns.state;
  }

  /** Capture level while the user has the floor, playback energy while the assistant speaks. */
  get level(): ReadonlyObservable<number> {
    return this.#level.asReadonly();
  }

  get transcript(): ReadonlyObservable<TranscriptSnapshot> {
    return this.#turns.transcript;
  }

  get assistantText(): ReadonlyObservable<string> {
    return this.#turns.assistantText;
  }

  get phase(): SessionPhase {
    return this.#phase;
  }

  get descriptor(): VoiceSessionDescriptor | null {
    return this.#descriptor;
  }

  get lastError(): VoiceClientError | null {
    return this.#lastError;
  }

  get isListening(): boolean {
    return this.#run?.listening ?? false;
  }

  onNotice(listener: (notice: VoiceNotice) => void): () => void {
    return this.#notices.add(listener);
  }

  /** Every decoded inbound event, before sequencing. */
  onEvent(listener: (event: TurnEvent) => void): () => void {
    return this.#events.add(listener);
  }

  timeline(): string[] {
    return this.#timeline.lines();
  }

  /** A call while a connect is in flight joins it instead of starting another. */
  async connect(route: LiveVoiceRoute = {}): Promise<void> {
    if (this.#phase === 'active') return;
    if (this.#phase === 'connecting') {
      if (this.#establishing) await this.#establishing;
      return;
    }
    if (this.#cancelling) await this.#cancelling;
    this.#route = route;
    this.#descriptor = null;
    this.#timeline.push('connect requested');
    const launchMode = this.#launchMode();
    await this.#establish({
      sessionId: route.sessionId,
      chatSessionId: route.chatSessionId,
      requestIntro: launchMode !== 'dictate_summary',
      cause: 'connect',
    });
  }

  /** Resumes the last negotiated session with a fresh socket and no intro. */
  async reconnect(): Promise<void> {
    if (this.#phase === 'connecting' || this.#phase === 'idle') return;
    if (this.#cancelling) await this.#cancelling;
    const descriptor = this.#descriptor;
    if (!descriptor) {
      const error = new TransportError('Connection lost');
      this.#lastError = error;
      this.#phase = 'failed';
      this.#turns.fail(error.message);
      this.#connection.set({ status: 'failed', reason: error.message });
      this.#timeline.push('reconnect without a session');
      return;
    }
    const run = this.#run;
    if (run) {
      await this.#shutdown(run, false);
    }
    this.#timeline.push('reconnect requested');
    await this.#establish({
      sessionId: descriptor.sessionId,
      chatSessionId: descriptor.chatSessionId,
      requestIntro: false,
      cause: 'reconnect',
    });
  }

  /** Ends the session from any state; resolves once audio and socket are released. */
  cancel(): Promise<void> {
    if (this.#cancelling) return this.#cancelling;
    if (this.#phase === 'ended') return Promise.resolve();
    this.#cancelling = this.#cancelSession().finally(() => {
      this.#cancelling = null;
    });
    return this.#cancelling;
  }

  startListening(): boolean {
    const run = this.#run;
    if (!run || run.shutdown || this.#phase !== 'active') return false;
    if (run.listening) return false;
    const state = this.#turns.current;
    if (state !== 'listening' && state !== 'userSpeaking') return false;

    this.#clearIntroWatchdog(run);
    run.listening = true;
    run.frameSeq = 0;
    run.noSignalNotified = false;
    this.#detector.beginTurn(this.#now());
    this.#timeline.push('listening started');
    this.#logger.info({ event: 'voice_listening_started', sessionId: run.descriptor.sessionId });
    return true;
  }

  /**
   * Stops forwarding capture. Sends `audio.commit` when the turn holds enough
   * speech, otherwise the audio is discarded. Returns whether a commit was sent.
   */
  stopListening(reason = 'manual'): boolean {
    const run = this.#run;
    if (!run || !run.listening) return false;
    run.listening = false;
    const automatic = reason !== 'manual';
    const decision = this.#detector.commitDecision(this.#now(), run.frameSeq);
    this.#detector.endTurn();
    this.#logger.info({
      event: 'voice_listening_stopped',
      reason,
      durationMs: decision.durationMs,
      frames: run.frameSeq,
      speechFrames: decision.speechFrames,
      eligible: decision.eligible,
    });

    if (!decision.eligible) {
      this.#timeline.push('commit skipped: insufficient audio');
      this.#notify('commit_skipped', automatic ? 'Listening...' : 'Keep speaking a little longer.');
      if (automatic && this.#config.session.autoTurns) {
        this.startListening();
      }
      return false;
    }

    this.#enqueue(run, { type: 'audio.commit', seq: run.frameSeq });
    this.#turns.localCommit();
    return true;
  }

  cancelResponse(): void {
    const run = this.#run;
    if (!run || run.shutdown) return;
    this.#timeline.push('cancel response requested');
    this.#enqueue(run, { type: 'response.cancel' });
  }

  #launchMode(): LaunchMode {
    return this.#route.launchMode ?? this.#config.negotiation.launchMode;
  }

  async #establish(params: EstablishParams): Promise<void> {
    const attempt = new AbortController();
    this.#attempt = attempt;
    const generation = ++this.#generation;
    this.#phase = 'connecting';
    this.#lastError = null;
    this.#connection.set({ status: 'connecting' });
    this.#turns.reset();
    this.#sequencer.reset();
    this.#level.set(0);

    const task = this.#openRun(attempt, generation, params);
    this.#establishing = task;
    try {
      await task;
    } finally {
      if (this.#establishing === task) this.#establishing = null;
      if (this.#attempt === attempt) this.#attempt = null;
    }
  }

  async #openRun(attempt: AbortController, generation: number, params: EstablishParams): Promise<void> {
    const { negotiator, transport, tokens, audio } = this.#deps;
    const { audio: audioConfig, negotiation } = this.#config;
    const signal = attempt.signal;
    const startedAt = this.#now();
    let connection: VoiceConnection | null = null;
    let audioAcquired = false;

    const ensureCurrent = () => {
      if (signal.aborted || generation !== this.#generation) {
        throw new TransportError('connect was cancelled');
      }
    };

    try {
      const descriptor = await negotiator.requestSession(
        {
          sessionId: params.sessionId,
          contentId: this.#route.contentId,
          chatSessionId: params.chatSessionId,
          launchMode: this.#launchMode(),
          sourceSurface: this.#route.sourceSurface ?? negotiation.sourceSurface,
          sampleRateHz: audioConfig.sampleRateHz,
          requestIntro: params.requestIntro,
        },
        signal
      );
      ensureCurrent();
      this.#descriptor = descriptor;

      const token = await tokens.getAccessToken();
      ensureCurrent();
      connection = await transport.connect(descriptor.websocketUrl, {
        headers: { Authorization: `Bearer ${token}` },
        signal,
      });
      ensureCurrent();

      await audio.acquire();
      audioAcquired = true;
      const capture = await audio.startCapture();
      ensureCurrent();

      await connection.send({ type: 'session.start', session_id: descriptor.sessionId }, signal);
      ensureCurrent();

      this.#activate(generation, descriptor, connection, capture, params);
      this.#logger.info({
        event: 'voice_session_connected',
        cause: params.cause,
        sessionId: descriptor.sessionId,
        chatSessionId: descriptor.chatSessionId,
        elapsedMs: this.#now() - startedAt,
      });
    } catch (err) {
      const error = err instanceof VoiceClientError ? err : new TransportError(describeError(err), { cause: err });
      if (audioAcquired) {
        await settleWithin(audio.stop(), this.#config.session.teardownTimeoutMs);
      }
      if (connection) {
        await connection.close();
      }
      if (signal.aborted || generation !== this.#generation) {
        this.#logger.info({ event: 'voice_connect_abandoned', cause: params.cause });
        return;
      }
      this.#lastError = error;
      this.#phase = 'failed';
      this.#turns.fail(error.message);
      this.#connection.set({ status: 'failed', reason: error.message });
      this.#timeline.push(`connect failed: ${error.message}`);
      this.#logger.error({ event: 'voice_connect_failed', cause: params.cause, kind: error.kind, message: error.message });
    }
  }

  #activate(
    generation: number,
    descriptor: VoiceSessionDescriptor,
    connection: VoiceConnection,
    capture: AsyncIterable<PcmChunk>,
    params: EstablishParams
  ): void {
    const session = this.#config.session;
    // control frames share the queue to keep their order but are never evicted
    const outbound = new BoundedChannel<ClientFrame>(
      session.captureQueueFrames,
      () => {
        if (outbound.dropped === 1 || outbound.dropped % DROP_NOTICE_INTERVAL === 0) {
          this.#notify('frames_dropped', `Dropped ${outbound.dropped} audio frames under backpressure`);
        }
      },
      (frame) => frame.type === 'audio.frame'
    );
    const run: ActiveRun = {
      generation,
      descriptor,
      connection,
      abort: new AbortController(),
      outbound,
      workers: [],
      shutdown: null,
      autoStartOnReady: session.autoTurns && !params.requestIntro,
      listening: false,
      frameSeq: 0,
      preRoll: [],
      protocolErrors: 0,
      noSignalNotified: false,
      introWatchdog: null,
    };
    this.#run = run;
    this.#detector.setMaxTurnSeconds(Math.max(5, descriptor.maxInputSeconds));
    this.#turns.start();
    this.#phase = 'active';
    this.#connection.set({ status: 'connected' });
    this.#timeline.push('session connected');

    if (params.requestIntro && session.introWatchdogMs > 0) {
      run.introWatchdog = setTimeout(() => this.#onIntroWatchdog(run), session.introWatchdogMs);
      run.introWatchdog.unref?.();
    }

    run.workers.push(
      this.#guardWorker(run, 'inbound', () => this.#receiveLoop(run)),
      this.#guardWorker(run, 'capture', () => this.#captureLoop(run, capture)),
      this.#guardWorker(run, 'send', () => this.#sendLoop(run))
    );
  }

  #guardWorker(run: ActiveRun, name: string, body: () => Promise<void>): Promise<void> {
    return body().catch(async (err: unknown) => {
      const error = err instanceof VoiceClientError ? err : new ProtocolError(describeError(err), { cause: err });
      this.#logger.error({ event: 'voice_worker_failed', worker: name, message: error.message });
      await this.#fail(run, error);
    });
  }

  async #receiveLoop(run: ActiveRun): Promise<void> {
    for await (const frame of run.connection.frames()) {
      if (run.shutdown) return;
      if (frame.kind === 'error') {
        await this.#onTransportLost(run, frame.error);
        return;
      }
      const result = frame.kind === 'text' ? decodeTextFrame(frame.data) : decodeBinaryFrame(frame.data);
      this.#handleDecoded(run, result);
    }
    if (!run.shutdown) {
      await this.#endRemotely(run);
    }
  }

  async #sendLoop(run: ActiveRun): Promise<void> {
    for await (const frame of run.outbound) {
      if (run.shutdown) return;
      try {
        await run.connection.send(frame, run.abort.signal);
      } catch (err) {
        if (run.shutdown) return;
        const error = err instanceof TransportError ? err : new TransportError(describeError(err), { cause: err });
        this.#timeline.push(`send failed: ${error.message}`);
        await this.#onTransportLost(run, error);
        return;
      }
    }
  }

  async #captureLoop(run: ActiveRun, capture: AsyncIterable<PcmChunk>): Promise<void> {
    const { preRollFrames, preRollReplayFrames, autoTurns } = this.#config.session;
    for await (const chunk of capture) {
      if (run.shutdown) return;
      const assistantSpeaking = this.#turns.current === 'assistantSpeaking';
      if (!run.listening && !assistantSpeaking) continue;

      if (preRollFrames > 0) {
        run.preRoll.push(chunk.pcm);
        if (run.preRoll.length > preRollFrames) {
          run.preRoll.splice(0, run.preRoll.length - preRollFrames);
        }
      }

      const analysis = this.#detector.analyze(chunk.rms, chunk.captureTs, {
        listening: run.listening,
        assistantSpeaking,
        autoTurns,
      });
      if (run.listening) {
        this.#level.set(levelFromRms(chunk.rms));
      }

      let replayed = false;
      if (analysis.bargeIn) {
        this.#timeline.push('barge-in triggered');
        this.#logger.info({ event: 'voice_barge_in', turnId: this.#turns.activeTurnId });
        this.#runEffects(run, this.#turns.bargeIn());
        if (!run.listening && this.startListening()) {
          const replay = run.preRoll.slice(-preRollReplayFrames);
          for (const pcm of replay) {
            this.#sendAudio(run, pcm);
          }
          replayed = true;
          this.#timeline.push(`pre-roll replayed (${replay.length} frames)`);
        }
      }

      if (run.listening && !replayed) {
        this.#sendAudio(run, chunk.pcm);
      }

      if (analysis.speechStarted) {
        this.#timeline.push('speech detected');
        this.#turns.localSpeechStarted();
      }

      if (analysis.noSignal && !run.noSignalNotified) {
        run.noSignalNotified = true;
        this.#notify('no_mic_signal', 'Listening... (no mic signal detected)');
      } else if (!analysis.noSignal) {
        run.noSignalNotified = false;
      }

      if (analysis.autoCommit) {
        this.#timeline.push(`auto-commit (${analysis.autoCommit})`);
        this.stopListening(analysis.autoCommit);
      }
    }
  }

  #sendAudio(run: ActiveRun, pcm: Buffer): void {
    const seq = run.frameSeq;
    run.frameSeq += 1;
    run.outbound.push(buildAudioFrame(seq, pcm, run.descriptor));
  }

  #enqueue(run: ActiveRun, frame: ClientFrame): void {
    this.#timeline.push(`client -> ${frame.type}`);
    run.outbound.push(frame);
  }

  #handleDecoded(run: ActiveRun, result: DecodeResult): void {
    if (result.kind === 'malformed') {
      run.protocolErrors += 1;
      this.#logger.warn({ event: 'voice_frame_malformed', message: result.error.message, consecutive: run.protocolErrors });
      this.#timeline.push(`malformed frame: ${result.error.message}`);
      if (run.protocolErrors >= this.#config.session.maxConsecutiveProtocolErrors) {
        void this.#fail(
          run,
          new ProtocolError(`${run.protocolErrors} consecutive malformed frames`, { cause: result.error })
        ).catch((err: unknown) => this.#logUnexpected(err));
        return;
      }
      if (run.protocolErrors === 2) {
        this.#notify('protocol_error', 'The voice server sent unreadable data');
      }
      return;
    }

    run.protocolErrors = 0;
    if (result.kind === 'ignored') {
      this.#logger.debug({ event: 'voice_frame_ignored', type: result.type });
      return;
    }

    const event = result.event;
    if (event.type !== 'transcript.partial' && event.type !== 'assistant.audio.chunk') {
      this.#timeline.push(`server -> ${event.type}`);
    }
    this.#events.emit(event);
    this.#sequencer.push(event);
  }

  #applyEvent(event: TurnEvent): void {
    const run = this.#run;
    if (!run || run.shutdown) return;

    if (event.type === 'turn.started' && event.turnId !== this.#turns.activeTurnId) {
      this.#detector.armBargeIn();
      if (run.listening) {
        // the server opened a turn on its own; the local one is abandoned
        run.listening = false;
        this.#detector.endTurn();
      }
    }

    this.#runEffects(run, this.#turns.apply(event), event);
  }

  #runEffects(run: ActiveRun, effects: TurnEffect[], cause?: TurnEvent): void {
    const { autoTurns } = this.#config.session;
    for (const effect of effects) {
      switch (effect.kind) {
        case 'session_ready':
          if (effect.chatSessionId !== undefined && this.#descriptor) {
            this.#descriptor = { ...this.#descriptor, chatSessionId: effect.chatSessionId };
          }
          if (run.autoStartOnReady) {
            run.autoStartOnReady = false;
            this.startListening();
          }
          break;
        case 'play':
          this.#deps.audio.playback(effect.audio);
          break;
        case 'flush_playback':
          this.#deps.audio.flushPlayback();
          break;
        case 'send_cancel':
          this.#enqueue(run, { type: 'response.cancel' });
          break;
        case 'transcript_activity':
          if (run.listening) this.#detector.noteTranscriptActivity(this.#now());
          break;
        case 'intro_started':
          this.#timeline.push(`intro turn ${effect.turnId}${effect.onboarding ? ' (onboarding)' : ''}`);
          break;
        case 'intro_completed':
          this.#clearIntroWatchdog(run);
          break;
        case 'send_intro_ack':
          this.#enqueue(run, { type: 'intro.ack' });
          break;
        case 'turn_completed':
          this.#logger.info({ event: 'voice_turn_completed', turnId: effect.turnId, latencyMs: effect.latencyMs });
          if (autoTurns && !this.#turns.awaitingIntroAck) this.startListening();
          break;
        case 'turn_rolled_back':
          if (cause?.type === 'turn.cancelled' && autoTurns && !run.listening) {
            this.startListening();
          } else if (run.listening && this.#detector.speechDetected) {
            this.#turns.localSpeechStarted();
          }
          break;
        case 'remote_error':
          this.#onRemoteError(run, effect);
          break;
        case 'resume_listening':
          if (autoTurns) this.startListening();
          break;
      }
    }
  }

  #onRemoteError(run: ActiveRun, effect: Extract<TurnEffect, { kind: 'remote_error' }>): void {
    const { error } = effect;
    this.#logger.warn({ event: 'voice_remote_error', code: error.code, retryable: error.retryable, message: error.message });
    if (!error.retryable) {
      void this.#fail(run, error).catch((err: unknown) => this.#logUnexpected(err));
      return;
    }
    if (run.listening) {
      run.listening = false;
      this.#detector.endTurn();
    }
    const message = error.code === 'empty_transcript' ? "Didn't catch that. Keep talking." : error.message;
    this.#notify('remote_error', message, error.code);
  }

  #onIntroWatchdog(run: ActiveRun): void {
    run.introWatchdog = null;
    if (run !== this.#run || run.shutdown || run.listening) return;
    this.#timeline.push('intro watchdog forcing listening start');
    this.#logger.warn({ event: 'voice_intro_watchdog', timeoutMs: this.#config.session.introWatchdogMs });
    this.#turns.resumeListening('intro_watchdog');
    this.startListening();
  }

  #clearIntroWatchdog(run: ActiveRun): void {
    if (run.introWatchdog) {
      clearTimeout(run.introWatchdog);
      run.introWatchdog = null;
    }
  }

  async #onTransportLost(run: ActiveRun, error: TransportError): Promise<void> {
    if (run.shutdown || run !== this.#run) return;
    this.#timeline.push(`transport lost: ${error.message}`);
    if (!this.#config.session.autoReconnect) {
      await this.#fail(run, error);
      return;
    }
    this.#notify('reconnecting', 'Connection lost. Reconnecting...');
    this.#logger.warn({ event: 'voice_auto_reconnect', sessionId: run.descriptor.sessionId, message: error.message });
    await this.#shutdown(run, false);
    if (this.#cancelling || run !== this.#run) return;
    await this.#establish({
      sessionId: run.descriptor.sessionId,
      chatSessionId: run.descriptor.chatSessionId,
      requestIntro: false,
      cause: 'auto_reconnect',
    });
  }

  async #fail(run: ActiveRun, error: VoiceClientError): Promise<void> {
    if (run.shutdown || run !== this.#run) return;
    this.#logger.error({ event: 'voice_session_failed', kind: error.kind, message: error.message });
    await this.#shutdown(run, false);
    if (run !== this.#run || this.#cancelling) return;
    this.#lastError = error;
    this.#phase = 'failed';
    this.#turns.fail(error.message);
    this.#connection.set({ status: 'failed', reason: error.message });
    this.#timeline.push(`failed: ${error.message}`);
  }

  async #endRemotely(run: ActiveRun): Promise<void> {
    if (run.shutdown || run !== this.#run) return;
    await this.#shutdown(run, false);
    if (run !== this.#run || this.#cancelling) return;
    this.#phase = 'ended';
    this.#turns.close();
    this.#connection.set({ status: 'closed' });
    this.#timeline.push('session closed by server');
    this.#logger.info({ event: 'voice_session_ended', sessionId: run.descriptor.sessionId, by: 'server' });
  }

  async #cancelSession(): Promise<void> {
    this.#timeline.push('disconnect requested');
    const timeoutMs = this.#config.session.teardownTimeoutMs;
    this.#attempt?.abort();
    const establishing = this.#establishing;
    if (establishing) {
      await settleWithin(establishing, timeoutMs);
    }

    const run = this.#run;
    if (run) {
      await this.#shutdown(run, true);
      await settleWithin(Promise.allSettled(run.workers), timeoutMs);
    }
    this.#generation += 1;
    this.#phase = 'ended';
    this.#turns.close();
    this.#connection.set({ status: 'closed' });
    this.#timeline.push('disconnected');
    this.#logger.info({ event: 'voice_session_ended', sessionId: run?.descriptor.sessionId, by: 'client' });
  }

  /** Releases audio and socket for one run. Never waits on the run's own workers. */
  #shutdown(run: ActiveRun, sendEnd: boolean): Promise<void> {
    if (!run.shutdown) {
      run.shutdown = this.#release(run, sendEnd);
    }
    return run.shutdown;
  }

  async #release(run: ActiveRun, sendEnd: boolean): Promise<void> {
    const timeoutMs = this.#config.session.teardownTimeoutMs;
    this.#clearIntroWatchdog(run);
    run.listening = false;
    this.#detector.endTurn();
    run.outbound.close({ discard: true });

    if (sendEnd && run.connection.isOpen) {
      const ended = run.connection.send({ type: 'session.end' }, run.abort.signal).catch((err: unknown) => {
        this.#logger.debug({ event: 'voice_session_end_send_failed', message: toError(err).message });
      });
      await settleWithin(ended, SESSION_END_BUDGET_MS);
    }
    run.abort.abort();
    this.#sequencer.dispose();

    await settleWithin(
      this.#deps.audio.stop().catch((err: unknown) => {
        this.#logger.warn({ event: 'voice_audio_stop_failed', message: toError(err).message });
      }),
      timeoutMs
    );
    await run.connection.close();
    this.#level.set(0);
  }

  #notify(kind: VoiceNoticeKind, message: string, code?: string): void {
    this.#timeline.push(`notice ${kind}: ${message}`);
    this.#notices.emit({ kind, message, code, ts: this.#now() });
  }

  #logUnexpected(err: unknown): void {
    this.#logger.error({ event: 'voice_session_unexpected_error', message: toError(err).message });
  }
}
