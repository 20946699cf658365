import type { Logger } from 'pino';
import { RemoteError } from '../errors.js';
import type { TurnEvent, TurnState } from '../types.js';
import { ObservableValue } from '../utils/observable.js';
import type { ReadonlyObservable } from '../utils/observable.js';

export interface TranscriptSnapshot {
  partial: string;
  final: string;
}

export type TurnEffect =
  | { kind: 'session_ready'; chatSessionId?: number }
  | { kind: 'play'; audio: Buffer; turnId?: string }
  | { kind: 'flush_playback' }
  | { kind: 'send_cancel' }
  | { kind: 'transcript_activity' }
  | { kind: 'intro_started'; turnId: string; onboarding: boolean }
  | { kind: 'intro_completed'; turnId: string }
  | { kind: 'send_intro_ack'; turnId: string }
  | { kind: 'turn_completed'; turnId?: string; latencyMs?: number }
  | { kind: 'turn_rolled_back'; rollbackTurnIndex?: number }
  | { kind: 'remote_error'; error: RemoteError }
  | { kind: 'resume_listening'; reason: string };

interface CurrentTurn {
  turnId: string;
  isIntro: boolean;
  awaitingIntroAck: boolean;
  hadAudio: boolean;
}

const ALLOWED: Record<TurnState, readonly TurnState[]> = {
  idle: ['listening', 'error', 'closed'],
  listening: ['userSpeaking', 'thinking', 'assistantSpeaking', 'error', 'closed'],
  userSpeaking: ['thinking', 'listening', 'error', 'closed'],
  thinking: ['assistantSpeaking', 'listening', 'error', 'closed'],
  assistantSpeaking: ['listening', 'userSpeaking', 'thinking', 'error', 'closed'],
  error: ['closed'],
  closed: [],
};

const sameTranscript = (a: TranscriptSnapshot, b: TranscriptSnapshot) => a.partial === b.partial && a.final === b.final;

/**
 * Single writer of TurnState. Consumes sequenced TurnEvents and local audio
 * signals, accumulates transcript and assistant text, and returns the side
 * effects the session has to perform.
 */
export class TurnStateMachine {
  #state = new ObservableValue<TurnState>('idle', { label: 'turn_state' });
  #transcript = new ObservableValue<TranscriptSnapshot>({ partial: '', final: '' }, {
    label: 'transcript',
    equals: sameTranscript,
  });
  #assistantText = new ObservableValue<string>('', { label: 'assistant_text' });
  #turn: CurrentTurn | null = null;
  #bargedInTurnId: string | null = null;
  #logger?: Logger;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  get state(): ReadonlyObservable<TurnState> {
    return this.#state.asReadonly();
  }

  get transcript(): ReadonlyObservable<TranscriptSnapshot> {
    return this.#transcript.asReadonly();
  }

  get assistantText(): ReadonlyObservable<string> {
    return this.#assistantText.asReadonly();
  }

  get current(): TurnState {
    return this.#state.get();
  }

  get activeTurnId(): string | null {
    return this.#turn?.turnId ?? null;
  }

  get isTerminal(): boolean {
    const state = this.#state.get();
    return state === 'error' || state === 'closed';
  }

  get awaitingIntroAck(): boolean {
    return this.#turn?.awaitingIntroAck ?? false;
  }

  /** Connection established. */
  start(): TurnEffect[] {
    this.#transition('listening', 'connected');
    return [];
  }

  /** Returns to idle with empty buffers for a fresh connection. */
  reset(): void {
    this.#turn = null;
    this.#bargedInTurnId = null;
    this.#transcript.set({ partial: '', final: '' });
    this.#assistantText.set('');
    this.#state.set('idle');
  }

  localSpeechStarted(): void {
    if (this.#state.get() === 'listening') {
      this.#transition('userSpeaking', 'local_energy');
    }
  }

  localCommit(): void {
    const state = this.#state.get();
    if (state === 'userSpeaking' || state === 'listening') {
      this.#transition('thinking', 'local_commit');
    }
  }

  bargeIn(): TurnEffect[] {
    if (this.#state.get() !== 'assistantSpeaking') return [];
    this.#bargedInTurnId = this.#turn?.turnId ?? null;
    this.#transition('userSpeaking', 'barge_in');
    return [{ kind: 'flush_playback' }, { kind: 'send_cancel' }];
  }

  resumeListening(reason: string): void {
    const state = this.#state.get();
    if (state === 'thinking' || state === 'assistantSpeaking' || state === 'userSpeaking') {
      this.#transition('listening', reason);
    }
  }

  fail(reason: string): void {
    this.#transition('error', reason);
  }

  close(): void {
    this.#transition('closed', 'closed');
  }

  /** The sequencer replaced the active turn before its terminal marker. */
  superseded(turnId: string): void {
    if (this.#turn?.turnId === turnId) {
      this.#logger?.debug({ event: 'voice_turn_superseded', turnId });
      this.#turn = null;
    }
  }

  apply(event: TurnEvent): TurnEffect[] {
    if (this.isTerminal) return [];

    switch (event.type) {
      case 'session.ready':
        return [{ kind: 'session_ready', chatSessionId: event.chatSessionId }];

      case 'speech.started':
        this.localSpeechStarted();
        return [];

      case 'turn.started':
        return this.#onTurnStarted(event);

      case 'transcript.partial': {
        const text = event.text ?? '';
        this.#transcript.set({ ...this.#transcript.get(), partial: text });
        return text ? [{ kind: 'transcript_activity' }] : [];
      }

      case 'transcript.final':
        this.#transcript.set({ partial: '', final: event.text ?? '' });
        if (this.#state.get() === 'userSpeaking' || this.#state.get() === 'listening') {
          this.#transition('thinking', 'transcript_final');
        }
        return [];

      case 'assistant.text.delta':
        if (this.#isBargedIn(event)) return [];
        this.#assistantText.set(this.#assistantText.get() + (event.text ?? ''));
        this.#beginSpeaking('assistant_text');
        return [];

      case 'assistant.text.final':
        if (event.text) {
          this.#assistantText.set(event.text);
        }
        return [];

      case 'assistant.audio.chunk': {
        if (!event.audio || this.#isBargedIn(event)) return [];
        if (this.#turn && (!event.turnId || event.turnId === this.#turn.turnId)) {
          this.#turn.hadAudio = true;
        }
        this.#beginSpeaking('assistant_audio');
        return [{ kind: 'play', audio: event.audio, turnId: event.turnId }];
      }

      case 'assistant.audio.final': {
        const effects: TurnEffect[] = [];
        if (this.#state.get() === 'assistantSpeaking') {
          this.#transition('listening', 'assistant_audio_final');
        }
        const turn = this.#turn;
        if (turn?.awaitingIntroAck && (!event.turnId || event.turnId === turn.turnId)) {
          turn.awaitingIntroAck = false;
          effects.push({ kind: 'send_intro_ack', turnId: turn.turnId });
        }
        return effects;
      }

      case 'turn.completed':
        return this.#onTurnCompleted(event);

      case 'turn.cancelled':
      case 'response.cancelled':
        return this.#rollback(event);

      case 'intro.acknowledged':
        this.#logger?.debug({ event: 'voice_intro_acknowledged' });
        return [];

      case 'error':
        return this.#onRemoteError(event);
    }
  }

  #onTurnStarted(event: TurnEvent): TurnEffect[] {
    const turnId = event.turnId;
    if (turnId && this.#turn?.turnId === turnId) {
      if (event.text) {
        this.#assistantText.set(this.#assistantText.get() + event.text);
      }
      return [];
    }

    const isIntro = event.isIntro === true;
    this.#bargedInTurnId = null;
    this.#turn = turnId
      ? { turnId, isIntro, awaitingIntroAck: isIntro && event.isOnboardingIntro === true, hadAudio: false }
      : null;
    this.#assistantText.set(event.text ?? '');

    const state = this.#state.get();
    if (state === 'listening' || state === 'userSpeaking' || state === 'assistantSpeaking') {
      this.#transition('thinking', isIntro ? 'intro_turn_started' : 'turn_started');
    }
    if (isIntro && turnId) {
      return [{ kind: 'intro_started', turnId, onboarding: event.isOnboardingIntro === true }];
    }
    return [];
  }

  #onTurnCompleted(event: TurnEvent): TurnEffect[] {
    const effects: TurnEffect[] = [];
    const turn = this.#turn;
    const matches = turn !== null && (!event.turnId || event.turnId === turn.turnId);
    if (turn && matches && turn.isIntro) {
      effects.push({ kind: 'intro_completed', turnId: turn.turnId });
      if (turn.awaitingIntroAck && !turn.hadAudio) {
        turn.awaitingIntroAck = false;
        effects.push({ kind: 'send_intro_ack', turnId: turn.turnId });
      }
    }
    if (matches) {
      this.#turn = null;
    }
    const state = this.#state.get();
    if (state === 'assistantSpeaking' || state === 'thinking') {
      this.#transition('listening', 'turn_completed');
    }
    effects.push({ kind: 'turn_completed', turnId: event.turnId, latencyMs: event.latencyMs });
    return effects;
  }

  #rollback(event: TurnEvent): TurnEffect[] {
    this.#assistantText.set('');
    this.#transcript.set({ ...this.#transcript.get(), partial: '' });
    if (event.type === 'response.cancelled' || !event.turnId || event.turnId === this.#turn?.turnId) {
      this.#turn = null;
    }
    this.#bargedInTurnId = null;
    const state = this.#state.get();
    if (state !== 'idle' && state !== 'listening') {
      this.#transition('listening', event.type === 'turn.cancelled' ? 'turn_cancelled' : 'response_cancelled');
    }
    return [{ kind: 'flush_playback' }, { kind: 'turn_rolled_back', rollbackTurnIndex: event.rollbackTurnIndex }];
  }

  #onRemoteError(event: TurnEvent): TurnEffect[] {
    const error = new RemoteError(event.message ?? 'Voice error', {
      code: event.code,
      retryable: event.retryable === true,
    });
    if (!error.retryable) {
      this.#transition('error', `remote_error:${error.code}`);
      return [{ kind: 'remote_error', error }];
    }
    const effects: TurnEffect[] = [{ kind: 'remote_error', error }];
    if (error.code === 'empty_transcript') {
      this.resumeListening('empty_transcript');
      effects.push({ kind: 'resume_listening', reason: 'empty_transcript' });
    }
    return effects;
  }

  #beginSpeaking(cause: string): void {
    const state = this.#state.get();
    if (state === 'thinking' || state === 'listening') {
      this.#transition('assistantSpeaking', cause);
    }
  }

  #isBargedIn(event: TurnEvent): boolean {
    if (!this.#bargedInTurnId) return false;
    return !event.turnId || event.turnId === this.#bargedInTurnId;
  }

  #transition(next: TurnState, cause: string): void {
    const from = this.#state.get();
    if (from === next) return;
    if (!ALLOWED[from].includes(next)) {
      this.#logger?.debug({ event: 'voice_turn_transition_ignored', from, to: next, cause });
      return;
    }
    this.#state.set(next);
    this.#logger?.debug({ event: 'voice_turn_transition', from, to: next, cause, turnId: this.#turn?.turnId });
  }
}
