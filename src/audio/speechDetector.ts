import type { SpeechConfig } from '../config.js';

export type AutoCommitReason = 'auto_silence' | 'auto_max_duration';

export interface FrameAnalysis {
  isSpeech: boolean;
  /** Threshold the frame was judged against. */
  threshold: number;
  /** Speech was confirmed on this frame for the first time in the turn. */
  speechStarted: boolean;
  /** Sustained loud input while the assistant is speaking. */
  bargeIn: boolean;
  /** True while the microphone looks dead (listening, nothing detected). */
  noSignal: boolean;
  autoCommit: AutoCommitReason | null;
}

export interface CommitDecision {
  eligible: boolean;
  durationMs: number;
  speechFrames: number;
}

export interface AnalyzeContext {
  listening: boolean;
  assistantSpeaking: boolean;
  autoTurns: boolean;
}

const DEFAULT_MAX_TURN_MS = 18_000;

/**
 * Energy-based speech detection over an adaptive noise floor. One instance
 * lives for the whole session; `beginTurn` re-arms the per-turn counters while
 * the learned noise floor carries over.
 */
export class SpeechDetector {
  #config: SpeechConfig;
  #noiseFloor: number;
  #maxTurnMs = DEFAULT_MAX_TURN_MS;

  #calibrationRemaining = 0;
  #turnStartedAt: number | null = null;
  #speechDetected = false;
  #speechFrames = 0;
  #consecutiveSpeech = 0;
  #trailingSilenceRemaining = 0;
  #lastSpeechAt: number | null = null;
  #peakRms = 0;
  #transcriptActivity = false;
  #nearSilentFrames = 0;
  #bargeInFrames = 0;
  #bargedIn = false;
  #committing = false;

  constructor(config: SpeechConfig) {
    this.#config = config;
    this.#noiseFloor = config.initialNoiseFloorRms;
  }

  get noiseFloor(): number {
    return this.#noiseFloor;
  }

  get speechDetected(): boolean {
    return this.#speechDetected;
  }

  get speechFrames(): number {
    return this.#speechFrames;
  }

  /** Listening window from the negotiated `maxInputSeconds`. */
  setMaxTurnSeconds(seconds: number): void {
    if (Number.isFinite(seconds) && seconds > 0) {
      this.#maxTurnMs = seconds * 1000;
    }
  }

  beginTurn(now: number): void {
    this.#turnStartedAt = now;
    this.#calibrationRemaining = this.#config.noiseCalibrationFrames;
    this.#resetTurnCounters();
    this.#bargedIn = false;
    this.#committing = false;
  }

  /** Stops the listening clock; noise floor and barge-in state survive. */
  endTurn(): void {
    this.#turnStartedAt = null;
    this.#committing = false;
    this.#resetTurnCounters();
  }

  /** A new assistant turn may be interrupted again. */
  armBargeIn(): void {
    this.#bargedIn = false;
    this.#bargeInFrames = 0;
  }

  noteTranscriptActivity(now: number): void {
    if (this.#turnStartedAt === null) return;
    this.#transcriptActivity = true;
    if (this.#speechDetected || this.#peakRms >= this.#config.minimumSpeechRms) {
      this.#speechDetected = true;
      this.#lastSpeechAt = now;
    }
  }

  analyze(rms: number, now: number, context: AnalyzeContext): FrameAnalysis {
    const config = this.#config;
    const smoothing = config.noiseFloorSmoothing;
    if (this.#calibrationRemaining > 0) {
      this.#noiseFloor = (1 - smoothing) * this.#noiseFloor + smoothing * rms;
      this.#calibrationRemaining -= 1;
    } else if (!this.#speechDetected || !this.#transcriptActivity) {
      this.#noiseFloor = (1 - smoothing) * this.#noiseFloor + smoothing * rms;
    }

    const dynamic = Math.max(config.minimumSpeechRms, this.#noiseFloor * config.speechOverNoiseMultiplier);
    const threshold = this.#calibrationRemaining > 0 ? Math.max(dynamic, config.immediateSpeechRms) : dynamic;
    const isSpeech = rms >= threshold;
    this.#peakRms = Math.max(this.#peakRms, rms);

    const bargeInThreshold = Math.max(threshold * config.bargeInThresholdMultiplier, config.bargeInMinimumRms);
    if (context.assistantSpeaking && rms >= bargeInThreshold) {
      this.#bargeInFrames += 1;
    } else {
      this.#bargeInFrames = 0;
    }

    let speechStarted = false;
    if (isSpeech) {
      this.#consecutiveSpeech += 1;
      this.#nearSilentFrames = 0;
      if (!this.#speechDetected && this.#consecutiveSpeech >= config.speechStartConsecutiveFrames) {
        this.#speechDetected = true;
        speechStarted = context.listening;
      }
      if (this.#speechDetected) {
        this.#speechFrames += 1;
        this.#lastSpeechAt = now;
        this.#trailingSilenceRemaining = config.trailingSilenceFrames;
      }
    } else if (this.#speechDetected && this.#trailingSilenceRemaining > 0) {
      this.#consecutiveSpeech = 0;
      this.#trailingSilenceRemaining -= 1;
    } else {
      this.#consecutiveSpeech = 0;
      this.#nearSilentFrames = rms <= config.nearSilentRms ? this.#nearSilentFrames + 1 : 0;
    }

    const noSignal =
      context.listening &&
      !this.#speechDetected &&
      !this.#transcriptActivity &&
      this.#nearSilentFrames >= config.noSignalWarningFrames;

    let bargeIn = false;
    if (context.assistantSpeaking && !this.#bargedIn && this.#bargeInFrames >= config.bargeInConsecutiveFrames) {
      this.#bargedIn = true;
      this.#bargeInFrames = 0;
      bargeIn = true;
    }

    return {
      isSpeech,
      threshold,
      speechStarted,
      bargeIn,
      noSignal,
      autoCommit: context.listening && context.autoTurns ? this.#checkAutoCommit(now) : null,
    };
  }

  /** Whether the turn captured enough speech to be worth an `audio.commit`. */
  commitDecision(now: number, framesSent: number): CommitDecision {
    const durationMs = this.#turnStartedAt === null ? 0 : now - this.#turnStartedAt;
    const transcriptSignal = this.#transcriptActivity && this.#peakRms >= this.#config.minimumSpeechRms;
    const speechEnough =
      transcriptSignal || (this.#speechDetected && this.#speechFrames >= this.#config.minimumSpeechFramesForCommit);
    return {
      eligible: framesSent > 0 && durationMs >= this.#config.minimumCommitMs && speechEnough,
      durationMs,
      speechFrames: this.#speechFrames,
    };
  }

  #checkAutoCommit(now: number): AutoCommitReason | null {
    if (this.#committing || this.#turnStartedAt === null) return null;
    const transcriptSignal = this.#transcriptActivity && this.#peakRms >= this.#config.minimumSpeechRms;
    if (!this.#speechDetected && !transcriptSignal) return null;
    if (this.#lastSpeechAt !== null && now - this.#lastSpeechAt >= this.#config.silenceAutoCommitMs) {
      this.#committing = true;
      return 'auto_silence';
    }
    if (now - this.#turnStartedAt >= this.#maxTurnMs) {
      this.#committing = true;
      return 'auto_max_duration';
    }
    return null;
  }

  #resetTurnCounters(): void {
    this.#speechDetected = false;
    this.#speechFrames = 0;
    this.#consecutiveSpeech = 0;
    this.#trailingSilenceRemaining = 0;
    this.#lastSpeechAt = null;
    this.#peakRms = 0;
    this.#transcriptActivity = false;
    this.#nearSilentFrames = 0;
  }
}
