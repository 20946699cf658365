import type { Logger } from 'pino';
import type { SequencingConfig } from '../config.js';
import { isAssistantOutputEvent, isTurnScopedEvent, isTurnTerminalEvent } from '../ws/frameCodec.js';
import type { TurnEvent } from '../types.js';

export type DropReason = 'stale' | 'duplicate';

export interface TurnSequencerSink {
  deliver(event: TurnEvent): void;
  /** The active turn was replaced by a frame for another turn before any terminal marker. */
  superseded(turnId: string): void;
  dropped?(event: TurnEvent, reason: DropReason): void;
}

interface ActiveTurn {
  turnId: string;
  turnIndex?: number;
  streamEpoch?: number;
  expectedSeq: number;
  held: Map<number, TurnEvent>;
}

/**
 * Orders turn-scoped frames by `seq` within the active turn and filters frames
 * that belong to turns which already ended. Frames without `seq` pass through
 * in arrival order. Assistant output with no turn id and no active turn is
 * dropped once any tagged turn has ended.
 */
export class TurnSequencer {
  #sink: TurnSequencerSink;
  #options: SequencingConfig;
  #logger?: Logger;
  #active: ActiveTurn | null = null;
  #recentTurnIds: string[] = [];
  #highestTurnIndex?: number;
  #highestStreamEpoch?: number;
  #gapTimer: NodeJS.Timeout | null = null;

  constructor(sink: TurnSequencerSink, options: SequencingConfig, logger?: Logger) {
    this.#sink = sink;
    this.#options = options;
    this.#logger = logger;
  }

  get activeTurnId(): string | null {
    return this.#active?.turnId ?? null;
  }

  get heldCount(): number {
    return this.#active?.held.size ?? 0;
  }

  push(event: TurnEvent): void {
    if (event.type === 'response.cancelled') {
      this.#discardActive();
      this.#noteRollback(event);
      this.#sink.deliver(event);
      return;
    }
    if (!isTurnScopedEvent(event.type)) {
      this.#sink.deliver(event);
      return;
    }

    const turnId = event.turnId ?? this.#active?.turnId;
    if (!turnId) {
      // untagged output after a tagged turn ended is its tail, not a new turn
      if (isAssistantOutputEvent(event.type) && this.#recentTurnIds.length > 0) {
        this.#drop(event, 'stale');
        return;
      }
      this.#sink.deliver(event);
      return;
    }
    const scoped: TurnEvent = event.turnId ? event : { ...event, turnId };

    if (this.#isStale(scoped, turnId)) {
      this.#drop(scoped, 'stale');
      return;
    }

    if (!this.#active || this.#active.turnId !== turnId) {
      this.#beginTurn(scoped, turnId);
    }
    const active = this.#active;
    if (!active) return;

    if (isTurnTerminalEvent(scoped.type)) {
      this.#finishTurn(active, scoped);
      return;
    }

    const seq = scoped.seq;
    if (seq === undefined) {
      this.#sink.deliver(scoped);
      return;
    }
    if (seq < active.expectedSeq || active.held.has(seq)) {
      this.#drop(scoped, 'duplicate');
      return;
    }
    if (seq === active.expectedSeq) {
      active.expectedSeq += 1;
      this.#sink.deliver(scoped);
      this.#releaseContiguous(active);
      return;
    }

    active.held.set(seq, scoped);
    if (active.held.size > this.#options.maxHeldFrames) {
      this.#logger?.warn({ event: 'voice_sequencer_overflow', turnId, held: active.held.size });
      this.#releaseAll(active);
      return;
    }
    this.#armGapTimer();
  }

  /** Releases every held frame in ascending order, skipping gaps. */
  flush(): void {
    if (this.#active) {
      this.#releaseAll(this.#active);
    }
  }

  /** Forgets all turn state without delivering held frames (new connection). */
  reset(): void {
    this.#clearGapTimer();
    this.#active = null;
    this.#recentTurnIds = [];
    this.#highestTurnIndex = undefined;
    this.#highestStreamEpoch = undefined;
  }

  dispose(): void {
    this.#clearGapTimer();
    this.#active?.held.clear();
  }

  #isStale(event: TurnEvent, turnId: string): boolean {
    if (this.#recentTurnIds.includes(turnId)) return true;
    const active = this.#active;
    if (active && active.turnId === turnId) {
      if (event.turnIndex !== undefined && active.turnIndex !== undefined && event.turnIndex !== active.turnIndex) {
        return true;
      }
      if (
        event.streamEpoch !== undefined &&
        active.streamEpoch !== undefined &&
        event.streamEpoch !== active.streamEpoch
      ) {
        return true;
      }
      return false;
    }
    if (event.turnIndex !== undefined && this.#highestTurnIndex !== undefined && event.turnIndex < this.#highestTurnIndex) {
      return true;
    }
    if (
      event.streamEpoch !== undefined &&
      this.#highestStreamEpoch !== undefined &&
      event.streamEpoch < this.#highestStreamEpoch
    ) {
      return true;
    }
    return false;
  }

  #beginTurn(event: TurnEvent, turnId: string): void {
    const previous = this.#active;
    if (previous) {
      this.#releaseAll(previous);
      this.#remember(previous.turnId);
      this.#active = null;
      this.#sink.superseded(previous.turnId);
    }
    this.#active = {
      turnId,
      turnIndex: event.turnIndex,
      streamEpoch: event.streamEpoch,
      expectedSeq: 0,
      held: new Map(),
    };
    if (event.turnIndex !== undefined) {
      this.#highestTurnIndex = Math.max(this.#highestTurnIndex ?? event.turnIndex, event.turnIndex);
    }
    if (event.streamEpoch !== undefined) {
      this.#highestStreamEpoch = Math.max(this.#highestStreamEpoch ?? event.streamEpoch, event.streamEpoch);
    }
  }

  #finishTurn(active: ActiveTurn, marker: TurnEvent): void {
    this.#clearGapTimer();
    const limit = marker.seq;
    const ordered = [...active.held.entries()].sort(([a], [b]) => a - b);
    active.held.clear();
    for (const [seq, held] of ordered) {
      if (limit === undefined || seq < limit) {
        this.#sink.deliver(held);
      } else {
        this.#drop(held, 'stale');
      }
    }
    this.#remember(active.turnId);
    this.#active = null;
    this.#sink.deliver(marker);
  }

  #discardActive(): void {
    const active = this.#active;
    if (!active) return;
    this.#clearGapTimer();
    for (const held of active.held.values()) {
      this.#drop(held, 'stale');
    }
    active.held.clear();
    this.#remember(active.turnId);
    this.#active = null;
  }

  #noteRollback(event: TurnEvent): void {
    if (event.rollbackTurnIndex !== undefined) {
      this.#highestTurnIndex = Math.max(this.#highestTurnIndex ?? event.rollbackTurnIndex, event.rollbackTurnIndex);
    }
    if (event.streamEpoch !== undefined) {
      this.#highestStreamEpoch = Math.max(this.#highestStreamEpoch ?? event.streamEpoch, event.streamEpoch);
    }
  }

  #releaseContiguous(active: ActiveTurn): void {
    let next = active.held.get(active.expectedSeq);
    while (next) {
      active.held.delete(active.expectedSeq);
      active.expectedSeq += 1;
      this.#sink.deliver(next);
      next = active.held.get(active.expectedSeq);
    }
    if (active.held.size === 0) {
      this.#clearGapTimer();
    }
  }

  #releaseAll(active: ActiveTurn): void {
    this.#clearGapTimer();
    if (active.held.size === 0) return;
    const ordered = [...active.held.entries()].sort(([a], [b]) => a - b);
    active.held.clear();
    for (const [seq, held] of ordered) {
      active.expectedSeq = seq + 1;
      this.#sink.deliver(held);
    }
  }

  #armGapTimer(): void {
    if (this.#gapTimer || this.#options.gapTimeoutMs <= 0) return;
    this.#gapTimer = setTimeout(() => {
      this.#gapTimer = null;
      const active = this.#active;
      if (!active || active.held.size === 0) return;
      this.#logger?.debug({ event: 'voice_sequencer_gap_timeout', turnId: active.turnId, held: active.held.size });
      this.#releaseAll(active);
    }, this.#options.gapTimeoutMs);
    this.#gapTimer.unref?.();
  }

  #clearGapTimer(): void {
    if (this.#gapTimer) {
      clearTimeout(this.#gapTimer);
      this.#gapTimer = null;
    }
  }

  #remember(turnId: string): void {
    this.#recentTurnIds = this.#recentTurnIds.filter((id) => id !== turnId);
    this.#recentTurnIds.push(turnId);
    const overflow = this.#recentTurnIds.length - this.#options.recentTurnMemory;
    if (overflow > 0) {
      this.#recentTurnIds.splice(0, overflow);
    }
  }

  #drop(event: TurnEvent, reason: DropReason): void {
    this.#logger?.debug({ event: 'voice_frame_dropped', type: event.type, turnId: event.turnId, seq: event.seq, reason });
    this.#sink.dropped?.(event, reason);
  }
}
