function formatClock(ts: number): string {
  const date = new Date(ts);
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

export interface TimelineEntry {
  ts: number;
  message: string;
}

/** Fixed-size ring of recent session events for debug overlays. */
export class EventTimeline {
  #entries: TimelineEntry[] = [];
  #capacity: number;
  #now: () => number;

  constructor(capacity = 36, now: () => number = Date.now) {
    this.#capacity = Math.max(1, capacity);
    this.#now = now;
  }

  push(message: string): void {
    this.#entries.push({ ts: this.#now(), message });
    if (this.#entries.length > this.#capacity) {
      this.#entries.splice(0, this.#entries.length - this.#capacity);
    }
  }

  entries(): TimelineEntry[] {
    return this.#entries.slice();
  }

  lines(): string[] {
    return this.#entries.map((entry) => `${formatClock(entry.ts)} ${entry.message}`);
  }

  clear(): void {
    this.#entries.length = 0;
  }
}
