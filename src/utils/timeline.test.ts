import { describe, expect, it } from 'vitest';
import { EventTimeline } from './timeline.js';

describe('EventTimeline', () => {
  it('keeps only the most recent entries', () => {
    let now = 0;
    const timeline = new EventTimeline(2, () => (now += 1));
    timeline.push('a');
    timeline.push('b');
    timeline.push('c');

    expect(timeline.entries().map((entry) => entry.message)).toEqual(['b', 'c']);
  });

  it('prefixes lines with a local clock time', () => {
    const ts = new Date(2024, 0, 2, 3, 4, 5, 6).getTime();
    const timeline = new EventTimeline(4, () => ts);
    timeline.push('connected');

    expect(timeline.lines()).toEqual(['03:04:05.006 connected']);
  });
});
