import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { fadeEnvelope, loadQuotes, scheduleQuotes, type QuoteScheduleOptions } from './quotes.js';
import { seededRandom } from '../utils/random.js';
import { constantRandom, makeTempDir, removeDir, writeFile } from '../testing/fixtures.js';

const opts = (overrides: Partial<QuoteScheduleOptions> = {}): QuoteScheduleOptions => ({
  duration: 60,
  quotesDuration: 5,
  quotesMinBetween: 10,
  quotesMaxBetween: 30,
  shuffle: false,
  ...overrides,
});

describe('scheduleQuotes', () => {
  it('spaces windows by the drawn gap and stops before overrunning', () => {
    const windows = scheduleQuotes(['a', 'b', 'c'], opts(), constantRandom(0.5));

    expect(windows).toEqual([
      { text: 'a', start: 20, end: 25, index: 0, fade: { inEnd: 20.5, outStart: 24.5 } },
      { text: 'b', start: 45, end: 50, index: 1, fade: { inEnd: 45.5, outStart: 49.5 } },
    ]);
  });

  it('admits a window ending exactly at the duration and cycles the pool', () => {
    const windows = scheduleQuotes(['a', 'b'], opts(), constantRandom(0));

    expect(windows.map((w) => [w.start, w.end])).toEqual([[10, 15], [25, 30], [40, 45], [55, 60]]);
    expect(windows.map((w) => w.text)).toEqual(['a', 'b', 'a', 'b']);
  });

  it('returns nothing for an empty pool', () => {
    expect(scheduleQuotes([], opts(), constantRandom(0))).toEqual([]);
  });

  it('returns nothing when the first window cannot fit', () => {
    expect(scheduleQuotes(['a'], opts({ duration: 12 }), constantRandom(0))).toEqual([]);
  });

  it('keeps windows ordered, non-overlapping and inside the duration', () => {
    for (let seed = 1; seed <= 25; seed++) {
      const windows = scheduleQuotes(['a', 'b', 'c'], opts({ duration: 600 }), seededRandom(seed));

      expect(windows.length).toBeGreaterThan(0);
      const [first] = windows;
      expect(first?.start).toBeGreaterThanOrEqual(10);
      expect(first?.start).toBeLessThanOrEqual(30);

      windows.forEach((w, i) => {
        expect(w.index).toBe(i);
        expect(w.end - w.start).toBeCloseTo(5, 9);
        expect(w.end).toBeLessThanOrEqual(600);
        const next = windows[i + 1];
        if (next) {
          expect(next.start - w.end).toBeGreaterThan(10 - 1e-9);
          expect(next.start - w.end).toBeLessThan(30 + 1e-9);
        }
      });
    }
  });

  it('is reproducible under a fixed seed', () => {
    const a = scheduleQuotes(['a', 'b', 'c'], opts({ duration: 300, shuffle: true }), seededRandom(9));
    const b = scheduleQuotes(['a', 'b', 'c'], opts({ duration: 300, shuffle: true }), seededRandom(9));
    expect(a).toEqual(b);
  });

  it('shows every quote once per cycle when shuffled', () => {
    const windows = scheduleQuotes(['a', 'b', 'c'], opts({ duration: 600, shuffle: true }), seededRandom(4));

    expect(windows.length).toBeGreaterThanOrEqual(3);
    expect(windows.slice(0, 3).map((w) => w.text).sort()).toEqual(['a', 'b', 'c']);
  });
});

describe('fadeEnvelope', () => {
  it('ramps over half a second at each end', () => {
    expect(fadeEnvelope(10, 15)).toEqual({ inEnd: 10.5, outStart: 14.5 });
  });
});

describe('loadQuotes', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => removeDir(root));

  it('reads trimmed text files in path order and skips empty ones', () => {
    const dir = path.join(root, 'quotes');
    writeFile(path.join(dir, 'b.txt'), '  Second thought.\n');
    writeFile(path.join(dir, 'a.txt'), 'First thought.');
    writeFile(path.join(dir, 'c.txt'), '   \n');
    writeFile(path.join(dir, 'd.md'), 'ignored');

    expect(loadQuotes(dir)).toEqual(['First thought.', 'Second thought.']);
  });

  it('returns nothing for a missing directory', () => {
    expect(loadQuotes(path.join(root, 'nope'))).toEqual([]);
  });
});
