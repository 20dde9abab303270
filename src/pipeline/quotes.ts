/**
 * Quote scheduling — loads one quote per text file and lays out
 * non-overlapping display windows separated by a jittered gap.
 */
import * as fs from 'fs';
import { QUOTE_FADE_SECONDS, QUOTE_FORMATS } from '../config.js';
import { logger } from '../utils/logger.js';
import { shuffled, uniform, type RandomSource } from '../utils/random.js';
import { listByFormat } from '../media/scan.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface QuoteFade {
  /** Alpha reaches 1 at this time. */
  inEnd: number;
  /** Alpha starts falling at this time. */
  outStart: number;
}

export interface QuoteWindow {
  text: string;
  start: number;
  end: number;
  index: number;
  fade: QuoteFade;
}

export interface QuoteScheduleOptions {
  duration: number;
  quotesDuration: number;
  quotesMinBetween: number;
  quotesMaxBetween: number;
  shuffle: boolean;
}

// ── Loading ───────────────────────────────────────────────────────────────────

export function loadQuotes(dir: string): string[] {
  const files = listByFormat(dir, QUOTE_FORMATS);
  if (files.length === 0) {
    logger.info('Quotes: no quote files found', { dir });
    return [];
  }

  const quotes: string[] = [];
  for (const file of files) {
    let text: string;
    try {
      text = fs.readFileSync(file, 'utf-8').trim();
    } catch (err) {
      logger.error('Quotes: failed to read quote file', { file, error: String(err) });
      continue;
    }
    if (text) quotes.push(text);
    else logger.warn('Quotes: empty quote file', { file });
  }

  logger.info(`Quotes: loaded ${quotes.length} quote(s)`);
  return quotes;
}

// ── Scheduling ────────────────────────────────────────────────────────────────

export function fadeEnvelope(start: number, end: number): QuoteFade {
  return { inEnd: start + QUOTE_FADE_SECONDS, outStart: end - QUOTE_FADE_SECONDS };
}

export function scheduleQuotes(
  pool: readonly string[],
  opts: QuoteScheduleOptions,
  random: RandomSource,
): QuoteWindow[] {
  if (pool.length === 0) {
    logger.info('Quotes: no quotes to display');
    return [];
  }

  const quotes = opts.shuffle ? shuffled(pool, random) : [...pool];
  if (opts.shuffle) logger.info('Quotes: shuffled quotes');

  const windows: QuoteWindow[] = [];
  let current = uniform(random, opts.quotesMinBetween, opts.quotesMaxBetween);

  while (current + opts.quotesDuration <= opts.duration) {
    const index = windows.length;
    const start = current;
    const end = current + opts.quotesDuration;
    windows.push({
      text: quotes[index % quotes.length] ?? '',
      start,
      end,
      index,
      fade: fadeEnvelope(start, end),
    });
    current = end + uniform(random, opts.quotesMinBetween, opts.quotesMaxBetween);
  }

  logger.info(`Quotes: generated ${windows.length} quote timing(s)`);
  for (const w of windows) {
    logger.debug(`Quote ${w.index}: ${w.start.toFixed(2)}s - ${w.end.toFixed(2)}s`, {
      text: w.text.slice(0, 50),
    });
  }
  return windows;
}
