/**
 * Source discovery — lists supported files in a directory, drops the ones that
 * fail the integrity check, and probes durations into MediaItems.
 */
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { ProbeError } from '../utils/errors.js';
import type { TranscodeEngine } from './engine.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface MediaItem {
  readonly path: string;
  /** Seconds, as reported by the engine's probe. */
  readonly duration: number;
  readonly valid: boolean;
}

export interface ScanResult {
  /** Files that passed the integrity check, sorted by path. */
  files: string[];
  dropped: string[];
}

// ── Public API ─────────────────────────────────────────────────────────────────

/** Every regular file in `dir` whose extension is in `formats`, sorted. */
export function listByFormat(dir: string, formats: ReadonlySet<string>): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isFile() && formats.has(path.extname(e.name).toLowerCase()))
    .map((e) => path.join(dir, e.name))
    .sort();
}

/** A file is usable when it exists and is non-empty. */
export function validateFileIntegrity(filePath: string): boolean {
  if (!fs.existsSync(filePath)) {
    logger.warn('Scan: file does not exist', { filePath });
    return false;
  }
  if (fs.statSync(filePath).size === 0) {
    logger.warn('Scan: file is empty', { filePath });
    return false;
  }
  return true;
}

export function scanMedia(dir: string, formats: ReadonlySet<string>): ScanResult {
  const files: string[] = [];
  const dropped: string[] = [];
  for (const file of listByFormat(dir, formats)) {
    (validateFileIntegrity(file) ? files : dropped).push(file);
  }
  if (dropped.length > 0) {
    logger.warn(`Scan: skipped ${dropped.length} invalid file(s)`, { dir, dropped });
  }
  return { files, dropped };
}

/**
 * Probe each path. Files the engine cannot decode are dropped with a warning;
 * any other engine failure propagates.
 */
export async function probeItems(
  engine: TranscodeEngine,
  paths: readonly string[],
): Promise<MediaItem[]> {
  const items: MediaItem[] = [];
  for (const p of paths) {
    try {
      const duration = await engine.probeDuration(p);
      items.push({ path: p, duration, valid: true });
    } catch (err) {
      if (!(err instanceof ProbeError)) throw err;
      logger.warn('Scan: dropping undecodable file', { path: p, error: err.message });
    }
  }
  return items;
}
