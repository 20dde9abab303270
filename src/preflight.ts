/**
 * Pre-flight checks — engine binaries, source directories and disk space.
 * Used by `longloop check` and scripts/check-env.ts; never renders anything.
 */
import * as fs from 'fs';
import * as path from 'path';
import {
  AUDIO_FORMATS,
  QUOTE_FORMATS,
  VIDEO_FORMATS,
  type BuildConfig,
} from './config.js';
import { ResourceError } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { checkDiskSpace, estimateOutputSize, statfsFreeBytes, type FreeSpaceProbe } from './utils/disk.js';
import { spawnRunner, type CommandRunner } from './media/engine.js';
import { listByFormat } from './media/scan.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type SourceCategory = 'videos' | 'music' | 'quotes' | 'sounds';

export interface SourceReport {
  category: SourceCategory;
  dir: string;
  exists: boolean;
  count: number;
  required: boolean;
}

export interface PreflightReport {
  tools: Record<'ffmpeg' | 'ffprobe', boolean>;
  sources: SourceReport[];
  /** null when there is room for the estimated output. */
  diskProblem: string | null;
  ok: boolean;
}

export interface PreflightDeps {
  runner?: CommandRunner;
  freeSpace?: FreeSpaceProbe;
}

// ── Checks ────────────────────────────────────────────────────────────────────

export function checkTool(bin: string, runner: CommandRunner = spawnRunner): boolean {
  return runner(bin, ['-version']).exitCode === 0;
}

export function surveySources(config: BuildConfig): SourceReport[] {
  const entries: Array<[SourceCategory, string, ReadonlySet<string>, boolean]> = [
    ['videos', config.videosDir, VIDEO_FORMATS, true],
    ['music',  config.musicDir,  AUDIO_FORMATS, false],
    ['quotes', config.quotesDir, QUOTE_FORMATS, false],
    ['sounds', config.soundsDir, AUDIO_FORMATS, false],
  ];

  return entries.map(([category, dir, formats, required]) => {
    const exists = fs.existsSync(dir);
    const count = listByFormat(dir, formats).length;

    if (count > 0) {
      logger.info(`Preflight: found ${count} ${category} file(s)`, { dir });
    } else if (required) {
      logger.error(`Preflight: no ${category} files found`, { dir, formats: [...formats] });
    } else if (category === 'sounds') {
      logger.debug('Preflight: no sound files', { dir });
    } else {
      logger.warn(`Preflight: no ${category} files found, video will be created without ${category}`, { dir });
    }

    return { category, dir, exists, count, required };
  });
}

export function runPreflight(config: BuildConfig, deps: PreflightDeps = {}): PreflightReport {
  const runner = deps.runner ?? spawnRunner;
  const tools = {
    ffmpeg:  checkTool('ffmpeg', runner),
    ffprobe: checkTool('ffprobe', runner),
  };
  for (const [bin, found] of Object.entries(tools)) {
    if (!found) logger.error(`Preflight: ${bin} not found on PATH`);
  }

  const sources = surveySources(config);

  let diskProblem: string | null = null;
  try {
    checkDiskSpace(
      path.dirname(path.resolve(config.outputPath)),
      estimateOutputSize(config.resolution, config.duration),
      deps.freeSpace ?? statfsFreeBytes,
    );
  } catch (err) {
    if (!(err instanceof ResourceError)) throw err;
    diskProblem = err.message;
    logger.error(`Preflight: ${err.message}`);
  }

  const ok =
    tools.ffmpeg && tools.ffprobe &&
    sources.every((s) => !s.required || s.count > 0) &&
    diskProblem === null;

  return { tools, sources, diskProblem, ok };
}
