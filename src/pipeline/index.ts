/**
 * Pipeline run — one build of one output file.
 *
 * A PipelineRun owns everything that must not leak between builds: the
 * validated config, the engine bound to this run's scratch directory, the
 * random source, and the memo of normalized clips.
 *
 * Order: source survey → resource check → video timeline → audio timeline → quote schedule →
 * final mux. Each stage finishes before the next starts.
 */
import { randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import type { BuildConfig } from '../config.js';
import { IntegrityError } from '../utils/errors.js';
import { logger, setLogLevel } from '../utils/logger.js';
import { checkDiskSpace, estimateOutputSize, statfsFreeBytes, type FreeSpaceProbe } from '../utils/disk.js';
import { formatTime } from '../utils/format.js';
import { createRandom, type RandomSource } from '../utils/random.js';
import { FfmpegEngine, type TranscodeEngine } from '../media/engine.js';
import { surveySources, type SourceReport } from '../preflight.js';
import { ClipAssembler, type NormalizedClip, type VideoTimeline } from './clips.js';
import { TrackBuilder } from './tracks.js';
import { loadQuotes, scheduleQuotes, type QuoteWindow } from './quotes.js';
import { finalize } from './mux.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PipelineDeps {
  engine?: TranscodeEngine;
  random?: RandomSource;
  freeSpace?: FreeSpaceProbe;
}

export interface RunResult {
  /** null for dry runs. */
  outputPath: string | null;
  video: VideoTimeline | null;
  audioPath: string | null;
  quotes: QuoteWindow[];
}

// ── Run ───────────────────────────────────────────────────────────────────────

export class PipelineRun {
  readonly workDir: string;
  private readonly engine: TranscodeEngine;
  private readonly random: RandomSource;
  private readonly freeSpace: FreeSpaceProbe;
  private readonly normalized = new Map<string, NormalizedClip>();

  constructor(readonly config: BuildConfig, deps: PipelineDeps = {}) {
    this.workDir = path.join(config.tempDir, `run_${randomUUID()}`);
    this.engine = deps.engine ?? new FfmpegEngine({ workDir: this.workDir });
    this.random = deps.random ?? createRandom(config.seed);
    this.freeSpace = deps.freeSpace ?? statfsFreeBytes;
  }

  // ── Stages ─────────────────────────────────────────────────────────────────

  async assembleVideo(videoDir: string = this.config.videosDir): Promise<VideoTimeline> {
    return new ClipAssembler(this.engine, this.config, this.random, this.normalized).build(videoDir);
  }

  async buildVideoTimeline(videoDir: string = this.config.videosDir): Promise<string> {
    return (await this.assembleVideo(videoDir)).videoPath;
  }

  async buildAudioTimeline(
    musicDir: string = this.config.musicDir,
    soundsDir: string = this.config.soundsDir,
  ): Promise<string | null> {
    return new TrackBuilder(this.engine, this.config, this.random).build(musicDir, soundsDir);
  }

  scheduleQuotes(quotesDir: string = this.config.quotesDir): QuoteWindow[] {
    return scheduleQuotes(
      loadQuotes(quotesDir),
      {
        duration: this.config.duration,
        quotesDuration: this.config.quotesDuration,
        quotesMinBetween: this.config.quotesMinBetween,
        quotesMaxBetween: this.config.quotesMaxBetween,
        shuffle: this.config.quotesShuffle,
      },
      this.random,
    );
  }

  async finalize(
    videoPath: string,
    audioPath: string | null,
    windows: readonly QuoteWindow[],
  ): Promise<string> {
    return finalize(this.engine, { videoPath, audioPath, windows }, this.config);
  }

  // ── Pre-flight ─────────────────────────────────────────────────────────────

  checkResources(): void {
    const estimate = estimateOutputSize(this.config.resolution, this.config.duration);
    checkDiskSpace(path.dirname(path.resolve(this.config.outputPath)), estimate, this.freeSpace);
  }

  /** Survey the source directories; a run with no video files is rejected up front. */
  validateSources(): SourceReport[] {
    const sources = surveySources(this.config);
    const videos = sources.find((s) => s.category === 'videos');
    if (videos !== undefined && videos.count === 0) {
      throw new IntegrityError(`No video files found in ${videos.dir}`);
    }
    return sources;
  }

  /** Log the effective configuration; nothing is rendered. */
  describe(): void {
    const c = this.config;
    logger.info('Pipeline: dry run, configuration preview', {
      duration: `${c.duration}s (${formatTime(c.duration)})`,
      resolution: `${c.resolution.width}x${c.resolution.height}`,
      fps: c.fps,
      output: c.outputPath,
      musicShuffle: c.musicShuffle,
      videoShuffle: c.videoShuffle,
      quotesShuffle: c.quotesShuffle,
      quoteDuration: c.quotesDuration,
      quoteInterval: `${c.quotesMinBetween}s - ${c.quotesMaxBetween}s`,
      musicVolume: c.musicVolume,
      soundsVolume: c.soundsVolume,
      quoteStyle: c.quoteStyle,
      transition: c.transition,
      seed: c.seed ?? null,
    });
    logger.info('Pipeline: no video will be rendered in dry-run mode');
  }

  // ── Full run ───────────────────────────────────────────────────────────────

  async run(): Promise<RunResult> {
    if (this.config.verbose) setLogLevel('debug');

    logger.info('Pipeline: validating inputs');
    this.validateSources();

    if (this.config.dryRun) {
      this.describe();
      return { outputPath: null, video: null, audioPath: null, quotes: [] };
    }

    this.checkResources();
    logger.info('Pipeline: starting video generation', { workDir: this.workDir });

    try {
      logger.info('Pipeline: step 1/4, processing video clips');
      const video = await this.assembleVideo();

      logger.info('Pipeline: step 2/4, mixing audio tracks');
      const audioPath = await this.buildAudioTimeline();

      logger.info('Pipeline: step 3/4, scheduling quotes');
      const quotes = this.scheduleQuotes();

      logger.info('Pipeline: step 4/4, combining video, audio, and quotes');
      const outputPath = await this.finalize(video.videoPath, audioPath, quotes);

      logger.info('Pipeline: video successfully created', { outputPath });
      return { outputPath, video, audioPath, quotes };
    } finally {
      if (!this.config.keepTemp) this.cleanup();
    }
  }

  /** Remove this run's scratch directory. */
  cleanup(): void {
    if (!fs.existsSync(this.workDir)) return;
    try {
      fs.rmSync(this.workDir, { recursive: true, force: true });
      logger.debug('Pipeline: cleaned up temporary directory', { workDir: this.workDir });
    } catch (err) {
      logger.warn('Pipeline: failed to clean up temporary directory', { workDir: this.workDir, error: String(err) });
    }
  }
}
