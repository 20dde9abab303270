/**
 * Clip assembly — turns a directory of source clips into one video segment
 * lasting exactly the configured duration.
 *
 * Steps:
 * 1. Scan + integrity-filter + probe the sources (fatal if none survive).
 * 2. Shuffle with the run's random source, or sort by path.
 * 3. Normalize each distinct source once (memoized per run).
 * 4. Fit normalized durations to the target.
 * 5. Use a lone untrimmed artifact directly, else batch-concatenate.
 * 6. Trim the tail when the plan overshoots.
 */
import { VIDEO_FORMATS, type BuildConfig } from '../config.js';
import { IntegrityError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { formatTime } from '../utils/format.js';
import { shuffled, type RandomSource } from '../utils/random.js';
import { probeItems, scanMedia, type MediaItem } from '../media/scan.js';
import type { TranscodeEngine } from '../media/engine.js';
import { fitDuration, totalDuration } from '../timeline/fit.js';
import { concatenateInBatches } from '../timeline/batch.js';
import { toTransition } from '../timeline/transition.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface NormalizedClip {
  source: MediaItem;
  path: string;
  duration: number;
}

export interface VideoTimeline {
  videoPath: string;
  /** Segments handed to concatenation, in play order (repeats included). */
  segmentCount: number;
  loopCount: number;
  trimmed: boolean;
}

// ── Assembler ─────────────────────────────────────────────────────────────────

export class ClipAssembler {
  constructor(
    private readonly engine: TranscodeEngine,
    private readonly config: BuildConfig,
    private readonly random: RandomSource,
    /** Normalized artifacts keyed by source path; owned by the pipeline run. */
    private readonly normalized: Map<string, NormalizedClip> = new Map(),
  ) {}

  async build(videoDir: string): Promise<VideoTimeline> {
    const target = this.config.duration;

    // ── Step 1: Sources ───────────────────────────────────────────────────
    const scan = scanMedia(videoDir, VIDEO_FORMATS);
    if (scan.files.length === 0) {
      throw new IntegrityError(`No valid video files found in ${videoDir}`, scan.dropped);
    }

    const probed = await probeItems(this.engine, scan.files);
    const skipped = scan.files.length + scan.dropped.length - probed.length;
    if (skipped > 0) logger.warn(`Clips: skipped ${skipped} corrupted video file(s)`);
    if (probed.length === 0) {
      throw new IntegrityError(`No decodable video files found in ${videoDir}`, scan.files);
    }

    // ── Step 2: Order ─────────────────────────────────────────────────────
    const ordered = this.config.videoShuffle
      ? shuffled(probed, this.random)
      : [...probed].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    if (this.config.videoShuffle) logger.info('Clips: shuffled video order');

    logger.info(`Clips: processing ${ordered.length} video file(s)`, {
      sourceDuration: formatTime(totalDuration(ordered)),
      target: formatTime(target),
    });

    // ── Step 3: Normalize ─────────────────────────────────────────────────
    const clips: NormalizedClip[] = [];
    for (const item of ordered) clips.push(await this.normalize(item));

    // ── Step 4: Fit ───────────────────────────────────────────────────────
    const plan = fitDuration(clips, target);
    if (plan.loopCount > 1) logger.info(`Clips: looping video sequence ${plan.loopCount} times`);
    logger.info(`Clips: selected ${plan.orderedItems.length} clip(s) for output`, {
      trimLastBy: plan.trimLastBy,
    });

    // ── Step 5: Combine ───────────────────────────────────────────────────
    const [first] = plan.orderedItems;
    let videoPath: string;
    if (plan.orderedItems.length === 1 && plan.trimLastBy === 0 && first !== undefined) {
      videoPath = first.path;
    } else {
      videoPath = await concatenateInBatches(
        this.engine,
        plan.orderedItems.map((c) => c.path),
        { transition: toTransition(this.config.transition) },
      );
    }

    // ── Step 6: Trim ──────────────────────────────────────────────────────
    const trimmed = plan.trimLastBy > 0;
    if (trimmed) {
      logger.info(`Clips: trimming video to ${target}s`);
      videoPath = await this.engine.trim(videoPath, target);
    }

    return {
      videoPath,
      segmentCount: plan.orderedItems.length,
      loopCount: plan.loopCount,
      trimmed,
    };
  }

  private async normalize(item: MediaItem): Promise<NormalizedClip> {
    const cached = this.normalized.get(item.path);
    if (cached) return cached;

    const { width, height } = this.config.resolution;
    const path = await this.engine.scaleAndPad(item.path, width, height, this.config.fps);
    const clip: NormalizedClip = { source: item, path, duration: await this.engine.probeDuration(path) };
    this.normalized.set(item.path, clip);
    return clip;
  }
}
