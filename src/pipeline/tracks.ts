/**
 * Audio bed — a music track fitted and looped to the target duration, one
 * ambient loop per sound-effect file, and a final mix when both exist.
 */
import {
  AUDIO_FADE_SECONDS,
  AUDIO_FORMATS,
  type BuildConfig,
} from '../config.js';
import { InsufficientMaterialError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { RandomSource } from '../utils/random.js';
import { probeItems, scanMedia, type MediaItem } from '../media/scan.js';
import type { TranscodeEngine } from '../media/engine.js';
import { fitDuration, totalDuration, type FitPlan } from '../timeline/fit.js';

// ── Filters ───────────────────────────────────────────────────────────────────

/** Volume plus a fade-in at 0 and a fade-out ending at `duration`. */
export function musicFilter(volume: number, duration: number): string {
  const fadeOutStart = Math.max(0, duration - AUDIO_FADE_SECONDS);
  return (
    `volume=${volume},` +
    `afade=t=in:st=0:d=${AUDIO_FADE_SECONDS},` +
    `afade=t=out:st=${fadeOutStart}:d=${AUDIO_FADE_SECONDS}`
  );
}

export function soundFilter(volume: number): string {
  return `volume=${volume}`;
}

// ── Builder ───────────────────────────────────────────────────────────────────

export class TrackBuilder {
  constructor(
    private readonly engine: TranscodeEngine,
    private readonly config: BuildConfig,
    private readonly random: RandomSource,
  ) {}

  /** Mixed audio path, or null when neither music nor sounds are usable. */
  async build(musicDir: string, soundsDir: string): Promise<string | null> {
    const musicFiles = scanMedia(musicDir, AUDIO_FORMATS).files;
    const soundFiles = scanMedia(soundsDir, AUDIO_FORMATS).files;

    if (musicFiles.length === 0 && soundFiles.length === 0) {
      logger.info('Tracks: no audio files to mix');
      return null;
    }
    logger.info(
      `Tracks: mixing ${musicFiles.length} music file(s) and ${soundFiles.length} sound file(s)`,
    );

    const music = musicFiles.length > 0 ? await this.buildMusicTrack(musicFiles) : null;

    const sounds: string[] = [];
    for (const item of await probeItems(this.engine, soundFiles)) {
      sounds.push(await this.buildSoundTrack(item.path));
    }

    return this.mix(music, sounds);
  }

  /** Fit, join, loop to the target and apply volume + edge fades. */
  async buildMusicTrack(files: readonly string[]): Promise<string | null> {
    const target = this.config.duration;
    const items = await probeItems(this.engine, files);

    const plan = this.fitMusic(items);
    if (plan === null) {
      logger.warn('Tracks: no playable music, continuing without a music track');
      return null;
    }

    logger.info(`Tracks: creating music track from ${plan.orderedItems.length} file(s)`, {
      sourceDuration: totalDuration(items),
      target,
      loopCount: plan.loopCount,
    });

    const [first] = plan.orderedItems;
    const joined =
      plan.orderedItems.length === 1 && first !== undefined
        ? await this.engine.transcodeAudio(first.path)
        : await this.engine.concat(plan.orderedItems.map((i) => i.path), true, 'audio');

    const looped = await this.engine.loopToDuration(joined, target);
    const loopedDuration = await this.engine.probeDuration(looped);
    return this.engine.applyAudioFilter(looped, musicFilter(this.config.musicVolume, loopedDuration));
  }

  private fitMusic(items: MediaItem[]): FitPlan<MediaItem> | null {
    try {
      const plan = fitDuration(items, this.config.duration, {
        shuffle: this.config.musicShuffle,
        random: this.random,
      });
      if (this.config.musicShuffle) logger.info('Tracks: shuffled music files');
      return plan;
    } catch (err) {
      if (err instanceof InsufficientMaterialError) return null;
      throw err;
    }
  }

  /** Sounds are ambient loops: each one covers the whole duration on its own. */
  async buildSoundTrack(file: string): Promise<string> {
    logger.info('Tracks: creating looping sound', { file });
    const looped = await this.engine.loopToDuration(file, this.config.duration);
    return this.engine.applyAudioFilter(looped, soundFilter(this.config.soundsVolume));
  }

  /**
   * Music is the mix reference when present. A single track of either kind
   * passes through untouched; several sounds without music are mixed with
   * the first sound as reference.
   */
  async mix(music: string | null, sounds: readonly string[]): Promise<string | null> {
    const tracks = music !== null ? [music, ...sounds] : [...sounds];
    const [only] = tracks;
    if (only === undefined) return null;
    if (tracks.length === 1) return only;

    logger.info('Tracks: mixing audio tracks together', { count: tracks.length });
    return this.engine.mixTracks(tracks, 0);
  }
}
