import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { ValidationError } from './utils/errors.js';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const TRUTHY = new Set(['true', '1', 'yes', 'on']);

const flag = z
  .string()
  .optional()
  .transform((v) => (v === undefined ? undefined : TRUTHY.has(v.trim().toLowerCase())));

const EnvSchema = z.object({
  // Logging
  LOG_LEVEL:                   z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                  z.enum(['text', 'json']).default('text'),

  // Timeline
  LONGLOOP_DURATION:           z.coerce.number().optional(),
  LONGLOOP_QUOTES_DURATION:    z.coerce.number().optional(),
  LONGLOOP_QUOTES_MIN_BETWEEN: z.coerce.number().optional(),
  LONGLOOP_QUOTES_MAX_BETWEEN: z.coerce.number().optional(),
  LONGLOOP_MUSIC_SHUFFLE:      flag,
  LONGLOOP_QUOTES_SHUFFLE:     flag,
  LONGLOOP_VIDEO_SHUFFLE:      flag,
  LONGLOOP_SEED:               z.coerce.number().int().optional(),

  // Output
  LONGLOOP_OUTPUT:             z.string().optional(),
  LONGLOOP_FPS:                z.coerce.number().optional(),
  LONGLOOP_RESOLUTION:         z.string().optional(),
  LONGLOOP_TRANSITION:         z.string().optional(),
  LONGLOOP_QUOTE_STYLE:        z.string().optional(),
  LONGLOOP_FONT_FILE:          z.string().optional(),

  // Audio
  LONGLOOP_MUSIC_VOLUME:       z.coerce.number().optional(),
  LONGLOOP_SOUNDS_VOLUME:      z.coerce.number().optional(),

  // Source / scratch directories
  LONGLOOP_VIDEOS_DIR:         z.string().optional(),
  LONGLOOP_MUSIC_DIR:          z.string().optional(),
  LONGLOOP_QUOTES_DIR:         z.string().optional(),
  LONGLOOP_SOUNDS_DIR:         z.string().optional(),
  LONGLOOP_TEMP_DIR:           z.string().optional(),
  LONGLOOP_KEEP_TEMP:          flag,

  // Utility
  LONGLOOP_VERBOSE:            flag,
  LONGLOOP_DRY_RUN:            flag,
});

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${invalid}`);
}

export const env: Env = parsed.data;

// ── Timeline constants ────────────────────────────────────────────────────────

/** Upper bound on inputs handed to a single concat invocation. */
export const BATCH_SIZE = 25;

export const AUDIO_FADE_SECONDS = 2;
export const MIX_DROPOUT_SECONDS = 2;
export const QUOTE_FADE_SECONDS = 0.5;
export const VIDEO_EDGE_FADE_SECONDS = 1;

/** Durations closer than this are treated as equal. */
export const FIT_TOLERANCE = 1e-6;

// ── Engine constants ──────────────────────────────────────────────────────────

export const ENCODER = {
  video: { codec: 'libx264', preset: 'medium', crf: 23 },
  audio: { codec: 'libmp3lame', bitrate: '192k', ext: 'mp3' },
  muxAudio: { codec: 'aac', bitrate: '192k' },
} as const;

export const DIAGNOSTIC_TAIL_LINES = 50;

// ── Disk estimate ─────────────────────────────────────────────────────────────

export const DISK_HEADROOM = 1.1;

export const BITRATE_TIERS_MBPS = [
  { minPixels: 1920 * 1080, mbps: 5.0 },
  { minPixels: 1280 * 720,  mbps: 2.5 },
  { minPixels: 0,           mbps: 1.5 },
] as const;

// ── Source formats ────────────────────────────────────────────────────────────

export const VIDEO_FORMATS: ReadonlySet<string> = new Set(['.mp4', '.mov', '.avi', '.mkv']);
export const AUDIO_FORMATS: ReadonlySet<string> = new Set(['.mp3', '.wav', '.m4a', '.aac', '.ogg']);
export const QUOTE_FORMATS: ReadonlySet<string> = new Set(['.txt']);

// ── Build config ──────────────────────────────────────────────────────────────

export const QUOTE_STYLES = ['minimal', 'centered', 'top', 'bottom'] as const;
export type QuoteStyle = typeof QUOTE_STYLES[number];

export const TRANSITION_KINDS = ['none', 'fade', 'crossfade'] as const;
export type TransitionKind = typeof TRANSITION_KINDS[number];

const ResolutionSchema = z.object({
  width:  z.number().int().positive(),
  height: z.number().int().positive(),
});

export type Resolution = z.infer<typeof ResolutionSchema>;

export const BuildConfigSchema = z
  .object({
    duration:         z.number().positive(),
    quotesDuration:   z.number().positive().default(5),
    quotesMinBetween: z.number().nonnegative().default(10),
    quotesMaxBetween: z.number().nonnegative().default(30),

    musicShuffle:     z.boolean().default(false),
    quotesShuffle:    z.boolean().default(false),
    // Follows musicShuffle when unset.
    videoShuffle:     z.boolean().optional(),

    outputPath:       z.string().min(1).default('output.mp4'),
    fps:              z.number().int().positive().default(30),
    resolution:       ResolutionSchema.default({ width: 1920, height: 1080 }),

    musicVolume:      z.number().min(0).max(1).default(0.7),
    soundsVolume:     z.number().min(0).max(1).default(0.5),

    quoteStyle:       z.enum(QUOTE_STYLES).default('centered'),
    transition:       z.enum(TRANSITION_KINDS).default('crossfade'),
    fontFile:         z.string().min(1).optional(),

    videosDir:        z.string().min(1).default('videos'),
    musicDir:         z.string().min(1).default('music'),
    quotesDir:        z.string().min(1).default('quotes'),
    soundsDir:        z.string().min(1).default('sounds'),
    tempDir:          z.string().min(1).default('.tmp'),
    keepTemp:         z.boolean().default(false),

    seed:             z.number().int().optional(),
    verbose:          z.boolean().default(false),
    dryRun:           z.boolean().default(false),
  })
  .refine((c) => c.quotesMaxBetween >= c.quotesMinBetween, {
    message: 'must be >= quotesMinBetween',
    path: ['quotesMaxBetween'],
  })
  .transform((c) => ({ ...c, videoShuffle: c.videoShuffle ?? c.musicShuffle }));

export type BuildConfigInput = z.input<typeof BuildConfigSchema>;
export type BuildConfig = z.output<typeof BuildConfigSchema>;

/**
 * Validate a raw build config. Every failing field is listed in the thrown
 * ValidationError so a bad run is rejected before any media is touched.
 */
export function parseBuildConfig(input: unknown): BuildConfig {
  const result = BuildConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join('.') : 'config'}: ${i.message}`,
    );
    throw new ValidationError(`Invalid build configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/** Parse "WIDTHxHEIGHT" (case-insensitive separator). */
export function parseResolution(raw: string): Resolution {
  const match = raw.trim().match(/^(\d+)\s*[xX]\s*(\d+)$/);
  if (!match?.[1] || !match[2]) {
    throw new ValidationError(`Invalid resolution format: ${raw}. Expected WIDTHxHEIGHT`);
  }
  return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
}

/** Build and validate a config from LONGLOOP_* environment variables. */
export function buildConfigFromEnv(source: Env = env): BuildConfig {
  return parseBuildConfig({
    duration:         source.LONGLOOP_DURATION,
    quotesDuration:   source.LONGLOOP_QUOTES_DURATION,
    quotesMinBetween: source.LONGLOOP_QUOTES_MIN_BETWEEN,
    quotesMaxBetween: source.LONGLOOP_QUOTES_MAX_BETWEEN,
    musicShuffle:     source.LONGLOOP_MUSIC_SHUFFLE,
    quotesShuffle:    source.LONGLOOP_QUOTES_SHUFFLE,
    videoShuffle:     source.LONGLOOP_VIDEO_SHUFFLE,
    outputPath:       source.LONGLOOP_OUTPUT,
    fps:              source.LONGLOOP_FPS,
    resolution:       source.LONGLOOP_RESOLUTION !== undefined
      ? parseResolution(source.LONGLOOP_RESOLUTION)
      : undefined,
    musicVolume:      source.LONGLOOP_MUSIC_VOLUME,
    soundsVolume:     source.LONGLOOP_SOUNDS_VOLUME,
    quoteStyle:       source.LONGLOOP_QUOTE_STYLE,
    transition:       source.LONGLOOP_TRANSITION,
    fontFile:         source.LONGLOOP_FONT_FILE,
    videosDir:        source.LONGLOOP_VIDEOS_DIR,
    musicDir:         source.LONGLOOP_MUSIC_DIR,
    quotesDir:        source.LONGLOOP_QUOTES_DIR,
    soundsDir:        source.LONGLOOP_SOUNDS_DIR,
    tempDir:          source.LONGLOOP_TEMP_DIR,
    keepTemp:         source.LONGLOOP_KEEP_TEMP,
    seed:             source.LONGLOOP_SEED,
    verbose:          source.LONGLOOP_VERBOSE,
    dryRun:           source.LONGLOOP_DRY_RUN,
  });
}
