/**
 * Transcode engine — the only place that talks to ffmpeg/ffprobe.
 *
 * Every operation writes a fresh file into the run's work directory and
 * returns its path. A non-zero exit (or a missing output after a zero exit)
 * raises EngineError carrying the tail of the engine's diagnostic output.
 * Calls block until the child process exits.
 */
import { spawnSync } from 'child_process';
import { randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { DIAGNOSTIC_TAIL_LINES, ENCODER, MIX_DROPOUT_SECONDS } from '../config.js';
import { EngineError, ProbeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

// ── Contract ──────────────────────────────────────────────────────────────────

export type MediaKind = 'video' | 'audio';

export interface MuxRequest {
  videoPath: string;
  audioPath?: string;
  /** Comma-joined video filter chain (edge fades, quote overlay). */
  videoFilter?: string;
  outputPath: string;
  /** Stop at the end of the shortest mapped stream. */
  shortest: boolean;
}

export interface TranscodeEngine {
  probeDuration(filePath: string): Promise<number>;
  scaleAndPad(filePath: string, width: number, height: number, fps: number): Promise<string>;
  concat(paths: readonly string[], reencode: boolean, kind?: MediaKind): Promise<string>;
  loopToDuration(filePath: string, seconds: number): Promise<string>;
  applyAudioFilter(filePath: string, filterExpression: string): Promise<string>;
  transcodeAudio(filePath: string): Promise<string>;
  mixTracks(paths: readonly string[], referenceIndex: number): Promise<string>;
  trim(filePath: string, seconds: number): Promise<string>;
  renderOverlayAndMux(request: MuxRequest): Promise<string>;
}

// ── Process runner ────────────────────────────────────────────────────────────

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => CommandResult;

export const spawnRunner: CommandRunner = (command, args) => {
  const res = spawnSync(command, [...args], {
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    maxBuffer: 64 * 1024 * 1024,
  });
  return {
    exitCode: res.status,
    stdout: res.stdout ?? '',
    stderr: res.error ? `${res.error.message}\n${res.stderr ?? ''}` : (res.stderr ?? ''),
  };
};

/** Last `lines` non-blank lines of a diagnostic dump. */
export function diagnosticTail(output: string, lines = DIAGNOSTIC_TAIL_LINES): string {
  return output
    .split('\n')
    .filter((l) => l.trim().length > 0)
    .slice(-lines)
    .join('\n');
}

/** Line for the concat demuxer's list file. */
export function concatListEntry(filePath: string): string {
  return `file '${path.resolve(filePath).replace(/'/g, "'\\''")}'`;
}

// ── ffmpeg implementation ─────────────────────────────────────────────────────

export interface FfmpegEngineOptions {
  /** Scratch directory owned by the pipeline run. */
  workDir: string;
  runner?: CommandRunner;
  ffmpegPath?: string;
  ffprobePath?: string;
}

const videoCodecArgs = (): string[] => [
  '-c:v', ENCODER.video.codec,
  '-preset', ENCODER.video.preset,
  '-crf', String(ENCODER.video.crf),
];

const audioCodecArgs = (): string[] => [
  '-c:a', ENCODER.audio.codec,
  '-b:a', ENCODER.audio.bitrate,
];

export class FfmpegEngine implements TranscodeEngine {
  private readonly workDir: string;
  private readonly runner: CommandRunner;
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;

  constructor(opts: FfmpegEngineOptions) {
    this.workDir = opts.workDir;
    this.runner = opts.runner ?? spawnRunner;
    this.ffmpegPath = opts.ffmpegPath ?? 'ffmpeg';
    this.ffprobePath = opts.ffprobePath ?? 'ffprobe';
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  private tempFile(label: string, ext: string): string {
    fs.mkdirSync(this.workDir, { recursive: true });
    return path.join(this.workDir, `${label}_${randomUUID()}.${ext.replace(/^\./, '')}`);
  }

  private runFfmpeg(label: string, args: string[], outputPath: string): string {
    logger.debug(`FFmpeg [${label}]`, { args });
    const res = this.runner(this.ffmpegPath, ['-y', ...args, outputPath]);
    if (res.exitCode !== 0) {
      const tail = diagnosticTail(res.stderr || res.stdout);
      logger.error(`FFmpeg [${label}] failed`, { exitCode: res.exitCode });
      throw new EngineError(label, res.exitCode, tail);
    }
    if (!fs.existsSync(outputPath) || fs.statSync(outputPath).size === 0) {
      throw new EngineError(label, res.exitCode, `no output written to ${outputPath}`);
    }
    return outputPath;
  }

  // ── Probing ────────────────────────────────────────────────────────────────

  async probeDuration(filePath: string): Promise<number> {
    if (!fs.existsSync(filePath)) throw new ProbeError(filePath, 'file not found');

    const args = [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      filePath,
    ];
    logger.debug('FFprobe [probeDuration]', { args });
    const res = this.runner(this.ffprobePath, args);
    if (res.exitCode !== 0) {
      throw new ProbeError(filePath, diagnosticTail(res.stderr) || `exit ${res.exitCode ?? 'unknown'}`);
    }

    const raw = res.stdout.trim();
    const duration = parseFloat(raw);
    if (!Number.isFinite(duration) || duration < 0) {
      throw new ProbeError(filePath, `unexpected ffprobe output "${raw}"`);
    }
    return duration;
  }

  // ── Video ──────────────────────────────────────────────────────────────────

  /** Fit inside width×height keeping aspect, pad to center, resample fps, drop audio. */
  async scaleAndPad(filePath: string, width: number, height: number, fps: number): Promise<string> {
    logger.info('FFmpeg: normalizing clip', { file: path.basename(filePath), width, height, fps });
    const vf =
      `scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
      `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`;
    return this.runFfmpeg(
      'scaleAndPad',
      ['-i', filePath, '-vf', vf, '-r', String(fps), ...videoCodecArgs(), '-an'],
      this.tempFile('normalized', 'mp4'),
    );
  }

  async concat(paths: readonly string[], reencode: boolean, kind: MediaKind = 'video'): Promise<string> {
    if (paths.length === 0) throw new EngineError('concat', null, 'no inputs');
    logger.info('FFmpeg: concatenating', { count: paths.length, reencode, kind });

    const listPath = this.tempFile('concat', 'txt');
    fs.writeFileSync(listPath, paths.map(concatListEntry).join('\n') + '\n', 'utf-8');

    const firstExt = path.extname(paths[0] ?? '').slice(1) || (kind === 'video' ? 'mp4' : ENCODER.audio.ext);
    const ext = !reencode ? firstExt : kind === 'video' ? 'mp4' : ENCODER.audio.ext;
    const codec = !reencode ? ['-c', 'copy'] : kind === 'video' ? videoCodecArgs() : audioCodecArgs();

    try {
      return this.runFfmpeg(
        'concat',
        ['-f', 'concat', '-safe', '0', '-i', listPath, ...codec],
        this.tempFile(`concat_${kind}`, ext),
      );
    } finally {
      if (fs.existsSync(listPath)) fs.unlinkSync(listPath);
    }
  }

  /** Stream-copy the first `seconds` of a file. */
  async trim(filePath: string, seconds: number): Promise<string> {
    logger.info('FFmpeg: trimming', { file: path.basename(filePath), seconds });
    const ext = path.extname(filePath).slice(1) || 'mp4';
    return this.runFfmpeg(
      'trim',
      ['-i', filePath, '-t', String(seconds), '-c', 'copy'],
      this.tempFile('trimmed', ext),
    );
  }

  // ── Audio ──────────────────────────────────────────────────────────────────

  /** Loop an audio file end-to-end and cut it at exactly `seconds`. */
  async loopToDuration(filePath: string, seconds: number): Promise<string> {
    logger.info('FFmpeg: looping audio to duration', { file: path.basename(filePath), seconds });
    return this.runFfmpeg(
      'loopToDuration',
      ['-stream_loop', '-1', '-i', filePath, '-t', String(seconds), ...audioCodecArgs()],
      this.tempFile('looped', ENCODER.audio.ext),
    );
  }

  async applyAudioFilter(filePath: string, filterExpression: string): Promise<string> {
    logger.debug('FFmpeg: audio filter', { file: path.basename(filePath), filterExpression });
    return this.runFfmpeg(
      'applyAudioFilter',
      ['-i', filePath, '-filter:a', filterExpression, ...audioCodecArgs()],
      this.tempFile('filtered', ENCODER.audio.ext),
    );
  }

  async transcodeAudio(filePath: string): Promise<string> {
    return this.runFfmpeg(
      'transcodeAudio',
      ['-i', filePath, ...audioCodecArgs()],
      this.tempFile('audio', ENCODER.audio.ext),
    );
  }

  /**
   * amix all tracks. The reference track is moved to input 0 because amix
   * takes its length from the first input (duration=first).
   */
  async mixTracks(paths: readonly string[], referenceIndex: number): Promise<string> {
    const reference = paths[referenceIndex];
    if (reference === undefined) {
      throw new EngineError('mixTracks', null, `reference index ${referenceIndex} out of range (${paths.length} inputs)`);
    }
    if (paths.length === 1) return this.transcodeAudio(reference);

    const ordered = [reference, ...paths.filter((_, i) => i !== referenceIndex)];
    logger.info('FFmpeg: mixing audio tracks', { count: ordered.length });

    const labels = ordered.map((_, i) => `[${i}:a]`).join('');
    const filter =
      `${labels}amix=inputs=${ordered.length}:duration=first:` +
      `dropout_transition=${MIX_DROPOUT_SECONDS}[aout]`;

    return this.runFfmpeg(
      'mixTracks',
      [
        ...ordered.flatMap((p) => ['-i', p]),
        '-filter_complex', filter,
        '-map', '[aout]',
        ...audioCodecArgs(),
      ],
      this.tempFile('mixed', ENCODER.audio.ext),
    );
  }

  // ── Final mux ──────────────────────────────────────────────────────────────

  async renderOverlayAndMux(request: MuxRequest): Promise<string> {
    logger.info('FFmpeg: rendering final output', {
      outputPath: request.outputPath,
      audio: request.audioPath !== undefined,
      overlay: request.videoFilter !== undefined,
    });
    fs.mkdirSync(path.dirname(path.resolve(request.outputPath)), { recursive: true });

    const args = ['-i', request.videoPath];
    if (request.audioPath !== undefined) args.push('-i', request.audioPath);
    if (request.videoFilter !== undefined) args.push('-vf', request.videoFilter);
    args.push('-map', '0:v');
    if (request.audioPath !== undefined) args.push('-map', '1:a');
    args.push(...videoCodecArgs());
    if (request.audioPath !== undefined) {
      args.push('-c:a', ENCODER.muxAudio.codec, '-b:a', ENCODER.muxAudio.bitrate);
    }
    if (request.shortest) args.push('-shortest');

    return this.runFfmpeg('renderOverlayAndMux', args, request.outputPath);
  }
}
