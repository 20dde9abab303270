#!/usr/bin/env node
/**
 * longloop — entry point.
 *
 * Configuration comes from LONGLOOP_* environment variables (optionally via
 * .env). Commands:
 *   build    (default) render the output file
 *   dry-run  validate and print the configuration, render nothing
 *   check    pre-flight report: ffmpeg/ffprobe, source directories, disk space
 */
import { pathToFileURL } from 'url';
import { buildConfigFromEnv } from './config.js';
import { logger } from './utils/logger.js';
import { PipelineError } from './utils/errors.js';
import { PipelineRun } from './pipeline/index.js';
import { runPreflight } from './preflight.js';

export async function main(command: string | undefined): Promise<number> {
  const config = buildConfigFromEnv();
  logger.info('longloop: starting', { command: command ?? 'build' });

  switch (command) {
    case 'check': {
      const report = runPreflight(config);
      logger.info(report.ok ? 'longloop: pre-flight passed' : 'longloop: pre-flight failed');
      return report.ok ? 0 : 1;
    }

    case 'dry-run':
      await new PipelineRun({ ...config, dryRun: true }).run();
      return 0;

    case undefined:
    case 'build':
      await new PipelineRun(config).run();
      return 0;

    default:
      logger.error(`longloop: unknown command "${command}"`, { commands: ['build', 'dry-run', 'check'] });
      return 2;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const [,, command] = process.argv;
  main(command)
    .then((code) => process.exit(code))
    .catch((err) => {
      if (err instanceof PipelineError) {
        logger.error(`${err.name}: ${err.message}`);
      } else {
        logger.error('Fatal error', { err: String(err) });
      }
      process.exit(1);
    });
}

// ── Exports for library use ───────────────────────────────────────────────────

export { PipelineRun } from './pipeline/index.js';
export { parseBuildConfig, buildConfigFromEnv, type BuildConfig, type BuildConfigInput } from './config.js';
export { fitDuration, type FitPlan } from './timeline/fit.js';
export { concatenateInBatches, partitionBatches, type Batch } from './timeline/batch.js';
export { scheduleQuotes, loadQuotes, type QuoteWindow } from './pipeline/quotes.js';
export { planMux } from './pipeline/mux.js';
export { FfmpegEngine, type TranscodeEngine, type MuxRequest } from './media/engine.js';
export * from './utils/errors.js';
