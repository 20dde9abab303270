/**
 * Mux planning — combines the finished video segment, the optional audio bed
 * and the quote schedule into one final engine request.
 */
import type { BuildConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { buildQuoteOverlayFilter } from '../media/overlay.js';
import type { MuxRequest, TranscodeEngine } from '../media/engine.js';
import { edgeFilters, toTransition } from '../timeline/transition.js';
import type { QuoteWindow } from './quotes.js';

export interface MuxInputs {
  videoPath: string;
  audioPath: string | null;
  windows: readonly QuoteWindow[];
}

export function planMux(inputs: MuxInputs, config: BuildConfig): MuxRequest {
  const filters = edgeFilters(toTransition(config.transition), config.duration);
  const overlay = buildQuoteOverlayFilter(inputs.windows, {
    style: config.quoteStyle,
    fontFile: config.fontFile,
  });
  if (overlay !== undefined) filters.push(overlay);

  return {
    videoPath: inputs.videoPath,
    ...(inputs.audioPath !== null ? { audioPath: inputs.audioPath } : {}),
    ...(filters.length > 0 ? { videoFilter: filters.join(',') } : {}),
    outputPath: config.outputPath,
    // Every mapped stream was built to the target duration.
    shortest: true,
  };
}

export async function finalize(
  engine: TranscodeEngine,
  inputs: MuxInputs,
  config: BuildConfig,
): Promise<string> {
  logger.info('Mux: combining video, audio, and quotes into final output', {
    audio: inputs.audioPath !== null,
    quotes: inputs.windows.length,
  });
  return engine.renderOverlayAndMux(planMux(inputs, config));
}
