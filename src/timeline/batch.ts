/**
 * Batched concatenation — joins any number of uniformly encoded segments
 * without handing the engine more than `batchSize` inputs at once.
 *
 * Level 1 concatenates each contiguous batch; level 2 stream-copies the
 * batch outputs together. A single batch skips level 2.
 */
import * as fs from 'fs';
import { BATCH_SIZE } from '../config.js';
import { BatchError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { TranscodeEngine } from '../media/engine.js';
import { concatStrategy, type Transition } from './transition.js';

export interface Batch {
  index: number;
  items: string[];
}

export interface BatchOptions {
  transition: Transition;
  batchSize?: number;
}

/** Contiguous, in-order batches of at most `size` items. */
export function partitionBatches(items: readonly string[], size: number = BATCH_SIZE): Batch[] {
  if (!Number.isInteger(size) || size < 1) {
    throw new ValidationError(`Batch size must be a positive integer, got: ${size}`);
  }
  const batches: Batch[] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push({ index: batches.length, items: items.slice(start, start + size) });
  }
  return batches;
}

function isNonEmptyFile(p: string): boolean {
  return fs.existsSync(p) && fs.statSync(p).size > 0;
}

async function concatVerified(
  engine: TranscodeEngine,
  label: string,
  files: string[],
  reencode: boolean,
): Promise<string> {
  const missing = files.filter((f) => !fs.existsSync(f));
  if (missing.length > 0) {
    throw new BatchError(`${label}: ${missing.length} input file(s) missing`, missing);
  }

  const output = await engine.concat(files, reencode, 'video');
  if (!isNonEmptyFile(output)) {
    throw new BatchError(`${label}: output ${output} is missing or empty; inputs were`, files);
  }
  return output;
}

export async function concatenateInBatches(
  engine: TranscodeEngine,
  segments: readonly string[],
  opts: BatchOptions,
): Promise<string> {
  if (segments.length === 0) throw new BatchError('No segments to concatenate', []);

  const { reencode } = concatStrategy(opts.transition);
  const batches = partitionBatches(segments, opts.batchSize ?? BATCH_SIZE);

  logger.info('Batch: concatenating segments', {
    segments: segments.length,
    batches: batches.length,
    reencode,
  });

  const outputs: string[] = [];
  for (const batch of batches) {
    logger.debug(`Batch: ${batch.index + 1}/${batches.length}`, { size: batch.items.length });
    outputs.push(await concatVerified(engine, `Batch ${batch.index + 1}/${batches.length}`, batch.items, reencode));
  }

  const [only] = outputs;
  if (outputs.length === 1 && only !== undefined) return only;

  // Batch outputs share one encoding, so the join is always a stream copy.
  return concatVerified(engine, 'Final batch join', outputs, false);
}
