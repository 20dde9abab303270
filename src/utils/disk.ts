import * as fs from 'fs';
import * as path from 'path';
import { BITRATE_TIERS_MBPS, DISK_HEADROOM, type Resolution } from '../config.js';
import { ResourceError } from './errors.js';
import { formatGigabytes } from './format.js';
import { logger } from './logger.js';

/** Rough H.264 output size: tiered bitrate × duration. */
export function estimateOutputSize(resolution: Resolution, durationSeconds: number): number {
  const pixels = resolution.width * resolution.height;
  const tier = BITRATE_TIERS_MBPS.find((t) => pixels >= t.minPixels) ?? BITRATE_TIERS_MBPS[2];
  const bytesPerSecond = (tier.mbps * 1_000_000) / 8;
  return Math.floor(bytesPerSecond * durationSeconds);
}

export type FreeSpaceProbe = (dir: string) => number;

export const statfsFreeBytes: FreeSpaceProbe = (dir) => {
  const stats = fs.statfsSync(dir);
  return stats.bavail * stats.bsize;
};

/** Walk up from `target` to the closest directory that exists. */
function existingAncestor(target: string): string {
  let dir = path.resolve(target);
  while (!fs.existsSync(dir)) {
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return dir;
}

/**
 * Throw ResourceError unless `dir` has room for `requiredBytes` plus headroom.
 */
export function checkDiskSpace(
  dir: string,
  requiredBytes: number,
  freeBytes: FreeSpaceProbe = statfsFreeBytes,
): void {
  const probeDir = existingAncestor(dir);
  const available = freeBytes(probeDir);
  const required = requiredBytes * DISK_HEADROOM;

  logger.debug('Disk: space check', { dir: probeDir, available, required });

  if (available < required) {
    throw new ResourceError(
      `Insufficient disk space. Available: ${formatGigabytes(available)}, ` +
        `Required: ${formatGigabytes(required)}`,
    );
  }
}
