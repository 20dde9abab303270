import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseBuildConfig, type BuildConfig, type BuildConfigInput } from '../config.js';
import type { RandomSource } from '../utils/random.js';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'longloop-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(filePath: string, content: string): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

/** Config rooted in `root`, with sources under root/{videos,music,quotes,sounds}. */
export function testConfig(root: string, overrides: Partial<BuildConfigInput> = {}): BuildConfig {
  return parseBuildConfig({
    duration: 100,
    transition: 'none',
    videosDir: path.join(root, 'videos'),
    musicDir: path.join(root, 'music'),
    quotesDir: path.join(root, 'quotes'),
    soundsDir: path.join(root, 'sounds'),
    tempDir: path.join(root, '.tmp'),
    outputPath: path.join(root, 'out', 'final.mp4'),
    ...overrides,
  });
}

/** Always returns the same value. */
export function constantRandom(value: number): RandomSource {
  return { next: () => value };
}
