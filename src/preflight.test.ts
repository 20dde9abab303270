import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { checkTool, runPreflight, surveySources } from './preflight.js';
import type { CommandRunner } from './media/engine.js';
import { makeTempDir, removeDir, testConfig, writeFile } from './testing/fixtures.js';

const found: CommandRunner = () => ({ exitCode: 0, stdout: 'ffmpeg version 6.1', stderr: '' });
const missing: CommandRunner = () => ({ exitCode: null, stdout: '', stderr: 'spawnSync ffmpeg ENOENT' });
const plenty = () => Number.MAX_SAFE_INTEGER;

describe('preflight', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => removeDir(root));

  it('asks each tool for its version', () => {
    const seen: string[][] = [];
    const runner: CommandRunner = (command, args) => {
      seen.push([command, ...args]);
      return { exitCode: 0, stdout: '', stderr: '' };
    };
    expect(checkTool('ffprobe', runner)).toBe(true);
    expect(seen).toEqual([['ffprobe', '-version']]);
  });

  it('counts sources per category and requires only videos', () => {
    writeFile(path.join(root, 'videos', 'a.mp4'), 'x');
    writeFile(path.join(root, 'quotes', 'q.txt'), 'x');

    const sources = surveySources(testConfig(root));

    expect(sources.map((s) => [s.category, s.count, s.required, s.exists])).toEqual([
      ['videos', 1, true, true],
      ['music', 0, false, false],
      ['quotes', 1, false, true],
      ['sounds', 0, false, false],
    ]);
  });

  it('passes with tools, videos and disk space', () => {
    writeFile(path.join(root, 'videos', 'a.mp4'), 'x');

    const report = runPreflight(testConfig(root), { runner: found, freeSpace: plenty });

    expect(report.tools).toEqual({ ffmpeg: true, ffprobe: true });
    expect(report.diskProblem).toBeNull();
    expect(report.ok).toBe(true);
  });

  it('fails without videos', () => {
    expect(runPreflight(testConfig(root), { runner: found, freeSpace: plenty }).ok).toBe(false);
  });

  it('fails when the engine is not installed', () => {
    writeFile(path.join(root, 'videos', 'a.mp4'), 'x');

    const report = runPreflight(testConfig(root), { runner: missing, freeSpace: plenty });

    expect(report.tools).toEqual({ ffmpeg: false, ffprobe: false });
    expect(report.ok).toBe(false);
  });

  it('reports a disk shortfall', () => {
    writeFile(path.join(root, 'videos', 'a.mp4'), 'x');

    const report = runPreflight(testConfig(root), { runner: found, freeSpace: () => 0 });

    expect(report.diskProblem).toMatch(/^Insufficient disk space\. Available: 0\.00 GB/);
    expect(report.ok).toBe(false);
  });
});
