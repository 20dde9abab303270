import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { BuildConfigInput } from '../config.js';
import { PipelineRun } from './index.js';
import { IntegrityError, ResourceError } from '../utils/errors.js';
import { seededRandom } from '../utils/random.js';
import { FakeEngine } from '../testing/fake-engine.js';
import { makeTempDir, removeDir, testConfig, writeFile } from '../testing/fixtures.js';

const plenty = () => Number.MAX_SAFE_INTEGER;

describe('PipelineRun', () => {
  let root: string;
  let engine: FakeEngine;

  beforeEach(() => {
    root = makeTempDir();
    engine = new FakeEngine(path.join(root, 'work'));
  });

  afterEach(() => removeDir(root));

  const run = (overrides: Partial<BuildConfigInput> = {}, freeSpace = plenty) =>
    new PipelineRun(testConfig(root, overrides), { engine, random: seededRandom(11), freeSpace });

  const addVideos = () => {
    for (const name of ['a', 'b', 'c']) engine.addSource(path.join(root, 'videos', `${name}.mp4`), 40);
  };

  it('builds video, audio and quotes into one output', async () => {
    addVideos();
    engine.addSource(path.join(root, 'music', 'song.mp3'), 200);
    engine.addSource(path.join(root, 'sounds', 'rain.mp3'), 10);
    writeFile(path.join(root, 'quotes', 'one.txt'), 'Slow down.');
    writeFile(path.join(root, 'quotes', 'two.txt'), 'Look up.');

    const result = await run().run();

    const mux = engine.callsOf('renderOverlayAndMux');
    expect(mux).toHaveLength(1);
    const request = mux[0]?.request;

    expect(result.outputPath).toBe(path.join(root, 'out', 'final.mp4'));
    expect(fs.existsSync(path.join(root, 'out', 'final.mp4'))).toBe(true);
    expect(request?.videoPath).toBe(engine.callsOf('trim')[0]?.output);
    expect(request?.audioPath).toBe(engine.callsOf('mixTracks')[0]?.output);
    expect(result.audioPath).toBe(request?.audioPath);
    expect(result.video).toEqual({
      videoPath: request?.videoPath,
      segmentCount: 3,
      loopCount: 1,
      trimmed: true,
    });
    expect(result.quotes.length).toBeGreaterThan(0);
    expect(result.quotes[0]?.text).toBe('Slow down.');
    expect(request?.videoFilter).toMatch(/^drawtext=text='Slow down\.':/);
  });

  it('renders video alone when there is no audio or quotes', async () => {
    addVideos();

    const result = await run().run();

    expect(result.audioPath).toBeNull();
    expect(result.quotes).toEqual([]);
    expect(engine.callsOf('renderOverlayAndMux')[0]?.request).toEqual({
      videoPath: engine.callsOf('trim')[0]?.output,
      outputPath: path.join(root, 'out', 'final.mp4'),
      shortest: true,
    });
  });

  it('renders nothing on a dry run', async () => {
    addVideos();

    const result = await run({ dryRun: true }).run();

    expect(result).toEqual({ outputPath: null, video: null, audioPath: null, quotes: [] });
    expect(engine.calls).toHaveLength(0);
  });

  it('rejects a dry run when there are no video files', async () => {
    writeFile(path.join(root, 'music', 'song.mp3'), 'x');

    await expect(run({ dryRun: true }).run()).rejects.toThrow(
      `No video files found in ${path.join(root, 'videos')}`,
    );
    expect(engine.calls).toHaveLength(0);
  });

  it('surveys every source category', () => {
    addVideos();
    writeFile(path.join(root, 'quotes', 'one.txt'), 'Slow down.');

    expect(run().validateSources().map((s) => [s.category, s.count])).toEqual([
      ['videos', 3],
      ['music', 0],
      ['quotes', 1],
      ['sounds', 0],
    ]);
  });

  it('stops before any processing when disk space is short', async () => {
    addVideos();

    await expect(run({}, () => 0).run()).rejects.toThrow(ResourceError);
    expect(engine.calls).toHaveLength(0);
  });

  it('fails with no valid video files', async () => {
    writeFile(path.join(root, 'videos', 'empty.mp4'), '');

    await expect(run().run()).rejects.toThrow(IntegrityError);
    expect(engine.calls).toHaveLength(0);
  });

  it('removes its scratch directory unless asked to keep it', async () => {
    addVideos();

    const cleaned = run();
    writeFile(path.join(cleaned.workDir, 'leftover.mp4'), 'x');
    await cleaned.run();
    expect(fs.existsSync(cleaned.workDir)).toBe(false);

    const kept = run({ keepTemp: true });
    writeFile(path.join(kept.workDir, 'leftover.mp4'), 'x');
    await kept.run();
    expect(fs.existsSync(kept.workDir)).toBe(true);
  });

  it('cleans up after a failed stage', async () => {
    writeFile(path.join(root, 'videos', 'broken.mp4'), 'garbage');

    const failing = run();
    writeFile(path.join(failing.workDir, 'partial.mp4'), 'x');
    await expect(failing.run()).rejects.toThrow(IntegrityError);
    expect(fs.existsSync(failing.workDir)).toBe(false);
  });

  it('gives each run its own scratch directory', () => {
    expect(run().workDir).not.toBe(run().workDir);
    expect(path.dirname(run().workDir)).toBe(path.join(root, '.tmp'));
  });
});
