import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { concatenateInBatches, partitionBatches } from './batch.js';
import { BatchError, ValidationError } from '../utils/errors.js';
import { FakeEngine } from '../testing/fake-engine.js';
import { makeTempDir, removeDir } from '../testing/fixtures.js';

describe('partitionBatches', () => {
  const names = (n: number) => Array.from({ length: n }, (_, i) => `seg_${i}.mp4`);

  it('splits into contiguous batches of at most 25', () => {
    const items = names(60);
    const batches = partitionBatches(items);

    expect(batches.map((b) => b.items.length)).toEqual([25, 25, 10]);
    expect(batches.map((b) => b.index)).toEqual([0, 1, 2]);
    expect(batches.flatMap((b) => b.items)).toEqual(items);
  });

  it('produces exact batches when the count divides evenly', () => {
    expect(partitionBatches(names(50)).map((b) => b.items.length)).toEqual([25, 25]);
  });

  it('returns no batches for no items', () => {
    expect(partitionBatches([])).toEqual([]);
  });

  it('rejects a batch size that is not a positive integer', () => {
    expect(() => partitionBatches(names(3), 0)).toThrow(ValidationError);
    expect(() => partitionBatches(names(3), 2.5)).toThrow(ValidationError);
  });
});

describe('concatenateInBatches', () => {
  let root: string;
  let engine: FakeEngine;

  beforeEach(() => {
    root = makeTempDir();
    engine = new FakeEngine(path.join(root, 'work'));
  });

  afterEach(() => removeDir(root));

  const segments = (n: number) =>
    Array.from({ length: n }, (_, i) => engine.addSource(path.join(root, 'src', `seg_${i}.mp4`), 2));

  it('concatenates 60 segments in three batches and joins the outputs', async () => {
    const inputs = segments(60);
    const result = await concatenateInBatches(engine, inputs, { transition: { kind: 'none' } });

    const calls = engine.callsOf('concat');
    expect(calls).toHaveLength(4);
    expect(calls.slice(0, 3).map((c) => c.inputs.length)).toEqual([25, 25, 10]);
    expect(calls.slice(0, 3).flatMap((c) => c.inputs)).toEqual(inputs);

    const join = calls[3];
    expect(join?.inputs).toEqual(calls.slice(0, 3).map((c) => c.output));
    expect(join?.reencode).toBe(false);
    expect(result).toBe(join?.output);
    expect(engine.durationOf(result)).toBe(120);
  });

  it('stream-copies batches when there is no transition', async () => {
    await concatenateInBatches(engine, segments(30), { transition: { kind: 'none' } });
    expect(engine.callsOf('concat').map((c) => c.reencode)).toEqual([false, false, false]);
  });

  it('re-encodes batches under a fade but still stream-copies the join', async () => {
    await concatenateInBatches(engine, segments(30), { transition: { kind: 'fade', edgeSeconds: 1 } });
    expect(engine.callsOf('concat').map((c) => c.reencode)).toEqual([true, true, false]);
  });

  it('skips the join for a single batch', async () => {
    const result = await concatenateInBatches(engine, segments(25), { transition: { kind: 'none' } });

    const calls = engine.callsOf('concat');
    expect(calls).toHaveLength(1);
    expect(result).toBe(calls[0]?.output);
  });

  it('honours a custom batch size', async () => {
    await concatenateInBatches(engine, segments(7), { transition: { kind: 'none' }, batchSize: 3 });
    expect(engine.callsOf('concat').map((c) => c.inputs.length)).toEqual([3, 3, 1, 3]);
  });

  it('fails before invoking the engine when an input is missing', async () => {
    const inputs = [...segments(2), path.join(root, 'src', 'gone.mp4')];

    const err = await concatenateInBatches(engine, inputs, { transition: { kind: 'none' } }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BatchError);
    expect(err instanceof BatchError && err.files).toEqual([path.join(root, 'src', 'gone.mp4')]);
    expect(engine.calls).toHaveLength(0);
  });

  it('fails with the batch members when the engine writes an empty output', async () => {
    const inputs = segments(3);
    engine.emptyOutputs.add('concat');

    const err = await concatenateInBatches(engine, inputs, { transition: { kind: 'none' } }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BatchError);
    expect(err instanceof BatchError && err.files).toEqual(inputs);
  });

  it('rejects an empty segment list', async () => {
    await expect(concatenateInBatches(engine, [], { transition: { kind: 'none' } })).rejects.toThrow(
      'No segments to concatenate',
    );
  });
});
