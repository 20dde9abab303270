/**
 * Duration fitting — decides how many times a finite list of items must be
 * looped to cover a target duration, which prefix of the looped list to use,
 * and how much to cut off the last selected item.
 */
import { FIT_TOLERANCE } from '../config.js';
import { InsufficientMaterialError, ValidationError } from '../utils/errors.js';
import { shuffled, type RandomSource } from '../utils/random.js';

export interface Timed {
  readonly duration: number;
}

export interface FitPlan<T extends Timed> {
  /** Selected items in play order; an item repeats once per loop it appears in. */
  orderedItems: T[];
  /** Seconds to cut from the end of the last item; 0 ≤ trimLastBy < its duration. */
  trimLastBy: number;
  /** Times the (possibly shuffled) input was replicated before selection. */
  loopCount: number;
  /** Sum of the selected items' durations. */
  accumulated: number;
}

export interface FitOptions {
  shuffle?: boolean;
  random?: RandomSource;
}

export function totalDuration(items: readonly Timed[]): number {
  return items.reduce((sum, item) => sum + item.duration, 0);
}

export function fitDuration<T extends Timed>(
  items: readonly T[],
  target: number,
  opts: FitOptions = {},
): FitPlan<T> {
  if (!(target > 0) || !Number.isFinite(target)) {
    throw new ValidationError(`Target duration must be positive, got: ${target}`);
  }

  const total = totalDuration(items);
  if (items.length === 0 || !(total > 0)) throw new InsufficientMaterialError();

  let order: readonly T[] = items;
  if (opts.shuffle) {
    if (!opts.random) throw new ValidationError('Shuffle requested without a random source');
    order = shuffled(items, opts.random);
  }

  const loopCount = total < target ? Math.floor(target / total) + 1 : 1;

  const orderedItems: T[] = [];
  let accumulated = 0;
  outer: for (let loop = 0; loop < loopCount; loop++) {
    for (const item of order) {
      orderedItems.push(item);
      accumulated += item.duration;
      if (accumulated >= target) break outer;
    }
  }

  const overage = accumulated - target;
  const trimLastBy = overage > FIT_TOLERANCE ? overage : 0;

  return { orderedItems, trimLastBy, loopCount, accumulated };
}
