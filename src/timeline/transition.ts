/**
 * Transition variants and the strategies each pipeline stage derives from them.
 *
 * Neither `fade` nor `crossfade` blends adjacent clips: both join segments
 * with a re-encoding concat. At mux time they add a fade from and to black at
 * the edges of the finished video.
 */
import { VIDEO_EDGE_FADE_SECONDS, type TransitionKind } from '../config.js';

export type Transition =
  | { kind: 'none' }
  | { kind: 'fade'; edgeSeconds: number }
  | { kind: 'crossfade'; edgeSeconds: number };

export function toTransition(kind: TransitionKind): Transition {
  switch (kind) {
    case 'none':
      return { kind: 'none' };
    case 'fade':
      return { kind: 'fade', edgeSeconds: VIDEO_EDGE_FADE_SECONDS };
    case 'crossfade':
      return { kind: 'crossfade', edgeSeconds: VIDEO_EDGE_FADE_SECONDS };
  }
}

// ── Concat strategy (ClipAssembler / BatchConcatenator) ──────────────────────

export interface ConcatStrategy {
  /** false → stream copy; true → decode and re-encode every batch. */
  reencode: boolean;
}

export function concatStrategy(transition: Transition): ConcatStrategy {
  switch (transition.kind) {
    case 'none':
      return { reencode: false };
    case 'fade':
    case 'crossfade':
      return { reencode: true };
  }
}

// ── Edge strategy (MuxPlanner) ────────────────────────────────────────────────

/**
 * Video filters applied to the whole finished segment of `duration` seconds.
 */
export function edgeFilters(transition: Transition, duration: number): string[] {
  switch (transition.kind) {
    case 'none':
      return [];
    case 'fade':
    case 'crossfade': {
      const d = Math.min(transition.edgeSeconds, duration / 2);
      if (d <= 0) return [];
      return [
        `fade=t=in:st=0:d=${d}`,
        `fade=t=out:st=${Math.max(0, duration - d)}:d=${d}`,
      ];
    }
  }
}
