/**
 * Quote overlay — turns scheduled quote windows into one drawtext chain.
 *
 * Each window becomes a drawtext filter enabled only between its start and
 * end, with alpha ramping over the window's fade envelope. Styles differ in
 * vertical anchor and whether a semi-opaque panel sits behind the text.
 */
import type { QuoteStyle } from '../config.js';
import type { QuoteWindow } from '../pipeline/quotes.js';

// ── Styles ────────────────────────────────────────────────────────────────────

interface QuoteAnchor {
  /** drawtext y expression */
  y: string;
  panel: boolean;
}

const QUOTE_ANCHORS: Record<QuoteStyle, QuoteAnchor> = {
  top:      { y: 'h*0.1',         panel: true },
  bottom:   { y: 'h*0.8-text_h',  panel: true },
  centered: { y: '(h-text_h)/2',  panel: true },
  minimal:  { y: '(h-text_h)/2',  panel: false },
};

const PANEL = 'box=1:boxcolor=black@0.7:boxborderw=20';

export interface OverlayOptions {
  style: QuoteStyle;
  fontFile?: string;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

/** Seconds with at most millisecond precision, no trailing zeros. */
export function fmtSeconds(n: number): string {
  return String(Number(n.toFixed(3)));
}

/**
 * Escape a value for the filter option parser, which splits `key=value`
 * pairs on unescaped `:`.
 */
export function escapeOptionValue(s: string): string {
  return s.replace(/[\\:']/g, '\\$&');
}

/**
 * Quote an option value for the filtergraph parser, which strips one level of
 * quoting before the option parser runs. Inside single quotes only `'` itself
 * needs breaking out.
 */
export function quoteFilterValue(s: string): string {
  return `'${escapeOptionValue(s).replace(/'/g, "'\\''")}'`;
}

function alphaExpression(w: QuoteWindow): string {
  const fadeIn = fmtSeconds(w.fade.inEnd - w.start);
  const fadeOut = fmtSeconds(w.end - w.fade.outStart);
  return (
    `if(lt(t,${fmtSeconds(w.fade.inEnd)}),(t-${fmtSeconds(w.start)})/${fadeIn},` +
    `if(gt(t,${fmtSeconds(w.fade.outStart)}),(${fmtSeconds(w.end)}-t)/${fadeOut},1))`
  );
}

// ── Public API ─────────────────────────────────────────────────────────────────

export function drawtextForWindow(w: QuoteWindow, opts: OverlayOptions): string {
  const anchor = QUOTE_ANCHORS[opts.style];
  const parts = [
    ...(opts.fontFile ? [`fontfile=${quoteFilterValue(opts.fontFile)}`] : []),
    `text=${quoteFilterValue(w.text)}`,
    // Quote text is shown verbatim, % included.
    'expansion=none',
    'fontsize=h/20',
    'fontcolor=white',
    'borderw=2',
    'bordercolor=black',
    'x=(w-text_w)/2',
    `y=${anchor.y}`,
    ...(anchor.panel ? [PANEL] : []),
    `enable='between(t,${fmtSeconds(w.start)},${fmtSeconds(w.end)})'`,
    `alpha='${alphaExpression(w)}'`,
  ];
  return `drawtext=${parts.join(':')}`;
}

/** Comma-joined drawtext chain, or undefined when nothing is scheduled. */
export function buildQuoteOverlayFilter(
  windows: readonly QuoteWindow[],
  opts: OverlayOptions,
): string | undefined {
  if (windows.length === 0) return undefined;
  return windows.map((w) => drawtextForWindow(w, opts)).join(',');
}
