import type { Glyph } from './types';

export interface PositionedRun {
  str: string;
  /** pdfjs text matrix: [a, b, c, d, e, f] */
  transform: number[];
  width: number;
  height: number;
}

/**
 * Split a pdfjs text run into per-character glyphs. pdfjs reports runs in
 * bottom-up user space; glyphs are flipped to top-down page coordinates and
 * spread evenly across the run's advance width.
 */
export function runToGlyphs(run: PositionedRun, pageHeight: number, fontName: string): Glyph[] {
  const chars = Array.from(run.str);
  if (chars.length === 0) return [];

  const [a = 0, b = 0, c = 0, d = 0, x = 0, y = 0] = run.transform;
  const size = Math.max(Math.hypot(a, b), Math.hypot(c, d), run.height);
  const bottom = pageHeight - y;
  const top = bottom - size;
  const step = run.width / chars.length;

  return chars.map((text, i) => ({
    text,
    x0: x + step * i,
    x1: x + step * (i + 1),
    top,
    bottom,
    fontName,
    size,
  }));
}
