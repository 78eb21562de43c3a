import { groupRows } from '../layout/text';
import type { Glyph } from '../layout/types';

export interface GlyphLine {
  text: string;
  top: number;
  bottom: number;
  x0: number;
  x1: number;
  fontSizeAvg: number;
  glyphCount: number;
  boldGlyphs: number;
  boldRatio: number;
}

export const DEFAULT_BOLD_MARKERS = ['bold', 'semibold', 'demi', 'black', 'heavy', 'medium', 'bd'] as const;

export function isBoldFont(fontName: string, markers: readonly string[] = DEFAULT_BOLD_MARKERS): boolean {
  if (!fontName) return false;
  const lower = fontName.toLowerCase();
  return markers.some(marker => lower.includes(marker.toLowerCase()));
}

/**
 * Rebuild text lines from a page's glyphs, keeping the font statistics the
 * heading heuristics need. Lines that are blank after trimming are dropped.
 */
export function buildLines(
  glyphs: Glyph[],
  tolerance = 1.2,
  boldMarkers: readonly string[] = DEFAULT_BOLD_MARKERS,
): GlyphLine[] {
  const lines: GlyphLine[] = [];

  for (const row of groupRows(glyphs, tolerance)) {
    const raw = row.map(g => g.text).join('').trim();
    if (!raw) continue;

    const sizes = row.map(g => g.size);
    const boldGlyphs = row.filter(g => isBoldFont(g.fontName, boldMarkers)).length;

    lines.push({
      text: raw.split(/\s+/).join(' '),
      top: Math.min(...row.map(g => g.top)),
      bottom: Math.max(...row.map(g => g.bottom)),
      x0: Math.min(...row.map(g => g.x0)),
      x1: Math.max(...row.map(g => g.x1)),
      fontSizeAvg: sizes.reduce((sum, s) => sum + s, 0) / sizes.length,
      glyphCount: row.length,
      boldGlyphs,
      boldRatio: boldGlyphs / Math.max(1, row.length),
    });
  }

  return lines;
}

/** Median distance between the tops of consecutive lines (positive gaps only). */
export function medianLineGap(lines: GlyphLine[]): number {
  const gaps: number[] = [];
  for (let i = 1; i < lines.length; i++) {
    const gap = lines[i].top - lines[i - 1].top;
    if (gap > 0) gaps.push(gap);
  }
  if (gaps.length === 0) return 0;

  gaps.sort((a, b) => a - b);
  const mid = Math.floor(gaps.length / 2);
  return gaps.length % 2 === 1 ? gaps[mid] : (gaps[mid - 1] + gaps[mid]) / 2;
}
