import type { BoundingBox, Glyph, LayoutDocument, LayoutPage } from './types';

export interface TextExtractionOptions {
  /** Horizontal gap (points) above which a space is inserted between glyphs */
  xTolerance?: number;
  /** Vertical tolerance (points) for grouping glyphs into one row */
  yTolerance?: number;
}

/**
 * Group glyphs into visual rows by snapping their top edge to a grid of
 * `tolerance` points. Rows come back top to bottom, glyphs left to right.
 */
export function groupRows(glyphs: Glyph[], tolerance: number): Glyph[][] {
  const buckets = new Map<number, Glyph[]>();
  for (const glyph of glyphs) {
    const key = Math.round(glyph.top / tolerance);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(glyph);
    } else {
      buckets.set(key, [glyph]);
    }
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, row]) => row.sort((g1, g2) => g1.x0 - g2.x0));
}

function rowText(row: Glyph[], xTolerance: number): string {
  let out = '';
  let previous: Glyph | null = null;
  for (const glyph of row) {
    if (
      previous
      && glyph.x0 - previous.x1 > xTolerance
      && !/\s$/.test(out)
      && !/^\s/.test(glyph.text)
    ) {
      out += ' ';
    }
    out += glyph.text;
    previous = glyph;
  }
  return out.trimEnd();
}

function isInside(glyph: Glyph, box: BoundingBox): boolean {
  return glyph.x0 >= box.x0
    && glyph.x1 <= box.x1
    && glyph.top >= box.top
    && glyph.bottom <= box.bottom;
}

/** Text of the glyphs lying entirely within `box`, one line per row. */
export function extractText(
  page: LayoutPage,
  box: BoundingBox,
  options: TextExtractionOptions = {},
): string {
  const xTolerance = options.xTolerance ?? 2;
  const yTolerance = options.yTolerance ?? 2;

  const inside = page.glyphs.filter(g => isInside(g, box));
  return groupRows(inside, yTolerance)
    .map(row => rowText(row, xTolerance))
    .filter(line => line.trim().length > 0)
    .join('\n');
}

export function pageText(page: LayoutPage): string {
  return extractText(page, { x0: 0, top: 0, x1: page.width, bottom: page.height });
}

export function documentText(document: LayoutDocument): string {
  return document.pages
    .map(pageText)
    .filter(Boolean)
    .join('\n')
    .trim();
}
