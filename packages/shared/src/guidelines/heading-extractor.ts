import type { LayoutDocument } from '../layout/types';
import { buildLines, DEFAULT_BOLD_MARKERS, medianLineGap } from './lines';

export interface Heading {
  /** 1-based page number */
  page: number;
  text: string;
  fontSize: number;
  x0: number;
  top: number;
  bottom: number;
  level: number;
  /** Whether the line sits below a larger-than-usual gap */
  separated: boolean;
}

/**
 * `filter` drops bold lines that are not visually separated from the line
 * above; `annotate` keeps them and records the signal on `separated`.
 */
export type SeparationPolicy = 'filter' | 'annotate';

export interface HeadingExtractionOptions {
  boldThreshold: number;
  ignoreHeaderFooter: boolean;
  headerFrac: number;
  footerFrac: number;
  minLength: number;
  maxLength: number;
  maxLevels: number;
  boldMarkers: readonly string[];
  lineTolerance: number;
  separationFactor: number;
  separationPolicy: SeparationPolicy;
  /** Minimum size difference between two distinct level bands */
  levelBandGap: number;
  /** Slack below a band's size that still counts as that band */
  levelMatchTolerance: number;
}

export const DEFAULT_HEADING_OPTIONS: HeadingExtractionOptions = {
  boldThreshold: 0.6,
  ignoreHeaderFooter: true,
  headerFrac: 0.08,
  footerFrac: 0.08,
  minLength: 2,
  maxLength: 140,
  maxLevels: 3,
  boldMarkers: DEFAULT_BOLD_MARKERS,
  lineTolerance: 1.2,
  separationFactor: 1.1,
  separationPolicy: 'filter',
  levelBandGap: 0.5,
  levelMatchTolerance: 0.25,
};

type Candidate = Omit<Heading, 'level'>;

/**
 * Pick up to `maxLevels` font-size bands, largest first, and map every
 * heading to the first band it reaches. Sizes below all bands get the
 * deepest level.
 */
export function inferLevels(
  candidates: Candidate[],
  options: Pick<HeadingExtractionOptions, 'maxLevels' | 'levelBandGap' | 'levelMatchTolerance'>,
): Heading[] {
  const sizes = [...new Set(candidates.map(c => c.fontSize))].sort((a, b) => b - a);

  const bands: number[] = [];
  for (const size of sizes) {
    if (bands.length >= options.maxLevels) break;
    if (bands.every(band => Math.abs(size - band) > options.levelBandGap)) {
      bands.push(size);
    }
  }

  const levelFor = (size: number): number => {
    const index = bands.findIndex(band => size >= band - options.levelMatchTolerance);
    return index === -1 ? options.maxLevels : index + 1;
  };

  return candidates.map(c => ({ ...c, level: levelFor(c.fontSize) }));
}

export function extractHeadings(
  document: LayoutDocument,
  overrides: Partial<HeadingExtractionOptions> = {},
): Heading[] {
  const options = { ...DEFAULT_HEADING_OPTIONS, ...overrides };
  const candidates: Candidate[] = [];

  for (const page of document.pages) {
    if (page.glyphs.length === 0) continue;

    const lines = buildLines(page.glyphs, options.lineTolerance, options.boldMarkers);
    if (lines.length === 0) continue;

    const medianGap = medianLineGap(lines);

    lines.forEach((line, i) => {
      if (line.text.length < options.minLength || line.text.length > options.maxLength) return;

      if (options.ignoreHeaderFooter) {
        if (line.top < page.height * options.headerFrac) return;
        if (line.bottom > page.height * (1 - options.footerFrac)) return;
      }

      if (line.boldRatio < options.boldThreshold) return;

      let separated = true;
      if (i > 0 && medianGap > 0) {
        separated = line.top - lines[i - 1].top >= medianGap * options.separationFactor;
      }
      if (!separated && options.separationPolicy === 'filter') return;

      candidates.push({
        page: page.number,
        text: line.text,
        fontSize: line.fontSizeAvg,
        x0: line.x0,
        top: line.top,
        bottom: line.bottom,
        separated,
      });
    });
  }

  if (candidates.length === 0) return [];

  const headings = inferLevels(candidates, options);

  // Overlapping glyph runs can report the same heading twice in a row
  return headings.filter((heading, i) => {
    const previous = headings[i - 1];
    return !previous || previous.page !== heading.page || previous.text !== heading.text;
  });
}
