import { extractText } from '../layout/text';
import type { LayoutDocument } from '../layout/types';
import { extractHeadings, type Heading } from './heading-extractor';

export interface Section {
  heading: string;
  page: number;
  level: number;
  content: string;
}

export interface CollectSectionsOptions {
  /** Pre-extracted headings; extracted with default heuristics when omitted */
  headings?: Heading[];
  targetLevel?: number;
}

/**
 * Gather the body text under every heading at `targetLevel`, running until
 * the next heading at the same or a higher level (or the end of the document).
 */
export function collectSections(
  document: LayoutDocument,
  options: CollectSectionsOptions = {},
): Section[] {
  const targetLevel = options.targetLevel ?? 2;
  const headings = options.headings ?? extractHeadings(document);
  if (headings.length === 0 || document.pages.length === 0) return [];

  const ordered = [...headings].sort((a, b) => a.page - b.page || a.top - b.top);
  const pagesByNumber = new Map(document.pages.map(page => [page.number, page]));
  const lastPage = Math.max(...document.pages.map(page => page.number));
  const sections: Section[] = [];

  ordered.forEach((heading, idx) => {
    if (heading.level !== targetLevel) return;

    const boundary = ordered.slice(idx + 1).find(next => next.level <= targetLevel);
    const endPage = boundary ? boundary.page : lastPage;
    const chunks: string[] = [];

    for (let pageNo = heading.page; pageNo <= endPage; pageNo++) {
      const page = pagesByNumber.get(pageNo);
      if (!page) continue;

      const rawTop = pageNo === heading.page ? heading.bottom + 1 : 0;
      const rawBottom = boundary && pageNo === endPage ? boundary.top - 1 : page.height;
      const top = Math.max(0, Math.min(rawTop, page.height));
      const bottom = Math.max(0, Math.min(rawBottom, page.height));
      if (bottom <= top) continue;

      const text = extractText(page, { x0: 0, top, x1: page.width, bottom }).trim();
      if (text) chunks.push(text);
    }

    sections.push({
      heading: heading.text,
      page: heading.page,
      level: heading.level,
      content: chunks.join('\n').trim(),
    });
  });

  return sections;
}
