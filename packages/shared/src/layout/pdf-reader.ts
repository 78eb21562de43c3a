import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { pathToFileURL } from 'node:url';
import { getDocument, GlobalWorkerOptions } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFPageProxy, TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api';
import { runToGlyphs } from './glyphs';
import type { Glyph, LayoutDocument, LayoutPage } from './types';

const configurePdfJsWorker = () => {
  if (GlobalWorkerOptions.workerSrc) return;
  const require = createRequire(import.meta.url);
  const workerPath = require.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs');
  GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).href;
};

const isTextItem = (item: TextItem | TextMarkedContent): item is TextItem => 'str' in item;

/**
 * pdfjs only exposes internal font ids ("g_d0_f2") on text items; the real
 * PostScript name lives on the font object once the operator list is loaded.
 */
function resolveFontName(page: PDFPageProxy, fontId: string): string {
  if (!page.commonObjs.has(fontId)) return fontId;
  const font: unknown = page.commonObjs.get(fontId);
  if (typeof font === 'object' && font !== null && 'name' in font && typeof font.name === 'string') {
    return font.name;
  }
  return fontId;
}

async function readPage(page: PDFPageProxy): Promise<LayoutPage> {
  const viewport = page.getViewport({ scale: 1 });
  await page.getOperatorList();
  const content = await page.getTextContent();

  const glyphs: Glyph[] = [];
  for (const item of content.items) {
    if (!isTextItem(item) || !item.str) continue;
    const fontName = resolveFontName(page, item.fontName);
    glyphs.push(...runToGlyphs(item, viewport.height, fontName));
  }

  return {
    number: page.pageNumber,
    width: viewport.width,
    height: viewport.height,
    glyphs,
  };
}

/**
 * Load a PDF into per-page glyph records. Throws when the file is missing
 * or cannot be parsed as a PDF.
 */
export async function openLayoutDocument(source: string | Uint8Array): Promise<LayoutDocument> {
  configurePdfJsWorker();

  const data = typeof source === 'string' ? new Uint8Array(await readFile(source)) : source;
  const loadingTask = getDocument({
    data,
    disableFontFace: true,
    isEvalSupported: false,
    useSystemFonts: false,
  });

  const pdf = await loadingTask.promise;
  try {
    const pages: LayoutPage[] = [];
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      pages.push(await readPage(page));
      page.cleanup();
    }
    return {
      source: typeof source === 'string' ? source : '<buffer>',
      pages,
    };
  } finally {
    await pdf.destroy();
  }
}
