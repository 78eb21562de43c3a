/**
 * One positioned character on a page. Coordinates are in PDF points with
 * `top`/`bottom` measured downward from the top edge of the page.
 */
export interface Glyph {
  text: string;
  x0: number;
  x1: number;
  top: number;
  bottom: number;
  fontName: string;
  size: number;
}

export interface LayoutPage {
  /** 1-based page number */
  number: number;
  width: number;
  height: number;
  glyphs: Glyph[];
}

export interface LayoutDocument {
  source: string;
  pages: LayoutPage[];
}

export interface BoundingBox {
  x0: number;
  top: number;
  x1: number;
  bottom: number;
}
