/**
 * PDF backend contract
 *
 * The extraction core only needs to open a document, walk its pages, ask a
 * page for column regions and read text from a page or a region of it.
 * Coordinates are PDF points with a top-left origin.
 */

export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface ColumnBoxHints {
  /** Points at the top of the page ignored for layout */
  headerMargin: number;
  /** Points at the bottom of the page ignored for layout */
  footerMargin: number;
  /** Leave out text that belongs to images or margin stamps */
  noImageText: boolean;
}

export interface PdfPageHandle {
  /** Column regions in reading order; empty when the page has no body text */
  columnBoxes(hints: ColumnBoxHints): Promise<BoundingBox[]>;
  /** Text of the whole page, or of the region when `clip` is given */
  getText(clip?: BoundingBox): Promise<string>;
}

export interface PdfDocumentHandle {
  readonly pageCount: number;
  /** Zero-based page access */
  getPage(index: number): Promise<PdfPageHandle>;
  close(): Promise<void>;
}

export interface PdfBackend {
  open(filePath: string): Promise<PdfDocumentHandle>;
}

/** A positioned run of text as reported by the renderer */
export interface TextFragment {
  text: string;
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  /** Baseline is not horizontal */
  rotated: boolean;
}

export interface TextLine extends BoundingBox {
  text: string;
  fragments: TextFragment[];
}
