/**
 * pdf.js Backend
 *
 * Opens documents with pdfjs-dist and exposes their text layer as positioned
 * fragments. The legacy build is the one that runs under Node.
 */

import * as fs from "fs/promises";
import { LayoutPage } from "./layout";
import type { PdfBackend, PdfDocumentHandle, PdfPageHandle, TextFragment } from "./types";

// Baselines tilted by more than ~5 degrees are treated as rotated text
const ROTATION_TOLERANCE_RAD = 0.09;

type PdfjsModule = typeof import("pdfjs-dist/legacy/build/pdf.mjs");
type PdfjsDocument = Awaited<ReturnType<PdfjsModule["getDocument"]>["promise"]>;

interface RawTextItem {
  str: string;
  transform: unknown[];
  width: number;
  height: number;
}

function asNum(n: unknown, fallback = 0): number {
  const v = Number(n);
  return Number.isFinite(v) ? v : fallback;
}

/**
 * Convert a pdf.js text item (bottom-left origin) into a top-left fragment
 */
export function toFragment(item: RawTextItem, pageHeight: number): TextFragment {
  const [a, b, c, d, e, f] = [0, 1, 2, 3, 4, 5].map((i) => asNum(item.transform[i]));
  const fontHeight = Math.hypot(c, d);
  const height = item.height > 0 ? item.height : fontHeight;
  const baseline = pageHeight - f;

  return {
    text: item.str,
    x0: e,
    y0: baseline - height,
    x1: e + Math.max(0, item.width),
    y1: baseline,
    rotated: Math.abs(Math.atan2(b, a)) > ROTATION_TOLERANCE_RAD,
  };
}

class PdfjsDocumentHandle implements PdfDocumentHandle {
  constructor(private readonly doc: PdfjsDocument) {}

  get pageCount(): number {
    return this.doc.numPages;
  }

  async getPage(index: number): Promise<PdfPageHandle> {
    const page = await this.doc.getPage(index + 1);
    const viewport = page.getViewport({ scale: 1 });
    const content = await page.getTextContent();

    const fragments: TextFragment[] = [];
    for (const item of content.items) {
      if (!("str" in item) || !item.str.trim()) continue;
      fragments.push(toFragment(item, viewport.height));
    }

    page.cleanup();
    return new LayoutPage(fragments, { width: viewport.width, height: viewport.height });
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }
}

export class PdfjsBackend implements PdfBackend {
  async open(filePath: string): Promise<PdfDocumentHandle> {
    // Read first so a missing file surfaces as ENOENT before pdf.js loads
    const buffer = await fs.readFile(filePath);
    const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");

    const loadingTask = getDocument({
      data: new Uint8Array(buffer),
      isEvalSupported: false,
      useSystemFonts: false,
      verbosity: 0,
    });

    try {
      return new PdfjsDocumentHandle(await loadingTask.promise);
    } catch (err) {
      await loadingTask.destroy();
      throw err;
    }
  }
}
