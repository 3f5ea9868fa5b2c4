/**
 * Column-Aware Page Extraction
 */

import { createLogger, type Logger } from "../common/logger";
import type { PdfPageHandle } from "../pdf/types";
import type { TextExtractionConfig } from "./config";

const defaultLog = createLogger({ component: "page-extractor" });

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Extract the text of one page, column by column when the backend finds
 * columns, otherwise as a single block. Resolves to "" rather than
 * rejecting; problems are appended to `warnings` and logged through `log`,
 * which callers bind to the document and page.
 */
export async function extractPageText(
  page: PdfPageHandle,
  config: TextExtractionConfig,
  warnings: string[] = [],
  log: Logger = defaultLog
): Promise<string> {
  try {
    const columns = await page.columnBoxes({
      headerMargin: config.headerMargin,
      footerMargin: config.footerMargin,
      noImageText: config.removeImageText,
    });

    if (columns.length === 0) {
      return await page.getText();
    }

    const columnTexts: string[] = [];
    for (const box of columns) {
      const text = await page.getText(box);
      if (text.trim()) columnTexts.push(text);
    }

    return columnTexts.join("\n");
  } catch (err) {
    log.debug("Column extraction failed, using whole-page text", { error: err });
    return extractWholePage(page, warnings, log);
  }
}

async function extractWholePage(page: PdfPageHandle, warnings: string[], log: Logger): Promise<string> {
  try {
    return await page.getText();
  } catch (err) {
    const message = `Page text unavailable: ${errorMessage(err)}`;
    log.warn(message, { error: err });
    warnings.push(message);
    return "";
  }
}
