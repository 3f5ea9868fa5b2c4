/**
 * Text Extractor
 *
 * Drives page extraction and sanitization across a whole document and
 * reduces every outcome, including failures, to one TextExtractionResult.
 * `extract` never rejects: callers check `status` and fall back to
 * metadata-only mode when the result is not successful.
 */

import { describeExtractionFailure } from "../common/errors";
import { createLogger, type Logger } from "../common/logger";
import { PdfjsBackend } from "../pdf/pdfjs";
import type { PdfBackend, PdfDocumentHandle } from "../pdf/types";
import type { TextExtractionConfig } from "./config";
import { extractPageText } from "./page";
import { createExtractionResult, failedResult, sanitizationReductionPct } from "./result";
import { TextSanitizer } from "./sanitizer";
import { ExtractionStatus, type TextExtractionResult } from "./types";

// setTimeout delays are 32-bit
const MAX_TIMER_MS = 2_147_483_647;

export interface ExtractOptions {
  /** Checked between pages; an abort keeps what was gathered so far */
  signal?: AbortSignal;
}

interface RunState {
  timedOut: boolean;
  pageCount: number;
  readonly elapsed: () => number;
  readonly log: Logger;
}

export class TextExtractor {
  private readonly sanitizer = new TextSanitizer();

  constructor(private readonly backend: PdfBackend = new PdfjsBackend()) {}

  async extract(
    pdfPath: string,
    config: TextExtractionConfig,
    options: ExtractOptions = {}
  ): Promise<TextExtractionResult> {
    const start = performance.now();
    const state: RunState = {
      timedOut: false,
      pageCount: 0,
      elapsed: () => (performance.now() - start) / 1000,
      log: createLogger({ component: "text-extractor", pdf: pdfPath }),
    };

    let timer: ReturnType<typeof setTimeout> | undefined;
    const races: Array<Promise<TextExtractionResult>> = [this.run(pdfPath, config, options, state)];

    if (Number.isFinite(config.timeoutSeconds) && config.timeoutSeconds > 0) {
      races.push(
        new Promise<TextExtractionResult>((resolve) => {
          timer = setTimeout(() => {
            state.timedOut = true;
            resolve(
              failedResult(`Text extraction timed out after ${config.timeoutSeconds}s`, {
                pageCount: state.pageCount,
                extractionTimeSeconds: state.elapsed(),
              })
            );
          }, Math.min(config.timeoutSeconds * 1000, MAX_TIMER_MS));
        })
      );
    }

    try {
      const result = await Promise.race(races);
      this.logResult(result, state.log);
      return result;
    } finally {
      clearTimeout(timer);
    }
  }

  private async run(
    pdfPath: string,
    config: TextExtractionConfig,
    options: ExtractOptions,
    state: RunState
  ): Promise<TextExtractionResult> {
    if (options.signal?.aborted) {
      return failedResult("Extraction cancelled", { extractionTimeSeconds: state.elapsed() });
    }

    let doc: PdfDocumentHandle;
    try {
      doc = await this.backend.open(pdfPath);
    } catch (err) {
      return failedResult(describeExtractionFailure(err, pdfPath), {
        extractionTimeSeconds: state.elapsed(),
      });
    }

    try {
      return await this.extractPages(doc, config, options, state);
    } catch (err) {
      return failedResult(describeExtractionFailure(err, pdfPath), {
        pageCount: state.pageCount,
        extractionTimeSeconds: state.elapsed(),
      });
    } finally {
      await this.close(doc, state.log);
    }
  }

  private async extractPages(
    doc: PdfDocumentHandle,
    config: TextExtractionConfig,
    options: ExtractOptions,
    state: RunState
  ): Promise<TextExtractionResult> {
    const pageCount = doc.pageCount;
    state.pageCount = pageCount;

    const warnings: string[] = [];
    const pageTexts: string[] = [];
    let processed = 0;
    let cancelled = false;

    for (let index = 0; index < pageCount; index++) {
      if (state.timedOut) break;
      if (options.signal?.aborted) {
        cancelled = true;
        break;
      }

      const pageLog = state.log.child({ page: index + 1 });
      const page = await doc.getPage(index);
      const text = await extractPageText(page, config, warnings, pageLog);
      processed++;

      pageLog.debug("Extracted page", { chars: text.length });
      if (text.trim()) pageTexts.push(text);
    }

    const rawText = pageTexts.join("\n\n");
    const cleanText = this.sanitizer.sanitize(rawText, config);
    const metrics = {
      rawTextLength: rawText.length,
      cleanTextLength: cleanText.length,
      pageCount,
      warnings,
    };

    if (cancelled) {
      warnings.push(`Extraction cancelled after ${processed} of ${pageCount} pages`);
      if (!cleanText) {
        return failedResult("Extraction cancelled", { ...metrics, extractionTimeSeconds: state.elapsed() });
      }
      return createExtractionResult({
        ...metrics,
        status: ExtractionStatus.PARTIAL,
        textContent: cleanText,
        extractionTimeSeconds: state.elapsed(),
      });
    }

    if (metrics.rawTextLength === 0) {
      return failedResult("No text content extracted from PDF", {
        ...metrics,
        extractionTimeSeconds: state.elapsed(),
      });
    }

    if (!cleanText) {
      return failedResult("No text content remained after sanitization", {
        ...metrics,
        extractionTimeSeconds: state.elapsed(),
      });
    }

    return createExtractionResult({
      ...metrics,
      status: ExtractionStatus.SUCCESS,
      textContent: cleanText,
      extractionTimeSeconds: state.elapsed(),
    });
  }

  private async close(doc: PdfDocumentHandle, log: Logger): Promise<void> {
    try {
      await doc.close();
    } catch (err) {
      log.warn("Failed to close document", { error: err });
    }
  }

  private logResult(result: TextExtractionResult, log: Logger): void {
    const context = {
      status: result.status,
      pages: result.pageCount,
      rawTextLength: result.rawTextLength,
      cleanTextLength: result.cleanTextLength,
      reductionPct: Number(sanitizationReductionPct(result).toFixed(1)),
      seconds: Number(result.extractionTimeSeconds.toFixed(2)),
    };

    if (result.status === ExtractionStatus.FAILED) {
      log.warn(`Text extraction failed: ${result.errorMessage}`, context);
    } else {
      log.info("Text extraction finished", context);
    }
  }
}
