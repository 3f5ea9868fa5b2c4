/**
 * Paper Preparation
 *
 * Builds the Paper record handed to slide generation. Text extraction is
 * optional enrichment: whatever goes wrong, the caller still gets a Paper
 * and generation continues in metadata-only mode.
 */

import * as path from "path";
import { createLogger, type Logger } from "../common/logger";
import { createTextExtractionConfig, type TextExtractionConfig } from "../extraction/config";
import { TextExtractor } from "../extraction/extractor";
import { AcademicTextParser } from "../extraction/parser";
import { isSuccessful, notAttemptedResult } from "../extraction/result";
import { fitTextToContext } from "../extraction/truncation";
import {
  ExtractionStatus,
  type PaperSection,
  type TextExtractionResult,
} from "../extraction/types";

export interface Paper {
  filePath: string;
  title: string | null;
  authors: string[];
  abstract: string | null;
  sections: PaperSection[];
  /** Extracted text, fitted to the context budget */
  textContent: string | null;
  extractionResult: TextExtractionResult;
  tokenCount: number | null;
  wasTruncated: boolean;
}

export interface PrepareOptions {
  config?: TextExtractionConfig;
  extractor?: TextExtractor;
  parser?: AcademicTextParser;
  /** Context window of the target model, used when config.maxTokens is unset */
  maxContextTokens?: number;
  signal?: AbortSignal;
}

export function hasTextContent(paper: Paper): boolean {
  return (
    paper.textContent !== null &&
    paper.textContent.length > 0 &&
    isSuccessful(paper.extractionResult)
  );
}

function emptyPaper(filePath: string, extractionResult: TextExtractionResult): Paper {
  return {
    filePath,
    title: null,
    authors: [],
    abstract: null,
    sections: [],
    textContent: null,
    extractionResult,
    tokenCount: null,
    wasTruncated: false,
  };
}

/**
 * Extract, parse and fit a paper's text. Never rejects.
 */
export async function preparePaper(filePath: string, options: PrepareOptions = {}): Promise<Paper> {
  const config = options.config ?? createTextExtractionConfig();
  const name = path.basename(filePath);
  const log = createLogger({ component: "paper", file: name });

  if (!config.enabled) {
    log.info("Text extraction disabled, using metadata-only mode");
    return emptyPaper(filePath, notAttemptedResult());
  }

  log.info("Starting text extraction");
  const extractor = options.extractor ?? new TextExtractor();
  const result = await extractor.extract(filePath, config, { signal: options.signal });
  logExtractionWarnings(result, log);

  if (!isSuccessful(result) || result.textContent === null) {
    log.warn("Text extraction failed, falling back to metadata-only mode", {
      status: result.status,
      error: result.errorMessage,
    });
    return emptyPaper(filePath, result);
  }

  const parser = options.parser ?? new AcademicTextParser();
  const parsed = parser.parse(result.textContent);
  const abstract = parsed.sections.find((s) => s.title.toLowerCase() === "abstract");

  const fitted = fitTextToContext(result.textContent, config, {
    maxContextTokens: options.maxContextTokens,
    sections: parsed.sections,
  });
  if (fitted.wasTruncated) {
    log.info("Paper text truncated to fit context", {
      strategy: config.truncationStrategy,
      availableTokens: fitted.availableTokens,
      tokenCount: fitted.tokenCount,
      removedSections: fitted.removedSections,
    });
  }

  return {
    filePath,
    title: parsed.title,
    authors: parsed.authors,
    abstract: abstract ? abstract.content : null,
    sections: parsed.sections,
    textContent: fitted.text,
    extractionResult: result,
    tokenCount: fitted.tokenCount,
    wasTruncated: fitted.wasTruncated,
  };
}

// Metrics are logged by the extractor itself
function logExtractionWarnings(result: TextExtractionResult, log: Logger): void {
  for (const warning of result.warnings) {
    log.warn(`Extraction warning: ${warning}`);
  }

  if (result.status === ExtractionStatus.PARTIAL) {
    log.info("Partial extraction", { pages: result.pageCount });
  }
}
