export enum ExtractionStatus {
  /** Text extracted successfully */
  SUCCESS = "success",
  /** Some text extracted, with warnings */
  PARTIAL = "partial",
  /** Extraction failed completely */
  FAILED = "failed",
  /** Extraction was not attempted */
  NOT_ATTEMPTED = "not_attempted",
}

export interface TextExtractionResult {
  readonly status: ExtractionStatus;
  /** Sanitized text */
  readonly textContent: string | null;
  /** Characters before sanitization */
  readonly rawTextLength: number;
  /** Characters after sanitization */
  readonly cleanTextLength: number;
  readonly pageCount: number;
  readonly extractionTimeSeconds: number;
  readonly errorMessage: string | null;
  /** Non-fatal issues, in the order they were encountered */
  readonly warnings: readonly string[];
}

export interface PaperSection {
  readonly title: string;
  readonly content: string;
  readonly level: number;
  readonly pageStart: number;
  readonly pageEnd: number;
  /** Identifiers of figures, tables and equations that belong to the section */
  readonly elements: readonly string[];
}

export interface ParsedPaper {
  title: string | null;
  authors: string[];
  sections: PaperSection[];
}
