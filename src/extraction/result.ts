/**
 * Extraction Results
 *
 * Constructors, derived values and consistency checks for
 * TextExtractionResult and PaperSection.
 */

import { ExtractionStatus, type PaperSection, type TextExtractionResult } from "./types";

export interface ResultFields {
  status: ExtractionStatus;
  textContent?: string | null;
  rawTextLength?: number;
  cleanTextLength?: number;
  pageCount?: number;
  extractionTimeSeconds?: number;
  errorMessage?: string | null;
  warnings?: readonly string[];
}

export function createExtractionResult(fields: ResultFields): TextExtractionResult {
  return Object.freeze({
    status: fields.status,
    textContent: fields.textContent ?? null,
    rawTextLength: fields.rawTextLength ?? 0,
    cleanTextLength: fields.cleanTextLength ?? 0,
    pageCount: fields.pageCount ?? 0,
    extractionTimeSeconds: fields.extractionTimeSeconds ?? 0,
    errorMessage: fields.errorMessage ?? null,
    warnings: Object.freeze([...(fields.warnings ?? [])]),
  });
}

export function failedResult(
  errorMessage: string,
  fields: Omit<ResultFields, "status" | "errorMessage" | "textContent"> = {}
): TextExtractionResult {
  return createExtractionResult({ ...fields, status: ExtractionStatus.FAILED, errorMessage });
}

export function notAttemptedResult(): TextExtractionResult {
  return createExtractionResult({ status: ExtractionStatus.NOT_ATTEMPTED });
}

/**
 * Whether extraction produced usable text
 */
export function isSuccessful(result: TextExtractionResult): boolean {
  return result.status === ExtractionStatus.SUCCESS || result.status === ExtractionStatus.PARTIAL;
}

/**
 * Percentage of raw text removed by sanitization
 */
export function sanitizationReductionPct(result: TextExtractionResult): number {
  if (result.rawTextLength === 0) return 0.0;
  const reduction = result.rawTextLength - result.cleanTextLength;
  return (reduction / result.rawTextLength) * 100;
}

/**
 * Check a result for internal consistency
 *
 * @returns Problems found, empty when the result is valid
 */
export function validateExtractionResult(result: TextExtractionResult): string[] {
  const errors: string[] = [];

  if (result.status === ExtractionStatus.SUCCESS) {
    if (!result.textContent) errors.push("SUCCESS status requires non-empty textContent");
    if (result.errorMessage) errors.push("SUCCESS status should not have errorMessage");
  }

  if (result.status === ExtractionStatus.FAILED) {
    if (!result.errorMessage) errors.push("FAILED status requires errorMessage");
    if (result.textContent !== null) errors.push("FAILED status should not have textContent");
  }

  if (result.extractionTimeSeconds < 0) errors.push("extractionTimeSeconds must be non-negative");
  if (result.pageCount < 0) errors.push("pageCount must be non-negative");
  if (result.rawTextLength < 0 || result.cleanTextLength < 0) {
    errors.push("text lengths must be non-negative");
  }
  if (result.cleanTextLength > result.rawTextLength) {
    errors.push("cleanTextLength cannot exceed rawTextLength");
  }

  return errors;
}

/**
 * Build a section, rejecting values that break its invariants
 */
export function createSection(
  fields: Omit<PaperSection, "elements"> & { elements?: readonly string[] }
): PaperSection {
  if (!fields.title) throw new Error("Section title must not be empty");
  if (fields.level < 1) throw new Error("Section level must be >= 1");
  if (fields.pageStart > fields.pageEnd) throw new Error("pageStart must be <= pageEnd");

  return Object.freeze({
    title: fields.title,
    content: fields.content,
    level: fields.level,
    pageStart: fields.pageStart,
    pageEnd: fields.pageEnd,
    elements: Object.freeze([...(fields.elements ?? [])]),
  });
}
