/**
 * Extraction Result Tests
 */

import { describe, test, expect } from "vitest";
import {
  createExtractionResult,
  createSection,
  failedResult,
  isSuccessful,
  notAttemptedResult,
  sanitizationReductionPct,
  validateExtractionResult,
} from "../../src/extraction/result";
import { ExtractionStatus } from "../../src/extraction/types";

describe("createExtractionResult", () => {
  test("fills defaults", () => {
    const result = createExtractionResult({ status: ExtractionStatus.NOT_ATTEMPTED });

    expect(result).toEqual({
      status: ExtractionStatus.NOT_ATTEMPTED,
      textContent: null,
      rawTextLength: 0,
      cleanTextLength: 0,
      pageCount: 0,
      extractionTimeSeconds: 0,
      errorMessage: null,
      warnings: [],
    });
  });

  test("is frozen", () => {
    const result = createExtractionResult({ status: ExtractionStatus.SUCCESS, textContent: "text" });

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.warnings)).toBe(true);
  });

  test("copies warnings", () => {
    const warnings = ["first"];
    const result = createExtractionResult({ status: ExtractionStatus.PARTIAL, warnings });
    warnings.push("second");

    expect(result.warnings).toEqual(["first"]);
  });

  test("failedResult has no text", () => {
    const result = failedResult("broken", { pageCount: 4 });

    expect(result.status).toBe(ExtractionStatus.FAILED);
    expect(result.errorMessage).toBe("broken");
    expect(result.textContent).toBeNull();
    expect(result.pageCount).toBe(4);
  });

  test("notAttemptedResult", () => {
    expect(notAttemptedResult().status).toBe(ExtractionStatus.NOT_ATTEMPTED);
  });
});

describe("isSuccessful", () => {
  test.each([
    [ExtractionStatus.SUCCESS, true],
    [ExtractionStatus.PARTIAL, true],
    [ExtractionStatus.FAILED, false],
    [ExtractionStatus.NOT_ATTEMPTED, false],
  ])("%s -> %s", (status, expected) => {
    expect(isSuccessful(createExtractionResult({ status }))).toBe(expected);
  });
});

describe("sanitizationReductionPct", () => {
  test("computes the removed share", () => {
    const result = createExtractionResult({
      status: ExtractionStatus.SUCCESS,
      textContent: "x",
      rawTextLength: 1000,
      cleanTextLength: 800,
    });

    expect(sanitizationReductionPct(result)).toBe(20.0);
  });

  test("is zero when nothing was extracted", () => {
    expect(sanitizationReductionPct(failedResult("nothing"))).toBe(0.0);
  });
});

describe("validateExtractionResult", () => {
  test("accepts a consistent success", () => {
    const result = createExtractionResult({
      status: ExtractionStatus.SUCCESS,
      textContent: "Some text",
      rawTextLength: 12,
      cleanTextLength: 9,
      pageCount: 1,
    });

    expect(validateExtractionResult(result)).toEqual([]);
  });

  test("flags success without text", () => {
    const result = createExtractionResult({ status: ExtractionStatus.SUCCESS, errorMessage: "odd" });

    expect(validateExtractionResult(result)).toEqual([
      "SUCCESS status requires non-empty textContent",
      "SUCCESS status should not have errorMessage",
    ]);
  });

  test("flags failure without a message", () => {
    const result = createExtractionResult({ status: ExtractionStatus.FAILED, textContent: "left over" });

    expect(validateExtractionResult(result)).toEqual([
      "FAILED status requires errorMessage",
      "FAILED status should not have textContent",
    ]);
  });

  test("flags inconsistent metrics", () => {
    const result = createExtractionResult({
      status: ExtractionStatus.PARTIAL,
      textContent: "partial",
      rawTextLength: 5,
      cleanTextLength: 7,
      pageCount: -1,
      extractionTimeSeconds: -0.5,
    });

    expect(validateExtractionResult(result)).toEqual([
      "extractionTimeSeconds must be non-negative",
      "pageCount must be non-negative",
      "cleanTextLength cannot exceed rawTextLength",
    ]);
  });
});

describe("createSection", () => {
  const base = { title: "Introduction", content: "Body", level: 1, pageStart: 1, pageEnd: 2 };

  test("builds a frozen section", () => {
    const section = createSection({ ...base, elements: ["fig1"] });

    expect(section).toEqual({ ...base, elements: ["fig1"] });
    expect(Object.isFrozen(section)).toBe(true);
  });

  test("rejects an empty title", () => {
    expect(() => createSection({ ...base, title: "" })).toThrow("Section title must not be empty");
  });

  test("rejects a level below one", () => {
    expect(() => createSection({ ...base, level: 0 })).toThrow("Section level must be >= 1");
  });

  test("rejects a reversed page range", () => {
    expect(() => createSection({ ...base, pageStart: 3 })).toThrow("pageStart must be <= pageEnd");
  });
});
