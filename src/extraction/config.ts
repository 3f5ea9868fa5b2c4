/**
 * Text Extraction Configuration
 */

import { z } from "zod";

export const TRUNCATION_STRATEGIES = ["end", "middle", "priority_sections"] as const;

export type TruncationStrategy = (typeof TRUNCATION_STRATEGIES)[number];

export interface TextExtractionConfig {
  /** Whether to extract text at all */
  readonly enabled: boolean;
  /** Points excluded from the top of each page when detecting columns */
  readonly headerMargin: number;
  /** Points excluded from the bottom of each page when detecting columns */
  readonly footerMargin: number;
  /** Skip text embedded in images and margin stamps */
  readonly removeImageText: boolean;
  readonly removePageNumbers: boolean;
  /** Pattern and repetition based header/footer removal */
  readonly removeHeadersFooters: boolean;
  readonly minLineLength: number;
  /** Context window in tokens; null uses the model default */
  readonly maxTokens: number | null;
  /** Fraction of the context window reserved for the model's output */
  readonly reserveOutputFraction: number;
  readonly truncationStrategy: TruncationStrategy;
  readonly timeoutSeconds: number;
}

export const DEFAULT_TEXT_EXTRACTION_CONFIG: TextExtractionConfig = Object.freeze({
  enabled: true,
  headerMargin: 50,
  footerMargin: 50,
  removeImageText: true,
  removePageNumbers: true,
  removeHeadersFooters: true,
  minLineLength: 3,
  maxTokens: null,
  reserveOutputFraction: 0.25,
  truncationStrategy: "end",
  timeoutSeconds: 30.0,
});

const MARGIN_MESSAGE = "Margins must be non-negative";

const TextExtractionConfigSchema = z.object({
  enabled: z.boolean(),
  headerMargin: z.number().min(0, MARGIN_MESSAGE),
  footerMargin: z.number().min(0, MARGIN_MESSAGE),
  removeImageText: z.boolean(),
  removePageNumbers: z.boolean(),
  removeHeadersFooters: z.boolean(),
  minLineLength: z.number().int().min(0, "min_line_length must be non-negative"),
  maxTokens: z.number().int().positive("max_tokens must be positive").nullable(),
  reserveOutputFraction: z
    .number()
    .gt(0, "Reserve fraction must be between 0 and 1")
    .lt(1, "Reserve fraction must be between 0 and 1"),
  truncationStrategy: z.enum(TRUNCATION_STRATEGIES, {
    errorMap: (_issue, ctx) => ({ message: `Invalid truncation strategy: ${String(ctx.data)}` }),
  }),
  timeoutSeconds: z.number().positive("Timeout must be positive"),
});

/**
 * Build a frozen config from defaults plus overrides
 */
export function createTextExtractionConfig(
  overrides: Partial<TextExtractionConfig> = {}
): TextExtractionConfig {
  return Object.freeze({ ...DEFAULT_TEXT_EXTRACTION_CONFIG, ...overrides });
}

/**
 * Validate configuration values. Accepts any input so that settings read
 * from the environment or a file can be checked before use.
 *
 * @returns Human-readable problems, empty when valid. Never throws; callers
 * decide whether to proceed.
 */
export function validateTextExtractionConfig(config: unknown): string[] {
  const result = TextExtractionConfigSchema.safeParse(config);
  if (result.success) return [];

  const messages = result.error.issues.map((issue) => issue.message);
  return [...new Set(messages)];
}

/**
 * Fraction of the context window available for input
 */
export function availableInputFraction(config: TextExtractionConfig): number {
  return 1.0 - config.reserveOutputFraction;
}
