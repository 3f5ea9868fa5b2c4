import { z } from "zod";
import {
  createTextExtractionConfig,
  TRUNCATION_STRATEGIES,
  type TextExtractionConfig,
} from "../extraction/config";

const envFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1")
  .optional();

// Environment configuration schema
const EnvSchema = z.object({
  // Runtime
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_FORMAT: z.enum(["text", "json"]).default("text"),
  LOG_DIR: z.string().default("./logs"),

  // Context window of the target model, in tokens
  MAX_CONTEXT_TOKENS: z.coerce.number().int().positive().default(128000),

  // Text extraction overrides (unset keeps the default)
  TEXT_EXTRACTION_ENABLED: envFlag,
  TEXT_EXTRACTION_HEADER_MARGIN: z.coerce.number().optional(),
  TEXT_EXTRACTION_FOOTER_MARGIN: z.coerce.number().optional(),
  TEXT_EXTRACTION_REMOVE_IMAGE_TEXT: envFlag,
  TEXT_EXTRACTION_REMOVE_PAGE_NUMBERS: envFlag,
  TEXT_EXTRACTION_REMOVE_HEADERS_FOOTERS: envFlag,
  TEXT_EXTRACTION_MIN_LINE_LENGTH: z.coerce.number().int().optional(),
  TEXT_EXTRACTION_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  TEXT_EXTRACTION_RESERVE_OUTPUT_FRACTION: z.coerce.number().optional(),
  TEXT_EXTRACTION_TRUNCATION_STRATEGY: z.enum(TRUNCATION_STRATEGIES).optional(),
  TEXT_EXTRACTION_TIMEOUT_SECONDS: z.coerce.number().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    console.error("Configuration error:");
    for (const issue of result.error.issues) {
      console.error(`  ${issue.path.join(".")}: ${issue.message}`);
    }
    throw new Error("Invalid configuration");
  }

  return result.data;
}

let _config: Env | null = null;

export function getConfig(): Env {
  if (!_config) {
    _config = parseEnv(process.env);
  }
  return _config;
}

/**
 * Text extraction settings from the environment, on top of the defaults.
 * Range checks are left to validateTextExtractionConfig.
 */
export function textExtractionConfigFromEnv(env: Env): TextExtractionConfig {
  const overrides: { -readonly [K in keyof TextExtractionConfig]?: TextExtractionConfig[K] } = {};

  if (env.TEXT_EXTRACTION_ENABLED !== undefined) overrides.enabled = env.TEXT_EXTRACTION_ENABLED;
  if (env.TEXT_EXTRACTION_HEADER_MARGIN !== undefined) {
    overrides.headerMargin = env.TEXT_EXTRACTION_HEADER_MARGIN;
  }
  if (env.TEXT_EXTRACTION_FOOTER_MARGIN !== undefined) {
    overrides.footerMargin = env.TEXT_EXTRACTION_FOOTER_MARGIN;
  }
  if (env.TEXT_EXTRACTION_REMOVE_IMAGE_TEXT !== undefined) {
    overrides.removeImageText = env.TEXT_EXTRACTION_REMOVE_IMAGE_TEXT;
  }
  if (env.TEXT_EXTRACTION_REMOVE_PAGE_NUMBERS !== undefined) {
    overrides.removePageNumbers = env.TEXT_EXTRACTION_REMOVE_PAGE_NUMBERS;
  }
  if (env.TEXT_EXTRACTION_REMOVE_HEADERS_FOOTERS !== undefined) {
    overrides.removeHeadersFooters = env.TEXT_EXTRACTION_REMOVE_HEADERS_FOOTERS;
  }
  if (env.TEXT_EXTRACTION_MIN_LINE_LENGTH !== undefined) {
    overrides.minLineLength = env.TEXT_EXTRACTION_MIN_LINE_LENGTH;
  }
  if (env.TEXT_EXTRACTION_MAX_TOKENS !== undefined) overrides.maxTokens = env.TEXT_EXTRACTION_MAX_TOKENS;
  if (env.TEXT_EXTRACTION_RESERVE_OUTPUT_FRACTION !== undefined) {
    overrides.reserveOutputFraction = env.TEXT_EXTRACTION_RESERVE_OUTPUT_FRACTION;
  }
  if (env.TEXT_EXTRACTION_TRUNCATION_STRATEGY !== undefined) {
    overrides.truncationStrategy = env.TEXT_EXTRACTION_TRUNCATION_STRATEGY;
  }
  if (env.TEXT_EXTRACTION_TIMEOUT_SECONDS !== undefined) {
    overrides.timeoutSeconds = env.TEXT_EXTRACTION_TIMEOUT_SECONDS;
  }

  return createTextExtractionConfig(overrides);
}

export function getTextExtractionConfig(): TextExtractionConfig {
  return textExtractionConfigFromEnv(getConfig());
}
