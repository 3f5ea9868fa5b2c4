/**
 * paperslides
 *
 * Entry point: prepares a research-paper PDF for slide generation and
 * prints what was extracted.
 *
 *   tsx src/index.ts path/to/paper.pdf
 */

import { getConfig, getTextExtractionConfig } from "./common/config";
import { closeLogger, logger } from "./common/logger";
import { validateTextExtractionConfig } from "./extraction/config";
import { sanitizationReductionPct } from "./extraction/result";
import { hasTextContent, preparePaper } from "./paper";

async function main(): Promise<number> {
  const pdfPath = process.argv[2];
  if (!pdfPath) {
    console.error("Usage: paperslides <paper.pdf>");
    return 2;
  }

  const env = getConfig();
  const config = getTextExtractionConfig();

  const problems = validateTextExtractionConfig(config);
  if (problems.length > 0) {
    for (const problem of problems) logger.error(`Invalid text extraction setting: ${problem}`);
    return 1;
  }

  const controller = new AbortController();
  const cancel = () => controller.abort();
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);

  const paper = await preparePaper(pdfPath, {
    config,
    maxContextTokens: env.MAX_CONTEXT_TOKENS,
    signal: controller.signal,
  });
  const result = paper.extractionResult;

  console.log(`Status: ${result.status}`);
  console.log(`Pages: ${result.pageCount}`);
  console.log(
    `Text: ${result.cleanTextLength} chars (${sanitizationReductionPct(result).toFixed(1)}% removed) ` +
      `in ${result.extractionTimeSeconds.toFixed(2)}s`
  );
  if (result.errorMessage) console.log(`Error: ${result.errorMessage}`);

  if (hasTextContent(paper)) {
    console.log(`Title: ${paper.title ?? "(not found)"}`);
    console.log(`Authors: ${paper.authors.length > 0 ? paper.authors.join("; ") : "(not found)"}`);
    console.log(`Sections: ${paper.sections.map((s) => s.title).join(", ") || "(none)"}`);
    console.log(`Tokens: ${paper.tokenCount}${paper.wasTruncated ? " (truncated)" : ""}`);
  } else {
    console.log("Continuing in metadata-only mode");
  }

  return 0;
}

main()
  .then((code) => {
    closeLogger();
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Fatal error:", err);
    closeLogger();
    process.exit(1);
  });
