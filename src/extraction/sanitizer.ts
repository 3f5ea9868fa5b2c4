/**
 * Text Sanitizer
 *
 * Removes page numbers, DOI and arXiv identifiers, "Page X of Y" markers,
 * repeated headers/footers and short noise lines from extracted text while
 * keeping paragraph breaks.
 */

import type { TextExtractionConfig } from "./config";

function codePointLength(s: string): number {
  return Array.from(s).length;
}

export class TextSanitizer {
  private readonly doiPattern = /^DOI:\s*[\d./\w-]+\s*$/i;
  private readonly arxivPattern = /^arXiv:\s*[\d.]+v?\d*\s*$/i;
  private readonly pageOfPattern = /^Page\s+\d+\s+of\s+\d+\s*$/i;
  private readonly standaloneNumberPattern = /^\p{Nd}+$/u;

  sanitize(text: string, config: TextExtractionConfig): string {
    if (!text) return "";

    // Collapsing inline whitespace up front keeps the line filters stable
    // under repeated sanitization.
    let lines = text.replace(/[ \t]+/g, " ").split("\n");

    if (config.removeHeadersFooters) {
      lines = this.removeIdentifierLines(lines);
    }

    // Page numbers go before short-line filtering; with page numbers kept,
    // the short-line filter has to spare them.
    if (config.removePageNumbers) {
      lines = this.removeStandalonePageNumbers(lines);
      lines = this.removeShortLines(lines, config.minLineLength);
    } else {
      lines = this.removeShortLinesKeepingNumbers(lines, config.minLineLength);
    }

    if (config.removeHeadersFooters) {
      lines = this.removeRepeatedLines(lines);
    }

    return this.normalizeWhitespace(lines.join("\n"));
  }

  private removeIdentifierLines(lines: string[]): string[] {
    return lines.filter((line) => {
      const stripped = line.trim();
      return !(
        this.doiPattern.test(stripped) ||
        this.arxivPattern.test(stripped) ||
        this.pageOfPattern.test(stripped)
      );
    });
  }

  private removeStandalonePageNumbers(lines: string[]): string[] {
    return lines.filter((line) => !this.standaloneNumberPattern.test(line.trim()));
  }

  private removeShortLines(lines: string[], minLength: number): string[] {
    return lines.filter((line) => {
      const length = codePointLength(line.trim());
      return length === 0 || length >= minLength;
    });
  }

  private removeShortLinesKeepingNumbers(lines: string[], minLength: number): string[] {
    return lines.filter((line) => {
      const stripped = line.trim();
      const length = codePointLength(stripped);
      return length === 0 || this.standaloneNumberPattern.test(stripped) || length >= minLength;
    });
  }

  /**
   * Keep the first occurrence of any line seen twice or more; later
   * occurrences are running headers or footers.
   */
  private removeRepeatedLines(lines: string[]): string[] {
    const counts = new Map<string, number>();
    for (const line of lines) {
      const stripped = line.trim();
      if (stripped) counts.set(stripped, (counts.get(stripped) ?? 0) + 1);
    }

    const seen = new Set<string>();
    const result: string[] = [];

    for (const line of lines) {
      const stripped = line.trim();
      if (!stripped || (counts.get(stripped) ?? 0) < 2) {
        result.push(line);
      } else if (!seen.has(stripped)) {
        seen.add(stripped);
        result.push(line);
      }
    }

    return result;
  }

  private normalizeWhitespace(text: string): string {
    // Lines are trimmed before blank runs are collapsed, otherwise
    // whitespace-only lines would hide a run from the collapse.
    return text
      .replace(/[ \t]+/g, " ")
      .split("\n")
      .map((line) => line.trim())
      .join("\n")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  }
}
