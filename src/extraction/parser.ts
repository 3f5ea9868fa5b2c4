/**
 * Academic Text Parser
 *
 * Derives title, authors and sections from sanitized paper text. Only the
 * text survives to this stage (no font sizes, no positions), so headings
 * are recognised by pattern and the result is best effort. Page numbers are
 * not tracked; every section reports page 1.
 */

import { createSection } from "./result";
import type { PaperSection, ParsedPaper } from "./types";

const MIN_TEXT_LENGTH = 100;
const METADATA_SCAN_LINES = 10;
const MAX_SECTION_CHARS = 5000;

const SECTION_NAMES =
  "abstract|introduction|related work|methodology|methods|approach|model|architecture|" +
  "experiments|evaluation|results|discussion|conclusions?|references|acknowledgments?";

export class AcademicTextParser {
  private readonly sectionPattern = new RegExp(
    [
      `^#+\\s*(?:${SECTION_NAMES})`,
      `^\\d+\\.?\\s+(?:${SECTION_NAMES})`,
      `^(?:${SECTION_NAMES})$`,
    ].join("|"),
    "gim"
  );
  private readonly authorSeparator = /,\s*|\s+and\s+/i;
  private readonly capitalizedNames = /^[A-Z][a-z]+(?:\s+[A-Z][a-z]+)+/;

  constructor(private readonly minSectionLength = 100) {}

  parse(text: string | null | undefined): ParsedPaper {
    if (!text || text.length < MIN_TEXT_LENGTH) {
      return { title: null, authors: [], sections: [] };
    }

    const { title, authors, bodyStart } = this.extractMetadata(text);
    const sections = this.parseSections(text.slice(bodyStart));

    return { title, authors, sections };
  }

  /**
   * Title is the first substantial line; authors are the next line that
   * looks like a name list.
   *
   * A comma/"and" list ends the scan. A capitalized-name line is taken as a
   * single author and the scan goes on, but later lines are no longer
   * author candidates because the list is then non-empty.
   */
  private extractMetadata(text: string): { title: string | null; authors: string[]; bodyStart: number } {
    const lines = text.split("\n");
    let title: string | null = null;
    let authors: string[] = [];
    let bodyStartLine = 0;

    for (const [i, raw] of lines.slice(0, METADATA_SCAN_LINES).entries()) {
      const line = raw.trim();
      if (!line) continue;

      if (title === null && line.length > 20) {
        title = line;
        bodyStartLine = i + 1;
        continue;
      }

      if (title !== null && authors.length === 0 && line.length > 10) {
        if (line.includes(",") || line.toLowerCase().includes(" and ")) {
          authors = line
            .split(this.authorSeparator)
            .map((a) => a.trim())
            .filter((a) => a.length > 0);
          bodyStartLine = i + 1;
          break;
        }
        if (this.capitalizedNames.test(line)) {
          authors.push(line);
          bodyStartLine = i + 1;
        }
      }
    }

    const bodyStart = lines.slice(0, bodyStartLine).join("\n").length;
    return { title, authors, bodyStart };
  }

  private parseSections(text: string): PaperSection[] {
    const matches = [...text.matchAll(this.sectionPattern)];

    if (matches.length === 0) {
      if (text.length <= this.minSectionLength) return [];
      return [this.section("Content", text.slice(0, MAX_SECTION_CHARS))];
    }

    const sections: PaperSection[] = [];

    matches.forEach((match, i) => {
      const title = match[0]
        .trim()
        .replace(/^#+\s*/, "")
        .replace(/^\d+\.?\s*/, "")
        .trim();

      const start = (match.index ?? 0) + match[0].length;
      const next = matches[i + 1];
      const end = next ? (next.index ?? text.length) : text.length;
      const content = text.slice(start, end).trim();

      if (content.length < this.minSectionLength) return;
      sections.push(this.section(title, content.slice(0, MAX_SECTION_CHARS)));
    });

    return sections;
  }

  private section(title: string, content: string): PaperSection {
    return createSection({ title, content, level: 1, pageStart: 1, pageEnd: 1 });
  }
}
