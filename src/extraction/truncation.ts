/**
 * Context Fitting
 *
 * Shrinks extracted paper text to the input share of an LLM context window.
 * Token counts use gpt-tokenizer as an estimate for every provider.
 */

import { decode, encode } from "gpt-tokenizer";
import { availableInputFraction, type TextExtractionConfig } from "./config";
import type { PaperSection } from "./types";

export const DEFAULT_CONTEXT_TOKENS = 128_000;

// Papers on language models quote special tokens such as <|endoftext|>;
// they are counted as plain text instead of being rejected.
const ENCODE_OPTIONS = { disallowedSpecial: new Set<string>() };

export const TRUNCATION_MARKER = "\n\n... [truncated]";
export const MIDDLE_MARKER = "\n\n... [truncated] ...\n\n";

// Lower rank is included first. References and acknowledgments go last.
const SECTION_PRIORITY: Array<[RegExp, number]> = [
  [/^abstract$/i, 0],
  [/^introduction$/i, 1],
  [/^conclusions?$/i, 2],
  [/^results$/i, 3],
  [/^discussion$/i, 4],
  [/^(methods|methodology|approach)$/i, 5],
  [/^(experiments|evaluation)$/i, 6],
  [/^(references|acknowledgments?)$/i, 8],
];
const DEFAULT_PRIORITY = 7;

export interface FitOptions {
  /** Model context window; `config.maxTokens` takes precedence */
  maxContextTokens?: number;
  /** Parsed sections, used by the priority_sections strategy */
  sections?: readonly PaperSection[];
}

export interface FitResult {
  text: string;
  tokenCount: number;
  wasTruncated: boolean;
  availableTokens: number;
  /** Titles of sections left out by priority_sections */
  removedSections: string[];
}

export function countTokens(text: string): number {
  return encode(text, ENCODE_OPTIONS).length;
}

/**
 * Input token budget after reserving the output share
 */
export function availableTokens(config: TextExtractionConfig, maxContextTokens?: number): number {
  const contextWindow = config.maxTokens ?? maxContextTokens ?? DEFAULT_CONTEXT_TOKENS;
  return Math.floor(contextWindow * availableInputFraction(config));
}

function keepHead(tokens: number[], budget: number): string {
  return decode(tokens.slice(0, Math.max(0, budget)));
}

function truncateEnd(tokens: number[], budget: number): string {
  const room = budget - countTokens(TRUNCATION_MARKER);
  return keepHead(tokens, room) + TRUNCATION_MARKER;
}

function truncateMiddle(tokens: number[], budget: number): string {
  const room = Math.max(0, budget - countTokens(MIDDLE_MARKER));
  const head = Math.ceil(room / 2);
  const tail = room - head;
  const tailText = tail > 0 ? decode(tokens.slice(tokens.length - tail)) : "";
  return decode(tokens.slice(0, head)) + MIDDLE_MARKER + tailText;
}

function sectionPriority(title: string): number {
  for (const [pattern, rank] of SECTION_PRIORITY) {
    if (pattern.test(title.trim())) return rank;
  }
  return DEFAULT_PRIORITY;
}

function renderSection(section: PaperSection): string {
  return `${section.title}\n\n${section.content}`;
}

/**
 * Pick whole sections by priority until the next one would not fit, then
 * emit the chosen ones in document order.
 */
function selectSections(
  sections: readonly PaperSection[],
  budget: number
): { text: string; removed: string[] } {
  const ranked = sections
    .map((section, index) => ({ section, index, rank: sectionPriority(section.title) }))
    .sort((a, b) => a.rank - b.rank || a.index - b.index);

  // Each block after the first costs a "\n\n" separator
  const separatorTokens = countTokens("\n\n");
  const chosen = new Set<number>();
  let used = 0;

  for (const entry of ranked) {
    const cost = countTokens(renderSection(entry.section)) + (chosen.size > 0 ? separatorTokens : 0);
    if (used + cost > budget) break;
    used += cost;
    chosen.add(entry.index);
  }

  const text = sections
    .filter((_, index) => chosen.has(index))
    .map(renderSection)
    .join("\n\n");
  const removed = sections.filter((_, index) => !chosen.has(index)).map((s) => s.title);

  return { text, removed };
}

/**
 * Fit text to the configured context budget using the configured strategy.
 * Text already within budget is returned unchanged.
 */
export function fitTextToContext(
  text: string,
  config: TextExtractionConfig,
  options: FitOptions = {}
): FitResult {
  const budget = availableTokens(config, options.maxContextTokens);
  const tokens = encode(text, ENCODE_OPTIONS);

  if (tokens.length <= budget) {
    return {
      text,
      tokenCount: tokens.length,
      wasTruncated: false,
      availableTokens: budget,
      removedSections: [],
    };
  }

  let fitted: string;
  let removedSections: string[] = [];

  switch (config.truncationStrategy) {
    case "middle":
      fitted = truncateMiddle(tokens, budget);
      break;
    case "priority_sections":
      if (options.sections && options.sections.length > 0) {
        const selection = selectSections(options.sections, budget);
        fitted = selection.text;
        removedSections = selection.removed;
      } else {
        fitted = truncateEnd(tokens, budget);
      }
      break;
    default:
      fitted = truncateEnd(tokens, budget);
      break;
  }

  return {
    text: fitted,
    tokenCount: countTokens(fitted),
    wasTruncated: true,
    availableTokens: budget,
    removedSections,
  };
}
