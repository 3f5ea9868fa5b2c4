/**
 * Page Layout
 *
 * Pure geometry over positioned text fragments: line building, column
 * inference and region-clipped text. No vocabulary heuristics; only the
 * positions reported by the renderer are used.
 */

import type {
  BoundingBox,
  ColumnBoxHints,
  PdfPageHandle,
  TextFragment,
  TextLine,
} from "./types";

export interface PageSize {
  width: number;
  height: number;
}

// Two columns are separated by a gap in line left edges of at least this
// fraction of the page width.
const MIN_COLUMN_GAP = 0.12;
const MIN_LINES_PER_COLUMN = 4;
// A left-column line may run this fraction of the page width past the
// boundary before it counts as full-width.
const SPAN_TOLERANCE = 0.02;
// Gaps wider than this many font heights separate columns, not words
const GUTTER_FACTOR = 1.5;
// Caps the line tolerance of tall (usually rotated) fragments
const MAX_LINE_HEIGHT = 24;

export function bboxUnion(a: BoundingBox, b: BoundingBox): BoundingBox {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

function unionOf(boxes: BoundingBox[]): BoundingBox {
  const [first, ...rest] = boxes;
  let box: BoundingBox = { x0: first.x0, y0: first.y0, x1: first.x1, y1: first.y1 };
  for (const b of rest) box = bboxUnion(box, b);
  return box;
}

/**
 * Whether the fragment's centre lies in the box. Half-open on x so that
 * adjacent column boxes never share a fragment.
 */
export function centreInBox(fragment: TextFragment, box: BoundingBox): boolean {
  const cx = (fragment.x0 + fragment.x1) / 2;
  const cy = (fragment.y0 + fragment.y1) / 2;
  return cx >= box.x0 && cx < box.x1 && cy >= box.y0 && cy <= box.y1;
}

function yMid(box: BoundingBox): number {
  return (box.y0 + box.y1) / 2;
}

function mergeLineText(fragments: TextFragment[]): string {
  let out = "";
  let prevX1 = Number.NEGATIVE_INFINITY;

  for (const f of fragments) {
    const s = f.text.replace(/\s+/g, " ").trim();
    if (!s) continue;

    // Word gaps are roughly a quarter of the font size
    const spaceThreshold = Math.max(0.5, (f.y1 - f.y0) * 0.15);
    if (out.length > 0 && f.x0 - prevX1 > spaceThreshold) out += " ";
    out += s;
    prevX1 = Math.max(prevX1, f.x1);
  }

  return out;
}

/**
 * Split x-ordered fragments of one row where the horizontal gap is wider
 * than a column gutter, so that side-by-side columns stay separate lines.
 */
function splitAtGutters(ordered: TextFragment[]): TextFragment[][] {
  const runs: TextFragment[][] = [];
  let current: TextFragment[] = [];
  let prevX1 = Number.NEGATIVE_INFINITY;

  for (const f of ordered) {
    const gutter = (f.y1 - f.y0) * GUTTER_FACTOR;
    if (current.length > 0 && f.x0 - prevX1 > gutter) {
      runs.push(current);
      current = [];
      prevX1 = Number.NEGATIVE_INFINITY;
    }
    current.push(f);
    prevX1 = Math.max(prevX1, f.x1);
  }
  if (current.length > 0) runs.push(current);

  return runs;
}

/**
 * Group fragments into lines by vertical position, top to bottom
 */
export function buildLines(fragments: TextFragment[]): TextLine[] {
  const kept = fragments
    .filter((f) => f.text.trim().length > 0)
    .sort((a, b) => yMid(a) - yMid(b) || a.x0 - b.x0);

  const groups: Array<{ fragments: TextFragment[]; yMid: number; tolerance: number }> = [];

  for (const f of kept) {
    const mid = yMid(f);
    const group = groups.find((g) => Math.abs(g.yMid - mid) <= g.tolerance);
    if (group) {
      group.fragments.push(f);
    } else {
      groups.push({
        fragments: [f],
        yMid: mid,
        tolerance: Math.max(2, Math.min(f.y1 - f.y0, MAX_LINE_HEIGHT) * 0.5),
      });
    }
  }

  const lines: TextLine[] = [];
  for (const group of groups) {
    const ordered = [...group.fragments].sort((a, b) => a.x0 - b.x0);
    for (const run of splitAtGutters(ordered)) {
      const text = mergeLineText(run);
      if (!text) continue;
      lines.push({ ...unionOf(run), text, fragments: run });
    }
  }

  return lines.sort((a, b) => yMid(a) - yMid(b) || a.x0 - b.x0);
}

/**
 * Find the x position where a right-hand column starts, from the
 * distribution of line left edges. Null for single-column text.
 */
export function findColumnBoundary(lines: TextLine[], pageWidth: number): number | null {
  const edges = lines.map((l) => l.x0).sort((a, b) => a - b);
  if (edges.length < MIN_LINES_PER_COLUMN * 2) return null;

  let best: { gap: number; index: number } | null = null;
  for (let i = MIN_LINES_PER_COLUMN; i <= edges.length - MIN_LINES_PER_COLUMN; i++) {
    const gap = edges[i] - edges[i - 1];
    if (!best || gap > best.gap) best = { gap, index: i };
  }

  if (!best || best.gap < pageWidth * MIN_COLUMN_GAP) return null;
  return edges[best.index];
}

/**
 * Column regions of a page in reading order: a full-width band above the
 * columns, the left column, the right column, a full-width band below.
 */
export function inferColumnBoxes(
  fragments: TextFragment[],
  page: PageSize,
  hints: ColumnBoxHints
): BoundingBox[] {
  const body = fragments.filter(
    (f) =>
      f.y0 >= hints.headerMargin &&
      f.y1 <= page.height - hints.footerMargin &&
      !(hints.noImageText && f.rotated)
  );

  const lines = buildLines(body);
  if (lines.length === 0) return [];

  const boundary = findColumnBoundary(lines, page.width);
  if (boundary === null) return [unionOf(lines)];

  const tolerance = page.width * SPAN_TOLERANCE;
  const left: TextLine[] = [];
  const right: TextLine[] = [];
  const spanning: TextLine[] = [];

  for (const line of lines) {
    if (line.x0 >= boundary) right.push(line);
    else if (line.x1 <= boundary + tolerance) left.push(line);
    else spanning.push(line);
  }

  // A centred title block over full-width body text also leaves a gap in
  // left edges; columns need body lines on both sides of the boundary.
  if (
    left.length < MIN_LINES_PER_COLUMN ||
    right.length < MIN_LINES_PER_COLUMN ||
    spanning.length > left.length + right.length
  ) {
    return [unionOf(lines)];
  }

  const columnTop = Math.min(...left.map((l) => l.y0), ...right.map((l) => l.y0));
  const columnBottom = Math.max(...left.map((l) => l.y1), ...right.map((l) => l.y1));

  const above = spanning.filter((l) => l.y1 <= columnTop);
  const below = spanning.filter((l) => l.y0 >= columnBottom);
  // Full-width lines between column lines stay in the column region and are
  // split at the boundary.
  const inside = spanning.filter((l) => l.y1 > columnTop && l.y0 < columnBottom);

  const leftRegion = unionOf([...left, ...inside]);
  const rightRegion = unionOf([...right, ...inside]);

  const boxes: BoundingBox[] = [];
  if (above.length > 0) boxes.push(unionOf(above));
  boxes.push({ x0: leftRegion.x0, y0: leftRegion.y0, x1: boundary, y1: leftRegion.y1 });
  boxes.push({ x0: boundary, y0: rightRegion.y0, x1: rightRegion.x1, y1: rightRegion.y1 });
  if (below.length > 0) boxes.push(unionOf(below));

  return boxes;
}

/**
 * Line-joined text of the fragments inside `clip`, or of all fragments
 */
export function textOf(fragments: TextFragment[], clip?: BoundingBox): string {
  const selected = clip ? fragments.filter((f) => centreInBox(f, clip)) : fragments;
  return buildLines(selected)
    .map((l) => l.text)
    .join("\n");
}

/**
 * Page handle over already-positioned fragments
 */
export class LayoutPage implements PdfPageHandle {
  constructor(
    private readonly fragments: readonly TextFragment[],
    private readonly size: PageSize
  ) {}

  async columnBoxes(hints: ColumnBoxHints): Promise<BoundingBox[]> {
    return inferColumnBoxes([...this.fragments], this.size, hints);
  }

  async getText(clip?: BoundingBox): Promise<string> {
    return textOf([...this.fragments], clip);
  }
}
