/**
 * Page Layout Tests
 */

import { describe, test, expect } from "vitest";
import {
  bboxUnion,
  buildLines,
  centreInBox,
  findColumnBoundary,
  inferColumnBoxes,
  LayoutPage,
} from "../../src/pdf/layout";
import type { TextFragment } from "../../src/pdf/types";
import { fragment } from "../fakes";

const page = { width: 600, height: 800 };
const hints = { headerMargin: 50, footerMargin: 50, noImageText: true };

const stamp: TextFragment = { text: "arXiv stamp", x0: 10, y0: 200, x1: 20, y1: 600, rotated: true };

function twoColumnPage(): TextFragment[] {
  const fragments = [fragment("A Study of Column Layouts", 50, 60, 500)];
  for (let i = 0; i < 5; i++) {
    fragments.push(fragment(`Left line ${i + 1}`, 50, 100 + 20 * i, 240));
    fragments.push(fragment(`Right line ${i + 1}`, 310, 100 + 20 * i, 240));
  }
  fragments.push(fragment("7", 295, 770, 10));
  fragments.push(stamp);
  return fragments;
}

const TITLE_BLOCK = ["A Study Of Things", "Jane Roe", "Institute of Layouts", "March 2024"];

function titledSingleColumnPage(): TextFragment[] {
  const fragments = TITLE_BLOCK.map((text, i) => fragment(text, 220, 60 + 14 * i, 172));
  for (let i = 0; i < 10; i++) {
    const y = 130 + 14 * i;
    fragments.push(fragment(`Body line ${i} first half`, 72, y, 230));
    fragments.push(fragment(`second half ${i}`, 305, y, 235));
  }
  fragments.push(fragment("End of para.", 72, 270, 60));
  return fragments;
}

describe("geometry helpers", () => {
  test("bboxUnion", () => {
    expect(bboxUnion({ x0: 0, y0: 5, x1: 10, y1: 10 }, { x0: 5, y0: 0, x1: 20, y1: 8 })).toEqual({
      x0: 0,
      y0: 0,
      x1: 20,
      y1: 10,
    });
  });

  test("centreInBox is half-open on x", () => {
    const box = { x0: 0, y0: 0, x1: 100, y1: 100 };

    expect(centreInBox(fragment("in", 40, 40, 20), box)).toBe(true);
    expect(centreInBox(fragment("edge", 90, 40, 20), box)).toBe(false);
    expect(centreInBox(fragment("start", -10, 40, 20), box)).toBe(true);
  });
});

describe("buildLines", () => {
  test("merges fragments into words and lines", () => {
    const lines = buildLines([
      fragment("world", 78, 100, 25),
      fragment("Hello", 50, 100, 25),
      fragment("Auto", 50, 120, 20),
      fragment("matic", 70, 120, 25),
      fragment("Far", 300, 100, 20),
      fragment("   ", 10, 140, 5),
    ]);

    expect(lines.map((l) => l.text)).toEqual(["Hello world", "Far", "Automatic"]);
    expect(lines[0]).toMatchObject({ x0: 50, y0: 100, x1: 103, y1: 110 });
  });

  test("returns nothing for blank fragments", () => {
    expect(buildLines([fragment(" ", 0, 0, 5)])).toEqual([]);
  });
});

describe("findColumnBoundary", () => {
  test("needs enough lines on each side", () => {
    const lines = buildLines([
      fragment("Left one", 50, 100, 200),
      fragment("Right one", 310, 100, 200),
      fragment("Left two", 50, 120, 200),
      fragment("Right two", 310, 120, 200),
    ]);

    expect(findColumnBoundary(lines, 600)).toBeNull();
  });

  test("finds the right column edge", () => {
    // Title and column lines only
    const lines = buildLines(twoColumnPage().slice(0, 11));
    expect(findColumnBoundary(lines, 600)).toBe(310);
  });
});

describe("inferColumnBoxes", () => {
  test("splits a two-column page in reading order", () => {
    expect(inferColumnBoxes(twoColumnPage(), page, hints)).toEqual([
      { x0: 50, y0: 60, x1: 550, y1: 70 },
      { x0: 50, y0: 100, x1: 310, y1: 190 },
      { x0: 310, y0: 100, x1: 550, y1: 190 },
    ]);
  });

  test("keeps rotated text when image text is not removed", () => {
    const boxes = inferColumnBoxes(twoColumnPage(), page, { ...hints, noImageText: false });
    expect(boxes[1]).toEqual({ x0: 10, y0: 100, x1: 310, y1: 600 });
  });

  test("returns one box for single-column text", () => {
    const fragments = Array.from({ length: 6 }, (_, i) => fragment(`Body line ${i}`, 72, 100 + 14 * i, 450));

    expect(inferColumnBoxes(fragments, page, hints)).toEqual([{ x0: 72, y0: 100, x1: 522, y1: 180 }]);
  });

  test("returns one box for a centred title block over full-width text", () => {
    const letter = { width: 612, height: 792 };

    expect(inferColumnBoxes(titledSingleColumnPage(), letter, hints)).toEqual([
      { x0: 72, y0: 60, x1: 540, y1: 280 },
    ]);
  });

  test("returns no boxes when only margin text exists", () => {
    const fragments = [fragment("Running header", 50, 20, 200), fragment("12", 295, 770, 10)];
    expect(inferColumnBoxes(fragments, page, hints)).toEqual([]);
  });
});

describe("LayoutPage", () => {
  test("reads each column separately", async () => {
    const layout = new LayoutPage(twoColumnPage(), page);
    const boxes = await layout.columnBoxes(hints);

    const texts = await Promise.all(boxes.map((box) => layout.getText(box)));

    expect(texts).toEqual([
      "A Study of Column Layouts",
      "Left line 1\nLeft line 2\nLeft line 3\nLeft line 4\nLeft line 5",
      "Right line 1\nRight line 2\nRight line 3\nRight line 4\nRight line 5",
    ]);
  });

  test("reads a titled single-column page top to bottom", async () => {
    const layout = new LayoutPage(titledSingleColumnPage(), { width: 612, height: 792 });
    const boxes = await layout.columnBoxes(hints);
    const body = Array.from({ length: 10 }, (_, i) => `Body line ${i} first half second half ${i}`);

    expect(boxes).toHaveLength(1);
    expect(await layout.getText(boxes[0])).toBe([...TITLE_BLOCK, ...body, "End of para."].join("\n"));
  });

  test("whole-page text interleaves columns", async () => {
    const layout = new LayoutPage(twoColumnPage(), page);
    const lines = (await layout.getText()).split("\n");

    expect(lines.slice(0, 3)).toEqual(["A Study of Column Layouts", "Left line 1", "Right line 1"]);
    expect(lines.slice(-2)).toEqual(["arXiv stamp", "7"]);
  });
});
