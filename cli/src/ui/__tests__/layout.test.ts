/**
 * Layout Tests
 */

import { describe, test, expect } from "vitest";
import { rect } from "../buffer";
import { centerRect, equalShares, innerRect, splitEqual } from "../layout";

describe("splitEqual", () => {
  const cases = [1, 2, 3, 5].flatMap((n) => [10, 11, 17].map((w) => [n, w] as const));

  test.each(cases)("%i regions over width %i sum to the width and differ by at most one", (n, w) => {
    const regions = splitEqual(rect(0, 0, w, 4), n, "horizontal");
    const widths = regions.map((r) => r.width);

    expect(regions).toHaveLength(n);
    expect(widths.reduce((a, b) => a + b, 0)).toBe(w);
    expect(Math.max(...widths) - Math.min(...widths)).toBeLessThanOrEqual(1);
  });

  test("regions are adjacent and in order", () => {
    const regions = splitEqual(rect(2, 1, 11, 4), 3, "horizontal");

    expect(regions).toEqual([
      { x: 2, y: 1, width: 4, height: 4 },
      { x: 6, y: 1, width: 4, height: 4 },
      { x: 10, y: 1, width: 3, height: 4 },
    ]);
  });

  test("splits vertically along the height", () => {
    const regions = splitEqual(rect(0, 0, 8, 7), 2, "vertical");

    expect(regions).toEqual([
      { x: 0, y: 0, width: 8, height: 4 },
      { x: 0, y: 4, width: 8, height: 3 },
    ]);
  });

  test("no children means no regions", () => {
    expect(splitEqual(rect(0, 0, 10, 3), 0, "horizontal")).toEqual([]);
  });
});

describe("equalShares", () => {
  test("gives the remainder to the first shares", () => {
    expect(equalShares(17, 5)).toEqual([4, 4, 3, 3, 3]);
  });

  test("allows zero-length shares when there are more parts than units", () => {
    expect(equalShares(2, 3)).toEqual([1, 1, 0]);
  });
});

describe("centerRect", () => {
  test("centers a smaller rectangle", () => {
    expect(centerRect(rect(0, 0, 10, 3), 2, 1)).toEqual({ x: 4, y: 1, width: 2, height: 1 });
  });

  test("puts odd leftovers after the rectangle", () => {
    expect(centerRect(rect(0, 0, 10, 4), 3, 1)).toEqual({ x: 3, y: 1, width: 3, height: 1 });
  });

  test("shrinks to fit the area", () => {
    expect(centerRect(rect(5, 5, 4, 2), 9, 1)).toEqual({ x: 5, y: 5, width: 4, height: 1 });
  });
});

describe("innerRect", () => {
  test("removes a one-cell frame", () => {
    expect(innerRect(rect(0, 0, 10, 3))).toEqual({ x: 1, y: 1, width: 8, height: 1 });
  });

  test("never goes negative", () => {
    expect(innerRect(rect(0, 0, 1, 1))).toEqual({ x: 1, y: 1, width: 0, height: 0 });
  });
});
