/**
 * Progress Tests
 */

import { describe, test, expect } from "vitest";
import { Progress, formatScore, formatSummary, summarize } from "../progress";

describe("Progress", () => {
  test("starts without a score", () => {
    const progress = new Progress("card");

    expect(progress.hasScore()).toBe(false);
    expect(progress.score()).toBeUndefined();
    expect(progress.item).toBe("card");
  });

  test("holds the recorded score", () => {
    const progress = new Progress("card");
    progress.record("miss");

    expect(progress.hasScore()).toBe(true);
    expect(progress.score()).toBe("miss");
  });

  test("score stays stable across reads", () => {
    const progress = new Progress("card");
    progress.record("hit");

    expect(progress.score()).toBe("hit");
    expect(progress.score()).toBe("hit");
    expect(progress.hasScore()).toBe(true);
  });
});

describe("formatScore", () => {
  test("maps every score", () => {
    expect(formatScore("hit")).toBe("hit");
    expect(formatScore("miss")).toBe("miss");
  });
});

describe("summarize", () => {
  test("counts hits and misses and ignores unscored values", () => {
    const a = new Progress("a");
    const b = new Progress("b");
    const c = new Progress("c");
    const d = new Progress("d");
    a.record("hit");
    b.record("miss");
    c.record("hit");

    expect(summarize([a, b, c, d])).toEqual({ hit: 2, miss: 1, total: 3 });
  });

  test("is zero for no progress", () => {
    expect(summarize([])).toEqual({ hit: 0, miss: 0, total: 0 });
  });
});

describe("formatSummary", () => {
  test("renders counts as a sentence", () => {
    expect(formatSummary({ hit: 1, miss: 1, total: 2 })).toBe("1 hit, 1 miss");
  });
});
