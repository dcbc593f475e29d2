/**
 * Layout helpers: equal partitioning and centering of rectangles.
 */

import type { Rect } from "./buffer";

export type Direction = "horizontal" | "vertical";

/**
 * Splits `length` into `count` parts that sum to `length` and differ by at most one.
 * The first `length % count` parts take the extra unit.
 */
export function equalShares(length: number, count: number): number[] {
  if (count <= 0) {
    return [];
  }
  const base = Math.floor(length / count);
  const extra = length % count;
  return Array.from({ length: count }, (_, i) => base + (i < extra ? 1 : 0));
}

/**
 * Partitions `area` into `count` adjacent regions along `direction`, in order.
 */
export function splitEqual(area: Rect, count: number, direction: Direction): Rect[] {
  const total = direction === "horizontal" ? area.width : area.height;
  const regions: Rect[] = [];
  let offset = 0;

  for (const share of equalShares(total, count)) {
    regions.push(
      direction === "horizontal"
        ? { x: area.x + offset, y: area.y, width: share, height: area.height }
        : { x: area.x, y: area.y + offset, width: area.width, height: share }
    );
    offset += share;
  }

  return regions;
}

/**
 * A `width` x `height` rectangle centered in `area`, shrunk to fit.
 * Odd leftovers go after the rectangle.
 */
export function centerRect(area: Rect, width: number, height: number): Rect {
  const w = Math.min(Math.max(0, width), area.width);
  const h = Math.min(Math.max(0, height), area.height);
  return {
    x: area.x + Math.floor((area.width - w) / 2),
    y: area.y + Math.floor((area.height - h) / 2),
    width: w,
    height: h,
  };
}

/**
 * The area inside a one-cell frame.
 */
export function innerRect(area: Rect): Rect {
  return {
    x: area.x + 1,
    y: area.y + 1,
    width: Math.max(0, area.width - 2),
    height: Math.max(0, area.height - 2),
  };
}
