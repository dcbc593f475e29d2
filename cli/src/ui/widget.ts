import type { Buffer, Rect } from "./buffer";

/**
 * Anything that can draw itself into a region of a buffer.
 * Widgets are rebuilt for every frame and must not draw outside `area`.
 */
export interface Widget {
  render(area: Rect, buf: Buffer): void;
}
