/**
 * Text Widget
 *
 * Leaf widget drawing a string with optional centering and an optional frame.
 *
 * - bordered: a frame around the whole area, with the title on its top edge
 * - centered: the content on one line, centered in the whole area
 * - otherwise: one row per line of content, from the top-left (inside the frame
 *   when bordered), clipped to the area
 *
 * Content is drawn first and the frame last, so the frame always covers the
 * complete area whatever the content does.
 */

import { displayWidth, type Buffer, type Rect } from "./buffer";
import { centerRect, innerRect } from "./layout";
import type { Widget } from "./widget";

export interface TextOptions {
  centered?: boolean;
  bordered?: boolean;
  /** Drawn on the top edge of the frame; ignored unless bordered */
  borderTitle?: string;
}

const BORDER = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
} as const;

export class Text implements Widget {
  readonly content: string;
  readonly options: Readonly<TextOptions>;

  constructor(content: string, options: TextOptions = {}) {
    this.content = content;
    this.options = { ...options };
  }

  render(area: Rect, buf: Buffer): void {
    if (area.width === 0 || area.height === 0) {
      return;
    }

    if (this.options.centered) {
      const line = this.content.replace(/\r?\n/g, " ");
      const target = centerRect(area, displayWidth(line), 1);
      buf.setString(target.x, target.y, line, target.width);
    } else {
      const target = this.options.bordered ? innerRect(area) : area;
      const lines = this.content.split(/\r?\n/).slice(0, target.height);
      lines.forEach((line, i) => buf.setString(target.x, target.y + i, line, target.width));
    }

    if (this.options.bordered) {
      drawFrame(area, buf, this.options.borderTitle);
    }
  }
}

/**
 * Draws a one-cell frame on the edge of `area`.
 */
export function drawFrame(area: Rect, buf: Buffer, title?: string): void {
  const left = area.x;
  const right = area.x + area.width - 1;
  const top = area.y;
  const bottom = area.y + area.height - 1;

  for (let x = left + 1; x < right; x++) {
    buf.setCell(x, top, BORDER.horizontal);
    buf.setCell(x, bottom, BORDER.horizontal);
  }
  for (let y = top + 1; y < bottom; y++) {
    buf.setCell(left, y, BORDER.vertical);
    buf.setCell(right, y, BORDER.vertical);
  }
  buf.setCell(left, top, BORDER.topLeft);
  buf.setCell(right, top, BORDER.topRight);
  buf.setCell(left, bottom, BORDER.bottomLeft);
  buf.setCell(right, bottom, BORDER.bottomRight);

  if (title) {
    buf.setString(left + 1, top, title, Math.max(0, area.width - 2));
  }
}
