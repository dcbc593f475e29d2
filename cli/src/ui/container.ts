/**
 * Container Widget
 *
 * Composite widget that owns an ordered list of children and gives each an
 * equal share of its area along one axis. Children draw themselves; the
 * container only partitions.
 */

import type { Buffer, Rect } from "./buffer";
import { splitEqual, type Direction } from "./layout";
import type { Widget } from "./widget";

export interface ContainerOptions {
  /** Axis along which the area is divided (default: horizontal) */
  direction?: Direction;
}

export class Container<T extends Widget = Widget> implements Widget {
  readonly direction: Direction;
  private readonly children: T[] = [];

  constructor(options: ContainerOptions = {}) {
    this.direction = options.direction ?? "horizontal";
  }

  get size(): number {
    return this.children.length;
  }

  push(child: T): this {
    this.children.push(child);
    return this;
  }

  /**
   * The regions the children would be drawn into for `area`.
   */
  layout(area: Rect): Rect[] {
    return splitEqual(area, this.children.length, this.direction);
  }

  render(area: Rect, buf: Buffer): void {
    const regions = this.layout(area);
    this.children.forEach((child, i) => child.render(regions[i], buf));
  }
}
