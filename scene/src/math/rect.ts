import type { Rect2D } from './types.js';

export function rect(x: number, y: number, width: number, height: number): Rect2D {
  return { x, y, width, height };
}

export function rectEquals(a: Rect2D, b: Rect2D): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

/**
 * Tile `base` rightward `count` times by its own width.
 *
 * Frame i is `(i * base.width, base.y, base.width, base.height)`: the strip
 * always starts at x = 0 of the texture, `base.x` is not an offset.
 */
export function tileHorizontal(base: Rect2D, count: number): Rect2D[] {
  const tiles: Rect2D[] = [];
  for (let i = 0; i < count; i++) {
    tiles.push(rect(i * base.width, base.y, base.width, base.height));
  }
  return tiles;
}
