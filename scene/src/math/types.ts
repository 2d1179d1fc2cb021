/**
 * Core type definitions for 2D scene geometry.
 *
 * Screen convention: X increases to the right, Y increases downward, and a
 * positive rotation turns +X toward +Y (clockwise on screen).
 */

/**
 * Represents a 2D point or vector with x and y coordinates.
 */
export interface Point2D {
  readonly x: number;
  readonly y: number;
}

/**
 * Pixel dimensions of a texture or region.
 */
export interface Size2D {
  readonly width: number;
  readonly height: number;
}

/**
 * Rectangle defined by position and size.
 */
export interface Rect2D {
  /** Left edge */
  readonly x: number;
  /** Top edge */
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Color channels in [0, 1].
 */
export interface ColorRGB {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export interface ColorRGBA extends ColorRGB {
  readonly a: number;
}

/**
 * Transform matrix for 2D operations (3x3 affine transform).
 * Stored as [a, b, c, d, tx, ty] where:
 * | a  c  tx |
 * | b  d  ty |
 * | 0  0  1  |
 *
 * This is the argument order of CanvasRenderingContext2D.setTransform.
 */
export type Transform2DMatrix = readonly [number, number, number, number, number, number];

export const EPSILON = 1e-10;
export const DEG_TO_RAD = Math.PI / 180;
