/**
 * 2D math for the scene graph.
 *
 * @module math
 */

export type { Point2D, Size2D, Rect2D, ColorRGB, ColorRGBA, Transform2DMatrix } from './types.js';
export { EPSILON, DEG_TO_RAD } from './types.js';

export { Matrix2D } from './Matrix2D.js';
export { rect, rectEquals, tileHorizontal } from './rect.js';
