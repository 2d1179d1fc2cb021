/**
 * Rendering capabilities consumed by the scene graph.
 *
 * The scene never rasterizes anything itself: each visible node submits one
 * textured, tinted quad to an IRenderer.
 */

import type { ColorRGBA, Rect2D, Size2D } from '../math/types.js';
import type { Matrix2D } from '../math/Matrix2D.js';

/**
 * A texture resource. Only its pixel dimensions are queried; the scene holds
 * a shared reference and never mutates it.
 */
export interface ITexture {
  getSize(): Size2D;
}

/**
 * One quad submission.
 */
export interface QuadDrawCall<T extends ITexture = ITexture> {
  texture: T;
  /** Destination rectangle in the quad's local space, anchor-relative */
  rect: Rect2D;
  /** Region of the texture to sample, in texture pixels */
  sourceRect: Rect2D;
  /** Tint with the node's opacity in `a` */
  color: ColorRGBA;
  /** Local-to-screen transform of the quad */
  transform: Matrix2D;
}

export interface IRenderer<T extends ITexture = ITexture> {
  drawQuad(call: QuadDrawCall<T>): void;
}
