/**
 * Canvas 2D backend.
 *
 * Draws quads onto anything shaped like a CanvasRenderingContext2D (browser
 * canvas, OffscreenCanvas, node-canvas). The context is typed structurally so
 * the package does not depend on DOM typings.
 *
 * Canvas 2D has no per-draw color multiply, so only the tint's alpha is
 * applied (as globalAlpha). Pre-tinted texture sources are the way to get
 * RGB tints on this backend.
 */

import type { IRenderer, ITexture, QuadDrawCall } from './types.js';
import type { Size2D } from '../math/types.js';

/**
 * Anything with pixel dimensions that a canvas can draw from.
 */
export interface ImageSourceLike {
  readonly width: number;
  readonly height: number;
}

export interface Canvas2DLike<TSource extends ImageSourceLike> {
  globalAlpha: number;
  save(): void;
  restore(): void;
  setTransform(a: number, b: number, c: number, d: number, e: number, f: number): void;
  drawImage(
    image: TSource,
    sx: number,
    sy: number,
    sw: number,
    sh: number,
    dx: number,
    dy: number,
    dw: number,
    dh: number
  ): void;
}

/**
 * Texture backed by a canvas image source.
 */
export class CanvasTexture<TSource extends ImageSourceLike> implements ITexture {
  constructor(readonly source: TSource) {}

  getSize(): Size2D {
    return { width: this.source.width, height: this.source.height };
  }
}

export class CanvasRenderer<TSource extends ImageSourceLike> implements IRenderer<CanvasTexture<TSource>> {
  constructor(private readonly context: Canvas2DLike<TSource>) {}

  drawQuad(call: QuadDrawCall<CanvasTexture<TSource>>): void {
    const { texture, rect, sourceRect, color, transform } = call;

    // Degenerate quads have no pixels to cover
    if (rect.width === 0 || rect.height === 0 || sourceRect.width === 0 || sourceRect.height === 0) {
      return;
    }

    const [a, b, c, d, tx, ty] = transform.toTuple();

    this.context.save();
    try {
      this.context.globalAlpha = color.a;
      this.context.setTransform(a, b, c, d, tx, ty);
      this.context.drawImage(
        texture.source,
        sourceRect.x,
        sourceRect.y,
        sourceRect.width,
        sourceRect.height,
        rect.x,
        rect.y,
        rect.width,
        rect.height
      );
    } finally {
      this.context.restore();
    }
  }
}
