import { z } from 'zod';

import { InvalidFrameSetError } from '../errors/sceneErrors.js';
import { tileHorizontal } from '../math/rect.js';
import type { Rect2D } from '../math/types.js';

const rectSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  width: z.number().finite(),
  height: z.number().finite(),
});

const frameSetSchema = z.object({
  repeat: z.boolean(),
  frameTime: z.number().finite().nonnegative(),
  frames: z.array(rectSchema).min(1, 'A frame set needs at least one frame'),
});

const stripCountSchema = z.number().int('Frame count must be a whole number').nonnegative();

export interface FrameSetInit {
  /** Loop back to frame 0 instead of freezing or chaining at the end */
  repeat: boolean;
  /** Seconds each frame stays on screen */
  frameTime: number;
  frames: readonly Rect2D[];
}

/**
 * Immutable animation clip: a fixed-rate sequence of source rectangles.
 */
export class FrameSet {
  readonly repeat: boolean;
  readonly frameTime: number;
  private readonly source: readonly Rect2D[];

  private constructor(init: FrameSetInit) {
    this.repeat = init.repeat;
    this.frameTime = init.frameTime;
    this.source = Object.freeze(init.frames.map((frame) => ({ ...frame })));
  }

  /**
   * Validate and build a clip.
   *
   * @throws InvalidFrameSetError when there are no frames, the frame time is
   * negative or not finite, or a rectangle has a non-finite component.
   */
  static create(init: FrameSetInit, name?: string): FrameSet {
    const result = frameSetSchema.safeParse(init);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      });
      const label = name ? `Invalid frame set "${name}"` : 'Invalid frame set';
      throw new InvalidFrameSetError(label, issues, { name });
    }
    return new FrameSet(result.data);
  }

  /**
   * Clip of `count` frames laid out left to right, each `base.width` wide.
   *
   * @throws InvalidFrameSetError when `count` is not a positive whole number
   */
  static horizontalStrip(
    repeat: boolean,
    frameTime: number,
    base: Rect2D,
    count: number,
    name?: string
  ): FrameSet {
    const counted = stripCountSchema.safeParse(count);
    if (!counted.success) {
      const issues = counted.error.issues.map((issue) => `count: ${issue.message}`);
      const label = name ? `Invalid frame set "${name}"` : 'Invalid frame set';
      throw new InvalidFrameSetError(label, issues, { name });
    }
    return FrameSet.create({ repeat, frameTime, frames: tileHorizontal(base, counted.data) }, name);
  }

  get frames(): readonly Rect2D[] {
    return this.source;
  }

  get frameCount(): number {
    return this.source.length;
  }

  get lastIndex(): number {
    return this.source.length - 1;
  }

  /** Total time to show every frame once */
  get duration(): number {
    return this.frameTime * this.source.length;
  }

  /**
   * Frame at `index`, clamped into range.
   */
  frameAt(index: number): Rect2D {
    const clamped = Math.min(Math.max(0, Math.floor(index)), this.lastIndex);
    return this.source[clamped];
  }
}
