/**
 * Frame-based animation state machine for a single scene node.
 *
 * There is no clock: the owner passes elapsed seconds to update(). A call
 * advances at most one frame, however large dt is.
 *
 * States:
 * - **idle** - no active clip; the node draws its own source rectangle
 * - **playing** - an active clip and a frame index into it
 */

import { FrameSet } from './FrameSet.js';
import { UnknownFrameSetError } from '../errors/sceneErrors.js';
import { logger } from '../utils/logging/logger.js';
import type { Rect2D } from '../math/types.js';

export type AnimatorState = 'idle' | 'playing';

export class FrameAnimator {
  private readonly registry = new Map<string, FrameSet>();
  private active: FrameSet | undefined;
  private activeClipName: string | undefined;
  private followup: string | undefined;
  private index = 0;
  private elapsed = 0;

  /**
   * @param ownerId - id of the owning node, used in log context only
   */
  constructor(private readonly ownerId?: string) {}

  get state(): AnimatorState {
    return this.active ? 'playing' : 'idle';
  }

  get activeFrameSet(): FrameSet | undefined {
    return this.active;
  }

  get activeName(): string | undefined {
    return this.activeClipName;
  }

  get followupName(): string | undefined {
    return this.followup;
  }

  get frameIndex(): number {
    return this.index;
  }

  /** Seconds accumulated since the last frame advance */
  get frameElapsed(): number {
    return this.elapsed;
  }

  hasFrameSet(name: string): boolean {
    return this.registry.has(name);
  }

  getFrameSet(name: string): FrameSet | undefined {
    return this.registry.get(name);
  }

  frameSetNames(): string[] {
    return Array.from(this.registry.keys());
  }

  /**
   * Source rectangle of the current frame, or undefined when idle.
   * An index past the end of the active clip reads as its last frame.
   */
  currentFrame(): Rect2D | undefined {
    return this.active?.frameAt(this.index);
  }

  /**
   * Register a clip. The first registration of a name wins; later ones are
   * ignored and return false.
   *
   * @throws InvalidFrameSetError when the clip fails validation
   */
  addFrameSet(name: string, repeat: boolean, frameTime: number, frames: readonly Rect2D[]): boolean {
    if (this.registry.has(name)) {
      logger.warn('Frame set already registered, keeping the first one', {
        component: 'animation',
        nodeId: this.ownerId,
        name,
      });
      return false;
    }
    return this.register(name, FrameSet.create({ repeat, frameTime, frames }, name));
  }

  /**
   * Register a clip of `count` frames tiled rightward from `base`.
   */
  addFrameSetHorizontal(name: string, repeat: boolean, frameTime: number, base: Rect2D, count: number): boolean {
    if (this.registry.has(name)) {
      logger.warn('Frame set already registered, keeping the first one', {
        component: 'animation',
        nodeId: this.ownerId,
        name,
      });
      return false;
    }
    return this.register(name, FrameSet.horizontalStrip(repeat, frameTime, base, count, name));
  }

  private register(name: string, frameSet: FrameSet): boolean {
    this.registry.set(name, frameSet);
    logger.debug('Frame set registered', {
      component: 'animation',
      nodeId: this.ownerId,
      name,
      frames: frameSet.frameCount,
    });
    return true;
  }

  /**
   * Make `name` the active clip and remember `followup` for when it ends.
   *
   * The frame index and elapsed time carry over; only a followup chain
   * restarts at frame 0. The followup is replaced (or cleared) even when
   * `name` is unknown, in which case the active clip stays as it was and
   * false is returned.
   */
  play(name: string, followup?: string): boolean {
    const frameSet = this.registry.get(name);

    if (frameSet) {
      this.active = frameSet;
      this.activeClipName = name;
      logger.debug('Playing frame set', {
        component: 'animation',
        nodeId: this.ownerId,
        name,
        followup,
      });
    } else {
      logger.warn('Unknown frame set, animation unchanged', {
        component: 'animation',
        nodeId: this.ownerId,
        name,
      });
    }

    this.followup = followup;
    return frameSet !== undefined;
  }

  /**
   * Like play(), but an unknown name throws and leaves every field untouched.
   *
   * @throws UnknownFrameSetError
   */
  playStrict(name: string, followup?: string): void {
    if (!this.registry.has(name)) {
      throw new UnknownFrameSetError(name, this.frameSetNames());
    }
    this.play(name, followup);
  }

  /**
   * Back to idle: clears the active clip, followup, index and elapsed time.
   */
  stop(): void {
    this.active = undefined;
    this.activeClipName = undefined;
    this.followup = undefined;
    this.index = 0;
    this.elapsed = 0;
  }

  /**
   * Advance the clock by `dt` seconds.
   *
   * Once the accumulated time reaches the clip's frame time the timer resets
   * and the clip moves one frame. On the last frame: a pending followup
   * starts at frame 0 (and takes precedence over repeat), otherwise a
   * repeating clip wraps to 0, otherwise the clip holds its last frame.
   */
  update(dt: number): void {
    const frameSet = this.active;
    if (!frameSet) {
      return;
    }

    this.elapsed += dt;
    if (this.elapsed < frameSet.frameTime) {
      return;
    }
    this.elapsed = 0;

    if (this.index < frameSet.lastIndex) {
      this.index += 1;
      return;
    }

    if (this.followup !== undefined) {
      const next = this.followup;
      this.index = 0;
      logger.debug('Chaining followup frame set', {
        component: 'animation',
        nodeId: this.ownerId,
        from: this.activeClipName,
        to: next,
      });
      // One hop only: the chained clip carries no followup of its own
      this.play(next);
    } else if (frameSet.repeat) {
      this.index = 0;
    } else {
      this.index = frameSet.lastIndex;
    }
  }
}
