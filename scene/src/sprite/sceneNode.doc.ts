/**
 * Scene Node Documentation Interface
 *
 * This file contains the fully-documented interface for SceneNode.
 * Implementation classes should implement this interface to inherit documentation.
 *
 * @see SceneNode for the concrete implementation
 */

import type { ColorRGB, Point2D, Rect2D } from '../math/types.js';
import type { Matrix2D } from '../math/Matrix2D.js';
import type { IRenderer, ITexture } from '../render/types.js';
import type { FrameSet } from './FrameSet.js';
import type { AnimatorState } from './FrameAnimator.js';
import type { NodeId } from './ChildCollection.js';

/**
 * Interface for a scene node with full documentation.
 *
 * A scene node (sprite) is a textured quad with a local transform, a tint,
 * an optional frame animation and an ordered list of owned children. The
 * root node is the tree; there is no separate scene object.
 *
 * ## Per-frame flow
 *
 * 1. `update(dt)` on every node that animates. Updates do **not** recurse;
 *    the application decides which nodes to drive.
 * 2. `draw(Matrix2D.identity, renderer)` on the root, which recurses through
 *    every visible descendant in child order.
 *
 * ## Transforms
 *
 * Each node composes `translate(position) · rotate(rotation°) · scale(scale)`
 * onto its parent's accumulated transform and hands that to its children.
 * `flipX` / `flipY` mirror only the node's own quad around its anchor; they
 * are not inherited. Negate `scale` to mirror a whole subtree.
 *
 * @example
 * ```typescript
 * const hero = SceneNode.fromTexture(sheet);
 * hero.addFrameSetHorizontal('walk', true, 0.1, rect(0, 0, 32, 32), 6);
 * hero.play('walk');
 *
 * const hat = SceneNode.fromTextureRect(sheet, rect(0, 32, 16, 16));
 * hat.position = { x: 0, y: -20 };
 * hero.addChild(hat);
 *
 * hero.update(dt);
 * hero.draw(Matrix2D.identity, renderer);
 * ```
 */
export interface ISceneNodeDocumentation<T extends ITexture> {
  /**
   * Unique, immutable identifier assigned at construction.
   */
  readonly id: NodeId;

  /**
   * When false the node and its entire subtree are skipped by draw().
   */
  visible: boolean;

  /**
   * Normalized pivot for rotation, scale, flips and quad placement.
   * Defaults to (0.5, 0.5), the center of the source rectangle.
   * Values outside [0, 1] are accepted.
   */
  anchor: Point2D;

  /**
   * Position relative to the parent's accumulated transform.
   */
  position: Point2D;

  /**
   * Rotation in degrees.
   */
  rotation: number;

  scale: Point2D;

  /**
   * Tint multiplied into the texture. Defaults to white.
   */
  color: ColorRGB;

  /**
   * Alpha applied at draw time, in both draw() and drawTinted().
   */
  opacity: number;

  /**
   * Whether the node's own quad is mirrored horizontally.
   *
   * Only this node's texture is flipped, not its children's, and the anchor
   * is not altered.
   */
  flipX: boolean;

  /**
   * Whether the node's own quad is mirrored vertically.
   *
   * Only this node's texture is flipped, not its children's, and the anchor
   * is not altered.
   */
  flipY: boolean;

  /**
   * Explicit texture region. `undefined` means the full texture.
   * An active animation overrides it.
   */
  sourceRect: Rect2D | undefined;

  /**
   * Shared texture reference. The node never mutates or owns it.
   */
  texture: T;

  /**
   * Direct children in draw order.
   */
  readonly children: readonly ISceneNodeDocumentation<T>[];

  /**
   * The node this one is a child of; undefined for a root.
   */
  readonly parent: ISceneNodeDocumentation<T> | undefined;

  /**
   * Append a child and return its id.
   *
   * A parent owns its children exclusively: a node that belongs to another
   * parent is detached from it first, and adding a node that is already a
   * child of this one changes nothing.
   *
   * @throws ChildCycleError when the node is this node or one of its ancestors
   */
  addChild(node: ISceneNodeDocumentation<T>): NodeId;

  /**
   * Remove the node with `id` from anywhere in this subtree.
   *
   * Direct children are checked first; otherwise each child's subtree is
   * searched depth-first in order. Only the subtree containing the id is
   * changed.
   *
   * @returns The detached node (with its own subtree and no parent), or
   * undefined when the id is not in this subtree.
   */
  removeChild(id: NodeId): ISceneNodeDocumentation<T> | undefined;

  /**
   * Find a node anywhere in this subtree, with the same search order as
   * removeChild(). The returned node is live: mutating it mutates the tree.
   */
  findChild(id: NodeId): ISceneNodeDocumentation<T> | undefined;

  /**
   * Register an animation clip. Duplicate names are ignored (first wins).
   *
   * @returns true when the clip was registered
   * @throws InvalidFrameSetError when `frames` is empty or `frameTime` is
   * negative or not finite
   */
  addFrameSet(name: string, repeat: boolean, frameTime: number, frames: readonly Rect2D[]): boolean;

  /**
   * Register a clip of `count` frames, each `base.width` wide, tiled
   * rightward from x = 0 and sharing `base.y` and `base.height`.
   */
  addFrameSetHorizontal(name: string, repeat: boolean, frameTime: number, base: Rect2D, count: number): boolean;

  /**
   * Start the clip `name`; `followup` plays once it finishes.
   *
   * Unknown names leave the current clip in place and return false; the
   * followup is updated either way.
   */
  play(name: string, followup?: string): boolean;

  /**
   * Advance this node's animation by `dt` seconds. Does not recurse.
   */
  update(dt: number): void;

  readonly animationState: AnimatorState;

  readonly activeFrameSet: FrameSet | undefined;

  readonly frameIndex: number;

  /**
   * The rectangle a draw would sample: current animation frame, else the
   * explicit source rectangle, else the full texture.
   */
  activeSourceRect(): Rect2D;

  /**
   * Draw this node and its visible descendants.
   *
   * @param parentTransform - Accumulated transform of the parent
   * @param renderer - Backend receiving one quad per visible node
   */
  draw(parentTransform: Matrix2D, renderer: IRenderer<T>): void;

  /**
   * Like draw(), but every quad in the subtree uses `color` instead of its
   * node's own color. Each node keeps its own opacity.
   */
  drawTinted(parentTransform: Matrix2D, renderer: IRenderer<T>, color: ColorRGB): void;

  /**
   * Axis-aligned box in the parent's space, ignoring rotation and ancestors:
   * the active source size times scale, offset from position by the anchor.
   */
  boundingBox(): Rect2D;
}
