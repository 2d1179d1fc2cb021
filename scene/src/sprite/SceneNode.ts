/**
 * Scene Node Implementation
 *
 * @see ISceneNodeDocumentation for the documented contract
 */

import { v4 as uuidv4 } from 'uuid';

import { ChildCollection } from './ChildCollection.js';
import { FrameAnimator } from './FrameAnimator.js';
import type { Matrix2D } from '../math/Matrix2D.js';
import { logger } from '../utils/logging/logger.js';
import { ChildCycleError } from '../errors/sceneErrors.js';
import type { ISceneNodeDocumentation } from './sceneNode.doc.js';
import type { NodeId } from './ChildCollection.js';
import type { AnimatorState } from './FrameAnimator.js';
import type { FrameSet } from './FrameSet.js';
import type { ColorRGB, Point2D, Rect2D } from '../math/types.js';
import type { IRenderer, ITexture } from '../render/types.js';

export type { NodeId } from './ChildCollection.js';

const WHITE: ColorRGB = { r: 1, g: 1, b: 1 };

export class SceneNode<T extends ITexture = ITexture> implements ISceneNodeDocumentation<T> {
  private readonly nodeId: NodeId = uuidv4();

  private _visible = true;
  private _anchor: Point2D = { x: 0.5, y: 0.5 };
  private _position: Point2D = { x: 0, y: 0 };
  private _rotation = 0;
  private _scale: Point2D = { x: 1, y: 1 };
  private _color: ColorRGB = WHITE;
  private _opacity = 1;
  private _flipX = false;
  private _flipY = false;

  private _sourceRect: Rect2D | undefined;
  private _texture: T;

  private readonly childList = new ChildCollection<SceneNode<T>>();
  private parentNode: SceneNode<T> | undefined;
  private readonly animator: FrameAnimator;

  constructor(texture: T, sourceRect?: Rect2D) {
    this._texture = texture;
    this._sourceRect = sourceRect ? { ...sourceRect } : undefined;
    this.animator = new FrameAnimator(this.nodeId);
  }

  /** Node showing the full texture */
  static fromTexture<T extends ITexture>(texture: T): SceneNode<T> {
    return new SceneNode(texture);
  }

  /** Node showing a region of the texture */
  static fromTextureRect<T extends ITexture>(texture: T, sourceRect: Rect2D): SceneNode<T> {
    return new SceneNode(texture, sourceRect);
  }

  get id(): NodeId {
    return this.nodeId;
  }

  // ==================== Properties ====================

  get visible(): boolean {
    return this._visible;
  }

  set visible(visible: boolean) {
    this._visible = visible;
  }

  get anchor(): Point2D {
    return this._anchor;
  }

  set anchor(anchor: Point2D) {
    this._anchor = { x: anchor.x, y: anchor.y };
  }

  get position(): Point2D {
    return this._position;
  }

  set position(position: Point2D) {
    this._position = { x: position.x, y: position.y };
  }

  get rotation(): number {
    return this._rotation;
  }

  set rotation(degrees: number) {
    this._rotation = degrees;
  }

  get scale(): Point2D {
    return this._scale;
  }

  set scale(scale: Point2D) {
    this._scale = { x: scale.x, y: scale.y };
  }

  get color(): ColorRGB {
    return this._color;
  }

  set color(color: ColorRGB) {
    this._color = { r: color.r, g: color.g, b: color.b };
  }

  get opacity(): number {
    return this._opacity;
  }

  set opacity(opacity: number) {
    this._opacity = opacity;
  }

  get flipX(): boolean {
    return this._flipX;
  }

  set flipX(flip: boolean) {
    this._flipX = flip;
  }

  get flipY(): boolean {
    return this._flipY;
  }

  set flipY(flip: boolean) {
    this._flipY = flip;
  }

  get sourceRect(): Rect2D | undefined {
    return this._sourceRect;
  }

  set sourceRect(sourceRect: Rect2D | undefined) {
    this._sourceRect = sourceRect ? { ...sourceRect } : undefined;
  }

  get texture(): T {
    return this._texture;
  }

  set texture(texture: T) {
    this._texture = texture;
  }

  setAnchor(x: number, y: number): this {
    this._anchor = { x, y };
    return this;
  }

  setPosition(x: number, y: number): this {
    this._position = { x, y };
    return this;
  }

  setScale(x: number, y: number): this {
    this._scale = { x, y };
    return this;
  }

  setColor(r: number, g: number, b: number): this {
    this._color = { r, g, b };
    return this;
  }

  // ==================== Children ====================

  get children(): readonly SceneNode<T>[] {
    return this.childList.values();
  }

  get childCount(): number {
    return this.childList.size;
  }

  /** Owning node, or undefined for a root or a detached node */
  get parent(): SceneNode<T> | undefined {
    return this.parentNode;
  }

  /**
   * Append `node` as the last child and return its id.
   *
   * A node that already has another parent is moved here. Re-adding a
   * current child leaves it where it is.
   *
   * @throws ChildCycleError when `node` is this node or one of its ancestors
   */
  addChild(node: SceneNode<T>): NodeId {
    if (node.parentNode === this) {
      return node.id;
    }
    if (node === this || node.isAncestorOf(this)) {
      throw new ChildCycleError(this.nodeId, node.id);
    }

    const previous = node.parentNode;
    if (previous) {
      previous.childList.removeDirect(node.id);
      logger.debug('Child moved', { component: 'scene', nodeId: this.nodeId, child: node.id, from: previous.nodeId });
    }

    const id = this.childList.add(node);
    node.parentNode = this;
    logger.debug('Child added', { component: 'scene', nodeId: this.nodeId, child: id });
    return id;
  }

  removeChild(id: NodeId): SceneNode<T> | undefined {
    const direct = this.childList.removeDirect(id);
    if (direct) {
      direct.parentNode = undefined;
      logger.debug('Child removed', { component: 'scene', nodeId: this.nodeId, child: id });
      return direct;
    }

    for (const child of this.childList) {
      const removed = child.removeChild(id);
      if (removed) {
        return removed;
      }
    }
    return undefined;
  }

  private isAncestorOf(node: SceneNode<T>): boolean {
    for (let current = node.parentNode; current; current = current.parentNode) {
      if (current === this) {
        return true;
      }
    }
    return false;
  }

  findChild(id: NodeId): SceneNode<T> | undefined {
    const direct = this.childList.getDirect(id);
    if (direct) {
      return direct;
    }

    for (const child of this.childList) {
      const found = child.findChild(id);
      if (found) {
        return found;
      }
    }
    return undefined;
  }

  /**
   * Whether this node's id index matches its child list.
   */
  hasConsistentChildIndex(): boolean {
    return this.childList.isConsistent();
  }

  // ==================== Animation ====================

  get animationState(): AnimatorState {
    return this.animator.state;
  }

  get activeFrameSet(): FrameSet | undefined {
    return this.animator.activeFrameSet;
  }

  get activeFrameSetName(): string | undefined {
    return this.animator.activeName;
  }

  get followupName(): string | undefined {
    return this.animator.followupName;
  }

  get frameIndex(): number {
    return this.animator.frameIndex;
  }

  get frameElapsed(): number {
    return this.animator.frameElapsed;
  }

  hasFrameSet(name: string): boolean {
    return this.animator.hasFrameSet(name);
  }

  frameSetNames(): string[] {
    return this.animator.frameSetNames();
  }

  addFrameSet(name: string, repeat: boolean, frameTime: number, frames: readonly Rect2D[]): boolean {
    return this.animator.addFrameSet(name, repeat, frameTime, frames);
  }

  addFrameSetHorizontal(name: string, repeat: boolean, frameTime: number, base: Rect2D, count: number): boolean {
    return this.animator.addFrameSetHorizontal(name, repeat, frameTime, base, count);
  }

  play(name: string, followup?: string): boolean {
    return this.animator.play(name, followup);
  }

  /**
   * @throws UnknownFrameSetError when `name` is not registered
   */
  playStrict(name: string, followup?: string): void {
    this.animator.playStrict(name, followup);
  }

  stop(): void {
    this.animator.stop();
  }

  update(dt: number): void {
    this.animator.update(dt);
  }

  // ==================== Geometry ====================

  activeSourceRect(): Rect2D {
    const frame = this.animator.currentFrame();
    if (frame) {
      return frame;
    }
    if (this._sourceRect) {
      return this._sourceRect;
    }
    const { width, height } = this._texture.getSize();
    return { x: 0, y: 0, width, height };
  }

  /**
   * Accumulated transform handed to children: parent · T(position) · R(rotation) · S(scale).
   */
  localTransform(parentTransform: Matrix2D): Matrix2D {
    return parentTransform
      .translate(this._position.x, this._position.y)
      .rotateDeg(this._rotation)
      .scale(this._scale.x, this._scale.y);
  }

  /**
   * Transform of this node's own quad: the local transform plus flips.
   */
  displayTransform(parentTransform: Matrix2D): Matrix2D {
    return this.applyFlips(this.localTransform(parentTransform), this.activeSourceRect());
  }

  private applyFlips(transformed: Matrix2D, source: Rect2D): Matrix2D {
    const anchorX = this._anchor.x * source.width;
    const anchorY = this._anchor.y * source.height;

    let model = transformed;
    if (this._flipX) {
      model = model.translate(source.width - 2 * anchorX, 0).flipH();
    }
    if (this._flipY) {
      model = model.translate(0, source.height - 2 * anchorY).flipV();
    }
    return model;
  }

  boundingBox(): Rect2D {
    const source = this.activeSourceRect();
    const width = source.width * this._scale.x;
    const height = source.height * this._scale.y;

    return {
      x: this._position.x - this._anchor.x * width,
      y: this._position.y - this._anchor.y * height,
      width,
      height,
    };
  }

  // ==================== Rendering ====================

  draw(parentTransform: Matrix2D, renderer: IRenderer<T>): void {
    this.render(parentTransform, renderer, undefined);
  }

  drawTinted(parentTransform: Matrix2D, renderer: IRenderer<T>, color: ColorRGB): void {
    this.render(parentTransform, renderer, { r: color.r, g: color.g, b: color.b });
  }

  private render(parentTransform: Matrix2D, renderer: IRenderer<T>, tint: ColorRGB | undefined): void {
    if (!this._visible) {
      return;
    }

    const source = this.activeSourceRect();
    const transformed = this.localTransform(parentTransform);
    const model = this.applyFlips(transformed, source);
    const color = tint ?? this._color;

    renderer.drawQuad({
      texture: this._texture,
      rect: {
        x: 0 - this._anchor.x * source.width,
        y: 0 - this._anchor.y * source.height,
        width: source.width,
        height: source.height,
      },
      sourceRect: { x: source.x, y: source.y, width: source.width, height: source.height },
      color: { r: color.r, g: color.g, b: color.b, a: this._opacity },
      transform: model,
    });

    for (const child of this.childList) {
      child.render(transformed, renderer, tint);
    }
  }
}
