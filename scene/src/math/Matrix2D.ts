import type { Point2D } from './types.js';
import type { Transform2DMatrix } from './types.js';

import { DEG_TO_RAD, EPSILON } from './types.js';

/**
 * Immutable 2D affine transformation matrix.
 *
 * Matrix layout, stored as [a, b, c, d, tx, ty]:
 * | a  c  tx |
 * | b  d  ty |
 * | 0  0  1  |
 *
 * The chainable operators post-multiply, so they read left-to-right in the
 * order they apply to a point coming from the innermost space:
 *
 * ```typescript
 * // point -> scale -> rotate -> translate -> parent
 * const world = parent.translate(10, 20).rotateDeg(45).scale(2, 2);
 * ```
 */
export class Matrix2D {
  private readonly elements: Transform2DMatrix;

  // Cached identity matrix
  private static _identity: Matrix2D | undefined;

  constructor(elements: Transform2DMatrix = [1, 0, 0, 1, 0, 0]) {
    this.elements = [elements[0], elements[1], elements[2], elements[3], elements[4], elements[5]];
  }

  // ==================== Static Constructors ====================

  /** Identity matrix */
  static get identity(): Matrix2D {
    return Matrix2D._identity ??= new Matrix2D();
  }

  static fromTuple(tuple: Transform2DMatrix): Matrix2D {
    return new Matrix2D(tuple);
  }

  static translation(x: number, y: number): Matrix2D {
    return new Matrix2D([1, 0, 0, 1, x, y]);
  }

  static rotationDeg(degrees: number): Matrix2D {
    const angle = degrees * DEG_TO_RAD;
    const c = Math.cos(angle);
    const s = Math.sin(angle);
    return new Matrix2D([c, s, -s, c, 0, 0]);
  }

  static scaling(x: number, y: number): Matrix2D {
    return new Matrix2D([x, 0, 0, y, 0, 0]);
  }

  // ==================== Accessors ====================

  get a(): number { return this.elements[0]; }
  get b(): number { return this.elements[1]; }
  get c(): number { return this.elements[2]; }
  get d(): number { return this.elements[3]; }
  get tx(): number { return this.elements[4]; }
  get ty(): number { return this.elements[5]; }

  toTuple(): Transform2DMatrix {
    return this.elements;
  }

  // ==================== Composition ====================

  /** this × other: `other` applies first, then this */
  multiply(other: Matrix2D): Matrix2D {
    const [a1, b1, c1, d1, tx1, ty1] = this.elements;
    const [a2, b2, c2, d2, tx2, ty2] = other.elements;

    return new Matrix2D([
      a1 * a2 + c1 * b2,
      b1 * a2 + d1 * b2,
      a1 * c2 + c1 * d2,
      b1 * c2 + d1 * d2,
      a1 * tx2 + c1 * ty2 + tx1,
      b1 * tx2 + d1 * ty2 + ty1,
    ]);
  }

  /** Pre-multiply with another matrix (other × this) */
  premultiply(other: Matrix2D): Matrix2D {
    return other.multiply(this);
  }

  translate(x: number, y: number): Matrix2D {
    return this.multiply(Matrix2D.translation(x, y));
  }

  rotateDeg(degrees: number): Matrix2D {
    return this.multiply(Matrix2D.rotationDeg(degrees));
  }

  scale(x: number, y: number): Matrix2D {
    return this.multiply(Matrix2D.scaling(x, y));
  }

  /** Mirror horizontally (negate X) */
  flipH(): Matrix2D {
    return this.scale(-1, 1);
  }

  /** Mirror vertically (negate Y) */
  flipV(): Matrix2D {
    return this.scale(1, -1);
  }

  // ==================== Application ====================

  transformPoint(point: Point2D): Point2D {
    const [a, b, c, d, tx, ty] = this.elements;
    return {
      x: a * point.x + c * point.y + tx,
      y: b * point.x + d * point.y + ty,
    };
  }

  determinant(): number {
    return this.a * this.d - this.b * this.c;
  }

  // ==================== Comparison ====================

  equals(other: Matrix2D, epsilon: number = EPSILON): boolean {
    for (let i = 0; i < 6; i++) {
      if (Math.abs(this.elements[i] - other.elements[i]) > epsilon) {
        return false;
      }
    }
    return true;
  }

  isIdentity(epsilon: number = EPSILON): boolean {
    return this.equals(Matrix2D.identity, epsilon);
  }

  toString(): string {
    return `Matrix2D(${this.elements.join(', ')})`;
  }
}
