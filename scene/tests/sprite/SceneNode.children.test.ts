/**
 * Tests for SceneNode tree operations.
 * Covers ids, child insertion, recursive removal and lookup.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { SceneNode } from '../../src/sprite/SceneNode.js';
import { Matrix2D } from '../../src/math/Matrix2D.js';
import { RecordingRenderer } from '../../src/render/RecordingRenderer.js';
import { ChildCycleError } from '../../src/errors/sceneErrors.js';
import { FakeTexture } from '../helpers/fakes.js';

const texture = new FakeTexture(32, 32);

function node(): SceneNode<FakeTexture> {
  return SceneNode.fromTexture(texture);
}

function idsOf(parent: SceneNode<FakeTexture>): string[] {
  return parent.children.map((child) => child.id);
}

/**
 * root
 * ├── a
 * │   ├── a1
 * │   └── a2
 * │       └── a2x
 * └── b
 *     └── b1
 */
function buildTree() {
  const root = node();
  const a = node();
  const a1 = node();
  const a2 = node();
  const a2x = node();
  const b = node();
  const b1 = node();

  root.addChild(a);
  root.addChild(b);
  a.addChild(a1);
  a.addChild(a2);
  a2.addChild(a2x);
  b.addChild(b1);

  return { root, a, a1, a2, a2x, b, b1 };
}

describe('SceneNode children', () => {
  describe('ids', () => {
    it('should give every node a distinct id', () => {
      const ids = new Set<string>();
      for (let i = 0; i < 200; i++) {
        ids.add(node().id);
      }
      assert.strictEqual(ids.size, 200);
    });

    it('should keep the same id for the life of the node', () => {
      const n = node();
      const id = n.id;
      n.setPosition(5, 5);
      n.addChild(node());
      assert.strictEqual(n.id, id);
    });
  });

  describe('addChild', () => {
    it('should append in order and return the child id', () => {
      const root = node();
      const first = node();
      const second = node();

      assert.strictEqual(root.addChild(first), first.id);
      assert.strictEqual(root.addChild(second), second.id);

      assert.deepStrictEqual(idsOf(root), [first.id, second.id]);
      assert.strictEqual(root.childCount, 2);
      assert.ok(root.hasConsistentChildIndex());
    });

    it('should leave a current child in place when it is added again', () => {
      const root = node();
      const first = node();
      const second = node();
      root.addChild(first);
      root.addChild(second);

      assert.strictEqual(root.addChild(first), first.id);

      assert.deepStrictEqual(idsOf(root), [first.id, second.id]);
      assert.ok(root.hasConsistentChildIndex());

      assert.strictEqual(root.removeChild(first.id), first);
      assert.deepStrictEqual(idsOf(root), [second.id]);
      assert.strictEqual(root.findChild(first.id), undefined);
      assert.ok(root.hasConsistentChildIndex());
    });

    it('should record the parent of an added child', () => {
      const root = node();
      const child = node();

      root.addChild(child);

      assert.strictEqual(child.parent, root);
      assert.strictEqual(root.parent, undefined);
    });

    it('should move a node that already has another parent', () => {
      const root = node();
      const left = node();
      const right = node();
      const moving = node();
      root.addChild(left);
      root.addChild(right);
      left.addChild(moving);

      right.addChild(moving);

      assert.strictEqual(moving.parent, right);
      assert.strictEqual(left.childCount, 0);
      assert.deepStrictEqual(idsOf(right), [moving.id]);
      assert.ok(left.hasConsistentChildIndex());
      assert.strictEqual(left.removeChild(moving.id), undefined);

      const renderer = new RecordingRenderer<FakeTexture>();
      root.draw(Matrix2D.identity, renderer);
      assert.strictEqual(renderer.count, 4);
    });

    it('should stop drawing a moved node once its new parent lets it go', () => {
      const left = node();
      const right = node();
      const moving = node();
      left.addChild(moving);
      right.addChild(moving);

      right.removeChild(moving.id);

      const renderer = new RecordingRenderer<FakeTexture>();
      left.draw(Matrix2D.identity, renderer);
      right.draw(Matrix2D.identity, renderer);
      assert.strictEqual(renderer.count, 2);
    });

    it('should refuse to add a node to itself', () => {
      const root = node();

      assert.throws(() => root.addChild(root), (error: unknown) => {
        assert.ok(error instanceof ChildCycleError);
        assert.strictEqual(error.parentId, root.id);
        assert.strictEqual(error.childId, root.id);
        return true;
      });
      assert.strictEqual(root.childCount, 0);
      assert.strictEqual(root.parent, undefined);
    });

    it('should refuse to add an ancestor under its descendant', () => {
      const { root, a, a2, a2x } = buildTree();

      assert.throws(() => a2x.addChild(root), ChildCycleError);
      assert.throws(() => a2x.addChild(a), ChildCycleError);
      assert.throws(() => a2.addChild(a2), ChildCycleError);

      assert.strictEqual(a.parent, root);
      assert.strictEqual(a2x.childCount, 0);
      assert.strictEqual(root.findChild(a2x.id), a2x);
    });
  });

  describe('removeChild', () => {
    it('should remove a direct child and reindex later siblings', () => {
      const root = node();
      const kids = [node(), node(), node(), node()];
      kids.forEach((kid) => root.addChild(kid));

      const removed = root.removeChild(kids[1].id);

      assert.strictEqual(removed, kids[1]);
      assert.strictEqual(kids[1].parent, undefined);
      assert.deepStrictEqual(idsOf(root), [kids[0].id, kids[2].id, kids[3].id]);
      assert.ok(root.hasConsistentChildIndex());
      assert.strictEqual(root.findChild(kids[3].id), kids[3]);
    });

    it('should remove a grandchild and leave every other level untouched', () => {
      const { root, a, a1, a2, a2x, b, b1 } = buildTree();

      const removed = root.removeChild(a1.id);

      assert.strictEqual(removed, a1);
      assert.deepStrictEqual(idsOf(root), [a.id, b.id]);
      assert.deepStrictEqual(idsOf(a), [a2.id]);
      assert.deepStrictEqual(idsOf(a2), [a2x.id]);
      assert.deepStrictEqual(idsOf(b), [b1.id]);
      assert.ok(root.hasConsistentChildIndex());
      assert.ok(a.hasConsistentChildIndex());
    });

    it('should remove a deeply nested node', () => {
      const { root, a2, a2x } = buildTree();

      assert.strictEqual(root.removeChild(a2x.id), a2x);
      assert.strictEqual(a2.childCount, 0);
      assert.strictEqual(root.findChild(a2x.id), undefined);
    });

    it('should detach the whole subtree with the removed node', () => {
      const { root, a, a2x } = buildTree();

      const removed = root.removeChild(a.id);

      assert.strictEqual(removed, a);
      assert.strictEqual(root.findChild(a2x.id), undefined);
      assert.strictEqual(removed?.findChild(a2x.id), a2x);
    });

    it('should return undefined for an id outside the subtree', () => {
      const { root, a, b } = buildTree();
      const stranger = node();

      assert.strictEqual(root.removeChild(stranger.id), undefined);
      assert.deepStrictEqual(idsOf(root), [a.id, b.id]);
    });

    it('should not find the node itself as its own child', () => {
      const { root } = buildTree();
      assert.strictEqual(root.removeChild(root.id), undefined);
      assert.strictEqual(root.childCount, 2);
    });

    it('should keep the index consistent through mixed operations', () => {
      const root = node();
      const live: SceneNode<FakeTexture>[] = [];

      for (let i = 0; i < 12; i++) {
        const child = node();
        root.addChild(child);
        live.push(child);
        if (i % 4 === 3) {
          const victim = live.splice(1, 1)[0];
          assert.strictEqual(root.removeChild(victim.id), victim);
        }
        assert.ok(root.hasConsistentChildIndex());
      }

      assert.deepStrictEqual(idsOf(root), live.map((child) => child.id));
    });
  });

  describe('findChild', () => {
    it('should find direct children', () => {
      const { root, b } = buildTree();
      assert.strictEqual(root.findChild(b.id), b);
    });

    it('should find descendants depth-first', () => {
      const { root, a2x, b1 } = buildTree();
      assert.strictEqual(root.findChild(a2x.id), a2x);
      assert.strictEqual(root.findChild(b1.id), b1);
    });

    it('should return undefined for unknown ids', () => {
      const { root } = buildTree();
      assert.strictEqual(root.findChild(node().id), undefined);
    });

    it('should hand back a live node', () => {
      const { root, a2x } = buildTree();

      root.findChild(a2x.id)?.setPosition(7, 9);

      assert.deepStrictEqual(a2x.position, { x: 7, y: 9 });
    });
  });
});
