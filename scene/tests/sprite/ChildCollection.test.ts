/**
 * Tests for the ordered child list and its id index.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ChildCollection } from '../../src/sprite/ChildCollection.js';

interface Item {
  readonly id: string;
}

function collectionOf(...ids: string[]): ChildCollection<Item> {
  const collection = new ChildCollection<Item>();
  for (const id of ids) {
    collection.add({ id });
  }
  return collection;
}

function idsOf(collection: ChildCollection<Item>): string[] {
  return collection.values().map((item) => item.id);
}

describe('ChildCollection', () => {
  it('should append items and record their positions', () => {
    const collection = collectionOf('a', 'b', 'c');

    assert.strictEqual(collection.size, 3);
    assert.deepStrictEqual(idsOf(collection), ['a', 'b', 'c']);
    assert.strictEqual(collection.indexOf('a'), 0);
    assert.strictEqual(collection.indexOf('c'), 2);
    assert.ok(collection.isConsistent());
  });

  it('should return the id from add', () => {
    const collection = new ChildCollection<Item>();
    assert.strictEqual(collection.add({ id: 'x' }), 'x');
  });

  it('should keep the first position when an id is added again', () => {
    const collection = collectionOf('a', 'b');

    assert.strictEqual(collection.add({ id: 'a' }), 'a');

    assert.deepStrictEqual(idsOf(collection), ['a', 'b']);
    assert.strictEqual(collection.indexOf('a'), 0);
    assert.ok(collection.isConsistent());
  });

  it('should reindex every later item after a removal', () => {
    const collection = collectionOf('a', 'b', 'c', 'd');

    const removed = collection.removeDirect('b');

    assert.deepStrictEqual(removed, { id: 'b' });
    assert.deepStrictEqual(idsOf(collection), ['a', 'c', 'd']);
    assert.strictEqual(collection.indexOf('a'), 0);
    assert.strictEqual(collection.indexOf('c'), 1);
    assert.strictEqual(collection.indexOf('d'), 2);
    assert.strictEqual(collection.indexOf('b'), -1);
    assert.ok(collection.isConsistent());
  });

  it('should handle removing the last item', () => {
    const collection = collectionOf('a', 'b');
    collection.removeDirect('b');
    assert.deepStrictEqual(idsOf(collection), ['a']);
    assert.ok(collection.isConsistent());
  });

  it('should return undefined for unknown ids and change nothing', () => {
    const collection = collectionOf('a', 'b');

    assert.strictEqual(collection.removeDirect('zzz'), undefined);
    assert.strictEqual(collection.getDirect('zzz'), undefined);
    assert.strictEqual(collection.has('zzz'), false);
    assert.deepStrictEqual(idsOf(collection), ['a', 'b']);
  });

  it('should look up direct items by id', () => {
    const collection = collectionOf('a', 'b');
    assert.deepStrictEqual(collection.getDirect('b'), { id: 'b' });
    assert.strictEqual(collection.has('a'), true);
  });

  it('should iterate in insertion order', () => {
    const collection = collectionOf('a', 'b', 'c');
    const seen: string[] = [];
    for (const item of collection) {
      seen.push(item.id);
    }
    assert.deepStrictEqual(seen, ['a', 'b', 'c']);
  });

  it('should stay consistent across interleaved adds and removals', () => {
    const collection = new ChildCollection<Item>();
    const expected: string[] = [];

    for (let i = 0; i < 20; i++) {
      collection.add({ id: `n${i}` });
      expected.push(`n${i}`);
      if (i % 3 === 2) {
        const victim = expected[Math.floor(expected.length / 2)];
        collection.removeDirect(victim);
        expected.splice(expected.indexOf(victim), 1);
      }
      assert.ok(collection.isConsistent(), `inconsistent after step ${i}`);
    }

    assert.deepStrictEqual(idsOf(collection), expected);
    expected.forEach((id, position) => assert.strictEqual(collection.indexOf(id), position));
  });
});
