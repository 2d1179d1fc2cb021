export type NodeId = string;

export interface Identifiable {
  readonly id: NodeId;
}

/**
 * Ordered list with an id → position side table.
 *
 * Order is draw order. The index map is always the exact inverse of the
 * list's id → position relationship; removal reindexes every later item.
 */
export class ChildCollection<T extends Identifiable> implements Iterable<T> {
  private readonly items: T[] = [];
  private readonly index = new Map<NodeId, number>();

  get size(): number {
    return this.items.length;
  }

  /**
   * Append `item` and record its position. Returns its id.
   * An id that is already present keeps its current position.
   */
  add(item: T): NodeId {
    if (this.index.has(item.id)) {
      return item.id;
    }
    this.items.push(item);
    this.index.set(item.id, this.items.length - 1);
    return item.id;
  }

  has(id: NodeId): boolean {
    return this.index.has(id);
  }

  indexOf(id: NodeId): number {
    return this.index.get(id) ?? -1;
  }

  /** Direct lookup only, no descent */
  getDirect(id: NodeId): T | undefined {
    const position = this.index.get(id);
    return position === undefined ? undefined : this.items[position];
  }

  /**
   * Remove a direct member by id.
   */
  removeDirect(id: NodeId): T | undefined {
    const position = this.index.get(id);
    if (position === undefined) {
      return undefined;
    }

    this.index.delete(id);
    const [removed] = this.items.splice(position, 1);

    // Everything after the hole shifted down by one
    for (let i = position; i < this.items.length; i++) {
      this.index.set(this.items[i].id, i);
    }

    return removed;
  }

  values(): readonly T[] {
    return this.items;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  /**
   * True when every indexed id points at the item carrying it and every item
   * is indexed exactly once.
   */
  isConsistent(): boolean {
    if (this.index.size !== this.items.length) {
      return false;
    }
    for (const [id, position] of this.index) {
      if (this.items[position]?.id !== id) {
        return false;
      }
    }
    return this.items.every((item, position) => this.index.get(item.id) === position);
  }
}
