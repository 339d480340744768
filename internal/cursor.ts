import { BNode, indexOf } from './nodes';

/** One level of the cursor's path: `index` is the next entry of `node` to yield. */
type Frame<K, V> = { node: BNode<K, V>, index: number };

/** An inclusive bound. Boxed so that `undefined` can still be used as a key. */
export type Bound<K> = { key: K };

/**
 * Lazy in-order cursor over a subtree. Instead of a generator it keeps an
 * explicit stack of frames from the root down to the node it is reading.
 * When a frame's next entry belongs to an internal node, the subtree before
 * that entry has already been yielded; after yielding it, the cursor descends
 * the leftmost path of the following child.
 *
 * Each cursor is independent and can only be consumed once. A cursor is
 * invalid once the tree it reads is modified; using it afterward has
 * unspecified results.
 */
export class Cursor<K, V> implements IterableIterator<[K, V]> {
  private _stack: Frame<K, V>[] = [];
  private _compare: (a: K, b: K) => number;
  private _high: Bound<K> | undefined;

  /**
   * @param low If provided, the cursor starts at the first key >= low.key;
   *        whole subtrees below it are never visited.
   * @param high If provided, the cursor stops before the first key > high.key.
   */
  constructor(root: BNode<K, V>, compare: (a: K, b: K) => number, low?: Bound<K>, high?: Bound<K>) {
    this._compare = compare;
    this._high = high;
    if (low === undefined)
      this.pushLeftmost(root);
    else
      this.seek(root, low.key);
  }

  next(): IteratorResult<[K, V]> {
    var stack = this._stack;
    while (stack.length !== 0) {
      var top = stack[stack.length - 1], node = top.node;
      if (top.index < node.keys.length) {
        var i = top.index++, key = node.keys[i];
        if (this._high !== undefined && this._compare(key, this._high.key) > 0) {
          stack.length = 0; // past the end of the range
          break;
        }
        if (!node.isLeaf)
          this.pushLeftmost(node.children[i + 1]);
        return { done: false, value: [key, node.values[i]] };
      }
      stack.pop();
    }
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  private pushLeftmost(node: BNode<K, V>) {
    for (;;) {
      this._stack.push({ node, index: 0 });
      if (node.isLeaf)
        return;
      node = node.children[0];
    }
  }

  // Builds the path to the first key >= low. Each frame stops at the
  // insertion position, so entries and subtrees to its left are skipped.
  private seek(node: BNode<K, V>, low: K) {
    for (;;) {
      var i = indexOf(node, low, -1, this._compare);
      if (i >= 0) { // exact match; it is the first entry to yield
        this._stack.push({ node, index: i });
        return;
      }
      this._stack.push({ node, index: ~i });
      if (node.isLeaf)
        return;
      node = node.children[~i];
    }
  }
}
