import { ISortedMap } from './interfaces';
import { check } from './internal/assert';
import { Cursor } from './internal/cursor';
import { remove } from './internal/delete';
import { insert } from './internal/insert';
import {
  BNode, leftmostLeaf, maxKeys, newInternal, newLeaf, normalizeBranchingFactor, rightmostLeaf, splitChild
} from './internal/nodes';
import { findEntry } from './internal/search';
import { checkNode } from './internal/validate';
import { walk } from './internal/walk';

export type {
  ISetSource, IMapSource, IMapSink, IMap, ISortedMapSource, ISortedMap
} from './interfaces';

/**
 * Types that BTree supports by default
 */
export type DefaultComparable = number | string | Date | boolean | null | undefined | (number | string)[] |
               { valueOf: () => number | string | Date | boolean | null | undefined | (number | string)[] };

/**
 * Compares DefaultComparables to form a total ordering.
 *
 * Handles +/-0 and NaN like Map: NaN is equal to NaN, and -0 is equal to +0.
 * NaN is ordered below every other number.
 *
 * Arrays are compared by their string forms (as `<` and `>` would), which may
 * cause unexpected equality: for example [1] will be considered equal to ['1'].
 *
 * Two objects with equal valueOf compare the same, but compare unequal to
 * primitives that have the same value.
 */
export const defaultComparator: (a: DefaultComparable, b: DefaultComparable) => number = compareKeys;

function compareKeys(a: unknown, b: unknown): number {
  // Special case finite numbers first for performance.
  if (typeof a === 'number' && typeof b === 'number' && Number.isFinite(a) && Number.isFinite(b))
    return a - b;

  // The default < and > operators are not totally ordered. To allow types to be mixed
  // in a single collection, compare types and order values of different types by type.
  var ta = typeof a, tb = typeof b;
  if (ta !== tb)
    return ta < tb ? -1 : 1;

  if (typeof a === 'object' && typeof b === 'object') {
    // standardized JavaScript bug: null is not an object, but typeof says it is
    if (a === null)
      return b === null ? 0 : -1;
    else if (b === null)
      return 1;
    if (!Array.isArray(a) || !Array.isArray(b)) {
      var va: unknown = a.valueOf(), vb: unknown = b.valueOf();
      // Deal with the two valueOf()s producing different types
      if (typeof va !== typeof vb)
        return typeof va < typeof vb ? -1 : 1;
      if (va === a || vb === b)
        return va === vb ? 0 : Number.NaN; // objects without a usable valueOf are unordered
      return compareKeys(va, vb);
    }
    var sa = String(a), sb = String(b);
    return sa < sb ? -1 : sa > sb ? 1 : 0;
  }

  if (typeof a === 'number' && typeof b === 'number') {
    if (a < b) return -1;
    if (a > b) return 1;
    if (a === b) return 0;
    // Order NaN less than other numbers
    if (Number.isNaN(a))
      return Number.isNaN(b) ? 0 : -1;
    return 1;
  }
  if (typeof a === 'string' && typeof b === 'string')
    return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean')
    return a === b ? 0 : a ? 1 : -1;
  return a === b ? 0 : Number.NaN; // both undefined, or unsupported types
}

/**
 * A collection of key-value pairs sorted by key, largely compatible with the
 * standard Map. BTree is a classic B-tree: every node, internal or leaf,
 * stores a sorted run of pairs, and an internal node with n pairs has n+1
 * children whose keys lie between its pairs. Storing many pairs per node keeps
 * the tree shallow, so lookups, insertions and deletions are O(log size).
 *
 * The size of nodes is governed by the branching factor B (the minimum
 * degree): every node except the root holds between B-1 and 2B-1 pairs, and
 * all leaves are at the same depth. Insertion splits full nodes on the way
 * down and deletion tops up minimal nodes on the way down, so neither ever
 * has to walk back up the tree.
 *
 * Confusingly, the ES6 Map.forEach(c) method calls c(value,key) instead of
 * c(key,value), in contrast to other methods such as set() and entries()
 * which put the key first. BTree's forEach() therefore works the same way,
 * but a second method `.forEachPair((key,value)=>{...})` is provided which
 * sends you the key first and the value second.
 *
 * Out of the box, BTree supports keys that are numbers, strings, arrays of
 * numbers/strings, Date, and objects that have a valueOf() method returning a
 * number or string. Other data types require a custom comparator, which you
 * must pass as the second argument to the constructor (the first argument is
 * an optional list of initial items).
 *
 * @example
 * Given a {name: string, age: number} object, you can create a tree sorted by
 * name and then by age like this:
 *
 *     var tree = new BTree<{name: string, age: number}, string>(undefined, (a, b) => {
 *       if (a.name > b.name)
 *         return 1; // Return a number >0 when a > b
 *       else if (a.name < b.name)
 *         return -1; // Return a number <0 when a < b
 *       else // names are equal
 *         return a.age - b.age; // Return >0 when a.age > b.age
 *     });
 *
 *     tree.set({name:"Bill", age:17}, "happy");
 *     tree.set({name:"Fran", age:40}, "busy & stressed");
 *     tree.forEachPair((k, v) => {
 *       console.log(`Name: ${k.name} Age: ${k.age} Status: ${v}`);
 *     });
 *
 * @description
 * Iterators (`entries`, `keys`, `values`, `range`) read the tree lazily.
 * Modifying the tree while one of them is still in use has unspecified
 * results; finish or discard the iterator first.
 */
export default class BTree<K=any, V=any> implements ISortedMap<K,V>
{
  private _root: BNode<K,V> = newLeaf<K,V>();
  /** @internal number of pairs in the tree */
  _size = 0;
  /** @internal minimum degree: non-root nodes hold B-1 to 2B-1 pairs */
  _branchingFactor: number;

  /**
   * provides a total order over keys
   * @returns a negative value if a < b, 0 if a === b and a positive value if a > b
   */
  _compare: (a:K, b:K) => number;

  /**
   * Initializes an empty B-tree.
   * @param entries A set of key-value pairs to initialize the tree. When a key
   *   appears more than once, the last pair wins.
   * @param compare Custom function to compare pairs of elements in the tree.
   *   If not specified, defaultComparator will be used which is valid as long as K extends DefaultComparable.
   * @param branchingFactor Minimum degree B (default 16): nodes hold at most
   *   2B-1 pairs. Must be at least 2; values above 1024 are reduced to 1024.
   */
  public constructor(entries?: [K,V][], compare?: (a: K, b: K) => number, branchingFactor?: number) {
    this._branchingFactor = normalizeBranchingFactor(branchingFactor);
    this._compare = compare || compareKeys;
    if (entries)
      this.setPairs(entries);
  }

  /** Builds a tree by adding each pair in turn (later duplicates win). */
  static fromArray<K,V>(pairs: [K,V][], compare?: (a: K, b: K) => number, branchingFactor?: number): BTree<K,V> {
    return new BTree<K,V>(pairs, compare, branchingFactor);
  }

  /** Builds a tree from any sequence of pairs, such as a Map or a generator. */
  static fromIterable<K,V>(pairs: Iterable<[K,V]>, compare?: (a: K, b: K) => number, branchingFactor?: number): BTree<K,V> {
    var tree = new BTree<K,V>(undefined, compare, branchingFactor);
    for (var [k, v] of pairs)
      tree.set(k, v);
    return tree;
  }

  /////////////////////////////////////////////////////////////////////////////
  // ES6 Map<K,V> methods /////////////////////////////////////////////////////

  /** Gets the number of key-value pairs in the tree. */
  get size(): number { return this._size; }
  /** Gets the number of key-value pairs in the tree. */
  get length(): number { return this._size; }
  /** Returns true iff the tree contains no key-value pairs. */
  get isEmpty(): boolean { return this._size === 0; }

  /** Releases the tree so that its size is 0. */
  clear() {
    this._root = newLeaf<K,V>();
    this._size = 0;
  }

  /** Runs a function for each key-value pair, in order from smallest to
   *  largest key. For compatibility with ES6 Map, the argument order to
   *  the callback is backwards: value first, then key. Call forEachPair
   *  instead to receive the key as the first argument.
   * @param thisArg If provided, this parameter is assigned as the `this`
   *        value for each callback.
   * @returns the number of values that were sent to the callback. */
  forEach(callback: (v:V, k:K, tree:BTree<K,V>) => void, thisArg?: unknown): number {
    if (thisArg !== undefined)
      callback = callback.bind(thisArg);
    return this.forEachPair((k, v) => { callback(v, k, this); });
  }

  /** Runs a function for each key-value pair, in order from smallest to
   *  largest key. The callback can return {break:R} (where R is any value
   *  except undefined) to stop immediately and return R from forEachPair.
   * @param callback A function that is called for each key-value pair. Its
   *        third argument counts up from `initialCounter`.
   * @param initialCounter This is the value of the third argument of
   *        `callback` the first time it is called. Default value: 0
   * @returns the number of pairs sent to the callback (plus initialCounter,
   *        if you provided one). If the callback returned {break:R} then
   *        the R value is returned instead.
   * @description Computational complexity: O(size) */
  forEachPair<R=number>(callback: (k:K, v:V, counter:number) => {break?:R}|void, initialCounter?: number): R|number {
    var result = walk(this._root, initialCounter || 0, callback);
    return typeof result === 'number' ? result : result.break;
  }

  /**
   * Finds a pair in the tree and returns the associated value.
   * @param defaultValue a value to return if the key was not found.
   * @returns the value, or defaultValue if the key was not found.
   * @description Computational complexity: O(log size)
   */
  get(key: K, defaultValue?: V): V | undefined {
    var found = findEntry(this._root, key, this._compare);
    return found === undefined ? defaultValue : found.node.values[found.index];
  }

  /**
   * Adds or overwrites a key-value pair in the B-tree.
   * @param key the key is used to determine the sort order of
   *        data in the tree.
   * @param value data to associate with the key
   * @param overwrite Whether to overwrite an existing key-value pair
   *        (default: true). If this is false and there is an existing
   *        key-value pair then this method has no effect.
   * @returns true if a new key-value pair was added.
   * @description Computational complexity: O(log size)
   * Note: when overwriting a previous entry, the key is updated
   * as well as the value. This has no effect unless the new key
   * has data that does not affect its sort order.
   */
  set(key: K, value: V, overwrite?: boolean): boolean {
    var root = this._root;
    if (root.keys.length >= maxKeys(this._branchingFactor)) {
      // Root is full: give it a new parent and split it. This is the only
      // place where the tree gets taller.
      var newRoot = newInternal<K,V>([root]);
      splitChild(newRoot, 0, this._branchingFactor);
      this._root = root = newRoot;
    }
    return insert(root, key, value, overwrite, this);
  }

  /** Synonym for set(). */
  add(key: K, value: V): boolean {
    return this.set(key, value);
  }

  /**
   * Returns true if the key exists in the B-tree, false if not.
   * Use get() for best performance; use has() if you need to
   * distinguish between "undefined value" and "key not present".
   * @param key Key to detect
   * @description Computational complexity: O(log size)
   */
  has(key: K): boolean {
    return findEntry(this._root, key, this._compare) !== undefined;
  }

  /**
   * Removes a single key-value pair from the B-tree.
   * @param key Key to find
   * @returns true if a pair was found and removed, false otherwise.
   * @description Computational complexity: O(log size)
   */
  delete(key: K): boolean {
    var root = this._root;
    var removed = remove(root, key, this);
    if (!root.isLeaf && root.keys.length === 0) {
      // The root's last two children were merged; drop a level.
      this._root = root.children[0];
    }
    return removed;
  }

  /** Synonym for delete(). */
  remove(key: K): boolean {
    return this.delete(key);
  }

  /////////////////////////////////////////////////////////////////////////////
  // Iterator methods /////////////////////////////////////////////////////////

  /** Returns an iterator that provides items in order (ascending order if
   *  the collection's comparator uses ascending order, as is the default.)
   *  @param lowestKey First key to be iterated, or undefined to start at
   *         minKey(). If the specified key doesn't exist then iteration
   *         starts at the next higher key (according to the comparator).
   */
  entries(lowestKey?: K): IterableIterator<[K,V]> {
    return new Cursor<K,V>(this._root, this._compare, lowestKey === undefined ? undefined : { key: lowestKey });
  }

  [Symbol.iterator](): IterableIterator<[K,V]> {
    return this.entries();
  }

  /** Returns a new iterator for iterating the keys of each pair in ascending order.
   *  @param firstKey: Minimum key to include in the output. */
  keys(firstKey?: K): IterableIterator<K> {
    var it = this.entries(firstKey);
    return iterator<K>((): IteratorResult<K> => {
      var n = it.next();
      return n.done ? n : { done: false, value: n.value[0] };
    });
  }

  /** Returns a new iterator for iterating the values of each pair in order by key.
   *  @param firstKey: Minimum key whose associated value is included in the output. */
  values(firstKey?: K): IterableIterator<V> {
    var it = this.entries(firstKey);
    return iterator<V>((): IteratorResult<V> => {
      var n = it.next();
      return n.done ? n : { done: false, value: n.value[1] };
    });
  }

  /**
   * Returns an iterator over the pairs whose keys are between `low` and
   * `high`, inclusive, in ascending order. Yields nothing if low > high.
   * @description Computational complexity: O(log size + number of pairs yielded)
   */
  range(low: K, high: K): IterableIterator<[K,V]> {
    return new Cursor<K,V>(this._root, this._compare, { key: low }, { key: high });
  }

  /////////////////////////////////////////////////////////////////////////////
  // Additional methods ///////////////////////////////////////////////////////

  /** Returns the branching factor (minimum degree) chosen at construction. */
  get branchingFactor() {
    return this._branchingFactor;
  }

  /** Returns the maximum number of pairs a node can hold before it splits. */
  get maxNodeSize() {
    return maxKeys(this._branchingFactor);
  }

  /** Number of levels in the tree: 1 while the root is a leaf. */
  get height(): number {
    var h = 1;
    for (var node = this._root; !node.isLeaf; node = node.children[0])
      h++;
    return h;
  }

  /** Gets the lowest key in the tree. Complexity: O(log size) */
  minKey(): K | undefined {
    return leftmostLeaf(this._root).keys[0];
  }

  /** Gets the highest key in the tree. Complexity: O(log size) */
  maxKey(): K | undefined {
    var keys = rightmostLeaf(this._root).keys;
    return keys[keys.length - 1];
  }

  /** Gets an array filled with the contents of the tree, sorted by key */
  toArray(): [K,V][] {
    var results: [K,V][] = [];
    this.forEachPair((k, v) => { results.push([k, v]); });
    return results;
  }

  /** Gets an array of all keys, sorted */
  keysArray(): K[] {
    var results: K[] = [];
    this.forEachPair(k => { results.push(k); });
    return results;
  }

  /** Gets an array of all values, sorted by key */
  valuesArray(): V[] {
    var results: V[] = [];
    this.forEachPair((k, v) => { results.push(v); });
    return results;
  }

  /** Gets a string representing the tree's data based on toArray(). */
  toString() {
    return this.toArray().toString();
  }

  /**
   * Gets an array of key-value pairs from `low` to `high`, inclusive.
   * @param maxLength Length limit. getRange will stop scanning the tree when
   *                  the array reaches this size.
   * @description Computational complexity: O(result.length + log size)
   */
  getRange(low: K, high: K, maxLength: number = 0x3FFFFFF): [K,V][] {
    var results: [K,V][] = [];
    if (maxLength <= 0)
      return results;
    for (var pair of this.range(low, high)) {
      results.push(pair);
      if (results.length >= maxLength)
        break;
    }
    return results;
  }

  /** Stores a key-value pair only if the key doesn't already exist in the tree.
   * @returns true if a new key was added
   */
  setIfNotPresent(key: K, value: V): boolean {
    return this.set(key, value, false);
  }

  /** Adds all pairs from a list of key-value pairs.
   * @param pairs Pairs to add to this tree. If there are duplicate keys,
   *        later pairs currently overwrite earlier ones (e.g. [[0,1],[0,7]]
   *        associates 0 with 7.)
   * @param overwrite Whether to overwrite pairs that already exist (if false,
   *        pairs[i] is ignored when the key pairs[i][0] already exists.)
   * @returns The number of pairs added to the collection.
   * @description Computational complexity: O(pairs.length * log(size + pairs.length))
   */
  setPairs(pairs: [K,V][], overwrite?: boolean): number {
    var added = 0;
    for (var i = 0; i < pairs.length; i++)
      if (this.set(pairs[i][0], pairs[i][1], overwrite))
        added++;
    return added;
  }

  /** Deletes a series of keys from the collection.
   * @returns The number of keys that were found and removed. */
  deleteKeys(keys: K[]): number {
    for (var i = 0, r = 0; i < keys.length; i++)
      if (this.delete(keys[i]))
        r++;
    return r;
  }

  /**
   * Returns true if both trees hold the same pairs in the same order. Keys are
   * compared with this tree's comparator, values with `valueEquals`. The shape
   * of the trees does not matter, so trees with different branching factors
   * or histories can be equal.
   * @param valueEquals Value equality test (default: Object.is)
   * @description Computational complexity: O(size)
   */
  equals(other: BTree<K,V>, valueEquals: (a: V, b: V) => boolean = Object.is): boolean {
    if (this._size !== other._size)
      return false;
    var a = this.entries(), b = other.entries(), cmp = this._compare;
    for (;;) {
      var x = a.next(), y = b.next();
      if (x.done || y.done)
        return !!x.done && !!y.done;
      if (cmp(x.value[0], y.value[0]) !== 0 || !valueEquals(x.value[1], y.value[1]))
        return false;
    }
  }

  /** Scans the tree for signs of serious bugs (e.g. this.size doesn't match
   *  number of elements, a node above or below its size limits, keys out of
   *  order, or leaves at different depths). Throws an Error describing the
   *  first problem found.
   *  Computational complexity: O(size) */
  checkValid() {
    var { size } = checkNode(this._root, 0, this, {});
    check(size === this._size, "size mismatch: counted", size, "but stored", this._size);
  }
}

function iterator<T>(next: () => IteratorResult<T>): IterableIterator<T> {
  var result: IterableIterator<T> = {
    next,
    [Symbol.iterator]() { return result; }
  };
  return result;
}
