import { check } from './assert';

type index = number;

/** @internal */
export interface BTreeNodeHost<K, V> {
  _compare: (a: K, b: K) => number;
  _size: number;
  /** Minimum degree B: non-root nodes hold B-1 to 2B-1 entries. */
  _branchingFactor: number;
}

/** Leaf node: a sorted run of entries with no children. */
export interface BLeaf<K, V> {
  readonly isLeaf: true;
  keys: K[];
  values: V[];
}

/** Internal node. Unlike a B+ tree, the separators are entries of the map:
 *  keys[i] and values[i] form a pair, and keys[i] lies strictly between the
 *  keys of children[i] and children[i+1]. */
export interface BInternal<K, V> {
  readonly isLeaf: false;
  keys: K[];
  values: V[];
  // always keys.length + 1
  children: BNode<K, V>[];
}

export type BNode<K, V> = BLeaf<K, V> | BInternal<K, V>;

export const DefaultBranchingFactor = 16;
export const MaxBranchingFactor = 1024;

export function newLeaf<K, V>(keys: K[] = [], values: V[] = []): BLeaf<K, V> {
  return { isLeaf: true, keys, values };
}

export function newInternal<K, V>(children: BNode<K, V>[], keys: K[] = [], values: V[] = []): BInternal<K, V> {
  return { isLeaf: false, keys, values, children };
}

/////////////////////////////////////////////////////////////////////////////
// Capacity policy //////////////////////////////////////////////////////////

/** Most entries any node may hold. */
export function maxKeys(branchingFactor: number): number {
  return 2 * branchingFactor - 1;
}

/** Fewest entries a non-root node may hold. */
export function minKeys(branchingFactor: number): number {
  return branchingFactor - 1;
}

/** Validates the constructor's branching factor. Undefined selects the default;
 *  values above MaxBranchingFactor are clamped. */
export function normalizeBranchingFactor(branchingFactor: number | undefined): number {
  if (branchingFactor === undefined)
    return DefaultBranchingFactor;
  check(Number.isFinite(branchingFactor) && branchingFactor >= 2, "branching factor must be an integer >= 2, got", branchingFactor);
  return Math.min(Math.floor(branchingFactor), MaxBranchingFactor);
}

/////////////////////////////////////////////////////////////////////////////
// Search ///////////////////////////////////////////////////////////////////

// Binary search. If key not found, returns i^failXor where i is the insertion
// index. Callers that don't care whether there was a match will set failXor=0.
export function indexOf<K, V>(node: BNode<K, V>, key: K, failXor: number, cmp: (a: K, b: K) => number): index {
  const keys = node.keys;
  var lo = 0, hi = keys.length, mid = hi >> 1;
  while (lo < hi) {
    var c = cmp(keys[mid], key);
    if (c < 0)
      lo = mid + 1;
    else if (c > 0) // key < keys[mid]
      hi = mid;
    else if (c === 0)
      return mid;
    else // c is NaN or otherwise invalid
      throw new Error(key === key ? "BTree: comparator returned NaN" : "BTree: NaN was used as a key");
    mid = (lo + hi) >> 1;
  }
  return mid ^ failXor;
}

/** Leftmost-path descent: the node holding the smallest entry. */
export function leftmostLeaf<K, V>(node: BNode<K, V>): BLeaf<K, V> {
  while (!node.isLeaf)
    node = node.children[0];
  return node;
}

/** Rightmost-path descent: the node holding the largest entry. */
export function rightmostLeaf<K, V>(node: BNode<K, V>): BLeaf<K, V> {
  while (!node.isLeaf)
    node = node.children[node.children.length - 1];
  return node;
}

/////////////////////////////////////////////////////////////////////////////
// Structural edits shared by insertion and deletion ////////////////////////

/**
 * Splits the full child `parent.children[i]` (2B-1 entries) around its median.
 * The median entry moves up into `parent` at position i; the upper B-1 entries
 * (and B children) move to a new right sibling at children[i+1].
 * Reminder: `parent` must have room for one more entry.
 */
export function splitChild<K, V>(parent: BInternal<K, V>, i: index, branchingFactor: number): void {
  const child = parent.children[i];
  const half = branchingFactor - 1;
  const rightKeys = child.keys.splice(half + 1);
  const rightValues = child.values.splice(half + 1);
  const medianKey = child.keys.splice(half, 1)[0];
  const medianValue = child.values.splice(half, 1)[0];
  const sibling: BNode<K, V> = child.isLeaf
    ? newLeaf(rightKeys, rightValues)
    : newInternal(child.children.splice(half + 1), rightKeys, rightValues);
  parent.keys.splice(i, 0, medianKey);
  parent.values.splice(i, 0, medianValue);
  parent.children.splice(i + 1, 0, sibling);
}

/**
 * Moves the separator parent.keys[i-1] down to the front of children[i] and
 * the last entry of children[i-1] up to replace it (a right rotation).
 */
export function takeFromLeft<K, V>(parent: BInternal<K, V>, i: index): void {
  const child = parent.children[i], lhs = parent.children[i - 1];
  const last = lhs.keys.length - 1;
  child.keys.unshift(parent.keys[i - 1]);
  child.values.unshift(parent.values[i - 1]);
  parent.keys[i - 1] = lhs.keys[last];
  parent.values[i - 1] = lhs.values[last];
  lhs.keys.length = last;
  lhs.values.length = last;
  if (!child.isLeaf) {
    check(!lhs.isLeaf, "sibling type mismatch at child", i - 1);
    child.children.unshift(lhs.children.splice(last + 1, 1)[0]);
  }
}

/**
 * Moves the separator parent.keys[i] down to the end of children[i] and the
 * first entry of children[i+1] up to replace it (a left rotation).
 */
export function takeFromRight<K, V>(parent: BInternal<K, V>, i: index): void {
  const child = parent.children[i], rhs = parent.children[i + 1];
  child.keys.push(parent.keys[i]);
  child.values.push(parent.values[i]);
  parent.keys[i] = rhs.keys.splice(0, 1)[0];
  parent.values[i] = rhs.values.splice(0, 1)[0];
  if (!child.isLeaf) {
    check(!rhs.isLeaf, "sibling type mismatch at child", i + 1);
    child.children.push(rhs.children.splice(0, 1)[0]);
  }
}

/**
 * Merges children[i], the separator at i, and children[i+1] into children[i],
 * removing one entry and one child from `parent`. The right sibling is discarded.
 */
export function mergeChildren<K, V>(parent: BInternal<K, V>, i: index): BNode<K, V> {
  const child = parent.children[i], rhs = parent.children[i + 1];
  child.keys.push(parent.keys[i], ...rhs.keys);
  child.values.push(parent.values[i], ...rhs.values);
  if (!child.isLeaf) {
    check(!rhs.isLeaf, "sibling type mismatch at child", i + 1);
    child.children.push(...rhs.children);
  }
  parent.keys.splice(i, 1);
  parent.values.splice(i, 1);
  parent.children.splice(i + 1, 1);
  return child;
}
