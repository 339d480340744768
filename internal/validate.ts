import { check } from './assert';
import { BNode, BTreeNodeHost, maxKeys, minKeys } from './nodes';

/** Exclusive key bounds that every key of a subtree must lie between. */
type Bounds<K> = { low?: { key: K }, high?: { key: K } };

/**
 * Checks every structural invariant of the subtree rooted at `node` and
 * returns the number of pairs in it along with the depth of its leaves.
 * Throws if the node sizes, children counts, key order, separator bounds
 * or leaf depths are wrong.
 */
export function checkNode<K, V>(node: BNode<K, V>, depth: number, tree: BTreeNodeHost<K, V>, bounds: Bounds<K>): { size: number, leafDepth: number } {
  var cmp = tree._compare, B = tree._branchingFactor;
  var keys = node.keys, kL = keys.length, vL = node.values.length;
  check(kL === vL, "keys/values length mismatch: depth", depth, "with lengths", kL, vL);
  check(kL <= maxKeys(B), "too many keys (", kL, ") at depth", depth, "branching factor:", B);
  if (depth > 0)
    check(kL >= minKeys(B), "too few keys (", kL, ") at depth", depth, "branching factor:", B);
  else
    check(node.isLeaf || kL > 0, "internal root has no keys");

  for (var i = 0; i < kL; i++) {
    if (i > 0 && !(cmp(keys[i - 1], keys[i]) < 0))
      check(false, "sort violation at depth", depth, "index", i, "keys", keys[i - 1], keys[i]);
    if (bounds.low !== undefined && !(cmp(bounds.low.key, keys[i]) < 0))
      check(false, "key", keys[i], "at depth", depth, "is not above separator", bounds.low.key);
    if (bounds.high !== undefined && !(cmp(keys[i], bounds.high.key) < 0))
      check(false, "key", keys[i], "at depth", depth, "is not below separator", bounds.high.key);
  }

  if (node.isLeaf)
    return { size: kL, leafDepth: depth };

  var children = node.children, cL = children.length;
  check(cL === kL + 1, "keys/children length mismatch: depth", depth, "lengths", kL, cL);
  var size = kL, leafDepth = -1;
  for (var i = 0; i < cL; i++) {
    var sub = checkNode(children[i], depth + 1, tree, {
      low: i > 0 ? { key: keys[i - 1] } : bounds.low,
      high: i < kL ? { key: keys[i] } : bounds.high,
    });
    if (leafDepth < 0)
      leafDepth = sub.leafDepth;
    check(sub.leafDepth === leafDepth, "leaves at unequal depths", leafDepth, "and", sub.leafDepth);
    size += sub.size;
  }
  return { size, leafDepth };
}
