import { check } from './assert';
import { BInternal, BNode, BTreeNodeHost, indexOf, mergeChildren, takeFromLeft, takeFromRight } from './nodes';

type index = number;

/**
 * Removes `key` from the subtree rooted at `root` in a single downward pass.
 * Before entering any child, that child is topped up to at least B entries
 * (by borrowing from a sibling or merging with one), so removing an entry
 * never leaves a node below B-1 entries and nothing propagates back up.
 *
 * The root itself may be left with zero entries and one child; the tree
 * replaces such a root with its child afterward.
 * @returns true if a pair was found and removed, false otherwise.
 */
export function remove<K, V>(root: BNode<K, V>, key: K, tree: BTreeNodeHost<K, V>): boolean {
  var cmp = tree._compare, B = tree._branchingFactor;
  for (var node = root;;) {
    var i = indexOf(node, key, -1, cmp);
    if (node.isLeaf) {
      if (i < 0)
        return false;
      node.keys.splice(i, 1);
      node.values.splice(i, 1);
      tree._size--;
      return true;
    }

    if (i < 0) {
      // Not here; make room in the child that may hold it, then descend.
      node = node.children[ensureChildCanLose(node, ~i, B)];
      continue;
    }

    // Found in an internal node: the pair is a separator between two children.
    var left = node.children[i], right = node.children[i + 1];
    if (left.keys.length >= B) {
      takeMax(left, B, node, i);
    } else if (right.keys.length >= B) {
      takeMin(right, B, node, i);
    } else {
      // Both neighbours are minimal. After merging, the key sits in the middle
      // of `left` at index B-1 and is removed on the next iteration.
      node = mergeChildren(node, i);
      continue;
    }
    tree._size--;
    return true;
  }
}

/**
 * Ensures `parent.children[i]` holds at least B entries so that one can be
 * removed from it. Borrows from the left sibling, then the right, and merges
 * when neither can spare an entry.
 * @returns the index of the child that now covers the original child's range
 *          (i-1 if it was merged into its left sibling).
 */
export function ensureChildCanLose<K, V>(parent: BInternal<K, V>, i: index, B: number): index {
  var children = parent.children;
  if (children[i].keys.length >= B)
    return i;
  if (i > 0 && children[i - 1].keys.length >= B) {
    takeFromLeft(parent, i);
  } else if (i + 1 < children.length && children[i + 1].keys.length >= B) {
    takeFromRight(parent, i);
  } else if (i + 1 < children.length) {
    mergeChildren(parent, i);
  } else {
    check(i > 0, "internal node has a single child");
    mergeChildren(parent, --i);
  }
  return i;
}

/** Removes the largest pair under `node` and stores it at `dest.keys[j]`
 *  (the in-order predecessor of the separator being deleted). */
function takeMax<K, V>(node: BNode<K, V>, B: number, dest: BInternal<K, V>, j: index): void {
  while (!node.isLeaf)
    node = node.children[ensureChildCanLose(node, node.children.length - 1, B)];
  var last = node.keys.length - 1;
  dest.keys[j] = node.keys[last];
  dest.values[j] = node.values[last];
  node.keys.length = last;
  node.values.length = last;
}

/** Removes the smallest pair under `node` and stores it at `dest.keys[j]`
 *  (the in-order successor of the separator being deleted). */
function takeMin<K, V>(node: BNode<K, V>, B: number, dest: BInternal<K, V>, j: index): void {
  while (!node.isLeaf)
    node = node.children[ensureChildCanLose(node, 0, B)];
  dest.keys[j] = node.keys.splice(0, 1)[0];
  dest.values[j] = node.values.splice(0, 1)[0];
}
