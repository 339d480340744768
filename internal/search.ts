import { BNode, indexOf } from './nodes';

/** Where a key was found: the node holding it and its index there. */
export type FoundEntry<K, V> = { node: BNode<K, V>, index: number };

/**
 * Finds the node holding `key`. Each level is binary-searched; an exact match
 * in a leaf or in an internal node's separators ends the search, otherwise it
 * descends into the child at the insertion position.
 * @description Computational complexity: O(log size)
 */
export function findEntry<K, V>(root: BNode<K, V>, key: K, cmp: (a: K, b: K) => number): FoundEntry<K, V> | undefined {
  for (var node = root;;) {
    var i = indexOf(node, key, -1, cmp);
    if (i >= 0)
      return { node, index: i };
    if (node.isLeaf)
      return undefined;
    node = node.children[~i];
  }
}
