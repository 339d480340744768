import { BNode, BTreeNodeHost, indexOf, maxKeys, splitChild } from './nodes';

/**
 * Adds or overwrites a pair in the subtree rooted at `root` in a single
 * downward pass. Every full child is split before it is entered, so the leaf
 * that receives the key always has room and nothing propagates back up.
 * Precondition: `root` is not full (the tree splits a full root itself).
 * @returns true if a new key-value pair was added.
 */
export function insert<K, V>(root: BNode<K, V>, key: K, value: V, overwrite: boolean | undefined, tree: BTreeNodeHost<K, V>): boolean {
  var cmp = tree._compare, max = maxKeys(tree._branchingFactor);
  for (var node = root;;) {
    var i = indexOf(node, key, -1, cmp);
    if (i >= 0) {
      // Key already exists (possibly as a separator)
      if (overwrite !== false) {
        // usually this is a no-op, but some users may wish to edit the key
        node.keys[i] = key;
        node.values[i] = value;
      }
      return false;
    }
    i = ~i;
    if (node.isLeaf) {
      node.keys.splice(i, 0, key);
      node.values.splice(i, 0, value);
      tree._size++;
      return true;
    }

    if (node.children[i].keys.length >= max) {
      splitChild(node, i, tree._branchingFactor);
      // The median now sits at keys[i]; decide which half receives the key.
      var c = cmp(key, node.keys[i]);
      if (c === 0) {
        if (overwrite !== false) {
          node.keys[i] = key;
          node.values[i] = value;
        }
        return false;
      }
      if (c > 0)
        i++;
    }
    node = node.children[i];
  }
}
