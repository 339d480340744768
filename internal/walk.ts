import { BNode } from './nodes';

/** What a walk callback may return to stop early. */
export type WalkResult<R> = {break?: R} | void;

/**
 * Recursive in-order walk: child 0, entry 0, child 1, entry 1, ..., last child.
 * Entries reach `onFound` in strictly increasing key order.
 *
 * Note: `count` is the next value of the third argument to `onFound`.
 * Returns the new value of the counter, or {break:R} if the callback asked
 * to stop.
 */
export function walk<K, V, R>(node: BNode<K, V>, count: number,
  onFound: (k: K, v: V, counter: number) => WalkResult<R>): {break: R} | number
{
  var keys = node.keys, values = node.values, result: WalkResult<R>, sub: {break: R} | number;
  if (node.isLeaf) {
    for (var i = 0; i < keys.length; i++) {
      result = onFound(keys[i], values[i], count++);
      if (result !== undefined && result.break !== undefined)
        return { break: result.break };
    }
    return count;
  }

  var children = node.children;
  for (var i = 0; i < keys.length; i++) {
    sub = walk(children[i], count, onFound);
    if (typeof sub !== 'number')
      return sub;
    count = sub;
    result = onFound(keys[i], values[i], count++);
    if (result !== undefined && result.break !== undefined)
      return { break: result.break };
  }
  return walk(children[keys.length], count, onFound);
}
