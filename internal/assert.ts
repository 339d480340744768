/** Throws an Error whose message is the arguments joined by spaces, unless `fact` holds. */
export function check(fact: unknown, ...args: unknown[]): asserts fact {
  if (!fact) {
    args.unshift('BTree:'); // at beginning of message
    throw new Error(args.join(' '));
  }
}
