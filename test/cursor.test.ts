import BTree from '../b-tree';
import { range1, treeOf } from './shared';

describe('Range cursor', () =>
{
  // [[4]], [[2],[6,8]], [[1],[3],[5],[7],[9,10]]
  const tree = treeOf(2, range1(10));
  const pairs = (keys: number[]) => keys.map(k => [k, k * 10]);

  test('inclusive bounds across internal separators', () => {
    expect(Array.from(tree.range(3, 8))).toEqual(pairs([3, 4, 5, 6, 7, 8]));
    expect(Array.from(tree.range(4, 4))).toEqual(pairs([4]));
    expect(Array.from(tree.range(8, 9))).toEqual(pairs([8, 9]));
  });

  test('bounds between keys', () => {
    expect(Array.from(tree.range(4.5, 5.5))).toEqual(pairs([5]));
    expect(Array.from(tree.range(-1, 2.5))).toEqual(pairs([1, 2]));
    expect(Array.from(tree.range(9.5, 100))).toEqual(pairs([10]));
  });

  test('empty ranges', () => {
    expect(Array.from(tree.range(8, 3))).toEqual([]);
    expect(Array.from(tree.range(0, 0))).toEqual([]);
    expect(Array.from(tree.range(11, 20))).toEqual([]);
    expect(Array.from(tree.range(5.2, 5.8))).toEqual([]);
    expect(Array.from(new BTree<number, number>().range(0, 10))).toEqual([]);
  });

  test('the whole tree', () => {
    expect(Array.from(tree.range(-Infinity, Infinity))).toEqual(tree.toArray());
  });

  test('an exhausted cursor stays done', () => {
    const it = tree.range(9, 10);
    expect(it.next()).toEqual({ done: false, value: [9, 90] });
    expect(it.next()).toEqual({ done: false, value: [10, 100] });
    expect(it.next().done).toBe(true);
    expect(it.next().done).toBe(true);
  });

  test('cursors are independent', () => {
    const a = tree.range(1, 10), b = tree.range(5, 7);
    expect(a.next().value).toEqual([1, 10]);
    expect(b.next().value).toEqual([5, 50]);
    expect(a.next().value).toEqual([2, 20]);
    expect(b.next().value).toEqual([6, 60]);
    expect(Array.from(b)).toEqual(pairs([7]));
    expect(Array.from(a)).toEqual(pairs([3, 4, 5, 6, 7, 8, 9, 10]));
  });

  test('a cursor is its own iterable', () => {
    const it = tree.entries();
    expect(it[Symbol.iterator]()).toBe(it);
  });
});

describe('entries from a lowest key', () =>
{
  const tree = treeOf(2, range1(10));

  test('starting at a separator', () => {
    expect(Array.from(tree.keys(4))).toEqual([4, 5, 6, 7, 8, 9, 10]);
    expect(Array.from(tree.keys(6))).toEqual([6, 7, 8, 9, 10]);
  });

  test('starting between keys or past the end', () => {
    expect(Array.from(tree.keys(3.5))).toEqual([4, 5, 6, 7, 8, 9, 10]);
    expect(Array.from(tree.keys(0))).toEqual(range1(10));
    expect(Array.from(tree.keys(10.5))).toEqual([]);
  });

  test('values follow the same starting point', () => {
    expect(Array.from(tree.values(8))).toEqual([80, 90, 100]);
  });
});

describe('undefined as a key', () =>
{
  // The default comparator orders undefined after every number
  const tree = new BTree<number | undefined, string>([[1, "a"], [5, "b"], [9, "c"], [undefined, "u"]], undefined, 2);

  test('is stored and found', () => {
    expect(tree.get(undefined)).toBe("u");
    expect(tree.maxKey()).toBe(undefined);
    expect(tree.size).toBe(4);
  });

  test('can be a range bound', () => {
    expect(Array.from(tree.range(5, undefined))).toEqual([[5, "b"], [9, "c"], [undefined, "u"]]);
    expect(Array.from(tree.range(undefined, undefined))).toEqual([[undefined, "u"]]);
  });

  test('entries() without an argument starts at the smallest key', () => {
    expect(Array.from(tree.keys())).toEqual([1, 5, 9, undefined]);
  });
});
