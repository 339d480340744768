#!/usr/bin/env ts-node
import BTree from '.';
import SortedArray from './sorted-array';
import {RBTree} from 'bintrees';

class Timer {
  start = Date.now();
  ms() { return Date.now() - this.start; }
  restart() { var ms = this.ms(); this.start += ms; return ms; }
}

function randInt(max: number) { return Math.random() * max | 0; }

function swap(keys: number[], i: number, j: number) {
  var tmp = keys[i];
  keys[i] = keys[j];
  keys[j] = tmp;
}

function makeArray(size: number, randomOrder: boolean, spacing = 10) {
  var keys: number[] = [], i, n;
  for (i = 0, n = 0; i < size; i++, n += 1 + randInt(spacing))
    keys[i] = n;
  if (randomOrder)
    for (i = 0; i < size; i++)
      swap(keys, i, randInt(size));
  return keys;
}

function measure<T=void>(message: (t:T) => string, callback: () => T, minMillisec: number = 600, log = console.log) {
  var timer = new Timer(), counter = 0, ms, result: T;
  do {
    result = callback();
    counter++;
  } while ((ms = timer.ms()) < minMillisec);
  ms /= counter;
  log((Math.round(ms * 10) / 10) + "\t" + message(result));
  return result;
}

const compareNumbers = (a: number, b: number) => a - b;

console.log("Benchmark results (milliseconds with integer keys/values)");
console.log("---------------------------------------------------------");

console.log();
console.log("### Insertions at random locations: BTree vs the competition ###");

for (let size of [1000, 10000, 100000, 1000000]) {
  console.log();
  let keys = makeArray(size, true);

  for (let B of [16, 64]) {
    measure(map => `Insert ${map.size} pairs in BTree (B=${B})`, () => {
      let map = new BTree<number, number>(undefined, compareNumbers, B);
      for (let k of keys)
        map.set(k, k);
      return map;
    });
  }
  measure(set => `Insert ${set.size} pairs in bintrees' RBTree (no values)`, () => {
    let set = new RBTree<number>(compareNumbers);
    for (let k of keys)
      set.insert(k);
    return set;
  });
  measure(map => `Insert ${map.size} pairs in ES6 Map (hashtable)`, () => {
    let map = new Map<number, number>();
    for (let k of keys)
      map.set(k, k);
    return map;
  });
  if (size <= 100000) {
    measure(list => `Insert ${list.size} pairs in sorted array`, () => {
      let list = new SortedArray<number, number>(undefined, compareNumbers);
      for (let k of keys)
        list.set(k, k);
      return list;
    });
  }
}

console.log();
console.log("### Insert in order, scan, delete: BTree vs the competition ###");

for (let size of [9999, 1000, 10000, 100000, 1000000]) {
  // The 9999 round warms up the JIT and is not printed
  var log = (size === 9999 ? () => {} : console.log);
  log();
  let keys = makeArray(size, false);

  let tree = measure(tree => `Insert ${tree.size} sorted pairs in BTree`, () => {
    let tree = new BTree<number, number>(undefined, compareNumbers);
    for (let k of keys)
      tree.set(k, k * 10);
    return tree;
  }, 600, log);
  let rbTree = measure(set => `Insert ${set.size} sorted keys in bintrees' RBTree (no values)`, () => {
    let set = new RBTree<number>(compareNumbers);
    for (let k of keys)
      set.insert(k);
    return set;
  }, 600, log);
  let map = measure(map => `Insert ${map.size} sorted pairs in Map hashtable`, () => {
    let map = new Map<number, number>();
    for (let k of keys)
      map.set(k, k * 10);
    return map;
  }, 600, log);

  measure(sum => `Sum of all values with forEachPair in BTree: ${sum}`, () => {
    let sum = 0;
    tree.forEachPair((k, v) => { sum += v; });
    return sum;
  }, 600, log);
  measure(sum => `Sum of all values with iterator in BTree: ${sum}`, () => {
    let sum = 0;
    for (let [k, v] of tree)
      sum += v;
    return sum;
  }, 600, log);
  measure(sum => `Sum of all values with forEach in Map: ${sum}`, () => {
    let sum = 0;
    map.forEach(v => sum += v);
    return sum;
  }, 600, log);

  // Ten range scans, each covering 1% of the key space
  let span = keys[keys.length - 1] / 100;
  measure(count => `Scan ${count} pairs in 10 ranges of BTree`, () => {
    let count = 0;
    for (let r = 0; r < 10; r++) {
      let lo = span * r * 10;
      for (let pair of tree.range(lo, lo + span))
        count++;
    }
    return count;
  }, 600, log);
  measure(count => `Scan ${count} keys in 10 ranges of bintrees' RBTree`, () => {
    let count = 0;
    for (let r = 0; r < 10; r++) {
      let lo = span * r * 10, it = rbTree.lowerBound(lo);
      for (let k = it.data(); k !== null && k <= lo + span; k = it.next())
        count++;
    }
    return count;
  }, 600, log);

  // Can't use measure() for deletions because the trees are not restored
  let timer = new Timer();
  for (let i = 0; i < keys.length; i += 2)
    tree.delete(keys[i]);
  log(`${timer.restart()}\tDelete every second item in BTree`);
  for (let i = 0; i < keys.length; i += 2)
    rbTree.remove(keys[i]);
  log(`${timer.restart()}\tDelete every second item in bintrees' RBTree`);
  for (let i = 0; i < keys.length; i += 2)
    map.delete(keys[i]);
  log(`${timer.restart()}\tDelete every second item in Map hashtable`);
}
