/** Read-only set interface (subinterface of IMapSource<K,any>).
 *  The word "set" usually means that each item in the collection is unique
 *  (appears only once, based on a definition of equality used by the
 *  collection.) Objects conforming to this interface aren't guaranteed not
 *  to contain duplicates, but as an example, BTree<K,V> implements this
 *  interface and does not allow duplicates. */
export interface ISetSource<K=any>
{
  /** Returns the number of key/value pairs in the map object. */
  size: number;
  /** Returns a boolean asserting whether the key exists in the map object or not. */
  has(key: K): boolean;
  /** Returns a new iterator for iterating the items in the set (the order is implementation-dependent). */
  keys(): IterableIterator<K>;
}

/** Read-only map interface (i.e. a source of key-value pairs). */
export interface IMapSource<K=any, V=any> extends ISetSource<K>
{
  /** Returns the number of key/value pairs in the map object. */
  size: number;
  /** Returns the value associated to the key, or undefined if there is none. */
  get(key: K): V|undefined;
  /** Returns a boolean asserting whether the key exists in the map object or not. */
  has(key: K): boolean;
  /** Calls callbackFn once for each key-value pair present in the map object.
   *  The ES6 Map class sends the value to the callback before the key, so
   *  this interface must do likewise. */
  forEach(callbackFn: (v:V, k:K, map:IMapSource<K,V>) => void, thisArg?: unknown): void;

  /** Returns an iterator that provides all key-value pairs from the collection (as arrays of length 2). */
  entries(): IterableIterator<[K,V]>;
  /** Returns a new iterator for iterating the keys of each pair. */
  keys(): IterableIterator<K>;
  /** Returns a new iterator for iterating the values of each pair. */
  values(): IterableIterator<V>;
}

/** Write-only map interface (i.e. a drain into which key-value pairs can be "sunk") */
export interface IMapSink<K=any, V=any>
{
  /** Returns true if an element in the map object existed and has been
   *  removed, or false if the element did not exist. */
  delete(key: K): boolean;
  /** Sets the value for the key in the map object (the return value is
   *  boolean in contrast to Map.set which returns the Map object itself). */
  set(key: K, value: V): boolean;
  /** Removes all key/value pairs from the IMap object. */
  clear(): void;
}

/** An interface compatible with ES6 Map and BTree. This interface does not
 *  describe the complete interface of either class, but merely the common
 *  interface shared by both. */
export interface IMap<K=any, V=any> extends IMapSource<K, V>, IMapSink<K, V> { }

/** An data source that provides read-only access to items in sorted order. */
export interface ISortedMapSource<K=any, V=any> extends IMapSource<K, V>
{
  /** Gets the lowest key in the collection. */
  minKey(): K | undefined;
  /** Gets the highest key in the collection. */
  maxKey(): K | undefined;
  /** Returns the pairs whose keys lie between `low` and `high`, inclusive. */
  range(low: K, high: K): IterableIterator<[K,V]>;
  /** Copies the pairs whose keys lie between `low` and `high` into an array. */
  getRange(low: K, high: K, maxLength?: number): [K,V][];
  /** Calls `callback` on each pair in order, passing the key first.
   *  Returns the number of pairs visited, or R if the callback returned {break:R}. */
  forEachPair<R=number>(callback: (k:K, v:V, counter:number) => {break?:R}|void, initialCounter?: number): R|number;
  /** Returns a new iterator for iterating the keys of each pair in ascending order. */
  keys(): IterableIterator<K>;
  /** Returns a new iterator for iterating the values of each pair in order by key. */
  values(): IterableIterator<V>;
}

/** A mutable collection of key-value pairs sorted by key. */
export interface ISortedMap<K=any, V=any> extends IMap<K,V>, ISortedMapSource<K, V>
{
  /** Adds or overwrites a key-value pair.
   *  @returns true if a new key-value pair was added, false if an existing pair was overwritten or left alone. */
  set(key: K, value: V, overwrite?: boolean): boolean;
  /** Adds all pairs from a list of key-value pairs.
   *  @returns The number of pairs added to the collection. */
  setPairs(pairs: [K,V][], overwrite?: boolean): number;
  /** Removes a list of keys from the collection. Returns the number of keys removed. */
  deleteKeys(keys: K[]): number;
}
