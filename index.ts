import BTree from './b-tree';

export default BTree;
export { BTree };
export { defaultComparator } from './b-tree';
export type { DefaultComparable } from './b-tree';
export type {
  ISetSource, IMapSource, IMapSink, IMap, ISortedMapSource, ISortedMap
} from './interfaces';
