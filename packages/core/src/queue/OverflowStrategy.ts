/** What `Queue.add` does when the store already holds `maxDepth` waiting jobs. */
export enum OverflowStrategy {
  BLOCK = 'block',
  DROP_NEWEST = 'drop_newest',
  DROP_OLDEST = 'drop_oldest',
}

export default OverflowStrategy;
