/**
 * Split `items` into `m` contiguous shards of at most ceil(N / m) items.
 * Always returns exactly `m` shards; trailing shards may be short or empty.
 */
export function partitionList<T>(items: readonly T[], m: number): T[][] {
  if (!Number.isInteger(m) || m < 1) {
    throw new RangeError(`Worker count must be a positive integer, got ${m}`);
  }
  const size = Math.ceil(items.length / m);
  const shards: T[][] = [];
  for (let i = 0; i < m; i++) {
    shards.push(items.slice(i * size, (i + 1) * size));
  }
  return shards;
}

export function shardFor<T>(items: readonly T[], rank: number, worldSize: number): T[] {
  if (!Number.isInteger(rank) || rank < 0 || rank >= worldSize) {
    throw new RangeError(`Rank ${rank} is outside [0, ${worldSize})`);
  }
  if (worldSize === 1) return [...items];
  return partitionList(items, worldSize)[rank];
}
