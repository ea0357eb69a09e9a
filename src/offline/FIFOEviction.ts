/**
 * Pick the `count` oldest entries by `cachedAt`. Entries are taken in iteration
 * order first, so equal timestamps evict the earlier-inserted entry.
 */
export const selectOldest = <K>(
  entries: Iterable<[K, { cachedAt: number }]>,
  count: number
): K[] => {
  if (count <= 0) {
    return [];
  }
  // Array.prototype.sort is stable, which keeps insertion order among ties
  return Array.from(entries)
    .sort(([, a], [, b]) => a.cachedAt - b.cachedAt)
    .slice(0, count)
    .map(([key]) => key);
};
