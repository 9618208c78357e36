/**
 * Process items in parallel batches
 *
 * Instead of Promise.all() over everything at once, runs at most
 * `batchSize` processors concurrently so a large children list does not
 * flood the content store with simultaneous requests.
 *
 * @returns results in input order
 *
 * @example
 * const effects = await processBatched(
 *   childrenPIs,
 *   10,
 *   async (childPI) => relations.setParent(childPI, parentPI)
 * );
 */
export async function processBatched<T, R>(
  items: T[],
  batchSize: number,
  processor: (item: T) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const results: R[] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    const batch = items.slice(i, i + batchSize);
    const batchResults = await Promise.all(batch.map((item) => processor(item)));
    results.push(...batchResults);
  }
  return results;
}
