/**
 * Splits a list into slices of at most `size` items. Used to keep `IN (...)`
 * lists and multi-row inserts under the driver's placeholder limit.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
