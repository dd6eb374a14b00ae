/**
 * Splits `items` into contiguous chunks of `size`, keeping input order. The last chunk
 * may be shorter. Without a positive size every item becomes its own group.
 */
export function groupItems<T>(items: readonly T[], size?: number | null): T[][] {
  if (!size || size <= 0) {
    return items.map((item) => [item]);
  }
  const groups: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    groups.push(items.slice(i, i + size));
  }
  return groups;
}
