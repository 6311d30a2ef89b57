/** Inclusive byte range, as used in HTTP Range headers. */
export interface ByteRange {
  start: number;
  end: number;
}

/**
 * Split `total` bytes into at most `count` contiguous ranges of near-equal
 * size. Earlier ranges take the remainder.
 */
export function planSegments(total: number, count: number): ByteRange[] {
  if (total <= 0) return [];
  const n = Math.max(1, Math.min(Math.floor(count), total));
  const base = Math.floor(total / n);
  const remainder = total % n;
  const ranges: ByteRange[] = [];
  let start = 0;
  for (let i = 0; i < n; i++) {
    const length = base + (i < remainder ? 1 : 0);
    ranges.push({ start, end: start + length - 1 });
    start += length;
  }
  return ranges;
}
