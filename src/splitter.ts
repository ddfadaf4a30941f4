import { InvalidArgumentError } from "./errors";
import type { ChunkRange } from "./types/types";

/**
 * Plan `count` contiguous ranges over `length` bytes.
 *
 * The count is capped at `length` so no range is ever empty; the first
 * `length % n` ranges carry one extra byte. An empty payload yields a single
 * empty range.
 */
export function planChunks(length: number, count: number): ChunkRange[] {
  if (!Number.isInteger(count) || count <= 0) {
    throw new InvalidArgumentError(
      `chunk count must be a positive integer, got ${count}`,
    );
  }
  if (length === 0) return [{ offset: 0, length: 0 }];

  const n = Math.min(count, length);
  const base = Math.floor(length / n);
  const remainder = length % n;

  const ranges: ChunkRange[] = [];
  let offset = 0;
  for (let i = 0; i < n; i++) {
    const size = base + (i < remainder ? 1 : 0);
    ranges.push({ offset, length: size });
    offset += size;
  }
  return ranges;
}

/** Slice `data` per {@link planChunks}. Slices are views, not copies. */
export function splitIntoChunks(data: Buffer, count: number): Buffer[] {
  return planChunks(data.length, count).map(range =>
    data.subarray(range.offset, range.offset + range.length),
  );
}
