import type { UrlBatch } from "./types.js";

export function batchFileName(season: string, index: number): string {
  return `${season}_episodes_part${index}.pdf`;
}

/**
 * Splits the URL list, in order, into batches of `batchSize`; the last batch
 * holds whatever is left. Batches are produced one at a time.
 */
export function* planBatches(
  urls: readonly string[],
  batchSize: number,
  season: string
): Generator<UrlBatch> {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
  }

  for (let start = 0; start < urls.length; start += batchSize) {
    const index = start / batchSize + 1;
    yield {
      index,
      fileName: batchFileName(season, index),
      urls: urls.slice(start, start + batchSize),
    };
  }
}
