/** Lookup endpoints accept at most this many ids per request. */
export const MAX_BATCH_IDS = 50;

export function chunkArray<T>(source: readonly T[], chunkSize: number): T[][] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, received ${chunkSize}`);
  }

  if (source.length === 0) {
    return [];
  }

  const chunks: T[][] = [];
  for (let index = 0; index < source.length; index += chunkSize) {
    chunks.push(source.slice(index, index + chunkSize));
  }
  return chunks;
}

// Each chunk becomes the comma-separated value of an `id` query parameter.
export function batchIds(ids: readonly string[], batchSize: number = MAX_BATCH_IDS): string[] {
  return chunkArray(ids, batchSize).map((chunk) => chunk.join(","));
}
