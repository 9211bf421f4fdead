/** Suffix of every shard file: gzip-compressed framed HTML payloads. */
export const SHARD_FILE_SUFFIX = '.htmls.gz';

/**
 * Build the file name of a shard: the decimal shard id left-padded with zeros
 * to `width` digits, followed by `.htmls.gz`. Ids longer than `width` are
 * written in full.
 */
export function formatShardFileName(shardId: number, width: number): string {
  if (!Number.isSafeInteger(shardId) || shardId < 1) {
    throw new Error(`Shard id must be a positive integer, got ${String(shardId)}`);
  }
  if (!Number.isSafeInteger(width) || width < 1) {
    throw new Error(`Zero padding width must be a positive integer, got ${String(width)}`);
  }
  return `${String(shardId).padStart(width, '0')}${SHARD_FILE_SUFFIX}`;
}
