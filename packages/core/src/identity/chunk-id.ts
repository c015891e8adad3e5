// Chunk identity — content-addressed ids so re-ingesting a chunk overwrites it

import { createHash } from 'node:crypto';
import type { ChunkMetadata } from '../types/chunks.js';

/** Code points of chunk text that take part in the id. */
export const ID_TEXT_PREFIX_LENGTH = 100;

/**
 * Derive a deterministic id from ticker, section and the start of the text.
 * MD5 of `${ticker}_${section}_${prefix}` (missing ticker/section as ""),
 * returned in UUID form so every backend accepts it as a point id.
 */
export function deriveChunkId(
  text: string,
  metadata: Pick<ChunkMetadata, 'ticker' | 'section'>,
): string {
  const prefix = Array.from(text).slice(0, ID_TEXT_PREFIX_LENGTH).join('');
  const hex = createHash('md5')
    .update(`${metadata.ticker ?? ''}_${metadata.section ?? ''}_${prefix}`, 'utf8')
    .digest('hex');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join('-');
}
