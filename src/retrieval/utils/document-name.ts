import type { IndexedChunk } from '../types';

/**
 * Citation name of a chunk's document: metadata source, else the document id
 */
export function documentName(chunk: IndexedChunk): string {
  const source = chunk.metadata.source?.trim();
  return source ? source : chunk.documentId;
}
