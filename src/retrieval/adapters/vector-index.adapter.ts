/**
 * Vector Index Adapter
 * Boundary to the embedding model and vector store. Implementations must be
 * deterministic for a fixed index snapshot and safe for concurrent reads.
 */

import type { IndexCandidate, IndexedChunk, MetadataFilters } from '../types';

export const VECTOR_INDEX_ADAPTER = Symbol('VECTOR_INDEX_ADAPTER');

export interface SearchOptions {
  /** Restrict the search to these collections (default: all configured) */
  collections?: string[];
  signal?: AbortSignal;
}

export interface IndexPoint {
  vector: number[];
  chunk: IndexedChunk;
}

export interface VectorIndexAdapter {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;

  /**
   * Top-k candidates by descending similarity whose metadata satisfies every
   * filter predicate, with their stored vectors
   * @throws IndexUnavailableError when the backend cannot be reached
   */
  similaritySearch(
    embedding: number[],
    k: number,
    filters: MetadataFilters,
    options?: SearchOptions,
  ): Promise<IndexCandidate[]>;

  upsert(collection: string, points: IndexPoint[]): Promise<number>;

  /**
   * Removes every point stored for documentId in the collection
   * @returns number of points removed; 0 when the collection does not exist
   */
  deleteDocument(collection: string, documentId: string): Promise<number>;

  /**
   * @returns null when the collection has not been created yet
   */
  countPoints(collection: string): Promise<number | null>;

  healthCheck(): Promise<boolean>;
}
