import type {
  IndexPoint,
  SearchOptions,
  VectorIndexAdapter,
} from '../retrieval/adapters/vector-index.adapter';
import type { IndexCandidate, MetadataFilters } from '../retrieval/types';
import {
  filterPredicates,
  matchesFilters,
} from '../retrieval/utils/metadata-filter';

/**
 * In-process index over a fixed candidate list
 */
export class FakeIndexAdapter implements VectorIndexAdapter {
  readonly searches: Array<{ k: number; filters: MetadataFilters; options: SearchOptions }> = [];
  readonly upserts: Array<{ collection: string; points: IndexPoint[] }> = [];
  readonly deletes: Array<{ collection: string; documentId: string }> = [];
  failWith: Error | null = null;
  /** When false, returns candidates without applying the filters */
  applyFilters = true;
  hang = false;

  private candidates: IndexCandidate[];
  private readonly collections: Set<string>;

  constructor(candidates: IndexCandidate[] = []) {
    this.candidates = [...candidates];
    this.collections = new Set(candidates.map((c) => c.collectionName));
  }

  /** Chunk ids currently stored in a collection */
  storedChunkIds(collection: string): string[] {
    return this.candidates
      .filter((c) => c.collectionName === collection)
      .map((c) => c.chunk.chunkId);
  }

  async embed(text: string): Promise<number[]> {
    if (this.failWith) {
      throw this.failWith;
    }
    return [text.length, 1];
  }

  similaritySearch(
    _embedding: number[],
    k: number,
    filters: MetadataFilters,
    options: SearchOptions = {},
  ): Promise<IndexCandidate[]> {
    this.searches.push({ k, filters, options });
    if (this.hang) {
      return new Promise<IndexCandidate[]>(() => undefined);
    }

    const predicates = this.applyFilters ? filterPredicates(filters) : [];
    const collections = options.collections;
    const results = this.candidates
      .filter((c) => !collections || collections.includes(c.collectionName))
      .filter((c) => matchesFilters(c.chunk.metadata, predicates))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);

    return Promise.resolve(results);
  }

  async upsert(collection: string, points: IndexPoint[]): Promise<number> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.upserts.push({ collection, points });
    this.collections.add(collection);
    for (const point of points) {
      this.candidates = this.candidates.filter(
        (c) => !(c.collectionName === collection && c.chunk.chunkId === point.chunk.chunkId),
      );
      this.candidates.push({
        chunk: point.chunk,
        score: 0,
        vector: point.vector,
        collectionName: collection,
      });
    }
    return points.length;
  }

  async deleteDocument(collection: string, documentId: string): Promise<number> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.deletes.push({ collection, documentId });
    const before = this.candidates.length;
    this.candidates = this.candidates.filter(
      (c) => !(c.collectionName === collection && c.chunk.documentId === documentId),
    );
    return before - this.candidates.length;
  }

  async countPoints(collection: string): Promise<number | null> {
    if (this.failWith) {
      throw this.failWith;
    }
    if (!this.collections.has(collection)) {
      return null;
    }
    return this.storedChunkIds(collection).length;
  }

  async healthCheck(): Promise<boolean> {
    return this.failWith === null;
  }
}
