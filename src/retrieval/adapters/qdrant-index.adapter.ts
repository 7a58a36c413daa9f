/**
 * Qdrant Index Adapter
 * Dense similarity search across the configured collections, returning stored
 * vectors so the retriever can diversify with MMR.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient, type Schemas } from '@qdrant/js-client-rest';
import type { Embeddings } from '@langchain/core/embeddings';
import { createHash } from 'crypto';
import { asError, errorMessage, IndexUnavailableError } from '../../common/errors';
import { PIPELINE_CONFIG, type PipelineConfig } from '../../config/pipeline.config';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import type { IndexCandidate, MetadataFilters } from '../types';
import { filterPredicates, type FilterPredicate } from '../utils/metadata-filter';
import { parseIndexedChunk, toPayload } from './indexed-chunk.schema';
import type {
  IndexPoint,
  SearchOptions,
  VectorIndexAdapter,
} from './vector-index.adapter';

const UPSERT_BATCH_SIZE = 100;

function isDenseVector(vector: unknown): vector is number[] {
  return (
    Array.isArray(vector) &&
    vector.every((value): value is number => typeof value === 'number')
  );
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new IndexUnavailableError('Index query aborted by caller');
  }
}

/**
 * Deterministic UUID-shaped id from a chunk id (Qdrant accepts UUIDs or integers)
 */
export function stringToUuid(value: string): string {
  const hash = createHash('md5').update(value).digest('hex');
  const variant = ((parseInt(hash.slice(16, 18), 16) & 0x3f) | 0x80).toString(16);
  return `${hash.slice(0, 8)}-${hash.slice(8, 12)}-4${hash.slice(13, 16)}-${variant}${hash.slice(18, 20)}-${hash.slice(20, 32)}`;
}

/**
 * Every point of one source document, matched on the top-level payload key
 */
export function documentFilter(documentId: string): Schemas['Filter'] {
  return { must: [{ key: 'documentId', match: { value: documentId } }] };
}

/**
 * Qdrant `must` conditions on the `metadata.<field>` payload keys
 */
export function toQdrantFilter(
  predicates: FilterPredicate[],
): Schemas['Filter'] | undefined {
  if (predicates.length === 0) {
    return undefined;
  }

  const must = predicates.map(({ field, accepted }): Schemas['Condition'] => {
    const key = `metadata.${field}`;
    if (accepted.length === 1) {
      return { key, match: { value: accepted[0] } };
    }

    const strings = accepted.filter((v): v is string => typeof v === 'string');
    const numbers = accepted.filter((v): v is number => typeof v === 'number');
    if (strings.length === accepted.length) {
      return { key, match: { any: strings } };
    }
    if (numbers.length === accepted.length) {
      return { key, match: { any: numbers } };
    }

    return {
      should: accepted.map((value) => ({ key, match: { value } })),
    };
  });

  return { must };
}

@Injectable()
export class QdrantIndexAdapter implements VectorIndexAdapter {
  private readonly logger = new Logger(QdrantIndexAdapter.name);
  private readonly client: QdrantClient;
  private readonly embeddings: Embeddings;
  private readonly knownCollections = new Set<string>();

  constructor(
    configService: ConfigService,
    embeddingProviderFactory: EmbeddingProviderFactory,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {
    const url = configService.get<string>('QDRANT_URL', 'http://localhost:6333');
    const timeout = config.index.timeoutMs > 0 ? config.index.timeoutMs : undefined;

    this.client = new QdrantClient({ url, timeout });
    this.embeddings = embeddingProviderFactory.createEmbeddingModel();

    this.logger.log(`QdrantClient initialized: ${url}`);
    this.logger.log(`Collections: ${config.index.collections.join(', ')}`);
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    throwIfAborted(signal);
    let embedding: number[];
    try {
      embedding = await this.embeddings.embedQuery(text);
    } catch (error) {
      throw new IndexUnavailableError(
        `Embedding request failed: ${errorMessage(error)}`,
        asError(error),
      );
    }
    // embedQuery takes no signal; drop a result that arrives after cancellation
    throwIfAborted(signal);
    return embedding;
  }

  async similaritySearch(
    embedding: number[],
    k: number,
    filters: MetadataFilters,
    options: SearchOptions = {},
  ): Promise<IndexCandidate[]> {
    throwIfAborted(options.signal);

    const collections = options.collections ?? this.config.index.collections;
    const filter = toQdrantFilter(filterPredicates(filters));

    this.logger.log(
      `Vector search: k=${k}, collections=${collections.length}, hasFilter=${filter !== undefined}`,
    );

    const settled = await Promise.allSettled(
      collections.map((name) =>
        this.searchCollection(name, embedding, k, filter, options.signal),
      ),
    );

    const candidates: IndexCandidate[] = [];
    const failures: string[] = [];

    settled.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        candidates.push(...result.value);
      } else {
        failures.push(`${collections[i]}: ${errorMessage(result.reason)}`);
      }
    });

    throwIfAborted(options.signal);
    if (failures.length > 0 && failures.length === collections.length) {
      throw new IndexUnavailableError(
        `Vector index unreachable (${failures.join('; ')})`,
      );
    }
    if (failures.length > 0) {
      this.logger.warn(`Partial search failure: ${failures.join('; ')}`);
    }

    // Stable: equal scores keep collection order
    return candidates.sort((a, b) => b.score - a.score).slice(0, k);
  }

  private async searchCollection(
    collectionName: string,
    embedding: number[],
    limit: number,
    filter?: Schemas['Filter'],
    signal?: AbortSignal,
  ): Promise<IndexCandidate[]> {
    // The points API takes a RequestInit, so an abort cancels the HTTP request
    const { data } = await this.client.api('points').searchPoints(
      {
        collection_name: collectionName,
        vector: embedding,
        limit,
        with_payload: true,
        with_vector: true,
        ...(filter && { filter }),
      },
      { signal },
    );
    const points = data.result ?? [];

    const results: IndexCandidate[] = [];
    for (const point of points) {
      const chunk = parseIndexedChunk(point.payload);
      if (!chunk || !isDenseVector(point.vector)) {
        this.logger.warn(
          `Skipping malformed point ${String(point.id)} in ${collectionName}`,
        );
        continue;
      }
      results.push({
        chunk,
        score: point.score,
        vector: point.vector,
        collectionName,
      });
    }

    this.logger.debug(`Collection ${collectionName}: ${results.length} results`);
    return results;
  }

  async upsert(collection: string, points: IndexPoint[]): Promise<number> {
    if (points.length === 0) {
      return 0;
    }

    try {
      await this.ensureCollection(collection, points[0].vector.length);

      let inserted = 0;
      for (let i = 0; i < points.length; i += UPSERT_BATCH_SIZE) {
        const batch = points.slice(i, i + UPSERT_BATCH_SIZE);
        await this.client.upsert(collection, {
          wait: true,
          points: batch.map((point) => ({
            id: stringToUuid(point.chunk.chunkId),
            vector: point.vector,
            payload: toPayload(point.chunk),
          })),
        });
        inserted += batch.length;
      }

      this.logger.log(`Upserted ${inserted} points into ${collection}`);
      return inserted;
    } catch (error) {
      throw new IndexUnavailableError(
        `Upsert into ${collection} failed: ${errorMessage(error)}`,
        asError(error),
      );
    }
  }

  async deleteDocument(collection: string, documentId: string): Promise<number> {
    try {
      if (!(await this.collectionExists(collection))) {
        return 0;
      }

      const filter = documentFilter(documentId);
      const { count } = await this.client.count(collection, { filter, exact: true });
      if (count > 0) {
        await this.client.delete(collection, { wait: true, filter });
        this.logger.log(`Deleted ${count} points of ${documentId} from ${collection}`);
      }
      return count;
    } catch (error) {
      throw new IndexUnavailableError(
        `Delete of ${documentId} from ${collection} failed: ${errorMessage(error)}`,
        asError(error),
      );
    }
  }

  async countPoints(collection: string): Promise<number | null> {
    try {
      if (!(await this.collectionExists(collection))) {
        return null;
      }
      const { count } = await this.client.count(collection, { exact: true });
      return count;
    } catch (error) {
      throw new IndexUnavailableError(
        `Count of ${collection} failed: ${errorMessage(error)}`,
        asError(error),
      );
    }
  }

  private async collectionExists(name: string): Promise<boolean> {
    if (this.knownCollections.has(name)) {
      return true;
    }
    const { collections } = await this.client.getCollections();
    const exists = collections.some((collection) => collection.name === name);
    if (exists) {
      this.knownCollections.add(name);
    }
    return exists;
  }

  private async ensureCollection(name: string, size: number): Promise<void> {
    if (await this.collectionExists(name)) {
      return;
    }

    await this.client.createCollection(name, {
      vectors: { size, distance: 'Cosine' },
    });
    this.logger.log(`Created collection ${name} (${size}D, cosine)`);
    this.knownCollections.add(name);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch (error) {
      this.logger.warn(`Qdrant health check failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
