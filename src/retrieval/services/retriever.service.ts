/**
 * Retriever Service
 * Diversified, metadata-filtered similarity retrieval:
 * embed → oversampled search → dedupe → post-filter → MMR → rank
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  asError,
  errorMessage,
  IndexUnavailableError,
  InputError,
} from '../../common/errors';
import { TimeoutError, withDeadline } from '../../common/utils/async.utils';
import { PIPELINE_CONFIG, type PipelineConfig } from '../../config/pipeline.config';
import {
  VECTOR_INDEX_ADAPTER,
  type VectorIndexAdapter,
} from '../adapters/vector-index.adapter';
import type { IndexCandidate, MetadataFilters, RetrievedDocument } from '../types';
import { filterPredicates, matchesFilters } from '../utils/metadata-filter';
import { selectByMmr } from '../utils/mmr';

export interface RetrieveOptions {
  k?: number;
  filters?: MetadataFilters;
  diversityLambda?: number;
  collections?: string[];
  signal?: AbortSignal;
  /** Overrides INDEX_TIMEOUT_MS for this call */
  timeoutMs?: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

@Injectable()
export class RetrieverService {
  private readonly logger = new Logger(RetrieverService.name);

  constructor(
    @Inject(VECTOR_INDEX_ADAPTER)
    private readonly indexAdapter: VectorIndexAdapter,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  /**
   * At most k documents, every one satisfying all filters, ranked 1..n by
   * descending similarity. An empty array means no candidate matched.
   * @throws InputError on a blank query
   * @throws IndexUnavailableError when the index fails or times out
   */
  async retrieve(
    query: string,
    options: RetrieveOptions = {},
  ): Promise<RetrievedDocument[]> {
    if (query.trim().length === 0) {
      throw new InputError('Query is empty');
    }

    const startTime = Date.now();
    const k = this.resolveK(options.k);
    const lambda = this.resolveLambda(options.diversityLambda);
    const poolSize = Math.max(
      Math.ceil(k * this.config.retrieval.oversampleFactor),
      k,
    );
    const predicates = filterPredicates(options.filters);

    const raw = await this.searchIndex(query, poolSize, options);
    const pool = this.dedupe(raw).filter((candidate) =>
      matchesFilters(candidate.chunk.metadata, predicates),
    );

    if (pool.length === 0) {
      this.logger.log(
        `[Retrieve] substage=search status=empty k=${k} filters=${predicates.length} duration=${Date.now() - startTime}ms`,
      );
      return [];
    }

    const selected = selectByMmr(pool, k, lambda).sort(
      (a, b) => pool[b].score - pool[a].score || a - b,
    );

    const documents = selected.map(
      (index, position): RetrievedDocument => ({
        chunk: pool[index].chunk,
        similarityScore: pool[index].score,
        rank: position + 1,
        collectionName: pool[index].collectionName,
      }),
    );

    this.logger.log(
      `[Retrieve] substage=mmr status=success candidates=${raw.length} pool=${pool.length} results=${documents.length} k=${k} lambda=${lambda} duration=${Date.now() - startTime}ms`,
    );

    return documents;
  }

  /**
   * Retrieval restricted to a single collection
   */
  retrieveFromCollection(
    query: string,
    collection: string,
    options: Omit<RetrieveOptions, 'collections'> = {},
  ): Promise<RetrievedDocument[]> {
    return this.retrieve(query, { ...options, collections: [collection] });
  }

  private resolveK(k: number | undefined): number {
    const { defaultK, minK, maxK } = this.config.retrieval;
    if (k === undefined || !Number.isFinite(k)) {
      return clamp(defaultK, minK, maxK);
    }
    return clamp(Math.round(k), minK, maxK);
  }

  private resolveLambda(lambda: number | undefined): number {
    if (lambda === undefined || Number.isNaN(lambda)) {
      return this.config.retrieval.diversityLambda;
    }
    return clamp(lambda, 0, 1);
  }

  private async searchIndex(
    query: string,
    poolSize: number,
    options: RetrieveOptions,
  ): Promise<IndexCandidate[]> {
    const timeoutMs = options.timeoutMs ?? this.config.index.timeoutMs;

    try {
      return await withDeadline(
        async (signal) => {
          const embedding = await this.indexAdapter.embed(query, signal);
          return this.indexAdapter.similaritySearch(
            embedding,
            poolSize,
            options.filters ?? {},
            { collections: options.collections, signal },
          );
        },
        timeoutMs,
        'Index query',
        options.signal,
      );
    } catch (error) {
      if (error instanceof IndexUnavailableError) {
        throw error;
      }
      const reason =
        error instanceof TimeoutError
          ? error.message
          : `Index query failed: ${errorMessage(error)}`;
      throw new IndexUnavailableError(reason, asError(error));
    }
  }

  /**
   * First occurrence of each chunk id wins
   */
  private dedupe(candidates: IndexCandidate[]): IndexCandidate[] {
    const seen = new Set<string>();
    return candidates.filter((candidate) => {
      if (seen.has(candidate.chunk.chunkId)) {
        return false;
      }
      seen.add(candidate.chunk.chunkId);
      return true;
    });
  }
}
