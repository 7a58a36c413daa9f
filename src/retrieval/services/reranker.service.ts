/**
 * Rerankers
 * Optional cross-encoder reordering of the retrieved set. Reranking fails soft:
 * on any scoring error the input is passed through unchanged with the failure.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { asError, errorMessage, RerankFailure } from '../../common/errors';
import { PIPELINE_CONFIG, type PipelineConfig } from '../../config/pipeline.config';
import type { RetrievedDocument } from '../types';
import { SCORING_CLIENT, type ScoringClient } from './tei-scoring.client';

export interface RerankOutcome {
  documents: RetrievedDocument[];
  failure: RerankFailure | null;
}

export interface Reranker {
  readonly enabled: boolean;
  rerank(
    query: string,
    documents: RetrievedDocument[],
    signal?: AbortSignal,
  ): Promise<RerankOutcome>;
}

export class PassThroughReranker implements Reranker {
  readonly enabled = false;

  rerank(_query: string, documents: RetrievedDocument[]): Promise<RerankOutcome> {
    return Promise.resolve({ documents, failure: null });
  }
}

export class CrossEncoderReranker implements Reranker {
  readonly enabled = true;
  private readonly logger = new Logger(CrossEncoderReranker.name);

  constructor(
    private readonly scoringClient: ScoringClient,
    private readonly topN?: number,
  ) {}

  async rerank(
    query: string,
    documents: RetrievedDocument[],
    signal?: AbortSignal,
  ): Promise<RerankOutcome> {
    if (documents.length === 0) {
      return { documents, failure: null };
    }

    let scores: number[];
    try {
      scores = await this.scoringClient.score(
        query,
        documents.map((document) => document.chunk.text),
        signal,
      );
      if (
        scores.length !== documents.length ||
        !scores.every((score) => Number.isFinite(score))
      ) {
        throw new Error(
          `expected ${documents.length} finite scores, got ${scores.length}`,
        );
      }
    } catch (error) {
      this.logger.warn(`Reranking failed, keeping retrieval order: ${errorMessage(error)}`);
      return {
        documents,
        failure: new RerankFailure(
          `Reranking failed: ${errorMessage(error)}`,
          asError(error),
        ),
      };
    }

    // Array.prototype.sort is stable: equal scores keep retrieval order
    const reranked = documents
      .map((document, index) => ({ document, score: scores[index] }))
      .sort((a, b) => b.score - a.score)
      .slice(0, this.topN ?? documents.length)
      .map(
        ({ document, score }, position): RetrievedDocument => ({
          ...document,
          rerankScore: score,
          rank: position + 1,
        }),
      );

    this.logger.log(
      `Reranked ${documents.length} documents → ${reranked.length} kept`,
    );

    return { documents: reranked, failure: null };
  }
}

/**
 * Picks the reranker for a request
 */
@Injectable()
export class RerankerRegistry {
  private readonly crossEncoder: CrossEncoderReranker;
  private readonly passThrough = new PassThroughReranker();

  constructor(
    @Inject(SCORING_CLIENT) private readonly scoringClient: ScoringClient,
    @Inject(PIPELINE_CONFIG) config: PipelineConfig,
  ) {
    this.crossEncoder = new CrossEncoderReranker(
      scoringClient,
      config.reranking.topN,
    );
  }

  select(useReranker: boolean): Reranker {
    return useReranker ? this.crossEncoder : this.passThrough;
  }

  healthCheck(): Promise<boolean> {
    return this.scoringClient.healthCheck();
  }
}
