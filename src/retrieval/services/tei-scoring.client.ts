/**
 * TEI Scoring Client
 * Cross-encoder relevance scores from a Text Embeddings Inference /rerank endpoint
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosError, type AxiosInstance } from 'axios';
import { errorMessage } from '../../common/errors';

export const SCORING_CLIENT = Symbol('SCORING_CLIENT');

export interface ScoringClient {
  /** One relevance score per text, aligned with the input order */
  score(query: string, texts: string[], signal?: AbortSignal): Promise<number[]>;
  healthCheck(): Promise<boolean>;
}

interface RerankRequest {
  query: string;
  texts: string[];
  truncate?: boolean;
}

interface RerankResponseItem {
  index: number;
  score: number;
}

@Injectable()
export class TeiScoringClient implements ScoringClient {
  private readonly logger = new Logger(TeiScoringClient.name);
  private readonly client: AxiosInstance;

  constructor(configService: ConfigService) {
    const baseURL = configService.get<string>(
      'TEI_RERANKER_URL',
      'http://localhost:8080',
    );
    const timeout = Number(configService.get<string>('TEI_RERANKER_TIMEOUT', '30000'));

    this.client = axios.create({
      baseURL,
      timeout,
      headers: { 'Content-Type': 'application/json' },
    });

    this.logger.log(`TeiScoringClient initialized: ${baseURL}`);
  }

  async score(
    query: string,
    texts: string[],
    signal?: AbortSignal,
  ): Promise<number[]> {
    const request: RerankRequest = { query, texts, truncate: true };

    try {
      const response = await this.client.post<RerankResponseItem[]>(
        '/rerank',
        request,
        { signal },
      );
      return alignScores(response.data, texts.length);
    } catch (error: unknown) {
      if (error instanceof AxiosError) {
        throw new Error(
          `Reranker API failed: ${error.message} (status: ${error.response?.status ?? 'unknown'})`,
        );
      }
      throw error;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.client.get('/health');
      return response.status === 200;
    } catch (error: unknown) {
      this.logger.warn(`Reranker health check failed: ${errorMessage(error)}`);
      return false;
    }
  }
}

/**
 * TEI returns items sorted by score; put them back in input order
 */
export function alignScores(items: RerankResponseItem[], count: number): number[] {
  const scores = new Array<number | undefined>(count).fill(undefined);

  for (const item of items) {
    if (item.index >= 0 && item.index < count && Number.isFinite(item.score)) {
      scores[item.index] = item.score;
    }
  }

  return scores.map((score, index) => {
    if (score === undefined) {
      throw new Error(`Reranker response is missing a score for text ${index}`);
    }
    return score;
  });
}
