import type { ScoringClient } from '../retrieval/services/tei-scoring.client';

/**
 * Scores texts from a lookup table; unknown texts score 0
 */
export class FakeScoringClient implements ScoringClient {
  readonly calls: Array<{ query: string; texts: string[] }> = [];
  failWith: Error | null = null;

  constructor(private readonly scoresByText: Record<string, number> = {}) {}

  async score(query: string, texts: string[]): Promise<number[]> {
    this.calls.push({ query, texts });
    if (this.failWith) {
      throw this.failWith;
    }
    return texts.map((text) => this.scoresByText[text] ?? 0);
  }

  async healthCheck(): Promise<boolean> {
    return this.failWith === null;
  }
}
