import { RerankFailure } from '../../common/errors';
import { FakeScoringClient } from '../../testing/fake-scoring.client';
import { makeDocument, testPipelineConfig } from '../../testing/fixtures';
import {
  CrossEncoderReranker,
  PassThroughReranker,
  RerankerRegistry,
} from './reranker.service';
import { alignScores } from './tei-scoring.client';

describe('CrossEncoderReranker', () => {
  const documents = [
    makeDocument('a', 1, {}, 'alpha'),
    makeDocument('b', 2, {}, 'bravo'),
    makeDocument('c', 3, {}, 'charlie'),
  ];

  it('orders by descending score and re-ranks from 1', async () => {
    const scorer = new FakeScoringClient({ alpha: 0.1, bravo: 0.9, charlie: 0.5 });

    const outcome = await new CrossEncoderReranker(scorer).rerank(
      'stab wounds',
      documents,
    );

    expect(outcome.failure).toBeNull();
    expect(
      outcome.documents.map((d) => [d.chunk.chunkId, d.rank, d.rerankScore]),
    ).toEqual([
      ['b', 1, 0.9],
      ['c', 2, 0.5],
      ['a', 3, 0.1],
    ]);
    expect(scorer.calls).toEqual([
      { query: 'stab wounds', texts: ['alpha', 'bravo', 'charlie'] },
    ]);
  });

  it('keeps retrieval order among equal scores', async () => {
    const scorer = new FakeScoringClient({ alpha: 0.2, bravo: 0.7, charlie: 0.7 });

    const outcome = await new CrossEncoderReranker(scorer).rerank('q', documents);

    expect(outcome.documents.map((d) => d.chunk.chunkId)).toEqual(['b', 'c', 'a']);
  });

  it('truncates to topN when configured', async () => {
    const scorer = new FakeScoringClient({ alpha: 0.3, bravo: 0.2, charlie: 0.1 });

    const outcome = await new CrossEncoderReranker(scorer, 2).rerank('q', documents);

    expect(outcome.documents.map((d) => d.chunk.chunkId)).toEqual(['a', 'b']);
  });

  it('passes the input through unchanged when scoring fails', async () => {
    const scorer = new FakeScoringClient();
    scorer.failWith = new Error('socket hang up');

    const outcome = await new CrossEncoderReranker(scorer).rerank('q', documents);

    expect(outcome.documents).toBe(documents);
    expect(outcome.failure).toBeInstanceOf(RerankFailure);
    expect(outcome.failure?.message).toBe('Reranking failed: socket hang up');
    expect(outcome.failure?.fatal).toBe(false);
  });

  it('does not call the scorer for an empty set', async () => {
    const scorer = new FakeScoringClient();

    const outcome = await new CrossEncoderReranker(scorer).rerank('q', []);

    expect(outcome).toEqual({ documents: [], failure: null });
    expect(scorer.calls).toHaveLength(0);
  });
});

describe('RerankerRegistry', () => {
  it('selects the cross-encoder only when reranking is requested', () => {
    const registry = new RerankerRegistry(
      new FakeScoringClient(),
      testPipelineConfig(),
    );

    expect(registry.select(true)).toBeInstanceOf(CrossEncoderReranker);
    expect(registry.select(false)).toBeInstanceOf(PassThroughReranker);
    expect(registry.select(false).enabled).toBe(false);
  });
});

describe('alignScores', () => {
  it('maps score items back to input order', () => {
    expect(
      alignScores(
        [
          { index: 2, score: 0.9 },
          { index: 0, score: 0.4 },
          { index: 1, score: 0.1 },
        ],
        3,
      ),
    ).toEqual([0.4, 0.1, 0.9]);
  });

  it('rejects a response with a missing score', () => {
    expect(() => alignScores([{ index: 0, score: 0.4 }], 2)).toThrow(
      'Reranker response is missing a score for text 1',
    );
  });
});
