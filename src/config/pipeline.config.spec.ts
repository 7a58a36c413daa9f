import { ConfigService } from '@nestjs/config';
import { loadPipelineConfig } from './pipeline.config';

describe('loadPipelineConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadPipelineConfig(new ConfigService({}));

    expect(config.index.collections).toEqual([
      'criminology_theory',
      'forensic_cases',
      'serial_killers',
      'legislation',
      'investigation_techniques',
    ]);
    expect(config.retrieval).toEqual({
      defaultK: 5,
      minK: 3,
      maxK: 10,
      oversampleFactor: 3,
      diversityLambda: 0.5,
    });
    expect(config.reranking.enabled).toBe(false);
    expect(config.reranking.topN).toBeUndefined();
    expect(config.generation.maxRetries).toBe(3);
    expect(config.chunking).toEqual({
      targetTokens: 650,
      overlapRatio: 0.15,
      boundaryTolerance: 0.2,
    });
    expect(config.audit).toEqual({ enabled: true, logDir: './logs/audit' });
  });

  it('parses environment strings', () => {
    const config = loadPipelineConfig(
      new ConfigService({
        QDRANT_COLLECTIONS: ' forensic_cases , legislation ,',
        USE_RERANKER: 'TRUE',
        RERANK_TOP_N: '4',
        MMR_DIVERSITY: '0.7',
        AUDIT_ENABLED: 'false',
      }),
    );

    expect(config.index.collections).toEqual(['forensic_cases', 'legislation']);
    expect(config.reranking).toEqual({ enabled: true, topN: 4 });
    expect(config.retrieval.diversityLambda).toBe(0.7);
    expect(config.audit.enabled).toBe(false);
  });

  it('rejects out-of-range values', () => {
    expect(() =>
      loadPipelineConfig(new ConfigService({ MMR_DIVERSITY: '1.5' })),
    ).toThrow(/retrieval\.diversityLambda/);
    expect(() =>
      loadPipelineConfig(new ConfigService({ CHUNK_OVERLAP_RATIO: '0.8' })),
    ).toThrow(/chunking\.overlapRatio/);
  });

  it('rejects an empty collection list', () => {
    expect(() =>
      loadPipelineConfig(new ConfigService({ QDRANT_COLLECTIONS: ' , ' })),
    ).toThrow(/index\.collections/);
  });

  it('rejects a minimum k above the maximum', () => {
    expect(() =>
      loadPipelineConfig(
        new ConfigService({ RETRIEVAL_MIN_K: '8', RETRIEVAL_MAX_K: '4' }),
      ),
    ).toThrow('RETRIEVAL_MIN_K must not exceed RETRIEVAL_MAX_K');
  });
});
