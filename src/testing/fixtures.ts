/**
 * Test fixtures: configuration, chunks and retrieved documents
 */

import type { PipelineConfig } from '../config/pipeline.config';
import type {
  DocumentMetadata,
  IndexCandidate,
  IndexedChunk,
  RetrievedDocument,
} from '../retrieval/types';

type ConfigOverrides = {
  [Section in keyof PipelineConfig]?: Partial<PipelineConfig[Section]>;
};

export function testPipelineConfig(overrides: ConfigOverrides = {}): PipelineConfig {
  return {
    index: {
      collections: ['forensic_cases', 'criminology_theory'],
      timeoutMs: 1000,
      ...overrides.index,
    },
    retrieval: {
      defaultK: 5,
      minK: 3,
      maxK: 10,
      oversampleFactor: 3,
      diversityLambda: 0.5,
      ...overrides.retrieval,
    },
    reranking: {
      enabled: false,
      ...overrides.reranking,
    },
    generation: {
      maxTokens: 1200,
      temperature: 0.3,
      timeoutMs: 1000,
      maxRetries: 3,
      retryBaseDelayMs: 1,
      retryMaxDelayMs: 4,
      maxContextTokens: 6000,
      ...overrides.generation,
    },
    chunking: {
      targetTokens: 650,
      overlapRatio: 0.15,
      boundaryTolerance: 0.2,
      ...overrides.chunking,
    },
    audit: {
      enabled: true,
      logDir: './logs/audit',
      ...overrides.audit,
    },
  };
}

export function makeChunk(
  id: string,
  metadata: DocumentMetadata = {},
  text = `Passage ${id} about crime scene analysis.`,
): IndexedChunk {
  return {
    chunkId: id,
    text,
    documentId: metadata.source ?? `doc-${id}`,
    sectionId: `doc-${id}:sec-0`,
    chunkIndex: 0,
    contentType: 'Facts',
    confidenceLevel: 1,
    metadata,
  };
}

export function makeCandidate(
  id: string,
  score: number,
  vector: number[] = [1, 0],
  metadata: DocumentMetadata = {},
  collectionName = 'forensic_cases',
): IndexCandidate {
  return { chunk: makeChunk(id, metadata), score, vector, collectionName };
}

export function makeDocument(
  id: string,
  rank: number,
  metadata: DocumentMetadata = {},
  text?: string,
): RetrievedDocument {
  return {
    chunk: makeChunk(id, metadata, text),
    similarityScore: 1 - rank / 10,
    rank,
    collectionName: 'forensic_cases',
  };
}
