/**
 * Pipeline State Definition
 * One fresh state per query; never shared across invocations.
 */

import { Annotation } from '@langchain/langgraph';
import type { PipelineErrorRecord } from '../../../common/errors';
import type {
  CitationRecord,
  EvidenceStatus,
  MetadataFilters,
  RetrievedDocument,
} from '../../types';

export type PipelineStage =
  | 'start'
  | 'retrieved'
  | 'reranked'
  | 'generated'
  | 'formatted'
  | 'done'
  | 'failed';

/**
 * Request options after defaults from PipelineConfig are applied
 */
export interface ResolvedRunOptions {
  k: number;
  useReranker: boolean;
  filters: MetadataFilters;
  diversityLambda: number;
  maxContextTokens: number;
  collections?: string[];
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Diagnostics and timings; merged key by key across nodes
 */
export interface PipelineMetadata {
  startTime?: number;
  retrievalDuration?: number;
  retrievedCount?: number;
  rerankDuration?: number;
  rerankedCount?: number;
  rerankError?: string;
  contextTokens?: number;
  contextDocumentCount?: number;
  contextTruncated?: boolean;
  queryType?: string;
  insufficientEvidence?: boolean;
  generationAttempts?: number;
  generationErrors?: string[];
  generationDuration?: number;
  responseLength?: number;
  sourcesCount?: number;
  formatDuration?: number;
  totalDuration?: number;
  auditId?: string;
}

export const PipelineState = Annotation.Root({
  // Input
  query: Annotation<string>,
  options: Annotation<ResolvedRunOptions>,

  stage: Annotation<PipelineStage>,

  // Retrieve / Rerank
  documents: Annotation<RetrievedDocument[]>,
  /** null when reranking did not run */
  rerankedDocuments: Annotation<RetrievedDocument[] | null>,
  evidence: Annotation<EvidenceStatus>,

  // Generate
  /** Documents actually placed in the context */
  contextDocuments: Annotation<RetrievedDocument[]>,
  context: Annotation<string>,
  prompt: Annotation<string | null>,
  response: Annotation<string | null>,

  // Format
  sources: Annotation<CitationRecord[] | null>,

  error: Annotation<PipelineErrorRecord | null>,
  metadata: Annotation<PipelineMetadata>({
    reducer: (current, update) => ({ ...current, ...update }),
    default: () => ({}),
  }),
});

export type PipelineStateType = typeof PipelineState.State;

export function createInitialState(
  query: string,
  options: ResolvedRunOptions,
): PipelineStateType {
  return {
    query,
    options,
    stage: 'start',
    documents: [],
    rerankedDocuments: null,
    evidence: 'none',
    contextDocuments: [],
    context: '',
    prompt: null,
    response: null,
    sources: null,
    error: null,
    metadata: { startTime: Date.now() },
  };
}

/**
 * Document set the later stages work from
 */
export function activeDocuments(state: PipelineStateType): RetrievedDocument[] {
  return state.rerankedDocuments ?? state.documents;
}
