/**
 * Pipeline Workflow Service
 * Entry point for one query: validates the request, runs the LangGraph
 * pipeline on a fresh state, writes the audit record and shapes the result.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  errorMessage,
  InputError,
  type PipelineErrorRecord,
} from '../../common/errors';
import { PIPELINE_CONFIG, type PipelineConfig } from '../../config/pipeline.config';
import {
  VECTOR_INDEX_ADAPTER,
  type VectorIndexAdapter,
} from '../adapters/vector-index.adapter';
import { buildAuditRecord } from '../audit/audit-record';
import {
  AUDIT_SINK,
  type AuditSink,
  type AuditSummary,
  type StoredAuditRecord,
} from '../audit/audit.types';
import { CitationFormatterService } from '../services/citation-formatter.service';
import { ContextBuilderService } from '../services/context-builder.service';
import {
  GENERATION_CLIENT,
  type GenerationClient,
} from '../services/generation.client';
import { RerankerRegistry } from '../services/reranker.service';
import { RetrieverService } from '../services/retriever.service';
import type { CitationRecord, EvidenceStatus } from '../types';
import { partitionFilters, type RawFilters } from '../utils/metadata-filter';
import { buildPipelineGraph, type CompiledPipelineGraph } from './pipeline-graph';
import {
  createInitialState,
  type PipelineMetadata,
  type PipelineStage,
  type PipelineStateType,
  type ResolvedRunOptions,
} from './state/pipeline-state';

export interface RunOptions {
  k?: number;
  useReranker?: boolean;
  filters?: RawFilters;
  diversityLambda?: number;
  maxContextTokens?: number;
  collections?: string[];
  /** Per-call timeout for index queries and each generation attempt */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface PipelineResult {
  /** Set only when stage is 'done' */
  response: string | null;
  /** Set only when stage is 'done'; empty when no evidence was found */
  sources: CitationRecord[] | null;
  /** Set only when stage is 'failed' */
  error: PipelineErrorRecord | null;
  evidence: EvidenceStatus;
  stage: PipelineStage;
  metadata: PipelineMetadata;
}

export const MAX_AUDIT_LIST_LIMIT = 100;

export interface PipelineHealth {
  workflowReady: boolean;
  services: {
    index: boolean;
    reranker: boolean;
  };
}

@Injectable()
export class PipelineWorkflowService {
  private readonly logger = new Logger(PipelineWorkflowService.name);
  private readonly workflow: CompiledPipelineGraph;

  constructor(
    retriever: RetrieverService,
    private readonly rerankerRegistry: RerankerRegistry,
    @Inject(GENERATION_CLIENT) generationClient: GenerationClient,
    contextBuilder: ContextBuilderService,
    citationFormatter: CitationFormatterService,
    @Inject(AUDIT_SINK) private readonly auditSink: AuditSink,
    @Inject(VECTOR_INDEX_ADAPTER) private readonly indexAdapter: VectorIndexAdapter,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {
    this.workflow = buildPipelineGraph({
      retriever,
      rerankerRegistry,
      generationClient,
      contextBuilder,
      citationFormatter,
      config,
    });
    this.logger.log('LangGraph pipeline initialized: retrieve → rerank? → generate → format');
  }

  async run(query: string, options: RunOptions = {}): Promise<PipelineResult> {
    let resolved: ResolvedRunOptions;
    try {
      resolved = this.resolveOptions(query, options);
    } catch (error) {
      if (error instanceof InputError) {
        this.logger.warn(`Rejected query: ${error.message}`);
        return this.finish(this.rejectedState(query, options, error));
      }
      throw error;
    }

    this.logger.log(
      `Starting pipeline for query: "${query.slice(0, 80)}" (k=${resolved.k}, reranker=${resolved.useReranker})`,
    );

    const finalState = await this.workflow.invoke(createInitialState(query, resolved));

    return this.finish(finalState);
  }

  async healthCheck(): Promise<PipelineHealth> {
    const [index, reranker] = await Promise.all([
      this.indexAdapter.healthCheck(),
      this.config.reranking.enabled
        ? this.rerankerRegistry.healthCheck()
        : Promise.resolve(false),
    ]);

    return { workflowReady: true, services: { index, reranker } };
  }

  /**
   * @returns null when no query record has this id
   */
  async getAuditRecord(auditId: string): Promise<StoredAuditRecord | null> {
    return this.auditSink.find(auditId);
  }

  /**
   * Most recent query records first; limit is clamped to [1, 100]
   */
  async listRecentAudits(limit = 10): Promise<AuditSummary[]> {
    const bounded = Math.min(Math.max(Math.trunc(limit), 1), MAX_AUDIT_LIST_LIMIT);
    return this.auditSink.listRecent(bounded);
  }

  /**
   * Out-of-range k is clamped to [minK, maxK]; other bad options are rejected.
   * @throws InputError on a blank query, a non-integer k, unknown filter
   * fields or collections, or an out-of-range lambda or context budget
   */
  private resolveOptions(query: string, options: RunOptions): ResolvedRunOptions {
    if (typeof query !== 'string' || query.trim().length === 0) {
      throw new InputError('Query must be a non-empty string');
    }

    const { retrieval, generation, reranking } = this.config;
    const k = options.k ?? retrieval.defaultK;
    const diversityLambda = options.diversityLambda ?? retrieval.diversityLambda;
    const maxContextTokens = options.maxContextTokens ?? generation.maxContextTokens;

    if (!Number.isInteger(k)) {
      throw new InputError(`k must be an integer, got ${k}`);
    }
    if (!(diversityLambda >= 0 && diversityLambda <= 1)) {
      throw new InputError(`diversityLambda must be in [0, 1], got ${diversityLambda}`);
    }
    if (!Number.isInteger(maxContextTokens) || maxContextTokens < 1) {
      throw new InputError(
        `maxContextTokens must be a positive integer, got ${maxContextTokens}`,
      );
    }
    const { filters, unknownFields } = partitionFilters(options.filters ?? {});
    if (unknownFields.length > 0) {
      throw new InputError(`Unknown filter fields: ${unknownFields.join(', ')}`);
    }
    const unknownCollections = (options.collections ?? []).filter(
      (name) => !this.config.index.collections.includes(name),
    );
    if (unknownCollections.length > 0) {
      throw new InputError(`Unknown collections: ${unknownCollections.join(', ')}`);
    }

    return {
      k: Math.min(Math.max(k, retrieval.minK), retrieval.maxK),
      useReranker: options.useReranker ?? reranking.enabled,
      filters,
      diversityLambda,
      maxContextTokens,
      collections: options.collections,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    };
  }

  private rejectedState(
    query: string,
    options: RunOptions,
    error: InputError,
  ): PipelineStateType {
    const state = createInitialState(typeof query === 'string' ? query : '', {
      k: this.config.retrieval.defaultK,
      useReranker: false,
      filters: {},
      diversityLambda: this.config.retrieval.diversityLambda,
      maxContextTokens: this.config.generation.maxContextTokens,
      signal: options.signal,
    });
    return { ...state, stage: 'failed', error: error.toRecord() };
  }

  private async finish(state: PipelineStateType): Promise<PipelineResult> {
    const auditId = await this.writeAudit(state);
    const done = state.stage === 'done';

    const result: PipelineResult = {
      response: done ? state.response : null,
      sources: done ? state.sources : null,
      error: done ? null : state.error,
      evidence: state.evidence,
      stage: state.stage,
      metadata: {
        ...state.metadata,
        ...(auditId !== undefined && { auditId }),
      },
    };

    this.logger.log(
      `Pipeline finished: stage=${result.stage} evidence=${result.evidence} sources=${result.sources?.length ?? 0}${result.error ? ` error=${result.error.kind}` : ''}`,
    );

    return result;
  }

  /**
   * Audit failures are logged and never fail the query
   */
  private async writeAudit(state: PipelineStateType): Promise<string | undefined> {
    if (!this.config.audit.enabled) {
      return undefined;
    }

    const record = buildAuditRecord(state);
    try {
      await this.auditSink.write(record);
      return record.auditId;
    } catch (error) {
      this.logger.error(`Audit write failed for ${record.auditId}: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
