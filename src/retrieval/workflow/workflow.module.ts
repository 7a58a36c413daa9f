/**
 * Workflow Module
 * Provides PipelineWorkflowService with the index, reranker, generation and
 * audit implementations bound to their injection tokens
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ChunkingModule } from '../../chunking/chunking.module';
import { PIPELINE_CONFIG, pipelineConfigProvider } from '../../config/pipeline.config';
import { QdrantIndexAdapter } from '../adapters/qdrant-index.adapter';
import { VECTOR_INDEX_ADAPTER } from '../adapters/vector-index.adapter';
import { AUDIT_SINK } from '../audit/audit.types';
import { FileAuditSink } from '../audit/file-audit.sink';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import { CitationFormatterService } from '../services/citation-formatter.service';
import { ContextBuilderService } from '../services/context-builder.service';
import {
  GENERATION_CLIENT,
  LangChainGenerationClient,
} from '../services/generation.client';
import { RerankerRegistry } from '../services/reranker.service';
import { RetrieverService } from '../services/retriever.service';
import { SCORING_CLIENT, TeiScoringClient } from '../services/tei-scoring.client';
import { PipelineWorkflowService } from './pipeline-workflow.service';

@Module({
  imports: [ConfigModule, ChunkingModule],
  providers: [
    // Workflow service
    PipelineWorkflowService,

    // Configuration
    pipelineConfigProvider,

    // Factories
    EmbeddingProviderFactory,
    LLMProviderFactory,

    // Boundaries
    { provide: VECTOR_INDEX_ADAPTER, useClass: QdrantIndexAdapter },
    { provide: SCORING_CLIENT, useClass: TeiScoringClient },
    { provide: GENERATION_CLIENT, useClass: LangChainGenerationClient },
    { provide: AUDIT_SINK, useClass: FileAuditSink },

    // Services
    RetrieverService,
    RerankerRegistry,
    ContextBuilderService,
    CitationFormatterService,
  ],
  exports: [PipelineWorkflowService, VECTOR_INDEX_ADAPTER, AUDIT_SINK, PIPELINE_CONFIG],
})
export class WorkflowModule {}
