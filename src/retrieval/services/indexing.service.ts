/**
 * Indexing Service
 * Chunks one preprocessed document, embeds every chunk and replaces the
 * document's points in a configured collection. Documents sent without a
 * collection are routed by document type and crime type.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ChunkerService } from '../../chunking/chunker.service';
import type { Chunk, ContentType } from '../../chunking/types/chunk.types';
import {
  errorMessage,
  IndexUnavailableError,
  InputError,
  PipelineError,
  asError,
} from '../../common/errors';
import { PIPELINE_CONFIG, type PipelineConfig } from '../../config/pipeline.config';
import {
  VECTOR_INDEX_ADAPTER,
  type IndexPoint,
  type VectorIndexAdapter,
} from '../adapters/vector-index.adapter';
import { AUDIT_SINK, type AuditSink } from '../audit/audit.types';
import type { DocumentMetadata, IndexedChunk } from '../types';
import { COLLECTION_DESCRIPTIONS, routeCollection } from '../utils/collection-routing';

export interface IndexDocumentInput {
  documentId: string;
  text: string;
  /** Routed from documentType and metadata.crimeType when omitted */
  collection?: string;
  documentType?: string;
  metadata?: DocumentMetadata;
  targetTokens?: number;
  overlapRatio?: number;
}

export interface IndexDocumentResult {
  documentId: string;
  collection: string;
  chunkCount: number;
  indexedCount: number;
  /** Points of a previous version of the document that were removed */
  replacedCount: number;
  byContentType: Record<ContentType, number>;
  durationMs: number;
}

export interface CollectionInfo {
  name: string;
  description: string;
  /** null when the collection has not been created yet */
  pointCount: number | null;
}

@Injectable()
export class IndexingService {
  private readonly logger = new Logger(IndexingService.name);

  constructor(
    private readonly chunker: ChunkerService,
    @Inject(VECTOR_INDEX_ADAPTER) private readonly indexAdapter: VectorIndexAdapter,
    @Inject(AUDIT_SINK) private readonly auditSink: AuditSink,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  /**
   * Re-indexing a document replaces its earlier points in every configured
   * collection, so a changed chunk count or collection leaves nothing stale.
   * @throws InputError on blank text, unknown collection or bad chunk options
   * @throws IndexUnavailableError when embedding, delete or upsert fails
   */
  async indexDocument(input: IndexDocumentInput): Promise<IndexDocumentResult> {
    const startTime = Date.now();
    const metadata = input.metadata ?? {};
    const collection =
      input.collection ??
      routeCollection({ documentType: input.documentType, crimeType: metadata.crimeType });

    if (!this.config.index.collections.includes(collection)) {
      throw new InputError(
        `Unknown collection "${collection}"; expected one of ${this.config.index.collections.join(', ')}`,
      );
    }
    if (input.collection === undefined) {
      this.logger.log(`[Index] stage=route document=${input.documentId} collection=${collection}`);
    }

    const chunks = this.chunker.toArray(input.text, {
      documentId: input.documentId,
      targetTokens: input.targetTokens ?? this.config.chunking.targetTokens,
      overlapRatio: input.overlapRatio ?? this.config.chunking.overlapRatio,
      tolerance: this.config.chunking.boundaryTolerance,
    });

    this.logger.log(
      `[Index] stage=chunk status=done document=${input.documentId} chunks=${chunks.length}`,
    );

    let indexedCount: number;
    let replacedCount = 0;
    try {
      const points: IndexPoint[] = [];
      for (const chunk of chunks) {
        points.push({
          vector: await this.indexAdapter.embed(chunk.text),
          chunk: toIndexedChunk(chunk, metadata),
        });
      }
      for (const name of this.config.index.collections) {
        replacedCount += await this.indexAdapter.deleteDocument(name, input.documentId);
      }
      indexedCount = await this.indexAdapter.upsert(collection, points);
    } catch (error) {
      if (error instanceof PipelineError) {
        throw error;
      }
      this.logger.error(
        `[Index] stage=upsert status=error document=${input.documentId} error=${errorMessage(error)}`,
      );
      throw new IndexUnavailableError(
        `Indexing failed: ${errorMessage(error)}`,
        asError(error),
      );
    }

    const durationMs = Date.now() - startTime;
    this.logger.log(
      `[Index] stage=upsert status=done document=${input.documentId} collection=${collection} points=${indexedCount} replaced=${replacedCount} duration=${durationMs}ms`,
    );

    await this.logIngestion(input.documentId, collection, chunks.length, replacedCount, metadata);

    return {
      documentId: input.documentId,
      collection,
      chunkCount: chunks.length,
      indexedCount,
      replacedCount,
      byContentType: countByContentType(chunks),
      durationMs,
    };
  }

  /**
   * Point counts for every configured collection
   * @throws IndexUnavailableError when the index cannot be reached
   */
  async collectionInfo(): Promise<CollectionInfo[]> {
    return Promise.all(
      this.config.index.collections.map(async (name) => ({
        name,
        description: COLLECTION_DESCRIPTIONS[name] ?? '',
        pointCount: await this.indexAdapter.countPoints(name),
      })),
    );
  }

  /**
   * Audit failures are logged and never fail the indexing call
   */
  private async logIngestion(
    documentId: string,
    collection: string,
    chunksCreated: number,
    pointsReplaced: number,
    metadata: DocumentMetadata,
  ): Promise<void> {
    if (!this.config.audit.enabled) {
      return;
    }
    try {
      await this.auditSink.writeIngestion({
        auditId: uuidv4(),
        timestamp: new Date().toISOString(),
        type: 'ingestion',
        documentId,
        collection,
        chunksCreated,
        pointsReplaced,
        metadata,
      });
    } catch (error) {
      this.logger.error(`Ingestion audit failed for ${documentId}: ${errorMessage(error)}`);
    }
  }
}

export function toIndexedChunk(chunk: Chunk, metadata: DocumentMetadata): IndexedChunk {
  return {
    chunkId: chunk.id,
    text: chunk.text,
    documentId: chunk.sourceDocumentId,
    sectionId: chunk.sectionId,
    ...(chunk.sectionTitle !== undefined && { sectionTitle: chunk.sectionTitle }),
    chunkIndex: chunk.chunkIndex,
    contentType: chunk.contentType,
    confidenceLevel: chunk.confidenceLevel,
    metadata,
  };
}

function countByContentType(chunks: Chunk[]): Record<ContentType, number> {
  const counts: Record<ContentType, number> = {
    Theory: 0,
    Facts: 0,
    Analysis: 0,
    Conclusion: 0,
    Unclassified: 0,
  };
  for (const chunk of chunks) {
    counts[chunk.contentType] += 1;
  }
  return counts;
}
