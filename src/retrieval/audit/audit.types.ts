/**
 * Audit Types
 * One record per pipeline invocation and one per indexed document, written
 * through an AuditSink
 */

import { z } from 'zod';
import type { PipelineErrorRecord } from '../../common/errors';
import type { CitationRecord, DocumentMetadata, EvidenceStatus } from '../types';
import type { PipelineMetadata, PipelineStage } from '../workflow/state/pipeline-state';

export const AUDIT_SINK = Symbol('AUDIT_SINK');

export interface AuditDocumentEntry {
  chunkId: string;
  documentId: string;
  source: string;
  collectionName: string;
  rank: number;
  similarityScore: number;
  rerankScore?: number;
  preview: string;
}

export interface AuditRecord {
  auditId: string;
  /** ISO-8601 */
  timestamp: string;
  query: string;
  stage: PipelineStage;
  evidence: EvidenceStatus;
  /** Final document set used for generation */
  documents: AuditDocumentEntry[];
  prompt: string | null;
  response: string | null;
  sources: CitationRecord[] | null;
  error: PipelineErrorRecord | null;
  metadata: PipelineMetadata;
}

export interface IngestionAuditRecord {
  auditId: string;
  timestamp: string;
  type: 'ingestion';
  documentId: string;
  collection: string;
  chunksCreated: number;
  /** Points of an earlier version of the document that were removed */
  pointsReplaced: number;
  metadata: DocumentMetadata;
}

/**
 * A query record read back from storage. Top-level fields are validated;
 * nested fields are returned as stored.
 */
export const storedAuditRecordSchema = z
  .object({
    auditId: z.string(),
    timestamp: z.string(),
    query: z.string(),
    stage: z.string(),
    evidence: z.string(),
    sources: z.array(z.unknown()).nullable(),
    error: z.object({ kind: z.string(), message: z.string() }).passthrough().nullable(),
  })
  .passthrough();

export type StoredAuditRecord = z.infer<typeof storedAuditRecordSchema>;

export interface AuditSummary {
  auditId: string;
  timestamp: string;
  query: string;
  stage: string;
  evidence: string;
  sourceCount: number;
  errorKind: string | null;
}

export function summarizeAuditRecord(record: StoredAuditRecord): AuditSummary {
  return {
    auditId: record.auditId,
    timestamp: record.timestamp,
    query: record.query,
    stage: record.stage,
    evidence: record.evidence,
    sourceCount: record.sources?.length ?? 0,
    errorKind: record.error?.kind ?? null,
  };
}

export interface AuditSink {
  write(record: AuditRecord): Promise<void>;

  writeIngestion(record: IngestionAuditRecord): Promise<void>;

  /**
   * @returns null when no query record has this id
   */
  find(auditId: string): Promise<StoredAuditRecord | null>;

  /**
   * Most recent query records first
   */
  listRecent(limit: number): Promise<AuditSummary[]>;
}
