import { v4 as uuidv4 } from 'uuid';
import type { PipelineStateType } from '../workflow/state/pipeline-state';
import { documentName } from '../utils/document-name';
import type { AuditDocumentEntry, AuditRecord } from './audit.types';

const PREVIEW_LENGTH = 200;

export function buildAuditRecord(
  state: PipelineStateType,
  now: Date = new Date(),
  auditId: string = uuidv4(),
): AuditRecord {
  const failed = state.stage === 'failed';

  return {
    auditId,
    timestamp: now.toISOString(),
    query: state.query,
    stage: state.stage,
    evidence: state.evidence,
    documents: state.contextDocuments.map(
      (document): AuditDocumentEntry => ({
        chunkId: document.chunk.chunkId,
        documentId: document.chunk.documentId,
        source: documentName(document.chunk),
        collectionName: document.collectionName,
        rank: document.rank,
        similarityScore: document.similarityScore,
        ...(document.rerankScore !== undefined && {
          rerankScore: document.rerankScore,
        }),
        preview: document.chunk.text.slice(0, PREVIEW_LENGTH),
      }),
    ),
    prompt: state.prompt,
    response: failed ? null : state.response,
    sources: failed ? null : state.sources,
    error: state.error,
    metadata: state.metadata,
  };
}
