import { z } from 'zod';
import { CONTENT_TYPES } from '../../chunking/types/chunk.types';
import type { IndexedChunk } from '../types';

const documentMetadataSchema = z.object({
  source: z.string().optional(),
  crimeType: z.string().optional(),
  offenderType: z.string().optional(),
  victimology: z.string().optional(),
  modusOperandi: z.string().optional(),
  signatureBehavior: z.string().optional(),
  geography: z.string().optional(),
  timePeriod: z.string().optional(),
  sourceReliability: z.enum(['high', 'medium', 'low']).optional(),
  documentAuthority: z.string().optional(),
  publicationYear: z.number().int().optional(),
});

/**
 * Payload stored with every point
 */
export const indexedChunkSchema = z.object({
  chunkId: z.string().min(1),
  text: z.string(),
  documentId: z.string(),
  sectionId: z.string(),
  sectionTitle: z.string().optional(),
  chunkIndex: z.number().int().min(0),
  contentType: z.enum(CONTENT_TYPES).catch('Unclassified'),
  confidenceLevel: z.number().min(0).max(1).catch(0),
  metadata: documentMetadataSchema.default({}),
});

export function parseIndexedChunk(payload: unknown): IndexedChunk | null {
  const parsed = indexedChunkSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}

export function toPayload(chunk: IndexedChunk): Record<string, unknown> {
  return {
    chunkId: chunk.chunkId,
    text: chunk.text,
    documentId: chunk.documentId,
    sectionId: chunk.sectionId,
    ...(chunk.sectionTitle !== undefined && { sectionTitle: chunk.sectionTitle }),
    chunkIndex: chunk.chunkIndex,
    contentType: chunk.contentType,
    confidenceLevel: chunk.confidenceLevel,
    metadata: { ...chunk.metadata },
  };
}
