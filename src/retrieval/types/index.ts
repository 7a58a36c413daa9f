/**
 * Retrieval Types
 * Shared shapes for indexed chunks, candidates, retrieved documents and citations
 */

import type { ContentType } from '../../chunking/types/chunk.types';

export type SourceReliability = 'high' | 'medium' | 'low';

/**
 * Document-level metadata attached to every chunk at indexing time
 */
export interface DocumentMetadata {
  /** Human-readable document name used in citations */
  source?: string;
  crimeType?: string;
  offenderType?: string;
  victimology?: string;
  modusOperandi?: string;
  signatureBehavior?: string;
  geography?: string;
  timePeriod?: string;
  sourceReliability?: SourceReliability;
  /** Free-text category, e.g. FBI, DOJ, academic */
  documentAuthority?: string;
  publicationYear?: number;
}

export type MetadataField = keyof DocumentMetadata;

export type FilterValue = string | number;

/**
 * Field → accepted value or value set. Every predicate must hold.
 */
export type MetadataFilters = Partial<
  Record<MetadataField, FilterValue | FilterValue[]>
>;

/**
 * Chunk payload as stored in the vector index
 */
export interface IndexedChunk {
  chunkId: string;
  text: string;
  documentId: string;
  sectionId: string;
  sectionTitle?: string;
  chunkIndex: number;
  contentType: ContentType;
  confidenceLevel: number;
  metadata: DocumentMetadata;
}

/**
 * Raw similarity-search hit, before MMR
 */
export interface IndexCandidate {
  chunk: IndexedChunk;
  /** Cosine similarity to the query embedding */
  score: number;
  /** Stored embedding, required for MMR diversity */
  vector: number[];
  collectionName: string;
}

export interface RetrievedDocument {
  chunk: IndexedChunk;
  similarityScore: number;
  /** 1-based position in the current ordering */
  rank: number;
  collectionName: string;
  rerankScore?: number;
}

export interface CitationRecord {
  referenceNumber: number;
  documentName: string;
  sourceDocumentId: string;
  authority?: string;
  reliability?: SourceReliability;
  publicationYear?: number;
  crimeType?: string;
  chunkIds: string[];
  preview: string;
}

export type EvidenceStatus = 'found' | 'none';
