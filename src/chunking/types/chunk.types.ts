/**
 * Chunk Types
 * A chunk is an immutable span of source text used as the retrieval unit
 */

export const CONTENT_TYPES = [
  'Theory',
  'Facts',
  'Analysis',
  'Conclusion',
  'Unclassified',
] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export interface Chunk {
  /** Stable id: `${sourceDocumentId}::chunk-${chunkIndex}` */
  id: string;
  text: string;
  /** Lexical tokens in the chunk, overlap included */
  tokenCount: number;
  /** Leading tokens shared with the previous chunk (0 for the first chunk) */
  overlapTokens: number;
  overlapRatio: number;
  contentType: ContentType;
  /** Classifier confidence, 0..1 */
  confidenceLevel: number;
  sectionId: string;
  sectionTitle?: string;
  sourceDocumentId: string;
  chunkIndex: number;
  startOffset: number;
  endOffset: number;
  /** Start of the non-overlapping core: [coreStartOffset, endOffset) */
  coreStartOffset: number;
}

export interface ChunkOptions {
  documentId?: string;
  targetTokens?: number;
  overlapRatio?: number;
  /** Boundary search window around the target, as a fraction of it */
  tolerance?: number;
}

/**
 * Token span over the source text; spans tile the text without gaps
 */
export interface TokenSpan {
  start: number;
  end: number;
  /** Index of the first trailing whitespace character */
  wordEnd: number;
}

export type BoundaryStrength = 0 | 1 | 2;

export interface SectionHeading {
  offset: number;
  title: string;
}
