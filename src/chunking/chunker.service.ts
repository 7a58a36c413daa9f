/**
 * Chunker Service
 * Splits normalized document text into overlapping, content-typed chunks.
 *
 * Chunks end at a paragraph or sentence boundary inside the tolerance window
 * around the target size, or at a hard cut of exactly `targetTokens` tokens
 * when the window holds no boundary. Each chunk after the first re-includes the
 * last `round(overlapRatio * targetTokens)` tokens of its predecessor.
 */

import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InputError } from '../common/errors';
import {
  CONTENT_CLASSIFIER,
  KeywordContentClassifier,
  type ContentClassifier,
} from './classifiers/content-classifier';
import { boundaryAfter, tokenize } from './services/lexical-tokenizer';
import { SectionTracker } from './services/section-tracker';
import type {
  BoundaryStrength,
  Chunk,
  ChunkOptions,
  TokenSpan,
} from './types/chunk.types';

export const DEFAULT_TARGET_TOKENS = 650;
export const DEFAULT_OVERLAP_RATIO = 0.15;
export const DEFAULT_BOUNDARY_TOLERANCE = 0.2;

interface ChunkPlan {
  documentId: string;
  targetTokens: number;
  overlapRatio: number;
  minTokens: number;
  maxTokens: number;
  overlapTokens: number;
}

@Injectable()
export class ChunkerService {
  private readonly logger = new Logger(ChunkerService.name);
  private readonly classifier: ContentClassifier;

  constructor(
    @Optional()
    @Inject(CONTENT_CLASSIFIER)
    classifier?: ContentClassifier,
  ) {
    this.classifier = classifier ?? new KeywordContentClassifier();
  }

  /**
   * Lazily chunk a document. Validation runs eagerly; iteration is
   * restartable and each pass yields the same chunks.
   * @throws InputError on blank text or out-of-range options
   */
  chunk(documentText: string, options: ChunkOptions = {}): Iterable<Chunk> {
    if (typeof documentText !== 'string' || documentText.trim().length === 0) {
      throw new InputError('Document text is empty or whitespace-only');
    }

    const plan = this.plan(options);

    return {
      [Symbol.iterator]: () => this.generate(documentText, plan),
    };
  }

  toArray(documentText: string, options: ChunkOptions = {}): Chunk[] {
    return Array.from(this.chunk(documentText, options));
  }

  private plan(options: ChunkOptions): ChunkPlan {
    const targetTokens = options.targetTokens ?? DEFAULT_TARGET_TOKENS;
    const overlapRatio = options.overlapRatio ?? DEFAULT_OVERLAP_RATIO;
    const tolerance = options.tolerance ?? DEFAULT_BOUNDARY_TOLERANCE;

    if (!Number.isInteger(targetTokens) || targetTokens < 1) {
      throw new InputError(
        `targetTokens must be a positive integer, got ${targetTokens}`,
      );
    }
    if (!(overlapRatio >= 0 && overlapRatio < 1)) {
      throw new InputError(`overlapRatio must be in [0, 1), got ${overlapRatio}`);
    }
    if (!(tolerance >= 0 && tolerance < 1)) {
      throw new InputError(`tolerance must be in [0, 1), got ${tolerance}`);
    }

    const minTokens = Math.max(1, Math.floor(targetTokens * (1 - tolerance)));
    const maxTokens = Math.max(
      targetTokens,
      Math.ceil(targetTokens * (1 + tolerance)),
    );

    return {
      documentId: options.documentId ?? 'doc',
      targetTokens,
      overlapRatio,
      minTokens,
      maxTokens,
      // Overlap stays below the shortest chunk so every chunk advances
      overlapTokens: Math.min(
        Math.round(overlapRatio * targetTokens),
        minTokens - 1,
      ),
    };
  }

  private *generate(text: string, plan: ChunkPlan): Generator<Chunk> {
    const spans = tokenize(text);
    const sections = new SectionTracker(text, plan.documentId);
    const total = spans.length;

    let start = 0;
    let chunkIndex = 0;

    while (start < total) {
      const end = this.findEnd(text, spans, start, plan);
      const overlap = chunkIndex === 0 ? 0 : plan.overlapTokens;

      yield this.buildChunk(text, spans, sections, plan, {
        chunkIndex,
        start,
        end,
        overlap,
      });

      if (end >= total) {
        this.logger.debug(
          `Chunked document ${plan.documentId}: ${chunkIndex + 1} chunks from ${total} tokens`,
        );
        return;
      }

      start = end - plan.overlapTokens;
      chunkIndex++;
    }
  }

  /**
   * Exclusive end token index for a chunk starting at `start`
   */
  private findEnd(
    text: string,
    spans: TokenSpan[],
    start: number,
    plan: ChunkPlan,
  ): number {
    const total = spans.length;
    if (total - start <= plan.maxTokens) {
      return total;
    }

    const target = start + plan.targetTokens;
    let bestEnd = -1;
    let bestStrength: BoundaryStrength = 0;

    for (let end = start + plan.minTokens; end <= start + plan.maxTokens; end++) {
      const strength = boundaryAfter(text, spans[end - 1]);
      if (strength === 0) {
        continue;
      }

      const closer =
        bestEnd === -1 ||
        strength > bestStrength ||
        (strength === bestStrength &&
          Math.abs(end - target) < Math.abs(bestEnd - target));

      if (closer) {
        bestEnd = end;
        bestStrength = strength;
      }
    }

    return bestEnd === -1 ? target : bestEnd;
  }

  private buildChunk(
    text: string,
    spans: TokenSpan[],
    sections: SectionTracker,
    plan: ChunkPlan,
    range: { chunkIndex: number; start: number; end: number; overlap: number },
  ): Chunk {
    const startOffset = spans[range.start].start;
    const endOffset = spans[range.end - 1].end;
    const coreStartOffset = spans[range.start + range.overlap].start;
    const chunkText = text.slice(startOffset, endOffset);
    const { contentType, confidence } = this.classifier.classify(chunkText);
    const section = sections.resolve(coreStartOffset);

    return {
      id: `${plan.documentId}::chunk-${range.chunkIndex}`,
      text: chunkText,
      tokenCount: range.end - range.start,
      overlapTokens: range.overlap,
      overlapRatio: plan.overlapRatio,
      contentType,
      confidenceLevel: confidence,
      sectionId: section.sectionId,
      ...(section.sectionTitle !== undefined && {
        sectionTitle: section.sectionTitle,
      }),
      sourceDocumentId: plan.documentId,
      chunkIndex: range.chunkIndex,
      startOffset,
      endOffset,
      coreStartOffset,
    };
  }
}

/**
 * Non-overlapping part of a chunk; concatenating cores in order
 * reconstructs the source text
 */
export function coreText(chunk: Chunk, sourceText: string): string {
  return sourceText.slice(chunk.coreStartOffset, chunk.endOffset);
}
