/**
 * Content Classifiers
 * Pluggable policy that tags a chunk as Theory / Facts / Analysis / Conclusion
 */

import type { ContentType } from '../types/chunk.types';
import contentKeywords from './content-keywords.json';

export const CONTENT_CLASSIFIER = Symbol('CONTENT_CLASSIFIER');

export interface ContentClassification {
  contentType: ContentType;
  confidence: number;
}

export interface ContentClassifier {
  classify(text: string): ContentClassification;
}

type ClassifiedType = Exclude<ContentType, 'Unclassified'>;

/** Priority order; earlier wins a tie */
const CLASSIFIED_TYPES: ClassifiedType[] = [
  'Theory',
  'Facts',
  'Analysis',
  'Conclusion',
];

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keywordPattern(keywords: string[]): RegExp | null {
  if (keywords.length === 0) {
    return null;
  }
  const alternatives = keywords
    .map((keyword) => escapeRegex(keyword).replace(/\s+/g, '\\s+'))
    .join('|');
  return new RegExp(`(?<![\\p{L}\\p{N}])(?:${alternatives})(?![\\p{L}\\p{N}])`, 'giu');
}

/**
 * Keyword-count classifier.
 * confidence = hits of the winning type / hits of all types
 */
export class KeywordContentClassifier implements ContentClassifier {
  private readonly patterns: Array<{
    type: ClassifiedType;
    regex: RegExp | null;
  }>;

  constructor(
    keywords: Record<ClassifiedType, string[]> = contentKeywords,
  ) {
    this.patterns = CLASSIFIED_TYPES.map((type) => ({
      type,
      regex: keywordPattern(keywords[type]),
    }));
  }

  classify(text: string): ContentClassification {
    let total = 0;
    let bestType: ClassifiedType | null = null;
    let bestHits = 0;

    for (const { type, regex } of this.patterns) {
      const hits = regex ? (text.match(regex)?.length ?? 0) : 0;
      total += hits;
      if (hits > bestHits) {
        bestHits = hits;
        bestType = type;
      }
    }

    if (bestType === null || total === 0) {
      return { contentType: 'Unclassified', confidence: 0 };
    }

    return { contentType: bestType, confidence: bestHits / total };
  }
}
