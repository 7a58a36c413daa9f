import type { TokenCounter } from '../chunking/services/token-counter.service';

/**
 * One token per whitespace-separated word
 */
export class WordTokenCounter implements TokenCounter {
  countTokens(text: string): number {
    return words(text).length;
  }

  truncateToTokens(text: string, maxTokens: number): string {
    return words(text).slice(0, Math.max(0, maxTokens)).join(' ');
  }
}

function words(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}
