import { Injectable, Logger } from '@nestjs/common';
import { getEncoding, Tiktoken } from 'js-tiktoken';

export const TOKEN_COUNTER = Symbol('TOKEN_COUNTER');

/**
 * Model-token accounting used for context budgets
 */
export interface TokenCounter {
  countTokens(text: string): number;
  /** Longest prefix of text that fits in maxTokens */
  truncateToTokens(text: string, maxTokens: number): string;
}

/**
 * Token Counter Service
 * Uses js-tiktoken with cl100k_base encoding (GPT-3.5/4 compatible)
 */
@Injectable()
export class TokenCounterService implements TokenCounter {
  private readonly logger = new Logger(TokenCounterService.name);
  private readonly ENCODING_NAME = 'cl100k_base';
  private readonly encoding: Tiktoken;

  constructor() {
    this.encoding = getEncoding(this.ENCODING_NAME);
    this.logger.log(
      `Token counter initialized with encoding: ${this.ENCODING_NAME}`,
    );
  }

  countTokens(text: string): number {
    return this.encoding.encode(text).length;
  }

  truncateToTokens(text: string, maxTokens: number): string {
    if (maxTokens <= 0) {
      return '';
    }

    const tokens = this.encoding.encode(text);
    if (tokens.length <= maxTokens) {
      return text;
    }

    // Decoding a cut through a multi-byte character leaves U+FFFD at the end
    return this.encoding
      .decode(tokens.slice(0, maxTokens))
      .replace(/�+$/, '');
  }
}
