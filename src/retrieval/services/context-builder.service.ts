/**
 * Context Builder
 * Formats the active document set into the generation context under a token budget.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  TOKEN_COUNTER,
  type TokenCounter,
} from '../../chunking/services/token-counter.service';
import { InputError } from '../../common/errors';
import type { RetrievedDocument } from '../types';
import { documentName } from '../utils/document-name';

export const CONTEXT_SEPARATOR = '\n---\n\n';

export interface BuiltContext {
  context: string;
  /** Documents actually present in the context, in order */
  documents: RetrievedDocument[];
  tokens: number;
  /** True when documents were dropped or the first one was cut */
  truncated: boolean;
}

export function documentHeader(position: number, document: RetrievedDocument): string {
  return `[Document ${position} - Source: ${documentName(document.chunk)}]`;
}

function formatBlock(position: number, document: RetrievedDocument, text: string): string {
  return `${documentHeader(position, document)}\n${text}\n`;
}

@Injectable()
export class ContextBuilderService {
  private readonly logger = new Logger(ContextBuilderService.name);

  constructor(@Inject(TOKEN_COUNTER) private readonly tokenCounter: TokenCounter) {}

  /**
   * Longest rank-order prefix of documents that fits in maxTokens.
   * Lowest-ranked documents are dropped first; a first document that alone
   * exceeds the budget is truncated.
   * @throws InputError when the budget cannot hold the first document's header
   * plus at least one token of its text
   */
  build(documents: RetrievedDocument[], maxTokens: number): BuiltContext {
    if (documents.length === 0) {
      return { context: '', documents: [], tokens: 0, truncated: false };
    }

    const blocks: string[] = [];
    let tokens = 0;

    for (const [index, document] of documents.entries()) {
      const block = formatBlock(index + 1, document, document.chunk.text);
      const candidateTokens = this.tokenCounter.countTokens(
        [...blocks, block].join(CONTEXT_SEPARATOR),
      );
      if (candidateTokens > maxTokens) {
        break;
      }
      blocks.push(block);
      tokens = candidateTokens;
    }

    if (blocks.length === 0) {
      return this.truncateFirst(documents[0], maxTokens);
    }

    const used = documents.slice(0, blocks.length);
    const truncated = used.length < documents.length;
    if (truncated) {
      this.logger.log(
        `Context budget ${maxTokens} tokens: kept ${used.length}/${documents.length} documents`,
      );
    }

    return { context: blocks.join(CONTEXT_SEPARATOR), documents: used, tokens, truncated };
  }

  private truncateFirst(document: RetrievedDocument, maxTokens: number): BuiltContext {
    const overhead = this.tokenCounter.countTokens(formatBlock(1, document, ''));
    if (overhead >= maxTokens) {
      throw new InputError(
        `Context budget of ${maxTokens} tokens cannot fit a document header (${overhead} tokens)`,
      );
    }
    const text = this.tokenCounter.truncateToTokens(document.chunk.text, maxTokens - overhead);
    const context = formatBlock(1, document, text);

    this.logger.log(
      `Context budget ${maxTokens} tokens: first document truncated to fit`,
    );

    return {
      context,
      documents: [document],
      tokens: this.tokenCounter.countTokens(context),
      truncated: true,
    };
  }
}
