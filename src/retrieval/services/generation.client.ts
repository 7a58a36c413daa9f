/**
 * Generation Client
 * Single-attempt chat completion; the pipeline owns retries and backoff.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import {
  HumanMessage,
  SystemMessage,
  type MessageContent,
} from '@langchain/core/messages';
import { asError, errorMessage, GenerationError } from '../../common/errors';
import { TimeoutError, withDeadline } from '../../common/utils/async.utils';
import { PIPELINE_CONFIG, type PipelineConfig } from '../../config/pipeline.config';
import { LLMProviderFactory } from '../providers/llm-provider.factory';

export const GENERATION_CLIENT = Symbol('GENERATION_CLIENT');

export interface GenerationRequest {
  prompt: string;
  systemPrompt: string;
  maxTokens: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface GenerationClient {
  /**
   * @throws GenerationError with a RateLimited, Timeout, Malformed or Upstream reason
   */
  generate(request: GenerationRequest): Promise<string>;
}

/**
 * Map a provider error onto a GenerationError reason
 */
export function toGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }

  const message = errorMessage(error);
  const cause = asError(error);

  if (
    error instanceof TimeoutError ||
    cause.name === 'AbortError' ||
    /timed? ?out|ETIMEDOUT|aborted/i.test(message)
  ) {
    return new GenerationError(`Generation timed out: ${message}`, 'Timeout', cause);
  }

  if (statusOf(error) === 429 || /rate.?limit|too many requests|\b429\b/i.test(message)) {
    return new GenerationError(`Generation rate limited: ${message}`, 'RateLimited', cause);
  }

  return new GenerationError(`Generation failed: ${message}`, 'Upstream', cause);
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }

  return content
    .map((part) =>
      part.type === 'text' && 'text' in part && typeof part.text === 'string'
        ? part.text
        : '',
    )
    .join('');
}

@Injectable()
export class LangChainGenerationClient implements GenerationClient {
  private readonly logger = new Logger(LangChainGenerationClient.name);
  private readonly models = new Map<number, BaseChatModel>();

  constructor(
    private readonly llmProviderFactory: LLMProviderFactory,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async generate(request: GenerationRequest): Promise<string> {
    const model = this.modelFor(request.maxTokens);
    const messages = [
      new SystemMessage(request.systemPrompt),
      new HumanMessage(request.prompt),
    ];

    let content: MessageContent;
    try {
      const result = await withDeadline(
        (signal) => model.invoke(messages, { signal }),
        request.timeoutMs,
        'Generation',
        request.signal,
      );
      content = result.content;
    } catch (error) {
      throw toGenerationError(error);
    }

    const text = contentToText(content).trim();
    if (text.length === 0) {
      throw new GenerationError('Model returned no text content', 'Malformed');
    }

    this.logger.debug(`Generated ${text.length} characters`);
    return text;
  }

  private modelFor(maxTokens: number): BaseChatModel {
    const cached = this.models.get(maxTokens);
    if (cached) {
      return cached;
    }

    const model = this.llmProviderFactory.createChatModel(undefined, {
      maxTokens,
      temperature: this.config.generation.temperature,
      maxRetries: 0,
    });
    this.models.set(maxTokens, model);
    return model;
  }
}
