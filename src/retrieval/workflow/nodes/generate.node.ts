/**
 * Generate Node
 * Reranked/Retrieved → Generated, or Failed with GenerationError after the
 * bounded retries. Zero documents short-circuit to a fixed
 * insufficient-evidence response without calling the model.
 */

import { Logger } from '@nestjs/common';
import { InputError, type GenerationError } from '../../../common/errors';
import { backoffDelay, sleep } from '../../../common/utils/async.utils';
import type { PipelineConfig } from '../../../config/pipeline.config';
import {
  ANALYST_SYSTEM_PROMPT,
  INSUFFICIENT_EVIDENCE_RESPONSE,
  buildSpecializedPrompt,
  classifyQueryType,
} from '../../prompts/analyst.prompts';
import type {
  BuiltContext,
  ContextBuilderService,
} from '../../services/context-builder.service';
import {
  toGenerationError,
  type GenerationClient,
} from '../../services/generation.client';
import { activeDocuments, type PipelineStateType } from '../state/pipeline-state';

const logger = new Logger('GenerateNode');

export interface GenerateNodeDeps {
  generationClient: GenerationClient;
  contextBuilder: ContextBuilderService;
  config: PipelineConfig;
}

export function createGenerateNode(deps: GenerateNodeDeps) {
  const { generationClient, contextBuilder, config } = deps;

  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    const startTime = Date.now();
    const documents = activeDocuments(state);

    if (documents.length === 0) {
      logger.log(
        `[Generate] stage=generate substage=skip status=insufficient_evidence`,
      );
      return {
        stage: 'generated',
        contextDocuments: [],
        context: '',
        response: INSUFFICIENT_EVIDENCE_RESPONSE,
        metadata: { insufficientEvidence: true, generationAttempts: 0 },
      };
    }

    let built: BuiltContext;
    try {
      built = contextBuilder.build(documents, state.options.maxContextTokens);
    } catch (error) {
      if (!(error instanceof InputError)) {
        throw error;
      }
      logger.warn(`[Generate] stage=generate substage=context status=failed error=${error.message}`);
      return { stage: 'failed', error: error.toRecord() };
    }
    const queryType = classifyQueryType(state.query);
    const prompt = buildSpecializedPrompt(state.query, built.context, queryType);
    const contextUpdate = {
      contextDocuments: built.documents,
      context: built.context,
      prompt,
    };
    const contextMetadata = {
      contextTokens: built.tokens,
      contextDocumentCount: built.documents.length,
      contextTruncated: built.truncated,
      queryType,
    };

    const { maxRetries, retryBaseDelayMs, retryMaxDelayMs, maxTokens } =
      config.generation;
    const timeoutMs = state.options.timeoutMs ?? config.generation.timeoutMs;
    const signal = state.options.signal;
    const failures: string[] = [];
    let lastError: GenerationError | null = null;
    let attempts = 0;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      attempts = attempt + 1;
      try {
        const response = await generationClient.generate({
          prompt,
          systemPrompt: ANALYST_SYSTEM_PROMPT,
          maxTokens,
          timeoutMs,
          signal,
        });
        const duration = Date.now() - startTime;

        logger.log(
          `[Generate] stage=generate substage=complete status=success attempts=${attempts} chars=${response.length} duration=${duration}ms`,
        );

        return {
          ...contextUpdate,
          stage: 'generated',
          response,
          metadata: {
            ...contextMetadata,
            generationAttempts: attempts,
            generationDuration: duration,
            responseLength: response.length,
            ...(failures.length > 0 && { generationErrors: failures }),
          },
        };
      } catch (error) {
        lastError = toGenerationError(error);
        failures.push(`${lastError.reason}: ${lastError.message}`);

        if (attempt === maxRetries || signal?.aborted) {
          break;
        }

        const delay = backoffDelay(attempt, retryBaseDelayMs, retryMaxDelayMs);
        logger.warn(
          `[Generate] stage=generate substage=retry status=retrying attempt=${attempts} reason=${lastError.reason} delay=${delay}ms`,
        );

        try {
          await sleep(delay, signal);
        } catch {
          failures.push('Timeout: cancelled by caller during backoff');
          break;
        }
      }
    }

    const duration = Date.now() - startTime;
    const record = lastError
      ? lastError.toRecord()
      : toGenerationError(new Error('Generation did not run')).toRecord();

    logger.error(
      `[Generate] stage=generate substage=error status=failed attempts=${attempts} reason=${record.reason ?? 'unknown'} duration=${duration}ms`,
    );

    return {
      ...contextUpdate,
      stage: 'failed',
      error: record,
      metadata: {
        ...contextMetadata,
        generationAttempts: attempts,
        generationDuration: duration,
        generationErrors: failures,
      },
    };
  };
}
