/**
 * Rerank Node
 * Retrieved → Reranked. Never fails the pipeline: a scoring failure is noted
 * in metadata and the unreranked set passes through.
 */

import { Logger } from '@nestjs/common';
import { errorMessage } from '../../../common/errors';
import type { RerankerRegistry } from '../../services/reranker.service';
import type { PipelineStateType } from '../state/pipeline-state';

const logger = new Logger('RerankNode');

export function createRerankNode(registry: RerankerRegistry) {
  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    const startTime = Date.now();
    const reranker = registry.select(state.options.useReranker);

    logger.log(
      `[Rerank] stage=rerank substage=start status=starting input=${state.documents.length} enabled=${reranker.enabled}`,
    );

    let documents = state.documents;
    let rerankError: string | undefined;

    try {
      const outcome = await reranker.rerank(
        state.query,
        state.documents,
        state.options.signal,
      );
      documents = outcome.documents;
      rerankError = outcome.failure?.message;
    } catch (error) {
      rerankError = errorMessage(error);
    }

    const duration = Date.now() - startTime;

    if (rerankError !== undefined) {
      logger.warn(
        `[Rerank] stage=rerank substage=error status=fallback duration=${duration}ms error=${rerankError} fallback=retrieval_order`,
      );
    } else {
      logger.log(
        `[Rerank] stage=rerank substage=complete status=success duration=${duration}ms output=${documents.length}`,
      );
    }

    return {
      stage: 'reranked',
      rerankedDocuments: documents,
      metadata: {
        rerankDuration: duration,
        rerankedCount: documents.length,
        ...(rerankError !== undefined && { rerankError }),
      },
    };
  };
}
