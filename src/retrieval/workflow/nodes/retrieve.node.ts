/**
 * Retrieve Node
 * Start → Retrieved, or Failed on IndexUnavailable.
 * An empty result is not an error: evidence becomes 'none'.
 */

import { Logger } from '@nestjs/common';
import { IndexUnavailableError, toErrorRecord } from '../../../common/errors';
import type { RetrieverService } from '../../services/retriever.service';
import type { PipelineStateType } from '../state/pipeline-state';

const logger = new Logger('RetrieveNode');

export function createRetrieveNode(retriever: RetrieverService) {
  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    const startTime = Date.now();
    const { k, filters, diversityLambda, collections, signal, timeoutMs } =
      state.options;

    logger.log(
      `[Retrieve] stage=retrieve substage=start status=starting k=${k} lambda=${diversityLambda} filters=${Object.keys(filters).length}`,
    );

    try {
      const documents = await retriever.retrieve(state.query, {
        k,
        filters,
        diversityLambda,
        collections,
        signal,
        timeoutMs,
      });
      const duration = Date.now() - startTime;

      logger.log(
        `[Retrieve] stage=retrieve substage=complete status=success results=${documents.length} duration=${duration}ms`,
      );

      return {
        stage: 'retrieved',
        documents,
        evidence: documents.length > 0 ? 'found' : 'none',
        metadata: {
          retrievalDuration: duration,
          retrievedCount: documents.length,
        },
      };
    } catch (error) {
      const duration = Date.now() - startTime;
      const record = toErrorRecord(
        error,
        (message, cause) => new IndexUnavailableError(message, cause),
      );

      logger.error(
        `[Retrieve] stage=retrieve substage=error status=failed duration=${duration}ms kind=${record.kind} error=${record.message}`,
      );

      return {
        stage: 'failed',
        error: record,
        metadata: { retrievalDuration: duration },
      };
    }
  };
}
