/**
 * Format Node
 * Generated → Formatted. A FormatError is recorded on the state, never swallowed.
 */

import { Logger } from '@nestjs/common';
import { FormatError, toErrorRecord } from '../../../common/errors';
import type { CitationFormatterService } from '../../services/citation-formatter.service';
import type { PipelineStateType } from '../state/pipeline-state';

const logger = new Logger('FormatNode');

export function createFormatNode(formatter: CitationFormatterService) {
  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    const startTime = Date.now();

    try {
      const { text, citations } = formatter.format(
        state.response ?? '',
        state.contextDocuments,
      );
      const duration = Date.now() - startTime;

      logger.log(
        `[Format] stage=format substage=complete status=success sources=${citations.length} duration=${duration}ms`,
      );

      return {
        stage: 'formatted',
        response: text,
        sources: citations,
        metadata: { sourcesCount: citations.length, formatDuration: duration },
      };
    } catch (error) {
      const record = toErrorRecord(error, (message) => new FormatError(message));

      logger.error(
        `[Format] stage=format substage=error status=failed error=${record.message}`,
      );

      return {
        stage: 'failed',
        error: record,
        metadata: { formatDuration: Date.now() - startTime },
      };
    }
  };
}
