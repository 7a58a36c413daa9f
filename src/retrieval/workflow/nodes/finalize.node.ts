/**
 * Finalize Node
 * Terminal transition: Done when no error was recorded, Failed otherwise.
 * Writes metadata only.
 */

import { Logger } from '@nestjs/common';
import type { PipelineStateType } from '../state/pipeline-state';

const logger = new Logger('FinalizeNode');

export function createFinalizeNode() {
  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    const stage = state.error ? 'failed' : 'done';
    const totalDuration = Date.now() - (state.metadata.startTime ?? Date.now());

    logger.log(
      `[Finalize] stage=${stage} evidence=${state.evidence} duration=${totalDuration}ms${state.error ? ` error=${state.error.kind}` : ''}`,
    );

    return { stage, metadata: { totalDuration } };
  };
}
