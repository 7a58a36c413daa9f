/**
 * Pipeline Graph
 *
 *   START → retrieve ─┬─ failed ──────────────→ finalize → END
 *                     ├─ rerank → generate ─┬─ failed → finalize
 *                     └─ generate ──────────┴─ format → finalize
 */

import { END, START, StateGraph } from '@langchain/langgraph';
import type { PipelineConfig } from '../../config/pipeline.config';
import type { CitationFormatterService } from '../services/citation-formatter.service';
import type { ContextBuilderService } from '../services/context-builder.service';
import type { GenerationClient } from '../services/generation.client';
import type { RerankerRegistry } from '../services/reranker.service';
import type { RetrieverService } from '../services/retriever.service';
import { createFinalizeNode } from './nodes/finalize.node';
import { createFormatNode } from './nodes/format.node';
import { createGenerateNode } from './nodes/generate.node';
import { createRerankNode } from './nodes/rerank.node';
import { createRetrieveNode } from './nodes/retrieve.node';
import { PipelineState, type PipelineStateType } from './state/pipeline-state';

export interface PipelineGraphDeps {
  retriever: RetrieverService;
  rerankerRegistry: RerankerRegistry;
  generationClient: GenerationClient;
  contextBuilder: ContextBuilderService;
  citationFormatter: CitationFormatterService;
  config: PipelineConfig;
}

export function buildPipelineGraph(deps: PipelineGraphDeps) {
  return new StateGraph(PipelineState)
    .addNode('retrieve', createRetrieveNode(deps.retriever))
    .addNode('rerank', createRerankNode(deps.rerankerRegistry))
    .addNode(
      'generate',
      createGenerateNode({
        generationClient: deps.generationClient,
        contextBuilder: deps.contextBuilder,
        config: deps.config,
      }),
    )
    .addNode('format', createFormatNode(deps.citationFormatter))
    .addNode('finalize', createFinalizeNode())
    .addEdge(START, 'retrieve')
    .addConditionalEdges(
      'retrieve',
      (state: PipelineStateType) => {
        if (state.error) {
          return 'failed';
        }
        return state.options.useReranker ? 'rerank' : 'skip_rerank';
      },
      {
        failed: 'finalize',
        rerank: 'rerank',
        skip_rerank: 'generate',
      },
    )
    .addEdge('rerank', 'generate')
    .addConditionalEdges(
      'generate',
      (state: PipelineStateType) => (state.error ? 'failed' : 'format'),
      {
        failed: 'finalize',
        format: 'format',
      },
    )
    .addEdge('format', 'finalize')
    .addEdge('finalize', END)
    .compile();
}

export type CompiledPipelineGraph = ReturnType<typeof buildPipelineGraph>;
