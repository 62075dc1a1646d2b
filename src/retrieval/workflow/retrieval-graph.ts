/**
 * Retrieval Graph
 *
 *   START → planIntent ─┬─ RETRIEVING → hybridRetrieve ─┬─ EVALUATING → assessQuality ─┬─ EXPANDING → expandQuery
 *                       └─ terminal → END                ├─ EXPANDING → expandQuery      └─ terminal → END
 *                                                        └─ terminal → END
 *   expandQuery ─┬─ RETRIEVING → hybridRetrieve
 *                └─ CANCELLED → END
 */

import { END, START, StateGraph } from '@langchain/langgraph';
import { RetrievalState, type RetrievalStateType } from './state/retrieval-state';
import { createPlanIntentNode } from './nodes/plan-intent.node';
import { createHybridRetrieveNode } from './nodes/hybrid-retrieve.node';
import { createAssessQualityNode } from './nodes/assess-quality.node';
import { createExpandQueryNode } from './nodes/expand-query.node';
import type { IntentPlannerService } from '../services/intent-planner.service';
import type { HybridRetrieverService } from '../services/hybrid-retriever.service';
import type { QualityEvaluatorService } from '../services/quality-evaluator.service';
import type { QueryExpanderService } from '../services/query-expander.service';

export interface RetrievalGraphDependencies {
  planner: IntentPlannerService;
  retriever: HybridRetrieverService;
  evaluator: QualityEvaluatorService;
  expander: QueryExpanderService;
}

export function buildRetrievalGraph(deps: RetrievalGraphDependencies) {
  const graph = new StateGraph(RetrievalState)
    .addNode('planIntent', createPlanIntentNode(deps.planner))
    .addNode('hybridRetrieve', createHybridRetrieveNode(deps.retriever))
    .addNode('assessQuality', createAssessQualityNode(deps.evaluator))
    .addNode('expandQuery', createExpandQueryNode(deps.expander))
    .addEdge(START, 'planIntent')
    .addConditionalEdges(
      'planIntent',
      (state: RetrievalStateType) =>
        state.status === 'RETRIEVING' ? 'retrieve' : 'done',
      {
        retrieve: 'hybridRetrieve',
        done: END,
      },
    )
    .addConditionalEdges(
      'hybridRetrieve',
      (state: RetrievalStateType) => {
        if (state.status === 'EVALUATING') return 'evaluate';
        if (state.status === 'EXPANDING') return 'expand';
        return 'done';
      },
      {
        evaluate: 'assessQuality',
        expand: 'expandQuery',
        done: END,
      },
    )
    .addConditionalEdges(
      'assessQuality',
      (state: RetrievalStateType) =>
        state.status === 'EXPANDING' ? 'expand' : 'done',
      {
        expand: 'expandQuery',
        done: END,
      },
    )
    .addConditionalEdges(
      'expandQuery',
      (state: RetrievalStateType) =>
        state.status === 'RETRIEVING' ? 'retry' : 'done',
      {
        retry: 'hybridRetrieve',
        done: END,
      },
    );

  // No checkpointer: every request is a fresh, stateless run
  return graph.compile();
}

export type RetrievalGraph = ReturnType<typeof buildRetrievalGraph>;

/**
 * Supersteps needed for the worst case: plan, then retrieve + assess +
 * expand per attempt.
 */
export function recursionLimitFor(maxAttempts: number): number {
  return 4 * maxAttempts + 4;
}
