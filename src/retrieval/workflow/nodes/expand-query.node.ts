/**
 * Expand Query Node
 * Fetches alternatives once per request and picks the query text for the
 * next attempt.
 */

import { Logger } from '@nestjs/common';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { QueryExpanderService } from '../../services/query-expander.service';
import type { TraceEntry } from '../../types';
import {
  getAbortSignal,
  type RetrievalStateType,
} from '../state/retrieval-state';

const logger = new Logger('ExpandQueryNode');

/**
 * Empty results retry with the first alternative; low-quality retries walk
 * the list so the same alternative is not tried twice.
 */
export function selectAlternativeIndex(
  trigger: RetrievalStateType['pendingExpansion'],
  attempt: number,
  alternativeCount: number,
): number {
  if (trigger !== 'low_quality') {
    return 0;
  }
  return Math.max(0, Math.min(attempt - 1, alternativeCount - 1));
}

export function createExpandQueryNode(expander: QueryExpanderService) {
  return async (
    state: RetrievalStateType,
    config?: RunnableConfig,
  ): Promise<Partial<RetrievalStateType>> => {
    const signal = getAbortSignal(config);
    if (signal?.aborted) {
      return { status: 'CANCELLED' };
    }

    const trace: TraceEntry[] = [];
    const degradations: string[] = [];
    let alternatives = state.alternatives;
    let reasoning = '';

    if (alternatives === null) {
      const expansion = await expander.expand(state.query, signal);
      alternatives = [...expansion.alternatives];
      reasoning = expansion.reasoning;
      if (expansion.degraded) {
        degradations.push('expansion: fell back to original query');
      }
    }

    const index = selectAlternativeIndex(
      state.pendingExpansion,
      state.attempt,
      alternatives.length,
    );
    const nextQuery = alternatives[index] ?? state.query.text;

    if (state.alternatives === null) {
      trace.push({
        step: 'expand',
        attempt: state.attempt,
        alternatives,
        reasoning,
        nextQuery,
      });
    }
    if (state.pendingExpansion === 'low_quality') {
      trace.push({
        step: 'reformulate',
        attempt: state.attempt,
        nextQuery,
        reason: state.lastEvaluation?.suggestedAction ?? 'reformulate',
      });
    }

    if (signal?.aborted) {
      return { alternatives, trace, degradations, status: 'CANCELLED' };
    }

    logger.log(
      `[Expand] stage=expand attempt=${state.attempt} status=success trigger=${state.pendingExpansion ?? 'none'} alternatives=${alternatives.length} index=${index}`,
    );

    return {
      alternatives,
      currentQuery: nextQuery,
      pendingExpansion: null,
      trace,
      degradations,
      status: 'RETRIEVING',
    };
  };
}
