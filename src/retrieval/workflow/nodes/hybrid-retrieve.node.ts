/**
 * Hybrid Retrieve Node
 * Runs one retrieval attempt and decides where the loop goes next:
 * EVALUATING when there is something to judge, EXPANDING on a first empty
 * attempt, otherwise a terminal state.
 */

import { Logger } from '@nestjs/common';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { HybridRetrieverService } from '../../services/hybrid-retriever.service';
import type { TraceEntry } from '../../types';
import {
  getAbortSignal,
  type RetrievalStateType,
} from '../state/retrieval-state';

const logger = new Logger('HybridRetrieveNode');

export function createHybridRetrieveNode(retriever: HybridRetrieverService) {
  return async (
    state: RetrievalStateType,
    config?: RunnableConfig,
  ): Promise<Partial<RetrievalStateType>> => {
    const signal = getAbortSignal(config);
    if (signal?.aborted) {
      return { status: 'CANCELLED' };
    }

    const attempt = state.attempt + 1;
    const query = { text: state.currentQuery, topK: state.query.topK };

    logger.log(
      `[Retrieve] stage=retrieve attempt=${attempt}/${state.policy.maxAttempts} status=starting`,
    );

    const result = await retriever.retrieve(query, signal);

    if (signal?.aborted) {
      // The interrupted attempt is incomplete; keep what earlier attempts found
      logger.warn(`[Retrieve] stage=retrieve attempt=${attempt} status=cancelled`);
      return { attempt, status: 'CANCELLED' };
    }

    const trace: TraceEntry[] = [
      {
        step: 'retrieve',
        attempt,
        query: state.currentQuery,
        candidateCount: result.results.length,
        rerankOrigin: result.rerankOrigin,
      },
    ];
    const update: Partial<RetrievalStateType> = {
      attempt,
      latest: result,
      trace,
      degradations: result.degradations,
    };

    if (result.results.length > 0) {
      if (!state.policy.enableQualityGate) {
        logger.log(
          `[Retrieve] stage=retrieve attempt=${attempt} status=satisfied reason=quality_gate_disabled results=${result.results.length}`,
        );
        return {
          ...update,
          bestResults: result.results,
          bestQuery: state.currentQuery,
          status: 'SATISFIED',
        };
      }
      return { ...update, status: 'EVALUATING' };
    }

    // Empty after a non-empty attempt: the earlier results stand
    if (state.bestResults.length > 0) {
      logger.log(
        `[Retrieve] stage=retrieve attempt=${attempt} status=satisfied reason=keep_previous results=${state.bestResults.length}`,
      );
      return { ...update, status: 'SATISFIED' };
    }

    if (state.alternatives === null && attempt < state.policy.maxAttempts) {
      logger.log(
        `[Retrieve] stage=retrieve attempt=${attempt} status=empty next=expand`,
      );
      return {
        ...update,
        pendingExpansion: 'empty_results',
        status: 'EXPANDING',
      };
    }

    logger.warn(
      `[Retrieve] stage=retrieve attempt=${attempt} status=exhausted results=0`,
    );
    return { ...update, status: 'EXHAUSTED' };
  };
}
