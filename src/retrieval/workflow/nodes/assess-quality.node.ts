/**
 * Assess Quality Node
 * Accepts the attempt just judged, or asks for one more reformulated attempt.
 * When no further attempt is possible the best-scoring attempt so far wins.
 */

import { Logger } from '@nestjs/common';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { QualityEvaluatorService } from '../../services/quality-evaluator.service';
import type { TraceEntry } from '../../types';
import {
  getAbortSignal,
  type RetrievalStateType,
} from '../state/retrieval-state';

const logger = new Logger('AssessQualityNode');

export function createAssessQualityNode(evaluator: QualityEvaluatorService) {
  return async (
    state: RetrievalStateType,
    config?: RunnableConfig,
  ): Promise<Partial<RetrievalStateType>> => {
    const signal = getAbortSignal(config);
    const latest = state.latest?.results ?? [];

    const evaluation = await evaluator.evaluate(
      { text: state.currentQuery, topK: state.query.topK },
      latest.map((result) => result.text),
      state.attempt,
      signal,
    );

    const trace: TraceEntry[] = [
      {
        step: 'evaluate',
        attempt: state.attempt,
        query: state.currentQuery,
        score: evaluation.score,
        isAdequate: evaluation.isAdequate,
        suggestedAction: evaluation.suggestedAction,
        degraded: evaluation.degraded,
      },
    ];

    const update: Partial<RetrievalStateType> = {
      trace,
      lastEvaluation: evaluation,
      degradations: evaluation.degraded ? ['quality: judge unavailable'] : [],
    };
    // A fail-open verdict carries no real score
    const judged: Partial<RetrievalStateType> = {
      bestResults: latest,
      bestQuery: state.currentQuery,
      bestQuality: evaluation.degraded ? null : evaluation.score,
    };
    const isBest =
      state.bestQuality === null || evaluation.score > state.bestQuality;

    const accepted =
      evaluation.isAdequate || evaluation.score >= state.qualityThreshold;

    if (signal?.aborted) {
      return {
        ...update,
        ...((accepted || isBest) && judged),
        status: 'CANCELLED',
      };
    }

    if (accepted) {
      logger.log(
        `[Quality] stage=assess attempt=${state.attempt} status=satisfied score=${evaluation.score.toFixed(2)}`,
      );
      return { ...update, ...judged, status: 'SATISFIED' };
    }

    const attemptsLeft = state.attempt < state.policy.maxAttempts;
    const canImprove =
      evaluation.suggestedAction === 'reformulate' ||
      evaluation.suggestedAction === 'expand';

    if (attemptsLeft && canImprove) {
      logger.log(
        `[Quality] stage=assess attempt=${state.attempt} status=insufficient score=${evaluation.score.toFixed(2)} next=${evaluation.suggestedAction}`,
      );
      return {
        ...update,
        ...(isBest && judged),
        pendingExpansion: 'low_quality',
        status: 'EXPANDING',
      };
    }

    // Marginal results still beat no results
    logger.log(
      `[Quality] stage=assess attempt=${state.attempt} status=satisfied reason=${attemptsLeft ? 'no_strategy' : 'attempts_exhausted'} score=${evaluation.score.toFixed(2)}`,
    );
    return { ...update, ...(isBest && judged), status: 'SATISFIED' };
  };
}
