/**
 * Plan Intent Node
 * PLANNING → RETRIEVING, or straight to SATISFIED for conversational turns.
 */

import { Logger } from '@nestjs/common';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { IntentPlannerService } from '../../services/intent-planner.service';
import type { TraceEntry } from '../../types';
import {
  getAbortSignal,
  type RetrievalStateType,
} from '../state/retrieval-state';

const logger = new Logger('PlanIntentNode');

export function createPlanIntentNode(planner: IntentPlannerService) {
  return async (
    state: RetrievalStateType,
    config?: RunnableConfig,
  ): Promise<Partial<RetrievalStateType>> => {
    const signal = getAbortSignal(config);
    const plan = await planner.plan(state.query, signal);

    const trace: TraceEntry[] = [
      {
        step: 'plan',
        action: plan.action,
        needsRetrieval: plan.needsRetrieval,
        reasoning: plan.reasoning,
      },
    ];

    if (signal?.aborted) {
      logger.warn(`[Plan] stage=plan status=cancelled`);
      return { plan, trace, status: 'CANCELLED' };
    }

    if (!plan.needsRetrieval) {
      logger.log(
        `[Plan] stage=plan status=skip_retrieval action=${plan.action}`,
      );
      return { plan, trace, status: 'SATISFIED' };
    }

    return { plan, trace, status: 'RETRIEVING' };
  };
}
