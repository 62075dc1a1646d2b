/**
 * Intent Planner Service
 * Decides whether a query needs document retrieval at all. Conversational
 * turns (greetings, thanks, acknowledgements) get a canned reply instead of
 * a retrieval round-trip.
 *
 * Fails open: any error means "retrieve".
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { STRUCTURED_CHAT, type StructuredChat } from '../types/collaborators';
import { PLAN_ACTIONS, type Plan, type Query } from '../types';
import {
  RETRIEVAL_OPTIONS,
  type RetrievalOptions,
} from '../config/retrieval-options';
import { describeError } from '../errors/retrieval-errors';
import { withDeadline } from '../../shared/utils/deadline';

const PLANNER_SYSTEM_PROMPT = `You route user messages for a document question-answering assistant.

Decide whether answering the message requires searching the document knowledge base.
- Greetings, thanks, small talk and acknowledgements do NOT need retrieval; write a short friendly reply in "suggestedResponse".
- Questions about facts, policies, procedures or document content DO need retrieval.
- If the message is too vague to search for, use action "clarify" and ask a short clarifying question in "suggestedResponse".

Respond with a single JSON object and nothing else:
{"needsRetrieval": boolean, "action": "retrieve" | "direct_answer" | "clarify", "reasoning": string, "suggestedResponse": string | null}`;

const planSchema = z.object({
  needsRetrieval: z.boolean(),
  action: z.enum(PLAN_ACTIONS),
  reasoning: z.string().default(''),
  suggestedResponse: z.string().nullish(),
});

@Injectable()
export class IntentPlannerService {
  private readonly logger = new Logger(IntentPlannerService.name);

  constructor(
    @Inject(STRUCTURED_CHAT) private readonly chat: StructuredChat,
    @Inject(RETRIEVAL_OPTIONS) private readonly options: RetrievalOptions,
  ) {}

  /**
   * Default plan used whenever the planner cannot be trusted
   */
  static retrievePlan(reasoning: string): Plan {
    return {
      needsRetrieval: true,
      action: 'retrieve',
      reasoning,
      suggestedResponse: null,
    };
  }

  async plan(query: Query, signal?: AbortSignal): Promise<Plan> {
    const startTime = Date.now();

    try {
      const reply = await withDeadline(
        (stageSignal) =>
          this.chat.complete({
            purpose: 'planner',
            system: PLANNER_SYSTEM_PROMPT,
            user: `Message: "${query.text}"`,
            schema: planSchema,
            signal: stageSignal,
          }),
        { label: 'planner', timeoutMs: this.options.timeouts.plannerMs, signal },
      );

      const suggestedResponse = reply.suggestedResponse?.trim() || null;

      // Skipping retrieval is only safe when there is something to say instead
      if (!reply.needsRetrieval && !suggestedResponse) {
        this.logger.warn(
          `[Planner] stage=plan status=overridden reason=no_suggested_response action=${reply.action}`,
        );
        return IntentPlannerService.retrievePlan(
          reply.reasoning || 'No direct response available; retrieving',
        );
      }

      const plan: Plan = reply.needsRetrieval
        ? {
            needsRetrieval: true,
            action: 'retrieve',
            reasoning: reply.reasoning,
            suggestedResponse: null,
          }
        : {
            needsRetrieval: false,
            action: reply.action === 'retrieve' ? 'direct_answer' : reply.action,
            reasoning: reply.reasoning,
            suggestedResponse,
          };

      this.logger.log(
        `[Planner] stage=plan status=success duration=${Date.now() - startTime}ms action=${plan.action} needsRetrieval=${plan.needsRetrieval}`,
      );
      return plan;
    } catch (error) {
      this.logger.warn(
        `[Planner] stage=plan status=failed duration=${Date.now() - startTime}ms error=${describeError(error)} fallback=retrieve`,
      );
      return IntentPlannerService.retrievePlan(
        `Planner unavailable (${describeError(error)}); retrieving`,
      );
    }
  }
}
