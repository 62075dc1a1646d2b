/**
 * Quality Evaluator Service
 * Judges whether a retrieved set can answer the query and suggests what to
 * do next. Passages are truncated before being sent.
 *
 * Fails open: an unreachable judge never blocks the response.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { STRUCTURED_CHAT, type StructuredChat } from '../types/collaborators';
import {
  SUGGESTED_ACTIONS,
  type QualityEvaluation,
  type Query,
} from '../types';
import {
  RETRIEVAL_OPTIONS,
  type RetrievalOptions,
} from '../config/retrieval-options';
import { describeError } from '../errors/retrieval-errors';
import { withDeadline } from '../../shared/utils/deadline';

const QUALITY_SYSTEM_PROMPT = `You evaluate retrieved passages for a question-answering system.

Score from 0 to 1 how well the passages, taken together, answer the query:
- 1.0: fully answered
- 0.5: partially answered
- 0.0: unrelated

Then pick the next action:
- "proceed": the passages are good enough
- "reformulate": the query wording missed relevant passages
- "expand": the query is too narrow
- "decompose": the query mixes several questions
- "clarify": the query is ambiguous

Respond with a single JSON object and nothing else:
{"score": number, "isAdequate": boolean, "suggestedAction": string, "reasoning": string}`;

const qualitySchema = z.object({
  score: z.number().min(0).max(1),
  isAdequate: z.boolean(),
  suggestedAction: z.enum(SUGGESTED_ACTIONS),
  reasoning: z.string().default(''),
});

export function truncatePreview(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

@Injectable()
export class QualityEvaluatorService {
  private readonly logger = new Logger(QualityEvaluatorService.name);

  constructor(
    @Inject(STRUCTURED_CHAT) private readonly chat: StructuredChat,
    @Inject(RETRIEVAL_OPTIONS) private readonly options: RetrievalOptions,
  ) {}

  async evaluate(
    query: Query,
    retrievedTexts: readonly string[],
    attempt: number,
    signal?: AbortSignal,
  ): Promise<QualityEvaluation> {
    if (retrievedTexts.length === 0) {
      return {
        score: 0,
        isAdequate: false,
        suggestedAction: 'expand',
        reasoning: 'No passages retrieved',
        degraded: false,
      };
    }

    const startTime = Date.now();
    const passages = retrievedTexts
      .map(
        (text, index) =>
          `[${index + 1}] ${truncatePreview(text, this.options.qualityPreviewChars)}`,
      )
      .join('\n\n');

    try {
      const reply = await withDeadline(
        (stageSignal) =>
          this.chat.complete({
            purpose: 'quality',
            system: QUALITY_SYSTEM_PROMPT,
            user: `Query: "${query.text}"\nAttempt: ${attempt}\n\nPassages:\n${passages}`,
            schema: qualitySchema,
            signal: stageSignal,
          }),
        { label: 'quality', timeoutMs: this.options.timeouts.qualityMs, signal },
      );

      this.logger.log(
        `[Quality] stage=evaluate attempt=${attempt} status=success duration=${Date.now() - startTime}ms score=${reply.score.toFixed(2)} adequate=${reply.isAdequate} action=${reply.suggestedAction}`,
      );
      return { ...reply, degraded: false };
    } catch (error) {
      this.logger.warn(
        `[Quality] stage=evaluate attempt=${attempt} status=failed duration=${Date.now() - startTime}ms error=${describeError(error)} fallback=proceed`,
      );
      return {
        score: 1,
        isAdequate: true,
        suggestedAction: 'proceed',
        reasoning: `Quality judge unavailable (${describeError(error)})`,
        degraded: true,
      };
    }
  }
}
