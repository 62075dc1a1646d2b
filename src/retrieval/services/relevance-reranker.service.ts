/**
 * Relevance Reranker Service
 * LLM-as-judge reranking of the top fused candidates in ONE batched call.
 *
 * - Only the first `cap` candidates are judged; the rest keep fusion order
 *   and are appended after the judged prefix
 * - Any failure falls back to fusion order for the whole set, reported as a
 *   tagged outcome rather than an exception
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { STRUCTURED_CHAT, type StructuredChat } from '../types/collaborators';
import type {
  Query,
  RankedResult,
  RerankFallbackReason,
  RerankOutcome,
} from '../types';
import {
  RETRIEVAL_OPTIONS,
  type RetrievalOptions,
} from '../config/retrieval-options';
import {
  MalformedResponseError,
  describeError,
} from '../errors/retrieval-errors';
import { withDeadline } from '../../shared/utils/deadline';
import { truncatePreview } from './quality-evaluator.service';

const RERANK_SYSTEM_PROMPT = `You are a relevance judge for a document search engine.

For every numbered passage, rate how relevant it is to the query on a scale from 0 to 1:
- 1.0: directly answers the query
- 0.5: related but incomplete
- 0.0: irrelevant

Respond with a single JSON object and nothing else:
{"rankings": [{"passageIndex": number, "score": number, "reasoning": string}]}
Include one entry per passage, using the passage numbers shown.`;

const rerankSchema = z.object({
  rankings: z.array(
    z.object({
      passageIndex: z.number(),
      score: z.number(),
      reasoning: z.string().optional(),
    }),
  ),
});

interface Judgement {
  score: number;
  justification?: string;
}

@Injectable()
export class RelevanceRerankerService {
  private readonly logger = new Logger(RelevanceRerankerService.name);

  constructor(
    @Inject(STRUCTURED_CHAT) private readonly chat: StructuredChat,
    @Inject(RETRIEVAL_OPTIONS) private readonly options: RetrievalOptions,
  ) {}

  /**
   * Fusion-order outcome for the whole candidate set
   */
  static fusedOutcome(
    candidates: readonly RankedResult[],
    reason: RerankFallbackReason,
  ): RerankOutcome {
    return {
      origin: 'fused',
      items: candidates.map(
        (candidate): RankedResult => ({ ...candidate, origin: 'fused' }),
      ),
      reason,
    };
  }

  async rerank(
    query: Query,
    candidates: readonly RankedResult[],
    cap: number = this.options.rerank.candidateCap,
    signal?: AbortSignal,
  ): Promise<RerankOutcome> {
    const capped = candidates.slice(0, Math.max(0, cap));
    const tail = candidates.slice(capped.length);

    if (capped.length < 2) {
      this.logger.debug(
        `[Rerank] stage=rerank substage=skip status=insufficient_candidates input=${candidates.length}`,
      );
      return RelevanceRerankerService.fusedOutcome(
        candidates,
        'insufficient_candidates',
      );
    }

    const startTime = Date.now();
    this.logger.log(
      `[Rerank] stage=rerank substage=start status=starting input=${candidates.length} judged=${capped.length}`,
    );

    let judgements: Map<number, Judgement>;
    try {
      judgements = await this.judge(query, capped, signal);
    } catch (error) {
      const reason: RerankFallbackReason =
        error instanceof MalformedResponseError
          ? 'malformed_response'
          : 'judge_failed';
      this.logger.warn(
        `[Rerank] stage=rerank substage=error status=failed duration=${Date.now() - startTime}ms reason=${reason} error=${describeError(error)} fallback=fusion_order`,
      );
      return RelevanceRerankerService.fusedOutcome(candidates, reason);
    }

    const reranked = capped
      .map((candidate, fusionRank) => ({
        candidate,
        fusionRank,
        judgement: judgements.get(fusionRank),
      }))
      .sort(
        (a, b) =>
          (b.judgement?.score ?? 0) - (a.judgement?.score ?? 0) ||
          a.fusionRank - b.fusionRank,
      )
      .map(
        ({ candidate, judgement }): RankedResult => ({
          ...candidate,
          fusionScore: candidate.fusionScore ?? candidate.score,
          score: judgement?.score ?? 0,
          origin: 'reranked',
          ...(judgement?.justification !== undefined && {
            justification: judgement.justification,
          }),
        }),
      );

    this.logger.log(
      `[Rerank] stage=rerank substage=complete status=success duration=${Date.now() - startTime}ms judged=${judgements.size}/${capped.length} tail=${tail.length}`,
    );

    return {
      origin: 'reranked',
      items: [
        ...reranked,
        ...tail.map((item): RankedResult => ({ ...item, origin: 'fused' })),
      ],
      judgedCount: judgements.size,
    };
  }

  /**
   * Single batched judge call; returns valid judgements keyed by 0-based
   * position in the capped prefix.
   */
  private async judge(
    query: Query,
    capped: readonly RankedResult[],
    signal?: AbortSignal,
  ): Promise<Map<number, Judgement>> {
    const passages = capped
      .map(
        (candidate, index) =>
          `[${index}] ${truncatePreview(candidate.text, this.options.rerank.previewChars)}`,
      )
      .join('\n\n');

    const reply = await withDeadline(
      (stageSignal) =>
        this.chat.complete({
          purpose: 'rerank',
          system: RERANK_SYSTEM_PROMPT,
          user: `Query: "${query.text}"\n\nPassages:\n${passages}`,
          schema: rerankSchema,
          signal: stageSignal,
        }),
      { label: 'rerank', timeoutMs: this.options.timeouts.rerankMs, signal },
    );

    const judgements = new Map<number, Judgement>();
    for (const ranking of reply.rankings) {
      const index = ranking.passageIndex;
      const valid =
        Number.isInteger(index) &&
        index >= 0 &&
        index < capped.length &&
        ranking.score >= 0 &&
        ranking.score <= 1;
      if (!valid || judgements.has(index)) continue;

      judgements.set(index, {
        score: ranking.score,
        ...(ranking.reasoning !== undefined && {
          justification: ranking.reasoning,
        }),
      });
    }

    if (judgements.size === 0) {
      throw new MalformedResponseError(
        `rerank reply had no usable entries (${reply.rankings.length} returned)`,
        'rerank',
      );
    }

    return judgements;
  }
}
