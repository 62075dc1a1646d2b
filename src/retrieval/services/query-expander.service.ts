/**
 * Query Expander Service
 * Proposes alternative phrasings for a query whose retrieval came back empty
 * or weak. The original query is never modified.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { STRUCTURED_CHAT, type StructuredChat } from '../types/collaborators';
import type { Query, QueryExpansion } from '../types';
import {
  RETRIEVAL_OPTIONS,
  type RetrievalOptions,
} from '../config/retrieval-options';
import { describeError } from '../errors/retrieval-errors';
import { withDeadline } from '../../shared/utils/deadline';

export const MAX_ALTERNATIVES = 5;

const EXPANSION_SYSTEM_PROMPT = `You are an expert at query expansion for information retrieval.

Generate 3-5 alternative phrasings of the query that:
1. Use synonyms and related terms
2. Add specificity or context
3. Rephrase from different angles
4. Cover variations in how the information might appear in documents

Keep the core intent but vary the expression.

Respond with a single JSON object and nothing else:
{"alternatives": string[], "reasoning": string}`;

const expansionSchema = z.object({
  alternatives: z.array(z.string()),
  reasoning: z.string().default(''),
});

@Injectable()
export class QueryExpanderService {
  private readonly logger = new Logger(QueryExpanderService.name);

  constructor(
    @Inject(STRUCTURED_CHAT) private readonly chat: StructuredChat,
    @Inject(RETRIEVAL_OPTIONS) private readonly options: RetrievalOptions,
  ) {}

  /**
   * Returns 1-5 alternatives; on failure the only alternative is the
   * original text.
   */
  async expand(query: Query, signal?: AbortSignal): Promise<QueryExpansion> {
    const startTime = Date.now();

    try {
      const reply = await withDeadline(
        (stageSignal) =>
          this.chat.complete({
            purpose: 'expansion',
            system: EXPANSION_SYSTEM_PROMPT,
            user: `Expand this query: "${query.text}"`,
            schema: expansionSchema,
            signal: stageSignal,
          }),
        {
          label: 'expansion',
          timeoutMs: this.options.timeouts.expansionMs,
          signal,
        },
      );

      const alternatives = this.normalizeAlternatives(
        reply.alternatives,
        query.text,
      );

      if (alternatives.length === 0) {
        this.logger.warn(
          `[Expansion] stage=expand status=empty fallback=original_query`,
        );
        return this.fallback(query, 'Expansion produced no usable alternatives');
      }

      this.logger.log(
        `[Expansion] stage=expand status=success duration=${Date.now() - startTime}ms alternatives=${alternatives.length}`,
      );
      return {
        alternatives,
        reasoning: reply.reasoning,
        degraded: false,
      };
    } catch (error) {
      this.logger.warn(
        `[Expansion] stage=expand status=failed duration=${Date.now() - startTime}ms error=${describeError(error)} fallback=original_query`,
      );
      return this.fallback(
        query,
        `Expansion unavailable (${describeError(error)})`,
      );
    }
  }

  /**
   * Helper: trim, drop blanks, drop duplicates and echoes of the original
   */
  private normalizeAlternatives(
    candidates: string[],
    original: string,
  ): string[] {
    const seen = new Set<string>([original.trim().toLowerCase()]);
    const alternatives: string[] = [];

    for (const candidate of candidates) {
      const text = candidate.trim();
      const key = text.toLowerCase();
      if (!text || seen.has(key)) continue;
      seen.add(key);
      alternatives.push(text);
      if (alternatives.length === MAX_ALTERNATIVES) break;
    }

    return alternatives;
  }

  private fallback(query: Query, reasoning: string): QueryExpansion {
    return {
      alternatives: [query.text],
      reasoning,
      degraded: true,
    };
  }
}
