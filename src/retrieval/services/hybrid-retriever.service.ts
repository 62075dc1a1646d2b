/**
 * Hybrid Retriever Service
 * One retrieval attempt: (embed → dense) ∥ sparse → RRF fusion → capped
 * rerank → top-K.
 *
 * Each external call runs under its own deadline. A failed or timed-out
 * retriever contributes an empty list and a degradation note; the attempt
 * itself never throws.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DENSE_SEARCH,
  QUERY_EMBEDDER,
  SPARSE_SEARCH,
  type DenseSearch,
  type QueryEmbedder,
  type SparseSearch,
} from '../types/collaborators';
import type {
  AttemptResult,
  Query,
  RankedResult,
  RerankOutcome,
} from '../types';
import {
  RETRIEVAL_OPTIONS,
  type RetrievalOptions,
} from '../config/retrieval-options';
import { describeError } from '../errors/retrieval-errors';
import { withDeadline } from '../../shared/utils/deadline';
import { fuseRankings, toFusedResult } from './rank-fusion';
import { RelevanceRerankerService } from './relevance-reranker.service';

@Injectable()
export class HybridRetrieverService {
  private readonly logger = new Logger(HybridRetrieverService.name);

  constructor(
    @Inject(QUERY_EMBEDDER) private readonly embedder: QueryEmbedder,
    @Inject(DENSE_SEARCH) private readonly denseSearch: DenseSearch,
    @Inject(SPARSE_SEARCH) private readonly sparseSearch: SparseSearch,
    private readonly reranker: RelevanceRerankerService,
    @Inject(RETRIEVAL_OPTIONS) private readonly options: RetrievalOptions,
  ) {}

  async retrieve(query: Query, signal?: AbortSignal): Promise<AttemptResult> {
    const startTime = Date.now();
    const degradations: string[] = [];
    const poolSize = this.options.candidatePoolSize;

    // Fan-out, then join before fusion
    const [dense, sparse] = await Promise.all([
      this.searchDense(query.text, poolSize, degradations, signal),
      this.searchSparse(query.text, poolSize, degradations, signal),
    ]);

    const fused = fuseRankings(dense, sparse, this.options.rrfK).map(
      toFusedResult,
    );

    this.logger.log(
      `[Retrieve] stage=fusion status=success dense=${dense.length} sparse=${sparse.length} fused=${fused.length} k=${this.options.rrfK}`,
    );

    const outcome = await this.rerankCandidates(query, fused, signal);
    if (
      outcome.origin === 'fused' &&
      (outcome.reason === 'judge_failed' ||
        outcome.reason === 'malformed_response')
    ) {
      degradations.push(`rerank: ${outcome.reason}`);
    }

    const results = outcome.items.slice(0, query.topK);

    this.logger.log(
      `[Retrieve] stage=attempt status=complete duration=${Date.now() - startTime}ms results=${results.length} rerank=${outcome.origin} degraded=${degradations.length > 0}`,
    );

    return {
      results,
      denseCount: dense.length,
      sparseCount: sparse.length,
      fusedCount: fused.length,
      rerankOrigin: outcome.origin,
      degradations,
    };
  }

  private async rerankCandidates(
    query: Query,
    fused: RankedResult[],
    signal?: AbortSignal,
  ): Promise<RerankOutcome> {
    if (!this.options.rerank.enabled) {
      return RelevanceRerankerService.fusedOutcome(fused, 'disabled');
    }
    return this.reranker.rerank(
      query,
      fused,
      this.options.rerank.candidateCap,
      signal,
    );
  }

  private async searchDense(
    text: string,
    topK: number,
    degradations: string[],
    signal?: AbortSignal,
  ): Promise<RankedResult[]> {
    const { embedMs, denseMs } = this.options.timeouts;

    try {
      const embedding = await withDeadline(
        (stageSignal) => this.embedder.embedQuery(text, stageSignal),
        { label: 'embed', timeoutMs: embedMs, signal },
      );
      return await withDeadline(
        (stageSignal) => this.denseSearch.search(embedding, topK, stageSignal),
        { label: 'dense', timeoutMs: denseMs, signal },
      );
    } catch (error) {
      this.logger.warn(
        `[Retrieve] stage=dense status=failed error=${describeError(error)} fallback=empty`,
      );
      degradations.push(`dense: ${describeError(error)}`);
      return [];
    }
  }

  private async searchSparse(
    text: string,
    topK: number,
    degradations: string[],
    signal?: AbortSignal,
  ): Promise<RankedResult[]> {
    try {
      return await withDeadline(
        (stageSignal) => this.sparseSearch.search(text, topK, stageSignal),
        { label: 'sparse', timeoutMs: this.options.timeouts.sparseMs, signal },
      );
    } catch (error) {
      this.logger.warn(
        `[Retrieve] stage=sparse status=failed error=${describeError(error)} fallback=empty`,
      );
      degradations.push(`sparse: ${describeError(error)}`);
      return [];
    }
  }
}
