/**
 * Retrieval Orchestrator Service
 * Entry point of the pipeline: validates the request, runs the retrieval
 * graph and shapes its final state into a RetrievalOutcome.
 *
 * Only invalid input is raised to the caller. Degraded stages and exhausted
 * retries are part of the returned outcome.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  buildRetrievalGraph,
  recursionLimitFor,
  type RetrievalGraph,
} from './retrieval-graph';
import {
  createInitialState,
  isTerminalStatus,
} from './state/retrieval-state';
import { IntentPlannerService } from '../services/intent-planner.service';
import { HybridRetrieverService } from '../services/hybrid-retriever.service';
import { QualityEvaluatorService } from '../services/quality-evaluator.service';
import { QueryExpanderService } from '../services/query-expander.service';
import { buildContextualQuery } from '../services/conversation-context';
import {
  RETRIEVAL_OPTIONS,
  RETRIEVAL_POLICIES,
  RETRIEVAL_POLICY_NAMES,
  isRetrievalPolicyName,
  type RetrievalOptions,
  type RetrievalPolicy,
} from '../config/retrieval-options';
import { InvalidQueryError } from '../errors/retrieval-errors';
import type {
  ConversationMessage,
  Query,
  RetrievalOutcome,
} from '../types';
import type { QdrantSearchPort } from '../services/qdrant-point.mapper';
import { QDRANT_CLIENT } from '../types/collaborators';

export interface ExecuteOptions {
  /** Aborting stops in-flight calls and ends the run with CANCELLED */
  signal?: AbortSignal;
  /** Named policy for this request only */
  policy?: string;
  history?: readonly ConversationMessage[];
}

@Injectable()
export class RetrievalOrchestratorService {
  private readonly logger = new Logger(RetrievalOrchestratorService.name);
  private readonly graph: RetrievalGraph;

  constructor(
    planner: IntentPlannerService,
    retriever: HybridRetrieverService,
    evaluator: QualityEvaluatorService,
    expander: QueryExpanderService,
    @Inject(RETRIEVAL_OPTIONS) private readonly options: RetrievalOptions,
    @Inject(QDRANT_CLIENT) private readonly qdrant: QdrantSearchPort,
  ) {
    this.graph = buildRetrievalGraph({
      planner,
      retriever,
      evaluator,
      expander,
    });
    this.logger.log(
      `Retrieval workflow initialized: policy=${options.policy.name} maxAttempts=${options.policy.maxAttempts} qualityGate=${options.policy.enableQualityGate}`,
    );
  }

  /**
   * Validate the request and freeze it into a Query. Nothing external has
   * been called when this throws.
   */
  createQuery(queryText: unknown, topK?: unknown): Query {
    const limits = this.options.query;

    if (typeof queryText !== 'string' || queryText.trim().length === 0) {
      throw new InvalidQueryError('Query text must not be empty', 'query');
    }
    const text = queryText.trim();
    if (text.length > limits.maxLength) {
      throw new InvalidQueryError(
        `Query text exceeds ${limits.maxLength} characters (got ${text.length})`,
        'query',
      );
    }

    const requestedTopK = topK ?? limits.defaultTopK;
    if (
      typeof requestedTopK !== 'number' ||
      !Number.isInteger(requestedTopK) ||
      requestedTopK < 1 ||
      requestedTopK > limits.maxTopK
    ) {
      throw new InvalidQueryError(
        `topK must be an integer between 1 and ${limits.maxTopK}`,
        'topK',
      );
    }

    return Object.freeze({ text, topK: requestedTopK });
  }

  resolveRequestPolicy(name?: string): RetrievalPolicy {
    if (name === undefined || name === this.options.policy.name) {
      return this.options.policy;
    }
    if (!isRetrievalPolicyName(name)) {
      throw new InvalidQueryError(
        `Unknown policy "${name}" (expected ${RETRIEVAL_POLICY_NAMES.join(' | ')})`,
        'policy',
      );
    }
    return RETRIEVAL_POLICIES[name];
  }

  async execute(
    queryText: unknown,
    topK?: unknown,
    executeOptions: ExecuteOptions = {},
  ): Promise<RetrievalOutcome> {
    const startTime = Date.now();
    const validated = this.createQuery(queryText, topK);
    const policy = this.resolveRequestPolicy(executeOptions.policy);

    const query: Query = Object.freeze({
      text: buildContextualQuery(validated.text, executeOptions.history),
      topK: validated.topK,
    });

    this.logger.log(
      `[Orchestrator] status=starting policy=${policy.name} topK=${query.topK} chars=${validated.text.length} contextual=${query.text !== validated.text}`,
    );

    const finalState = await this.graph.invoke(
      createInitialState(query, policy, this.options.qualityThreshold),
      {
        configurable: { abortSignal: executeOptions.signal },
        recursionLimit: recursionLimitFor(policy.maxAttempts),
      },
    );

    const status = finalState.status;
    if (!isTerminalStatus(status)) {
      throw new Error(`Retrieval workflow stopped in non-terminal state ${status}`);
    }

    const plan =
      finalState.plan ??
      IntentPlannerService.retrievePlan('Cancelled before planning completed');

    const outcome: RetrievalOutcome = {
      results: finalState.bestResults,
      trace: finalState.trace,
      plan,
      status,
      attempts: finalState.attempt,
      finalQuery: finalState.bestQuery,
      qualityScore: finalState.bestQuality,
      response: plan.needsRetrieval ? null : plan.suggestedResponse,
      degradations: finalState.degradations,
      durationMs: Date.now() - startTime,
    };

    this.logger.log(
      `[Orchestrator] status=${outcome.status} attempts=${outcome.attempts} results=${outcome.results.length} trace=${outcome.trace.length} degraded=${outcome.degradations.length} duration=${outcome.durationMs}ms`,
    );

    return outcome;
  }

  /**
   * Health check for the vector store
   */
  async healthCheck(): Promise<{ workflowReady: boolean; qdrant: boolean }> {
    let qdrant = false;
    try {
      await this.qdrant.getCollections();
      qdrant = true;
    } catch (error) {
      this.logger.warn(
        `Qdrant health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    return { workflowReady: true, qdrant };
  }
}
