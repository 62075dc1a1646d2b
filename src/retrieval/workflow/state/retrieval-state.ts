/**
 * Retrieval Workflow State Definition
 * One graph run per request; nothing here outlives the request.
 */

import { Annotation } from '@langchain/langgraph';
import type { RunnableConfig } from '@langchain/core/runnables';
import type {
  AttemptResult,
  Plan,
  QualityEvaluation,
  Query,
  RankedResult,
  RetrievalStatus,
  TerminalStatus,
  TraceEntry,
} from '../../types';
import type { RetrievalPolicy } from '../../config/retrieval-options';

/**
 * Why the workflow is about to ask for alternative queries
 */
export type ExpansionTrigger = 'empty_results' | 'low_quality';

/**
 * Retrieval State Graph Definition
 * Following LangGraph.js Annotation.Root pattern
 */
export const RetrievalState = Annotation.Root({
  // ============================================
  // Input
  // ============================================
  query: Annotation<Query>,
  policy: Annotation<RetrievalPolicy>,
  qualityThreshold: Annotation<number>,

  // ============================================
  // Planning
  // ============================================
  plan: Annotation<Plan | null>,

  // ============================================
  // Retry loop control
  // ============================================
  currentQuery: Annotation<string>,
  attempt: Annotation<number>,
  latest: Annotation<AttemptResult | null>,
  lastEvaluation: Annotation<QualityEvaluation | null>,
  alternatives: Annotation<string[] | null>,
  pendingExpansion: Annotation<ExpansionTrigger | null>,

  // ============================================
  // Output
  // ============================================
  bestResults: Annotation<RankedResult[]>,
  bestQuery: Annotation<string>,
  bestQuality: Annotation<number | null>,
  status: Annotation<RetrievalStatus>,

  // ============================================
  // Append-only logs
  // ============================================
  trace: Annotation<TraceEntry[]>({
    reducer: (current, update) => current.concat(update),
    default: () => [],
  }),
  degradations: Annotation<string[]>({
    reducer: (current, update) => current.concat(update),
    default: () => [],
  }),
});

/**
 * Type for the state object
 */
export type RetrievalStateType = typeof RetrievalState.State;

/**
 * Initial state factory
 */
export function createInitialState(
  query: Query,
  policy: RetrievalPolicy,
  qualityThreshold: number,
): RetrievalStateType {
  return {
    query,
    policy,
    qualityThreshold,
    plan: null,
    currentQuery: query.text,
    attempt: 0,
    latest: null,
    lastEvaluation: null,
    alternatives: null,
    pendingExpansion: null,
    bestResults: [],
    bestQuery: query.text,
    bestQuality: null,
    status: 'PLANNING',
    trace: [],
    degradations: [],
  };
}

export function isTerminalStatus(
  status: RetrievalStatus,
): status is TerminalStatus {
  return (
    status === 'SATISFIED' || status === 'EXHAUSTED' || status === 'CANCELLED'
  );
}

/**
 * The request's abort signal travels through `configurable.abortSignal`
 */
export function getAbortSignal(
  config?: RunnableConfig,
): AbortSignal | undefined {
  const candidate: unknown = config?.configurable?.abortSignal;
  return candidate instanceof AbortSignal ? candidate : undefined;
}
