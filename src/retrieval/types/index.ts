/**
 * Retrieval Types
 * Strong typing for the hybrid retrieval pipeline
 */

/**
 * Validated request: immutable once created
 */
export interface Query {
  readonly text: string;
  readonly topK: number;
}

/**
 * Which stage produced a score. Scores are only comparable within one origin.
 */
export type RankOrigin = 'dense' | 'sparse' | 'fused' | 'reranked';

export type RetrieverKind = 'dense' | 'sparse';

export interface SourceMetadata {
  documentId: string;
  sourcePath: string;
  page?: number;
  section?: string;
}

/**
 * Scored passage candidate. `id` is identical for the same passage no matter
 * which retriever returned it.
 */
export interface RankedResult {
  id: string;
  text: string;
  source: SourceMetadata;
  score: number;
  origin: RankOrigin;
  /** Accumulated RRF score, kept once a result has been through fusion */
  fusionScore?: number;
  /** Judge's explanation, present on reranked results */
  justification?: string;
}

/**
 * Entry of a FusedCandidateSet
 */
export interface FusedCandidate extends RankedResult {
  origin: 'fused';
  fusionScore: number;
  /** Retrievers that returned this passage, in discovery order */
  retrievers: RetrieverKind[];
  /** Raw per-retriever scores, for diagnostics only */
  originalScores: Partial<Record<RetrieverKind, number>>;
}

/**
 * Intent Planning
 */
export const PLAN_ACTIONS = ['retrieve', 'direct_answer', 'clarify'] as const;
export type PlanAction = (typeof PLAN_ACTIONS)[number];

export interface Plan {
  readonly needsRetrieval: boolean;
  readonly action: PlanAction;
  readonly reasoning: string;
  readonly suggestedResponse: string | null;
}

/**
 * Query Expansion
 */
export interface QueryExpansion {
  readonly alternatives: readonly string[];
  readonly reasoning: string;
  readonly degraded: boolean;
}

/**
 * Quality Evaluation
 */
export const SUGGESTED_ACTIONS = [
  'proceed',
  'reformulate',
  'expand',
  'decompose',
  'clarify',
] as const;
export type SuggestedAction = (typeof SUGGESTED_ACTIONS)[number];

export interface QualityEvaluation {
  score: number;
  isAdequate: boolean;
  suggestedAction: SuggestedAction;
  reasoning: string;
  degraded: boolean;
}

/**
 * Reranking outcome: a tagged variant instead of an exception at the call site
 */
export type RerankOutcome =
  | { origin: 'reranked'; items: RankedResult[]; judgedCount: number }
  | { origin: 'fused'; items: RankedResult[]; reason: RerankFallbackReason };

export type RerankFallbackReason =
  | 'disabled'
  | 'insufficient_candidates'
  | 'judge_failed'
  | 'malformed_response';

/**
 * One retrieval attempt (embed → dense ∥ sparse → fuse → rerank → top-K)
 */
export interface AttemptResult {
  results: RankedResult[];
  denseCount: number;
  sparseCount: number;
  fusedCount: number;
  rerankOrigin: RerankOutcome['origin'];
  degradations: string[];
}

/**
 * Execution trace: append-only audit log surfaced to the caller
 */
export type TraceEntry =
  | {
      step: 'plan';
      action: PlanAction;
      needsRetrieval: boolean;
      reasoning: string;
    }
  | {
      step: 'retrieve';
      attempt: number;
      query: string;
      candidateCount: number;
      rerankOrigin: RerankOutcome['origin'];
    }
  | {
      step: 'evaluate';
      attempt: number;
      query: string;
      score: number;
      isAdequate: boolean;
      suggestedAction: SuggestedAction;
      degraded: boolean;
    }
  | {
      step: 'expand';
      attempt: number;
      alternatives: string[];
      reasoning: string;
      nextQuery: string;
    }
  | {
      step: 'reformulate';
      attempt: number;
      nextQuery: string;
      reason: SuggestedAction;
    };

export type ExecutionTrace = readonly TraceEntry[];

/**
 * Orchestrator states. SATISFIED, EXHAUSTED and CANCELLED are terminal.
 */
export type RetrievalStatus =
  | 'PLANNING'
  | 'RETRIEVING'
  | 'EVALUATING'
  | 'EXPANDING'
  | 'SATISFIED'
  | 'EXHAUSTED'
  | 'CANCELLED';

export type TerminalStatus = Extract<
  RetrievalStatus,
  'SATISFIED' | 'EXHAUSTED' | 'CANCELLED'
>;

export interface ConversationMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

/**
 * Orchestrator output
 */
export interface RetrievalOutcome {
  results: RankedResult[];
  trace: ExecutionTrace;
  plan: Plan;
  status: TerminalStatus;
  attempts: number;
  finalQuery: string;
  qualityScore: number | null;
  /** Canned reply from the planner when retrieval was skipped */
  response: string | null;
  degradations: string[];
  durationMs: number;
}
