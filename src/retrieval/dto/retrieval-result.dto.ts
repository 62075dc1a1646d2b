/**
 * Retrieval Result DTO
 * Output from the retrieval pipeline
 */

import type {
  ExecutionTrace,
  Plan,
  RankedResult,
  TerminalStatus,
} from '../types';

export interface RetrievalResultDto {
  results: RankedResult[];
  trace: ExecutionTrace;
  plan: Plan;
  status: TerminalStatus;
  attempts: number;
  finalQuery: string;
  qualityScore: number | null;
  response: string | null;
  degradations: string[];
  durationMs: number;
}

export interface HealthResultDto {
  status: 'ok' | 'degraded';
  workflowReady: boolean;
  qdrant: boolean;
}
