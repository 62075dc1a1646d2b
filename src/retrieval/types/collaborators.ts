/**
 * External Collaborator Contracts
 * The core only talks to embedding, search and chat backends through these.
 */

import type { z } from 'zod';
import type { RankedResult } from './index';

export interface QueryEmbedder {
  embedQuery(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface DenseSearch {
  search(
    embedding: number[],
    topK: number,
    signal?: AbortSignal,
  ): Promise<RankedResult[]>;
}

export interface SparseSearch {
  search(
    text: string,
    topK: number,
    signal?: AbortSignal,
  ): Promise<RankedResult[]>;
}

/**
 * Chat call sites; each has its own model settings
 */
export type ChatPurpose = 'planner' | 'expansion' | 'quality' | 'rerank';

export interface StructuredChatRequest<T> {
  purpose: ChatPurpose;
  system: string;
  user: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  signal?: AbortSignal;
}

export interface StructuredChat {
  complete<T>(request: StructuredChatRequest<T>): Promise<T>;
}

/**
 * Injection tokens
 */
export const QUERY_EMBEDDER = 'QUERY_EMBEDDER';
export const DENSE_SEARCH = 'DENSE_SEARCH';
export const SPARSE_SEARCH = 'SPARSE_SEARCH';
export const STRUCTURED_CHAT = 'STRUCTURED_CHAT';
export const QDRANT_CLIENT = 'QDRANT_CLIENT';
