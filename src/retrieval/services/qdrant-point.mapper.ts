/**
 * Qdrant point → RankedResult mapping shared by dense and sparse search.
 * Both read the same collection, so a passage keeps the same identity in
 * both lists.
 */

import type { RankedResult } from '../types';

/**
 * Vector query accepted by Qdrant's search endpoint for named vectors
 */
export interface NamedVectorQuery {
  name: string;
  vector: number[] | { indices: number[]; values: number[] };
}

export interface QdrantScoredPoint {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}

/**
 * The subset of QdrantClient this service uses
 */
export interface QdrantSearchPort {
  search(
    collectionName: string,
    request: {
      vector: NamedVectorQuery;
      limit: number;
      with_payload: boolean;
    },
  ): Promise<QdrantScoredPoint[]>;
  getCollections(): Promise<{ collections: Array<{ name: string }> }>;
}

function readString(
  payload: Record<string, unknown>,
  ...keys: string[]
): string | undefined {
  for (const key of keys) {
    const value = payload[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

function readNumber(
  payload: Record<string, unknown>,
  ...keys: string[]
): number | undefined {
  for (const key of keys) {
    const value = payload[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
  }
  return undefined;
}

/**
 * Returns null for points without passage text
 */
export function toRankedResult(
  point: QdrantScoredPoint,
  origin: 'dense' | 'sparse',
): RankedResult | null {
  const payload = point.payload ?? {};
  const text = readString(payload, 'text', 'content');
  if (!text || text.trim().length === 0) {
    return null;
  }

  const page = readNumber(payload, 'pageNumber', 'page_number', 'page');
  const section = readString(payload, 'sectionTitle', 'section_title', 'section');

  return {
    id: readString(payload, 'chunkId', 'chunk_id') ?? String(point.id),
    text,
    source: {
      documentId: readString(payload, 'documentId', 'document_id') ?? '',
      sourcePath: readString(payload, 'sourcePath', 'source') ?? '',
      ...(page !== undefined && { page }),
      ...(section !== undefined && { section }),
    },
    score: point.score,
    origin,
  };
}

export function toRankedResults(
  points: QdrantScoredPoint[],
  origin: 'dense' | 'sparse',
): RankedResult[] {
  const results: RankedResult[] = [];
  for (const point of points) {
    const result = toRankedResult(point, origin);
    if (result) {
      results.push(result);
    }
  }
  return results;
}
