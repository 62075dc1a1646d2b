/**
 * Sparse Embedding Service for Query-time BM25
 * Query-side term weighting for the collection's sparse vector. Corpus
 * statistics (IDF) live in the index, so the query only carries log-scaled
 * term frequencies.
 *
 * Term ids are a stable 32-bit hash of the term so that the indexer and this
 * service agree without sharing a vocabulary.
 */

import { Injectable } from '@nestjs/common';
import { createHash } from 'crypto';

export interface SparseVector {
  indices: number[];
  values: number[];
}

@Injectable()
export class SparseEmbeddingService {
  /**
   * Generate sparse embedding for query text
   */
  generateSparseEmbedding(text: string): SparseVector {
    const termFrequency = this.calculateTermFrequency(this.tokenize(text));
    const weights = new Map<number, number>();

    for (const [term, tf] of termFrequency.entries()) {
      const termId = this.termId(term);
      // Hash collisions merge into one dimension
      weights.set(termId, (weights.get(termId) ?? 0) + Math.log(1 + tf));
    }

    // Sorted by index (required by Qdrant)
    const sorted = Array.from(weights.entries()).sort((a, b) => a[0] - b[0]);

    return {
      indices: sorted.map(([index]) => index),
      values: sorted.map(([, value]) => value),
    };
  }

  /**
   * Tokenize text into terms (must match indexing side)
   */
  tokenize(text: string): string[] {
    return text
      .toLowerCase()
      .replace(/[^\w\s]/g, ' ')
      .split(/\s+/)
      .filter((term) => term.length > 2);
  }

  termId(term: string): number {
    return createHash('md5').update(term).digest().readUInt32BE(0);
  }

  private calculateTermFrequency(terms: string[]): Map<string, number> {
    const tf = new Map<string, number>();
    for (const term of terms) {
      tf.set(term, (tf.get(term) || 0) + 1);
    }
    return tf;
  }
}
