/**
 * Sparse (BM25) Search over Qdrant
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QDRANT_CLIENT, type SparseSearch } from '../types/collaborators';
import type { RankedResult } from '../types';
import { StageAbortedError } from '../errors/retrieval-errors';
import { SparseEmbeddingService } from './sparse-embedding.service';
import { toRankedResults, type QdrantSearchPort } from './qdrant-point.mapper';

@Injectable()
export class QdrantSparseSearchService implements SparseSearch {
  private readonly logger = new Logger(QdrantSparseSearchService.name);
  private readonly collectionName: string;
  private readonly vectorName: string;

  constructor(
    @Inject(QDRANT_CLIENT) private readonly client: QdrantSearchPort,
    private readonly sparseEmbedding: SparseEmbeddingService,
    configService: ConfigService,
  ) {
    this.collectionName = configService.get<string>(
      'QDRANT_COLLECTION',
      'documents',
    );
    this.vectorName = configService.get<string>(
      'QDRANT_SPARSE_VECTOR',
      'sparse',
    );
  }

  async search(
    text: string,
    topK: number,
    signal?: AbortSignal,
  ): Promise<RankedResult[]> {
    if (signal?.aborted) {
      throw new StageAbortedError('sparse');
    }

    const sparseVector = this.sparseEmbedding.generateSparseEmbedding(text);
    if (sparseVector.indices.length === 0) {
      // Only stopword-length terms: nothing to match on
      this.logger.debug('Sparse search skipped: query has no indexable terms');
      return [];
    }

    const points = await this.client.search(this.collectionName, {
      vector: { name: this.vectorName, vector: sparseVector },
      limit: topK,
      with_payload: true,
    });

    const results = toRankedResults(points, 'sparse');
    this.logger.debug(
      `Sparse search: terms=${sparseVector.indices.length} points=${points.length} results=${results.length}`,
    );
    return results;
  }
}
