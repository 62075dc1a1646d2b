/**
 * Dense Search over Qdrant
 * Cosine similarity against the collection's named dense vector.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QDRANT_CLIENT, type DenseSearch } from '../types/collaborators';
import type { RankedResult } from '../types';
import { StageAbortedError } from '../errors/retrieval-errors';
import { toRankedResults, type QdrantSearchPort } from './qdrant-point.mapper';

@Injectable()
export class QdrantDenseSearchService implements DenseSearch {
  private readonly logger = new Logger(QdrantDenseSearchService.name);
  private readonly collectionName: string;
  private readonly vectorName: string;

  constructor(
    @Inject(QDRANT_CLIENT) private readonly client: QdrantSearchPort,
    configService: ConfigService,
  ) {
    this.collectionName = configService.get<string>(
      'QDRANT_COLLECTION',
      'documents',
    );
    this.vectorName = configService.get<string>('QDRANT_DENSE_VECTOR', 'dense');
  }

  async search(
    embedding: number[],
    topK: number,
    signal?: AbortSignal,
  ): Promise<RankedResult[]> {
    if (signal?.aborted) {
      throw new StageAbortedError('dense');
    }

    const points = await this.client.search(this.collectionName, {
      vector: { name: this.vectorName, vector: embedding },
      limit: topK,
      with_payload: true,
    });

    const results = toRankedResults(points, 'dense');
    this.logger.debug(
      `Dense search: collection=${this.collectionName} points=${points.length} results=${results.length}`,
    );
    return results;
  }
}
