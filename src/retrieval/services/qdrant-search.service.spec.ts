import { ConfigService } from '@nestjs/config';
import { QdrantDenseSearchService } from './qdrant-dense-search.service';
import { QdrantSparseSearchService } from './qdrant-sparse-search.service';
import { SparseEmbeddingService } from './sparse-embedding.service';
import type {
  NamedVectorQuery,
  QdrantScoredPoint,
  QdrantSearchPort,
} from './qdrant-point.mapper';
import { StageAbortedError } from '../errors/retrieval-errors';

interface SearchCall {
  collectionName: string;
  vector: NamedVectorQuery;
  limit: number;
}

class StubQdrant implements QdrantSearchPort {
  readonly calls: SearchCall[] = [];

  constructor(private readonly points: QdrantScoredPoint[] = []) {}

  async search(
    collectionName: string,
    request: { vector: NamedVectorQuery; limit: number; with_payload: boolean },
  ): Promise<QdrantScoredPoint[]> {
    this.calls.push({ collectionName, vector: request.vector, limit: request.limit });
    return this.points;
  }

  async getCollections(): Promise<{ collections: Array<{ name: string }> }> {
    return { collections: [] };
  }
}

const points: QdrantScoredPoint[] = [
  { id: 1, score: 0.8, payload: { text: 'refund window', chunkId: 'c1' } },
  { id: 2, score: 0.6, payload: {} },
];

describe('QdrantDenseSearchService', () => {
  it('queries the named dense vector', async () => {
    const qdrant = new StubQdrant(points);
    const service = new QdrantDenseSearchService(
      qdrant,
      new ConfigService({ QDRANT_COLLECTION: 'kb' }),
    );

    const results = await service.search([0.1, 0.2], 3);

    expect(qdrant.calls).toEqual([
      {
        collectionName: 'kb',
        vector: { name: 'dense', vector: [0.1, 0.2] },
        limit: 3,
      },
    ]);
    expect(results.map((result) => [result.id, result.origin])).toEqual([
      ['c1', 'dense'],
    ]);
  });

  it('does not search once aborted', async () => {
    const qdrant = new StubQdrant(points);
    const service = new QdrantDenseSearchService(qdrant, new ConfigService({}));
    const controller = new AbortController();
    controller.abort();

    await expect(
      service.search([0.1], 3, controller.signal),
    ).rejects.toBeInstanceOf(StageAbortedError);
    expect(qdrant.calls).toHaveLength(0);
  });
});

describe('QdrantSparseSearchService', () => {
  const sparse = new SparseEmbeddingService();

  it('queries the named sparse vector', async () => {
    const qdrant = new StubQdrant(points);
    const service = new QdrantSparseSearchService(
      qdrant,
      sparse,
      new ConfigService({ QDRANT_SPARSE_VECTOR: 'bm25' }),
    );

    const results = await service.search('refund window', 4);

    expect(qdrant.calls).toEqual([
      {
        collectionName: 'documents',
        vector: {
          name: 'bm25',
          vector: sparse.generateSparseEmbedding('refund window'),
        },
        limit: 4,
      },
    ]);
    expect(results[0].origin).toBe('sparse');
  });

  it('skips the search when no term is indexable', async () => {
    const qdrant = new StubQdrant(points);
    const service = new QdrantSparseSearchService(
      qdrant,
      sparse,
      new ConfigService({}),
    );

    await expect(service.search('is it ok', 4)).resolves.toEqual([]);
    expect(qdrant.calls).toHaveLength(0);
  });
});
