import { HybridRetrieverService } from './hybrid-retriever.service';
import { RelevanceRerankerService } from './relevance-reranker.service';
import {
  FakeDenseSearch,
  FakeEmbedder,
  FakeSparseSearch,
  HANG,
  ScriptedChat,
  ids,
  makeResult,
  testOptions,
} from '../testing/fakes';
import type { RetrievalOptions } from '../config/retrieval-options';
import type { Query, RankedResult } from '../types';

const query: Query = Object.freeze({ text: 'refund policy', topK: 3 });

const denseHits = (...names: string[]): RankedResult[] =>
  names.map((name) => makeResult(name, 'dense'));
const sparseHits = (...names: string[]): RankedResult[] =>
  names.map((name) => makeResult(name, 'sparse'));

describe('HybridRetrieverService', () => {
  let embedder: FakeEmbedder;
  let chat: ScriptedChat;

  beforeEach(() => {
    embedder = new FakeEmbedder();
    chat = new ScriptedChat();
  });

  function build(
    dense: FakeDenseSearch,
    sparse: FakeSparseSearch,
    options: RetrievalOptions = testOptions(),
  ): HybridRetrieverService {
    return new HybridRetrieverService(
      embedder,
      dense,
      sparse,
      new RelevanceRerankerService(chat, options),
      options,
    );
  }

  it('fuses dense and sparse hits and cuts to topK', async () => {
    const dense = new FakeDenseSearch(denseHits('A', 'B', 'C'));
    const sparse = new FakeSparseSearch(sparseHits('B', 'D'));

    const attempt = await build(dense, sparse).retrieve(query);

    expect(ids(attempt.results)).toEqual(['B', 'A', 'D']);
    expect(attempt.results.every((r) => r.origin === 'fused')).toBe(true);
    expect(attempt).toMatchObject({
      denseCount: 3,
      sparseCount: 2,
      fusedCount: 4,
      rerankOrigin: 'fused',
      degradations: [],
    });
  });

  it('embeds once and asks both retrievers for the candidate pool', async () => {
    const dense = new FakeDenseSearch(denseHits('A'));
    const sparse = new FakeSparseSearch(sparseHits('A'));

    await build(dense, sparse).retrieve(query);

    expect(embedder.calls).toEqual(['refund policy']);
    expect(dense.calls).toEqual([{ embedding: [0.1, 0.2, 0.3], topK: 20 }]);
    expect(sparse.calls).toEqual([{ text: 'refund policy', topK: 20 }]);
  });

  it('continues with sparse hits when dense search fails', async () => {
    const dense = new FakeDenseSearch(new Error('qdrant unavailable'));
    const sparse = new FakeSparseSearch(sparseHits('X', 'Y'));

    const attempt = await build(dense, sparse).retrieve(query);

    expect(ids(attempt.results)).toEqual(['X', 'Y']);
    expect(attempt.degradations).toEqual(['dense: qdrant unavailable']);
  });

  it('skips dense search when embedding fails', async () => {
    embedder = new FakeEmbedder(new Error('embedder down'));
    const dense = new FakeDenseSearch(denseHits('A'));
    const sparse = new FakeSparseSearch(sparseHits('X'));

    const attempt = await build(dense, sparse).retrieve(query);

    expect(dense.calls).toHaveLength(0);
    expect(ids(attempt.results)).toEqual(['X']);
    expect(attempt.degradations).toEqual(['dense: embedder down']);
  });

  it('treats a sparse timeout as an empty sparse list', async () => {
    const options = testOptions({
      timeouts: { ...testOptions().timeouts, sparseMs: 20 },
    });
    const dense = new FakeDenseSearch(denseHits('A'));
    const sparse = new FakeSparseSearch(HANG);

    const attempt = await build(dense, sparse, options).retrieve(query);

    expect(ids(attempt.results)).toEqual(['A']);
    expect(attempt.sparseCount).toBe(0);
    expect(attempt.degradations).toEqual(['sparse: sparse timed out after 20ms']);
  });

  it('reranks when enabled', async () => {
    const options = testOptions({
      rerank: { enabled: true, candidateCap: 10, previewChars: 500 },
    });
    chat.script('rerank', {
      rankings: [
        { passageIndex: 0, score: 0.1 },
        { passageIndex: 1, score: 0.3 },
        { passageIndex: 2, score: 0.9 },
        { passageIndex: 3, score: 0.2 },
      ],
    });
    const dense = new FakeDenseSearch(denseHits('A', 'B', 'C'));
    const sparse = new FakeSparseSearch(sparseHits('B', 'D'));

    const attempt = await build(dense, sparse, options).retrieve(query);

    // Fusion order B, A, D, C; judge favours D, then A, then C
    expect(ids(attempt.results)).toEqual(['D', 'A', 'C']);
    expect(attempt.rerankOrigin).toBe('reranked');
    expect(attempt.degradations).toEqual([]);
  });

  it('reports a failed rerank as a degradation and keeps fusion order', async () => {
    const options = testOptions({
      rerank: { enabled: true, candidateCap: 10, previewChars: 500 },
    });
    chat.script('rerank', new Error('judge offline'));
    const dense = new FakeDenseSearch(denseHits('A', 'B', 'C'));
    const sparse = new FakeSparseSearch(sparseHits('B', 'D'));

    const attempt = await build(dense, sparse, options).retrieve(query);

    expect(ids(attempt.results)).toEqual(['B', 'A', 'D']);
    expect(attempt.rerankOrigin).toBe('fused');
    expect(attempt.degradations).toEqual(['rerank: judge_failed']);
  });

  it('returns an empty attempt when both retrievers find nothing', async () => {
    const attempt = await build(
      new FakeDenseSearch([]),
      new FakeSparseSearch([]),
      testOptions({ rerank: { enabled: true, candidateCap: 10, previewChars: 500 } }),
    ).retrieve(query);

    expect(attempt.results).toEqual([]);
    expect(attempt.fusedCount).toBe(0);
    expect(chat.calls).toHaveLength(0);
  });
});
