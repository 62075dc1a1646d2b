import { ConfigService } from '@nestjs/config';
import type { Embeddings } from '@langchain/core/embeddings';
import { FakeEmbeddings } from '@langchain/core/utils/testing';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { LangChainQueryEmbedder } from './query-embedder.service';
import { StageAbortedError } from '../errors/retrieval-errors';

class RecordingEmbeddings extends FakeEmbeddings {
  readonly calls: string[] = [];

  constructor(private readonly vector?: number[]) {
    super();
  }

  async embedQuery(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.vector ?? super.embedQuery(text);
  }
}

class FixedEmbeddingFactory extends EmbeddingProviderFactory {
  constructor(private readonly model: Embeddings) {
    super(new ConfigService({}));
  }

  createEmbeddingModel(): Embeddings {
    return this.model;
  }
}

describe('LangChainQueryEmbedder', () => {
  it('embeds through the configured model', async () => {
    const model = new RecordingEmbeddings([0.5, 0.25]);
    const embedder = new LangChainQueryEmbedder(new FixedEmbeddingFactory(model));

    await expect(embedder.embedQuery('refund policy')).resolves.toEqual([
      0.5, 0.25,
    ]);
    expect(model.calls).toEqual(['refund policy']);
  });

  it('does not start a call once the request is aborted', async () => {
    const model = new RecordingEmbeddings();
    const embedder = new LangChainQueryEmbedder(new FixedEmbeddingFactory(model));
    const controller = new AbortController();
    controller.abort();

    await expect(
      embedder.embedQuery('refund policy', controller.signal),
    ).rejects.toBeInstanceOf(StageAbortedError);
    expect(model.calls).toEqual([]);
  });

  it('rejects an empty vector', async () => {
    const embedder = new LangChainQueryEmbedder(
      new FixedEmbeddingFactory(new RecordingEmbeddings([])),
    );

    await expect(embedder.embedQuery('refund policy')).rejects.toThrow(
      'Embedding provider returned an empty vector',
    );
  });
});
