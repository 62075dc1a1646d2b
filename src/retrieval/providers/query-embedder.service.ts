/**
 * Query Embedder
 * Built once at startup from the configured embedding provider.
 */

import { Injectable, Logger } from '@nestjs/common';
import type { Embeddings } from '@langchain/core/embeddings';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import type { QueryEmbedder } from '../types/collaborators';
import { StageAbortedError } from '../errors/retrieval-errors';

@Injectable()
export class LangChainQueryEmbedder implements QueryEmbedder {
  private readonly logger = new Logger(LangChainQueryEmbedder.name);
  private readonly embeddings: Embeddings;

  constructor(embeddingFactory: EmbeddingProviderFactory) {
    this.embeddings = embeddingFactory.createEmbeddingModel();
  }

  /**
   * LangChain's `embedQuery` takes no abort signal, so an abort after the
   * call starts only abandons it: the caller's deadline stops waiting while
   * the provider request runs to completion in the background.
   */
  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    if (signal?.aborted) {
      throw new StageAbortedError('embed');
    }

    const vector = await this.embeddings.embedQuery(text);
    if (vector.length === 0) {
      throw new Error('Embedding provider returned an empty vector');
    }

    this.logger.debug(`Embedded query: chars=${text.length} dims=${vector.length}`);
    return vector;
  }
}
