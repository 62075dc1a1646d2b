/**
 * Workflow Module
 * Constructs every collaborator once at startup and provides the
 * orchestrator with them.
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import { RetrievalOrchestratorService } from './retrieval-orchestrator.service';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import { LangChainQueryEmbedder } from '../providers/query-embedder.service';
import { StructuredChatService } from '../providers/structured-chat.service';
import { SparseEmbeddingService } from '../services/sparse-embedding.service';
import { QdrantDenseSearchService } from '../services/qdrant-dense-search.service';
import { QdrantSparseSearchService } from '../services/qdrant-sparse-search.service';
import { IntentPlannerService } from '../services/intent-planner.service';
import { QueryExpanderService } from '../services/query-expander.service';
import { QualityEvaluatorService } from '../services/quality-evaluator.service';
import { RelevanceRerankerService } from '../services/relevance-reranker.service';
import { HybridRetrieverService } from '../services/hybrid-retriever.service';
import {
  RETRIEVAL_OPTIONS,
  loadRetrievalOptions,
} from '../config/retrieval-options';
import {
  DENSE_SEARCH,
  QDRANT_CLIENT,
  QUERY_EMBEDDER,
  SPARSE_SEARCH,
  STRUCTURED_CHAT,
} from '../types/collaborators';

@Module({
  providers: [
    // Configuration
    {
      provide: RETRIEVAL_OPTIONS,
      useFactory: (configService: ConfigService) =>
        loadRetrievalOptions(configService),
      inject: [ConfigService],
    },

    // Clients
    {
      provide: QDRANT_CLIENT,
      useFactory: (configService: ConfigService) =>
        new QdrantClient({
          url: configService.get<string>('QDRANT_URL', 'http://localhost:6333'),
          apiKey: configService.get<string>('QDRANT_API_KEY') || undefined,
        }),
      inject: [ConfigService],
    },

    // Factories
    EmbeddingProviderFactory,
    LLMProviderFactory,

    // Collaborators
    SparseEmbeddingService,
    { provide: QUERY_EMBEDDER, useClass: LangChainQueryEmbedder },
    { provide: DENSE_SEARCH, useClass: QdrantDenseSearchService },
    { provide: SPARSE_SEARCH, useClass: QdrantSparseSearchService },
    { provide: STRUCTURED_CHAT, useClass: StructuredChatService },

    // Stages
    IntentPlannerService,
    QueryExpanderService,
    QualityEvaluatorService,
    RelevanceRerankerService,
    HybridRetrieverService,

    // Workflow
    RetrievalOrchestratorService,
  ],
  exports: [RetrievalOrchestratorService],
})
export class WorkflowModule {}
