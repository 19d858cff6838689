/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Chatbot service implementation
 * Owns initialization, ingestion and the query pipeline
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ConfigurationError } from '../errors';
import {
  ChatbotServiceDependencies,
  IChatbotService,
  IConfigService,
  IEmbeddingService,
  IKnowledgeLoader,
  ILLMProvider,
  IVectorStore,
} from '../interfaces';
import {
  ConfigResponse,
  KnowledgeItem,
  QueryResult,
  StatsResponse,
  VectorPoint,
  VectorStoreType,
} from '../models';
import { QueryOrchestrator, RetrievalClient } from '../rag';
import { LifecycleState, ServiceLifecycle } from './ServiceLifecycle';
import { VectorStoreFactory } from './VectorStoreFactory';

const VECTOR_DB_LABELS: Record<VectorStoreType, string> = {
  qdrant: 'Qdrant',
  postgresql: 'PostgreSQL (pgvector)',
};

/**
 * Service that gates the query pipeline behind a one-time initialization.
 * Query handling only reads the handles set up here.
 */
export class ChatbotService implements IChatbotService {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly llmProvider: ILLMProvider;
  private readonly embeddingService: IEmbeddingService;
  private readonly knowledgeLoader: IKnowledgeLoader;
  private readonly createVectorStore: () => IVectorStore;
  private readonly lifecycle = new ServiceLifecycle();

  private vectorStore: IVectorStore | null = null;
  private orchestrator: QueryOrchestrator | null = null;
  private initialization: Promise<void> | null = null;

  constructor(dependencies: ChatbotServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.llmProvider = dependencies.llmProvider;
    this.embeddingService = dependencies.embeddingService;
    this.knowledgeLoader = dependencies.knowledgeLoader;
    this.createVectorStore = dependencies.createVectorStore;
  }

  get state(): LifecycleState {
    return this.lifecycle.state;
  }

  isReady(): boolean {
    return this.lifecycle.isReady();
  }

  /**
   * Run initialization once. Concurrent callers share the same run; after a
   * failure every call rejects with the recorded error.
   */
  initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.runInitialization();
    }
    return this.initialization;
  }

  private async runInitialization(): Promise<void> {
    this.lifecycle.begin();
    const config = this.configService.getConfig();

    try {
      const validation = VectorStoreFactory.validate(this.configService);
      if (!validation.valid) {
        throw new ConfigurationError(validation.errors.join('; '));
      }

      const items = await this.knowledgeLoader.load();

      this.logger.info(`[Chatbot] Verifying LLM provider: ${this.llmProvider.name}`);
      if (!this.llmProvider.isAvailable()) {
        throw new ConfigurationError(
          `LLM provider '${this.llmProvider.name}' is not properly configured. Check your API keys.`,
        );
      }

      const store = this.createVectorStore();
      this.vectorStore = store;
      await store.initialize();

      const dimension = await this.embeddingService.dimension();

      if (await store.collectionExists()) {
        const count = await store.count();
        this.logger.info(`[Chatbot] Loaded existing collection with ${count} items`);
      } else {
        await store.createCollection(dimension);
        await this.populate(store, items);
      }

      this.orchestrator = new QueryOrchestrator({
        logger: this.logger,
        llmProvider: this.llmProvider,
        readiness: this.lifecycle,
        defaultTopK: config.retrieval.topK,
        retrievalClient: new RetrievalClient({
          logger: this.logger,
          embeddingService: this.embeddingService,
          vectorStore: store,
          readiness: this.lifecycle,
          similarityThreshold: config.retrieval.similarityThreshold,
        }),
      });

      this.lifecycle.complete();
      this.logger.info('[Chatbot] Service initialized successfully');
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.lifecycle.fail(failure);
      this.logger.error(`[Chatbot] Initialization failed: ${failure.message}`);
      throw failure;
    }
  }

  /**
   * Embed every instruction and upload points with sequential ids, one
   * batch at a time. A failed batch aborts ingestion.
   */
  private async populate(store: IVectorStore, items: KnowledgeItem[]): Promise<void> {
    const { uploadBatchSize } = this.configService.getConfig().vectorStore;

    this.logger.info(`[Chatbot] Generating embeddings for ${items.length} items`);
    const vectors = await this.embeddingService.embed(items.map(item => item.instruction));
    if (vectors.length !== items.length) {
      throw new Error(`Expected ${items.length} embeddings, got ${vectors.length}`);
    }

    const points: VectorPoint[] = items.map((item, index) => ({
      id: index,
      vector: vectors[index],
      item,
    }));

    for (let i = 0; i < points.length; i += uploadBatchSize) {
      await store.upsert(points.slice(i, i + uploadBatchSize));
      this.logger.info(`[Chatbot] Uploaded ${Math.min(i + uploadBatchSize, points.length)}/${points.length} items`);
    }

    this.logger.info('[Chatbot] Collection populated successfully');
  }

  async query(question: string, topK?: number): Promise<QueryResult> {
    return this.requireOrchestrator().query(question, topK);
  }

  async getStats(): Promise<StatsResponse> {
    const store = this.requireVectorStore();
    const config = this.configService.getConfig();

    return {
      total_documents: await store.count(),
      llm_provider: this.llmProvider.name,
      model: this.llmProvider.model,
      embedding_model: this.embeddingService.model,
      max_tokens: config.llm.maxTokens,
      default_top_k: config.retrieval.topK,
      vector_db: VECTOR_DB_LABELS[store.type],
    };
  }

  /**
   * Tunable settings, available before initialization completes
   */
  getSettings(): ConfigResponse {
    const config = this.configService.getConfig();
    return {
      top_k: config.retrieval.topK,
      max_tokens: config.llm.maxTokens,
      temperature: config.llm.temperature,
      similarity_threshold: config.retrieval.similarityThreshold,
      llm_provider: this.llmProvider.name,
      model: this.llmProvider.model,
      embedding_model: this.embeddingService.model,
      collection_name: config.vectorStore.collectionName,
    };
  }

  /**
   * Release the vector store connection
   */
  async close(): Promise<void> {
    if (this.vectorStore) {
      await this.vectorStore.close();
      this.vectorStore = null;
    }
  }

  private requireOrchestrator(): QueryOrchestrator {
    this.lifecycle.assertReady();
    if (!this.orchestrator) {
      throw new Error('Query orchestrator missing after initialization');
    }
    return this.orchestrator;
  }

  private requireVectorStore(): IVectorStore {
    this.lifecycle.assertReady();
    if (!this.vectorStore) {
      throw new Error('Vector store missing after initialization');
    }
    return this.vectorStore;
  }
}
