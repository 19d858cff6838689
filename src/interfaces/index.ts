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
 * Service interfaces
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  ChatbotConfig,
  ConfigResponse,
  ContextItem,
  KnowledgeItem,
  LLMProviderName,
  QueryResult,
  SearchResult,
  StatsResponse,
  VectorPoint,
  VectorStoreType,
} from '../models';

/**
 * Text generation backend
 */
export interface ILLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  /**
   * Generate one completion for the prompt
   */
  generate(prompt: string, systemPrompt?: string): Promise<string>;

  /**
   * Whether the provider has the credentials it needs
   */
  isAvailable(): boolean;
}

/**
 * Embedding model client
 */
export interface IEmbeddingService {
  readonly model: string;

  embed(inputs: string[]): Promise<number[][]>;

  embedOne(input: string): Promise<number[]>;

  /**
   * Vector dimensionality, measured from a sample embedding
   */
  dimension(): Promise<number>;
}

/**
 * Vector index holding one point per knowledge item
 */
export interface IVectorStore {
  readonly type: VectorStoreType;

  /**
   * Connect and verify the backing service
   */
  initialize(): Promise<void>;

  collectionExists(): Promise<boolean>;

  createCollection(dimension: number): Promise<void>;

  upsert(points: VectorPoint[]): Promise<void>;

  /**
   * Nearest neighbours of the query vector, most similar first
   */
  search(queryVector: number[], limit: number): Promise<SearchResult[]>;

  count(): Promise<number>;

  close(): Promise<void>;
}

/**
 * Source of knowledge items for ingestion
 */
export interface IKnowledgeLoader {
  load(): Promise<KnowledgeItem[]>;
}

/**
 * Fetches similar knowledge items for a question
 */
export interface IRetrievalClient {
  retrieve(question: string, topK: number): Promise<ContextItem[]>;
}

/**
 * Answers questions with retrieval and generation
 */
export interface IQueryOrchestrator {
  query(question: string, topK?: number): Promise<QueryResult>;
}

/**
 * Gate that rejects work before initialization completes
 */
export interface IReadinessGate {
  isReady(): boolean;
  assertReady(): void;
}

/**
 * Interface for configuration management
 */
export interface IConfigService {
  /**
   * Get the complete configuration
   */
  getConfig(): ChatbotConfig;
}

/**
 * Operations the HTTP layer needs from the chatbot
 */
export interface IChatbotService extends IQueryOrchestrator {
  isReady(): boolean;
  getStats(): Promise<StatsResponse>;
  getSettings(): ConfigResponse;
}

/**
 * Dependencies for service construction
 */
export interface ServiceDependencies {
  logger: Logger;
  config: IConfigService;
}

/**
 * Dependencies for chatbot service construction
 */
export interface ChatbotServiceDependencies extends ServiceDependencies {
  llmProvider: ILLMProvider;
  embeddingService: IEmbeddingService;
  knowledgeLoader: IKnowledgeLoader;
  createVectorStore: () => IVectorStore;
}
