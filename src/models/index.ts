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
 * Domain models and data structures
 *
 * @packageDocumentation
 */

/**
 * A stored question/answer pair, as loaded from the knowledge files
 */
export interface KnowledgeItem {
  instruction: string;
  output: string;
  input?: string;
  channelUsername?: string;
  videoId?: string;
  source: string;
}

/**
 * A knowledge item returned by retrieval, with its similarity score
 */
export interface ContextItem {
  instruction: string;
  output: string;
  similarity: number;
  source?: string;
  channelUsername?: string;
  videoId?: string;
}

/**
 * A point as written to the vector index
 */
export interface VectorPoint {
  id: number;
  vector: number[];
  item: KnowledgeItem;
}

/**
 * Represents a similarity search result
 */
export interface SearchResult {
  item: KnowledgeItem;
  score: number;
}

/**
 * Result of the query pipeline
 */
export interface QueryResult {
  answer: string;
  context: ContextItem[];
  question: string;
}

/**
 * Request payload for POST /query
 */
export interface QueryRequest {
  question: string;
  top_k?: number;
}

/**
 * Context item as serialised on the wire
 */
export interface ContextItemDto {
  instruction: string;
  output: string;
  similarity: number;
  source?: string;
  channel_username?: string;
  video_id?: string;
}

/**
 * Response payload for POST /query
 */
export interface QueryResponse {
  answer: string;
  context: ContextItemDto[];
  question: string;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'healthy' | 'initializing';
  chatbot_ready: boolean;
  version: string;
}

/**
 * Statistics response
 */
export interface StatsResponse {
  total_documents: number;
  llm_provider: LLMProviderName;
  model: string;
  embedding_model: string;
  max_tokens: number;
  default_top_k: number;
  vector_db: string;
}

/**
 * Tunable settings exposed by GET /config
 */
export interface ConfigResponse {
  top_k: number;
  max_tokens: number;
  temperature: number;
  similarity_threshold: number;
  llm_provider: LLMProviderName;
  model: string;
  embedding_model: string;
  collection_name: string;
}

export type LLMProviderName = 'openai' | 'huggingface';

export type VectorStoreType = 'qdrant' | 'postgresql';

/**
 * Settings shared by the OpenAI-compatible providers
 */
export interface ProviderCredentials {
  apiKey?: string;
  model: string;
  baseUrl?: string;
}

/**
 * PostgreSQL connection configuration
 */
export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Qdrant connection configuration
 */
export interface QdrantConfig {
  url?: string;
  apiKey?: string;
  timeoutMs: number;
}

/**
 * Vector store configuration
 */
export interface VectorStoreConfig {
  type: VectorStoreType;
  collectionName: string;
  uploadBatchSize: number;
  qdrant: QdrantConfig;
  postgresql: PostgresConfig;
}

/**
 * Process-wide settings, loaded once at startup
 */
export interface ChatbotConfig {
  app: {
    name: string;
    version: string;
    host: string;
    port: number;
    corsOrigins: string[];
    logLevel: string;
  };
  llm: {
    provider: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
    openai: ProviderCredentials;
    huggingface: ProviderCredentials;
  };
  retrieval: {
    topK: number;
    similarityThreshold: number;
  };
  embedding: {
    model: string;
    baseUrl: string;
    batchSize: number;
    timeoutMs: number;
  };
  vectorStore: VectorStoreConfig;
  data: {
    paths: string[];
    stripCitations: boolean;
  };
}
