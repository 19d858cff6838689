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
 * Qdrant vector store implementation
 *
 * @packageDocumentation
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import type { Logger } from 'winston';
import { ConfigurationError } from '../errors';
import { IVectorStore } from '../interfaces';
import { QdrantConfig, SearchResult, VectorPoint } from '../models';
import { fromPayload, toPayload } from './vectorPayload';

/**
 * Stores knowledge items as points in a Qdrant collection with cosine
 * distance. Point ids are the sequential ingestion indexes.
 */
export class QdrantVectorStore implements IVectorStore {
  readonly type = 'qdrant';

  private readonly logger: Logger;
  private readonly collectionName: string;
  private readonly config: QdrantConfig;
  private client: QdrantClient | null = null;

  constructor(logger: Logger, config: QdrantConfig, collectionName: string) {
    this.logger = logger;
    this.config = config;
    this.collectionName = collectionName;
  }

  async initialize(): Promise<void> {
    if (this.client) {
      return;
    }
    if (!this.config.url || !this.config.apiKey) {
      throw new ConfigurationError('QDRANT_URL and QDRANT_API_KEY must be set in environment variables');
    }

    this.logger.info(`Connecting to Qdrant at ${this.config.url}`);
    this.client = new QdrantClient({
      url: this.config.url,
      apiKey: this.config.apiKey,
      timeout: this.config.timeoutMs,
    });
  }

  async collectionExists(): Promise<boolean> {
    const { collections } = await this.requireClient().getCollections();
    return collections.some(collection => collection.name === this.collectionName);
  }

  async createCollection(dimension: number): Promise<void> {
    this.logger.info(`Creating collection '${this.collectionName}' (dimension ${dimension})`);
    await this.requireClient().createCollection(this.collectionName, {
      vectors: { size: dimension, distance: 'Cosine' },
    });
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    if (points.length === 0) {
      return;
    }
    await this.requireClient().upsert(this.collectionName, {
      wait: true,
      points: points.map(point => ({
        id: point.id,
        vector: point.vector,
        payload: toPayload(point.item),
      })),
    });
  }

  async search(queryVector: number[], limit: number): Promise<SearchResult[]> {
    const hits = await this.requireClient().search(this.collectionName, {
      vector: queryVector,
      limit,
      with_payload: true,
    });

    const results: SearchResult[] = [];
    for (const hit of hits) {
      const item = fromPayload(hit.payload);
      if (!item) {
        this.logger.warn(`Skipping point ${String(hit.id)} with malformed payload`);
        continue;
      }
      results.push({ item, score: hit.score });
    }
    return results;
  }

  async count(): Promise<number> {
    const info = await this.requireClient().getCollection(this.collectionName);
    return info.points_count ?? 0;
  }

  async close(): Promise<void> {
    // The REST client holds no long-lived connection
    this.client = null;
  }

  private requireClient(): QdrantClient {
    if (!this.client) {
      throw new Error('QdrantVectorStore not initialized. Call initialize() first.');
    }
    return this.client;
  }
}
