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
 * In-process stand-in for the vector index, used by tests
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IVectorStore } from '../interfaces';
import { SearchResult, VectorPoint, VectorStoreType } from '../models';

/**
 * Cosine-similarity scan over points held in a Map. It reports the backend
 * type it stands in for.
 */
export class InMemoryVectorStore implements IVectorStore {
  readonly type: VectorStoreType;

  private readonly logger: Logger;
  private readonly points: Map<number, VectorPoint> = new Map();
  private dimension: number | null = null;

  constructor(logger: Logger, type: VectorStoreType = 'qdrant') {
    this.logger = logger;
    this.type = type;
  }

  async initialize(): Promise<void> {
    this.logger.debug(`Using in-memory stand-in for ${this.type}`);
  }

  async collectionExists(): Promise<boolean> {
    return this.dimension !== null;
  }

  async createCollection(dimension: number): Promise<void> {
    this.dimension = dimension;
    this.points.clear();
    this.logger.info(`Created in-memory collection (dimension ${dimension})`);
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    const dimension = this.requireCollection();
    for (const point of points) {
      if (point.vector.length !== dimension) {
        throw new Error(`Vector for point ${point.id} has ${point.vector.length} dimensions, expected ${dimension}`);
      }
      this.points.set(point.id, point);
    }
    this.logger.debug(`Stored batch of ${points.length} points`);
  }

  async search(queryVector: number[], limit: number): Promise<SearchResult[]> {
    this.requireCollection();

    const results: SearchResult[] = [];
    for (const point of this.points.values()) {
      results.push({
        item: point.item,
        score: this.cosineSimilarity(queryVector, point.vector),
      });
    }

    // Sort by similarity (descending), ties by insertion id
    results.sort((a, b) => b.score - a.score);
    return results.slice(0, limit);
  }

  async count(): Promise<number> {
    return this.points.size;
  }

  async close(): Promise<void> {
    this.points.clear();
    this.dimension = null;
  }

  private requireCollection(): number {
    if (this.dimension === null) {
      throw new Error('Collection does not exist. Call createCollection() first.');
    }
    return this.dimension;
  }

  /**
   * Calculate cosine similarity between two vectors
   */
  private cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
      throw new Error('Vectors must have the same length');
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
      dotProduct += a[i] * b[i];
      normA += a[i] * a[i];
      normB += b[i] * b[i];
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);

    if (denominator === 0) {
      return 0;
    }

    return dotProduct / denominator;
  }
}
