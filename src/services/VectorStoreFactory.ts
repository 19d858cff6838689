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
 * Factory for creating vector store implementations
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IConfigService, IVectorStore } from '../interfaces';
import { PgVectorStore } from './PgVectorStore';
import { QdrantVectorStore } from './QdrantVectorStore';

/**
 * Factory class for creating vector store instances.
 * Stores are returned unconnected; call `initialize()` before use.
 *
 * Usage:
 * ```typescript
 * const vectorStore = VectorStoreFactory.create(configService, logger);
 * await vectorStore.initialize();
 * ```
 */
export class VectorStoreFactory {
  /**
   * Create a vector store instance based on configuration
   */
  static create(config: IConfigService, logger: Logger): IVectorStore {
    const { vectorStore } = config.getConfig();

    logger.info(`Creating vector store: ${vectorStore.type}`);

    switch (vectorStore.type) {
      case 'qdrant':
        return new QdrantVectorStore(logger, vectorStore.qdrant, vectorStore.collectionName);
      case 'postgresql':
        return new PgVectorStore(logger, vectorStore.postgresql, vectorStore.collectionName);
    }
  }

  /**
   * Validate vector store configuration
   * Used for startup validation before any connection is attempted
   */
  static validate(config: IConfigService): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { vectorStore } = config.getConfig();

    if (!vectorStore.collectionName) {
      errors.push('Collection name is required');
    }

    if (vectorStore.type === 'qdrant') {
      if (!vectorStore.qdrant.url || !vectorStore.qdrant.apiKey) {
        errors.push('QDRANT_URL and QDRANT_API_KEY must be set in environment variables');
      }
    }

    if (vectorStore.type === 'postgresql') {
      const pgConfig = vectorStore.postgresql;

      if (!pgConfig.host) {
        errors.push('PostgreSQL host is required');
      }
      if (!pgConfig.database) {
        errors.push('PostgreSQL database is required');
      }
      if (!pgConfig.user) {
        errors.push('PostgreSQL user is required');
      }
      if (!pgConfig.password) {
        errors.push('PostgreSQL password is required when using postgresql vector store');
      }
      if (pgConfig.port < 1 || pgConfig.port > 65535) {
        errors.push('PostgreSQL port must be between 1 and 65535');
      }
    }

    if (vectorStore.uploadBatchSize < 1) {
      errors.push('Upload batch size must be at least 1');
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }
}
