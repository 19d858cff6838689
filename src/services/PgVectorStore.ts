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
 * PostgreSQL vector store implementation with pgvector
 * Provides persistent vector storage and similarity search capabilities
 *
 * @packageDocumentation
 */

import { Pool } from 'pg';
import type { Logger } from 'winston';
import { ConfigurationError, errorMessage } from '../errors';
import { IVectorStore } from '../interfaces';
import { PostgresConfig, SearchResult, VectorPoint } from '../models';
import { DEFAULT_SOURCE } from './vectorPayload';

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;

type KnowledgeRow = {
  id: number;
  instruction: string;
  output: string;
  input: string | null;
  channel_username: string | null;
  video_id: string | null;
  source: string | null;
  similarity: string | number;
};

/**
 * PostgreSQL vector store using the pgvector extension.
 * One table per collection; the vector column size is fixed when the
 * table is created.
 */
export class PgVectorStore implements IVectorStore {
  readonly type = 'postgresql';

  private readonly logger: Logger;
  private readonly pool: Pool;
  private readonly table: string;
  private initialized = false;

  constructor(logger: Logger, config: PostgresConfig, collectionName: string) {
    if (!TABLE_NAME_PATTERN.test(collectionName)) {
      throw new ConfigurationError(
        `Collection name '${collectionName}' is not a valid PostgreSQL table name`,
      );
    }

    this.logger = logger;
    this.table = collectionName;

    // Initialize connection pool
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: config.maxConnections ?? 10,
      idleTimeoutMillis: config.idleTimeoutMillis ?? 30000,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 5000,
    });

    // Handle pool errors
    this.pool.on('error', err => {
      this.logger.error(`Unexpected PostgreSQL pool error: ${err.message}`);
    });
  }

  /**
   * Verify the connection and the pgvector extension
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger.debug('PgVectorStore already initialized');
      return;
    }

    try {
      this.logger.info('Initializing PgVectorStore...');
      await this.pool.query('SELECT 1');
      await this.pool.query('CREATE EXTENSION IF NOT EXISTS vector');
      this.initialized = true;
      this.logger.info('PgVectorStore initialized successfully');
    } catch (error) {
      this.logger.error(`Failed to initialize PgVectorStore: ${errorMessage(error)}`);
      throw new Error(`PgVectorStore initialization failed: ${errorMessage(error)}`);
    }
  }

  async collectionExists(): Promise<boolean> {
    this.ensureInitialized();
    const result = await this.pool.query<{ exists: boolean }>(
      'SELECT EXISTS(SELECT 1 FROM information_schema.tables WHERE table_name = $1) AS exists',
      [this.table],
    );
    return result.rows[0]?.exists === true;
  }

  async createCollection(dimension: number): Promise<void> {
    this.ensureInitialized();
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Invalid vector dimension: ${dimension}`);
    }

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        id INTEGER PRIMARY KEY,
        embedding vector(${dimension}) NOT NULL,
        instruction TEXT NOT NULL,
        output TEXT NOT NULL,
        input TEXT,
        channel_username TEXT,
        video_id TEXT,
        source TEXT
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS ${this.table}_embedding_idx ON ${this.table} USING hnsw (embedding vector_cosine_ops)`,
    );
    this.logger.info(`Created table '${this.table}' (dimension ${dimension})`);
  }

  /**
   * Store points in a transaction, replacing rows with the same id
   */
  async upsert(points: VectorPoint[]): Promise<void> {
    this.ensureInitialized();

    if (points.length === 0) {
      return;
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      const query = `
        INSERT INTO ${this.table} (
          id, embedding, instruction, output, input, channel_username, video_id, source
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
        ON CONFLICT (id)
        DO UPDATE SET
          embedding = EXCLUDED.embedding,
          instruction = EXCLUDED.instruction,
          output = EXCLUDED.output,
          input = EXCLUDED.input,
          channel_username = EXCLUDED.channel_username,
          video_id = EXCLUDED.video_id,
          source = EXCLUDED.source
      `;

      for (const point of points) {
        await client.query(query, [
          point.id,
          this.vectorToSql(point.vector),
          point.item.instruction,
          point.item.output,
          point.item.input ?? null,
          point.item.channelUsername ?? null,
          point.item.videoId ?? null,
          point.item.source,
        ]);
      }

      await client.query('COMMIT');
      this.logger.debug(`Stored batch of ${points.length} points`);
    } catch (error) {
      await client.query('ROLLBACK');
      this.logger.error(`Failed to store point batch: ${errorMessage(error)}`);
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Search for similar vectors using cosine similarity
   */
  async search(queryVector: number[], limit: number): Promise<SearchResult[]> {
    this.ensureInitialized();

    const result = await this.pool.query<KnowledgeRow>(
      `
        SELECT
          id, instruction, output, input, channel_username, video_id, source,
          1 - (embedding <=> $1) AS similarity
        FROM ${this.table}
        ORDER BY embedding <=> $1
        LIMIT $2
      `,
      [this.vectorToSql(queryVector), limit],
    );

    return result.rows.map(row => ({
      item: {
        instruction: row.instruction,
        output: row.output,
        source: row.source ?? DEFAULT_SOURCE,
        ...(row.input ? { input: row.input } : {}),
        ...(row.channel_username ? { channelUsername: row.channel_username } : {}),
        ...(row.video_id ? { videoId: row.video_id } : {}),
      },
      score: typeof row.similarity === 'number' ? row.similarity : parseFloat(row.similarity),
    }));
  }

  async count(): Promise<number> {
    this.ensureInitialized();
    const result = await this.pool.query<{ count: string }>(`SELECT COUNT(*) AS count FROM ${this.table}`);
    return parseInt(result.rows[0]?.count ?? '0', 10);
  }

  /**
   * Close the connection pool
   */
  async close(): Promise<void> {
    await this.pool.end();
    this.initialized = false;
    this.logger.info('PgVectorStore connection pool closed');
  }

  /**
   * Convert number array to PostgreSQL vector format
   */
  private vectorToSql(vector: number[]): string {
    return `[${vector.join(',')}]`;
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('PgVectorStore not initialized. Call initialize() first.');
    }
  }
}
