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
 * Embedding service backed by an Ollama-compatible /api/embed endpoint
 *
 * @packageDocumentation
 */

import fetch from 'node-fetch';
import type { Logger } from 'winston';
import { z } from 'zod';
import { UpstreamError, errorMessage } from '../errors';
import { IEmbeddingService, ServiceDependencies } from '../interfaces';

const DIMENSION_PROBE = 'test';

const embedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
});

/**
 * Computes embeddings through Ollama. Vector size is model dependent, so it
 * is measured from a probe embedding instead of being configured.
 */
export class OllamaEmbeddingService implements IEmbeddingService {
  readonly model: string;

  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private cachedDimension: number | null = null;

  constructor(dependencies: ServiceDependencies) {
    const { embedding } = dependencies.config.getConfig();
    this.logger = dependencies.logger;
    this.model = embedding.model;
    this.baseUrl = embedding.baseUrl.replace(/\/+$/, '');
    this.batchSize = Math.max(1, embedding.batchSize);
    this.timeoutMs = embedding.timeoutMs;
  }

  /**
   * Embed inputs, sending at most `batchSize` texts per request
   */
  async embed(inputs: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < inputs.length; i += this.batchSize) {
      const batch = inputs.slice(i, i + this.batchSize);
      vectors.push(...(await this.embedBatch(batch)));
      if (inputs.length > this.batchSize) {
        this.logger.debug(`Embedded ${Math.min(i + this.batchSize, inputs.length)}/${inputs.length} texts`);
      }
    }
    return vectors;
  }

  async embedOne(input: string): Promise<number[]> {
    const [vector] = await this.embedBatch([input]);
    return vector;
  }

  async dimension(): Promise<number> {
    if (this.cachedDimension === null) {
      const probe = await this.embedOne(DIMENSION_PROBE);
      this.cachedDimension = probe.length;
      this.logger.info(`Vector dimension for ${this.model}: ${this.cachedDimension}`);
    }
    return this.cachedDimension;
  }

  private async embedBatch(inputs: string[]): Promise<number[][]> {
    try {
      const response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          input: inputs,
        }),
        timeout: this.timeoutMs,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error (${response.status}): ${errorText}`);
      }

      const parsed = embedResponseSchema.safeParse(await response.json());

      if (!parsed.success || parsed.data.embeddings.length !== inputs.length) {
        throw new Error('Invalid embeddings response format from Ollama');
      }

      return parsed.data.embeddings;
    } catch (error) {
      this.logger.error(`Failed to generate embeddings: ${errorMessage(error)}`);
      throw new UpstreamError(`Embedding generation failed: ${errorMessage(error)}`, error);
    }
  }
}
