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
 * Retrieval of similar knowledge items from the vector index
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IEmbeddingService, IReadinessGate, IRetrievalClient, IVectorStore } from '../interfaces';
import { ContextItem, SearchResult } from '../models';

export interface RetrievalClientOptions {
  logger: Logger;
  embeddingService: IEmbeddingService;
  vectorStore: IVectorStore;
  readiness: IReadinessGate;
  similarityThreshold: number;
}

/**
 * Embeds the question, asks the index for `topK` neighbours and keeps those
 * scoring at or above the threshold, in the index's order.
 */
export class RetrievalClient implements IRetrievalClient {
  private readonly logger: Logger;
  private readonly embeddingService: IEmbeddingService;
  private readonly vectorStore: IVectorStore;
  private readonly readiness: IReadinessGate;
  private readonly similarityThreshold: number;

  constructor(options: RetrievalClientOptions) {
    this.logger = options.logger;
    this.embeddingService = options.embeddingService;
    this.vectorStore = options.vectorStore;
    this.readiness = options.readiness;
    this.similarityThreshold = options.similarityThreshold;
  }

  async retrieve(question: string, topK: number): Promise<ContextItem[]> {
    this.readiness.assertReady();

    const queryVector = await this.embeddingService.embedOne(question);
    const results = await this.vectorStore.search(queryVector, topK);

    const context = results
      .filter(result => result.score >= this.similarityThreshold)
      .map(toContextItem);

    this.logger.info(
      `[Retrieval] ${context.length}/${results.length} candidates above threshold ${this.similarityThreshold} (topK=${topK})`,
    );
    return context;
  }
}

function toContextItem(result: SearchResult): ContextItem {
  const { item, score } = result;
  const context: ContextItem = {
    instruction: item.instruction,
    output: item.output,
    similarity: score,
    source: item.source,
  };
  if (item.channelUsername) {
    context.channelUsername = item.channelUsername;
  }
  if (item.videoId) {
    context.videoId = item.videoId;
  }
  return context;
}
