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
 * Query pipeline: retrieval, prompt assembly and generation
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ILLMProvider, IQueryOrchestrator, IReadinessGate, IRetrievalClient } from '../interfaces';
import { QueryResult } from '../models';
import { FALLBACK_ANSWER, SYSTEM_PROMPT, buildPrompt } from './promptTemplate';

export const MIN_TOP_K = 1;
export const MAX_TOP_K = 20;

export function clampTopK(value: number): number {
  return Math.min(MAX_TOP_K, Math.max(MIN_TOP_K, Math.trunc(value)));
}

/**
 * Resolve a requested top_k: the default when absent, clamped to [1, 20]
 */
export function resolveTopK(requested: number | undefined, defaultTopK: number): number {
  return clampTopK(requested ?? defaultTopK);
}

export interface QueryOrchestratorOptions {
  logger: Logger;
  retrievalClient: IRetrievalClient;
  llmProvider: ILLMProvider;
  readiness: IReadinessGate;
  defaultTopK: number;
}

/**
 * Composes retrieval and generation. When nothing clears the similarity
 * threshold the fallback answer is returned without calling the provider.
 */
export class QueryOrchestrator implements IQueryOrchestrator {
  private readonly logger: Logger;
  private readonly retrievalClient: IRetrievalClient;
  private readonly llmProvider: ILLMProvider;
  private readonly readiness: IReadinessGate;
  private readonly defaultTopK: number;

  constructor(options: QueryOrchestratorOptions) {
    this.logger = options.logger;
    this.retrievalClient = options.retrievalClient;
    this.llmProvider = options.llmProvider;
    this.readiness = options.readiness;
    this.defaultTopK = options.defaultTopK;
  }

  async query(question: string, topK?: number): Promise<QueryResult> {
    this.readiness.assertReady();

    const k = resolveTopK(topK, this.defaultTopK);
    const context = await this.retrievalClient.retrieve(question, k);

    if (context.length === 0) {
      this.logger.info('[Orchestrator] No relevant context found, returning fallback answer');
      return { answer: FALLBACK_ANSWER, context: [], question };
    }

    const prompt = buildPrompt(question, context);
    const answer = await this.llmProvider.generate(prompt, SYSTEM_PROMPT);
    this.logger.info(`[Orchestrator] Generated answer from ${context.length} context items (${answer.length} chars)`);

    return { answer, context, question };
  }
}
