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
 * Express router for the chatbot backend
 * Handles HTTP requests and delegates to the chatbot service
 *
 * @packageDocumentation
 */

import express, { Response, Router } from 'express';
import type { Logger } from 'winston';
import { z } from 'zod';
import { NotReadyError, ValidationError, errorMessage } from './errors';
import { IChatbotService } from './interfaces';
import { ContextItem, ContextItemDto, HealthResponse, QueryRequest, QueryResponse } from './models';
import { clampTopK } from './rag';

/**
 * Router environment
 */
export interface RouterEnvironment {
  logger: Logger;
  chatbot: IChatbotService;
  version: string;
}

const queryRequestSchema = z.object({
  question: z
    .string({ required_error: 'question is required' })
    .refine(value => value.trim().length > 0, { message: 'question must not be empty' }),
  top_k: z
    .number()
    .int('top_k must be an integer')
    .nullish()
    .transform(value => (value === null || value === undefined ? undefined : clampTopK(value))),
});

/**
 * Validate a POST /query body
 *
 * @throws ValidationError when the body does not match
 */
export function parseQueryRequest(body: unknown): QueryRequest {
  const parsed = queryRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(message);
  }
  return parsed.data;
}

export function toContextItemDto(item: ContextItem): ContextItemDto {
  const dto: ContextItemDto = {
    instruction: item.instruction,
    output: item.output,
    similarity: item.similarity,
  };
  if (item.source) {
    dto.source = item.source;
  }
  if (item.channelUsername) {
    dto.channel_username = item.channelUsername;
  }
  if (item.videoId) {
    dto.video_id = item.videoId;
  }
  return dto;
}

/**
 * Create and configure the chatbot router
 */
export function createChatbotRouter(env: RouterEnvironment): Router {
  const router = Router();
  router.use(express.json());

  const { logger, chatbot, version } = env;

  const sendError = (res: Response, error: unknown, label: string): void => {
    if (error instanceof ValidationError) {
      res.status(400).json({ error: 'Invalid request', message: error.message });
      return;
    }
    if (error instanceof NotReadyError) {
      res.status(503).json({ error: 'Service unavailable', message: error.message });
      return;
    }
    logger.error(`${label}: ${errorMessage(error)}`);
    res.status(500).json({ error: label, message: errorMessage(error) });
  };

  /**
   * POST /query
   * Answer a question from the knowledge base
   */
  router.post('/query', async (req, res) => {
    try {
      const request = parseQueryRequest(req.body);
      logger.info(`Processing question: "${request.question.substring(0, 50)}" (top_k=${request.top_k ?? 'default'})`);

      const result = await chatbot.query(request.question, request.top_k);

      const response: QueryResponse = {
        answer: result.answer,
        context: result.context.map(toContextItemDto),
        question: result.question,
      };
      res.json(response);
    } catch (error) {
      sendError(res, error, 'Failed to process query');
    }
  });

  /**
   * GET /health
   * Readiness of the chatbot service
   */
  router.get('/health', (_req, res) => {
    const ready = chatbot.isReady();
    const response: HealthResponse = {
      status: ready ? 'healthy' : 'initializing',
      chatbot_ready: ready,
      version,
    };
    res.json(response);
  });

  /**
   * GET /stats
   * Collection and model statistics
   */
  router.get('/stats', async (_req, res) => {
    try {
      res.json(await chatbot.getStats());
    } catch (error) {
      sendError(res, error, 'Failed to get stats');
    }
  });

  /**
   * GET /config
   * Current tunable settings
   */
  router.get('/config', (_req, res) => {
    res.json(chatbot.getSettings());
  });

  return router;
}
