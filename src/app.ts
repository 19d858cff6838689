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
 * Express application assembly
 *
 * @packageDocumentation
 */

import cors from 'cors';
import express, { Express, NextFunction, Request, Response } from 'express';
import type { Logger } from 'winston';
import { IChatbotService } from './interfaces';
import { createChatbotRouter } from './router';

export interface AppEnvironment {
  logger: Logger;
  chatbot: IChatbotService;
  version: string;
  corsOrigins: string[];
}

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

export function createApp(env: AppEnvironment): Express {
  const { logger } = env;
  const app = express();

  app.disable('x-powered-by');
  app.use(
    cors({
      origin: env.corsOrigins.includes('*') ? '*' : env.corsOrigins,
      credentials: false,
    }),
  );

  app.use((req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      logger.http(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
    });
    next();
  });

  app.use(createChatbotRouter({ logger, chatbot: env.chatbot, version: env.version }));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found', message: `No route for ${req.method} ${req.path}` });
  });

  // Express recognises error handlers by their four parameters
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isBodyParseError(error)) {
      res.status(400).json({ error: 'Invalid request', message: 'Request body is not valid JSON' });
      return;
    }
    logger.error(`Unhandled request error: ${error instanceof Error ? error.message : String(error)}`);
    res.status(500).json({ error: 'Internal server error', message: 'Unexpected error' });
  });

  return app;
}
