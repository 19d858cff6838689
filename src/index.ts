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
 * Server entry point
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import type { Server } from 'http';
import type { Logger } from 'winston';
import { createApp } from './app';
import { ConfigurationError, errorMessage } from './errors';
import { createRootLogger } from './logger';
import {
  ChatbotService,
  ConfigService,
  KnowledgeLoader,
  LLMProviderFactory,
  OllamaEmbeddingService,
  VectorStoreFactory,
} from './services';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

async function main(): Promise<void> {
  const configService = ConfigService.fromEnv();
  const config = configService.getConfig();
  const logger = createRootLogger({
    level: config.app.logLevel,
    production: process.env.NODE_ENV === 'production',
  });

  const deps = { logger, config: configService };
  const llmProvider = LLMProviderFactory.create(configService, logger);
  const chatbot = new ChatbotService({
    ...deps,
    llmProvider,
    embeddingService: new OllamaEmbeddingService(deps),
    knowledgeLoader: new KnowledgeLoader(deps),
    createVectorStore: () => VectorStoreFactory.create(configService, logger),
  });

  const app = createApp({
    logger,
    chatbot,
    version: config.app.version,
    corsOrigins: config.app.corsOrigins,
  });

  const server = app.listen(config.app.port, config.app.host, () => {
    logger.info(`${config.app.name} v${config.app.version} listening on ${config.app.host}:${config.app.port}`);
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down`);
    try {
      await closeServer(server);
      await chatbot.close();
      process.exit(0);
    } catch (error) {
      logger.error(`Shutdown failed: ${errorMessage(error)}`);
      process.exit(1);
    }
  };
  process.once('SIGINT', signal => void shutdown(signal));
  process.once('SIGTERM', signal => void shutdown(signal));

  try {
    await chatbot.initialize();
  } catch (error) {
    await exitOnInitFailure(logger, server, error);
  }
}

async function exitOnInitFailure(logger: Logger, server: Server, error: unknown): Promise<void> {
  logger.error(`Failed to initialize chatbot: ${errorMessage(error)}`);
  try {
    await closeServer(server);
  } catch (closeError) {
    logger.warn(`Failed to close server: ${errorMessage(closeError)}`);
  }
  process.exit(1);
}

main().catch(error => {
  const prefix = error instanceof ConfigurationError ? 'Configuration error' : 'Startup failed';
  process.stderr.write(`${prefix}: ${errorMessage(error)}\n`);
  process.exit(1);
});
