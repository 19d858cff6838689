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

import { ConfigReader } from '@backstage/config';
import { JsonObject } from '@backstage/types';
import { ConfigService } from '../services/ConfigService';

/**
 * Config service for tests: Qdrant settings and an OpenAI key, with
 * any section replaced by `overrides`.
 */
export function createTestConfig(overrides: JsonObject = {}): ConfigService {
  return new ConfigService(
    new ConfigReader({
      llm: { provider: 'openai', openai: { apiKey: 'test-secret', model: 'test-model' } },
      embedding: { model: 'test-embed', baseUrl: 'http://embeddings.test/', batchSize: 2 },
      vectorStore: {
        type: 'qdrant',
        uploadBatchSize: 2,
        qdrant: { url: 'http://qdrant.test:6333', apiKey: 'test-secret' },
      },
      ...overrides,
    }),
  );
}
