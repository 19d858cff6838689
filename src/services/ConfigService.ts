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
 * Configuration service implementation
 * Manages chatbot configuration with type-safe access
 *
 * @packageDocumentation
 */

import { Config, ConfigReader } from '@backstage/config';
import { JsonObject } from '@backstage/types';
import { ConfigurationError, errorMessage } from '../errors';
import { IConfigService } from '../interfaces';
import { ChatbotConfig, PostgresConfig, VectorStoreConfig, VectorStoreType } from '../models';

const VECTOR_STORE_TYPES: readonly VectorStoreType[] = ['qdrant', 'postgresql'];

/**
 * Configuration service that wraps a Backstage Config reader.
 * The resolved settings are computed once and frozen.
 */
export class ConfigService implements IConfigService {
  private readonly config: Config;
  private readonly cachedConfig: ChatbotConfig;

  constructor(config: Config) {
    this.config = config;
    try {
      this.cachedConfig = deepFreeze(this.loadConfig());
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new ConfigurationError(`Invalid configuration: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Build the service from environment variables
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): ConfigService {
    return new ConfigService(new ConfigReader(readEnv(env), 'env'));
  }

  /**
   * Load and validate configuration
   */
  private loadConfig(): ChatbotConfig {
    const c = this.config;
    return {
      app: {
        name: c.getOptionalString('app.name') ?? 'RAG Chatbot API',
        version: c.getOptionalString('app.version') ?? '1.0.0',
        host: c.getOptionalString('app.host') ?? '0.0.0.0',
        port: c.getOptionalNumber('app.port') ?? 7860,
        corsOrigins: c.getOptionalStringArray('app.corsOrigins') ?? ['*'],
        logLevel: c.getOptionalString('app.logLevel') ?? 'info',
      },
      llm: {
        provider: (c.getOptionalString('llm.provider') ?? 'openai').toLowerCase(),
        maxTokens: c.getOptionalNumber('llm.maxTokens') ?? 1000,
        temperature: c.getOptionalNumber('llm.temperature') ?? 0.7,
        timeoutMs: c.getOptionalNumber('llm.timeoutMs') ?? 60000,
        openai: {
          apiKey: c.getOptionalString('llm.openai.apiKey'),
          model: c.getOptionalString('llm.openai.model') ?? 'gpt-3.5-turbo',
          baseUrl: c.getOptionalString('llm.openai.baseUrl'),
        },
        huggingface: {
          apiKey: c.getOptionalString('llm.huggingface.apiKey'),
          model: c.getOptionalString('llm.huggingface.model') ?? 'mistralai/Mistral-7B-Instruct-v0.2',
          baseUrl: c.getOptionalString('llm.huggingface.baseUrl') ?? 'https://router.huggingface.co/v1',
        },
      },
      retrieval: {
        topK: c.getOptionalNumber('retrieval.topK') ?? 10,
        similarityThreshold: c.getOptionalNumber('retrieval.similarityThreshold') ?? 0.3,
      },
      embedding: {
        model: c.getOptionalString('embedding.model') ?? 'all-minilm',
        baseUrl: c.getOptionalString('embedding.baseUrl') ?? 'http://localhost:11434',
        batchSize: c.getOptionalNumber('embedding.batchSize') ?? 64,
        timeoutMs: c.getOptionalNumber('embedding.timeoutMs') ?? 30000,
      },
      vectorStore: this.loadVectorStoreConfig(),
      data: {
        paths: c.getOptionalStringArray('data.paths') ?? ['data/data.json'],
        stripCitations: c.getOptionalBoolean('data.stripCitations') ?? false,
      },
    };
  }

  /**
   * Load vector store configuration
   */
  private loadVectorStoreConfig(): VectorStoreConfig {
    const type = this.config.getOptionalString('vectorStore.type') ?? 'qdrant';
    if (!isVectorStoreType(type)) {
      throw new ConfigurationError(
        `Unknown vector store type: ${type}. Use one of: ${VECTOR_STORE_TYPES.join(', ')}`,
      );
    }

    return {
      type,
      collectionName: this.config.getOptionalString('vectorStore.collectionName') ?? 'instructions',
      uploadBatchSize: this.config.getOptionalNumber('vectorStore.uploadBatchSize') ?? 100,
      qdrant: {
        url: this.config.getOptionalString('vectorStore.qdrant.url'),
        apiKey: this.config.getOptionalString('vectorStore.qdrant.apiKey'),
        timeoutMs: this.config.getOptionalNumber('vectorStore.qdrant.timeoutMs') ?? 30000,
      },
      postgresql: this.loadPostgresConfig(),
    };
  }

  /**
   * Load PostgreSQL configuration. The password is checked when the
   * postgresql store is selected, see VectorStoreFactory.validate.
   */
  private loadPostgresConfig(): PostgresConfig {
    const c = this.config;
    return {
      host: c.getOptionalString('vectorStore.postgresql.host') ?? 'localhost',
      port: c.getOptionalNumber('vectorStore.postgresql.port') ?? 5432,
      database: c.getOptionalString('vectorStore.postgresql.database') ?? 'chatbot_vectors',
      user: c.getOptionalString('vectorStore.postgresql.user') ?? 'chatbot',
      password: c.getOptionalString('vectorStore.postgresql.password') ?? '',
      ssl: c.getOptionalBoolean('vectorStore.postgresql.ssl') ?? false,
      maxConnections: c.getOptionalNumber('vectorStore.postgresql.maxConnections') ?? 10,
      idleTimeoutMillis: c.getOptionalNumber('vectorStore.postgresql.idleTimeoutMillis') ?? 30000,
      connectionTimeoutMillis: c.getOptionalNumber('vectorStore.postgresql.connectionTimeoutMillis') ?? 5000,
    };
  }

  getConfig(): ChatbotConfig {
    return this.cachedConfig;
  }
}

function isVectorStoreType(value: string): value is VectorStoreType {
  return VECTOR_STORE_TYPES.some(type => type === value);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Map environment variables onto the config tree.
 * Unset variables are left out so the defaults above apply.
 */
export function readEnv(env: NodeJS.ProcessEnv): JsonObject {
  const str = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const num = (name: string): number | undefined => {
    const raw = str(name);
    if (raw === undefined) {
      return undefined;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`${name} must be a number, got '${raw}'`);
    }
    return value;
  };

  const bool = (name: string): boolean | undefined => {
    const raw = str(name)?.toLowerCase();
    if (raw === undefined) {
      return undefined;
    }
    if (['true', '1', 'yes'].includes(raw)) {
      return true;
    }
    if (['false', '0', 'no'].includes(raw)) {
      return false;
    }
    throw new ConfigurationError(`${name} must be a boolean, got '${raw}'`);
  };

  const list = (name: string): string[] | undefined => {
    const values = str(name)
      ?.split(',')
      .map(part => part.trim())
      .filter(part => part.length > 0);
    return values && values.length > 0 ? values : undefined;
  };

  return prune({
    app: {
      name: str('APP_NAME'),
      version: str('APP_VERSION'),
      host: str('HOST'),
      port: num('PORT'),
      corsOrigins: list('CORS_ORIGINS'),
      logLevel: str('LOG_LEVEL'),
    },
    llm: {
      provider: str('LLM_PROVIDER'),
      maxTokens: num('MAX_TOKENS'),
      temperature: num('TEMPERATURE'),
      timeoutMs: num('LLM_TIMEOUT_MS'),
      openai: {
        apiKey: str('OPENAI_API_KEY'),
        model: str('OPENAI_MODEL'),
        baseUrl: str('OPENAI_BASE_URL'),
      },
      huggingface: {
        apiKey: str('HUGGINGFACE_API_KEY'),
        model: str('HUGGINGFACE_MODEL'),
        baseUrl: str('HUGGINGFACE_BASE_URL'),
      },
    },
    retrieval: {
      topK: num('TOP_K'),
      similarityThreshold: num('SIMILARITY_THRESHOLD'),
    },
    embedding: {
      model: str('EMBEDDING_MODEL'),
      baseUrl: str('EMBEDDING_BASE_URL'),
      batchSize: num('EMBEDDING_BATCH_SIZE'),
      timeoutMs: num('EMBEDDING_TIMEOUT_MS'),
    },
    vectorStore: {
      type: str('VECTOR_STORE')?.toLowerCase(),
      collectionName: str('COLLECTION_NAME'),
      uploadBatchSize: num('UPLOAD_BATCH_SIZE'),
      qdrant: {
        url: str('QDRANT_URL'),
        apiKey: str('QDRANT_API_KEY'),
        timeoutMs: num('QDRANT_TIMEOUT_MS'),
      },
      postgresql: {
        host: str('POSTGRES_HOST'),
        port: num('POSTGRES_PORT'),
        database: str('POSTGRES_DB'),
        user: str('POSTGRES_USER'),
        password: str('POSTGRES_PASSWORD'),
        ssl: bool('POSTGRES_SSL'),
      },
    },
    data: {
      paths: list('DATA_PATH'),
      stripCitations: bool('STRIP_CITATIONS'),
    },
  });
}

type EnvTree = { [key: string]: EnvTree | string | number | boolean | string[] | undefined };

/**
 * Drop undefined leaves and the objects left empty by them
 */
function prune(tree: EnvTree): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(tree)) {
    if (value === undefined) {
      continue;
    }
    if (typeof value === 'object' && !Array.isArray(value)) {
      const child = prune(value);
      if (Object.keys(child).length > 0) {
        result[key] = child;
      }
      continue;
    }
    result[key] = value;
  }
  return result;
}
