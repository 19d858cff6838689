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
 * Factory for creating LLM provider implementations
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ConfigurationError } from '../../errors';
import { IConfigService, ILLMProvider } from '../../interfaces';
import { HuggingFaceProvider } from './HuggingFaceProvider';
import { OpenAIProvider } from './OpenAIProvider';

/**
 * Resolves the active provider from `llm.provider`.
 *
 * Usage:
 * ```typescript
 * const provider = LLMProviderFactory.create(configService, logger);
 * ```
 */
export class LLMProviderFactory {
  /**
   * @throws ConfigurationError for an unrecognized provider name
   */
  static create(config: IConfigService, logger: Logger): ILLMProvider {
    const { llm } = config.getConfig();
    const providerName = llm.provider.toLowerCase();
    const shared = {
      logger,
      maxTokens: llm.maxTokens,
      temperature: llm.temperature,
      timeoutMs: llm.timeoutMs,
    };

    switch (providerName) {
      case 'openai':
        logger.info(`Using OpenAI provider with model: ${llm.openai.model}`);
        return new OpenAIProvider({ ...shared, credentials: llm.openai });
      case 'huggingface':
        logger.info(`Using Hugging Face provider with model: ${llm.huggingface.model}`);
        return new HuggingFaceProvider({ ...shared, credentials: llm.huggingface });
      default:
        throw new ConfigurationError(
          `Unknown LLM provider: ${llm.provider}. Use 'openai' or 'huggingface'.`,
        );
    }
  }
}
