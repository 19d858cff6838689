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
 * Base class for providers that speak the OpenAI chat-completions protocol
 *
 * @packageDocumentation
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { Logger } from 'winston';
import { ConfigurationError, UpstreamError, errorMessage } from '../../errors';
import { ILLMProvider } from '../../interfaces';
import { LLMProviderName, ProviderCredentials } from '../../models';

export interface ProviderOptions {
  logger: Logger;
  credentials: ProviderCredentials;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

/**
 * Shared generation logic. Subclasses fix the provider tag, the label used
 * in error messages and the endpoint.
 */
export abstract class OpenAICompatibleProvider implements ILLMProvider {
  abstract readonly name: LLMProviderName;

  /** Human readable provider name */
  protected abstract readonly label: string;

  /** Environment variable that holds the key */
  protected abstract readonly apiKeyVariable: string;

  readonly model: string;

  protected readonly logger: Logger;
  private readonly client: OpenAI | null;
  private readonly maxTokens: number;
  private readonly temperature: number;

  protected constructor(options: ProviderOptions, defaultBaseUrl?: string) {
    this.logger = options.logger;
    this.model = options.credentials.model;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;

    const { apiKey } = options.credentials;
    this.client = apiKey
      ? new OpenAI({
          apiKey,
          baseURL: options.credentials.baseUrl ?? defaultBaseUrl,
          timeout: options.timeoutMs,
          maxRetries: 0,
        })
      : null;
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async generate(prompt: string, systemPrompt?: string): Promise<string> {
    if (!this.client) {
      throw new ConfigurationError(
        `${this.label} provider not configured. Set ${this.apiKeyVariable}.`,
      );
    }

    const messages: ChatCompletionMessageParam[] = [];
    if (systemPrompt) {
      messages.push({ role: 'system', content: systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    this.logger.debug(`Generating completion with ${this.label} model: ${this.model}`);

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      });

      const choice = response.choices[0];
      if (!choice) {
        throw new Error('No choices returned');
      }
      return choice.message.content ?? '';
    } catch (error) {
      this.logger.error(`${this.label} completion failed: ${errorMessage(error)}`);
      throw new UpstreamError(`${this.label} API error: ${errorMessage(error)}`, error);
    }
  }
}
