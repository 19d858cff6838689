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

import { OpenAICompatibleProvider, ProviderOptions } from './OpenAICompatibleProvider';

export const HUGGINGFACE_ROUTER_URL = 'https://router.huggingface.co/v1';

/**
 * Hugging Face provider, reached through the router's OpenAI-compatible API
 */
export class HuggingFaceProvider extends OpenAICompatibleProvider {
  readonly name = 'huggingface';
  protected readonly label = 'Hugging Face';
  protected readonly apiKeyVariable = 'HUGGINGFACE_API_KEY';

  constructor(options: ProviderOptions) {
    super(options, HUGGINGFACE_ROUTER_URL);
  }
}
