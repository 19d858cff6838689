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
 * Error taxonomy for the chatbot backend
 *
 * @packageDocumentation
 */

/**
 * Base class; `name` follows the subclass and the cause is kept as
 * `error.cause` without touching the message.
 */
export class ChatbotError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid settings. Fatal at startup.
 */
export class ConfigurationError extends ChatbotError {}

/**
 * The service has not finished initializing.
 */
export class NotReadyError extends ChatbotError {
  constructor(message = 'Chatbot not initialized', cause?: unknown) {
    super(message, cause);
  }
}

/**
 * A call to the vector index, the embedding model or the LLM API failed.
 */
export class UpstreamError extends ChatbotError {}

/**
 * A request body failed validation.
 */
export class ValidationError extends ChatbotError {}

/**
 * Renders an unknown thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
