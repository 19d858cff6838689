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
 * Conversion between knowledge items and persisted point payloads
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { KnowledgeItem } from '../models';

/**
 * Payload layout stored alongside each vector
 */
export const knowledgePayloadSchema = z.object({
  instruction: z.string(),
  output: z.string(),
  source: z.string().optional(),
  input: z.string().optional(),
  channel_username: z.string().optional(),
  video_id: z.string().optional(),
});

export type KnowledgePayload = z.infer<typeof knowledgePayloadSchema>;

export const DEFAULT_SOURCE = 'data.json';

export function toPayload(item: KnowledgeItem): KnowledgePayload {
  const payload: KnowledgePayload = {
    instruction: item.instruction,
    output: item.output,
  };
  if (item.channelUsername) {
    payload.channel_username = item.channelUsername;
  }
  if (item.videoId) {
    payload.video_id = item.videoId;
  }
  if (item.input) {
    payload.input = item.input;
  }
  payload.source = item.source;
  return payload;
}

/**
 * Parse a payload read back from the index.
 * Returns null when required fields are missing.
 */
export function fromPayload(payload: unknown): KnowledgeItem | null {
  const parsed = knowledgePayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  const data = parsed.data;
  const item: KnowledgeItem = {
    instruction: data.instruction,
    output: data.output,
    source: data.source ?? DEFAULT_SOURCE,
  };
  if (data.input) {
    item.input = data.input;
  }
  if (data.channel_username) {
    item.channelUsername = data.channel_username;
  }
  if (data.video_id) {
    item.videoId = data.video_id;
  }
  return item;
}
