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
 * Loads knowledge items from JSON data files
 *
 * @packageDocumentation
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { Logger } from 'winston';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors';
import { IKnowledgeLoader, ServiceDependencies } from '../interfaces';
import { KnowledgeItem } from '../models';

const optionalText = z
  .string()
  .nullish()
  .transform(value => (value ? value : undefined));

const rawItemSchema = z.object({
  instruction: z.string().default(''),
  output: z.string().default(''),
  input: optionalText,
  channel_username: optionalText,
  video_id: optionalText,
  source: optionalText,
});

const dataFileSchema = z.array(rawItemSchema);

const CITATION_PATTERN = /\[cite:\s*[\d,\s-]+\]/g;

/**
 * Remove `[cite: 1, 2-4]` markers and tidy the whitespace left behind
 */
export function stripCitations(text: string): string {
  return text
    .replace(CITATION_PATTERN, '')
    .replace(/\s+/g, ' ')
    .replace(/\s+([.,;:!?])/g, '$1')
    .trim();
}

/**
 * Reads every configured data file in order and merges them.
 * Items are de-duplicated on their trimmed, lower-cased instruction; the
 * first occurrence wins and items with an empty instruction are dropped.
 */
export class KnowledgeLoader implements IKnowledgeLoader {
  private readonly logger: Logger;
  private readonly paths: readonly string[];
  private readonly cleanCitations: boolean;

  constructor(dependencies: ServiceDependencies) {
    const { data } = dependencies.config.getConfig();
    this.logger = dependencies.logger;
    this.paths = data.paths;
    this.cleanCitations = data.stripCitations;
  }

  async load(): Promise<KnowledgeItem[]> {
    const seen = new Set<string>();
    const merged: KnowledgeItem[] = [];
    let duplicates = 0;

    for (const filePath of this.paths) {
      const items = await this.readFile(filePath);
      for (const item of items) {
        const key = item.instruction.trim().toLowerCase();
        if (!key) {
          continue;
        }
        if (seen.has(key)) {
          duplicates++;
          continue;
        }
        seen.add(key);
        merged.push(item);
      }
    }

    this.logger.info(
      `Loaded ${merged.length} knowledge items from ${this.paths.length} file(s)` +
        (duplicates > 0 ? `, ${duplicates} duplicates removed` : ''),
    );
    return merged;
  }

  private async readFile(filePath: string): Promise<KnowledgeItem[]> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read data file ${filePath}: ${errorMessage(error)}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(`Data file ${filePath} is not valid JSON: ${errorMessage(error)}`, error);
    }

    const parsed = dataFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `Data file ${filePath} has an invalid item at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'unknown error'}`,
      );
    }

    const fileSource = path.basename(filePath);
    return parsed.data.map(entry => {
      const item: KnowledgeItem = {
        instruction: entry.instruction,
        output: this.cleanCitations ? stripCitations(entry.output) : entry.output,
        source: entry.source ?? fileSource,
      };
      if (entry.input) {
        item.input = entry.input;
      }
      if (entry.channel_username) {
        item.channelUsername = entry.channel_username;
      }
      if (entry.video_id) {
        item.videoId = entry.video_id;
      }
      return item;
    });
  }
}
