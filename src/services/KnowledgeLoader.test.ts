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

import { afterAll, beforeAll, describe, expect, it } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from '../errors';
import { createMockLogger } from '../testing/mockLogger';
import { createTestConfig } from '../testing/testConfig';
import { KnowledgeLoader, stripCitations } from './KnowledgeLoader';

describe('stripCitations', () => {
  it('removes citation markers and tidies spacing', () => {
    expect(stripCitations('Pay early [cite: 1, 2-4]. It is allowed [cite:7] ,too.')).toBe(
      'Pay early. It is allowed,too.',
    );
  });

  it('leaves text without markers untouched', () => {
    expect(stripCitations('No markers here.')).toBe('No markers here.');
  });
});

describe('KnowledgeLoader', () => {
  let dir: string;

  const writeJson = (name: string, content: unknown): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, JSON.stringify(content));
    return file;
  };

  const loaderFor = (paths: string[], strip = false) =>
    new KnowledgeLoader({
      logger: createMockLogger(),
      config: createTestConfig({ data: { paths, stripCitations: strip } }),
    });

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'knowledge-loader-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads items and records the file name as their source', async () => {
    const file = writeJson('faq.json', [
      { instruction: 'What is saving?', output: 'Keeping money aside.', channel_username: 'example_channel', video_id: 'vid001' },
      { instruction: 'Why budget?', output: 'To plan spending.', input: '', source: 'handbook' },
    ]);

    const items = await loaderFor([file]).load();

    expect(items).toEqual([
      {
        instruction: 'What is saving?',
        output: 'Keeping money aside.',
        source: 'faq.json',
        channelUsername: 'example_channel',
        videoId: 'vid001',
      },
      { instruction: 'Why budget?', output: 'To plan spending.', source: 'handbook' },
    ]);
  });

  it('merges files in order and keeps the first of each instruction', async () => {
    const first = writeJson('first.json', [
      { instruction: 'Same question', output: 'first answer' },
      { instruction: '   ', output: 'dropped' },
    ]);
    const second = writeJson('second.json', [
      { instruction: '  same QUESTION ', output: 'second answer' },
      { instruction: 'Other question', output: 'other answer' },
    ]);

    const items = await loaderFor([first, second]).load();

    expect(items.map(item => [item.output, item.source])).toEqual([
      ['first answer', 'first.json'],
      ['other answer', 'second.json'],
    ]);
  });

  it('strips citations from answers when enabled', async () => {
    const file = writeJson('cited.json', [{ instruction: 'When?', output: 'Once a year [cite: 3].' }]);

    const [item] = await loaderFor([file], true).load();

    expect(item.output).toBe('Once a year.');
  });

  it('fails on a missing file', async () => {
    await expect(loaderFor([path.join(dir, 'missing.json')]).load()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('fails on invalid JSON', async () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '[{"instruction": ');

    await expect(loaderFor([file]).load()).rejects.toThrow(`Data file ${file} is not valid JSON`);
  });

  it('fails when the file is not an array of items', async () => {
    const file = writeJson('object.json', { instruction: 'q', output: 'a' });

    await expect(loaderFor([file]).load()).rejects.toThrow(ConfigurationError);
  });
});
