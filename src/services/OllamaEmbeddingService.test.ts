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
 * Unit tests for OllamaEmbeddingService
 * Tests request batching and response validation with a mocked fetch
 */

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { UpstreamError } from '../errors';
import { createMockLogger } from '../testing/mockLogger';
import { createTestConfig } from '../testing/testConfig';
import { OllamaEmbeddingService } from './OllamaEmbeddingService';

type FetchInit = { body: string };

const mockFetch = jest.fn<(url: string, init: FetchInit) => Promise<unknown>>();

jest.mock('node-fetch', () => ({
  __esModule: true,
  default: (url: string, init: FetchInit) => mockFetch(url, init),
}));

const okResponse = (embeddings: number[][]) => ({
  ok: true,
  status: 200,
  json: async () => ({ model: 'test-embed', embeddings }),
  text: async () => '',
});

/** Answers each request with one 3-d vector per input, derived from its length */
const echoEmbeddings = async (_url: string, init: FetchInit) => {
  const body: { input: string[] } = JSON.parse(init.body);
  return okResponse(body.input.map(text => [text.length, 0, 1]));
};

describe('OllamaEmbeddingService', () => {
  let service: OllamaEmbeddingService;

  beforeEach(() => {
    jest.clearAllMocks();
    mockFetch.mockImplementation(echoEmbeddings);
    service = new OllamaEmbeddingService({ logger: createMockLogger(), config: createTestConfig() });
  });

  it('posts to /api/embed with the model and inputs', async () => {
    await service.embedOne('hello');

    expect(mockFetch).toHaveBeenCalledWith('http://embeddings.test/api/embed', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: 'test-embed', input: ['hello'] }),
      timeout: 30000,
    });
  });

  it('splits inputs into batches and keeps their order', async () => {
    const vectors = await service.embed(['a', 'bb', 'ccc', 'dddd', 'eeeee']);

    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(vectors.map(vector => vector[0])).toEqual([1, 2, 3, 4, 5]);
  });

  it('measures the dimension once from a probe embedding', async () => {
    await expect(service.dimension()).resolves.toBe(3);
    await expect(service.dimension()).resolves.toBe(3);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('reports HTTP failures as UpstreamError', async () => {
    mockFetch.mockResolvedValue({ ok: false, status: 404, text: async () => 'model not found', json: async () => ({}) });

    const failure = service.embedOne('hello');
    await expect(failure).rejects.toBeInstanceOf(UpstreamError);
    await expect(failure).rejects.toThrow('Embedding generation failed: Ollama API error (404): model not found');
  });

  it('rejects a response with the wrong number of vectors', async () => {
    mockFetch.mockResolvedValue(okResponse([[1, 2, 3]]));

    await expect(service.embed(['a', 'b'])).rejects.toThrow(
      'Embedding generation failed: Invalid embeddings response format from Ollama',
    );
  });

  it('rejects a malformed response body', async () => {
    mockFetch.mockResolvedValue({ ok: true, status: 200, json: async () => ({ embedding: [1] }), text: async () => '' });

    await expect(service.embedOne('a')).rejects.toThrow('Invalid embeddings response format from Ollama');
  });
});
