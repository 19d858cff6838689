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

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { QdrantClient } from '@qdrant/js-client-rest';
import { ConfigurationError } from '../errors';
import { QdrantConfig } from '../models';
import { createMockLogger } from '../testing/mockLogger';
import { QdrantVectorStore } from './QdrantVectorStore';

type ClientCall = (...args: unknown[]) => Promise<unknown>;

const mockQdrant = {
  getCollections: jest.fn<ClientCall>(),
  createCollection: jest.fn<ClientCall>(async () => true),
  upsert: jest.fn<ClientCall>(async () => ({ status: 'completed' })),
  search: jest.fn<ClientCall>(async () => []),
  getCollection: jest.fn<ClientCall>(),
};

jest.mock('@qdrant/js-client-rest', () => ({
  QdrantClient: jest.fn(() => mockQdrant),
}));

const config: QdrantConfig = { url: 'http://qdrant.test:6333', apiKey: 'test-secret', timeoutMs: 1000 };

describe('QdrantVectorStore', () => {
  let store: QdrantVectorStore;

  beforeEach(async () => {
    jest.clearAllMocks();
    store = new QdrantVectorStore(createMockLogger(), config, 'instructions');
    await store.initialize();
  });

  it('connects with the configured url, key and timeout', () => {
    expect(QdrantClient).toHaveBeenCalledWith({ url: 'http://qdrant.test:6333', apiKey: 'test-secret', timeout: 1000 });
  });

  it('requires both url and key', async () => {
    const unconfigured = new QdrantVectorStore(createMockLogger(), { timeoutMs: 1000 }, 'instructions');
    await expect(unconfigured.initialize()).rejects.toThrow(
      new ConfigurationError('QDRANT_URL and QDRANT_API_KEY must be set in environment variables'),
    );
  });

  it('finds the collection by name', async () => {
    mockQdrant.getCollections.mockResolvedValue({ collections: [{ name: 'other' }, { name: 'instructions' }] });
    await expect(store.collectionExists()).resolves.toBe(true);

    mockQdrant.getCollections.mockResolvedValue({ collections: [{ name: 'other' }] });
    await expect(store.collectionExists()).resolves.toBe(false);
  });

  it('creates a cosine collection of the given size', async () => {
    await store.createCollection(384);
    expect(mockQdrant.createCollection).toHaveBeenCalledWith('instructions', {
      vectors: { size: 384, distance: 'Cosine' },
    });
  });

  it('upserts points with snake_case payloads', async () => {
    await store.upsert([
      {
        id: 4,
        vector: [0.5, 0.5],
        item: { instruction: 'q', output: 'a', source: 'data.json', channelUsername: 'example_channel', videoId: 'vid001' },
      },
    ]);

    expect(mockQdrant.upsert).toHaveBeenCalledWith('instructions', {
      wait: true,
      points: [
        {
          id: 4,
          vector: [0.5, 0.5],
          payload: {
            instruction: 'q',
            output: 'a',
            source: 'data.json',
            channel_username: 'example_channel',
            video_id: 'vid001',
          },
        },
      ],
    });
  });

  it('skips the request for an empty batch', async () => {
    await store.upsert([]);
    expect(mockQdrant.upsert).not.toHaveBeenCalled();
  });

  it('maps hits and drops malformed payloads', async () => {
    mockQdrant.search.mockResolvedValue([
      { id: 1, score: 0.9, payload: { instruction: 'q1', output: 'a1' } },
      { id: 2, score: 0.8, payload: { output: 'no instruction' } },
      { id: 3, score: 0.7, payload: { instruction: 'q3', output: 'a3', source: 'extra.json', input: 'ctx' } },
    ]);

    const results = await store.search([0.1, 0.2], 3);

    expect(mockQdrant.search).toHaveBeenCalledWith('instructions', { vector: [0.1, 0.2], limit: 3, with_payload: true });
    expect(results).toEqual([
      { item: { instruction: 'q1', output: 'a1', source: 'data.json' }, score: 0.9 },
      { item: { instruction: 'q3', output: 'a3', source: 'extra.json', input: 'ctx' }, score: 0.7 },
    ]);
  });

  it('counts points in the collection', async () => {
    mockQdrant.getCollection.mockResolvedValue({ points_count: 12 });
    await expect(store.count()).resolves.toBe(12);

    mockQdrant.getCollection.mockResolvedValue({ points_count: null });
    await expect(store.count()).resolves.toBe(0);
  });

  it('refuses calls after close', async () => {
    await store.close();
    await expect(store.count()).rejects.toThrow('QdrantVectorStore not initialized. Call initialize() first.');
  });
});
