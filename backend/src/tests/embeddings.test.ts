import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../azure/openaiClient.js', () => ({
  createEmbeddings: vi.fn()
}));

const openaiClient = await import('../azure/openaiClient.js');
const { clearEmbeddingCache, embedText } = await import('../utils/embeddings.js');

const createEmbeddings = vi.mocked(openaiClient.createEmbeddings);

function embeddingResponse(embedding: number[]) {
  return {
    object: 'list' as const,
    data: [{ object: 'embedding' as const, embedding, index: 0 }],
    model: 'text-embedding-3-large',
    usage: { prompt_tokens: 3, total_tokens: 3 }
  };
}

describe('embedText', () => {
  beforeEach(() => {
    clearEmbeddingCache();
    createEmbeddings.mockReset();
  });

  it('caches vectors by trimmed text', async () => {
    createEmbeddings.mockResolvedValueOnce(embeddingResponse([0.1, 0.2]));

    const first = await embedText('vnet peering');
    const second = await embedText('  vnet peering  ');

    expect(first).toEqual([0.1, 0.2]);
    expect(second).toBe(first);
    expect(createEmbeddings).toHaveBeenCalledTimes(1);
  });

  it('fails when the response carries no vector', async () => {
    createEmbeddings.mockResolvedValueOnce(embeddingResponse([]));

    await expect(embedText('empty')).rejects.toThrow('Embedding response did not contain a vector');
    expect(createEmbeddings).toHaveBeenCalledTimes(1);
  });
});
