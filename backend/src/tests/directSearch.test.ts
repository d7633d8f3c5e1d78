import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../azure/searchHttp.js', () => ({
  performSearchRequest: vi.fn()
}));

vi.mock('../utils/embeddings.js', () => ({
  embedText: vi.fn()
}));

const searchHttp = await import('../azure/searchHttp.js');
const embeddings = await import('../utils/embeddings.js');
const { searchTechnicalDocs, formatContextBlock, CONTEXT_SEPARATOR } = await import('../azure/directSearch.js');

const performSearchRequest = vi.mocked(searchHttp.performSearchRequest);
const embedText = vi.mocked(embeddings.embedText);

function searchResponse(body: unknown) {
  return {
    response: new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } }),
    durationMs: 5,
    correlationId: 'test-correlation'
  };
}

describe('searchTechnicalDocs', () => {
  beforeEach(() => {
    performSearchRequest.mockReset();
    embedText.mockReset();
    embedText.mockResolvedValue([0.1, 0.2, 0.3]);
  });

  it('sends one hybrid query and shapes the tool output', async () => {
    performSearchRequest.mockResolvedValueOnce(
      searchResponse({
        value: [
          {
            '@search.score': 1.2,
            title: 'VNet overview',
            content: 'A virtual network is ...',
            source: 'networking/vnet-overview.pdf',
            page_number: 3,
            url: 'https://docs.example.com/vnet'
          },
          { title: 'Peering', content: 'Peering connects ...', source: 'vnet-peering.pdf', page_number: null }
        ]
      })
    );

    const output = await searchTechnicalDocs('  How do I configure a VNet?  ');

    expect(embedText).toHaveBeenCalledWith('How do I configure a VNet?', { signal: undefined });
    const [operation, url, options] = performSearchRequest.mock.calls[0];
    expect(operation).toBe('docs.search');
    expect(url).toBe(
      "https://example-search.search.windows.net/indexes('azure-technical-docs')/docs/search?api-version=2024-07-01"
    );
    expect(options?.method).toBe('POST');
    expect(options?.body).toEqual({
      search: 'How do I configure a VNet?',
      top: 5,
      select: 'title,content,source,page_number,url',
      vectorQueries: [{ kind: 'vector', vector: [0.1, 0.2, 0.3], fields: 'content_vector', k: 5 }]
    });

    expect(output).toEqual({
      content: [
        'SOURCE: VNet overview\nMETADATA: File networking/vnet-overview.pdf, Page 3\nCONTENT: A virtual network is ...',
        'SOURCE: Peering\nMETADATA: File vnet-peering.pdf, Page N/A\nCONTENT: Peering connects ...'
      ].join(CONTEXT_SEPARATOR),
      documents: [
        {
          title: 'VNet overview',
          source: 'networking/vnet-overview.pdf',
          page: 3,
          url: 'https://docs.example.com/vnet'
        },
        { title: 'Peering', source: 'vnet-peering.pdf' }
      ]
    });
  });

  it('returns empty output when nothing matches', async () => {
    performSearchRequest.mockResolvedValueOnce(searchResponse({ value: [] }));

    await expect(searchTechnicalDocs('obscure question')).resolves.toEqual({ content: '', documents: [] });
  });

  it('rejects an empty query before calling Azure', async () => {
    await expect(searchTechnicalDocs('   ')).rejects.toThrow('Search query must not be empty');
    expect(embedText).not.toHaveBeenCalled();
    expect(performSearchRequest).not.toHaveBeenCalled();
  });

  it('propagates search failures to the caller', async () => {
    performSearchRequest.mockRejectedValueOnce(new Error('docs.search failed: 503 Service Unavailable'));

    await expect(searchTechnicalDocs('vnet')).rejects.toThrow('docs.search failed: 503 Service Unavailable');
  });
});

describe('formatContextBlock', () => {
  it('labels documents without metadata', () => {
    expect(formatContextBlock({ content: 'text' })).toBe('SOURCE: Untitled\nMETADATA: File unknown, Page N/A\nCONTENT: text');
  });
});
