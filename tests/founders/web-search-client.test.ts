import { describe, it, expect, vi } from 'vitest';
import { searchSerpApi, isSearchConfigured } from '@founder-finder/agents';

const document = { organic_results: [{ title: 'About', snippet: 'Founded by Jane Doe' }] };

describe('searchSerpApi', () => {
  it('returns the raw JSON body and sends the Google engine query', async () => {
    const body = JSON.stringify(document);
    const fetchImpl = vi.fn().mockResolvedValue(new Response(body, { status: 200 }));

    const result = await searchSerpApi('  Acme (https://acme.com) founders ', {
      apiKey: 'test-key',
      fetchImpl,
    });

    expect(result).toEqual({ ok: true, value: body });
    const url = new URL(String(fetchImpl.mock.calls[0]?.[0]));
    expect(url.origin + url.pathname).toBe('https://serpapi.com/search');
    expect(url.searchParams.get('engine')).toBe('google');
    expect(url.searchParams.get('q')).toBe('Acme (https://acme.com) founders');
    expect(url.searchParams.get('api_key')).toBe('test-key');
    expect(url.searchParams.get('num')).toBe('10');
  });

  it('fails without an API key and does not call the network', async () => {
    const fetchImpl = vi.fn();
    const result = await searchSerpApi('q', { apiKey: '  ', fetchImpl });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('SourceUnavailable');
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('maps HTTP errors to SourceUnavailable', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('rate limited', { status: 429 }));
    const result = await searchSerpApi('q', { apiKey: 'test-key', fetchImpl });
    expect(result).toEqual({
      ok: false,
      error: { kind: 'SourceUnavailable', message: 'Search failed: 429 - rate limited' },
    });
  });

  it('returns 200 bodies that carry an error field for the extractor to judge', async () => {
    const body = JSON.stringify({
      search_metadata: { status: 'Success' },
      error: "Google hasn't returned any results for this query.",
    });
    const fetchImpl = vi.fn().mockResolvedValue(new Response(body, { status: 200 }));
    const result = await searchSerpApi('q', { apiKey: 'test-key', fetchImpl });
    expect(result).toEqual({ ok: true, value: body });
  });

  it('maps transport errors to SourceUnavailable', async () => {
    const fetchImpl = vi.fn().mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));
    const result = await searchSerpApi('q', { apiKey: 'test-key', fetchImpl });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('SourceUnavailable');
      expect(result.error.message).toBe('Search request failed: getaddrinfo ENOTFOUND');
    }
  });

  it('passes non-JSON bodies through for the extractor to reject', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('<html>', { status: 200 }));
    expect(await searchSerpApi('q', { apiKey: 'test-key', fetchImpl })).toEqual({
      ok: true,
      value: '<html>',
    });
  });
});

describe('isSearchConfigured', () => {
  it('requires a non-blank key', () => {
    expect(isSearchConfigured('test-key')).toBe(true);
    expect(isSearchConfigured(' ')).toBe(false);
  });
});
