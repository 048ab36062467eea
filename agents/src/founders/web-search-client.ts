/**
 * SerpAPI search client. Returns the raw JSON body so it can be stored verbatim;
 * snippet extraction happens downstream.
 */

import { describeError, fail, ok, pipelineError, type Result } from '@founder-finder/core';
import { searchDocumentSchema } from '@founder-finder/schemas';
import { agentLog } from '../shared/agent-logs.js';
import type { SearchPort } from './types.js';

const SEARCH = 'SerpApiSearch';

const SERPAPI_BASE = 'https://serpapi.com/search';
const DEFAULT_NUM = 10;
const REQUEST_TIMEOUT_MS = 15_000;

export interface SerpApiOptions {
  apiKey?: string;
  num?: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Run a single Google search via SerpAPI.
 * Missing key, non-2xx status, transport errors and timeouts are `SourceUnavailable`.
 * A 200 body is returned as is, even when it carries an `error` field.
 */
export async function searchSerpApi(
  query: string,
  options?: SerpApiOptions,
): Promise<Result<string>> {
  const apiKey = options?.apiKey ?? process.env.SERPAPI_KEY;
  if (!apiKey || !apiKey.trim()) {
    return fail(pipelineError('SourceUnavailable', 'SERPAPI_KEY is not set'));
  }

  const params = new URLSearchParams({
    engine: 'google',
    q: query.trim(),
    api_key: apiKey.trim(),
    num: String(options?.num ?? DEFAULT_NUM),
  });

  const doFetch = options?.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options?.timeoutMs ?? REQUEST_TIMEOUT_MS);

  try {
    const res = await doFetch(`${SERPAPI_BASE}?${params.toString()}`, {
      method: 'GET',
      signal: controller.signal,
      headers: { Accept: 'application/json' },
    });
    const body = await res.text();
    if (!res.ok) {
      return fail(
        pipelineError('SourceUnavailable', `Search failed: ${res.status} - ${body.slice(0, 200)}`),
      );
    }

    const apiError = readApiError(body);
    if (apiError) {
      agentLog(SEARCH, `Search API note for "${query.trim()}": ${apiError}`, { level: 'warn' });
    }
    return ok(body);
  } catch (error) {
    const message =
      error instanceof Error && error.name === 'AbortError' ? 'timeout' : describeError(error);
    return fail(pipelineError('SourceUnavailable', `Search request failed: ${message}`, error));
  } finally {
    clearTimeout(timeout);
  }
}

/** SerpAPI answers 200 with `{ "error": "..." }` when Google returns nothing; the body still goes downstream. */
function readApiError(body: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  const doc = searchDocumentSchema.safeParse(parsed);
  return doc.success ? doc.data.error : undefined;
}

export function createSerpApiSearch(options?: SerpApiOptions): SearchPort {
  return { search: (query) => searchSerpApi(query, options) };
}

/**
 * Check if the search API is configured.
 */
export function isSearchConfigured(apiKey: string | undefined = process.env.SERPAPI_KEY): boolean {
  return typeof apiKey === 'string' && apiKey.trim().length > 0;
}
