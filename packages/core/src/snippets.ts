/**
 * Snippet extraction from a raw search document (SerpAPI shape: `organic_results[].snippet`).
 */

import { searchResultItemSchema } from '@founder-finder/schemas';
import { describeError, fail, ok, pipelineError, type Result } from './errors.js';

export const RESULTS_FIELD = 'organic_results';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Join every non-empty `snippet` of the organic results with `\n`, in document order.
 * An empty string means the results carried no snippets; that is not an error.
 */
export function extractSnippets(document: unknown): Result<string> {
  if (!isRecord(document)) {
    return fail(pipelineError('MalformedDocument', 'Search document is not a JSON object'));
  }

  const results = document[RESULTS_FIELD];
  if (!Array.isArray(results) || results.length === 0) {
    return fail(pipelineError('MissingResults', `'${RESULTS_FIELD}' key not found or is empty`));
  }

  const snippets: string[] = [];
  for (const item of results) {
    const parsed = searchResultItemSchema.safeParse(item);
    if (!parsed.success) continue;
    const snippet = parsed.data.snippet;
    if (snippet) snippets.push(snippet);
  }

  return ok(snippets.join('\n'));
}

/** Same as {@link extractSnippets}, starting from the raw JSON text. */
export function extractSnippetsFromJson(raw: string): Result<string> {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    return fail(
      pipelineError('MalformedDocument', `Invalid JSON: ${describeError(error)}`, error),
    );
  }
  return extractSnippets(document);
}
