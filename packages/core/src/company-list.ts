/**
 * Company list parsing: one `Company Name (https://reference.url)` per line.
 */

import type { CompanyEntry } from '@founder-finder/schemas';
import { pipelineError, type PipelineError } from './errors.js';

export type ParsedLine =
  | { kind: 'entry'; entry: CompanyEntry }
  | { kind: 'blank' }
  | { kind: 'malformed'; error: PipelineError };

export interface CompanyListParseResult {
  entries: CompanyEntry[];
  errors: PipelineError[];
}

/**
 * Parse a single line. The name is everything before the last `(`,
 * the URL everything between it and the closing `)`.
 */
export function parseCompanyLine(line: string): ParsedLine {
  const trimmed = line.trim();
  if (!trimmed) return { kind: 'blank' };

  const open = trimmed.lastIndexOf('(');
  if (open < 0 || !trimmed.endsWith(')')) {
    return {
      kind: 'malformed',
      error: pipelineError('MalformedLine', `Expected "Name (URL)", got: ${trimmed}`),
    };
  }

  const name = trimmed.slice(0, open).trim();
  const referenceUrl = trimmed.slice(open + 1, -1).trim();
  if (!name || !referenceUrl) {
    return {
      kind: 'malformed',
      error: pipelineError('MalformedLine', `Missing company name or URL: ${trimmed}`),
    };
  }

  return { kind: 'entry', entry: { name, referenceUrl } };
}

/**
 * Parse a whole company list file. Blank lines are skipped silently; malformed lines
 * are collected (with their 1-based line number) and parsing continues.
 */
export function parseCompanyList(content: string): CompanyListParseResult {
  const entries: CompanyEntry[] = [];
  const errors: PipelineError[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    const parsed = parseCompanyLine(line);
    if (parsed.kind === 'entry') {
      entries.push(parsed.entry);
    } else if (parsed.kind === 'malformed') {
      errors.push({ ...parsed.error, message: `Line ${index + 1}: ${parsed.error.message}` });
    }
  });

  return { entries, errors };
}
