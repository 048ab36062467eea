/**
 * Plain-text accuracy report for the console.
 */

import type { AccuracyRecord } from '@founder-finder/schemas';
import { summarizeAccuracy } from './accuracy.js';

export const NO_DATA_MESSAGE = 'No accuracy data to report.';

const HEADERS = ['Company', 'All Correct', '≥1 Correct', 'No Incorrect'] as const;

function yesNo(value: boolean): string {
  return value ? 'Yes' : 'No';
}

function row(cells: string[], widths: number[]): string {
  return cells.map((cell, i) => cell.padEnd(widths[i] ?? cell.length)).join(' | ').trimEnd();
}

/**
 * Fixed-width table (company column sized to the longest name) followed by totals.
 *
 * ```
 * Company   | All Correct | ≥1 Correct | No Incorrect
 * ----------+-------------+------------+-------------
 * Acme Corp | Yes         | Yes        | Yes
 *
 * Total companies: 1
 * All founders correct: 100.0%
 * ...
 * ```
 */
export function renderAccuracyReport(records: AccuracyRecord[]): string {
  if (records.length === 0) return NO_DATA_MESSAGE;

  const companyWidth = Math.max(HEADERS[0].length, ...records.map((r) => r.company.length));
  const widths = [companyWidth, HEADERS[1].length, HEADERS[2].length, HEADERS[3].length];

  const lines = [
    row([...HEADERS], widths),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
    ...records.map((r) =>
      row([r.company, yesNo(r.allCorrect), yesNo(r.atLeastOneCorrect), yesNo(r.noIncorrect)], widths),
    ),
  ];

  const summary = summarizeAccuracy(records);
  lines.push(
    '',
    `Total companies: ${summary.total}`,
    `All founders correct: ${summary.allCorrectPct.toFixed(1)}%`,
    `At least one founder correct: ${summary.atLeastOneCorrectPct.toFixed(1)}%`,
    `No incorrect founders: ${summary.noIncorrectPct.toFixed(1)}%`,
  );

  return lines.join('\n');
}

function listOrNone(names: string[]): string {
  return names.length > 0 ? names.join(', ') : '(none)';
}

/** Missing and unexpected names for every company that is not an exact match. */
export function renderMismatches(records: AccuracyRecord[]): string {
  const lines: string[] = [];
  for (const r of records) {
    if (r.allCorrect && r.noIncorrect) continue;
    const found = new Set(r.found);
    const expected = new Set(r.expected);
    const missing = r.expected.filter((name) => !found.has(name));
    const unexpected = [...found].filter((name) => !expected.has(name));
    lines.push(`- ${r.company} | missing: ${listOrNone(missing)} | unexpected: ${listOrNone(unexpected)}`);
  }
  return lines.length > 0 ? ['Mismatches:', ...lines].join('\n') : '';
}
