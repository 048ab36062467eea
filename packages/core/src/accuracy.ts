/**
 * Set-based accuracy of found founders against ground truth.
 * Names are compared exactly (case-sensitive) after trimming.
 */

import type {
  AccuracyRecord,
  AccuracySummary,
  FounderMap,
  GroundTruthMap,
} from '@founder-finder/schemas';

function isSubset(a: Set<string>, b: Set<string>): boolean {
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
}

function foundFor(founders: FounderMap, company: string): string[] {
  if (!Object.prototype.hasOwnProperty.call(founders, company)) return [];
  return (founders[company] ?? []).map((name) => name.trim());
}

/**
 * One record per ground-truth company, in ground-truth order. A company missing from
 * `founders` is evaluated with an empty found set, so `noIncorrect` is true for it.
 */
export function evaluateAccuracy(
  founders: FounderMap,
  groundTruth: GroundTruthMap,
): AccuracyRecord[] {
  return Object.entries(groundTruth).map(([company, expectedNames]) => {
    const foundList = foundFor(founders, company);
    const found = new Set(foundList);
    const expected = new Set(expectedNames.map((name) => name.trim()));

    let overlap = 0;
    for (const name of expected) {
      if (found.has(name)) overlap++;
    }

    return {
      company,
      allCorrect: isSubset(expected, found),
      atLeastOneCorrect: overlap > 0,
      noIncorrect: isSubset(found, expected),
      found: foundList,
      expected: [...expected],
    };
  });
}

function percent(count: number, total: number): number {
  return total === 0 ? 0 : (count / total) * 100;
}

export function summarizeAccuracy(records: AccuracyRecord[]): AccuracySummary {
  const total = records.length;
  return {
    total,
    allCorrectPct: percent(records.filter((r) => r.allCorrect).length, total),
    atLeastOneCorrectPct: percent(records.filter((r) => r.atLeastOneCorrect).length, total),
    noIncorrectPct: percent(records.filter((r) => r.noIncorrect).length, total),
  };
}
