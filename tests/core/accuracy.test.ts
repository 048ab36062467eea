import { describe, it, expect } from 'vitest';
import { evaluateAccuracy, summarizeAccuracy } from '@founder-finder/core';

describe('evaluateAccuracy', () => {
  it('flags a partial match as not all correct but with no incorrect names', () => {
    const [record] = evaluateAccuracy({ A: ['X'] }, { A: ['X', 'Y'] });
    expect(record).toEqual({
      company: 'A',
      allCorrect: false,
      atLeastOneCorrect: true,
      noIncorrect: true,
      found: ['X'],
      expected: ['X', 'Y'],
    });
  });

  it('treats a company missing from the found map as an empty set', () => {
    const [record] = evaluateAccuracy({}, { B: ['X'] });
    expect(record?.allCorrect).toBe(false);
    expect(record?.atLeastOneCorrect).toBe(false);
    expect(record?.noIncorrect).toBe(true);
    expect(record?.found).toEqual([]);
  });

  it('flags extra names as incorrect while still all correct', () => {
    const [record] = evaluateAccuracy({ C: ['X', 'Z'] }, { C: ['X'] });
    expect(record?.allCorrect).toBe(true);
    expect(record?.atLeastOneCorrect).toBe(true);
    expect(record?.noIncorrect).toBe(false);
  });

  it('counts an empty expected set as all correct only when nothing was found', () => {
    const [empty, extra] = evaluateAccuracy({ F: ['X'] }, { E: [], F: [] });
    expect(empty?.allCorrect).toBe(true);
    expect(empty?.atLeastOneCorrect).toBe(false);
    expect(empty?.noIncorrect).toBe(true);
    expect(extra?.allCorrect).toBe(true);
    expect(extra?.noIncorrect).toBe(false);
  });

  it('compares names exactly, without case folding', () => {
    const [record] = evaluateAccuracy({ D: ['jane doe'] }, { D: ['Jane Doe'] });
    expect(record?.atLeastOneCorrect).toBe(false);
    expect(record?.noIncorrect).toBe(false);
  });

  it('trims names before comparing', () => {
    const [record] = evaluateAccuracy({ D: [' Jane Doe '] }, { D: ['Jane Doe  '] });
    expect(record?.allCorrect).toBe(true);
    expect(record?.noIncorrect).toBe(true);
  });

  it('iterates ground truth only, in its order', () => {
    const records = evaluateAccuracy(
      { Extra: ['Q'], Second: ['S'], First: ['F'] },
      { First: ['F'], Second: ['S'] },
    );
    expect(records.map((r) => r.company)).toEqual(['First', 'Second']);
  });

  it('ignores inherited object keys when looking up found founders', () => {
    const [record] = evaluateAccuracy({}, { toString: ['X'] });
    expect(record?.found).toEqual([]);
    expect(record?.noIncorrect).toBe(true);
  });

  it('treats duplicate names as one', () => {
    const [record] = evaluateAccuracy({ G: ['X', 'X'] }, { G: ['X', 'X'] });
    expect(record?.allCorrect).toBe(true);
    expect(record?.expected).toEqual(['X']);
    expect(record?.found).toEqual(['X', 'X']);
  });
});

describe('summarizeAccuracy', () => {
  it('computes percentages of each flag', () => {
    const records = evaluateAccuracy(
      { A: ['X'], C: ['X', 'Z'], D: ['W'] },
      { A: ['X', 'Y'], B: ['X'], C: ['X'], D: ['W'] },
    );
    expect(summarizeAccuracy(records)).toEqual({
      total: 4,
      allCorrectPct: 50,
      atLeastOneCorrectPct: 75,
      noIncorrectPct: 75,
    });
  });

  it('returns zeros for no records', () => {
    expect(summarizeAccuracy([])).toEqual({
      total: 0,
      allCorrectPct: 0,
      atLeastOneCorrectPct: 0,
      noIncorrectPct: 0,
    });
  });
});
