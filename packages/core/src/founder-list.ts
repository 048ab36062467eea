/**
 * Parse the model's comma-separated answer into founder names.
 * Anything that is not a string yields an empty list.
 */
export function parseFounderList(answer: unknown): string[] {
  if (typeof answer !== 'string') return [];
  return answer
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}
