import type { FounderMap } from '@founder-finder/schemas';

/**
 * Accumulates founder lists per company. Insertion order is kept; re-recording
 * a company overwrites its list in place.
 */
export class ResultStore {
  private readonly founders = new Map<string, string[]>();

  record(company: string, founders: string[]): void {
    this.founders.set(company, [...founders]);
  }

  has(company: string): boolean {
    return this.founders.has(company);
  }

  get size(): number {
    return this.founders.size;
  }

  snapshot(): FounderMap {
    return Object.fromEntries(
      [...this.founders].map(([company, list]) => [company, [...list]]),
    );
  }
}
