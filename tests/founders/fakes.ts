import { vi, type Mock } from 'vitest';
import { fail, ok, pipelineError, type Result } from '@founder-finder/core';
import type { ArtifactStore, InferencePort, SearchPort } from '@founder-finder/agents';

export function serpDocument(...snippets: Array<string | undefined>): string {
  return JSON.stringify({
    organic_results: snippets.map((snippet, i) =>
      snippet === undefined ? { position: i + 1 } : { position: i + 1, snippet },
    ),
  });
}

/** Search fake keyed by company name (the text before " ("); unknown companies fail. */
export function fakeSearch(bodies: Record<string, string>): SearchPort & {
  search: Mock<(query: string) => Promise<Result<string>>>;
} {
  return {
    search: vi.fn(async (query: string) => {
      const company = query.slice(0, query.lastIndexOf(' ('));
      const body = Object.prototype.hasOwnProperty.call(bodies, company) ? bodies[company] : undefined;
      return body === undefined
        ? fail<string>(pipelineError('SourceUnavailable', `Search failed: 500 - ${company}`))
        : ok(body);
    }),
  };
}

export function fakeInference(answer: string | Error): InferencePort & {
  infer: Mock<(prompt: string) => Promise<string>>;
} {
  return {
    infer: vi.fn(async (_prompt: string) => {
      if (answer instanceof Error) throw answer;
      return answer;
    }),
  };
}

export class MemoryArtifactStore implements ArtifactStore {
  readonly files = new Map<string, string>();

  async writeText(relativePath: string, content: string) {
    this.files.set(relativePath, content);
    return ok(relativePath);
  }
}
