/**
 * Founder prompt and the Ollama-backed inference boundary.
 */

import {
  complete,
  createPromptTemplate,
  executeTemplate,
  OllamaClient,
  type CompleteOptions,
} from '@founder-finder/llm';
import type { CompanyEntry } from '@founder-finder/schemas';
import type { InferencePort } from './types.js';

export const FOUNDERS_PROMPT = createPromptTemplate(
  "Write a comma-separated list of the founders of {company} ({url}). Only include the first and last names of the founders, with particles like 'Van' or 'De' but without suffixes like Ph.D. and without additional context: {snippets}",
);

export function buildFoundersPrompt(entry: CompanyEntry, snippets: string): string {
  return executeTemplate(FOUNDERS_PROMPT, {
    company: entry.name,
    url: entry.referenceUrl,
    snippets,
  });
}

export interface OllamaInferenceOptions {
  baseUrl?: string;
  model?: string;
  timeout?: number;
}

export function createOllamaInference(options?: OllamaInferenceOptions): InferencePort {
  const completeOptions: CompleteOptions = {
    client: new OllamaClient(options?.baseUrl),
    model: options?.model,
    timeout: options?.timeout,
  };
  return { infer: (prompt) => complete(prompt, 'FOUNDERS', completeOptions) };
}
