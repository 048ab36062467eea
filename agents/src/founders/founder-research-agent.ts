/**
 * Founder Research Agent — one company through search, snippet extraction and
 * founder inference. Every per-company failure comes back as an outcome value.
 *
 * pending → searched → extracted → skipped | inferred → recorded
 * (failed is reachable from pending, searched and extracted)
 */

import { companyEntrySchema, type CompanyEntry } from '@founder-finder/schemas';
import {
  describeError,
  extractSnippetsFromJson,
  parseFounderList,
  pipelineError,
  searchArtifactPath,
} from '@founder-finder/core';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig } from '../shared/types.js';
import { buildFoundersPrompt } from './founder-inference.js';
import {
  CompanyOutcomeSchema,
  type CompanyOutcome,
  type FounderResearchDeps,
} from './types.js';

export function buildSearchQuery(entry: CompanyEntry): string {
  return `${entry.name} (${entry.referenceUrl}) founders`;
}

export class FounderResearchAgent extends BaseAgent<CompanyEntry, CompanyOutcome> {
  config: AgentConfig = {
    name: 'FounderResearch',
    description: 'Names the founders of one company from web search snippets',
    version: '1.0.0',
  };

  inputSchema = companyEntrySchema;
  outputSchema = CompanyOutcomeSchema;

  constructor(private readonly deps: FounderResearchDeps) {
    super();
  }

  protected async run(entry: CompanyEntry): Promise<CompanyOutcome> {
    const company = entry.name;

    const searched = await this.deps.search.search(buildSearchQuery(entry));
    if (!searched.ok) {
      this.error(`Search failed for ${company}: ${searched.error.message}`);
      return { status: 'failed', company, failedAt: 'pending', error: searched.error };
    }
    const raw = searched.value;

    const artifactPath = searchArtifactPath(company);
    const stored = await this.deps.artifacts.writeText(artifactPath, raw);
    if (!stored.ok) {
      this.warn(`Could not save search results for ${company}: ${stored.error.message}`);
    } else {
      this.debug(`Saved search results to ${stored.value}`);
    }

    const extracted = extractSnippetsFromJson(raw);
    if (!extracted.ok) {
      this.warn(`No usable search results for ${company}: ${extracted.error.message}`);
      return { status: 'skipped', company, reason: 'no-evidence', error: extracted.error };
    }

    const snippets = extracted.value;
    if (!snippets) {
      this.info(`No snippets for ${company}; skipping inference`);
      return { status: 'skipped', company, reason: 'no-evidence' };
    }

    let answer: string;
    try {
      answer = await this.deps.inference.infer(buildFoundersPrompt(entry, snippets));
    } catch (err) {
      const error = pipelineError(
        'SourceUnavailable',
        `Inference failed: ${describeError(err)}`,
        err,
      );
      this.error(`Inference failed for ${company}: ${describeError(err)}`);
      return { status: 'failed', company, failedAt: 'extracted', error };
    }

    const founders = parseFounderList(answer);
    if (founders.length === 0) {
      const error = pipelineError('EmptyInference', `No founder names in answer: ${answer.slice(0, 200)}`);
      this.warn(`No founders inferred for ${company}`);
      return { status: 'skipped', company, reason: 'empty-inference', error };
    }

    this.info(`${company}: ${founders.join(', ')}`);
    return { status: 'recorded', company, founders };
  }
}
