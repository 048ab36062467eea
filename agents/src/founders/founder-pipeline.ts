/**
 * Runs the founder research agent over a company list, one company at a time,
 * and collects recorded founders. A failing company never stops the batch.
 */

import { pipelineError, ResultStore } from '@founder-finder/core';
import type { CompanyEntry, FounderMap } from '@founder-finder/schemas';
import { agentLog } from '../shared/agent-logs.js';
import { FounderResearchAgent } from './founder-research-agent.js';
import type { CompanyOutcome, FounderResearchDeps } from './types.js';

const PIPELINE = 'FounderPipeline';

export interface FounderPipelineResult {
  founders: FounderMap;
  outcomes: CompanyOutcome[];
}

export interface FounderPipelineOptions {
  runId?: string;
  onOutcome?: (outcome: CompanyOutcome, index: number, total: number) => void;
}

export async function runFounderPipeline(
  entries: CompanyEntry[],
  deps: FounderResearchDeps,
  options?: FounderPipelineOptions,
): Promise<FounderPipelineResult> {
  const agent = new FounderResearchAgent(deps);
  const store = new ResultStore();
  const outcomes: CompanyOutcome[] = [];

  for (const [index, entry] of entries.entries()) {
    agentLog(PIPELINE, `(${index + 1}/${entries.length}) ${entry.name}`);

    const result = await agent.execute(entry, { runId: options?.runId });
    const outcome: CompanyOutcome =
      result.success && result.data
        ? result.data
        : {
            status: 'failed',
            company: entry.name,
            failedAt: 'pending',
            error: pipelineError('SourceUnavailable', result.error ?? 'Unknown agent failure'),
          };

    if (outcome.status === 'recorded') {
      store.record(outcome.company, outcome.founders);
    }
    outcomes.push(outcome);
    options?.onOutcome?.(outcome, index, entries.length);
  }

  const failed = outcomes.filter((o) => o.status === 'failed').length;
  const skipped = outcomes.filter((o) => o.status === 'skipped').length;
  agentLog(
    PIPELINE,
    `Done: ${store.size} recorded, ${skipped} skipped, ${failed} failed`,
    { level: failed > 0 ? 'warn' : 'success' },
  );

  return { founders: store.snapshot(), outcomes };
}
