/**
 * One full find-founders run: read the company list, research every company,
 * write founders.json, then evaluate against ground truth when it is available.
 */

import path from 'path';
import {
  evaluateAccuracy,
  parseCompanyList,
  renderAccuracyReport,
  renderMismatches,
  summarizeAccuracy,
} from '@founder-finder/core';
import type { AccuracyRecord, FounderMap } from '@founder-finder/schemas';
import {
  agentLog,
  createOllamaInference,
  createSerpApiSearch,
  runFounderPipeline,
  type CompanyOutcome,
  type InferencePort,
  type SearchPort,
} from '@founder-finder/agents';
import { OllamaClient } from '@founder-finder/llm';
import type { FounderConfig } from './founders-config.js';
import {
  ACCURACY_FILE,
  FOUNDERS_FILE,
  createDiskArtifactStore,
  loadGroundTruth,
  readTextFile,
  writeJsonFile,
} from './founder-disk.js';

const RUN = 'FindFounders';

export interface FindFoundersOverrides {
  search?: SearchPort;
  inference?: InferencePort;
  /** Skips the Ollama availability probe (tests, or when inference is overridden). */
  skipModelCheck?: boolean;
  print?: (text: string) => void;
}

export interface FindFoundersResult {
  exitCode: number;
  founders?: FounderMap;
  outcomes?: CompanyOutcome[];
  accuracy?: AccuracyRecord[];
}

export async function runFindFounders(
  config: FounderConfig,
  overrides: FindFoundersOverrides = {},
): Promise<FindFoundersResult> {
  const print = overrides.print ?? ((text: string) => console.log(text));

  const list = await readTextFile(config.companiesFile);
  if (!list.ok) {
    agentLog(RUN, list.error.message, { level: 'error' });
    return { exitCode: 1 };
  }

  const { entries, errors } = parseCompanyList(list.value);
  for (const error of errors) {
    agentLog(RUN, `Skipping malformed line. ${error.message}`, { level: 'warn' });
  }
  agentLog(RUN, `Loaded ${entries.length} companies from ${config.companiesFile}`);

  const search =
    overrides.search ??
    createSerpApiSearch({ apiKey: config.serpApiKey, timeoutMs: config.searchTimeoutMs });

  let inference = overrides.inference;
  if (!inference) {
    if (!overrides.skipModelCheck) {
      const available = await new OllamaClient(config.ollamaBaseUrl).isAvailable(config.model);
      if (!available) {
        agentLog(RUN, `Ollama model ${config.model} not reachable at ${config.ollamaBaseUrl}`, {
          level: 'warn',
        });
      }
    }
    inference = createOllamaInference({ baseUrl: config.ollamaBaseUrl, model: config.model });
  }

  const { founders, outcomes } = await runFounderPipeline(entries, {
    search,
    inference,
    artifacts: createDiskArtifactStore(config.outputDir),
  });

  const written = await writeJsonFile(path.join(config.outputDir, FOUNDERS_FILE), founders);
  if (written.ok) {
    agentLog(RUN, `Wrote ${Object.keys(founders).length} companies to ${written.value}`, {
      level: 'success',
    });
  } else {
    agentLog(RUN, written.error.message, { level: 'error' });
  }

  const truth = await loadGroundTruth(config.groundTruthFile);
  if (!truth.ok) {
    agentLog(RUN, `Accuracy check skipped: ${truth.error.message}`, { level: 'debug' });
    return { exitCode: 0, founders, outcomes };
  }

  const accuracy = evaluateAccuracy(founders, truth.value);
  print(renderAccuracyReport(accuracy));
  const mismatches = renderMismatches(accuracy);
  if (mismatches) print(`\n${mismatches}`);

  const accuracyWritten = await writeJsonFile(path.join(config.outputDir, ACCURACY_FILE), {
    summary: summarizeAccuracy(accuracy),
    records: accuracy,
  });
  if (!accuracyWritten.ok) {
    agentLog(RUN, accuracyWritten.error.message, { level: 'error' });
  }

  return { exitCode: 0, founders, outcomes, accuracy };
}
