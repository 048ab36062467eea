/**
 * Run configuration for find-founders: CLI flags override env, env overrides defaults.
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';

export const founderConfigSchema = z.object({
  companiesFile: z.string().min(1).default('companies.txt'),
  outputDir: z.string().min(1).default('.'),
  groundTruthFile: z.string().min(1).default('correct_founders.json'),
  serpApiKey: z.string().trim().min(1).optional(),
  searchTimeoutMs: z.coerce.number().int().positive().default(15_000),
  ollamaBaseUrl: z.string().url().default('http://localhost:11434'),
  model: z.string().min(1).default('gemma3:4b'),
});

export type FounderConfig = z.infer<typeof founderConfigSchema>;

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

export function loadFounderConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2),
): FounderConfig {
  const { values } = parseArgs({
    args: argv,
    options: {
      companies: { type: 'string' },
      out: { type: 'string' },
      truth: { type: 'string' },
      model: { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  });

  return founderConfigSchema.parse({
    companiesFile: nonEmpty(values.companies) ?? nonEmpty(env.FOUNDERS_COMPANIES_FILE),
    outputDir: nonEmpty(values.out) ?? nonEmpty(env.FOUNDERS_OUTPUT_DIR),
    groundTruthFile: nonEmpty(values.truth) ?? nonEmpty(env.FOUNDERS_GROUND_TRUTH_FILE),
    serpApiKey: nonEmpty(env.SERPAPI_KEY),
    searchTimeoutMs: nonEmpty(env.SERPAPI_TIMEOUT_MS),
    ollamaBaseUrl: nonEmpty(env.OLLAMA_BASE_URL),
    model: nonEmpty(values.model) ?? nonEmpty(env.OLLAMA_MODEL_FOUNDERS),
  });
}
