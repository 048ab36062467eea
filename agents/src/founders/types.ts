/**
 * Types for the founder research agent and the boundaries it talks to.
 */

import { z } from 'zod';
import {
  companyStageEnum,
  founderListSchema,
  pipelineErrorKindEnum,
  skipReasonEnum,
} from '@founder-finder/schemas';
import type { Result } from '@founder-finder/core';

export const PipelineErrorSchema = z.object({
  kind: pipelineErrorKindEnum,
  message: z.string(),
  cause: z.unknown().optional(),
});

export const CompanyOutcomeSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('recorded'),
    company: z.string(),
    founders: founderListSchema.min(1),
  }),
  z.object({
    status: z.literal('skipped'),
    company: z.string(),
    reason: skipReasonEnum,
    error: PipelineErrorSchema.optional(),
  }),
  z.object({
    status: z.literal('failed'),
    company: z.string(),
    failedAt: companyStageEnum.extract(['pending', 'searched', 'extracted']),
    error: PipelineErrorSchema,
  }),
]);

export type CompanyOutcome = z.infer<typeof CompanyOutcomeSchema>;

/** Free-text web search; resolves to the raw response body (JSON text). */
export interface SearchPort {
  search(query: string): Promise<Result<string>>;
}

/** Prompt in, model text out. Rejects on transport or model errors. */
export interface InferencePort {
  infer(prompt: string): Promise<string>;
}

/** Where raw search documents are kept for inspection; paths are relative to the output root. */
export interface ArtifactStore {
  writeText(relativePath: string, content: string): Promise<Result<string>>;
}

export interface FounderResearchDeps {
  search: SearchPort;
  inference: InferencePort;
  artifacts: ArtifactStore;
}
