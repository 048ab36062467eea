import { z } from 'zod';

export const pipelineErrorKindEnum = z.enum([
  'MalformedLine',
  'SourceUnavailable',
  'MalformedDocument',
  'MissingResults',
  'EmptyInference',
]);
export type PipelineErrorKind = z.infer<typeof pipelineErrorKindEnum>;

/** Per-company pipeline stage. `failed` and `skipped` leave the company out of the founder map. */
export const companyStageEnum = z.enum([
  'pending',
  'searched',
  'extracted',
  'inferred',
  'recorded',
  'skipped',
  'failed',
]);
export type CompanyStage = z.infer<typeof companyStageEnum>;

export const skipReasonEnum = z.enum(['no-evidence', 'empty-inference']);
export type SkipReason = z.infer<typeof skipReasonEnum>;
