import { z } from 'zod';

export const accuracyRecordSchema = z.object({
  company: z.string(),
  allCorrect: z.boolean(),
  atLeastOneCorrect: z.boolean(),
  noIncorrect: z.boolean(),
  found: z.array(z.string()),
  expected: z.array(z.string()),
});
export type AccuracyRecord = z.infer<typeof accuracyRecordSchema>;

export const accuracySummarySchema = z.object({
  total: z.number().int().min(0),
  allCorrectPct: z.number().min(0).max(100),
  atLeastOneCorrectPct: z.number().min(0).max(100),
  noIncorrectPct: z.number().min(0).max(100),
});
export type AccuracySummary = z.infer<typeof accuracySummarySchema>;
