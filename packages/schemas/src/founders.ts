import { z } from 'zod';

export const founderListSchema = z.array(z.string().trim().min(1));
export type FounderList = z.infer<typeof founderListSchema>;

/** Company name -> founders. Companies without a usable answer are absent, never `[]`. */
export const founderMapSchema = z.record(z.string(), founderListSchema);
export type FounderMap = z.infer<typeof founderMapSchema>;

/** Company name -> expected founders, as authored in correct_founders.json. */
export const groundTruthMapSchema = z.record(z.string(), z.array(z.string().trim()));
export type GroundTruthMap = z.infer<typeof groundTruthMapSchema>;
