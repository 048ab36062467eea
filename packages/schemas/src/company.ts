import { z } from 'zod';

export const companyEntrySchema = z.object({
  name: z.string().trim().min(1),
  referenceUrl: z.string().trim().min(1),
});

export type CompanyEntry = z.infer<typeof companyEntrySchema>;
