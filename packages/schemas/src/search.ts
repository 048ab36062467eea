import { z } from 'zod';

/**
 * One organic result item. Only `snippet` is read; other fields (position, title, link, ...)
 * are kept as they come, whatever their type.
 */
export const searchResultItemSchema = z
  .object({
    snippet: z.string().optional(),
  })
  .passthrough();
export type SearchResultItem = z.infer<typeof searchResultItemSchema>;

export const searchDocumentSchema = z
  .object({
    organic_results: z.array(z.unknown()).optional(),
    error: z.string().optional(),
  })
  .passthrough();
export type SearchDocument = z.infer<typeof searchDocumentSchema>;
