import { z } from 'zod';

const MAX_FILTER_LENGTH = 256;

/**
 * Schema for POST /api/v1/consumers (add a split).
 * The filter may be omitted: a new split starts blank until a keyword is set.
 */
export const createConsumerSchema = z.object({
  filter: z.string().max(MAX_FILTER_LENGTH).optional().default(''),
});

export type CreateConsumerInput = z.infer<typeof createConsumerSchema>;

/** Schema for PATCH /api/v1/consumers/:id. An empty string is a valid filter. */
export const updateFilterSchema = z.object({
  filter: z.string().max(MAX_FILTER_LENGTH),
});

export type UpdateFilterInput = z.infer<typeof updateFilterSchema>;
