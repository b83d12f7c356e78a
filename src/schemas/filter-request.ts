/**
 * Filter Request Schema
 *
 * Request-level validation that sits in front of the date range validator:
 * date syntax, the both-or-neither rule and the region code length.
 *
 * @module schemas/filter-request
 */

import { z } from 'zod';

// ============================================
// Filter Request Schema
// ============================================

const CalendarDateStringSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

/**
 * A comment date filter request.
 * Either both dates are given or neither is.
 */
export const FilterRequestSchema = z
  .object({
    startDate: CalendarDateStringSchema.optional(),
    endDate: CalendarDateStringSchema.optional(),
    region: z
      .string()
      .trim()
      .min(2, 'Region code must be 2-5 characters')
      .max(5, 'Region code must be 2-5 characters'),
  })
  .refine((data) => (data.startDate === undefined) === (data.endDate === undefined), {
    message: 'Both start date and end date must be provided together',
    path: ['endDate'],
  });

export type FilterRequest = z.infer<typeof FilterRequestSchema>;

/**
 * A filter request that names a date range.
 */
export type DatedFilterRequest = FilterRequest & { startDate: string; endDate: string };

/**
 * Check whether a request carries a date range.
 */
export function hasDateRange(request: FilterRequest): request is DatedFilterRequest {
  return request.startDate !== undefined && request.endDate !== undefined;
}
