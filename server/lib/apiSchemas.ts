/**
 * Zod schemas for external responses: the price-history chart endpoint and
 * the BSE scrip list.
 *
 * These validate the shape of JSON payloads at the system boundary before
 * they propagate into the rest of the application. Unknown fields pass
 * through untouched since the upstream APIs add fields at will.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Price history  (v8/finance/chart/…)
// ---------------------------------------------------------------------------

const ChartQuoteSchema = z
  .object({
    close: z.array(z.number().nullable()).optional(),
  })
  .passthrough();

const ChartResultSchema = z
  .object({
    meta: z
      .object({
        symbol: z.string().optional(),
        currency: z.string().optional(),
        longName: z.string().optional(),
        shortName: z.string().optional(),
      })
      .passthrough()
      .optional(),
    timestamp: z.array(z.number()).optional(),
    indicators: z
      .object({
        quote: z.array(ChartQuoteSchema).optional(),
      })
      .passthrough(),
  })
  .passthrough();

const ChartErrorSchema = z
  .object({
    code: z.string().optional(),
    description: z.string().nullable().optional(),
  })
  .passthrough();

export const ChartResponseSchema = z
  .object({
    chart: z
      .object({
        result: z.array(ChartResultSchema).nullable().optional(),
        error: ChartErrorSchema.nullable().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type ChartResponse = z.infer<typeof ChartResponseSchema>;

// ---------------------------------------------------------------------------
// BSE scrip list
// ---------------------------------------------------------------------------

const BseScripSchema = z
  .object({
    short_name: z.string().nullable().optional(),
    LONGNAME: z.string().nullable().optional(),
    Scrip_Name: z.string().nullable().optional(),
    Status: z.string().nullable().optional(),
  })
  .passthrough();

export const BseScripListSchema = z.union([
  z.object({ Table: z.array(BseScripSchema) }).passthrough(),
  z.array(BseScripSchema),
]);


// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

/**
 * Validate a parsed JSON payload against a Zod schema.
 * Returns the validated data on success, or `null` on failure (with a
 * console warning naming the first few issues).
 */
export function validateApiResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, label: string): T | null {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;
  console.warn(`[zod] ${label}: response failed validation`, result.error.issues.slice(0, 3));
  return null;
}
