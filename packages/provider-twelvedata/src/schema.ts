/**
 * @fileoverview zod schemas for the `time_series` response body.
 *
 * Parsing happens in two passes so that an error status is reported before
 * the shape of `meta` and `values` is looked at.
 *
 * @module @tseries/provider-twelvedata/schema
 */

import { z } from 'zod';

/**
 * Minimal envelope: a string status plus whatever explains a failure.
 */
export const envelopeSchema = z
  .object({
    status: z.string(),
    message: z.unknown().optional(),
    code: z.unknown().optional(),
  })
  .passthrough();

export type ResponseEnvelope = z.infer<typeof envelopeSchema>;

const metaValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Full body of a successful response.
 */
export const rawResponseSchema = z
  .object({
    status: z.string(),
    message: z.string().optional(),
    code: z.number().optional(),
    meta: z.record(metaValueSchema).optional(),
    values: z.array(z.record(z.unknown())).optional(),
  })
  .passthrough();


/**
 * Joins zod issues into one line: `values.0: Expected object, received string`.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
