import { z } from 'zod';
import type { AcmeProblemDetails } from '../types/account.js';
import { ACME_ERROR } from './codes.js';

const problemSchema: z.ZodType<AcmeProblemDetails, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      type: z.string().optional(),
      detail: z.string().optional(),
      title: z.string().optional(),
      status: z.number().int().optional(),
      instance: z.string().optional(),
      subproblems: z.array(problemSchema).optional(),
    })
    .refine((p) => p.type !== undefined || p.detail !== undefined || p.title !== undefined)
    .transform(({ type, title, detail, ...rest }) => ({
      ...rest,
      type: type ?? ACME_ERROR.serverInternal,
      // some CAs only fill in "title"
      detail: detail ?? title ?? 'Unknown error',
    })),
);

/**
 * Parse an RFC 7807 problem document out of a response body
 *
 * @returns The problem, or undefined when the body is not a problem document
 */
export function parseProblemDetails(body: unknown): AcmeProblemDetails | undefined {
  if (!body || typeof body !== 'object' || Buffer.isBuffer(body)) return undefined;
  const parsed = problemSchema.safeParse(body);
  return parsed.success ? parsed.data : undefined;
}
