// ============================================================================
// @dagwire/serialization — Decoding Options
// ============================================================================

import { InvalidArgumentError } from '@dagwire/core';
import { z } from 'zod';

export const decodingOptionsSchema = z
  .object({
    /** Validate operator nodes against their operator's signature. */
    safe: z.boolean().default(true),
    /** Recompute attributes of operator nodes; only applies to safe decoding. */
    inferAttributes: z.boolean().default(true),
  })
  .strict();

export type DecodingOptions = z.input<typeof decodingOptionsSchema>;
export type ResolvedDecodingOptions = z.output<typeof decodingOptionsSchema>;

/**
 * Render the first issue of a zod error as `message` or `message at a.b`.
 */
export function formatIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (issue === undefined) return 'invalid input';
  return issue.path.length > 0 ? `${issue.message} at ${issue.path.join('.')}` : issue.message;
}

export function resolveDecodingOptions(options: DecodingOptions = {}): ResolvedDecodingOptions {
  const parsed = decodingOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidArgumentError(`invalid decoding options: ${formatIssue(parsed.error)}`);
  }
  return parsed.data;
}
