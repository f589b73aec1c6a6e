/**
 * Reader configuration. Defaults give strict RFC 8259 behaviour.
 */

import { z } from 'zod';
import { JsonConfigError } from './errors.js';

const DEFAULT_MAX_DEPTH = 256;

export const repeatedMemberPolicySchema = z.enum(['reject', 'keep-first', 'keep-last']);

export type RepeatedMemberPolicy = z.infer<typeof repeatedMemberPolicySchema>;

export const readerOptionsSchema = z
  .object({
    /** Accept `// ...` and `/* ... *\/` comments between tokens. */
    allowComments: z.boolean().default(false),
    /** Accept a comma before a closing `]` or `}`. */
    allowTrailingCommas: z.boolean().default(false),
    repeatedMembers: repeatedMemberPolicySchema.default('reject'),
    /** Max nesting depth of arrays and objects (default 256). */
    maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
  })
  .strict();

export type ReaderOptions = z.input<typeof readerOptionsSchema>;

export type ReaderParams = Readonly<z.output<typeof readerOptionsSchema>>;

/** Validate caller-supplied options; the result is frozen for the reader's lifetime. */
export function resolveReaderOptions(options: unknown = {}): ReaderParams {
  const parsed = readerOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new JsonConfigError(`Invalid reader options: ${issues.join('; ')}`, issues);
  }
  return Object.freeze(parsed.data);
}
