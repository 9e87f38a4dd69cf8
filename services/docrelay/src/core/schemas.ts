import { z } from 'zod';
import type { JsonValue } from '../types/index.js';

export const RESOURCE_ID_PATTERN = /^[A-Za-z0-9._:-]{1,256}$/;

export const resourceIdSchema = z
  .string()
  .regex(RESOURCE_ID_PATTERN, 'resource must be 1-256 characters of letters, digits, ".", "_", ":" or "-"');

/** Field names the document store reserves for operators. */
export function isReservedFieldName(key: string): boolean {
  return key.startsWith('$');
}

const jsonObjectSchema = z.record(z.lazy(() => jsonValueSchema)).superRefine((value, ctx) => {
  for (const key of Object.keys(value)) {
    if (isReservedFieldName(key)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Field names must not start with "$"' });
    }
  }
});

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), jsonObjectSchema])
);

export const revisionSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const writeResourceSchema = z.object({
  document: jsonValueSchema,
  expectedRevision: revisionSchema.optional(),
});

/**
 * Flatten zod issues into "path: message" strings for error payloads.
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
