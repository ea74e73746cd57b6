/**
 * Raw Record Contract
 *
 * The minimal structural contract a trends record must meet before it enters
 * the pipeline: the record is an object, and every section that is present
 * has the right container type. Missing sections and odd values inside a
 * section are data-quality matters for the cleaner, not contract violations.
 */

import { z } from 'zod';
import { RawTrendsRecord } from '../types';
import { ContractIssue, MalformedRecordError } from '../errors';

export const rawInterestPointSchema = z.object({
  date: z.unknown(),
  interest: z.unknown(),
});

export const rawQuerySchema = z.union([
  z.string(),
  z.object({
    query: z.unknown(),
    value: z.unknown(),
  }),
]);

export const rawRegionSchema = z.object({
  name: z.unknown(),
  interest: z.unknown(),
});

export type RawInterestPoint = z.infer<typeof rawInterestPointSchema>;
export type RawQuery = z.infer<typeof rawQuerySchema>;
export type RawRegion = z.infer<typeof rawRegionSchema>;

// Absent and null both mean "no section"; items are checked by the cleaner
const optionalList = z
  .array(z.unknown())
  .nullish()
  .transform((list) => list ?? undefined);

export const rawTrendsRecordSchema = z.object({
  keyword: z
    .string()
    .nullish()
    .transform((keyword) => keyword ?? undefined),
  interestOverTime: optionalList,
  topQueries: optionalList,
  risingQueries: optionalList,
  regions: optionalList,
  relatedTopics: optionalList,
  metadata: z
    .record(z.unknown())
    .nullish()
    .transform((metadata) => metadata ?? undefined),
});

export function toContractIssues(error: z.ZodError): ContractIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate untyped input against the record contract
 *
 * @throws MalformedRecordError naming each offending path
 */
export function parseRawTrendsRecord(input: unknown): RawTrendsRecord {
  const parsed = rawTrendsRecordSchema.safeParse(input);

  if (!parsed.success) {
    const issues = toContractIssues(parsed.error);
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    throw new MalformedRecordError(`Malformed trends record (${summary})`, issues);
  }

  return parsed.data;
}
