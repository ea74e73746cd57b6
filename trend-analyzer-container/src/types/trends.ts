/**
 * Trend Record Types
 *
 * Raw records arrive from the trends service with every section optional and
 * loosely typed values. Cleaned records carry the same sections with the
 * invariants enforced and each section tagged present or absent.
 */

/**
 * Sections are lists of whatever the source sent. Points are expected as
 * `{date, interest}`, queries as a string or `{query, value}` and regions as
 * `{name, interest}`; the cleaner drops and counts anything else.
 */
export interface RawTrendsRecord {
  keyword?: string;
  interestOverTime?: unknown[];
  topQueries?: unknown[];
  risingQueries?: unknown[];
  regions?: unknown[];
  relatedTopics?: unknown[];
  metadata?: Record<string, unknown>;
}

/**
 * A section of a cleaned record. Absence is explicit so every stage has to
 * decide what a missing section means for it.
 */
export type Field<T> = { present: true; value: T } | { present: false };

export interface InterestPoint {
  date: string; // ISO-8601
  interest: number; // 0 - 100
}

export type QuerySource = 'top' | 'rising';

export interface QueryEntry {
  query: string; // normalized: lowercase, single spaces
  value: number;
}

export interface RegionInterest {
  name: string;
  interest: number; // 0 - 100
}

export interface CleanedTrendsRecord {
  keyword: Field<string>;
  interestOverTime: Field<InterestPoint[]>;
  topQueries: Field<QueryEntry[]>;
  risingQueries: Field<QueryEntry[]>;
  regions: Field<RegionInterest[]>;
  relatedTopics: Field<QueryEntry[]>;
}

export interface CleaningReport {
  clampedValues: number;
  droppedPoints: number;
  droppedQueries: number;
  duplicateQueries: number;
}

export interface CleaningResult {
  record: CleanedTrendsRecord;
  report: CleaningReport;
}

export function present<T>(value: T): Field<T> {
  return { present: true, value };
}

export function absent<T>(): Field<T> {
  return { present: false };
}

/**
 * Value of a section, or the fallback when it is absent.
 */
export function valueOr<T>(field: Field<T>, fallback: T): T {
  return field.present ? field.value : fallback;
}
