/**
 * Trends Cleaner
 *
 * Normalizes and sanity-checks raw trends records.
 * Clamps interest values, drops points without a usable date, strips markup
 * from query text and de-duplicates queries. Never throws on bad values or
 * items of the wrong shape: whatever cannot be used is dropped and counted in
 * the cleaning report.
 */

import {
  CleanedTrendsRecord,
  CleaningReport,
  CleaningResult,
  Field,
  InterestPoint,
  QueryEntry,
  RawTrendsRecord,
  RegionInterest,
  absent,
  present,
} from '../types';
import { RawQuery, rawInterestPointSchema, rawQuerySchema, rawRegionSchema } from './record-schema';
import { cleanQueryText, stripControlCharacters, stripMarkup } from './text';

export const MIN_INTEREST = 0;
export const MAX_INTEREST = 100;

// Rising queries reported as "Breakout" grew by more than the service can express
export const BREAKOUT_VALUE = 10000;

export function clampInterest(value: number): number {
  return Math.max(MIN_INTEREST, Math.min(MAX_INTEREST, value));
}

export function parseTimestamp(raw: unknown): Date | null {
  let date: Date;

  if (raw instanceof Date) {
    date = new Date(raw.getTime());
  } else if (typeof raw === 'number' && Number.isFinite(raw)) {
    date = new Date(raw);
  } else if (typeof raw === 'string' && raw.trim().length > 0) {
    date = new Date(raw.trim());
  } else {
    return null;
  }

  return Number.isNaN(date.getTime()) ? null : date;
}

export function parseInterest(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }

  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    // The trends service reports tiny volumes as "<1"
    if (trimmed === '<1') {
      return 0;
    }
    if (trimmed.length === 0) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}

export function parseQueryValue(raw: unknown): number {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : 0;
  }

  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (trimmed.toLowerCase() === 'breakout') {
      return BREAKOUT_VALUE;
    }
    const parsed = Number(trimmed.replace(/[%+,]/g, ''));
    return trimmed.length > 0 && Number.isFinite(parsed) ? parsed : 0;
  }

  return 0;
}

export class TrendsCleaner {
  /**
   * Clean a raw record
   */
  clean(raw: RawTrendsRecord): CleanedTrendsRecord {
    return this.cleanWithReport(raw).record;
  }

  /**
   * Clean a raw record and report what had to be adjusted
   */
  cleanWithReport(raw: RawTrendsRecord): CleaningResult {
    const report: CleaningReport = {
      clampedValues: 0,
      droppedPoints: 0,
      droppedQueries: 0,
      duplicateQueries: 0,
    };

    const record: CleanedTrendsRecord = {
      keyword: this.cleanKeyword(raw.keyword),
      interestOverTime: raw.interestOverTime ? present(this.cleanSeries(raw.interestOverTime, report)) : absent(),
      topQueries: raw.topQueries ? present(this.cleanQueries(raw.topQueries, report)) : absent(),
      risingQueries: raw.risingQueries ? present(this.cleanQueries(raw.risingQueries, report)) : absent(),
      regions: raw.regions ? present(this.cleanRegions(raw.regions, report)) : absent(),
      relatedTopics: raw.relatedTopics ? present(this.cleanQueries(raw.relatedTopics, report)) : absent(),
    };

    return { record, report };
  }

  private cleanKeyword(keyword: string | undefined): Field<string> {
    if (keyword === undefined) {
      return absent();
    }
    const cleaned = cleanQueryText(keyword);
    return cleaned.length > 0 ? present(cleaned) : absent();
  }

  /**
   * Parse dates, clamp values and order the series chronologically
   */
  private cleanSeries(points: readonly unknown[], report: CleaningReport): InterestPoint[] {
    const cleaned: Array<{ time: number; point: InterestPoint }> = [];

    for (const item of points) {
      const point = rawInterestPointSchema.safeParse(item);
      const date = point.success ? parseTimestamp(point.data.date) : null;
      const interest = point.success ? parseInterest(point.data.interest) : null;

      if (date === null || interest === null) {
        report.droppedPoints++;
        continue;
      }

      const clamped = clampInterest(interest);
      if (clamped !== interest) {
        report.clampedValues++;
      }

      cleaned.push({ time: date.getTime(), point: { date: date.toISOString(), interest: clamped } });
    }

    // Array.prototype.sort is stable, so equal timestamps keep their input order
    return cleaned.sort((a, b) => a.time - b.time).map((entry) => entry.point);
  }

  /**
   * Clean query text, drop empties and keep the first of each normalized duplicate
   */
  private cleanQueries(queries: readonly unknown[], report: CleaningReport): QueryEntry[] {
    const seen = new Set<string>();
    const cleaned: QueryEntry[] = [];

    for (const item of queries) {
      const parsed = rawQuerySchema.safeParse(item);
      if (!parsed.success) {
        report.droppedQueries++;
        continue;
      }

      const raw = parsed.data;
      const text = this.queryText(raw);
      const query = text === null ? '' : cleanQueryText(text);

      if (query.length === 0) {
        report.droppedQueries++;
        continue;
      }

      if (seen.has(query)) {
        report.duplicateQueries++;
        continue;
      }

      seen.add(query);
      cleaned.push({ query, value: typeof raw === 'string' ? 0 : parseQueryValue(raw.value) });
    }

    return cleaned;
  }

  private queryText(raw: RawQuery): string | null {
    if (typeof raw === 'string') {
      return raw;
    }
    if (typeof raw.query === 'string') {
      return raw.query;
    }
    if (typeof raw.query === 'number' && Number.isFinite(raw.query)) {
      return String(raw.query);
    }
    return null;
  }

  private cleanRegions(regions: readonly unknown[], report: CleaningReport): RegionInterest[] {
    const cleaned: RegionInterest[] = [];

    for (const item of regions) {
      const region = rawRegionSchema.safeParse(item);
      const name =
        region.success && typeof region.data.name === 'string'
          ? stripMarkup(stripControlCharacters(region.data.name)).replace(/\s+/g, ' ').trim()
          : '';
      const interest = region.success ? parseInterest(region.data.interest) : null;

      if (name.length === 0 || interest === null) {
        report.droppedPoints++;
        continue;
      }

      const clamped = clampInterest(interest);
      if (clamped !== interest) {
        report.clampedValues++;
      }

      cleaned.push({ name, interest: clamped });
    }

    return cleaned;
  }
}

/**
 * Turn a cleaned record back into the raw shape it could have arrived in.
 * Cleaning the result gives back an equal record.
 */
export function toRawRecord(record: CleanedTrendsRecord): RawTrendsRecord {
  const raw: RawTrendsRecord = {};

  if (record.keyword.present) {
    raw.keyword = record.keyword.value;
  }
  if (record.interestOverTime.present) {
    raw.interestOverTime = record.interestOverTime.value.map((point) => ({ ...point }));
  }
  if (record.topQueries.present) {
    raw.topQueries = record.topQueries.value.map((entry) => ({ ...entry }));
  }
  if (record.risingQueries.present) {
    raw.risingQueries = record.risingQueries.value.map((entry) => ({ ...entry }));
  }
  if (record.regions.present) {
    raw.regions = record.regions.value.map((region) => ({ ...region }));
  }
  if (record.relatedTopics.present) {
    raw.relatedTopics = record.relatedTopics.value.map((entry) => ({ ...entry }));
  }

  return raw;
}
