import {
  BREAKOUT_VALUE,
  TrendsCleaner,
  parseInterest,
  parseQueryValue,
  parseTimestamp,
  toRawRecord,
} from '../processing/cleaner';
import { sampleRecord } from './fixtures';

describe('TrendsCleaner', () => {
  const cleaner = new TrendsCleaner();

  it('clamps interest values into 0-100 and counts the clamps', () => {
    const { record, report } = cleaner.cleanWithReport({
      interestOverTime: [
        { date: '2024-01-07', interest: -5 },
        { date: '2024-01-14', interest: 50 },
        { date: '2024-01-21', interest: 150 },
      ],
    });

    expect(record.interestOverTime).toEqual({
      present: true,
      value: [
        { date: '2024-01-07T00:00:00.000Z', interest: 0 },
        { date: '2024-01-14T00:00:00.000Z', interest: 50 },
        { date: '2024-01-21T00:00:00.000Z', interest: 100 },
      ],
    });
    expect(report.clampedValues).toBe(2);
  });

  it('drops points without a usable date or value', () => {
    const { record, report } = cleaner.cleanWithReport({
      interestOverTime: [
        { date: 'not a date', interest: 10 },
        { date: '', interest: 5 },
        { date: '2024-01-07', interest: 'abc' },
        { date: '2024-01-14', interest: '<1' },
      ],
    });

    expect(record.interestOverTime).toEqual({
      present: true,
      value: [{ date: '2024-01-14T00:00:00.000Z', interest: 0 }],
    });
    expect(report.droppedPoints).toBe(3);
  });

  it('orders the series chronologically', () => {
    const record = cleaner.clean({
      interestOverTime: [
        { date: '2024-01-21', interest: 3 },
        { date: '2024-01-07', interest: 1 },
        { date: '2024-01-14', interest: 2 },
      ],
    });

    expect(record.interestOverTime.present && record.interestOverTime.value.map((p) => p.interest)).toEqual([1, 2, 3]);
  });

  it('de-duplicates queries after normalization, keeping the first', () => {
    const { record, report } = cleaner.cleanWithReport({ topQueries: ['Fix bug', 'fix  bug', 'other'] });

    expect(record.topQueries).toEqual({
      present: true,
      value: [
        { query: 'fix bug', value: 0 },
        { query: 'other', value: 0 },
      ],
    });
    expect(report.duplicateQueries).toBe(1);
  });

  it('drops queries that clean down to nothing', () => {
    const { record, report } = cleaner.cleanWithReport({
      topQueries: [{ query: '<br/>', value: 10 }, { query: null, value: 5 }, { query: 'kept', value: 1 }],
    });

    expect(record.topQueries).toEqual({ present: true, value: [{ query: 'kept', value: 1 }] });
    expect(report.droppedQueries).toBe(2);
  });

  it('parses rising query values', () => {
    const record = cleaner.clean({
      risingQueries: [
        { query: 'a', value: 'Breakout' },
        { query: 'b', value: '+250%' },
        { query: 'c', value: '1,200' },
        { query: 'd', value: 'n/a' },
      ],
    });

    expect(record.risingQueries.present && record.risingQueries.value.map((entry) => entry.value)).toEqual([
      BREAKOUT_VALUE,
      250,
      1200,
      0,
    ]);
  });

  it('marks missing sections absent and keeps empty sections present', () => {
    const record = cleaner.clean({ topQueries: [] });

    expect(record.topQueries).toEqual({ present: true, value: [] });
    expect(record.risingQueries).toEqual({ present: false });
    expect(record.interestOverTime).toEqual({ present: false });
    expect(record.keyword).toEqual({ present: false });
  });

  it('treats a blank keyword as absent', () => {
    expect(cleaner.clean({ keyword: '   ' }).keyword).toEqual({ present: false });
  });

  it('cleans region names and interest', () => {
    const { record, report } = cleaner.cleanWithReport({
      regions: [
        { name: ' United  States ', interest: 120 },
        { name: '', interest: 5 },
      ],
    });

    expect(record.regions).toEqual({ present: true, value: [{ name: 'United States', interest: 100 }] });
    expect(report.clampedValues).toBe(1);
    expect(report.droppedPoints).toBe(1);
  });

  it('drops and counts items of the wrong shape', () => {
    const { record, report } = cleaner.cleanWithReport({
      interestOverTime: [null, 7, ['2024-01-01', 5], { date: '2024-01-07', interest: 5 }],
      topQueries: ['crm', 42, null, { query: 'crm pricing', value: 10 }],
      regions: ['Canada', { name: 'Canada', interest: 40 }],
    });

    expect(record.interestOverTime).toEqual({
      present: true,
      value: [{ date: '2024-01-07T00:00:00.000Z', interest: 5 }],
    });
    expect(record.topQueries).toEqual({
      present: true,
      value: [
        { query: 'crm', value: 0 },
        { query: 'crm pricing', value: 10 },
      ],
    });
    expect(record.regions).toEqual({ present: true, value: [{ name: 'Canada', interest: 40 }] });
    expect(report).toEqual({ clampedValues: 0, droppedPoints: 4, droppedQueries: 2, duplicateQueries: 0 });
  });

  it('is idempotent', () => {
    const once = cleaner.clean(sampleRecord());
    const twice = cleaner.clean(toRawRecord(once));

    expect(twice).toEqual(once);
  });

  it('does not modify its input', () => {
    const raw = sampleRecord();
    const copy = JSON.parse(JSON.stringify(raw));
    cleaner.clean(raw);

    expect(raw).toEqual(copy);
  });
});

describe('value parsers', () => {
  it('parseTimestamp accepts dates, epoch millis and date strings', () => {
    expect(parseTimestamp(new Date('2024-03-01T00:00:00Z'))?.toISOString()).toBe('2024-03-01T00:00:00.000Z');
    expect(parseTimestamp(0)?.toISOString()).toBe('1970-01-01T00:00:00.000Z');
    expect(parseTimestamp('2024-03-01')?.toISOString()).toBe('2024-03-01T00:00:00.000Z');
    expect(parseTimestamp(Number.NaN)).toBeNull();
    expect(parseTimestamp({})).toBeNull();
  });

  it('parseInterest rejects non-numeric values', () => {
    expect(parseInterest('42')).toBe(42);
    expect(parseInterest(Number.POSITIVE_INFINITY)).toBeNull();
    expect(parseInterest(true)).toBeNull();
  });

  it('parseQueryValue defaults to zero', () => {
    expect(parseQueryValue(undefined)).toBe(0);
    expect(parseQueryValue('')).toBe(0);
    expect(parseQueryValue(75)).toBe(75);
  });
});
