import { DEFAULT_PIPELINE_CONFIG } from '../config';
import { InvalidTaskError } from '../errors';
import { TrendsCleaner } from '../processing/cleaner';
import { TrendsEnricher } from '../processing/enricher';
import { TaskOptimizer, isTaskName, sampleEvenly, viewSize } from '../processing/optimizer';
import { RawTrendsRecord, TASK_NAMES } from '../types';
import { sampleRecord, seriesOf } from './fixtures';

const QUERY_SUFFIXES = ['issue', 'vs rival', 'how to fix', 'pricing', 'new release', 'for teams', 'api'];

function largeRecord(size: number): RawTrendsRecord {
  const queries = Array.from({ length: size }, (_, i) => ({
    query: `widget ${i} ${QUERY_SUFFIXES[i % QUERY_SUFFIXES.length]}`,
    value: size - i,
  }));

  return {
    keyword: 'widget',
    interestOverTime: seriesOf(Array.from({ length: size }, (_, i) => i % 101)),
    topQueries: queries,
    risingQueries: queries.map((entry) => ({ ...entry, query: `${entry.query} rising` })),
  };
}

describe('sampleEvenly', () => {
  it('keeps first and last and spaces the rest evenly', () => {
    expect(sampleEvenly([0, 1, 2, 3, 4, 5, 6, 7, 8, 9], 4)).toEqual([0, 3, 6, 9]);
  });

  it('returns short sequences whole', () => {
    const items = [1, 2, 3];
    const sampled = sampleEvenly(items, 5);

    expect(sampled).toEqual([1, 2, 3]);
    expect(sampled).not.toBe(items);
  });

  it('takes the latest item when asked for one', () => {
    expect(sampleEvenly([1, 2, 3], 1)).toEqual([3]);
  });

  it('returns nothing for a zero count', () => {
    expect(sampleEvenly([1, 2, 3], 0)).toEqual([]);
  });
});

describe('TaskOptimizer', () => {
  const cleaner = new TrendsCleaner();
  const enricher = new TrendsEnricher(DEFAULT_PIPELINE_CONFIG);
  const optimizer = new TaskOptimizer(DEFAULT_PIPELINE_CONFIG);

  const prepare = (raw: RawTrendsRecord) => {
    const record = cleaner.clean(raw);
    return { record, insights: enricher.enrich(record) };
  };

  it('rejects an unknown task by name', () => {
    const { record, insights } = prepare(sampleRecord());

    expect(() => optimizer.optimize(record, insights, 'not_a_real_task')).toThrow(InvalidTaskError);
    expect(() => optimizer.optimize(record, insights, 'not_a_real_task')).toThrow(
      'Unknown task "not_a_real_task". Valid tasks: problem_extraction, market_maturity, feature_generation, competitor_analysis, feature_enhancement'
    );
    expect(() => optimizer.taskBound('not_a_real_task')).toThrow(InvalidTaskError);
  });

  it('recognizes every registered task', () => {
    expect(TASK_NAMES.every((task) => isTaskName(task))).toBe(true);
    expect(isTaskName('Problem_Extraction')).toBe(false);
  });

  it('builds the problem extraction view', () => {
    const { record, insights } = prepare(sampleRecord());

    expect(optimizer.optimize(record, insights, 'problem_extraction')).toEqual({
      task: 'problem_extraction',
      problemIndicators: [
        {
          query: 'project tool vs trello',
          value: 250,
          source: 'rising',
          categories: ['comparison'],
          matchedTerms: ['vs'],
        },
        {
          query: 'project tool alternative',
          value: 100,
          source: 'top',
          categories: ['comparison'],
          matchedTerms: ['alternative'],
        },
        {
          query: 'project tool not working',
          value: 60,
          source: 'top',
          categories: ['negative'],
          matchedTerms: ['not working'],
        },
      ],
      risingProblems: [
        { query: 'project tool vs trello', value: 250 },
        { query: 'new project tool launch', value: 10000 },
        { query: 'project tool for remote teams', value: 120 },
      ],
      contextQueries: [
        { query: 'project tool alternative', value: 100 },
        { query: 'best project tool', value: 80 },
        { query: 'project tool not working', value: 60 },
      ],
      categoryCounts: { pain_point: 0, solution_seeking: 0, comparison: 2, negative: 1 },
    });
  });

  it('builds the market maturity view', () => {
    const { record, insights } = prepare(sampleRecord());
    const view = optimizer.optimizeFor(record, insights, 'market_maturity');

    expect(view.summary).toEqual({
      mean: 43.9,
      median: 56.5,
      min: 9,
      max: 75,
      volatility: 0.594,
      trendDirection: 'rising',
      changePercent: 547.6,
      pointCount: 12,
    });
    expect(view.interestSample).toHaveLength(12);
  });

  it('samples long series down to the configured number of points', () => {
    const { record, insights } = prepare({ interestOverTime: seriesOf(Array.from({ length: 30 }, (_, i) => i)) });
    const view = optimizer.optimizeFor(record, insights, 'market_maturity');

    expect(view.interestSample.map((point) => point.interest)).toEqual([0, 3, 5, 8, 11, 13, 16, 18, 21, 24, 26, 29]);
  });

  it('builds the competitor and enhancement views', () => {
    const { record, insights } = prepare(sampleRecord());

    expect(optimizer.optimize(record, insights, 'competitor_analysis')).toEqual({
      task: 'competitor_analysis',
      comparisonQueries: ['project tool vs trello', 'project tool alternative'],
      topQueries: ['project tool alternative', 'best project tool', 'project tool not working', 'project tool for teams'],
      market: { trendDirection: 'rising', averageInterest: 43.9 },
    });
    expect(optimizer.optimize(record, insights, 'feature_enhancement')).toEqual({
      task: 'feature_enhancement',
      painPoints: ['project tool not working'],
      risingQueries: ['new project tool launch', 'project tool vs trello', 'project tool for remote teams'],
      clusterLabels: ['team'],
    });
  });

  it('ranks top queries by value before cutting them down', () => {
    const { record, insights } = prepare({
      topQueries: [
        { query: 'crm pricing', value: 5 },
        { query: 'crm login', value: 90 },
        { query: 'crm demo', value: 40 },
        { query: 'crm app', value: 70 },
      ],
    });

    expect(optimizer.optimizeFor(record, insights, 'problem_extraction').contextQueries).toEqual([
      { query: 'crm login', value: 90 },
      { query: 'crm app', value: 70 },
      { query: 'crm demo', value: 40 },
    ]);
    expect(optimizer.optimizeFor(record, insights, 'competitor_analysis').topQueries).toEqual([
      'crm login',
      'crm app',
      'crm demo',
      'crm pricing',
    ]);
  });

  it('builds the feature generation view', () => {
    const { record, insights } = prepare(sampleRecord());

    expect(optimizer.optimize(record, insights, 'feature_generation')).toEqual({
      task: 'feature_generation',
      clusters: [{ label: 'team', queries: ['project tool for teams', 'project tool for remote teams'] }],
      emergingQueries: ['new project tool launch', 'project tool vs trello', 'project tool for remote teams'],
      trendingTopics: ['new project tool launch'],
      technicalInterest: [],
      problemCounts: { pain_point: 0, solution_seeking: 0, comparison: 2, negative: 1 },
    });
  });

  it('produces empty views for an empty record', () => {
    const { record, insights } = prepare({});

    for (const task of TASK_NAMES) {
      expect(() => optimizer.optimize(record, insights, task)).not.toThrow();
    }
    expect(optimizer.optimizeFor(record, insights, 'market_maturity').summary.mean).toBeNull();
  });

  it.each([10, 1000, 100000])('keeps every view within its bound for %i queries', (size) => {
    const { record, insights } = prepare(largeRecord(size));

    for (const task of TASK_NAMES) {
      const view = optimizer.optimize(record, insights, task);
      expect(viewSize(view)).toBeLessThanOrEqual(optimizer.taskBound(task));
    }
  }, 30000);
});
