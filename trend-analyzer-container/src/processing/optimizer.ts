/**
 * Task Optimizer
 *
 * Reduces a cleaned and enriched record to the small, task-specific view the
 * generation stage needs. Every task has a selection rule and a fixed element
 * bound taken from config limits, so the view size never depends on how much
 * data came in.
 */

import { LimitsConfig, PipelineConfig } from '../config';
import { InvalidTaskError } from '../errors';
import {
  CleanedTrendsRecord,
  EnrichedInsights,
  ProblemIndicator,
  QueryEntry,
  RankedQuery,
  TASK_NAMES,
  TaskName,
  TaskOptimizedView,
  ViewForTask,
  valueOr,
} from '../types';

export interface OptimizerInput {
  record: CleanedTrendsRecord;
  insights: EnrichedInsights;
  limits: LimitsConfig;
}

type TaskRules = { [T in TaskName]: (input: OptimizerInput) => ViewForTask<T> };

const CATEGORY_COUNT_FIELDS = 4;
const MARKET_SUMMARY_FIELDS = 8;
const MARKET_CONTEXT_FIELDS = 2;

export function isTaskName(value: string): value is TaskName {
  return TASK_NAMES.some((name) => name === value);
}

/**
 * Pick `count` evenly spaced items across the whole sequence, first and last
 * included. Sequences no longer than `count` are returned whole.
 */
export function sampleEvenly<T>(items: readonly T[], count: number): T[] {
  if (count <= 0) {
    return [];
  }
  if (items.length <= count) {
    return [...items];
  }
  if (count === 1) {
    return [items[items.length - 1]];
  }

  const sampled: T[] = [];
  const step = (items.length - 1) / (count - 1);
  for (let i = 0; i < count; i++) {
    sampled.push(items[Math.round(i * step)]);
  }
  return sampled;
}

/**
 * Highest value first; equal values keep their input order
 */
function rankByValue<T extends { value: number }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => b.value - a.value);
}

function round(value: number | null | undefined, decimals: number): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function toRanked(entry: QueryEntry): RankedQuery {
  return { query: entry.query, value: entry.value };
}

function risingByValue(record: CleanedTrendsRecord): QueryEntry[] {
  return rankByValue(valueOr(record.risingQueries, []));
}

function indicatorsIn(insights: EnrichedInsights, ...categories: ProblemIndicator['categories']): ProblemIndicator[] {
  return rankByValue(
    insights.problemIndicators.filter((indicator) =>
      indicator.categories.some((category) => categories.includes(category))
    )
  );
}

const TASK_RULES: TaskRules = {
  problem_extraction: ({ record, insights, limits }) => {
    const flagged = new Set(insights.problemIndicators.map((indicator) => indicator.query));
    const rising = risingByValue(record);
    // Rising queries that read as problems come first, the rest fill up the slots
    const risingProblems = [
      ...rising.filter((entry) => flagged.has(entry.query)),
      ...rising.filter((entry) => !flagged.has(entry.query)),
    ];

    return {
      task: 'problem_extraction',
      problemIndicators: rankByValue(insights.problemIndicators).slice(0, limits.problemIndicators),
      risingProblems: risingProblems.slice(0, limits.risingProblems).map(toRanked),
      contextQueries: rankByValue(valueOr(record.topQueries, [])).slice(0, limits.contextQueries).map(toRanked),
      categoryCounts: { ...insights.problemSummary.categoryCounts },
    };
  },

  market_maturity: ({ record, insights, limits }) => {
    const series = valueOr(record.interestOverTime, []);
    const stats = insights.statistics;

    return {
      task: 'market_maturity',
      summary: {
        mean: round(stats?.mean, 1),
        median: round(stats?.median, 1),
        min: stats ? stats.min : null,
        max: stats ? stats.max : null,
        volatility: round(insights.volatility, 3),
        trendDirection: insights.trend.direction,
        changePercent: insights.trend.changePercent,
        pointCount: series.length,
      },
      interestSample: sampleEvenly(series, limits.interestSamplePoints).map((point) => ({ ...point })),
    };
  },

  feature_generation: ({ record, insights, limits }) => ({
    task: 'feature_generation',
    clusters: insights.keywordClusters.slice(0, limits.clusters).map((cluster) => ({
      label: cluster.label,
      queries: cluster.queries.slice(0, limits.clusterMembers),
    })),
    emergingQueries: risingByValue(record)
      .slice(0, limits.emergingQueries)
      .map((entry) => entry.query),
    trendingTopics: insights.themes.trending.slice(0, limits.themeMatches),
    technicalInterest: insights.themes.technical.slice(0, limits.themeMatches),
    problemCounts: { ...insights.problemSummary.categoryCounts },
  }),

  competitor_analysis: ({ record, insights, limits }) => ({
    task: 'competitor_analysis',
    comparisonQueries: indicatorsIn(insights, 'comparison')
      .slice(0, limits.comparisonQueries)
      .map((indicator) => indicator.query),
    topQueries: rankByValue(valueOr(record.topQueries, []))
      .slice(0, limits.competitorTopQueries)
      .map((entry) => entry.query),
    market: {
      trendDirection: insights.trend.direction,
      averageInterest: round(insights.statistics?.mean, 1),
    },
  }),

  feature_enhancement: ({ record, insights, limits }) => ({
    task: 'feature_enhancement',
    painPoints: indicatorsIn(insights, 'pain_point', 'negative')
      .slice(0, limits.painPoints)
      .map((indicator) => indicator.query),
    risingQueries: risingByValue(record)
      .slice(0, limits.enhancementRisingQueries)
      .map((entry) => entry.query),
    clusterLabels: insights.keywordClusters.slice(0, limits.clusterLabels).map((cluster) => cluster.label),
  }),
};

const TASK_BOUNDS: Record<TaskName, (limits: LimitsConfig) => number> = {
  problem_extraction: (limits) =>
    limits.problemIndicators + limits.risingProblems + limits.contextQueries + CATEGORY_COUNT_FIELDS,
  market_maturity: (limits) => MARKET_SUMMARY_FIELDS + limits.interestSamplePoints,
  feature_generation: (limits) =>
    limits.clusters * (1 + limits.clusterMembers) +
    limits.emergingQueries +
    2 * limits.themeMatches +
    CATEGORY_COUNT_FIELDS,
  competitor_analysis: (limits) => limits.comparisonQueries + limits.competitorTopQueries + MARKET_CONTEXT_FIELDS,
  feature_enhancement: (limits) => limits.painPoints + limits.enhancementRisingQueries + limits.clusterLabels,
};

/**
 * Number of elements a view carries, counted the same way as the task bound
 */
export function viewSize(view: TaskOptimizedView): number {
  switch (view.task) {
    case 'problem_extraction':
      return (
        view.problemIndicators.length +
        view.risingProblems.length +
        view.contextQueries.length +
        Object.keys(view.categoryCounts).length
      );
    case 'market_maturity':
      return Object.keys(view.summary).length + view.interestSample.length;
    case 'feature_generation':
      return (
        view.clusters.reduce((sum, cluster) => sum + 1 + cluster.queries.length, 0) +
        view.emergingQueries.length +
        view.trendingTopics.length +
        view.technicalInterest.length +
        Object.keys(view.problemCounts).length
      );
    case 'competitor_analysis':
      return view.comparisonQueries.length + view.topQueries.length + Object.keys(view.market).length;
    case 'feature_enhancement':
      return view.painPoints.length + view.risingQueries.length + view.clusterLabels.length;
  }
}

export class TaskOptimizer {
  private readonly config: PipelineConfig;

  constructor(config: PipelineConfig) {
    this.config = config;
  }

  /**
   * Build the bounded view for one task
   *
   * @throws InvalidTaskError when `task` is not a registered task
   */
  optimize(record: CleanedTrendsRecord, insights: EnrichedInsights, task: string): TaskOptimizedView {
    if (!isTaskName(task)) {
      throw new InvalidTaskError(task, TASK_NAMES);
    }
    return this.optimizeFor(record, insights, task);
  }

  optimizeFor<T extends TaskName>(record: CleanedTrendsRecord, insights: EnrichedInsights, task: T): ViewForTask<T> {
    const rule: TaskRules[T] = TASK_RULES[task];
    return rule({ record, insights, limits: this.config.limits });
  }

  /**
   * Upper bound on `viewSize` for a task under this optimizer's limits
   */
  taskBound(task: string): number {
    if (!isTaskName(task)) {
      throw new InvalidTaskError(task, TASK_NAMES);
    }
    return TASK_BOUNDS[task](this.config.limits);
  }
}
