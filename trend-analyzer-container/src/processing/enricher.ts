/**
 * Trends Enricher
 *
 * Derives statistical and pattern features from a cleaned record:
 * - Series statistics, trend direction and volatility
 * - Problem-indicator queries (pain, complaint and solution-seeking terms)
 * - Keyword clusters (queries sharing a significant token)
 * - Seasonal, trending and technical themes
 *
 * Everything here is rule-based and deterministic for a given config.
 */

import { PipelineConfig } from '../config';
import {
  CleanedTrendsRecord,
  EnrichedInsights,
  KeywordCluster,
  ProblemCategory,
  ProblemIndicator,
  ProblemSummary,
  QueryEntry,
  QuerySource,
  SeriesStatistics,
  ThemeName,
  TrendAssessment,
  valueOr,
} from '../types';
import { containsTokenSequence, stem, tokenize } from './text';

interface CompiledTerm<C extends string> {
  term: string;
  category: C;
  tokens: string[];
}

export interface SourcedQuery extends QueryEntry {
  source: QuerySource;
  tokens: string[];
}

const PROBLEM_CATEGORIES: readonly ProblemCategory[] = ['pain_point', 'solution_seeking', 'comparison', 'negative'];
const THEME_NAMES: readonly ThemeName[] = ['seasonal', 'trending', 'technical'];

const YEAR_TOKEN = /^(19|20)\d{2}$/;

export function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

/**
 * Sample standard deviation (n - 1); 0 for a single value
 */
export function standardDeviation(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const avg = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

export function emptyCategoryCounts(): Record<ProblemCategory, number> {
  return { pain_point: 0, solution_seeking: 0, comparison: 0, negative: 0 };
}

function compileTerms<C extends string>(
  termsByCategory: Record<C, readonly string[]>,
  categories: readonly C[]
): CompiledTerm<C>[] {
  const compiled: CompiledTerm<C>[] = [];
  for (const category of categories) {
    for (const term of termsByCategory[category]) {
      const tokens = tokenize(term);
      if (tokens.length > 0) {
        compiled.push({ term, category, tokens });
      }
    }
  }
  return compiled;
}

export class TrendsEnricher {
  private readonly config: PipelineConfig;
  private readonly problemTerms: CompiledTerm<ProblemCategory>[];
  private readonly themeTerms: CompiledTerm<ThemeName>[];
  private readonly stopwords: Set<string>;

  constructor(config: PipelineConfig) {
    this.config = config;
    this.problemTerms = compileTerms(config.lexicons.problemTerms, PROBLEM_CATEGORIES);
    this.themeTerms = compileTerms(config.lexicons.themeTerms, THEME_NAMES);
    this.stopwords = new Set(config.lexicons.stopwords);
  }

  /**
   * Derive all insights from a cleaned record
   */
  enrich(record: CleanedTrendsRecord): EnrichedInsights {
    const values = valueOr(record.interestOverTime, []).map((point) => point.interest);
    const queries = this.collectQueries(record);
    const keyword = record.keyword.present ? record.keyword.value : null;

    const problemIndicators = this.detectProblems(queries);

    return {
      keyword,
      statistics: this.calculateStatistics(values),
      trend: this.calculateTrend(values),
      volatility: this.calculateVolatility(values),
      problemIndicators,
      problemSummary: this.summarizeProblems(problemIndicators, queries.length),
      keywordClusters: this.clusterQueries(queries, keyword),
      themes: this.detectThemes(queries),
    };
  }

  calculateStatistics(values: readonly number[]): SeriesStatistics | null {
    if (values.length === 0) {
      return null;
    }

    return {
      count: values.length,
      mean: mean(values),
      median: median(values),
      min: values.reduce((low, value) => Math.min(low, value), values[0]),
      max: values.reduce((high, value) => Math.max(high, value), values[0]),
      stdDev: standardDeviation(values),
    };
  }

  /**
   * Compare the mean of the latest third of the series with the earliest third.
   * The three segments differ in length by at most one: 2/3/2 for seven
   * points, 3/2/3 for eight.
   */
  calculateTrend(values: readonly number[]): TrendAssessment {
    if (values.length < this.config.trend.minSeriesLength || values.length < 3) {
      return { direction: 'insufficient_data', changePercent: null };
    }

    const segment = Math.round(values.length / 3);
    const earliest = mean(values.slice(0, segment));
    const latest = mean(values.slice(values.length - segment));

    if (earliest === 0) {
      return { direction: latest > 0 ? 'rising' : 'stable', changePercent: null };
    }

    const change = (latest - earliest) / earliest;
    const threshold = this.config.trend.directionThreshold;
    const changePercent = Math.round(change * 1000) / 10;

    if (change > threshold) {
      return { direction: 'rising', changePercent };
    }
    if (change < -threshold) {
      return { direction: 'falling', changePercent };
    }
    return { direction: 'stable', changePercent };
  }

  /**
   * Coefficient of variation; null when the mean is zero or there is no data
   */
  calculateVolatility(values: readonly number[]): number | null {
    if (values.length === 0) {
      return null;
    }
    const avg = mean(values);
    if (avg === 0) {
      return null;
    }
    return standardDeviation(values) / avg;
  }

  /**
   * Flag queries that contain any lexicon term
   */
  detectProblems(queries: readonly SourcedQuery[]): ProblemIndicator[] {
    const indicators: ProblemIndicator[] = [];

    for (const query of queries) {
      const categories = new Set<ProblemCategory>();
      const matchedTerms: string[] = [];

      for (const term of this.problemTerms) {
        if (containsTokenSequence(query.tokens, term.tokens)) {
          categories.add(term.category);
          matchedTerms.push(term.term);
        }
      }

      if (matchedTerms.length > 0) {
        indicators.push({
          query: query.query,
          value: query.value,
          source: query.source,
          categories: PROBLEM_CATEGORIES.filter((category) => categories.has(category)),
          matchedTerms,
        });
      }
    }

    return indicators;
  }

  summarizeProblems(indicators: readonly ProblemIndicator[], totalQueries: number): ProblemSummary {
    const categoryCounts = emptyCategoryCounts();
    for (const indicator of indicators) {
      for (const category of indicator.categories) {
        categoryCounts[category]++;
      }
    }

    return {
      categoryCounts,
      totalQueriesAnalyzed: totalQueries,
      problemDensity: totalQueries > 0 ? indicators.length / totalQueries : 0,
    };
  }

  /**
   * Group queries by shared significant tokens
   *
   * Tokens that appear in at least `minClusterSize` queries become anchors,
   * ordered by how many queries share them and then by first appearance.
   * Each anchor claims the queries containing it that no earlier anchor took.
   */
  clusterQueries(queries: readonly SourcedQuery[], keyword: string | null): KeywordCluster[] {
    const excluded = new Set(keyword ? tokenize(keyword).map(stem) : []);
    const postings = new Map<string, number[]>();

    queries.forEach((query, index) => {
      const tokens = new Set(
        query.tokens
          .filter((token) => token.length > 1 && !this.stopwords.has(token))
          .map(stem)
          .filter((token) => !excluded.has(token))
      );
      for (const token of tokens) {
        const list = postings.get(token);
        if (list) {
          list.push(index);
        } else {
          postings.set(token, [index]);
        }
      }
    });

    const minSize = this.config.clustering.minClusterSize;
    // Map iteration follows insertion order, which is first appearance
    const anchors = Array.from(postings.entries())
      .filter(([, members]) => members.length >= minSize)
      .map(([token, members], order) => ({ token, members, order }))
      .sort((a, b) => b.members.length - a.members.length || a.order - b.order);

    const assigned = new Set<number>();
    const clusters: KeywordCluster[] = [];

    for (const anchor of anchors) {
      const members = anchor.members.filter((index) => !assigned.has(index));
      if (members.length < minSize) {
        continue;
      }
      members.forEach((index) => assigned.add(index));
      clusters.push({ label: anchor.token, queries: members.map((index) => queries[index].query) });
    }

    return clusters;
  }

  detectThemes(queries: readonly SourcedQuery[]): Record<ThemeName, string[]> {
    const themes: Record<ThemeName, string[]> = { seasonal: [], trending: [], technical: [] };

    for (const query of queries) {
      for (const theme of THEME_NAMES) {
        const matches =
          this.themeTerms.some((term) => term.category === theme && containsTokenSequence(query.tokens, term.tokens)) ||
          (theme === 'trending' && query.tokens.some((token) => YEAR_TOKEN.test(token)));
        if (matches) {
          themes[theme].push(query.query);
        }
      }
    }

    return themes;
  }

  /**
   * Top then rising queries, each normalized query once
   */
  private collectQueries(record: CleanedTrendsRecord): SourcedQuery[] {
    const seen = new Set<string>();
    const collected: SourcedQuery[] = [];

    const add = (entries: readonly QueryEntry[], source: QuerySource) => {
      for (const entry of entries) {
        if (seen.has(entry.query)) {
          continue;
        }
        seen.add(entry.query);
        collected.push({ ...entry, source, tokens: tokenize(entry.query) });
      }
    };

    add(valueOr(record.topQueries, []), 'top');
    add(valueOr(record.risingQueries, []), 'rising');

    return collected;
  }
}
