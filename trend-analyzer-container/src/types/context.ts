/**
 * Insight, View and Context Types
 *
 * These types represent the derived data built from a cleaned trends record,
 * up to the payload handed to the generation stage.
 */

import { InterestPoint, QuerySource } from './trends';

export const TASK_NAMES = [
  'problem_extraction',
  'market_maturity',
  'feature_generation',
  'competitor_analysis',
  'feature_enhancement',
] as const;

export type TaskName = (typeof TASK_NAMES)[number];

export type TrendDirection = 'rising' | 'falling' | 'stable' | 'insufficient_data';

export type ProblemCategory = 'pain_point' | 'solution_seeking' | 'comparison' | 'negative';

export type ThemeName = 'seasonal' | 'trending' | 'technical';

export interface SeriesStatistics {
  count: number;
  mean: number;
  median: number;
  min: number;
  max: number;
  stdDev: number;
}

export interface TrendAssessment {
  direction: TrendDirection;
  changePercent: number | null;
}

export interface ProblemIndicator {
  query: string;
  value: number;
  source: QuerySource;
  categories: ProblemCategory[];
  matchedTerms: string[];
}

export interface ProblemSummary {
  categoryCounts: Record<ProblemCategory, number>;
  totalQueriesAnalyzed: number;
  problemDensity: number;
}

export interface KeywordCluster {
  label: string;
  queries: string[];
}

export interface EnrichedInsights {
  keyword: string | null;
  statistics: SeriesStatistics | null;
  trend: TrendAssessment;
  volatility: number | null;
  problemIndicators: ProblemIndicator[];
  problemSummary: ProblemSummary;
  keywordClusters: KeywordCluster[];
  themes: Record<ThemeName, string[]>;
}

export interface RankedQuery {
  query: string;
  value: number;
}

export interface ProblemExtractionView {
  task: 'problem_extraction';
  problemIndicators: ProblemIndicator[];
  risingProblems: RankedQuery[];
  contextQueries: RankedQuery[];
  categoryCounts: Record<ProblemCategory, number>;
}

export interface MarketSummary {
  mean: number | null;
  median: number | null;
  min: number | null;
  max: number | null;
  volatility: number | null;
  trendDirection: TrendDirection;
  changePercent: number | null;
  pointCount: number;
}

export interface MarketMaturityView {
  task: 'market_maturity';
  summary: MarketSummary;
  interestSample: InterestPoint[];
}

export interface FeatureGenerationView {
  task: 'feature_generation';
  clusters: KeywordCluster[];
  emergingQueries: string[];
  trendingTopics: string[];
  technicalInterest: string[];
  problemCounts: Record<ProblemCategory, number>;
}

export interface CompetitorAnalysisView {
  task: 'competitor_analysis';
  comparisonQueries: string[];
  topQueries: string[];
  market: {
    trendDirection: TrendDirection;
    averageInterest: number | null;
  };
}

export interface FeatureEnhancementView {
  task: 'feature_enhancement';
  painPoints: string[];
  risingQueries: string[];
  clusterLabels: string[];
}

export type TaskOptimizedView =
  | ProblemExtractionView
  | MarketMaturityView
  | FeatureGenerationView
  | CompetitorAnalysisView
  | FeatureEnhancementView;

export type ViewForTask<T extends TaskName> = Extract<TaskOptimizedView, { task: T }>;

export interface QualityAssessment {
  data_completeness_score: number; // 0.0 to 1.0
  has_interest_data: boolean;
  has_related_queries: boolean;
  has_rising_searches: boolean;
  interest_points: number;
  recommendations: string[];
  adjustments: {
    clamped_values: number;
    dropped_points: number;
    dropped_queries: number;
    duplicate_queries: number;
  };
}

export interface SummaryInsights {
  market_trend: {
    direction: TrendDirection;
    volatility: 'high' | 'low' | 'unknown';
    interest_level: 'high' | 'low' | 'unknown';
  };
  problem_landscape: {
    has_pain_points: boolean;
    solution_seeking: boolean;
    problem_density: number;
    flagged_queries: number;
  };
  trend_characteristics: {
    is_seasonal: boolean;
    is_trending: boolean;
    is_technical: boolean;
  };
  top_clusters: string[];
}

export interface AssembledContext<V extends TaskOptimizedView = TaskOptimizedView> {
  task: V['task'];
  keyword: string | null;
  optimized_data: V;
  data_quality: QualityAssessment;
  summary_insights: SummaryInsights;
}
