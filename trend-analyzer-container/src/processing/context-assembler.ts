/**
 * Context Assembler
 *
 * Combines an optimized view, the quality assessment and a few bounded
 * highlights from the insights into the payload for one generation task.
 * Values are passed through as they are.
 */

import { PipelineConfig } from '../config';
import { AssembledContext, EnrichedInsights, QualityAssessment, SummaryInsights, TaskOptimizedView } from '../types';

export class ContextAssembler {
  private readonly config: PipelineConfig;

  constructor(config: PipelineConfig) {
    this.config = config;
  }

  assemble<V extends TaskOptimizedView>(
    view: V,
    quality: QualityAssessment,
    insights: EnrichedInsights
  ): AssembledContext<V> {
    return {
      task: view.task,
      keyword: insights.keyword,
      optimized_data: view,
      data_quality: quality,
      summary_insights: this.summarize(insights),
    };
  }

  summarize(insights: EnrichedInsights): SummaryInsights {
    const { highVolatilityCv, highInterestMean, topClusterLabels } = this.config.summary;
    const counts = insights.problemSummary.categoryCounts;

    let volatility: SummaryInsights['market_trend']['volatility'] = 'unknown';
    if (insights.volatility !== null) {
      volatility = insights.volatility > highVolatilityCv ? 'high' : 'low';
    }

    let interestLevel: SummaryInsights['market_trend']['interest_level'] = 'unknown';
    if (insights.statistics !== null) {
      interestLevel = insights.statistics.mean > highInterestMean ? 'high' : 'low';
    }

    return {
      market_trend: {
        direction: insights.trend.direction,
        volatility,
        interest_level: interestLevel,
      },
      problem_landscape: {
        has_pain_points: counts.pain_point + counts.negative > 0,
        solution_seeking: counts.solution_seeking > 0,
        problem_density: Math.round(insights.problemSummary.problemDensity * 1000) / 1000,
        flagged_queries: insights.problemIndicators.length,
      },
      trend_characteristics: {
        is_seasonal: insights.themes.seasonal.length > 0,
        is_trending: insights.themes.trending.length > 0,
        is_technical: insights.themes.technical.length > 0,
      },
      top_clusters: insights.keywordClusters.slice(0, topClusterLabels).map((cluster) => cluster.label),
    };
  }
}
