/**
 * Quality Assessor
 *
 * Scores how much of the expected data shape a cleaned record actually
 * carries and turns the gaps into recommendations.
 *
 * Score = weighted presence of interest data, related queries and rising
 * searches, minus a penalty when the interest series is too short to read a
 * trend from. Interest data carries the highest weight because the market
 * maturity stage depends on it.
 */

import { PipelineConfig } from '../config';
import { CleanedTrendsRecord, CleaningReport, QualityAssessment, valueOr } from '../types';

const NO_ADJUSTMENTS: CleaningReport = {
  clampedValues: 0,
  droppedPoints: 0,
  droppedQueries: 0,
  duplicateQueries: 0,
};

export class QualityAssessor {
  private readonly config: PipelineConfig;

  constructor(config: PipelineConfig) {
    this.config = config;
  }

  /**
   * Assess a cleaned record. The optional report only feeds the adjustment
   * counts; it never changes the score.
   */
  assess(record: CleanedTrendsRecord, report: CleaningReport = NO_ADJUSTMENTS): QualityAssessment {
    const { weights, shortSeriesPenalty, minUsefulSeriesLength } = this.config.quality;

    const interestPoints = valueOr(record.interestOverTime, []).length;
    const hasInterestData = interestPoints > 0;
    const hasRelatedQueries = valueOr(record.topQueries, []).length > 0;
    const hasRisingSearches = valueOr(record.risingQueries, []).length > 0;
    const seriesTooShort = hasInterestData && interestPoints < minUsefulSeriesLength;

    let score =
      (hasInterestData ? weights.interest : 0) +
      (hasRelatedQueries ? weights.related : 0) +
      (hasRisingSearches ? weights.rising : 0);

    if (seriesTooShort) {
      score -= shortSeriesPenalty;
    }

    score = Math.round(Math.min(1, Math.max(0, score)) * 1000) / 1000;

    const recommendations: string[] = [];

    if (!hasInterestData) {
      recommendations.push(
        'No interest-over-time data available; market maturity can only be judged from query signals'
      );
    } else if (seriesTooShort) {
      recommendations.push(
        `Interest series too short for reliable trend direction (${interestPoints} points, at least ${minUsefulSeriesLength} recommended)`
      );
    }

    if (!hasRelatedQueries) {
      recommendations.push('No related queries found; try a broader or more common keyword');
    }

    if (!hasRisingSearches) {
      recommendations.push('No rising searches found; emerging demand signals are unavailable');
    }

    return {
      data_completeness_score: score,
      has_interest_data: hasInterestData,
      has_related_queries: hasRelatedQueries,
      has_rising_searches: hasRisingSearches,
      interest_points: interestPoints,
      recommendations,
      adjustments: {
        clamped_values: report.clampedValues,
        dropped_points: report.droppedPoints,
        dropped_queries: report.droppedQueries,
        duplicate_queries: report.duplicateQueries,
      },
    };
  }
}
