/**
 * Fallback results used when a generation step fails. Each one says plainly
 * that the analysis is incomplete.
 */

import {
  CategorySuggestionResult,
  CompetitorAnalysisResult,
  FeatureEnhancementResult,
  FeatureGenerationResult,
  GoalsResult,
  MarketMaturityResult,
  ProblemsResult,
  TrendDirection,
} from '../types';

export function fallbackProblems(): ProblemsResult {
  return {
    problems: [
      {
        problem: 'Unable to extract specific problems due to a generation error',
        evidence: 'Analysis incomplete - please retry',
        severity: 5,
      },
    ],
    analysisSummary: 'Analysis failed - fallback response generated',
  };
}

export function fallbackMarketMaturity(direction: TrendDirection): MarketMaturityResult {
  return {
    stage: 'mid',
    confidence: 0.5,
    reasoning: 'Unable to complete analysis due to a generation error',
    trendDirection: direction === 'insufficient_data' ? 'stable' : direction,
  };
}

export function fallbackGoals(): GoalsResult {
  return {
    goals: [
      {
        goal: 'Solve user problems efficiently',
        targetAudience: 'General users',
        valueProposition: 'Improved user experience',
      },
    ],
  };
}

export function fallbackCategories(): CategorySuggestionResult {
  return {
    categories: [
      {
        category: 'General SaaS Solution',
        description: 'Standard SaaS application with basic features',
        keyFeatures: ['Basic functionality', 'User management', 'Data storage'],
        marketFitScore: 5,
      },
    ],
    recommendedCategory: 'General SaaS Solution - category analysis incomplete',
  };
}

export function fallbackFeatures(): FeatureGenerationResult {
  return {
    features: [
      {
        name: 'Basic Feature Set',
        description: 'Standard functionality for the application',
        innovationLevel: 3,
        complexity: 'medium',
        tags: ['basic', 'standard'],
        userValue: 'Provides essential functionality',
        competitiveAdvantage: 'Reliable basic features',
      },
    ],
    priorityRanking: ['Basic Feature Set'],
    mvpFeatures: ['Basic Feature Set'],
    advancedFeatures: [],
    technicalConsiderations: 'Standard implementation required',
  };
}

export function fallbackCompetitorAnalysis(): CompetitorAnalysisResult {
  return {
    competitors: [],
    marketGaps: [],
    differentiationOpportunities: ['Competitor analysis incomplete - please retry'],
  };
}

export function fallbackEnhancement(features: FeatureGenerationResult): FeatureEnhancementResult {
  return {
    enhancedFeatures: features.features.map((feature) => ({
      name: feature.name,
      description: feature.description,
      addressesGap: 'Not assessed',
    })),
    positioning: 'Enhancement incomplete - original features kept',
  };
}
