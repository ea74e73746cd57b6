/**
 * Generation Result Schemas
 *
 * The model answers in JSON; these schemas decide whether an answer can be
 * used as-is.
 */

import { z } from 'zod';
import {
  CategorySuggestionResult,
  CompetitorAnalysisResult,
  FeatureEnhancementResult,
  FeatureGenerationResult,
  GoalsResult,
  MarketMaturityResult,
  ProblemsResult,
} from '../types';

export const problemsResultSchema: z.ZodType<ProblemsResult> = z.object({
  problems: z.array(
    z.object({
      problem: z.string(),
      evidence: z.string(),
      severity: z.number().min(1).max(10),
    })
  ),
  analysisSummary: z.string(),
});

export const marketMaturityResultSchema: z.ZodType<MarketMaturityResult> = z.object({
  stage: z.enum(['early', 'mid', 'saturated']),
  confidence: z.number().min(0).max(1),
  reasoning: z.string(),
  trendDirection: z.string(),
});

export const goalsResultSchema: z.ZodType<GoalsResult> = z.object({
  goals: z.array(
    z.object({
      goal: z.string(),
      targetAudience: z.string(),
      valueProposition: z.string(),
    })
  ),
});

export const categorySuggestionResultSchema: z.ZodType<CategorySuggestionResult> = z.object({
  categories: z.array(
    z.object({
      category: z.string(),
      description: z.string(),
      keyFeatures: z.array(z.string()),
      marketFitScore: z.number().int().min(1).max(10),
    })
  ),
  recommendedCategory: z.string(),
});

export const featureGenerationResultSchema: z.ZodType<FeatureGenerationResult> = z.object({
  features: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      innovationLevel: z.number().min(1).max(10),
      complexity: z.enum(['low', 'medium', 'high']),
      tags: z.array(z.string()),
      userValue: z.string(),
      competitiveAdvantage: z.string(),
    })
  ),
  priorityRanking: z.array(z.string()),
  mvpFeatures: z.array(z.string()),
  advancedFeatures: z.array(z.string()),
  technicalConsiderations: z.string(),
});

export const competitorAnalysisResultSchema: z.ZodType<CompetitorAnalysisResult> = z.object({
  competitors: z.array(
    z.object({
      name: z.string(),
      url: z.string().optional(),
      strengths: z.array(z.string()),
      weaknesses: z.array(z.string()),
    })
  ),
  marketGaps: z.array(z.string()),
  differentiationOpportunities: z.array(z.string()),
});

export const featureEnhancementResultSchema: z.ZodType<FeatureEnhancementResult> = z.object({
  enhancedFeatures: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      addressesGap: z.string(),
    })
  ),
  positioning: z.string(),
});
