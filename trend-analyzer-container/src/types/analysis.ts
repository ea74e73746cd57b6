/**
 * Analysis Result Types
 *
 * Structured results returned by the generation stage for each task, the
 * competitor search results, and the progress events emitted during a run.
 */

import { TaskName, QualityAssessment } from './context';

export interface UserProblem {
  problem: string;
  evidence: string;
  severity: number; // 1 - 10
}

export interface ProblemsResult {
  problems: UserProblem[];
  analysisSummary: string;
}

export type MarketStage = 'early' | 'mid' | 'saturated';

export interface MarketMaturityResult {
  stage: MarketStage;
  confidence: number; // 0.0 to 1.0
  reasoning: string;
  trendDirection: string;
}

export interface SolutionGoal {
  goal: string;
  targetAudience: string;
  valueProposition: string;
}

export interface GoalsResult {
  goals: SolutionGoal[];
}

export interface SolutionCategory {
  category: string;
  description: string;
  keyFeatures: string[];
  marketFitScore: number; // 1 - 10
}

export interface CategorySuggestionResult {
  categories: SolutionCategory[];
  recommendedCategory: string;
}

export type ImplementationComplexity = 'low' | 'medium' | 'high';

export interface FeatureIdea {
  name: string;
  description: string;
  innovationLevel: number; // 1 - 10
  complexity: ImplementationComplexity;
  tags: string[];
  userValue: string;
  competitiveAdvantage: string;
}

export interface FeatureGenerationResult {
  features: FeatureIdea[];
  priorityRanking: string[]; // feature names, most important first
  mvpFeatures: string[];
  advancedFeatures: string[];
  technicalConsiderations: string;
}

/**
 * What feature generation builds on besides its own context
 */
export interface FeatureGenerationInputs {
  problems: ProblemsResult;
  maturity: MarketMaturityResult;
  goals: GoalsResult;
  categories: CategorySuggestionResult;
}

export interface CompetitorProfile {
  name: string;
  url?: string;
  strengths: string[];
  weaknesses: string[];
}

export interface CompetitorAnalysisResult {
  competitors: CompetitorProfile[];
  marketGaps: string[];
  differentiationOpportunities: string[];
}

export interface EnhancedFeature {
  name: string;
  description: string;
  addressesGap: string;
}

export interface FeatureEnhancementResult {
  enhancedFeatures: EnhancedFeature[];
  positioning: string;
}

export interface CompetitorSearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface AnalysisOptions {
  comparison: boolean;
  includeCompetitors: boolean;
}

/**
 * Generation steps: one per task context, plus the two steps that build on
 * earlier results instead of a context of their own
 */
export type SynthesisStep = TaskName | 'goal_extraction' | 'category_suggestion';

export interface AnalysisResult {
  runId: string;
  keyword: string;
  analyzedAt: string;
  trendsMetadata: Record<string, unknown>;
  dataQuality: QualityAssessment;
  problems: ProblemsResult;
  marketMaturity: MarketMaturityResult;
  solutionGoals: GoalsResult;
  saasOpportunities: CategorySuggestionResult;
  features: FeatureGenerationResult;
  competitorAnalysis: CompetitorAnalysisResult | null;
  enhancedFeatures: FeatureEnhancementResult | null;
  fallbackSteps: SynthesisStep[];
}

export type AnalysisStep =
  | 'start'
  | 'fetching_trends'
  | 'trends_fetched'
  | 'building_context'
  | 'extracting_problems'
  | 'analyzing_market'
  | 'extracting_goals'
  | 'suggesting_categories'
  | 'generating_features'
  | 'searching_competitors'
  | 'analyzing_competitors'
  | 'enhancing_features'
  | 'complete';

export type ProgressEvent =
  | { type: 'progress'; step: AnalysisStep; message: string; progress: number; timestamp: string }
  | { type: 'result'; message: string; result: AnalysisResult; timestamp: string }
  | { type: 'error'; message: string; step: AnalysisStep; timestamp: string };

export type ProgressListener = (event: ProgressEvent) => void;
