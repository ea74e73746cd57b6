/**
 * Central export for all synthesis modules
 */

export * from './result-schemas';
export * from './fallbacks';
export * from './generation-client';

import { GenerationClient } from './generation-client';
import {
  fallbackCategories,
  fallbackCompetitorAnalysis,
  fallbackEnhancement,
  fallbackFeatures,
  fallbackGoals,
  fallbackMarketMaturity,
  fallbackProblems,
} from './fallbacks';
import { GenerationError } from '../errors';
import {
  AssembledContext,
  CategorySuggestionResult,
  CompetitorAnalysisResult,
  CompetitorAnalysisView,
  CompetitorSearchResult,
  FeatureEnhancementResult,
  FeatureEnhancementView,
  FeatureGenerationInputs,
  FeatureGenerationResult,
  FeatureGenerationView,
  GoalsResult,
  MarketMaturityResult,
  MarketMaturityView,
  ProblemExtractionView,
  ProblemsResult,
  SynthesisStep,
} from '../types';

export interface StepOutcome<T> {
  result: T;
  usedFallback: boolean;
}

export type SynthesisLogger = Pick<Console, 'log' | 'error'>;

/**
 * Synthesis Engine
 *
 * Runs one generation step at a time. A step whose generation fails with a
 * GenerationError is logged and replaced by that step's fallback result;
 * any other error propagates.
 */
export class SynthesisEngine {
  private generator: GenerationClient;
  private logger: SynthesisLogger;

  constructor(generator: GenerationClient, logger: SynthesisLogger = console) {
    this.generator = generator;
    this.logger = logger;
  }

  extractProblems(context: AssembledContext<ProblemExtractionView>): Promise<StepOutcome<ProblemsResult>> {
    return this.attempt(
      'problem_extraction',
      () => this.generator.extractProblems(context),
      () => fallbackProblems()
    );
  }

  analyzeMarketMaturity(context: AssembledContext<MarketMaturityView>): Promise<StepOutcome<MarketMaturityResult>> {
    return this.attempt(
      'market_maturity',
      () => this.generator.analyzeMarketMaturity(context),
      () => fallbackMarketMaturity(context.optimized_data.summary.trendDirection)
    );
  }

  extractGoals(keyword: string, problems: ProblemsResult): Promise<StepOutcome<GoalsResult>> {
    return this.attempt(
      'goal_extraction',
      () => this.generator.extractGoals(keyword, problems),
      () => fallbackGoals()
    );
  }

  suggestCategories(
    keyword: string,
    goals: GoalsResult,
    maturity: MarketMaturityResult
  ): Promise<StepOutcome<CategorySuggestionResult>> {
    return this.attempt(
      'category_suggestion',
      () => this.generator.suggestCategories(keyword, goals, maturity),
      () => fallbackCategories()
    );
  }

  generateFeatures(
    context: AssembledContext<FeatureGenerationView>,
    inputs: FeatureGenerationInputs
  ): Promise<StepOutcome<FeatureGenerationResult>> {
    return this.attempt(
      'feature_generation',
      () => this.generator.generateFeatures(context, inputs),
      () => fallbackFeatures()
    );
  }

  analyzeCompetitors(
    context: AssembledContext<CompetitorAnalysisView>,
    searchResults: CompetitorSearchResult[],
    features: FeatureGenerationResult
  ): Promise<StepOutcome<CompetitorAnalysisResult>> {
    return this.attempt(
      'competitor_analysis',
      () => this.generator.analyzeCompetitors(context, searchResults, features),
      () => fallbackCompetitorAnalysis()
    );
  }

  enhanceFeatures(
    context: AssembledContext<FeatureEnhancementView>,
    features: FeatureGenerationResult,
    competitors: CompetitorAnalysisResult
  ): Promise<StepOutcome<FeatureEnhancementResult>> {
    return this.attempt(
      'feature_enhancement',
      () => this.generator.enhanceFeatures(context, features, competitors),
      () => fallbackEnhancement(features)
    );
  }

  private async attempt<T>(task: SynthesisStep, run: () => Promise<T>, fallback: () => T): Promise<StepOutcome<T>> {
    try {
      const result = await run();
      this.logger.log(`✓ ${task} complete`);
      return { result, usedFallback: false };
    } catch (error) {
      if (!(error instanceof GenerationError)) {
        throw error;
      }
      this.logger.error(`Error in ${task}: ${error.message}. Using fallback result.`);
      return { result: fallback(), usedFallback: true };
    }
  }
}
