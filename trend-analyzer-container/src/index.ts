#!/usr/bin/env node
/**
 * Trend Opportunity Analyzer - Main Entry Point
 *
 * Orchestrates a full analysis run for one keyword:
 * 1. Ingestion: Fetch trends data for the keyword
 * 2. Processing: Clean, enrich and assess it, then build one bounded context per task
 * 3. Synthesis: Problems -> Market maturity -> Goals -> Categories -> Features
 * 4. Competition: Search competitors, analyze them and enhance the features
 */

import { v4 as uuidv4 } from 'uuid';
import { CompetitorSearchClient, HttpCompetitorSearchClient, TrendsClient, TrendsSource, buildCompetitorQueries } from './ingestion';
import { ProcessingPipeline, isTaskName } from './processing';
import { AnthropicGenerationClient, GenerationClient, SynthesisEngine } from './synthesis';
import { AnalyzerConfig, DEFAULT_PIPELINE_CONFIG, PipelineConfig, loadConfig } from './config';
import { CompetitorSearchError, InvalidTaskError } from './errors';
import {
  AnalysisOptions,
  AnalysisResult,
  AnalysisStep,
  CompetitorAnalysisResult,
  CompetitorSearchResult,
  FeatureEnhancementResult,
  ProgressEvent,
  ProgressListener,
  SynthesisStep,
  TASK_NAMES,
  valueOr,
} from './types';

export * from './types';
export * from './errors';
export * from './config';
export * from './processing';
export * from './ingestion';
export * from './synthesis';

const DEFAULT_OPTIONS: AnalysisOptions = {
  comparison: false,
  includeCompetitors: true,
};

export type AnalyzerLogger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface AnalyzerDependencies {
  trends: TrendsSource;
  generator: GenerationClient;
  competitorSearch?: CompetitorSearchClient;
  pipelineConfig?: PipelineConfig;
  logger?: AnalyzerLogger;
}

export class TrendOpportunityAnalyzer {
  private trends: TrendsSource;
  private competitorSearch?: CompetitorSearchClient;
  private pipeline: ProcessingPipeline;
  private synthesisEngine: SynthesisEngine;
  private logger: AnalyzerLogger;

  constructor(dependencies: AnalyzerDependencies) {
    this.logger = dependencies.logger ?? console;
    this.trends = dependencies.trends;
    this.competitorSearch = dependencies.competitorSearch;
    this.pipeline = new ProcessingPipeline(dependencies.pipelineConfig ?? DEFAULT_PIPELINE_CONFIG, {
      logger: this.logger,
    });
    this.synthesisEngine = new SynthesisEngine(dependencies.generator, this.logger);
  }

  /**
   * Run the complete analysis for a keyword
   *
   * Progress is reported through `onProgress`. A failing run emits an
   * `error` event for the step it failed in and rethrows.
   */
  async analyze(
    keyword: string,
    options: Partial<AnalysisOptions> = {},
    onProgress?: ProgressListener
  ): Promise<AnalysisResult> {
    const settings: AnalysisOptions = { ...DEFAULT_OPTIONS, ...options };
    const runId = uuidv4();
    const fallbackSteps: SynthesisStep[] = [];
    let currentStep: AnalysisStep = 'start';

    const emit = (event: ProgressEvent): void => {
      onProgress?.(event);
    };
    const report = (step: AnalysisStep, message: string, progress: number): void => {
      currentStep = step;
      emit({ type: 'progress', step, message, progress, timestamp: new Date().toISOString() });
    };

    this.logger.log('\n╔════════════════════════════════════════════════════════╗');
    this.logger.log('║        TREND OPPORTUNITY ANALYSIS - STARTING           ║');
    this.logger.log('╚════════════════════════════════════════════════════════╝\n');
    this.logger.log(`Run ${runId}: "${keyword}"`);

    const startTime = Date.now();

    try {
      report('start', `Starting analysis for "${keyword}"`, 0);

      // Step 1: Fetch trends
      report('fetching_trends', 'Fetching trends data', 10);
      const raw = await this.trends.fetch(keyword, settings.comparison);
      report('trends_fetched', 'Trends data received', 20);

      // Step 2: Build contexts
      report('building_context', 'Cleaning and enriching trends data', 25);
      const prepared = this.pipeline.prepare({ ...raw, keyword: raw.keyword ?? keyword });

      // Step 3: Problems
      report('extracting_problems', 'Extracting user problems', 30);
      const problems = await this.synthesisEngine.extractProblems(
        this.pipeline.buildTaskContext(prepared, 'problem_extraction')
      );
      if (problems.usedFallback) {
        fallbackSteps.push('problem_extraction');
      }

      // Step 4: Market maturity
      report('analyzing_market', 'Analyzing market maturity', 45);
      const maturity = await this.synthesisEngine.analyzeMarketMaturity(
        this.pipeline.buildTaskContext(prepared, 'market_maturity')
      );
      if (maturity.usedFallback) {
        fallbackSteps.push('market_maturity');
      }

      // Step 5: Solution goals
      const analyzedKeyword = valueOr(prepared.record.keyword, keyword);
      report('extracting_goals', 'Extracting solution goals', 55);
      const goals = await this.synthesisEngine.extractGoals(analyzedKeyword, problems.result);
      if (goals.usedFallback) {
        fallbackSteps.push('goal_extraction');
      }

      // Step 6: Solution categories
      report('suggesting_categories', 'Suggesting SaaS solution categories', 62);
      const categories = await this.synthesisEngine.suggestCategories(
        analyzedKeyword,
        goals.result,
        maturity.result
      );
      if (categories.usedFallback) {
        fallbackSteps.push('category_suggestion');
      }

      // Step 7: Features
      report('generating_features', 'Generating feature ideas', 70);
      const features = await this.synthesisEngine.generateFeatures(
        this.pipeline.buildTaskContext(prepared, 'feature_generation'),
        {
          problems: problems.result,
          maturity: maturity.result,
          goals: goals.result,
          categories: categories.result,
        }
      );
      if (features.usedFallback) {
        fallbackSteps.push('feature_generation');
      }

      // Step 8: Competition
      let competitorAnalysis: CompetitorAnalysisResult | null = null;
      let enhancedFeatures: FeatureEnhancementResult | null = null;

      if (settings.includeCompetitors && this.competitorSearch) {
        const competitorContext = this.pipeline.buildTaskContext(prepared, 'competitor_analysis');

        report('searching_competitors', 'Searching for competitors', 80);
        const queries = buildCompetitorQueries(keyword, competitorContext.optimized_data.comparisonQueries);
        const searchResults = await this.searchCompetitors(this.competitorSearch, queries);

        report('analyzing_competitors', 'Analyzing competitors', 88);
        const competitors = await this.synthesisEngine.analyzeCompetitors(
          competitorContext,
          searchResults,
          features.result
        );
        if (competitors.usedFallback) {
          fallbackSteps.push('competitor_analysis');
        }
        competitorAnalysis = competitors.result;

        report('enhancing_features', 'Enhancing features against competitors', 95);
        const enhancement = await this.synthesisEngine.enhanceFeatures(
          this.pipeline.buildTaskContext(prepared, 'feature_enhancement'),
          features.result,
          competitors.result
        );
        if (enhancement.usedFallback) {
          fallbackSteps.push('feature_enhancement');
        }
        enhancedFeatures = enhancement.result;
      } else if (settings.includeCompetitors) {
        this.logger.warn('⚠️  Competitor search is not configured; skipping competitor analysis');
      }

      const result: AnalysisResult = {
        runId,
        keyword,
        analyzedAt: new Date().toISOString(),
        trendsMetadata: raw.metadata ?? {},
        dataQuality: prepared.quality,
        problems: problems.result,
        marketMaturity: maturity.result,
        solutionGoals: goals.result,
        saasOpportunities: categories.result,
        features: features.result,
        competitorAnalysis,
        enhancedFeatures,
        fallbackSteps,
      };

      report('complete', 'Analysis complete', 100);
      emit({ type: 'result', message: 'Analysis complete', result, timestamp: new Date().toISOString() });

      const duration = ((Date.now() - startTime) / 1000).toFixed(1);
      this.logger.log('\n╔════════════════════════════════════════════════════════╗');
      this.logger.log('║        TREND OPPORTUNITY ANALYSIS - COMPLETE           ║');
      this.logger.log('╚════════════════════════════════════════════════════════╝\n');
      this.logger.log('Summary:');
      this.logger.log(`  ⏱️  Duration: ${duration}s`);
      this.logger.log(`  🧩 Problems: ${result.problems.problems.length}`);
      this.logger.log(`  📈 Market stage: ${result.marketMaturity.stage}`);
      this.logger.log(`  🧭 Goals: ${result.solutionGoals.goals.length}`);
      this.logger.log(`  🗂️  Recommended category: ${result.saasOpportunities.recommendedCategory}`);
      this.logger.log(`  🎯 Features: ${result.features.features.length}`);
      if (fallbackSteps.length > 0) {
        this.logger.warn(`⚠️  Fallback results used for: ${fallbackSteps.join(', ')}`);
      }

      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`\n❌ ERROR during ${currentStep}:`, message);
      emit({ type: 'error', message, step: currentStep, timestamp: new Date().toISOString() });
      throw error;
    }
  }

  private async searchCompetitors(
    client: CompetitorSearchClient,
    queries: string[]
  ): Promise<CompetitorSearchResult[]> {
    const results: CompetitorSearchResult[] = [];
    const seen = new Set<string>();

    for (const query of queries) {
      try {
        for (const result of await client.search(query)) {
          if (!seen.has(result.url)) {
            seen.add(result.url);
            results.push(result);
          }
        }
      } catch (error) {
        if (!(error instanceof CompetitorSearchError)) {
          throw error;
        }
        this.logger.warn(`⚠️  ${error.message} (query: "${query}")`);
      }
    }

    this.logger.log(`✓ Found ${results.length} competitor search results`);
    return results;
  }
}

/**
 * Build an analyzer wired to the configured services
 */
export function createAnalyzer(config: AnalyzerConfig): TrendOpportunityAnalyzer {
  return new TrendOpportunityAnalyzer({
    trends: new TrendsClient(config.trends),
    generator: new AnthropicGenerationClient(config.generation),
    competitorSearch: config.competitorSearch.apiUrl
      ? new HttpCompetitorSearchClient(config.competitorSearch)
      : undefined,
    pipelineConfig: config.pipeline,
  });
}

const USAGE = `Usage:
  trend-analyzer analyze <keyword> [--compare] [--no-competitors]
  trend-analyzer context <keyword> <task>

Tasks: ${TASK_NAMES.join(', ')}`;

/**
 * CLI Entry Point
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  const [command, keyword, ...rest] = args;
  const config = loadConfig();

  switch (command) {
    case 'analyze': {
      if (!keyword) {
        console.log(USAGE);
        process.exitCode = 1;
        return;
      }
      if (!config.generation.apiKey) {
        console.error('ANTHROPIC_API_KEY is not set');
        process.exitCode = 1;
        return;
      }
      const analyzer = createAnalyzer(config);
      const result = await analyzer.analyze(keyword, {
        comparison: rest.includes('--compare'),
        includeCompetitors: !rest.includes('--no-competitors'),
      });
      console.log(JSON.stringify(result, null, 2));
      break;
    }
    case 'context': {
      const task = rest[0];
      if (!keyword || !task) {
        console.log(USAGE);
        process.exitCode = 1;
        return;
      }
      if (!isTaskName(task)) {
        throw new InvalidTaskError(task, TASK_NAMES);
      }
      const raw = await new TrendsClient(config.trends).fetch(keyword);
      const pipeline = new ProcessingPipeline(config.pipeline);
      const context = pipeline.build({ ...raw, keyword: raw.keyword ?? keyword }, task);
      console.log(JSON.stringify(context, null, 2));
      break;
    }
    default:
      console.log(USAGE);
      process.exitCode = 1;
  }
}

// Run if called directly
if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export default TrendOpportunityAnalyzer;
