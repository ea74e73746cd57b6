/**
 * Generation Client
 *
 * Turns assembled contexts into structured analysis results using Claude.
 * Every reply must contain one JSON object matching the task's result schema.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { GenerationConfig } from '../config';
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
import {
  categorySuggestionResultSchema,
  competitorAnalysisResultSchema,
  featureEnhancementResultSchema,
  featureGenerationResultSchema,
  goalsResultSchema,
  marketMaturityResultSchema,
  problemsResultSchema,
} from './result-schemas';

export interface GenerationClient {
  extractProblems(context: AssembledContext<ProblemExtractionView>): Promise<ProblemsResult>;

  analyzeMarketMaturity(context: AssembledContext<MarketMaturityView>): Promise<MarketMaturityResult>;

  extractGoals(keyword: string, problems: ProblemsResult): Promise<GoalsResult>;

  suggestCategories(
    keyword: string,
    goals: GoalsResult,
    maturity: MarketMaturityResult
  ): Promise<CategorySuggestionResult>;

  generateFeatures(
    context: AssembledContext<FeatureGenerationView>,
    inputs: FeatureGenerationInputs
  ): Promise<FeatureGenerationResult>;

  analyzeCompetitors(
    context: AssembledContext<CompetitorAnalysisView>,
    searchResults: CompetitorSearchResult[],
    features: FeatureGenerationResult
  ): Promise<CompetitorAnalysisResult>;

  enhanceFeatures(
    context: AssembledContext<FeatureEnhancementView>,
    features: FeatureGenerationResult,
    competitors: CompetitorAnalysisResult
  ): Promise<FeatureEnhancementResult>;
}

/**
 * Pull the outermost JSON object out of a model reply and validate it
 */
export function parseGeneratedJson<T>(text: string, schema: z.ZodType<T>, task: SynthesisStep): T {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new GenerationError('Could not find a JSON object in the model response', task);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonMatch[0]);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GenerationError(`Model response is not valid JSON: ${reason}`, task);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new GenerationError(`Model response does not match the ${task} result shape (${issues.join('; ')})`, task);
  }
  return result.data;
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export class AnthropicGenerationClient implements GenerationClient {
  private anthropic: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(config: GenerationConfig) {
    this.anthropic = new Anthropic({ apiKey: config.apiKey });
    this.model = config.model;
    this.maxTokens = config.maxTokens;
  }

  async extractProblems(context: AssembledContext<ProblemExtractionView>): Promise<ProblemsResult> {
    const prompt = `You are a product researcher identifying the problems people are trying to solve when they search for "${context.keyword}".

Search signals (problem-flavoured queries, rising problem queries and the top related queries):
${toJson(context.optimized_data)}

Data quality:
${toJson(context.data_quality)}

Market summary:
${toJson(context.summary_insights)}

Identify the concrete user problems behind these searches. Ground every problem in the queries above and rate its severity from 1 (minor annoyance) to 10 (blocking).

Return your analysis as a JSON object with this structure:
{
  "problems": [
    { "problem": "what users struggle with", "evidence": "queries that show it", "severity": 7 }
  ],
  "analysisSummary": "one paragraph summarising the problem landscape"
}`;

    return parseGeneratedJson(await this.complete(prompt, 'problem_extraction'), problemsResultSchema, 'problem_extraction');
  }

  async analyzeMarketMaturity(context: AssembledContext<MarketMaturityView>): Promise<MarketMaturityResult> {
    const prompt = `You are a market analyst judging how mature the market around "${context.keyword}" is.

Interest summary and a sample of the interest series (0-100 scale):
${toJson(context.optimized_data)}

Data quality:
${toJson(context.data_quality)}

Classify the market as "early" (growing interest, few established players), "mid" (steady interest, room for differentiation) or "saturated" (flat or declining interest, crowded). State your confidence between 0 and 1. If the data quality is weak, lower your confidence.

Return your analysis as a JSON object with this structure:
{
  "stage": "early|mid|saturated",
  "confidence": 0.7,
  "reasoning": "why the data points to this stage",
  "trendDirection": "rising|declining|stable"
}`;

    return parseGeneratedJson(
      await this.complete(prompt, 'market_maturity'),
      marketMaturityResultSchema,
      'market_maturity'
    );
  }

  async extractGoals(keyword: string, problems: ProblemsResult): Promise<GoalsResult> {
    const prompt = `You are a product strategist turning user problems around "${keyword}" into solution goals.

User problems:
${toJson(problems)}

For each problem define one goal that is specific, addresses the root cause, can be measured and has commercial potential. Name the primary audience and the core value proposition.

Return your goals as a JSON object with this structure:
{
  "goals": [
    { "goal": "clear goal statement", "targetAudience": "who it is for", "valueProposition": "why they would pay for it" }
  ]
}`;

    return parseGeneratedJson(await this.complete(prompt, 'goal_extraction'), goalsResultSchema, 'goal_extraction');
  }

  async suggestCategories(
    keyword: string,
    goals: GoalsResult,
    maturity: MarketMaturityResult
  ): Promise<CategorySuggestionResult> {
    const prompt = `You are a SaaS product expert choosing what kind of product to build for "${keyword}".

Solution goals:
${toJson(goals.goals)}

Market maturity:
${toJson(maturity)}

Suggest two or three distinct SaaS categories (for example analytics, automation, collaboration, integration or AI assistance) that serve these goals. Weigh competition, feasibility, monetization and time to market, and score each category's market fit from 1 to 10.

Return your suggestions as a JSON object with this structure:
{
  "categories": [
    { "category": "category name", "description": "what the product does", "keyFeatures": ["feature"], "marketFitScore": 7 }
  ],
  "recommendedCategory": "the category to pursue and why"
}`;

    return parseGeneratedJson(
      await this.complete(prompt, 'category_suggestion'),
      categorySuggestionResultSchema,
      'category_suggestion'
    );
  }

  async generateFeatures(
    context: AssembledContext<FeatureGenerationView>,
    inputs: FeatureGenerationInputs
  ): Promise<FeatureGenerationResult> {
    const { problems, maturity, goals, categories } = inputs;
    const prompt = `You are a product strategist designing a SaaS product for people searching for "${context.keyword}".

Keyword clusters, emerging queries and themes:
${toJson(context.optimized_data)}

User problems:
${toJson(problems.problems)}

Solution goals:
${toJson(goals.goals)}

Suggested categories (recommended: ${categories.recommendedCategory}):
${toJson(categories.categories)}

Market stage: ${maturity.stage} (confidence ${maturity.confidence}) - ${maturity.reasoning}

Propose features that reach these goals within the recommended category. Rate each feature's innovation from 1 to 10 and its implementation complexity as low, medium or high, and say how it sets the product apart. In an early market favour a focused MVP; in a saturated market favour differentiation.

Return your features as a JSON object with this structure:
{
  "features": [
    {
      "name": "feature name",
      "description": "what it does",
      "innovationLevel": 6,
      "complexity": "low|medium|high",
      "tags": ["tag"],
      "userValue": "which problem it solves and how",
      "competitiveAdvantage": "how it differs from existing products"
    }
  ],
  "priorityRanking": ["feature names, most important first"],
  "mvpFeatures": ["feature names for the first release"],
  "advancedFeatures": ["feature names for later releases"],
  "technicalConsiderations": "main implementation concerns"
}`;

    return parseGeneratedJson(
      await this.complete(prompt, 'feature_generation'),
      featureGenerationResultSchema,
      'feature_generation'
    );
  }

  async analyzeCompetitors(
    context: AssembledContext<CompetitorAnalysisView>,
    searchResults: CompetitorSearchResult[],
    features: FeatureGenerationResult
  ): Promise<CompetitorAnalysisResult> {
    const results = searchResults.map((result, i) => `${i + 1}. ${result.title} (${result.url})\n   ${result.snippet}`);

    const prompt = `You are a competitive analyst looking at existing products for "${context.keyword}".

Comparison queries and market context:
${toJson(context.optimized_data)}

Web search results:
${results.length > 0 ? results.join('\n') : 'No search results available'}

Planned features:
${features.features.map((feature) => `- ${feature.name}: ${feature.description}`).join('\n')}

Identify the main competitors with their strengths and weaknesses, the gaps none of them cover, and where the planned product can differentiate.

Return your analysis as a JSON object with this structure:
{
  "competitors": [
    { "name": "product", "url": "https://...", "strengths": ["..."], "weaknesses": ["..."] }
  ],
  "marketGaps": ["unmet need"],
  "differentiationOpportunities": ["how to stand out"]
}`;

    return parseGeneratedJson(
      await this.complete(prompt, 'competitor_analysis'),
      competitorAnalysisResultSchema,
      'competitor_analysis'
    );
  }

  async enhanceFeatures(
    context: AssembledContext<FeatureEnhancementView>,
    features: FeatureGenerationResult,
    competitors: CompetitorAnalysisResult
  ): Promise<FeatureEnhancementResult> {
    const prompt = `You are refining the feature set of a product for "${context.keyword}" against its competition.

Pain points, rising queries and cluster labels:
${toJson(context.optimized_data)}

Current features:
${toJson(features.features)}

Market gaps:
${competitors.marketGaps.map((gap) => `- ${gap}`).join('\n') || '- none identified'}

Differentiation opportunities:
${competitors.differentiationOpportunities.map((item) => `- ${item}`).join('\n') || '- none identified'}

Rewrite the features so each one addresses a gap or pain point competitors leave open, and describe the resulting positioning.

Return the result as a JSON object with this structure:
{
  "enhancedFeatures": [
    { "name": "feature name", "description": "refined description", "addressesGap": "gap or pain point it targets" }
  ],
  "positioning": "one paragraph positioning statement"
}`;

    return parseGeneratedJson(
      await this.complete(prompt, 'feature_enhancement'),
      featureEnhancementResultSchema,
      'feature_enhancement'
    );
  }

  private async complete(prompt: string, task: SynthesisStep): Promise<string> {
    const message = await this.anthropic.messages
      .create({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [
          {
            role: 'user',
            content: prompt,
          },
        ],
      })
      .catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        throw new GenerationError(`Claude request failed: ${reason}`, task);
      });

    const content = message.content[0];
    if (!content || content.type !== 'text') {
      throw new GenerationError('Unexpected response type from Claude', task);
    }
    return content.text;
  }
}
