/**
 * Configuration Management
 *
 * Centralized configuration for the Trend Opportunity Analyzer.
 * Uses environment variables with sensible defaults. The pipeline section is
 * frozen and handed to each processing stage when it is constructed.
 */

import { z } from 'zod';
import lexiconData from './data/lexicons.json';
import { ConfigurationError } from './errors';
import { ProblemCategory, ThemeName } from './types';

export interface LexiconConfig {
  problemTerms: Record<ProblemCategory, readonly string[]>;
  themeTerms: Record<ThemeName, readonly string[]>;
  stopwords: readonly string[];
}

export interface TrendConfig {
  directionThreshold: number; // relative change, 0.15 = 15%
  minSeriesLength: number; // below this, direction is insufficient_data
}

export interface ClusteringConfig {
  minClusterSize: number;
}

export interface QualityConfig {
  weights: {
    interest: number;
    related: number;
    rising: number;
  };
  shortSeriesPenalty: number;
  minUsefulSeriesLength: number;
}

export interface LimitsConfig {
  problemIndicators: number;
  risingProblems: number;
  contextQueries: number;
  interestSamplePoints: number;
  clusters: number;
  clusterMembers: number;
  emergingQueries: number;
  themeMatches: number;
  comparisonQueries: number;
  competitorTopQueries: number;
  painPoints: number;
  enhancementRisingQueries: number;
  clusterLabels: number;
}

export interface SummaryConfig {
  highVolatilityCv: number;
  highInterestMean: number;
  topClusterLabels: number;
}

export interface PipelineConfig {
  lexicons: LexiconConfig;
  trend: TrendConfig;
  clustering: ClusteringConfig;
  quality: QualityConfig;
  limits: LimitsConfig;
  summary: SummaryConfig;
}

export type PipelineConfigOverrides = {
  [K in keyof PipelineConfig]?: Partial<PipelineConfig[K]>;
};

export interface TrendsServiceConfig {
  apiUrl: string;
  timeoutMs: number;
}

export interface GenerationConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
}

export interface CompetitorSearchConfig {
  apiUrl: string;
  apiKey?: string;
  resultLimit: number;
}

export interface AnalyzerConfig {
  trends: TrendsServiceConfig;
  generation: GenerationConfig;
  competitorSearch: CompetitorSearchConfig;
  pipeline: PipelineConfig;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

const lexicons: LexiconConfig = lexiconData;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = deepFreeze({
  lexicons: {
    problemTerms: { ...lexicons.problemTerms },
    themeTerms: { ...lexicons.themeTerms },
    stopwords: [...lexicons.stopwords],
  },
  trend: {
    directionThreshold: 0.15,
    minSeriesLength: 6,
  },
  clustering: {
    minClusterSize: 2,
  },
  quality: {
    weights: { interest: 0.5, related: 0.3, rising: 0.2 },
    shortSeriesPenalty: 0.2,
    minUsefulSeriesLength: 6,
  },
  limits: {
    problemIndicators: 10,
    risingProblems: 5,
    contextQueries: 3,
    interestSamplePoints: 12,
    clusters: 5,
    clusterMembers: 5,
    emergingQueries: 8,
    themeMatches: 5,
    comparisonQueries: 10,
    competitorTopQueries: 5,
    painPoints: 8,
    enhancementRisingQueries: 5,
    clusterLabels: 5,
  },
  summary: {
    highVolatilityCv: 0.3,
    highInterestMean: 50,
    topClusterLabels: 3,
  },
});

/**
 * Build a frozen pipeline config from the defaults and per-section overrides
 */
export function createPipelineConfig(
  overrides: PipelineConfigOverrides = {},
  base: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): PipelineConfig {
  return deepFreeze({
    lexicons: { ...base.lexicons, ...overrides.lexicons },
    trend: { ...base.trend, ...overrides.trend },
    clustering: { ...base.clustering, ...overrides.clustering },
    quality: { ...base.quality, ...overrides.quality },
    limits: { ...base.limits, ...overrides.limits },
    summary: { ...base.summary, ...overrides.summary },
  });
}

const positiveInt = z.number().int().positive();
const ratio = z.number().positive().max(1);
const positiveNumber = z.number().positive();

/**
 * Numeric environment value, or the fallback when unset
 *
 * @throws ConfigurationError when the value is set but not a valid number
 */
function readNumber(env: NodeJS.ProcessEnv, variable: string, schema: z.ZodNumber, fallback: number): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const parsed = schema.safeParse(Number(raw));
  if (!parsed.success) {
    throw new ConfigurationError(variable, raw, parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AnalyzerConfig {
  const minSeriesLength = readNumber(env, 'MIN_SERIES_LENGTH', positiveInt, 6);

  return {
    trends: {
      apiUrl: env.TRENDS_API_BASE_URL || 'http://localhost:8000',
      timeoutMs: readNumber(env, 'TRENDS_TIMEOUT_MS', positiveInt, 30000),
    },
    generation: {
      apiKey: env.ANTHROPIC_API_KEY || '',
      model: env.ANTHROPIC_MODEL || 'claude-sonnet-4-5-20250929',
      maxTokens: readNumber(env, 'GENERATION_MAX_TOKENS', positiveInt, 4000),
    },
    competitorSearch: {
      apiUrl: env.COMPETITOR_SEARCH_URL || '',
      apiKey: env.COMPETITOR_SEARCH_API_KEY,
      resultLimit: readNumber(env, 'COMPETITOR_RESULT_LIMIT', positiveInt, 5),
    },
    pipeline: createPipelineConfig({
      trend: {
        directionThreshold: readNumber(env, 'TREND_DIRECTION_THRESHOLD', ratio, 0.15),
        minSeriesLength,
      },
      quality: { minUsefulSeriesLength: minSeriesLength },
      limits: { interestSamplePoints: readNumber(env, 'INTEREST_SAMPLE_POINTS', positiveInt, 12) },
      summary: { highVolatilityCv: readNumber(env, 'HIGH_VOLATILITY_CV', positiveNumber, 0.3) },
    }),
  };
}
