/**
 * Competitor Search
 *
 * Looks up live web results for competitor queries. The search endpoint is
 * expected to answer with `organic_results` entries carrying a title, link
 * and snippet.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { CompetitorSearchConfig } from '../config';
import { CompetitorSearchError } from '../errors';
import { CompetitorSearchResult } from '../types';

export interface CompetitorSearchClient {
  search(query: string): Promise<CompetitorSearchResult[]>;
}

const searchResponseSchema = z.object({
  organic_results: z
    .array(
      z.object({
        title: z.string(),
        link: z.string(),
        snippet: z.string().nullish(),
      })
    )
    .nullish(),
});

/**
 * Build search queries from the keyword and its comparison queries
 */
export function buildCompetitorQueries(keyword: string, comparisonQueries: readonly string[], max: number = 3): string[] {
  const queries = [`${keyword} software`, `${keyword} alternatives`, ...comparisonQueries];
  return Array.from(new Set(queries.map((query) => query.trim().toLowerCase()))).slice(0, max);
}

export class HttpCompetitorSearchClient implements CompetitorSearchClient {
  private http: AxiosInstance;
  private apiKey?: string;
  private resultLimit: number;

  constructor(config: CompetitorSearchConfig, http?: AxiosInstance) {
    this.http = http ?? axios.create({ baseURL: config.apiUrl, timeout: 15000 });
    this.apiKey = config.apiKey;
    this.resultLimit = config.resultLimit;
  }

  async search(query: string): Promise<CompetitorSearchResult[]> {
    let body: unknown;

    try {
      const response = await this.http.get<unknown>('', {
        params: { q: query, api_key: this.apiKey, num: this.resultLimit },
      });
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new CompetitorSearchError(`Competitor search failed: ${error.message}`, query, error.response?.status);
      }
      throw error;
    }

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CompetitorSearchError('Competitor search returned an unexpected payload', query);
    }

    return (parsed.data.organic_results ?? []).slice(0, this.resultLimit).map((result) => ({
      title: result.title,
      url: result.link,
      snippet: result.snippet ?? '',
    }));
  }
}
