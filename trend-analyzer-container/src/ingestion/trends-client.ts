/**
 * Trends Client
 *
 * Fetches trends data for a keyword from the trends service and maps the
 * service's response onto a raw trends record.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { TrendsServiceConfig } from '../config';
import { MalformedRecordError, TrendsSourceError } from '../errors';
import { toContractIssues } from '../processing/record-schema';
import { RawTrendsRecord } from '../types';

const queryListsSchema = z
  .object({
    top: z.array(z.unknown()).nullish(),
    rising: z.array(z.unknown()).nullish(),
  })
  .nullish();

export const trendsServiceResponseSchema = z.object({
  keyword: z.string().nullish(),
  comparison_enabled: z.boolean().nullish(),
  interest_over_time: z.array(z.unknown()).nullish(),
  related_queries: queryListsSchema,
  rising_searches: queryListsSchema,
  metadata: z.record(z.unknown()).nullish(),
});

export type TrendsServiceResponse = z.infer<typeof trendsServiceResponseSchema>;

/**
 * Map the service response onto a raw record
 *
 * Top queries come from `related_queries.top`. Rising queries are
 * `related_queries.rising` followed by `rising_searches.rising`; the cleaner
 * drops the overlap. `rising_searches.top` holds related topics.
 */
export function parseTrendsResponse(body: unknown): RawTrendsRecord {
  const parsed = trendsServiceResponseSchema.safeParse(body);

  if (!parsed.success) {
    throw new MalformedRecordError('Trends service returned an unexpected payload', toContractIssues(parsed.error));
  }

  const data = parsed.data;
  const record: RawTrendsRecord = {};

  if (data.keyword) {
    record.keyword = data.keyword;
  }
  if (data.interest_over_time) {
    record.interestOverTime = data.interest_over_time;
  }
  if (data.related_queries?.top) {
    record.topQueries = data.related_queries.top;
  }

  const rising: unknown[] = [...(data.related_queries?.rising ?? []), ...(data.rising_searches?.rising ?? [])];
  if (data.related_queries?.rising || data.rising_searches?.rising) {
    record.risingQueries = rising;
  }

  if (data.rising_searches?.top) {
    record.relatedTopics = data.rising_searches.top;
  }
  if (data.metadata) {
    record.metadata = data.metadata;
  }

  return record;
}

export interface TrendsSource {
  fetch(keyword: string, comparison?: boolean): Promise<RawTrendsRecord>;
}

export class TrendsClient implements TrendsSource {
  private http: AxiosInstance;

  constructor(config: TrendsServiceConfig, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: config.apiUrl.replace(/\/+$/, ''),
        timeout: config.timeoutMs,
      });
  }

  /**
   * Fetch trends data for a keyword
   */
  async fetch(keyword: string, comparison: boolean = false): Promise<RawTrendsRecord> {
    try {
      const response = await this.http.get<unknown>(`/analyze/${encodeURIComponent(keyword)}`, {
        params: { cmp: comparison },
      });
      return parseTrendsResponse(response.data);
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const detail = status ? `returned error ${status}` : `could not be reached: ${error.message}`;
        throw new TrendsSourceError(`Trends service ${detail}`, keyword, status);
      }
      throw error;
    }
  }
}
