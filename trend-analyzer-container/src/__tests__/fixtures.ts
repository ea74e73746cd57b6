import axios, { AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { RawTrendsRecord } from '../types';

export const SAMPLE_SERIES = [10, 12, 11, 9, 40, 55, 60, 58, 62, 65, 70, 75];

export function weeklyDates(count: number, start: string = '2024-01-07'): string[] {
  const first = new Date(start).getTime();
  return Array.from({ length: count }, (_, i) => new Date(first + i * 7 * 24 * 60 * 60 * 1000).toISOString());
}

export function seriesOf(values: readonly unknown[]): Array<{ date: string; interest: unknown }> {
  const dates = weeklyDates(values.length);
  return values.map((interest, i) => ({ date: dates[i], interest }));
}

/**
 * A complete record for "project tool" with a clearly rising series
 */
export function sampleRecord(): RawTrendsRecord {
  return {
    keyword: 'project tool',
    interestOverTime: seriesOf(SAMPLE_SERIES),
    topQueries: [
      { query: 'Project Tool Alternative', value: 100 },
      { query: 'best project tool', value: 80 },
      { query: 'project tool not working', value: 60 },
      { query: 'project tool for teams', value: 40 },
    ],
    risingQueries: [
      { query: 'new project tool launch', value: 'Breakout' },
      { query: 'project tool vs trello', value: '+250%' },
      { query: 'project tool for remote teams', value: '+120%' },
    ],
  };
}

export const silentLogger = {
  log: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

export interface StubResponse {
  status: number;
  data: unknown;
}

/**
 * An axios instance whose adapter answers in process and records each request
 */
export function stubHttp(respond: (config: InternalAxiosRequestConfig) => StubResponse): {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL: 'http://service.test',
    adapter: async (config) => {
      requests.push(config);
      const { status, data } = respond(config);
      const response = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
      }
      return response;
    },
  });
  return { http, requests };
}
