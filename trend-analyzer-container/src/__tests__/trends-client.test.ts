import { AxiosError } from 'axios';
import { MalformedRecordError, TrendsSourceError } from '../errors';
import { TrendsClient, parseTrendsResponse } from '../ingestion/trends-client';
import { stubHttp } from './fixtures';

const serviceBody = {
  keyword: 'project tool',
  comparison_enabled: false,
  interest_over_time: [{ date: '2024-01-07', interest: 10 }],
  related_queries: {
    top: [{ query: 'project tool pricing', value: 100 }],
    rising: [{ query: 'project tool ai', value: 'Breakout' }],
  },
  rising_searches: {
    top: [{ query: 'kanban', value: 50 }],
    rising: [{ query: 'project tool vs trello', value: '+300%' }],
  },
  metadata: { geo: 'US' },
};

describe('parseTrendsResponse', () => {
  it('maps the service payload onto a raw record', () => {
    expect(parseTrendsResponse(serviceBody)).toEqual({
      keyword: 'project tool',
      interestOverTime: [{ date: '2024-01-07', interest: 10 }],
      topQueries: [{ query: 'project tool pricing', value: 100 }],
      risingQueries: [
        { query: 'project tool ai', value: 'Breakout' },
        { query: 'project tool vs trello', value: '+300%' },
      ],
      relatedTopics: [{ query: 'kanban', value: 50 }],
      metadata: { geo: 'US' },
    });
  });

  it('leaves out sections the service did not send', () => {
    expect(parseTrendsResponse({})).toEqual({});
  });

  it('keeps an empty rising list as present', () => {
    expect(parseTrendsResponse({ related_queries: { top: null, rising: [] } })).toEqual({ risingQueries: [] });
  });

  it('passes bare-string and odd query items on to the cleaner', () => {
    expect(
      parseTrendsResponse({
        interest_over_time: [null, { date: '2024-01-07', interest: 10 }],
        related_queries: { top: ['crm pricing', { query: 'crm vs x', value: 5 }] },
      })
    ).toEqual({
      interestOverTime: [null, { date: '2024-01-07', interest: 10 }],
      topQueries: ['crm pricing', { query: 'crm vs x', value: 5 }],
    });
  });

  it('rejects a payload of the wrong shape', () => {
    expect(() => parseTrendsResponse({ interest_over_time: 'soon' })).toThrow(MalformedRecordError);
    expect(() => parseTrendsResponse('error')).toThrow('Trends service returned an unexpected payload');
  });
});

describe('TrendsClient', () => {
  const config = { apiUrl: 'http://service.test', timeoutMs: 1000 };

  it('requests the keyword with the comparison flag', async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, data: serviceBody }));
    const client = new TrendsClient(config, http);

    const record = await client.fetch('project tool', true);

    expect(record.keyword).toBe('project tool');
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('/analyze/project%20tool');
    expect(requests[0].params).toEqual({ cmp: true });
  });

  it('wraps service errors with the status', async () => {
    const { http } = stubHttp(() => ({ status: 503, data: { detail: 'unavailable' } }));
    const client = new TrendsClient(config, http);

    const failure = client.fetch('project tool');

    await expect(failure).rejects.toBeInstanceOf(TrendsSourceError);
    await expect(failure).rejects.toMatchObject({
      message: 'Trends service returned error 503',
      keyword: 'project tool',
      status: 503,
    });
  });

  it('wraps connection failures', async () => {
    const { http } = stubHttp((request) => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', request);
    });
    const client = new TrendsClient(config, http);

    await expect(client.fetch('crm')).rejects.toMatchObject({
      name: 'TrendsSourceError',
      message: 'Trends service could not be reached: connect ECONNREFUSED',
    });
  });
});
