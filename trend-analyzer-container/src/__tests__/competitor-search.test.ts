import { CompetitorSearchError } from '../errors';
import { HttpCompetitorSearchClient, buildCompetitorQueries } from '../ingestion/competitor-search';
import { stubHttp } from './fixtures';

describe('buildCompetitorQueries', () => {
  it('starts with generic queries and adds comparison queries without repeats', () => {
    expect(buildCompetitorQueries('project tool', ['Project Tool Software', 'project tool vs trello'])).toEqual([
      'project tool software',
      'project tool alternatives',
      'project tool vs trello',
    ]);
  });

  it('honours the query limit', () => {
    expect(buildCompetitorQueries('crm', ['crm vs sheets'], 1)).toEqual(['crm software']);
  });
});

describe('HttpCompetitorSearchClient', () => {
  const config = { apiUrl: 'http://service.test', apiKey: 'test-secret', resultLimit: 2 };

  it('returns at most the configured number of results', async () => {
    const { http, requests } = stubHttp(() => ({
      status: 200,
      data: {
        organic_results: [
          { title: 'Acme Boards', link: 'https://acme.example', snippet: 'Boards for teams' },
          { title: 'Plan It', link: 'https://planit.example' },
          { title: 'Third', link: 'https://third.example', snippet: 'Not returned' },
        ],
      },
    }));
    const client = new HttpCompetitorSearchClient(config, http);

    await expect(client.search('project tool software')).resolves.toEqual([
      { title: 'Acme Boards', url: 'https://acme.example', snippet: 'Boards for teams' },
      { title: 'Plan It', url: 'https://planit.example', snippet: '' },
    ]);
    expect(requests[0].params).toEqual({ q: 'project tool software', api_key: 'test-secret', num: 2 });
  });

  it('treats a missing result list as no results', async () => {
    const { http } = stubHttp(() => ({ status: 200, data: {} }));

    await expect(new HttpCompetitorSearchClient(config, http).search('crm')).resolves.toEqual([]);
  });

  it('raises CompetitorSearchError on HTTP failures', async () => {
    const { http } = stubHttp(() => ({ status: 500, data: null }));

    await expect(new HttpCompetitorSearchClient(config, http).search('crm')).rejects.toMatchObject({
      name: 'CompetitorSearchError',
      message: 'Competitor search failed: Request failed with status code 500',
      query: 'crm',
      status: 500,
    });
  });

  it('raises CompetitorSearchError on an unexpected payload', async () => {
    const { http } = stubHttp(() => ({ status: 200, data: { organic_results: 'none' } }));

    await expect(new HttpCompetitorSearchClient(config, http).search('crm')).rejects.toBeInstanceOf(
      CompetitorSearchError
    );
  });
});
