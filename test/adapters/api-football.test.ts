import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MockAgent } from 'undici';
import { ApiFootballAdapter } from '../../src/adapters/api-football.js';
import { MalformedUpstreamDataError, UnresolvableIdentityError } from '../../src/types/errors.js';
import { loadJsonFixture } from '../helpers/fixture-loader.js';

const HOST = 'v3.football.api-sports.io';
const ORIGIN = `https://${HOST}`;
const WINDOW = { from: '2026-03-01', to: '2026-03-31' };
const teamsPath = (path: string): boolean => path.startsWith('/teams?');

describe('ApiFootballAdapter', () => {
  let agent: MockAgent;
  let adapter: ApiFootballAdapter;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    adapter = new ApiFootballAdapter(
      { apiKey: 'test-secret', host: HOST, timeZone: 'America/Sao_Paulo' },
      { dispatcher: agent, maxRedirections: 0, minDelayMs: 0, sleep: async () => {} },
    );
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should have correct config', () => {
    expect(adapter.config.id).toBe('api-football');
    expect(adapter.config.baseUrl).toBe(ORIGIN);
  });

  it('should resolve the team by search, preferring an exact name', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: teamsPath, method: 'GET', headers: { 'x-rapidapi-key': 'test-secret', 'x-rapidapi-host': HOST } })
      .reply(200, {
        errors: [],
        response: [{ team: { id: 7777, name: 'Cruzeiro RS' } }, { team: { id: 135, name: 'Cruzeiro' } }],
      });

    await expect(adapter.resolveTarget('Cruzeiro', WINDOW)).resolves.toEqual({
      team: 'Cruzeiro',
      cacheKey: 'team:135:2026-03-01:2026-03-31',
      path: '/fixtures',
      params: { team: 135, from: '2026-03-01', to: '2026-03-31', timezone: 'America/Sao_Paulo' },
    });
  });

  it('should fall back to the static table when search returns 404', async () => {
    agent.get(ORIGIN).intercept({ path: teamsPath, method: 'GET' }).reply(404, 'not found');

    const target = await adapter.resolveTarget('Atletico-MG', WINDOW);
    expect(target.params?.['team']).toBe(1062);
  });

  it('should fall back to the static table when search finds nothing', async () => {
    agent.get(ORIGIN).intercept({ path: teamsPath, method: 'GET' }).reply(200, { errors: [], response: [] });

    const target = await adapter.resolveTarget('América-MG', WINDOW);
    expect(target.params?.['team']).toBe(125);
  });

  it('should give up when neither search nor the table know the team', async () => {
    agent.get(ORIGIN).intercept({ path: teamsPath, method: 'GET' }).reply(200, { errors: [], response: [] });

    await expect(adapter.resolveTarget('Tombense', WINDOW)).rejects.toBeInstanceOf(UnresolvableIdentityError);
  });

  it('should treat API-reported errors as malformed data', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: teamsPath, method: 'GET' })
      .reply(200, { errors: { token: 'Error/Missing application key' }, response: [] });

    await expect(adapter.resolveTarget('Cruzeiro', WINDOW)).rejects.toBeInstanceOf(MalformedUpstreamDataError);
  });

  it('should project fixtures and skip entries without teams', () => {
    const events = adapter.extract({ kind: 'json', body: loadJsonFixture('api-football', 'fixtures.json') });

    expect(events).toEqual([
      {
        origin: 'api',
        homeRaw: 'Cruzeiro',
        awayRaw: 'Tombense',
        when: { kind: 'timestamp', value: '2026-03-15T16:00:00-03:00' },
        venue: 'Estádio Governador Magalhães Pinto',
        status: 'Not Started',
        competition: 'Mineiro - 1',
        round: 'Regular Season - 5',
        season: '2026',
        sourceEventId: '1001',
      },
      {
        origin: 'api',
        homeRaw: 'Atletico-MG',
        awayRaw: 'America-MG',
        when: { kind: 'epoch', seconds: 1774218600 },
        status: 'Match Finished',
        competition: 'Mineiro - 1',
        round: 'Regular Season - 6',
        season: '2026',
        homeGoals: 2,
        awayGoals: 1,
        sourceEventId: '1002',
      },
    ]);
  });

  it('should request fixtures for the window with the local timezone', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: '/fixtures',
        method: 'GET',
        query: { team: '135', from: '2026-03-01', to: '2026-03-31', timezone: 'America/Sao_Paulo' },
      })
      .reply(200, { errors: [], response: [] });

    const payload = await adapter.fetchPayload({
      team: 'Cruzeiro',
      cacheKey: 'team:135',
      path: '/fixtures',
      params: { team: 135, from: '2026-03-01', to: '2026-03-31', timezone: 'America/Sao_Paulo' },
    });
    expect(payload).toEqual({ kind: 'json', body: { errors: [], response: [] } });
  });
});
