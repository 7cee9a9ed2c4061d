import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MockAgent } from 'undici';
import { FlashscoreAdapter } from '../../src/adapters/flashscore.js';
import { AuthorizationError, UnresolvableIdentityError } from '../../src/types/errors.js';
import { loadFixture } from '../helpers/fixture-loader.js';

const WINDOW = { from: '2026-03-01', to: '2026-04-30' };

describe('FlashscoreAdapter', () => {
  let agent: MockAgent;
  let adapter: FlashscoreAdapter;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    adapter = new FlashscoreAdapter({ dispatcher: agent, maxRedirections: 0, minDelayMs: 0, sleep: async () => {} });
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should resolve the team page whatever the accents', async () => {
    await expect(adapter.resolveTarget('Atlético-MG', WINDOW)).resolves.toEqual({
      team: 'Atlético-MG',
      cacheKey: '/team/atletico-mg/hGLC5Bah',
      path: '/team/atletico-mg/hGLC5Bah/fixtures/',
    });
  });

  it('should refuse teams without a known page', async () => {
    await expect(adapter.resolveTarget('Villa Nova', WINDOW)).rejects.toBeInstanceOf(UnresolvableIdentityError);
  });

  it('should fall through to the prose list when no cards are rendered', async () => {
    agent
      .get('https://www.flashscore.com')
      .intercept({ path: '/team/cruzeiro/0SwtclaU/fixtures/', method: 'GET' })
      .reply(200, loadFixture('flashscore', 'text-only.html'));

    const payload = await adapter.fetchPayload(await adapter.resolveTarget('Cruzeiro', WINDOW));
    const events = adapter.extract(payload);

    expect(events.map((e) => e.origin)).toEqual(['text', 'text', 'text']);
    expect(events[1]?.homeRaw).toBe('Atlético-MG');
    expect(events[1]?.awayRaw).toBe('Cruzeiro');
  });

  it('should abort on 403', async () => {
    agent
      .get('https://www.flashscore.com')
      .intercept({ path: '/team/america-mg/xUT0Bp8o/fixtures/', method: 'GET' })
      .reply(403, 'Forbidden');

    const target = await adapter.resolveTarget('America-MG', WINDOW);
    await expect(adapter.fetchPayload(target)).rejects.toBeInstanceOf(AuthorizationError);
  });
});
