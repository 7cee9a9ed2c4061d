import { PageAdapter, findByTeam } from './base-adapter.js';
import type { HeuristicProfile } from '../extraction/heuristic.js';
import type { SourceAdapterConfig, SourceTarget } from '../types/adapter.js';
import type { DateWindow } from '../types/fixture.js';
import { UnresolvableIdentityError } from '../types/errors.js';

export const TEAM_PAGES: Readonly<Record<string, string>> = {
  Cruzeiro: '/team/cruzeiro/0SwtclaU',
  'Atletico-MG': '/team/atletico-mg/hGLC5Bah',
  'America-MG': '/team/america-mg/xUT0Bp8o',
};

/**
 * FlashScore team fixture pages.
 *
 *   - Cards: div.event__match, home/away in .event__participant--home/--away
 *   - Kick-off: data-event-date / data-event-time when rendered server side,
 *     else .event__time ("15.03. 16:00") with the day in the calendar row
 *   - A prose "Upcoming matches:" list is the last resort
 */
export class FlashscoreAdapter extends PageAdapter {
  readonly config: SourceAdapterConfig = {
    id: 'flashscore',
    name: 'FlashScore',
    label: 'FlashScore',
    kind: 'page',
    baseUrl: 'https://www.flashscore.com',
    competitionFallback: 'FlashScore',
    rateLimitMs: 2000,
    maxAttempts: 3,
    backoff: { type: 'exponential', delay: 1000 },
  };

  async resolveTarget(team: string, _window: DateWindow): Promise<SourceTarget> {
    const page = findByTeam(TEAM_PAGES, team);
    if (!page) throw new UnresolvableIdentityError(this.config.id, team);
    return { team, cacheKey: page, path: `${page}/fixtures/` };
  }

  protected override heuristicProfile(): Partial<HeuristicProfile> {
    return {
      cardSelectors: ['div.event__match'],
      participantSelectors: {
        home: ['.event__participant--home .event__participant__name', '.event__participant--home'],
        away: ['.event__participant--away .event__participant__name', '.event__participant--away'],
      },
      participantPairSelectors: ['.event__participant'],
      timeSelectors: ['.event__time'],
      dateRow: { ancestor: "div[class*='calendar__row']", date: '.calendar__date' },
      venueSelectors: ['.event__venue', '.event__match__venue'],
      competitionSelectors: ['.event__title--type', '.event__stage'],
    };
  }
}
