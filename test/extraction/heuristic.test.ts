import { describe, it, expect } from 'vitest';
import { HeuristicExtractor, splitTeamsLine } from '../../src/extraction/heuristic.js';
import { FlashscoreAdapter } from '../../src/adapters/flashscore.js';
import { loadFixture } from '../helpers/fixture-loader.js';

describe('HeuristicExtractor', () => {
  describe('default profile', () => {
    const extractor = new HeuristicExtractor();

    it('should read cards from a fixtures section found by its heading', () => {
      const events = extractor.extract(loadFixture('ge-mineiro', 'cards.html'));

      expect(events).toEqual([
        {
          origin: 'heuristic',
          homeRaw: 'Cruzeiro',
          awayRaw: 'Tombense',
          when: { kind: 'tokens', date: '15/03', time: '16h00' },
          cardText: '15/03 • 16h00 • Mineirão Cruzeiro x Tombense',
          venue: 'Mineirão',
          round: 'Jogos da 5ª rodada',
          sourceEventId: 'g1',
        },
        {
          origin: 'heuristic',
          homeRaw: 'Atlético-MG',
          awayRaw: 'Pouso Alegre',
          when: { kind: 'tokens', date: '16/03', time: '18h30' },
          cardText: '16/03 • 18h30 • Arena MRV Atlético-MG x Pouso Alegre',
          venue: 'Arena MRV',
          round: 'Jogos da 5ª rodada',
          sourceEventId: 'g2',
        },
      ]);
    });

    it('should take an ISO datetime attribute as a full timestamp', () => {
      const html = `<section><h3>Próximos jogos</h3>
        <article><time datetime="2026-04-05T16:00:00-03:00">05/04 16h</time><p>Cruzeiro x Villa Nova</p></article>
      </section>`;
      const [event] = extractor.extract(html);
      expect(event?.when).toEqual({ kind: 'timestamp', value: '2026-04-05T16:00:00-03:00' });
      expect(event?.homeRaw).toBe('Cruzeiro');
      expect(event?.awayRaw).toBe('Villa Nova');
    });

    it('should drop cards that carry only one team', () => {
      const html = `<section><h2>Jogos</h2><div class="card">15/03 16h00 Cruzeiro</div></section>`;
      expect(extractor.extract(html)).toEqual([]);
    });
  });

  describe('FlashScore profile', () => {
    const adapter = new FlashscoreAdapter();

    it('should read event__match cards with their calendar row date', () => {
      const events = adapter.chain.run(loadFixture('flashscore', 'fixtures.html'));

      expect(events.strategy).toBe('heuristic');
      expect(events.events).toEqual([
        {
          origin: 'heuristic',
          homeRaw: 'Cruzeiro',
          awayRaw: 'Palmeiras',
          when: { kind: 'tokens', date: '21.03', time: '16:00' },
          cardText: '16:00 Cruzeiro Palmeiras',
          sourceEventId: 'g_1_AbCd1234',
        },
        {
          origin: 'heuristic',
          homeRaw: 'Atlético-MG',
          awayRaw: 'Cruzeiro',
          when: { kind: 'tokens', date: '2026-03-28', time: '18:30' },
          cardText: '28.03. 18:30 Atlético-MG Cruzeiro Campeonato Mineiro - Final',
          competition: 'Campeonato Mineiro - Final',
          sourceEventId: 'g_1_EfGh5678',
        },
      ]);
    });
  });
});

describe('splitTeamsLine', () => {
  it('should split on the separator and trim trailing decorations', () => {
    expect(splitTeamsLine('Cruzeiro x Atlético-MG • Mineirão')).toEqual(['Cruzeiro', 'Atlético-MG']);
    expect(splitTeamsLine('América-MG vs. Tombense')).toEqual(['América-MG', 'Tombense']);
  });

  it('should return null without a separator', () => {
    expect(splitTeamsLine('Cruzeiro')).toBeNull();
  });
});
