import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';
import type { HeuristicRawEvent, RawWhen } from '../types/fixture.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

/**
 * Where to look on a given site. Every list is tried in order and the first
 * non-empty answer wins.
 */
export interface HeuristicProfile {
  /** Heading words that mark a fixtures section */
  sectionKeywords: readonly string[];
  /** Used when no heading matched */
  sectionSelectors: readonly string[];
  /** Explicit card selectors; when none match, cards are found by separator */
  cardSelectors: readonly string[];
  participantSelectors: { home: readonly string[]; away: readonly string[] };
  /** Selectors whose first two hits are home and away */
  participantPairSelectors: readonly string[];
  dateAttributes: readonly string[];
  timeAttributes: readonly string[];
  /** Elements whose text holds the kick-off (date and/or time) */
  timeSelectors: readonly string[];
  /** Day header rendered outside the card, as on list layouts grouped by date */
  dateRow?: { ancestor: string; date: string };
  venueSelectors: readonly string[];
  competitionSelectors: readonly string[];
  stadiumMarkers: readonly string[];
}

export const DEFAULT_HEURISTIC_PROFILE: HeuristicProfile = {
  sectionKeywords: ['jogos', 'rodada', 'games', 'round', 'fixtures', 'partidas'],
  sectionSelectors: ["section[class*='jogos']", "section[class*='fixtures']"],
  cardSelectors: [],
  participantSelectors: {
    home: ["[class*='mandante']", "[class*='home'] [itemprop='name']", "[class*='home']"],
    away: ["[class*='visitante']", "[class*='away'] [itemprop='name']", "[class*='away']"],
  },
  participantPairSelectors: ["[itemprop='name']", "[class*='team-name']", "[class*='equipe']"],
  dateAttributes: ['data-event-date', 'data-date'],
  timeAttributes: ['data-event-time', 'data-time'],
  timeSelectors: ['time'],
  venueSelectors: ["[class*='estadio']", "[class*='venue']", "[itemprop='location']"],
  competitionSelectors: [],
  stadiumMarkers: [
    'Mineirão',
    'Arena MRV',
    'Independência',
    'Estádio',
    'Estadio',
    'Soares',
    'Itacolomi',
    'Castelão',
    'Arena',
  ],
};

const SEPARATOR = String.raw`(?:x|×|vs\.?|v)`;
const NAME_PAIR = new RegExp(String.raw`\p{L}{2,}\S*\s+${SEPARATOR}\s+\p{L}`, 'giu');
const SPLIT_PAIR = new RegExp(String.raw`\s+${SEPARATOR}\s+`, 'iu');
const SEGMENT_BREAK = /[•|\n\t]|\d{1,2}[/.:h]\d{2}\.?|\s{2,}/u;
const DATE_TOKEN = /\b\d{1,2}[/.]\d{1,2}(?:[/.]\d{4}|[/.]\d{2}(?!\d))?/;
const TIME_TOKEN = /\b\d{1,2}\s*[:h]\s*\d{2}\b/i;
const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}T/;

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template']);

/** Non-empty text nodes under `node`, in document order. */
export function textLines(node: AnyNode): string[] {
  const out: string[] = [];
  const walk = (n: AnyNode): void => {
    if (isText(n)) {
      const line = n.data.replace(/\s+/g, ' ').trim();
      if (line) out.push(line);
      return;
    }
    if (isTag(n) && SKIPPED_TAGS.has(n.name)) return;
    if (hasChildren(n)) for (const child of n.children) walk(child);
  };
  walk(node);
  return out;
}

function countPairs(text: string): number {
  return text.match(NAME_PAIR)?.length ?? 0;
}

/** 'Cruzeiro x Atlético-MG • Mineirão' -> ['Cruzeiro', 'Atlético-MG'] */
export function splitTeamsLine(line: string): [string, string] | null {
  const parts = line.split(SPLIT_PAIR);
  if (parts.length < 2) return null;
  const home = (parts[0] ?? '').trim().replace(/[•\-–\s]+$/u, '').trim();
  const away = (parts.slice(1).join(' x ').split(/\s+[•\-–(]/u)[0] ?? '').trim();
  return home && away ? [home, away] : null;
}

/**
 * Reads fixtures from list/card layouts when a page carries no structured
 * data. Sections are found by heading keywords, cards inside them by a
 * "name x name" separator or by explicit selectors.
 */
export class HeuristicExtractor {
  readonly name = 'heuristic';
  private readonly profile: HeuristicProfile;
  private readonly log: Logger;

  constructor(profile: Partial<HeuristicProfile> = {}, options: { logger?: Logger } = {}) {
    this.profile = { ...DEFAULT_HEURISTIC_PROFILE, ...profile };
    this.log = options.logger ?? rootLogger.child({ extractor: 'heuristic' });
  }

  extract(html: string): HeuristicRawEvent[] {
    const $ = cheerio.load(html);
    const events: HeuristicRawEvent[] = [];
    const seen = new Set<Element>();

    for (const section of this.locateSections($)) {
      const cards = this.findCards($, section.node).filter((card) => !seen.has(card));
      if (section.title) {
        this.log.info({ section: section.title, cards: cards.length }, 'Fixtures section located');
      }
      for (const card of cards) {
        seen.add(card);
        const event = this.parseCard($, card, section.title);
        if (event) events.push(event);
      }
    }

    if (events.length === 0) this.log.debug('No card yielded both team names');
    return events;
  }

  private locateSections($: cheerio.CheerioAPI): Array<{ node: Element | null; title: string | null }> {
    const sections: Array<{ node: Element | null; title: string | null }> = [];
    const seen = new Set<Element>();
    const keywords = this.profile.sectionKeywords.map((k) => k.toLowerCase());

    $('h2, h3, h4, h5').each((_i, header) => {
      const title = $(header).text().replace(/\s+/g, ' ').trim();
      const lower = title.toLowerCase();
      if (!keywords.some((k) => lower.includes(k))) return;
      const container: AnyNode | undefined =
        $(header).closest('section, div').get(0) ?? $(header).parent().get(0);
      if (!container || !isTag(container) || seen.has(container)) return;
      seen.add(container);
      sections.push({ node: container, title });
    });
    if (sections.length > 0) return sections;

    for (const selector of this.profile.sectionSelectors) {
      const found = $<Element, string>(selector).toArray();
      if (found.length > 0) return found.map((node) => ({ node, title: null }));
    }
    this.log.warn('No fixtures section identified, scanning the whole page');
    return [{ node: null, title: null }];
  }

  private findCards($: cheerio.CheerioAPI, section: Element | null): Element[] {
    const scope: cheerio.Cheerio<AnyNode> = section ? $(section) : $.root();

    for (const selector of this.profile.cardSelectors) {
      const found = scope.find(selector).toArray();
      if (found.length > 0) return found;
    }

    const candidates = scope
      .find('article, li, div')
      .toArray()
      .filter((el) => countPairs(textLines(el).join(' ')) === 1);
    const candidateSet = new Set(candidates);
    // outermost single-fixture element = the card
    return candidates.filter((el) => !$(el).parents().toArray().some((p) => candidateSet.has(p)));
  }

  private parseCard($: cheerio.CheerioAPI, card: Element, sectionTitle: string | null): HeuristicRawEvent | null {
    const lines = textLines(card);
    const cardText = lines.join(' ');
    const node = $(card);

    let home = this.firstText($, node, this.profile.participantSelectors.home);
    let away = this.firstText($, node, this.profile.participantSelectors.away);
    if (!home || !away) {
      const pair = this.participantPair($, node) ?? this.teamsFromText(lines, cardText);
      if (pair) {
        home = home || pair[0];
        away = away || pair[1];
      }
    }
    if (!home || !away) return null;

    const venue = this.firstText($, node, this.profile.venueSelectors) || this.venueFromLines(lines, cardText);
    if (venue && away.endsWith(` ${venue}`)) away = away.slice(0, -venue.length - 1).trim();

    const event: HeuristicRawEvent = {
      origin: 'heuristic',
      homeRaw: home,
      awayRaw: away,
      when: this.kickoff($, node, cardText),
      cardText,
    };
    if (venue) event.venue = venue;
    const competition = this.firstText($, node, this.profile.competitionSelectors);
    if (competition) event.competition = competition;
    if (sectionTitle && /rodada|round/i.test(sectionTitle)) event.round = sectionTitle;
    const id = node.attr('data-event-id') ?? node.attr('id');
    if (id) event.sourceEventId = id;
    return event;
  }

  private firstText($: cheerio.CheerioAPI, scope: cheerio.Cheerio<Element>, selectors: readonly string[]): string {
    for (const selector of selectors) {
      for (const el of scope.find(selector).toArray()) {
        const text = textLines(el).join(' ');
        if (text) return text;
      }
    }
    return '';
  }

  private participantPair($: cheerio.CheerioAPI, scope: cheerio.Cheerio<Element>): [string, string] | null {
    for (const selector of this.profile.participantPairSelectors) {
      const names = scope
        .find(selector)
        .toArray()
        .map((el) => textLines(el).join(' '))
        .filter((t) => t.length > 0);
      if (names.length >= 2 && names[0] && names[1]) return [names[0], names[1]];
    }
    return null;
  }

  private teamsFromText(lines: readonly string[], cardText: string): [string, string] | null {
    for (const line of lines) {
      if (countPairs(line) > 0) {
        const pair = splitTeamsLine(line);
        if (pair) return pair;
      }
    }
    for (const segment of cardText.split(SEGMENT_BREAK)) {
      if (countPairs(segment) > 0) {
        const pair = splitTeamsLine(segment);
        if (pair) return pair;
      }
    }
    return null;
  }

  /** Attributes first, then a date row outside the card, then the card text. */
  private kickoff($: cheerio.CheerioAPI, node: cheerio.Cheerio<Element>, cardText: string): RawWhen | null {
    const timeEl = node.find('time[datetime]').first();
    const dateAttr =
      this.profile.dateAttributes.map((a) => node.attr(a)).find((v) => v && v.trim()) ??
      timeEl.attr('datetime');
    if (dateAttr && ISO_DATETIME.test(dateAttr.trim())) {
      return { kind: 'timestamp', value: dateAttr.trim() };
    }

    let date = dateAttr?.trim() || null;
    if (!date && this.profile.dateRow) {
      const row = node.closest(this.profile.dateRow.ancestor);
      const rowText = row.find(this.profile.dateRow.date).first().text();
      date = DATE_TOKEN.exec(rowText)?.[0] ?? null;
    }

    const timeText = this.firstText($, node, this.profile.timeSelectors);
    date = date || DATE_TOKEN.exec(timeText)?.[0] || DATE_TOKEN.exec(cardText)?.[0] || null;
    if (!date) return null;

    const time =
      this.profile.timeAttributes.map((a) => node.attr(a)).find((v) => v && v.trim()) ??
      TIME_TOKEN.exec(timeText)?.[0] ??
      TIME_TOKEN.exec(cardText)?.[0] ??
      null;

    return { kind: 'tokens', date, time };
  }

  private venueFromLines(lines: readonly string[], cardText: string): string {
    const markers = this.profile.stadiumMarkers.map((m) => m.toLowerCase());
    for (const line of lines) {
      const lower = line.toLowerCase();
      if (markers.some((m) => lower.includes(m)) && !/\d/.test(line)) return line;
    }
    const lowerText = cardText.toLowerCase();
    return this.profile.stadiumMarkers.find((m) => lowerText.includes(m.toLowerCase())) ?? '';
  }
}
