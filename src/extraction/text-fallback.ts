import * as cheerio from 'cheerio';
import type { TextRawEvent } from '../types/fixture.js';
import { textLines } from './heuristic.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface TextFallbackOptions {
  markers: readonly string[];
  terminators: readonly string[];
  separators: readonly string[];
}

export const DEFAULT_TEXT_FALLBACK: TextFallbackOptions = {
  markers: ['Upcoming matches:', 'Próximas partidas:'],
  terminators: ['Show more', 'Mostrar mais', 'See more', 'Ver mais'],
  separators: [' v ', ' x ', ' - '],
};

const DAY_MONTH = /(\d{1,2})[./](\d{1,2})(?:[./](\d{4}|\d{2})(?!\d))?/;

/** Flattens a page to the single-line text the fallback scans. */
export function flattenHtml(html: string): string {
  const $ = cheerio.load(html);
  const body = $('body').get(0) ?? $.root().get(0);
  return body ? textLines(body).join(' ') : '';
}

/**
 * Last resort for pages that only render a prose list such as
 * "Upcoming matches: 15.03 Cruzeiro v Tombense, 22.03 ...".
 */
export class TextFallbackExtractor {
  readonly name = 'text';
  private readonly options: TextFallbackOptions;
  private readonly log: Logger;

  constructor(options: Partial<TextFallbackOptions> = {}, deps: { logger?: Logger } = {}) {
    this.options = { ...DEFAULT_TEXT_FALLBACK, ...options };
    this.log = deps.logger ?? rootLogger.child({ extractor: 'text' });
  }

  extract(flatText: string): TextRawEvent[] {
    const section = this.upcomingSection(flatText);
    if (!section) {
      this.log.debug('No upcoming-matches marker found');
      return [];
    }

    const events: TextRawEvent[] = [];
    for (const item of section.split(',').map((s) => s.trim()).filter(Boolean)) {
      const event = this.parseItem(item);
      if (event) events.push(event);
    }
    this.log.info({ items: events.length }, 'Text fallback used');
    return events;
  }

  /** Text between the first marker found and the next terminator. */
  upcomingSection(text: string): string {
    for (const marker of this.options.markers) {
      const found = text.indexOf(marker);
      if (found === -1) continue;
      const start = found + marker.length;
      let end = text.length;
      for (const terminator of this.options.terminators) {
        const idx = text.indexOf(terminator, start);
        if (idx !== -1 && idx < end) end = idx;
      }
      return text.slice(start, end).trim();
    }
    return '';
  }

  parseItem(item: string): TextRawEvent | null {
    const date = DAY_MONTH.exec(item);
    if (!date) return null;
    const rest = item
      .slice(date.index + date[0].length)
      .replace(/^[\s.\-–•]+|[\s.\-–•]+$/gu, '');
    const teams = this.splitTeams(rest);
    if (!teams) return null;

    return {
      origin: 'text',
      homeRaw: teams[0],
      awayRaw: teams[1],
      when: { kind: 'tokens', date: [date[1], date[2], date[3]].filter(Boolean).join('/'), time: null },
      item,
    };
  }

  private splitTeams(text: string): [string, string] | null {
    for (const sep of this.options.separators) {
      const idx = text.indexOf(sep);
      if (idx === -1) continue;
      const home = text.slice(0, idx).trim();
      const away = text.slice(idx + sep.length).trim();
      if (home && away) return [home, away];
    }
    return null;
  }
}
