import * as cheerio from 'cheerio';

export interface PageDiagnostics {
  /** Page length in characters */
  length: number;
  /** First 2000 characters on one line */
  head: string;
  /** Most used CSS classes, most frequent first */
  topClasses: Array<{ name: string; count: number }>;
  /** Up to 60 characters either side of the first hit of each keyword */
  contexts: Record<string, string>;
}

const HEAD_LENGTH = 2000;
const CONTEXT_RADIUS = 60;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * What a page looked like when no strategy found a fixture in it. The class
 * census usually shows which selectors a layout change renamed.
 */
export function diagnosePage(html: string, keywords: readonly string[] = [], topN = 20): PageDiagnostics {
  const $ = cheerio.load(html);
  const counts = new Map<string, number>();
  $('[class]').each((_, el) => {
    for (const name of ($(el).attr('class') ?? '').split(/\s+/)) {
      if (name) counts.set(name, (counts.get(name) ?? 0) + 1);
    }
  });
  const topClasses = [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, topN);

  const contexts: Record<string, string> = {};
  for (const keyword of keywords) {
    const pattern = new RegExp(`.{0,${CONTEXT_RADIUS}}${escapeRegExp(keyword)}.{0,${CONTEXT_RADIUS}}`, 'i');
    const hit = pattern.exec(html);
    if (hit) contexts[keyword] = hit[0].trim().slice(0, 200);
  }

  return {
    length: html.length,
    head: html.slice(0, HEAD_LENGTH).replace(/\s*\n\s*/g, ' '),
    topClasses,
    contexts,
  };
}
