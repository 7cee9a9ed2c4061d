import * as cheerio from 'cheerio';
import type { RawWhen, StructuredRawEvent } from '../types/fixture.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

type JsonObject = Record<string, unknown>;

/** schema.org types that describe a match */
export const EVENT_TYPES: ReadonlySet<string> = new Set(['SportsEvent', 'Event']);

const MAX_DEPTH = 64;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function isEventObject(obj: JsonObject): boolean {
  const type = obj['@type'];
  if (typeof type === 'string') return EVENT_TYPES.has(type);
  if (Array.isArray(type)) return type.some((t) => typeof t === 'string' && EVENT_TYPES.has(t));
  return false;
}

/**
 * Every event-typed object anywhere inside `payload`, in document order.
 * Event objects are also searched, so nested sub-events are kept.
 */
export function collectEvents(payload: unknown, depth = 0, out: JsonObject[] = []): JsonObject[] {
  if (depth > MAX_DEPTH) return out;
  if (Array.isArray(payload)) {
    for (const item of payload) collectEvents(item, depth + 1, out);
    return out;
  }
  if (!isObject(payload)) return out;
  if (isEventObject(payload)) out.push(payload);
  for (const value of Object.values(payload)) {
    if (typeof value === 'object' && value !== null) collectEvents(value, depth + 1, out);
  }
  return out;
}

/**
 * Cuts the balanced {...} or [...] starting at `start`. Brackets inside
 * string literals are ignored. Returns null when the text ends first.
 */
export function consumeBracedFragment(source: string, start: number): string | null {
  const open = source[start];
  if (open !== '{' && open !== '[') return null;
  let depth = 0;
  let inString: string | null = null;
  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === inString) inString = null;
      continue;
    }
    if (ch === '"' || ch === "'") inString = ch;
    else if (ch === '{' || ch === '[') depth++;
    else if (ch === '}' || ch === ']') {
      depth--;
      if (depth === 0) return source.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Finds the JSON text carried by an inline script: the whole script when it
 * is plain JSON, the object after a `__NEXT_DATA__` marker, or the value of
 * the first `something = {...};` assignment.
 */
export function extractJsonPayload(scriptText: string): string | null {
  const trimmed = scriptText.trim();
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) return trimmed;

  const marker = trimmed.indexOf('__NEXT_DATA__');
  if (marker !== -1) {
    const start = trimmed.indexOf('{', marker);
    if (start !== -1) return consumeBracedFragment(trimmed, start);
  }

  const assignment = /=\s*([{[])/.exec(trimmed);
  if (assignment) return consumeBracedFragment(trimmed, assignment.index + assignment[0].length - 1);
  return null;
}

function participantName(value: unknown): string | undefined {
  if (isObject(value)) return text(value['name']) ?? text(value['alternateName']);
  if (Array.isArray(value)) {
    for (const item of value) {
      const name = isObject(item) ? text(item['name']) : undefined;
      if (name) return name;
    }
    return undefined;
  }
  return text(value);
}

function competitorName(event: JsonObject, index: number): string | undefined {
  const competitors = event['competitor'];
  if (!Array.isArray(competitors)) return undefined;
  return participantName(competitors[index]);
}

function venueName(event: JsonObject): string | undefined {
  const block = event['location'] ?? event['venue'];
  if (isObject(block)) {
    const address = block['address'];
    return (
      text(block['name']) ??
      text(address) ??
      (isObject(address) ? text(address['name']) ?? text(address['streetAddress']) : undefined)
    );
  }
  return text(block);
}

/** 'https://schema.org/EventScheduled' -> 'scheduled' */
export function schemaStatus(value: unknown): string | undefined {
  const raw = isObject(value) ? text(value['name']) ?? text(value['@id']) : text(value);
  if (!raw) return undefined;
  const last = raw.split('/').pop() ?? raw;
  const stripped = last.replace(/^Event(?=[A-Z])/, '');
  return stripped.toLowerCase();
}

function startOf(event: JsonObject): RawWhen | null {
  const value = event['startDate'] ?? event['startTime'] ?? event['start_date'];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return { kind: 'epoch', seconds: value > 1e12 ? Math.floor(value / 1000) : value };
  }
  const str = text(value);
  return str ? { kind: 'timestamp', value: str } : null;
}

/** Projects one schema.org-like event onto the fixed RawEvent shape. */
export function projectStructuredEvent(event: JsonObject): StructuredRawEvent {
  const superEvent = event['superEvent'];
  const raw: StructuredRawEvent = {
    origin: 'structured',
    homeRaw: participantName(event['homeTeam']) ?? competitorName(event, 0) ?? null,
    awayRaw: participantName(event['awayTeam']) ?? competitorName(event, 1) ?? null,
    when: startOf(event),
  };

  const venue = venueName(event);
  if (venue) raw.venue = venue;
  const status = schemaStatus(event['eventStatus']) ?? text(event['status']);
  if (status) raw.status = status;
  const competition = isObject(superEvent) ? text(superEvent['name']) : text(superEvent);
  if (competition) raw.competition = competition;
  const round = text(event['round']) ?? (isObject(superEvent) ? text(superEvent['round']) : undefined);
  if (round) raw.round = round;
  const id = text(event['@id']) ?? text(event['identifier']) ?? text(event['id']);
  if (id) raw.sourceEventId = id;
  return raw;
}

/**
 * Reads machine-readable events embedded in a page: JSON-LD blocks first,
 * then JSON carried by other inline scripts. Unparsable fragments are
 * skipped; an empty result means "try the next strategy".
 */
export class StructuredExtractor {
  readonly name = 'structured';
  private readonly log: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.log = options.logger ?? rootLogger.child({ extractor: 'structured' });
  }

  extract(html: string): StructuredRawEvent[] {
    const $ = cheerio.load(html);
    const events: JsonObject[] = [];

    $('script').each((_i, el) => {
      const script = $(el);
      const content = (script.html() ?? '').trim();
      if (!content) return;

      const isJsonLd = (script.attr('type') ?? '').toLowerCase() === 'application/ld+json';
      const payloadText = isJsonLd ? content : extractJsonPayload(content);
      if (!payloadText) return;

      let payload: unknown;
      try {
        payload = JSON.parse(payloadText);
      } catch (err) {
        this.log.debug({ err, jsonLd: isJsonLd, length: payloadText.length }, 'Skipping unparsable script payload');
        return;
      }
      collectEvents(payload, 0, events);
    });

    return events.map(projectStructuredEvent);
  }
}
