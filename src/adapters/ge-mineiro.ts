import fs from 'node:fs';
import path from 'node:path';
import { PageAdapter, type AdapterDeps } from './base-adapter.js';
import type { SourceAdapterConfig, SourcePayload, SourceTarget } from '../types/adapter.js';
import type { DateWindow, RawEvent } from '../types/fixture.js';
import { isFatal } from '../types/errors.js';

export interface GeMineiroOptions {
  /** Saved copy of the competition page */
  cacheFile?: string;
  /** Overwrite cacheFile after every successful download */
  writeCache?: boolean;
  /** Read cacheFile instead of downloading, when it exists */
  offline?: boolean;
  /** Where the page is saved when nothing could be extracted from it */
  debugHtmlFile?: string;
}

async function readCachedPage(file: string): Promise<string | null> {
  if (!fs.existsSync(file)) return null;
  return fs.promises.readFile(file, 'utf-8');
}

/**
 * ge.globo.com Campeonato Mineiro page.
 *
 * One page lists every club of the competition, so all teams share a single
 * target and the orchestrator fetches it once per run.
 *   - JSON-LD SportsEvent blocks when present
 *   - otherwise "Jogos" / "Rodada" sections with "Home x Away" cards
 *   - rendered dates are day/month only; the year comes from the run window
 *
 * A saved copy of the page stands in when offline or when the download fails.
 */
export class GeMineiroAdapter extends PageAdapter {
  readonly config: SourceAdapterConfig = {
    id: 'ge-mineiro',
    name: 'ge Campeonato Mineiro',
    label: 'ge.globo.com',
    kind: 'page',
    baseUrl: 'https://ge.globo.com',
    competitionFallback: 'Campeonato Mineiro',
    rateLimitMs: 1500,
    maxAttempts: 3,
    backoff: { type: 'exponential', delay: 1000 },
  };

  static readonly PAGE_PATH = '/mg/futebol/campeonato-mineiro/';

  constructor(
    deps: AdapterDeps = {},
    private readonly options: GeMineiroOptions = {},
  ) {
    super(deps);
  }

  async resolveTarget(team: string, _window: DateWindow): Promise<SourceTarget> {
    return { team, cacheKey: 'campeonato-mineiro', path: GeMineiroAdapter.PAGE_PATH };
  }

  override async fetchPayload(target: SourceTarget): Promise<SourcePayload> {
    const { cacheFile, offline, writeCache } = this.options;

    if (offline && cacheFile) {
      const cached = await readCachedPage(cacheFile);
      if (cached !== null) {
        this.log.info({ cacheFile }, 'Offline mode, using cached page');
        return { kind: 'html', html: cached };
      }
      this.log.warn({ cacheFile }, 'Offline mode without a cached page, downloading');
    }

    let html: string;
    try {
      html = await this.fetcher.getText(target.path, target.params);
    } catch (err) {
      if (isFatal(err) || !cacheFile) throw err;
      const cached = await readCachedPage(cacheFile);
      if (cached === null) throw err;
      this.log.warn({ err, cacheFile }, 'Download failed, falling back to cached page');
      return { kind: 'html', html: cached };
    }

    if (writeCache && cacheFile) {
      try {
        await fs.promises.mkdir(path.dirname(cacheFile), { recursive: true });
        await fs.promises.writeFile(cacheFile, html, 'utf-8');
        this.log.debug({ cacheFile, length: html.length }, 'Page cached');
      } catch (err) {
        this.log.warn({ err, cacheFile }, 'Could not write page cache');
      }
    }
    return { kind: 'html', html };
  }

  override extract(payload: SourcePayload): RawEvent[] {
    const events = super.extract(payload);
    const { debugHtmlFile } = this.options;
    if (events.length === 0 && payload.kind === 'html' && debugHtmlFile) {
      try {
        fs.writeFileSync(debugHtmlFile, payload.html, 'utf-8');
        this.log.warn({ debugHtmlFile }, 'Page saved for diagnosis');
      } catch (err) {
        this.log.warn({ err, debugHtmlFile }, 'Could not save page for diagnosis');
      }
    }
    return events;
  }

  protected override diagnosticKeywords(): readonly string[] {
    return ['Jogos', 'Rodada', 'Cruzeiro', 'Atlético', 'América'];
  }
}
