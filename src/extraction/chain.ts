import type { RawEvent } from '../types/fixture.js';
import { StructuredExtractor } from './structured.js';
import { HeuristicExtractor, type HeuristicProfile } from './heuristic.js';
import { TextFallbackExtractor, flattenHtml, type TextFallbackOptions } from './text-fallback.js';
import { diagnosePage, type PageDiagnostics } from './diagnostics.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

/** Uniform contract: a non-empty result is success, [] means "try the next one". */
export interface ExtractionStrategy {
  readonly name: string;
  extract(html: string): RawEvent[];
}

export interface ChainResult {
  /** Strategy that produced the events, null when all came back empty */
  strategy: string | null;
  events: RawEvent[];
  attempted: string[];
  /** Only set when every strategy came back empty */
  diagnostics?: PageDiagnostics;
}

/**
 * Ordered list of strategies over the same page. The first strategy that
 * returns anything wins; lower ones are not run.
 */
export class ExtractionChain {
  constructor(
    readonly strategies: readonly ExtractionStrategy[],
    private readonly log: Logger = rootLogger.child({ component: 'extraction-chain' }),
    /** Words whose surroundings are logged when nothing is found */
    private readonly diagnosticKeywords: readonly string[] = [],
  ) {}

  run(html: string): ChainResult {
    const attempted: string[] = [];
    for (const strategy of this.strategies) {
      attempted.push(strategy.name);
      const events = strategy.extract(html);
      if (events.length > 0) {
        this.log.info({ strategy: strategy.name, events: events.length }, 'Extraction succeeded');
        return { strategy: strategy.name, events, attempted };
      }
      this.log.debug({ strategy: strategy.name }, 'Strategy found nothing, falling through');
    }
    const diagnostics = diagnosePage(html, this.diagnosticKeywords);
    this.log.warn(
      { attempted, length: diagnostics.length, topClasses: diagnostics.topClasses, contexts: diagnostics.contexts },
      'No strategy found any fixture, page layout may have changed',
    );
    this.log.debug({ head: diagnostics.head }, 'Start of the unreadable page');
    return { strategy: null, events: [], attempted, diagnostics };
  }
}

export interface PageChainOptions {
  heuristic?: Partial<HeuristicProfile>;
  text?: Partial<TextFallbackOptions>;
  diagnosticKeywords?: readonly string[];
  logger?: Logger;
}

/** structured -> heuristic -> text, the order every page source uses. */
export function createPageChain(options: PageChainOptions = {}): ExtractionChain {
  const logger = options.logger ?? rootLogger;
  const structured = new StructuredExtractor({ logger: logger.child({ extractor: 'structured' }) });
  const heuristic = new HeuristicExtractor(options.heuristic, { logger: logger.child({ extractor: 'heuristic' }) });
  const text = new TextFallbackExtractor(options.text, { logger: logger.child({ extractor: 'text' }) });

  return new ExtractionChain(
    [
      structured,
      heuristic,
      { name: text.name, extract: (html: string) => text.extract(flattenHtml(html)) },
    ],
    logger.child({ component: 'extraction-chain' }),
    options.diagnosticKeywords,
  );
}
