import type { SourceAdapter, SourcePayload } from '../types/adapter.js';
import type { DateWindow, NormalizedFixture } from '../types/fixture.js';
import { isFatal, isPipelineError, type PipelineErrorKind } from '../types/errors.js';
import { isWithinWindow } from '../utils/date.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { DateTimeResolver } from './datetime.js';
import { dedupeFixtures } from './dedup.js';
import { normalizeEvent, type SkipReason } from './normalizer.js';
import type { TeamCanonicalizer } from './team-resolver.js';

export type PassState = 'resolving' | 'fetching' | 'extracting' | 'normalizing' | 'filtering' | 'done' | 'errored';

export type DropReason = SkipReason | 'out_of_window' | 'not_target';

/** One (source, team) unit of work. */
export interface PassReport {
  source: string;
  team: string;
  state: PassState;
  /** State the pass was in when it failed */
  failedAt?: PassState;
  /** Events the adapter extracted */
  extracted: number;
  kept: number;
  dropped: Record<DropReason, number>;
  /** Normalized records whose year was guessed from the window start */
  yearInferred: number;
  /** Normalized records with no kick-off time, written as 00:00:00 */
  timeUnknown: number;
  /** True when the payload came from this run's cache */
  cached: boolean;
  errorKind?: PipelineErrorKind | 'empty_extraction' | 'unexpected';
  error?: string;
}

export interface RunReport {
  window: DateWindow;
  passes: PassReport[];
  /** Fixtures involving each target team */
  totalsBeforeDedup: Record<string, number>;
  totalsAfterDedup: Record<string, number>;
  collected: number;
  unique: number;
}

export interface RunResult {
  fixtures: NormalizedFixture[];
  report: RunReport;
}

export interface OrchestratorOptions {
  sources: readonly SourceAdapter[];
  teams: readonly string[];
  canonicalizer: TeamCanonicalizer;
  resolver: DateTimeResolver;
  logger?: Logger;
}

function emptyDrops(): Record<DropReason, number> {
  return { missing_team: 0, invalid_timestamp: 0, out_of_window: 0, not_target: 0 };
}

/**
 * Runs every source for every team, one request at a time.
 *
 * A failing pass is recorded and the run moves on; only non-recoverable
 * errors (403) escape `run`, in which case nothing is returned.
 */
export class PipelineOrchestrator {
  private readonly log: Logger;

  constructor(private readonly options: OrchestratorOptions) {
    this.log = options.logger ?? rootLogger.child({ component: 'orchestrator' });
  }

  async run(window: DateWindow): Promise<RunResult> {
    const { sources, teams, canonicalizer } = this.options;
    const targets = canonicalizer.targetKeys(teams);
    const payloads = new Map<string, SourcePayload>();
    const passes: PassReport[] = [];
    const collected: NormalizedFixture[] = [];

    this.log.info(
      { sources: sources.map((s) => s.config.id), teams, from: window.from, to: window.to },
      'Pipeline run started',
    );

    for (const source of sources) {
      for (const team of teams) {
        const report = await this.runPass(source, team, window, targets, payloads, collected);
        passes.push(report);
      }
    }

    const fixtures = dedupeFixtures(collected);
    const report: RunReport = {
      window,
      passes,
      totalsBeforeDedup: this.totalsByTeam(collected),
      totalsAfterDedup: this.totalsByTeam(fixtures),
      collected: collected.length,
      unique: fixtures.length,
    };
    this.log.info(
      { collected: collected.length, unique: fixtures.length, errored: passes.filter((p) => p.state === 'errored').length },
      'Pipeline run finished',
    );
    return { fixtures, report };
  }

  private async runPass(
    source: SourceAdapter,
    team: string,
    window: DateWindow,
    targets: ReadonlySet<string>,
    payloads: Map<string, SourcePayload>,
    out: NormalizedFixture[],
  ): Promise<PassReport> {
    const log = this.log.child({ source: source.config.id, team });
    const report: PassReport = {
      source: source.config.id,
      team,
      state: 'resolving',
      extracted: 0,
      kept: 0,
      dropped: emptyDrops(),
      yearInferred: 0,
      timeUnknown: 0,
      cached: false,
    };

    try {
      const target = await source.resolveTarget(team, window);

      report.state = 'fetching';
      const cacheKey = `${source.config.id}:${target.cacheKey}`;
      let payload = payloads.get(cacheKey);
      if (payload) {
        report.cached = true;
        log.debug({ cacheKey }, 'Reusing payload fetched earlier in this run');
      } else {
        payload = await source.fetchPayload(target);
        payloads.set(cacheKey, payload);
      }

      report.state = 'extracting';
      const events = source.extract(payload);
      report.extracted = events.length;
      if (events.length === 0) {
        report.failedAt = 'extracting';
        report.state = 'errored';
        report.errorKind = 'empty_extraction';
        report.error = 'No fixtures extracted';
        log.warn('No fixtures extracted');
        return report;
      }

      report.state = 'normalizing';
      const normalized: NormalizedFixture[] = [];
      for (const raw of events) {
        const result = normalizeEvent(raw, {
          source: source.config,
          canonicalizer: this.options.canonicalizer,
          resolver: this.options.resolver,
          window,
          logger: log,
        });
        if (!result.ok) {
          report.dropped[result.reason]++;
          continue;
        }
        if (result.yearInferred) report.yearInferred++;
        if (!result.timeKnown) report.timeUnknown++;
        report.state = 'filtering';
        if (!isWithinWindow(result.date, window)) {
          report.dropped.out_of_window++;
          continue;
        }
        if (!this.options.canonicalizer.involvesTarget(result.fixture.home_team, result.fixture.away_team, targets)) {
          report.dropped.not_target++;
          continue;
        }
        normalized.push(result.fixture);
      }

      out.push(...normalized);
      report.kept = normalized.length;
      report.state = 'done';
      log.info(
        {
          extracted: report.extracted,
          kept: report.kept,
          dropped: report.dropped,
          yearInferred: report.yearInferred,
          timeUnknown: report.timeUnknown,
        },
        'Pass completed',
      );
      return report;
    } catch (err) {
      if (isFatal(err)) {
        log.error({ err }, 'Non-recoverable error, aborting run');
        throw err;
      }
      report.failedAt = report.state;
      report.state = 'errored';
      if (isPipelineError(err)) {
        report.errorKind = err.kind;
        report.error = err.message;
        log.warn({ kind: err.kind, failedAt: report.failedAt, err: err.message }, 'Pass failed');
      } else {
        report.errorKind = 'unexpected';
        report.error = err instanceof Error ? err.message : String(err);
        log.error({ err, failedAt: report.failedAt }, 'Pass failed with an unexpected error');
      }
      return report;
    }
  }

  private totalsByTeam(fixtures: readonly NormalizedFixture[]): Record<string, number> {
    const { canonicalizer, teams } = this.options;
    const totals: Record<string, number> = {};
    for (const team of teams) {
      const name = canonicalizer.canonicalize(team);
      totals[name] = fixtures.filter(
        (f) => canonicalizer.sameTeam(f.home_team, name) || canonicalizer.sameTeam(f.away_team, name),
      ).length;
    }
    return totals;
  }
}
