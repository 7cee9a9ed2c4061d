#!/usr/bin/env node
import { createRegistry } from './adapters/index.js';
import { parseCliArgs, formatRunSummary, USAGE } from './cli.js';
import { config } from './config.js';
import { DateTimeResolver } from './pipeline/datetime.js';
import { PipelineOrchestrator } from './pipeline/orchestrator.js';
import { MINEIRO_TEAMS } from './pipeline/team-aliases.js';
import { TeamCanonicalizer } from './pipeline/team-resolver.js';
import { IngestClient, prepareMatch } from './sink/ingest-client.js';
import type { DateWindow } from './types/fixture.js';
import { assertTimeZone, shiftIsoDate, todayDateString } from './utils/date.js';
import { logger } from './utils/logger.js';

function runWindow(now: Date = new Date()): DateWindow {
  const today = todayDateString(config.LOCAL_TIMEZONE, now);
  return { from: shiftIsoDate(today, -config.DAYS_BACK), to: shiftIsoDate(today, config.DAYS_FORWARD) };
}

async function main(argv: readonly string[]): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  assertTimeZone(config.LOCAL_TIMEZONE);
  const dryRun = args.dryRun || config.DRY_RUN;
  const sink =
    dryRun || !config.INGEST_URL || !config.INGEST_TOKEN
      ? null
      : new IngestClient({ baseUrl: config.INGEST_URL, token: config.INGEST_TOKEN, timeoutMs: config.HTTP_TIMEOUT_MS });
  if (!dryRun && !sink) {
    throw new Error('INGEST_URL and INGEST_TOKEN are required unless running with --dry-run or DRY_RUN=1');
  }

  const registry = createRegistry({
    timeoutMs: config.HTTP_TIMEOUT_MS,
    maxAttempts: config.MAX_ATTEMPTS,
    backoffMs: config.BACKOFF_MS,
    minDelayMs: config.REQUEST_DELAY_MS,
    geMineiro: {
      cacheFile: config.GE_CACHE_FILE,
      writeCache: config.GE_CACHE,
      offline: config.GE_OFFLINE,
      debugHtmlFile: config.GE_DEBUG_HTML || undefined,
    },
    ...(config.API_FOOTBALL_KEY
      ? {
          apiFootball: {
            apiKey: config.API_FOOTBALL_KEY,
            host: config.API_FOOTBALL_HOST,
            timeZone: config.LOCAL_TIMEZONE,
          },
        }
      : {}),
  });

  const canonicalizer = new TeamCanonicalizer(MINEIRO_TEAMS);
  const orchestrator = new PipelineOrchestrator({
    sources: registry.select(args.sources.length > 0 ? args.sources : config.SOURCES),
    teams: config.TEAMS.map((team) => canonicalizer.canonicalize(team)),
    canonicalizer,
    resolver: new DateTimeResolver({ timeZone: config.LOCAL_TIMEZONE }),
  });

  const window = runWindow();
  logger.info({ window, dryRun, teams: config.TEAMS }, 'Starting fixture aggregation');
  const { fixtures, report } = await orchestrator.run(window);
  console.log(formatRunSummary(report));

  if (!sink) {
    console.log(JSON.stringify({ matches: fixtures.map((f) => prepareMatch(f)) }, null, 2));
    logger.info({ fixtures: fixtures.length }, 'Dry run, nothing posted');
    return 0;
  }
  if (fixtures.length === 0) {
    logger.warn('No fixtures collected, nothing to post');
    return 0;
  }

  const result = await sink.postMatches(fixtures);
  if (!result.ok) {
    logger.error({ status: result.statusCode, body: result.raw }, 'Ingest failed');
    return 1;
  }
  logger.info({ posted: fixtures.length, response: result.body }, 'Fixtures posted');
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Run aborted');
    process.exit(1);
  });
