import type { PassReport, RunReport } from './pipeline/orchestrator.js';

export interface CliArgs {
  dryRun: boolean;
  /** Source ids from repeated --source flags, in the given order */
  sources: string[];
  help: boolean;
}

export const USAGE = 'Usage: fixture-aggregator [--dry-run] [--source <id>]...';

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { dryRun: false, sources: [], help: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--dry-run') {
      args.dryRun = true;
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--source') {
      const value = argv[++i];
      if (!value || value.startsWith('--')) throw new Error(`--source needs a value\n${USAGE}`);
      args.sources.push(value);
    } else if (arg.startsWith('--source=')) {
      const value = arg.slice('--source='.length);
      if (!value) throw new Error(`--source needs a value\n${USAGE}`);
      args.sources.push(value);
    } else {
      throw new Error(`Unknown argument: ${arg}\n${USAGE}`);
    }
  }
  return args;
}

function flagNote(pass: PassReport): string {
  const notes: string[] = [];
  if (pass.yearInferred > 0) notes.push(`${pass.yearInferred} year inferred`);
  if (pass.timeUnknown > 0) notes.push(`${pass.timeUnknown} without time`);
  return notes.length > 0 ? `, ${notes.join(', ')}` : '';
}

/** Human-readable run summary, one line per pass and per team. */
export function formatRunSummary(report: RunReport): string {
  const lines = [`Window ${report.window.from} .. ${report.window.to}`];
  for (const pass of report.passes) {
    const outcome =
      pass.state === 'done'
        ? `kept ${pass.kept}/${pass.extracted}${pass.cached ? ' (cached page)' : ''}${flagNote(pass)}`
        : `errored at ${pass.failedAt ?? 'unknown'}: ${pass.error ?? 'no detail'}`;
    lines.push(`  ${pass.source.padEnd(13)} ${pass.team.padEnd(12)} ${outcome}`);
  }
  lines.push('Fixtures per team (before -> after dedup):');
  for (const [team, before] of Object.entries(report.totalsBeforeDedup)) {
    lines.push(`  ${team.padEnd(12)} ${before} -> ${report.totalsAfterDedup[team] ?? 0}`);
  }
  lines.push(`Total: ${report.collected} collected, ${report.unique} unique`);
  return lines.join('\n');
}
