import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { ParsedIdentifier, RecordSummary, Scheme } from '../types';
import { CollectResult } from '../analyzers/statsCollector';
import { formatBytes } from './formatBytes';

const schemeColors: Record<Scheme, (s: string) => string> = {
  'legacy-dotted': chalk.yellow,
  'datastream-structured': chalk.green,
  'datastream-textual-fallback': chalk.magenta,
  'unrecognized': chalk.red,
};

export function showHeader(): void {
  console.log('');
  console.log(chalk.bold.cyan('  indexlens') + chalk.gray(' — index name decomposition'));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}

function field(label: string, value: string | null): string {
  return `    ${chalk.gray(label.padEnd(13))}${value === null ? chalk.gray('-') : chalk.white(value)}`;
}

export function formatParsedIdentifier(identifier: string, parsed: ParsedIdentifier): string {
  const lines: string[] = [];
  lines.push(`  ${chalk.bold(identifier)} ${schemeColors[parsed.scheme](`[${parsed.scheme}]`)}`);
  if (parsed.scheme === 'unrecognized') {
    lines.push(chalk.gray('    no naming convention matched'));
    return lines.join('\n');
  }
  lines.push(field('type', parsed.type));
  lines.push(field('dataset', parsed.dataset));
  lines.push(field('namespace', parsed.namespace));
  lines.push(field('environment', parsed.environment));
  if (parsed.scheme === 'datastream-textual-fallback' && parsed.environmentToken !== parsed.environment) {
    lines.push(field('  (computed)', parsed.environmentToken));
  }
  lines.push(field('application', parsed.application));
  lines.push(field('date', parsed.date));
  lines.push(field('iteration', parsed.iteration));
  return lines.join('\n');
}

export function showSummary(summary: RecordSummary, top = 10): void {
  console.log(`  ${chalk.gray('Records:')} ${summary.totalRecords}  ${chalk.gray('Daily ingest:')} ${formatBytes(summary.totalDailyIngestBytes)}`);

  const parts: string[] = [];
  for (const [scheme, count] of Object.entries(summary.byScheme)) {
    if (count > 0) parts.push(`${count} ${scheme}`);
  }
  if (parts.length > 0) {
    console.log(`  ${chalk.gray('Schemes:')} ${parts.join('  ')}`);
  }

  const unrecognized = summary.byScheme.unrecognized;
  if (unrecognized > 0) {
    console.log(`  ${chalk.yellow('!')} ${unrecognized} unrecognized index names — flag for manual review`);
  } else {
    console.log(`  ${chalk.green('✓')} Every index name matched a naming convention`);
  }
  console.log('');

  if (summary.byApplication.length > 0) {
    console.log(`  ${chalk.gray('Top applications by daily ingest:')}`);
    for (const app of summary.byApplication.slice(0, top)) {
      console.log(`    ${chalk.gray('→')} ${chalk.white(app.application)} ${formatBytes(app.dailyIngestBytes)} (${app.records} indices)`);
    }
    if (summary.byApplication.length > top) {
      console.log(`    ${chalk.gray(`... and ${summary.byApplication.length - top} more`)}`);
    }
    console.log('');
  }
}

export function showCollectResult(result: CollectResult): void {
  console.log(`  ${chalk.gray('Window:')} ${result.window.start.toISOString()} → ${result.window.end.toISOString()}`);
  console.log(`  ${chalk.gray('Indices:')} ${result.totalIndices}  ${chalk.gray('Active:')} ${result.rows.length}`);
  if (result.skipped.length > 0) {
    console.log(`  ${chalk.yellow('!')} Skipped ${result.skipped.length} indices due to errors:`);
    for (const s of result.skipped.slice(0, 10)) {
      console.log(`    ${chalk.gray('→')} ${chalk.white(s.index)} ${chalk.gray(s.reason)}`);
    }
    if (result.skipped.length > 10) {
      console.log(`    ${chalk.gray(`... and ${result.skipped.length - 10} more`)}`);
    }
  }
  console.log('');
}

export function showWrittenFile(label: string, file: string): void {
  console.log(`  ${chalk.green('✓')} ${label}: ${chalk.white(file)}`);
}

export function createSpinner(text: string): Ora {
  return ora({
    text,
    indent: 2,
  });
}
