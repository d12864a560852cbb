import { RecordSummary, Scheme } from '../types';
import { formatBytes } from './formatBytes';

const SCHEME_ORDER: Scheme[] = ['datastream-structured', 'datastream-textual-fallback', 'legacy-dotted', 'unrecognized'];

export function formatSummaryMarkdown(summary: RecordSummary, cluster: string): string {
  const lines: string[] = [];

  lines.push(`# Index Ingest Summary — ${cluster}`);
  lines.push('');
  lines.push(`> Generated: ${summary.generatedAt}`);
  lines.push('');
  lines.push(`**${summary.totalRecords}** indices, **${formatBytes(summary.totalDailyIngestBytes)}** daily ingest`);
  lines.push('');

  lines.push('## Naming schemes');
  lines.push('');
  lines.push('| Scheme | Indices |');
  lines.push('|--------|---------|');
  for (const scheme of SCHEME_ORDER) {
    lines.push(`| ${scheme} | ${summary.byScheme[scheme]} |`);
  }
  lines.push('');

  if (summary.byApplication.length > 0) {
    lines.push('## Applications');
    lines.push('');
    lines.push('| Application | Indices | Daily ingest (bytes) | Daily ingest |');
    lines.push('|-------------|---------|----------------------|--------------|');
    for (const app of summary.byApplication) {
      lines.push(`| \`${app.application}\` | ${app.records} | ${app.dailyIngestBytes} | ${formatBytes(app.dailyIngestBytes)} |`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
