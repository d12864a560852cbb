import * as path from 'path';
import { CollectCommandOptions, INGEST_STATS_COLUMNS, loadCollectTarget } from '../types';
import { formatDelimited } from '../shared/delimitedText';
import { collectIngestStats, dayWindow } from '../analyzers/statsCollector';
import { createElasticClient } from '../elastic/elasticClient';
import { ElasticsearchStatsSource } from '../elastic/indexStatsSource';
import { createSpinner, showCollectResult, showHeader, showWrittenFile } from '../reporters/consoleReporter';
import { writeTextFile } from './commandPipeline';

export async function runCollect(options: CollectCommandOptions): Promise<void> {
  const target = loadCollectTarget(process.env);
  const window = dayWindow(options.date);

  showHeader();

  const client = createElasticClient(target);
  const spinner = createSpinner('Fetching all indices...');
  spinner.start();
  try {
    const result = await collectIngestStats(new ElasticsearchStatsSource(client), {
      window,
      pauseMs: options.pauseMs,
      onPhase: (phase, index, position, total) => {
        const verb = phase === 'checking' ? 'Checking' : 'Gathering stats for';
        spinner.text = `${verb} ${index} (${position}/${total})`;
      },
    });
    spinner.succeed(`Found ${result.rows.length} active indices`);
    showCollectResult(result);

    const outputPath = path.resolve(options.output);
    writeTextFile(outputPath, formatDelimited(result.rows, INGEST_STATS_COLUMNS, options.delimiter));
    showWrittenFile('Ingest stats written to', outputPath);
    console.log('');
  } catch (error) {
    spinner.fail('Collecting stats failed');
    throw error;
  } finally {
    await client.close();
  }
}
