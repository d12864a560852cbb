import * as path from 'path';
import chalk from 'chalk';
import { INDEX_RECORD_COLUMNS, ProcessCommandOptions, loadConfig, loadIngestTarget } from '../types';
import { formatDelimited } from '../shared/delimitedText';
import { summarizeRecords } from '../analyzers/recordSummarizer';
import { createElasticClient } from '../elastic/elasticClient';
import { ElasticsearchSink, ingestRecords } from '../elastic/documentSink';
import { confirmIngest } from '../prompts/ingestPrompt';
import { formatSummaryMarkdown } from '../reporters/summaryMarkdownFormatter';
import { createSpinner, showHeader, showSummary, showWrittenFile } from '../reporters/consoleReporter';
import { ProcessedFile, defaultOutputPath, processStatsFile, writeTextFile } from './commandPipeline';

export async function runProcess(options: ProcessCommandOptions): Promise<void> {
  const inputPath = path.resolve(options.file);
  const config = loadConfig(process.cwd());

  // Fail before doing any work when the load target is incomplete
  const target = options.ingest ? loadIngestTarget(process.env, config) : undefined;

  showHeader();

  const spinner = createSpinner('Parsing index names...');
  spinner.start();
  let processed: ProcessedFile;
  try {
    processed = processStatsFile(inputPath, options.delimiter, options, options.cluster);
  } catch (error) {
    spinner.fail('Could not read the ingest stats file');
    throw error;
  }
  const { cluster, records } = processed;
  spinner.succeed(`Parsed ${records.length} index names (cluster: ${cluster})`);

  const outputPath = path.resolve(options.output ?? defaultOutputPath(inputPath));
  writeTextFile(outputPath, formatDelimited(records, INDEX_RECORD_COLUMNS, options.delimiter));
  showWrittenFile('Processed data saved to', outputPath);
  console.log('');

  const summary = summarizeRecords(records);
  showSummary(summary);

  if (options.summary) {
    const summaryPath = path.resolve(options.summary);
    writeTextFile(summaryPath, formatSummaryMarkdown(summary, cluster));
    showWrittenFile('Summary saved to', summaryPath);
    console.log('');
  }

  if (!target) return;

  const interactive = options.interactive && !options.yes && process.stdin.isTTY === true;
  if (interactive && !(await confirmIngest(records.length, target.index, target.host))) {
    console.log(chalk.gray('  Bulk load cancelled\n'));
    return;
  }

  spinner.start(`Loading into ${target.index}...`);
  const client = createElasticClient(target);
  try {
    const result = await ingestRecords(new ElasticsearchSink(client), target.index, records);
    spinner.succeed(`Data ingested into Elasticsearch index: ${target.index} (${result.successful} documents)`);
  } catch (error) {
    spinner.fail('Bulk load failed');
    throw error;
  } finally {
    await client.close();
  }
}
