#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { ConventionOrder, FallbackEnvironment, StripMode, loadConfig } from './types';
import { runParse } from './commands/parse';
import { runProcess } from './commands/process';
import { runCollect } from './commands/collect';
import { ParseFlags, parseDelimiterOption, resolveParseOptions } from './commands/commandPipeline';

interface ParseFlagValues {
  stripMode?: StripMode;
  fallbackEnvironment?: FallbackEnvironment;
  conventionOrder?: ConventionOrder;
  verbose: boolean;
}

function addParseFlags(command: Command): Command {
  return command
    .addOption(new Option('--strip-mode <mode>', 'How the .ds- marker is removed in the textual fallback')
      .choices(['character-class', 'literal-prefix']))
    .addOption(new Option('--fallback-environment <value>', 'What the textual fallback reports as environment')
      .choices(['application', 'token']))
    .addOption(new Option('--convention-order <order>', 'Try structured patterns before or after the textual fallback')
      .choices(['structured-first', 'fallback-first']))
    .option('--verbose', 'Log every textual-fallback classification', false);
}

function toParseFlags(values: ParseFlagValues): ParseFlags {
  return {
    stripMode: values.stripMode,
    fallbackEnvironment: values.fallbackEnvironment,
    conventionOrder: values.conventionOrder,
    verbose: values.verbose,
  };
}

function parseInteger(value: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`\nError: ${message}`);
  process.exit(1);
}

const program = new Command();
const config = loadConfig(process.cwd());

program
  .name('indexlens')
  .description('Decompose log/metrics index names into dataset, namespace, environment and application')
  .version('0.1.0');

addParseFlags(
  program
    .command('parse')
    .description('Classify index names and print their fields')
    .argument('<identifiers...>', 'Index names to parse')
    .addOption(new Option('--format <format>', 'Output format').choices(['console', 'json']).default('console')),
).action((identifiers: string[], options: ParseFlagValues & { format: 'console' | 'json' }) => {
  try {
    runParse({
      identifiers,
      format: options.format,
      ...resolveParseOptions(toParseFlags(options), config),
    });
  } catch (error) {
    fail(error);
  }
});

addParseFlags(
  program
    .command('process')
    .description('Parse every index of an ingest stats file and write combined records')
    .requiredOption('-f, --file <file>', 'Path to input CSV file')
    .option('-o, --output <file>', 'Output file (default: <input>.parsed.csv)')
    .option('--cluster <name>', 'Cluster label (default: input file name up to the first dot)')
    .option('--delimiter <char>', 'Field delimiter for input and output', parseDelimiterOption, config.delimiter)
    .option('--summary <file>', 'Write a Markdown summary to this file')
    .option('--ingest', 'Bulk-load the records into Elasticsearch (ES_HOST, ES_INDEX, ES_API_KEY)', false)
    .option('-y, --yes', 'Skip the confirmation before bulk loading', false)
    .option('--no-interactive', 'Never prompt'),
).action(async (options: ParseFlagValues & {
  file: string;
  output?: string;
  cluster?: string;
  delimiter: string;
  summary?: string;
  ingest: boolean;
  yes: boolean;
  interactive: boolean;
}) => {
  try {
    await runProcess({
      file: options.file,
      output: options.output,
      cluster: options.cluster,
      delimiter: options.delimiter,
      summary: options.summary,
      ingest: options.ingest,
      yes: options.yes,
      interactive: options.interactive !== false,
      ...resolveParseOptions(toParseFlags(options), config),
    });
  } catch (error) {
    fail(error);
  }
});

program
  .command('collect')
  .description('List indices with data for a day and write their ingest stats (ELASTICSEARCH_HOST, ELASTICSEARCH_APIKEY)')
  .option('-o, --output <file>', 'Output file', 'daily_ingest_report.csv')
  .option('--date <day>', 'UTC day to check, YYYY-MM-DD (default: today)')
  .option('--delimiter <char>', 'Field delimiter', parseDelimiterOption, config.delimiter)
  .option('--pause <ms>', 'Pause between per-index stats requests', parseInteger, 100)
  .action(async (options: { output: string; date?: string; delimiter: string; pause: number }) => {
    try {
      await runCollect({
        output: options.output,
        date: options.date,
        delimiter: options.delimiter,
        pauseMs: options.pause,
      });
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
