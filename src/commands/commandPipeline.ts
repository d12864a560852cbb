import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import {
  ConventionOrder, FallbackEnvironment, IndexLensConfig, IndexRecord,
  ParseOptions, StripMode,
} from '../types';
import { parseDelimited } from '../shared/delimitedText';
import { buildIndexRecord, clusterFromFileName, readIngestStatsRows } from '../analyzers/recordBuilder';

export interface ParseFlags {
  stripMode?: StripMode;
  fallbackEnvironment?: FallbackEnvironment;
  conventionOrder?: ConventionOrder;
  verbose?: boolean;
}

/**
 * CLI flags over `.indexlens.json` over defaults. In verbose mode each
 * textual-fallback entry is echoed in gray.
 */
export function resolveParseOptions(flags: ParseFlags, config: IndexLensConfig): ParseOptions {
  return {
    stripMode: flags.stripMode ?? config.stripMode,
    fallbackEnvironment: flags.fallbackEnvironment ?? config.fallbackEnvironment,
    conventionOrder: flags.conventionOrder ?? config.conventionOrder,
    log: flags.verbose ? message => console.log(chalk.gray(`  · ${message}`)) : undefined,
  };
}

/** commander argument parser for `--delimiter`. */
export function parseDelimiterOption(value: string): string {
  if (value.length !== 1) {
    throw new InvalidArgumentError('Expected a single character.');
  }
  return value;
}

export interface ProcessedFile {
  cluster: string;
  records: IndexRecord[];
}

/**
 * Reads an ingest stats file and turns each row into a combined record.
 */
export function processStatsFile(
  filePath: string,
  delimiter: string,
  parseOptions: ParseOptions,
  cluster?: string,
): ProcessedFile {
  if (!fs.existsSync(filePath)) {
    throw new Error(`File does not exist: ${filePath}`);
  }
  const table = parseDelimited(fs.readFileSync(filePath, 'utf-8'), delimiter);
  const rows = readIngestStatsRows(table);
  const clusterName = cluster ?? clusterFromFileName(filePath);
  return {
    cluster: clusterName,
    records: rows.map(row => buildIndexRecord(row, clusterName, parseOptions)),
  };
}

/** "stats.csv" → "stats.parsed.csv", next to the input. */
export function defaultOutputPath(inputPath: string): string {
  const ext = path.extname(inputPath);
  return path.join(path.dirname(inputPath), `${path.basename(inputPath, ext)}.parsed${ext || '.csv'}`);
}

export function writeTextFile(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(filePath, content, 'utf-8');
}
