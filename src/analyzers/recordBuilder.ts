import * as path from 'path';
import { IndexRecord, IngestStatsRow, INGEST_STATS_COLUMNS, ParseOptions } from '../types';
import { DelimitedTable, resolveColumns } from '../shared/delimitedText';
import { parseIdentifier } from './identifierParser';
import { classifyEnvironment } from './environmentClassifier';
import { mbToBytes, parseIngestMb } from './ingestRate';

/** "exports/prod-eu.2024-06-01.csv" → "prod-eu" */
export function clusterFromFileName(filePath: string): string {
  return path.basename(filePath).split('.')[0];
}

/**
 * Reads ingest stats rows out of a parsed table. Row numbers in errors are
 * 1-based and count the header.
 */
export function readIngestStatsRows(table: DelimitedTable): IngestStatsRow[] {
  const column = resolveColumns(table.header, INGEST_STATS_COLUMNS);
  return table.rows.map((row, i) => {
    let dailyIngestMb: number;
    try {
      dailyIngestMb = parseIngestMb(column(row, 'daily_ingest_mb'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Row ${i + 2}: ${message}`);
    }
    return {
      index: column(row, 'index'),
      first_timestamp: column(row, 'first_timestamp'),
      last_timestamp: column(row, 'last_timestamp'),
      daily_ingest_mb: dailyIngestMb,
    };
  });
}

export function buildIndexRecord(row: IngestStatsRow, cluster: string, options: ParseOptions = {}): IndexRecord {
  const parsed = parseIdentifier(row.index, options);
  return {
    index_name: row.index,
    cluster,
    first_timestamp: row.first_timestamp,
    last_timestamp: row.last_timestamp,
    daily_ingest_bytes: mbToBytes(row.daily_ingest_mb),
    environment_class: classifyEnvironment(row.index),
    scheme: parsed.scheme,
    type: parsed.type,
    dataset: parsed.dataset,
    namespace: parsed.namespace,
    environment: parsed.environment,
    environment_token: parsed.scheme === 'datastream-textual-fallback' ? parsed.environmentToken : null,
    application: parsed.application,
    date: parsed.date,
    iteration: parsed.iteration,
  };
}
