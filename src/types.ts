import * as fs from 'fs';
import * as path from 'path';

// === Identifier decomposition ===

export type Scheme =
  | 'legacy-dotted'                 // dataset.namespace.suffix
  | 'datastream-textual-fallback'   // any name carrying the .ds- marker that the patterns reject
  | 'datastream-structured'         // .ds-<type>-<dataset>[.<namespace>]-<date>-<iteration>
  | 'unrecognized';

export interface IdentifierFields {
  type: string | null;
  dataset: string | null;
  namespace: string | null;
  environment: string | null;
  application: string | null;
  /** YYYY-MM-DD */
  date: string | null;
  /** Raw token, leading zeros kept. */
  iteration: string | null;
}

export interface LegacyDottedIdentifier extends IdentifierFields {
  scheme: 'legacy-dotted';
  dataset: string;
  application: string;
}

export interface DataStreamStructuredIdentifier extends IdentifierFields {
  scheme: 'datastream-structured';
  type: string;
  dataset: string;
  application: string;
  date: string;
  iteration: string;
}

export interface DataStreamFallbackIdentifier extends IdentifierFields {
  scheme: 'datastream-textual-fallback';
  dataset: string;
  application: string;
  /**
   * Environment computed from the name. `environment` holds the application
   * unless `fallbackEnvironment` is 'token'.
   */
  environmentToken: string | null;
}

export interface UnrecognizedIdentifier extends IdentifierFields {
  scheme: 'unrecognized';
  type: null;
  dataset: null;
  namespace: null;
  environment: null;
  application: null;
  date: null;
  iteration: null;
}

export type ParsedIdentifier =
  | LegacyDottedIdentifier
  | DataStreamStructuredIdentifier
  | DataStreamFallbackIdentifier
  | UnrecognizedIdentifier;

export type StripMode = 'character-class' | 'literal-prefix';
export type FallbackEnvironment = 'application' | 'token';
export type ConventionOrder = 'structured-first' | 'fallback-first';

export interface ParseOptions {
  /** How the .ds- marker is removed before textual splitting. Default: 'character-class'. */
  stripMode?: StripMode;
  /** What the textual fallback reports as `environment`. Default: 'application'. */
  fallbackEnvironment?: FallbackEnvironment;
  /** Default: 'structured-first'. 'fallback-first' never reaches the structured patterns. */
  conventionOrder?: ConventionOrder;
  /** Diagnostic sink, called when the textual fallback is entered. */
  log?: (message: string) => void;
}

// === Records ===

export type EnvironmentClass = 'nonprod' | 'prod' | 'dev' | 'default' | 'operations' | 'other';

/** One row of the ingest stats file. */
export interface IngestStatsRow {
  index: string;
  first_timestamp: string;
  last_timestamp: string;
  daily_ingest_mb: number;
}

export interface IndexRecord {
  index_name: string;
  cluster: string;
  first_timestamp: string;
  last_timestamp: string;
  daily_ingest_bytes: number;
  environment_class: EnvironmentClass;
  scheme: Scheme;
  type: string | null;
  dataset: string | null;
  namespace: string | null;
  environment: string | null;
  /** Computed environment of a textual-fallback name; null for the other schemes. */
  environment_token: string | null;
  application: string | null;
  date: string | null;
  iteration: string | null;
}

export const INDEX_RECORD_COLUMNS: (keyof IndexRecord)[] = [
  'index_name',
  'cluster',
  'first_timestamp',
  'last_timestamp',
  'daily_ingest_bytes',
  'environment_class',
  'scheme',
  'type',
  'dataset',
  'namespace',
  'environment',
  'environment_token',
  'application',
  'date',
  'iteration',
];

export const INGEST_STATS_COLUMNS: (keyof IngestStatsRow)[] = [
  'index',
  'first_timestamp',
  'last_timestamp',
  'daily_ingest_mb',
];

// === Summary ===

export interface ApplicationTotal {
  application: string;
  records: number;
  dailyIngestBytes: number;
}

export interface RecordSummary {
  generatedAt: string;
  totalRecords: number;
  totalDailyIngestBytes: number;
  byScheme: Record<Scheme, number>;
  byApplication: ApplicationTotal[];
}

// === Command options ===

export interface ParseCommandOptions extends ParseOptions {
  identifiers: string[];
  format: 'console' | 'json';
}

export interface ProcessCommandOptions extends ParseOptions {
  file: string;
  output?: string;
  cluster?: string;
  delimiter: string;
  summary?: string;
  ingest: boolean;
  yes: boolean;
  interactive: boolean;
}

export interface CollectCommandOptions {
  output: string;
  date?: string;
  delimiter: string;
  pauseMs: number;
}

// === Configuration ===

export interface IndexLensConfig {
  delimiter: string;
  stripMode: StripMode;
  fallbackEnvironment: FallbackEnvironment;
  conventionOrder: ConventionOrder;
  /** Target index for bulk loading; ES_INDEX wins when set. */
  index?: string;
}

export const CONFIG_FILE = '.indexlens.json';

export const DEFAULT_CONFIG: IndexLensConfig = {
  delimiter: ';',
  stripMode: 'character-class',
  fallbackEnvironment: 'application',
  conventionOrder: 'structured-first',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find(a => a === value) ?? fallback;
}

/**
 * Reads `.indexlens.json` from the given directory. Unknown keys and values
 * outside the accepted set fall back to the defaults.
 */
export function loadConfig(dir: string): IndexLensConfig {
  const configPath = path.join(dir, CONFIG_FILE);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch { /* missing or malformed: defaults */
    return { ...DEFAULT_CONFIG };
  }
  if (!isRecord(raw)) {
    return { ...DEFAULT_CONFIG };
  }
  const config = raw;

  return {
    delimiter: typeof config.delimiter === 'string' && config.delimiter.length === 1
      ? config.delimiter
      : DEFAULT_CONFIG.delimiter,
    stripMode: pick(config.stripMode, ['character-class', 'literal-prefix'] as const, DEFAULT_CONFIG.stripMode),
    fallbackEnvironment: pick(config.fallbackEnvironment, ['application', 'token'] as const, DEFAULT_CONFIG.fallbackEnvironment),
    conventionOrder: pick(config.conventionOrder, ['structured-first', 'fallback-first'] as const, DEFAULT_CONFIG.conventionOrder),
    index: typeof config.index === 'string' && config.index ? config.index : undefined,
  };
}

export interface ElasticsearchTarget {
  host: string;
  apiKey: string;
}

/** Bulk-load target from ES_HOST / ES_API_KEY / ES_INDEX. */
export function loadIngestTarget(env: NodeJS.ProcessEnv, config: IndexLensConfig): ElasticsearchTarget & { index: string } {
  const apiKey = env.ES_API_KEY;
  if (!apiKey) {
    throw new Error('Elastic API key (ES_API_KEY) is not set in environment variables');
  }
  const host = env.ES_HOST;
  if (!host) {
    throw new Error('Elasticsearch host (ES_HOST) is not set in environment variables');
  }
  const index = env.ES_INDEX || config.index;
  if (!index) {
    throw new Error(`Target index is not set: define ES_INDEX or "index" in ${CONFIG_FILE}`);
  }
  return { host, apiKey, index };
}

/** Cluster to collect stats from; ELASTICSEARCH_* first, then ES_*. */
export function loadCollectTarget(env: NodeJS.ProcessEnv): ElasticsearchTarget {
  const host = env.ELASTICSEARCH_HOST || env.ES_HOST;
  const apiKey = env.ELASTICSEARCH_APIKEY || env.ES_API_KEY;
  if (!host) {
    throw new Error('Elasticsearch host (ELASTICSEARCH_HOST) is not set in environment variables');
  }
  if (!apiKey) {
    throw new Error('Elastic API key (ELASTICSEARCH_APIKEY) is not set in environment variables');
  }
  return { host, apiKey };
}
