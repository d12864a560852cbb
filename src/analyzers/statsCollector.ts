import { setTimeout as sleep } from 'timers/promises';
import { IngestStatsRow } from '../types';
import { IndexStatsSource } from '../elastic/indexStatsSource';
import { calculateDailyIngest } from './ingestRate';

export interface DayWindow {
  start: Date;
  end: Date;
}

export interface SkippedIndex {
  index: string;
  reason: string;
}

export interface CollectResult {
  window: DayWindow;
  totalIndices: number;
  rows: IngestStatsRow[];
  skipped: SkippedIndex[];
}

export interface CollectOptions {
  window: DayWindow;
  /** Pause between per-index stats requests. */
  pauseMs?: number;
  onPhase?: (phase: 'checking' | 'measuring', index: string, position: number, total: number) => void;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * UTC day containing `date` (YYYY-MM-DD), or today when omitted.
 */
export function dayWindow(date: string | undefined, now: Date = new Date()): DayWindow {
  let start: Date;
  if (date) {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(date) || Number.isNaN(Date.parse(`${date}T00:00:00Z`))) {
      throw new Error(`Invalid date "${date}", expected YYYY-MM-DD`);
    }
    start = new Date(`${date}T00:00:00Z`);
  } else {
    start = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
  }
  return { start, end: new Date(start.getTime() + DAY_MS) };
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Lists indices with documents inside the window and measures each one.
 * An index whose requests fail is skipped and reported, not fatal.
 */
export async function collectIngestStats(source: IndexStatsSource, options: CollectOptions): Promise<CollectResult> {
  const { window, pauseMs = 0, onPhase } = options;
  const indices = await source.listIndices();
  const skipped: SkippedIndex[] = [];

  const active: string[] = [];
  for (let i = 0; i < indices.length; i++) {
    const index = indices[i];
    onPhase?.('checking', index, i + 1, indices.length);
    try {
      if (await source.hasDocumentsBetween(index, window.start, window.end)) {
        active.push(index);
      }
    } catch (error) {
      skipped.push({ index, reason: reasonOf(error) });
    }
  }

  const rows: IngestStatsRow[] = [];
  for (let i = 0; i < active.length; i++) {
    const index = active[i];
    onPhase?.('measuring', index, i + 1, active.length);
    try {
      const sizeInBytes = await source.primaryStoreBytes(index);
      const { first, last } = await source.timestampBounds(index);
      rows.push({
        index,
        first_timestamp: first,
        last_timestamp: last,
        daily_ingest_mb: calculateDailyIngest(sizeInBytes, first, last),
      });
    } catch (error) {
      skipped.push({ index, reason: reasonOf(error) });
    }
    if (pauseMs > 0 && i < active.length - 1) {
      await sleep(pauseMs);
    }
  }

  return { window, totalIndices: indices.length, rows, skipped };
}
