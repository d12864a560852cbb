import { ApplicationTotal, IndexRecord, RecordSummary, Scheme } from '../types';

export const UNRECOGNIZED_APPLICATION = '(unrecognized)';

/**
 * Totals per scheme and per application. Applications are sorted by daily
 * bytes, largest first, then by name.
 */
export function summarizeRecords(records: IndexRecord[]): RecordSummary {
  const byScheme: Record<Scheme, number> = {
    'legacy-dotted': 0,
    'datastream-structured': 0,
    'datastream-textual-fallback': 0,
    'unrecognized': 0,
  };
  const apps = new Map<string, ApplicationTotal>();
  let totalDailyIngestBytes = 0;

  for (const record of records) {
    byScheme[record.scheme]++;
    totalDailyIngestBytes += record.daily_ingest_bytes;

    const application = record.application ?? UNRECOGNIZED_APPLICATION;
    const entry = apps.get(application) ?? { application, records: 0, dailyIngestBytes: 0 };
    entry.records++;
    entry.dailyIngestBytes += record.daily_ingest_bytes;
    apps.set(application, entry);
  }

  const byApplication = [...apps.values()].sort((a, b) =>
    b.dailyIngestBytes - a.dailyIngestBytes || a.application.localeCompare(b.application),
  );

  return {
    generatedAt: new Date().toISOString(),
    totalRecords: records.length,
    totalDailyIngestBytes,
    byScheme,
    byApplication,
  };
}
