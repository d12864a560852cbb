import { describe, it, expect } from 'vitest';
import { summarizeRecords, UNRECOGNIZED_APPLICATION } from '../recordSummarizer';
import { buildIndexRecord } from '../recordBuilder';
import { IndexRecord } from '../../types';

function record(index: string, dailyIngestMb: number): IndexRecord {
  return buildIndexRecord({ index, first_timestamp: '', last_timestamp: '', daily_ingest_mb: dailyIngestMb }, 'eu');
}

describe('summarizeRecords', () => {
  const records = [
    record('.ds-logs-nginx.access-prod-2024.01.15-000001', 1),
    record('.ds-logs-nginx.access-prod-2024.01.16-000002', 2),
    record('metrics.payments.prod', 4),
    record('randomname123', 0.5),
  ];

  it('counts records per scheme', () => {
    expect(summarizeRecords(records).byScheme).toEqual({
      'legacy-dotted': 1,
      'datastream-structured': 2,
      'datastream-textual-fallback': 0,
      'unrecognized': 1,
    });
  });

  it('totals daily bytes per application, largest first', () => {
    const summary = summarizeRecords(records);
    expect(summary.totalRecords).toBe(4);
    expect(summary.totalDailyIngestBytes).toBe(7.5 * 1048576);
    expect(summary.byApplication).toEqual([
      { application: 'metrics.payments', records: 1, dailyIngestBytes: 4194304 },
      { application: 'nginx.access', records: 2, dailyIngestBytes: 3145728 },
      { application: UNRECOGNIZED_APPLICATION, records: 1, dailyIngestBytes: 524288 },
    ]);
  });

  it('summarizes an empty list', () => {
    const summary = summarizeRecords([]);
    expect(summary.totalRecords).toBe(0);
    expect(summary.byApplication).toEqual([]);
  });
});
