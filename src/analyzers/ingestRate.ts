const MIB = 1024 * 1024;

function parseTimestamp(value: string): number {
  return Date.parse(value);
}

/**
 * Store size extrapolated to MiB per day from the span between the first and
 * last document, rounded to two decimals. 0 when the span is empty or a
 * timestamp cannot be read.
 */
export function calculateDailyIngest(sizeInBytes: number, firstTimestamp: string, lastTimestamp: string): number {
  const first = parseTimestamp(firstTimestamp);
  const last = parseTimestamp(lastTimestamp);
  if (Number.isNaN(first) || Number.isNaN(last)) return 0;

  const durationHours = (last - first) / 3_600_000;
  if (durationHours === 0) return 0;

  const dailyMb = (sizeInBytes / MIB) * (24 / durationHours);
  return Math.round(dailyMb * 100) / 100;
}

/** "12,5" and "12.5" both read as 12.5 */
export function parseIngestMb(value: string): number {
  const mb = Number(value.trim().replace(',', '.'));
  if (value.trim() === '' || Number.isNaN(mb)) {
    throw new Error(`Invalid daily_ingest_mb value: "${value}"`);
  }
  return mb;
}

export function mbToBytes(mb: number): number {
  return Math.trunc(mb * MIB);
}
