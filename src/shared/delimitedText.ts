/**
 * Minimal delimited-text (CSV) support: one header row, double-quoted
 * fields may contain the delimiter, quotes ("") and line breaks.
 */

export interface DelimitedTable {
  header: string[];
  rows: string[][];
}

export function parseDelimited(content: string, delimiter: string): DelimitedTable {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  const text = content.startsWith('\uFEFF') ? content.slice(1) : content;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"' && field === '') {
      inQuotes = true;
    } else if (ch === delimiter) {
      record.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else {
      field += ch;
    }
  }
  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  // blank lines
  const nonEmpty = records.filter(r => !(r.length === 1 && r[0] === ''));
  if (nonEmpty.length === 0) {
    return { header: [], rows: [] };
  }
  const [header, ...rows] = nonEmpty;
  return { header: header.map(h => h.trim()), rows };
}

export type ColumnReader<K extends string> = (row: string[], column: K) => string;

/**
 * Reader for the required columns of a header.
 * Throws naming every missing column.
 */
export function resolveColumns<K extends string>(header: string[], required: readonly K[]): ColumnReader<K> {
  const missing = required.filter(c => !header.includes(c));
  if (missing.length > 0) {
    throw new Error(`Missing column(s) in header: ${missing.join(', ')}`);
  }
  const positions = new Map<string, number>(required.map((c): [string, number] => [c, header.indexOf(c)]));
  return (row, column) => row[positions.get(column) ?? -1] ?? '';
}

function quote(value: string, delimiter: string): string {
  if (value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

type Cell = string | number | boolean | null | undefined;

/** Header plus one line per row; null and undefined become empty cells. */
export function formatDelimited<C extends string>(
  rows: Record<C, Cell>[],
  columns: readonly C[],
  delimiter: string,
): string {
  const lines: string[] = [columns.map(c => quote(c, delimiter)).join(delimiter)];
  for (const row of rows) {
    lines.push(columns.map(c => {
      const value = row[c];
      return quote(value === null || value === undefined ? '' : String(value), delimiter);
    }).join(delimiter));
  }
  return lines.join('\n') + '\n';
}
