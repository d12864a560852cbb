import { Client } from '@elastic/elasticsearch';

export interface TimestampBounds {
  first: string;
  last: string;
}

/** Read side of a cluster, as far as ingest stats need it. */
export interface IndexStatsSource {
  listIndices(): Promise<string[]>;
  /** At least one document with @timestamp in [start, end). */
  hasDocumentsBetween(index: string, start: Date, end: Date): Promise<boolean>;
  primaryStoreBytes(index: string): Promise<number>;
  /** @timestamp of the oldest and newest document; 'N/A' where absent. */
  timestampBounds(index: string): Promise<TimestampBounds>;
}

interface TimestampedDocument {
  '@timestamp'?: string;
}

export class ElasticsearchStatsSource implements IndexStatsSource {
  constructor(private readonly client: Client) {}

  async listIndices(): Promise<string[]> {
    const rows = await this.client.cat.indices({ format: 'json', h: 'index' });
    return rows.flatMap(row => (row.index ? [row.index] : []));
  }

  async hasDocumentsBetween(index: string, start: Date, end: Date): Promise<boolean> {
    const response = await this.client.search({
      index,
      size: 1,
      allow_no_indices: true,
      query: { range: { '@timestamp': { gte: start.toISOString(), lt: end.toISOString() } } },
    });
    return response.hits.hits.length > 0;
  }

  async primaryStoreBytes(index: string): Promise<number> {
    const stats = await this.client.indices.stats({ index, metric: 'store' });
    return stats.indices?.[index]?.primaries?.store?.size_in_bytes ?? 0;
  }

  async timestampBounds(index: string): Promise<TimestampBounds> {
    const [first, last] = await Promise.all([
      this.edgeTimestamp(index, 'asc'),
      this.edgeTimestamp(index, 'desc'),
    ]);
    return { first, last };
  }

  private async edgeTimestamp(index: string, order: 'asc' | 'desc'): Promise<string> {
    const response = await this.client.search<TimestampedDocument>({
      index,
      size: 1,
      _source: ['@timestamp'],
      sort: [{ '@timestamp': { order } }],
    });
    return response.hits.hits[0]?._source?.['@timestamp'] ?? 'N/A';
  }
}
