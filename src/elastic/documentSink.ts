import { Client } from '@elastic/elasticsearch';
import { IndexRecord } from '../types';
import { generateDocumentId } from '../shared/documentId';

export interface IdentifiedDocument {
  id: string;
  source: IndexRecord;
}

export interface BulkResult {
  total: number;
  successful: number;
  failed: number;
}

/** Bulk destination for combined records. */
export interface DocumentSink {
  bulkIndex(index: string, documents: IdentifiedDocument[]): Promise<BulkResult>;
}

export class ElasticsearchSink implements DocumentSink {
  constructor(private readonly client: Client) {}

  async bulkIndex(index: string, documents: IdentifiedDocument[]): Promise<BulkResult> {
    const response = await this.client.bulk({
      operations: documents.flatMap(doc => [{ index: { _index: index, _id: doc.id } }, doc.source]),
    });
    const failed = response.items.filter(item => item.index?.error !== undefined).length;
    return { total: documents.length, successful: documents.length - failed, failed };
  }
}

/** Documents per bulk request. */
export const BULK_CHUNK_SIZE = 500;

/**
 * Loads records keyed by the SHA-256 of their index name, one bulk request
 * per chunk. Throws when any document is rejected.
 */
export async function ingestRecords(
  sink: DocumentSink,
  index: string,
  records: IndexRecord[],
  chunkSize: number = BULK_CHUNK_SIZE,
): Promise<BulkResult> {
  const documents = records.map(record => ({ id: generateDocumentId(record.index_name), source: record }));
  const result: BulkResult = { total: 0, successful: 0, failed: 0 };

  for (let start = 0; start < documents.length; start += chunkSize) {
    const chunk = await sink.bulkIndex(index, documents.slice(start, start + chunkSize));
    result.total += chunk.total;
    result.successful += chunk.successful;
    result.failed += chunk.failed;
  }

  if (result.failed > 0) {
    throw new Error(`${result.failed} of ${result.total} documents were rejected by index "${index}"`);
  }
  return result;
}
