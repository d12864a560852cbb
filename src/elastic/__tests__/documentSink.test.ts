import { describe, it, expect, vi } from 'vitest';
import { BulkResult, DocumentSink, IdentifiedDocument, ingestRecords } from '../documentSink';
import { buildIndexRecord } from '../../analyzers/recordBuilder';
import { generateDocumentId } from '../../shared/documentId';

function createSink(result?: (documents: IdentifiedDocument[]) => BulkResult) {
  const calls: Array<{ index: string; documents: IdentifiedDocument[] }> = [];
  const sink: DocumentSink = {
    bulkIndex: vi.fn(async (index: string, documents: IdentifiedDocument[]) => {
      calls.push({ index, documents });
      return result
        ? result(documents)
        : { total: documents.length, successful: documents.length, failed: 0 };
    }),
  };
  return { sink, calls };
}

const records = ['metrics.payments.prod', '.ds-logs-nginx-2024.01.15-000001'].map(index =>
  buildIndexRecord({ index, first_timestamp: '', last_timestamp: '', daily_ingest_mb: 1 }, 'eu'),
);

describe('ingestRecords', () => {
  it('keys every document by the hash of its index name', async () => {
    const { sink, calls } = createSink();
    const result = await ingestRecords(sink, 'index-catalog', records);

    expect(result).toEqual({ total: 2, successful: 2, failed: 0 });
    expect(calls).toHaveLength(1);
    expect(calls[0].index).toBe('index-catalog');
    expect(calls[0].documents.map(d => d.id)).toEqual([
      generateDocumentId('metrics.payments.prod'),
      generateDocumentId('.ds-logs-nginx-2024.01.15-000001'),
    ]);
    expect(calls[0].documents[1].source).toBe(records[1]);
  });

  it('sends one bulk request per chunk', async () => {
    const { sink, calls } = createSink();
    const many = ['a.b', 'c.d', 'e.f', 'g.h', 'i.j'].map(index =>
      buildIndexRecord({ index, first_timestamp: '', last_timestamp: '', daily_ingest_mb: 0 }, 'eu'),
    );

    const result = await ingestRecords(sink, 'index-catalog', many, 2);

    expect(result).toEqual({ total: 5, successful: 5, failed: 0 });
    expect(calls.map(c => c.documents.map(d => d.source.index_name))).toEqual([
      ['a.b', 'c.d'],
      ['e.f', 'g.h'],
      ['i.j'],
    ]);
  });

  it('adds up rejections across chunks', async () => {
    const { sink } = createSink(docs => ({ total: docs.length, successful: docs.length - 1, failed: 1 }));
    await expect(ingestRecords(sink, 'index-catalog', records, 1))
      .rejects.toThrow('2 of 2 documents were rejected by index "index-catalog"');
  });

  it('throws when documents are rejected', async () => {
    const { sink } = createSink(docs => ({ total: docs.length, successful: docs.length - 1, failed: 1 }));
    await expect(ingestRecords(sink, 'index-catalog', records))
      .rejects.toThrow('1 of 2 documents were rejected by index "index-catalog"');
  });

  it('does not call the sink for an empty batch', async () => {
    const { sink } = createSink();
    await expect(ingestRecords(sink, 'index-catalog', [])).resolves.toEqual({ total: 0, successful: 0, failed: 0 });
    expect(sink.bulkIndex).not.toHaveBeenCalled();
  });
});
