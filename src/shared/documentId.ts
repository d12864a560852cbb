import { createHash } from 'crypto';

/** SHA-256 hex of the index name; reloading a file overwrites instead of duplicating. */
export function generateDocumentId(indexName: string): string {
  return createHash('sha256').update(indexName, 'utf8').digest('hex');
}
