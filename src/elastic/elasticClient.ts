import { Client } from '@elastic/elasticsearch';
import { ElasticsearchTarget } from '../types';

export function createElasticClient(target: ElasticsearchTarget): Client {
  return new Client({
    node: target.host,
    auth: { apiKey: target.apiKey },
  });
}
