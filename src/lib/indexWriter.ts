import { getConfig, type AppConfig } from '../config';
import { ElasticsearchIndexWriter } from '../sync/elasticsearchIndexWriter';
import { MemoryIndexWriter } from '../sync/memoryIndexWriter';
import type { IndexWriter } from '../sync/types';

let indexWriter: IndexWriter | null = null;

export const createIndexWriter = (config: AppConfig): IndexWriter => {
  if (config.index.backend === 'memory') {
    return new MemoryIndexWriter();
  }

  const { elasticsearch } = config.index;

  return new ElasticsearchIndexWriter({
    url: elasticsearch.url,
    index: elasticsearch.index,
    timeoutMs: elasticsearch.timeoutMs,
    credentials: elasticsearch.credentials,
  });
};

export const getIndexWriter = (): IndexWriter => {
  if (!indexWriter) {
    indexWriter = createIndexWriter(getConfig());
  }

  return indexWriter;
};

export const resetIndexWriter = () => {
  indexWriter = null;
};
