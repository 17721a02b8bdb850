import { Inject, Injectable, Logger } from '@nestjs/common';
import { DEDUP_CONFIG, DedupConfig } from '../config/dedup.config';
import {
  VectorMatch,
  VectorMetadata,
  VectorRecord,
} from '../types/intel.types';
import { errorMessage, mapWithConcurrency } from '../utils/concurrency.util';
import {
  EMBEDDING_PROVIDER,
  EmbeddingProvider,
  VECTOR_STORE,
  VectorIdPredicate,
  VectorStore,
} from '../stores/vector-store';

export interface VectorUpsertItem {
  id: number;
  text: string;
  metadata: VectorMetadata;
}

/**
 * Nearest-neighbour memory over intel summaries. Holds no state of its own:
 * vectors live in the injected store, and the embedding call is delegated.
 */
@Injectable()
export class VectorMemoryService {
  private readonly logger = new Logger(VectorMemoryService.name);

  constructor(
    @Inject(VECTOR_STORE) private readonly store: VectorStore,
    @Inject(EMBEDDING_PROVIDER) private readonly embedder: EmbeddingProvider,
    @Inject(DEDUP_CONFIG) private readonly config: DedupConfig,
  ) {}

  /** Throws `EmbeddingUnavailableError` when the provider gives up. */
  embed(text: string): Promise<number[]> {
    return this.embedder.embed(text);
  }

  async upsert(id: number, text: string, metadata: VectorMetadata): Promise<void> {
    const embedding = await this.embed(text);
    await this.store.upsert([{ id, embedding, metadata, text }]);
  }

  async upsertBatch(items: VectorUpsertItem[]): Promise<number> {
    if (items.length === 0) {
      return 0;
    }
    const settled = await mapWithConcurrency(
      items,
      this.config.embedConcurrency,
      async (item) => this.embed(item.text),
    );

    const records: VectorRecord[] = [];
    settled.forEach((result, index) => {
      const item = items[index];
      if (!result.ok) {
        this.logger.warn(
          `embedding skipped: id=${item.id} reason=${errorMessage(result.error)}`,
        );
        return;
      }
      records.push({ ...item, embedding: result.value });
    });

    return this.upsertEmbeddings(records);
  }

  async upsertEmbeddings(records: VectorRecord[]): Promise<number> {
    if (records.length === 0) {
      return 0;
    }
    await this.store.upsert(records);
    return records.length;
  }

  async search(
    text: string,
    k: number,
    filter?: Partial<VectorMetadata>,
  ): Promise<VectorMatch[]> {
    const embedding = await this.embed(text);
    return this.searchByEmbedding(embedding, k, filter);
  }

  searchByEmbedding(
    embedding: number[],
    k: number,
    filter?: Partial<VectorMetadata>,
    acceptId?: VectorIdPredicate,
  ): Promise<VectorMatch[]> {
    return this.store.query(embedding, k, filter, acceptId);
  }

  async findDuplicates(
    text: string,
    threshold: number,
    excludeIds: Iterable<number> = [],
  ): Promise<VectorMatch[]> {
    const excluded = new Set(excludeIds);
    const matches = await this.search(text, this.config.duplicateSearchK);
    return matches.filter(
      (match) => match.similarity >= threshold && !excluded.has(match.id),
    );
  }

  missingIds(ids: readonly number[]): Promise<number[]> {
    return this.store.missingIds(ids);
  }

  count(): Promise<number> {
    return this.store.count();
  }

  async reset(): Promise<void> {
    await this.store.reset();
    this.logger.log('vector index reset');
  }
}
