import {
  VectorMatch,
  VectorMetadata,
  VectorRecord,
} from '../types/intel.types';
import { cosineSimilarity } from '../utils/similarity.util';
import { VectorIdPredicate, VectorStore } from './vector-store';

export class InMemoryVectorStore implements VectorStore {
  protected readonly records = new Map<number, VectorRecord>();

  async upsert(records: VectorRecord[]): Promise<void> {
    for (const record of records) {
      this.records.set(record.id, {
        id: record.id,
        embedding: [...record.embedding],
        metadata: { ...record.metadata },
        text: record.text,
      });
    }
  }

  async query(
    embedding: number[],
    k: number,
    filter?: Partial<VectorMetadata>,
    acceptId?: VectorIdPredicate,
  ): Promise<VectorMatch[]> {
    if (k <= 0) {
      return [];
    }
    const matches: VectorMatch[] = [];
    for (const record of this.records.values()) {
      if (acceptId && !acceptId(record.id)) {
        continue;
      }
      if (filter && !this.matchesFilter(record.metadata, filter)) {
        continue;
      }
      matches.push({
        id: record.id,
        similarity: cosineSimilarity(embedding, record.embedding),
        metadata: { ...record.metadata },
      });
    }
    return matches
      .sort((a, b) => b.similarity - a.similarity || a.id - b.id)
      .slice(0, k);
  }

  async missingIds(ids: readonly number[]): Promise<number[]> {
    return ids.filter((id) => !this.records.has(id));
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async reset(): Promise<void> {
    this.records.clear();
  }

  private matchesFilter(
    metadata: VectorMetadata,
    filter: Partial<VectorMetadata>,
  ): boolean {
    return Object.entries(filter).every(
      ([key, value]) => value === undefined || metadata[key] === value,
    );
  }
}
