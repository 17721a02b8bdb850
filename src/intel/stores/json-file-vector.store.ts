import { Logger } from '@nestjs/common';
import {
  VectorMatch,
  VectorMetadata,
  VectorMetadataValue,
  VectorRecord,
} from '../types/intel.types';
import {
  isRecord,
  readJsonFile,
  writeJsonFileAtomic,
} from '../utils/json-file.util';
import { InMemoryVectorStore } from './in-memory-vector.store';
import { VectorIdPredicate } from './vector-store';

interface VectorFile {
  version: 1;
  records: VectorRecord[];
}

/**
 * Durable vector store: the whole index lives in memory and is written back
 * to one JSON file after each mutation.
 */
export class JsonFileVectorStore extends InMemoryVectorStore {
  private readonly logger = new Logger(JsonFileVectorStore.name);
  private loading: Promise<void> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {
    super();
  }

  override async upsert(records: VectorRecord[]): Promise<void> {
    await this.ensureLoaded();
    await super.upsert(records);
    await this.persist();
  }

  override async query(
    embedding: number[],
    k: number,
    filter?: Partial<VectorMetadata>,
    acceptId?: VectorIdPredicate,
  ): Promise<VectorMatch[]> {
    await this.ensureLoaded();
    return super.query(embedding, k, filter, acceptId);
  }

  override async missingIds(ids: readonly number[]): Promise<number[]> {
    await this.ensureLoaded();
    return super.missingIds(ids);
  }

  override async count(): Promise<number> {
    await this.ensureLoaded();
    return super.count();
  }

  override async reset(): Promise<void> {
    await this.ensureLoaded();
    await super.reset();
    await this.persist();
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load();
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    const raw = await readJsonFile(this.filePath);
    if (!isRecord(raw) || !Array.isArray(raw.records)) {
      return;
    }
    const records = raw.records
      .map((entry) => this.toRecord(entry))
      .filter((record): record is VectorRecord => record !== null);
    await super.upsert(records);
    this.logger.log(`vector store loaded: records=${records.length}`);
  }

  private persist(): Promise<void> {
    const payload: VectorFile = {
      version: 1,
      records: [...this.records.values()],
    };
    const task = this.writeQueue.then(() =>
      writeJsonFileAtomic(this.filePath, payload),
    );
    this.writeQueue = task.catch(() => undefined);
    return task;
  }

  private toRecord(entry: unknown): VectorRecord | null {
    if (!isRecord(entry) || typeof entry.id !== 'number') {
      return null;
    }
    if (!Array.isArray(entry.embedding)) {
      return null;
    }
    const embedding = entry.embedding.filter(
      (v): v is number => typeof v === 'number',
    );
    const metadata: VectorMetadata = {};
    if (isRecord(entry.metadata)) {
      for (const [key, value] of Object.entries(entry.metadata)) {
        if (this.isMetadataValue(value)) {
          metadata[key] = value;
        }
      }
    }
    return {
      id: entry.id,
      embedding,
      metadata,
      text: typeof entry.text === 'string' ? entry.text : '',
    };
  }

  private isMetadataValue(value: unknown): value is VectorMetadataValue {
    return (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    );
  }
}
