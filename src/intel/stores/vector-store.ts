import {
  VectorMatch,
  VectorMetadata,
  VectorRecord,
} from '../types/intel.types';

export const VECTOR_STORE = 'VECTOR_STORE';
export const EMBEDDING_PROVIDER = 'EMBEDDING_PROVIDER';

/** Limits a query to the ids it accepts; applied before the top-k cut. */
export type VectorIdPredicate = (id: number) => boolean;

/** Storage behind the vector memory. Implementations never compute embeddings. */
export interface VectorStore {
  upsert(records: VectorRecord[]): Promise<void>;
  query(
    embedding: number[],
    k: number,
    filter?: Partial<VectorMetadata>,
    acceptId?: VectorIdPredicate,
  ): Promise<VectorMatch[]>;
  /** The given ids that have no stored vector, in input order. */
  missingIds(ids: readonly number[]): Promise<number[]>;
  count(): Promise<number>;
  reset(): Promise<void>;
}

/** Text to vector. Throws `EmbeddingUnavailableError` when no vector can be produced. */
export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}
