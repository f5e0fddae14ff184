import type {
  DocumentDraft,
  DocumentEntity,
  ProductType,
} from "../entities/document";
import type { ActiveRun } from "../entities/ingestion";

export type StoreSearchQuery = {
  text?: string;
  productType?: ProductType;
  offset: number;
  limit: number;
};

export type StoreSearchResult = {
  items: DocumentEntity[];
  total: number;
};

export type UpsertResult = {
  document: DocumentEntity;
  created: boolean;
};

/**
 * Durable document collection with a full-text index over title and body.
 * Implementations throw when the backing store cannot be reached.
 */
export interface DocumentStorePort {
  /**
   * Inserts a new document or replaces the mutable fields of the one sharing `sourceUrl`, keeping its id.
   */
  upsert(draft: DocumentDraft): Promise<UpsertResult>;
  findById(id: string): Promise<DocumentEntity | null>;
  isValidId(id: string): boolean;
  /**
   * Orders by text relevance when `text` is given, then `fetchedAt` descending, then id.
   */
  search(query: StoreSearchQuery): Promise<StoreSearchResult>;
  countByProductType(): Promise<Record<ProductType, number>>;
  latestFetchedAt(): Promise<Date | null>;
  ping(): Promise<boolean>;
}

/**
 * Advisory key/value store with expiry. Implementations throw on transport errors.
 */
export interface CachePort {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  deleteByPrefix(prefix: string): Promise<number>;
  isAvailable(): boolean;
}

export interface CacheInvalidationPort {
  invalidateAll(): Promise<boolean>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}

export interface RunLease {
  release(): Promise<void>;
}

export type RunLockAcquisition =
  | { acquired: true; lease: RunLease }
  | { acquired: false; holder: ActiveRun };

/**
 * Guard shared by every process that can start an ingestion run. `acquire` throws when the lock backend is unreachable.
 */
export interface RunLockPort {
  acquire(run: ActiveRun): Promise<RunLockAcquisition>;
}
