import type { Result } from "neverthrow";
import type {
  ExtractionFailure,
  QueryError,
  TriggerError,
} from "../entities/appError";
import type {
  DocumentDraft,
  DocumentEntity,
  ProductType,
} from "../entities/document";
import type {
  BatchReport,
  Catalog,
  CompletedRun,
  CoordinatorSnapshot,
  TriggerSource,
} from "../entities/ingestion";

export interface ExtractorPort {
  extract(
    url: string,
    expectedProductType: ProductType,
  ): Promise<Result<DocumentDraft, ExtractionFailure>>;
}

export interface IngestionPipelinePort {
  run(catalog: Catalog, runId: string): Promise<BatchReport>;
}

/**
 * Search parameters after boundary validation: `page >= 1`, `1 <= limit <= 100`.
 */
export type SearchRequest = {
  productType?: ProductType;
  query?: string;
  page: number;
  limit: number;
};

export type SearchPage = {
  items: DocumentEntity[];
  total: number;
  page: number;
  limit: number;
};

export type Statistics = {
  totalDocuments: number;
  countPerProductType: Record<ProductType, number>;
  lastIngestedAt: Date | null;
};

export interface DocumentQueryPort {
  search(request: SearchRequest): Promise<Result<SearchPage, QueryError>>;
  getById(id: string): Promise<Result<DocumentEntity, QueryError>>;
  stats(): Promise<Result<Statistics, QueryError>>;
}

export interface RefreshTriggerPort {
  trigger(source: TriggerSource): Promise<Result<CompletedRun, TriggerError>>;
  snapshot(): CoordinatorSnapshot;
}
