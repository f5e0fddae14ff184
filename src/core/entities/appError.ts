import type { ProductType } from "./document";

/**
 * Transport-level failure codes shared by outbound HTTP adapters.
 */
export type HttpClientErrorCode =
  | "timeout"
  | "transport_error"
  | "non_success_status";

export type HttpClientError = {
  code: HttpClientErrorCode;
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

/**
 * Describes why a single catalog URL produced no document. Recorded in the batch report, never fatal to a run.
 */
export type ExtractionFailure =
  | {
      kind: "fetch";
      url: string;
      productType: ProductType;
      cause: HttpClientError;
    }
  | {
      kind: "empty_content";
      url: string;
      productType: ProductType;
    };

export type QueryError =
  | { code: "not_found"; message: string }
  | { code: "store_unavailable"; message: string; cause?: unknown };

export type TriggerError =
  | {
      code: "already_running";
      message: string;
      activeRunId: string;
      activeSince: Date;
    }
  | { code: "run_failed"; message: string; runId: string; cause?: unknown };

export type CatalogError = {
  code: "invalid_catalog";
  message: string;
  issues: string[];
};

/**
 * Normalizes unknown throwables into log-friendly fields.
 */
export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
