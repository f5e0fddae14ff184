import { err, ok, type Result } from "neverthrow";
import type { HttpClientError } from "../../core/entities/appError";

export type HttpTextRequest = {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
};

export type HttpTextResponse = {
  url: string;
  status: number;
  contentType: string | null;
  body: string;
};

/**
 * Single bounded-time GET. Retry policy belongs to callers, which see `retryable` on every failure.
 */
export class HttpTextClient {
  async getText(
    request: HttpTextRequest,
  ): Promise<Result<HttpTextResponse, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        redirect: "follow",
        signal: controller.signal,
      });

      if (!response.ok) {
        // Drain so the socket can be reused.
        await response.body?.cancel();
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      const body = await response.text();
      return ok({
        url: response.url || request.url,
        status: response.status,
        contentType: response.headers.get("content-type"),
        body,
      });
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
