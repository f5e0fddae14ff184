import { afterEach, describe, expect, it } from "vitest";
import { HttpTextClient } from "./httpTextClient";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("HttpTextClient", () => {
  it("returns the body and content type of successful responses", async () => {
    let capturedHeaders: HeadersInit | undefined;
    setFetch(async (_input, init) => {
      capturedHeaders = init?.headers;
      return new Response("<html><title>Docs</title></html>", {
        status: 200,
        headers: { "content-type": "text/html; charset=utf-8" },
      });
    });

    const client = new HttpTextClient();
    const result = await client.getText({
      url: "https://docs.example.test/gpu",
      headers: { "user-agent": "test-agent" },
      timeoutMs: 500,
    });

    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual({
      url: "https://docs.example.test/gpu",
      status: 200,
      contentType: "text/html; charset=utf-8",
      body: "<html><title>Docs</title></html>",
    });
    expect(capturedHeaders).toEqual({ "user-agent": "test-agent" });
  });

  it("maps aborted requests to timeout errors", async () => {
    setFetch(
      async (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;

          if (!signal) {
            reject(new Error("missing abort signal"));
            return;
          }

          signal.addEventListener("abort", () => {
            reject(new DOMException("Aborted", "AbortError"));
          });
        }),
    );

    const client = new HttpTextClient();
    const result = await client.getText({
      url: "https://docs.example.test/slow",
      timeoutMs: 5,
    });

    if (result.isOk()) {
      throw new Error("expected timeout error");
    }

    expect(result.error.code).toBe("timeout");
    expect(result.error.message).toBe("HTTP request timed out after 5ms.");
    expect(result.error.retryable).toBe(true);
  });

  it("maps non-success statuses with retryability metadata", async () => {
    setFetch(async () => new Response("unavailable", { status: 503 }));

    const client = new HttpTextClient();
    const result = await client.getText({
      url: "https://docs.example.test/down",
      timeoutMs: 500,
    });

    if (result.isOk()) {
      throw new Error("expected non-success status error");
    }

    expect(result.error.code).toBe("non_success_status");
    expect(result.error.httpStatus).toBe(503);
    expect(result.error.retryable).toBe(true);
  });

  it("treats client errors as non-retryable", async () => {
    setFetch(async () => new Response("missing", { status: 404 }));

    const client = new HttpTextClient();
    const result = await client.getText({
      url: "https://docs.example.test/missing",
      timeoutMs: 500,
    });

    if (result.isOk()) {
      throw new Error("expected non-success status error");
    }

    expect(result.error.httpStatus).toBe(404);
    expect(result.error.retryable).toBe(false);
  });

  it("maps thrown transport failures", async () => {
    setFetch(async () => {
      throw new Error("socket reset");
    });

    const client = new HttpTextClient();
    const result = await client.getText({
      url: "https://docs.example.test/reset",
      timeoutMs: 500,
    });

    if (result.isOk()) {
      throw new Error("expected transport error");
    }

    expect(result.error).toMatchObject({
      code: "transport_error",
      message: "socket reset",
      retryable: true,
    });
  });
});
