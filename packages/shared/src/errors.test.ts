import { describe, it, expect } from "vitest";
import {
  ConflictResolutionError,
  ForbiddenError,
  GoogleApiError,
  InvalidResponseError,
  LocalStorageError,
  NetworkError,
  OperationCancelledError,
  RateLimitError,
  ResourceNotFoundError,
  ServerError,
  SyncTokenExpiredError,
  TokenExpiredError,
  classifyError,
  httpStatusOf,
  retryStatsOf,
  throwIfCancelled,
  toNetworkError,
} from "./errors";

describe("retryable flags", () => {
  it("matches the taxonomy", () => {
    expect(new TokenExpiredError().retryable).toBe(true);
    expect(new RateLimitError().retryable).toBe(true);
    expect(new ServerError("boom", 502).retryable).toBe(true);
    expect(new ForbiddenError().retryable).toBe(false);
    expect(new ResourceNotFoundError().retryable).toBe(false);
    expect(new InvalidResponseError("bad", 200).retryable).toBe(false);
    expect(new GoogleApiError("bad request", 400).retryable).toBe(false);
    expect(new LocalStorageError("integrity", "corrupt").retryable).toBe(false);
  });

  it("treats DNS failures as not retryable", () => {
    expect(new NetworkError("timeout", "t").retryable).toBe(true);
    expect(new NetworkError("no-connection", "n").retryable).toBe(true);
    expect(new NetworkError("dns", "d").retryable).toBe(false);
  });
});

describe("toNetworkError", () => {
  it("classifies by system error code on the cause", () => {
    const wrap = (code: string) =>
      new TypeError("fetch failed", { cause: Object.assign(new Error(code), { code }) });
    expect(toNetworkError(wrap("ETIMEDOUT")).kind).toBe("timeout");
    expect(toNetworkError(wrap("ECONNREFUSED")).kind).toBe("connection-failed");
    expect(toNetworkError(wrap("ENETUNREACH")).kind).toBe("no-connection");
    expect(toNetworkError(wrap("EAI_AGAIN")).kind).toBe("dns");
  });

  it("maps abort and timeout errors to timeout", () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    expect(toNetworkError(timeout).kind).toBe("timeout");
  });

  it("falls back to other for unknown values", () => {
    expect(toNetworkError("weird").kind).toBe("other");
  });
});

describe("classification helpers", () => {
  it("classifies every family", () => {
    expect(classifyError(new NetworkError("timeout", "t"))).toBe("network");
    expect(classifyError(new SyncTokenExpiredError())).toBe("cursor-expired");
    expect(classifyError(new ForbiddenError())).toBe("remote-api");
    expect(classifyError(new OperationCancelledError())).toBe("cancelled");
    expect(classifyError(new ConflictResolutionError("rec_1"))).toBe("unknown");
  });

  it("extracts status and retry stats from remote errors only", () => {
    const err = new RateLimitError();
    err.retryStats = { retryCount: 5, totalWaitMs: 31_000 };
    expect(httpStatusOf(err)).toBe(429);
    expect(retryStatsOf(err)).toEqual({ retryCount: 5, totalWaitMs: 31_000 });
    expect(httpStatusOf(new Error("x"))).toBeNull();
    expect(retryStatsOf(new Error("x"))).toEqual({ retryCount: 0, totalWaitMs: 0 });
  });

  it("throwIfCancelled throws only for aborted signals", () => {
    const controller = new AbortController();
    expect(() => throwIfCancelled(controller.signal, "import")).not.toThrow();
    expect(() => throwIfCancelled(undefined, "import")).not.toThrow();
    controller.abort();
    expect(() => throwIfCancelled(controller.signal, "import")).toThrow("import cancelled");
  });
});
