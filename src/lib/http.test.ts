import { describe, expect, it, vi } from "vitest";
import { ConflictError, StoreUnavailableError } from "./errors.js";
import { errorResponse, matchPath, parseId } from "./http.js";
import { silentLogger, type Logger } from "./log.js";

describe("matchPath", () => {
  it("captures named segments", () => {
    expect(matchPath("/api/job/:id/results", "/api/job/42/results")).toEqual({ id: "42" });
    expect(matchPath("/api/job", "/api/job/")).toEqual({});
  });

  it("rejects paths of another shape", () => {
    expect(matchPath("/api/job/:id", "/api/job/42/results")).toBeNull();
    expect(matchPath("/api/job/:id", "/api/jobs/42")).toBeNull();
    expect(matchPath("/api/job/:id", "/api/job/%E0%A4%A")).toBeNull();
  });

  it("decodes captured segments", () => {
    expect(matchPath("/api/job/:id", "/api/job/a%20b")).toEqual({ id: "a b" });
  });
});

describe("parseId", () => {
  it("accepts positive integers", () => {
    expect(parseId("17")).toBe(17);
  });

  it.each([undefined, "", "0", "-3", "1.5", "abc"])("rejects %s", (raw) => {
    expect(() => parseId(raw)).toThrow("invalid job ID format (must be a positive integer)");
  });
});

describe("errorResponse", () => {
  it("maps service errors to their status and code", async () => {
    const res = errorResponse(new ConflictError("job already exists: a@b"), silentLogger, "test");
    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: "job already exists: a@b", code: "conflict" });
  });

  it("logs store failures and answers 503", async () => {
    const error = vi.fn();
    const log: Logger = { ...silentLogger, error };
    const res = errorResponse(new StoreUnavailableError("get", new Error("ECONNREFUSED")), log, "metrics");

    expect(res.status).toBe(503);
    expect(error).toHaveBeenCalledWith("metrics: job store unavailable during get", { cause: "ECONNREFUSED" });
  });

  it("hides unexpected errors behind a 500", async () => {
    const res = errorResponse(new TypeError("boom"), silentLogger, "test");
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "internal server error", code: "internal" });
  });
});
