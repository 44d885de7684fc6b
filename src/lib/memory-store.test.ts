import { beforeEach, describe, expect, it } from "vitest";
import { ConflictError, NotFoundError } from "./errors.js";
import { MemoryJobStore } from "./memory-store.js";
import type { NewJob, NewJobResult } from "./types.js";

const NOW = new Date("2024-01-15T10:00:00Z");

function newJob(overrides: Partial<NewJob> = {}): NewJob {
  return {
    name: "backup",
    host: "db1",
    api_key: "test-key-1",
    automatic_failure_threshold: 3600,
    labels: { env: "prod" },
    lifecycle: "active",
    ...overrides,
  };
}

function result(timestamp: string, overrides: Partial<NewJobResult> = {}): NewJobResult {
  return { status: "success", duration: 1, timestamp, labels: {}, output: null, received_at: timestamp, ...overrides };
}

describe("MemoryJobStore", () => {
  let store: MemoryJobStore;

  beforeEach(() => {
    store = new MemoryJobStore(() => NOW);
  });

  it("creates jobs with sequential ids and an empty watermark", async () => {
    const first = await store.createJob(newJob());
    const second = await store.createJob(newJob({ name: "cleanup", api_key: "test-key-2" }));

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(first).toMatchObject({
      last_reported_at: null,
      last_status: null,
      last_duration: null,
      created_at: "2024-01-15T10:00:00.000Z",
      updated_at: "2024-01-15T10:00:00.000Z",
    });
  });

  it("rejects a second live job with the same identity", async () => {
    await store.createJob(newJob());
    await expect(store.createJob(newJob({ api_key: "test-key-2" }))).rejects.toThrow(
      new ConflictError("job already exists: backup@db1"),
    );
  });

  it("rejects a duplicate API key", async () => {
    await store.createJob(newJob());
    await expect(store.createJob(newJob({ name: "other" }))).rejects.toThrow("API key already in use");
  });

  it("lets a new job take the identity of a retired one and prefers it on lookup", async () => {
    const old = await store.createJob(newJob({ lifecycle: "retired" }));
    const live = await store.createJob(newJob({ api_key: "test-key-2" }));

    expect((await store.get("backup", "db1"))?.id).toBe(live.id);

    await store.updateJob(live.id, { lifecycle: "retired" });
    expect((await store.get("backup", "db1"))?.id).toBe(live.id);
    expect((await store.getById(old.id))?.lifecycle).toBe("retired");
  });

  it("refuses to revive a retired job while another holds its identity", async () => {
    const old = await store.createJob(newJob({ lifecycle: "retired" }));
    await store.createJob(newJob({ api_key: "test-key-2" }));
    await expect(store.updateJob(old.id, { lifecycle: "active" })).rejects.toBeInstanceOf(ConflictError);
  });

  it("returns copies that do not alias stored state", async () => {
    const job = await store.createJob(newJob());
    job.labels.env = "changed";
    expect((await store.getById(job.id))?.labels).toEqual({ env: "prod" });
  });

  it("finds jobs by API key", async () => {
    const job = await store.createJob(newJob());
    expect((await store.getByApiKey("test-key-1"))?.id).toBe(job.id);
    expect(await store.getByApiKey("test-key-unknown")).toBeNull();
  });

  it("filters listings by lifecycle and labels", async () => {
    await store.createJob(newJob());
    await store.createJob(newJob({ name: "report", api_key: "test-key-2", labels: { env: "dev" } }));
    await store.createJob(newJob({ name: "sync", api_key: "test-key-3", lifecycle: "paused" }));

    expect((await store.listJobs({ labels: { env: "prod" } })).map((j) => j.name)).toEqual(["backup", "sync"]);
    expect((await store.listJobs({ lifecycle: "paused" })).map((j) => j.name)).toEqual(["sync"]);
    expect(await store.listJobs()).toHaveLength(3);
  });

  it("updates only the patched fields", async () => {
    const job = await store.createJob(newJob());
    const updated = await store.updateJob(job.id, { automatic_failure_threshold: 60 });
    expect(updated).toMatchObject({ name: "backup", automatic_failure_threshold: 60, labels: { env: "prod" } });
    expect(await store.updateJob(99, { name: "x" })).toBeNull();
  });

  it("deletes a job with its results", async () => {
    const job = await store.createJob(newJob());
    await store.appendResult(job.id, result("2024-01-15T09:00:00.000Z"));

    expect(await store.deleteJob(job.id)).toBe(true);
    expect(await store.getById(job.id)).toBeNull();
    expect(await store.listResults(job.id, 10)).toEqual([]);
    expect(await store.deleteJob(job.id)).toBe(false);
  });

  describe("appendResult", () => {
    it("advances the watermark and the outcome it carries", async () => {
      const job = await store.createJob(newJob());
      const outcome = await store.appendResult(
        job.id,
        result("2024-01-15T09:00:00.000Z", { status: "failure", duration: 4.5 }),
      );

      expect(outcome.result).toMatchObject({ id: 1, job_id: job.id, status: "failure" });
      expect(outcome.lastReportedAt).toBe("2024-01-15T09:00:00.000Z");
      expect(await store.getById(job.id)).toMatchObject({
        last_reported_at: "2024-01-15T09:00:00.000Z",
        last_status: "failure",
        last_duration: 4.5,
      });
    });

    it("keeps the watermark when an older result arrives", async () => {
      const job = await store.createJob(newJob());
      await store.appendResult(job.id, result("2024-01-15T09:00:00.000Z"));
      const outcome = await store.appendResult(job.id, result("2024-01-15T08:00:00.000Z", { status: "failure" }));

      expect(outcome.lastReportedAt).toBe("2024-01-15T09:00:00.000Z");
      expect(await store.getById(job.id)).toMatchObject({ last_status: "success" });
      expect(await store.listResults(job.id, 10)).toHaveLength(2);
    });

    it("lets a later submission with the same timestamp win", async () => {
      const job = await store.createJob(newJob());
      await store.appendResult(job.id, result("2024-01-15T09:00:00.000Z"));
      await store.appendResult(job.id, result("2024-01-15T09:00:00.000Z", { status: "failure" }));

      expect((await store.getById(job.id))?.last_status).toBe("failure");
      expect((await store.latestResult(job.id))?.id).toBe(2);
    });

    it("fails for an unknown job", async () => {
      await expect(store.appendResult(7, result("2024-01-15T09:00:00.000Z"))).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it("lists results newest first by timestamp", async () => {
    const job = await store.createJob(newJob());
    await store.appendResult(job.id, result("2024-01-15T08:00:00.000Z"));
    await store.appendResult(job.id, result("2024-01-15T09:00:00.000Z"));
    await store.appendResult(job.id, result("2024-01-15T07:00:00.000Z"));

    const listed = await store.listResults(job.id, 2);
    expect(listed.map((r) => r.timestamp)).toEqual(["2024-01-15T09:00:00.000Z", "2024-01-15T08:00:00.000Z"]);
    expect(await store.latestResult(99)).toBeNull();
  });
});
