import { beforeEach, describe, expect, it, vi } from "vitest";
import { createApp, FUNCTIONS, type App } from "./app.js";
import { loadConfig } from "./config/server.js";
import { StoreUnavailableError } from "./lib/errors.js";
import type { AppendOutcome, JobStore, ListActiveOptions } from "./lib/job-store.js";
import { silentLogger, type Logger } from "./lib/log.js";
import { MemoryJobStore } from "./lib/memory-store.js";
import type { Job } from "./lib/types.js";

const ADMIN_KEY = "test-admin-key";
const ORIGIN = "http://localhost";

describe("app", () => {
  let now: Date;
  let store: MemoryJobStore;
  let app: App;

  beforeEach(() => {
    now = new Date("2024-01-15T10:00:00.000Z");
    store = new MemoryJobStore(() => now);
    const config = loadConfig({ CRONMETRICS_STORE: "memory", CRONMETRICS_ADMIN_API_KEYS: ADMIN_KEY });
    app = createApp({ config, store, log: silentLogger, now: () => now });
  });

  function admin(method: string, path: string, body?: unknown) {
    return app.fetch(
      new Request(ORIGIN + path, {
        method,
        headers: { Authorization: `Bearer ${ADMIN_KEY}`, "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
      }),
    );
  }

  function submit(apiKey: string, body: unknown) {
    return app.fetch(
      new Request(`${ORIGIN}/api/job-result`, {
        method: "POST",
        headers: { "X-API-Key": apiKey, "Content-Type": "application/json" },
        body: JSON.stringify(body),
      }),
    );
  }

  async function register(body: Record<string, unknown>): Promise<{ id: number; api_key: string }> {
    const res = await admin("POST", "/api/job", body);
    expect(res.status).toBe(201);
    return res.json();
  }

  it("registers a job, takes a result and exports it", async () => {
    const job = await register({ job_name: "sync_db", host: "web1", labels: { env: "prod" } });
    expect(job.api_key).toMatch(/^cm_[a-z2-7]{52}$/);

    const res = await submit(job.api_key, {
      job_name: "sync_db",
      host: "web1",
      status: "success",
      duration: 2.5,
      timestamp: "2024-01-15T09:59:50Z",
    });
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({});

    const metrics = await app.fetch(new Request(`${ORIGIN}/metrics`));
    expect(metrics.status).toBe(200);
    expect(metrics.headers.get("content-type")).toBe("text/plain; version=0.0.4; charset=utf-8");
    const body = await metrics.text();
    expect(body.split("\n")).toEqual([
      "# HELP cronjob_status Status of cron job: 1=success, 0=failure or missed deadline, -1=maintenance/paused",
      "# TYPE cronjob_status gauge",
      'cronjob_status{job_name="sync_db",host="web1",status="success",env="prod"} 1',
      "# HELP cronjob_last_run_timestamp Unix timestamp of the last reported job execution",
      "# TYPE cronjob_last_run_timestamp gauge",
      'cronjob_last_run_timestamp{job_name="sync_db",host="web1"} 1705312790',
      "# HELP cronjob_duration_seconds Duration of the last reported job execution in seconds",
      "# TYPE cronjob_duration_seconds gauge",
      'cronjob_duration_seconds{job_name="sync_db",host="web1"} 2.5',
      "# HELP cronjob_total Total number of registered cron jobs",
      "# TYPE cronjob_total gauge",
      "cronjob_total 1",
      "",
    ]);
  });

  it("flips to missed_deadline once the threshold passes", async () => {
    const job = await register({ job_name: "cleanup", host: "web2", automatic_failure_threshold: 600 });
    await submit(job.api_key, { job_name: "cleanup", host: "web2", status: "success" });

    now = new Date("2024-01-15T10:15:00.000Z");
    const body = await (await app.fetch(new Request(`${ORIGIN}/metrics`))).text();
    expect(body).toContain('cronjob_status{job_name="cleanup",host="web2",status="missed_deadline"} 0\n');
    expect(body).toContain('cronjob_last_run_timestamp{job_name="cleanup",host="web2"} 1705312800\n');
  });

  describe("GET /metrics", () => {
    it("answers 503 without a partial page when the store fails mid-scrape", async () => {
      class FlakyStore extends MemoryJobStore {
        async *listActive(opts: ListActiveOptions = {}): AsyncIterable<Job[]> {
          let pages = 0;
          for await (const page of super.listActive(opts)) {
            if (++pages === 2) throw new StoreUnavailableError("listActive", new Error("ECONNRESET"));
            yield page;
          }
        }
      }
      store = new FlakyStore(() => now);
      const config = loadConfig({
        CRONMETRICS_STORE: "memory",
        CRONMETRICS_ADMIN_API_KEYS: ADMIN_KEY,
        CRONMETRICS_SCRAPE_BATCH_SIZE: "1",
      });
      app = createApp({ config, store, log: silentLogger, now: () => now });
      await register({ job_name: "sync_db", host: "web1" });
      await register({ job_name: "cleanup", host: "web2" });

      const res = await app.fetch(new Request(`${ORIGIN}/metrics`));
      expect(res.status).toBe(503);
      expect(res.headers.get("content-type")).toBe("application/json");
      expect(await res.json()).toEqual({ error: "job store unavailable during listActive", code: "store_unavailable" });
    });

    it("returns quietly when the client goes away", async () => {
      const error = vi.fn();
      const log: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error, child: () => log };
      const config = loadConfig({ CRONMETRICS_STORE: "memory" });
      await store.createJob({
        name: "sync_db",
        host: "web1",
        api_key: "test-key-1",
        automatic_failure_threshold: 3600,
        labels: {},
        lifecycle: "active",
      });
      const controller = new AbortController();
      controller.abort();

      const res = await createApp({ config, store, log, now: () => now }).fetch(
        new Request(`${ORIGIN}/metrics`, { signal: controller.signal }),
      );
      expect(res.status).toBe(499);
      expect(await res.text()).toBe("");
      expect(error).not.toHaveBeenCalled();
    });
  });

  describe("POST /api/job-result", () => {
    it("answers 503 and records nothing when the store write fails", async () => {
      class DownStore extends MemoryJobStore {
        async appendResult(): Promise<AppendOutcome> {
          throw new StoreUnavailableError("appendResult", new Error("ECONNRESET"));
        }
      }
      store = new DownStore(() => now);
      const config = loadConfig({ CRONMETRICS_STORE: "memory", CRONMETRICS_ADMIN_API_KEYS: ADMIN_KEY });
      app = createApp({ config, store, log: silentLogger, now: () => now });
      const job = await register({ job_name: "sync_db", host: "web1" });

      const res = await submit(job.api_key, { job_name: "sync_db", host: "web1", status: "success" });
      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ error: "job store unavailable during appendResult", code: "store_unavailable" });
      expect(await store.listResults(job.id, 10)).toEqual([]);
      expect((await store.getById(job.id))?.last_reported_at).toBeNull();
    });

    it("requires an API key", async () => {
      const res = await app.fetch(
        new Request(`${ORIGIN}/api/job-result`, {
          method: "POST",
          body: JSON.stringify({ job_name: "a", host: "b", status: "success" }),
        }),
      );
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "missing or invalid API key", code: "unauthorized" });
    });

    it("rejects another job's key", async () => {
      await register({ job_name: "sync_db", host: "web1" });
      const other = await register({ job_name: "cleanup", host: "web2" });

      const res = await submit(other.api_key, { job_name: "sync_db", host: "web1", status: "success" });
      expect(res.status).toBe(403);
    });

    it("rejects malformed payloads", async () => {
      const job = await register({ job_name: "sync_db", host: "web1" });
      const res = await submit(job.api_key, { job_name: "sync_db", host: "web1", status: "maybe" });
      expect(res.status).toBe(400);
      expect((await res.json()).code).toBe("invalid_input");
    });

    it("refuses results for retired jobs", async () => {
      const job = await register({ job_name: "sync_db", host: "web1" });
      await admin("PUT", `/api/job/${job.id}`, { lifecycle: "retired" });

      const res = await submit(job.api_key, { job_name: "sync_db", host: "web1", status: "success" });
      expect(res.status).toBe(409);
    });
  });

  describe("job management", () => {
    it("is closed to job keys", async () => {
      const job = await register({ job_name: "sync_db", host: "web1" });
      const res = await app.fetch(new Request(`${ORIGIN}/api/job`, { headers: { "X-API-Key": job.api_key } }));
      expect(res.status).toBe(403);
    });

    it("masks keys in listings and filters by label", async () => {
      await register({ job_name: "sync_db", host: "web1", labels: { env: "prod" } });
      await register({ job_name: "cleanup", host: "web2", labels: { env: "dev" } });

      const res = await admin("GET", "/api/job?label.env=prod");
      const body = await res.json();
      expect(body.count).toBe(1);
      expect(body.jobs[0].job_name).toBe("sync_db");
      expect(body.jobs[0].api_key).toMatch(/^cm_[a-z2-7]{4}…[a-z2-7]{4}$/);
    });

    it("rejects an unknown lifecycle filter", async () => {
      const res = await admin("GET", "/api/job?lifecycle=gone");
      expect(res.status).toBe(400);
    });

    it("rejects a duplicate identity", async () => {
      await register({ job_name: "sync_db", host: "web1" });
      const res = await admin("POST", "/api/job", { job_name: "sync_db", host: "web1" });
      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: "job already exists: sync_db@web1", code: "conflict" });
    });

    it("shows, updates and deletes a job", async () => {
      const job = await register({ job_name: "sync_db", host: "web1" });
      await submit(job.api_key, { job_name: "sync_db", host: "web1", status: "failure", output: "exit 1" });

      const shown = await (await admin("GET", `/api/job/${job.id}`)).json();
      expect(shown).toMatchObject({ id: job.id, last_status: "failure", automatic_failure_threshold: 3600 });
      expect(shown.latest_result).toMatchObject({ status: "failure", output: "exit 1" });

      const updated = await admin("PUT", `/api/job/${job.id}`, { lifecycle: "maintenance" });
      expect(await updated.json()).toMatchObject({ lifecycle: "maintenance", updated_at: "2024-01-15T10:00:00.000Z" });

      const metrics = await (await app.fetch(new Request(`${ORIGIN}/metrics`))).text();
      expect(metrics).toContain('cronjob_status{job_name="sync_db",host="web1",status="maintenance"} -1\n');

      expect((await admin("DELETE", `/api/job/${job.id}`)).status).toBe(204);
      expect((await admin("GET", `/api/job/${job.id}`)).status).toBe(404);
    });

    it("rejects a malformed id", async () => {
      const res = await admin("GET", "/api/job/abc");
      expect(res.status).toBe(400);
    });

    it("lists results newest first with a clamped limit", async () => {
      const job = await register({ job_name: "sync_db", host: "web1" });
      for (const ts of ["2024-01-15T08:00:00Z", "2024-01-15T09:00:00Z", "2024-01-15T07:00:00Z"]) {
        await submit(job.api_key, { job_name: "sync_db", host: "web1", status: "success", timestamp: ts });
      }

      const body = await (await admin("GET", `/api/job/${job.id}/results?limit=0`)).json();
      expect(body.limit).toBe(1);
      expect(body.results.map((r: { timestamp: string }) => r.timestamp)).toEqual(["2024-01-15T09:00:00.000Z"]);

      const all = await (await admin("GET", `/api/job/${job.id}/results`)).json();
      expect(all).toMatchObject({ job_id: job.id, count: 3, limit: 20 });
      expect(all.results.map((r: { timestamp: string }) => r.timestamp)).toEqual([
        "2024-01-15T09:00:00.000Z",
        "2024-01-15T08:00:00.000Z",
        "2024-01-15T07:00:00.000Z",
      ]);
    });
  });

  describe("GET /api/status", () => {
    it("summarises derived statuses and filters by one", async () => {
      const ok = await register({ job_name: "sync_db", host: "web1" });
      await register({ job_name: "cleanup", host: "web2" });
      await submit(ok.api_key, { job_name: "sync_db", host: "web1", status: "success", timestamp: "2024-01-15T09:00:00Z" });

      const res = await app.fetch(new Request(`${ORIGIN}/api/status?status=success`));
      expect(res.headers.get("access-control-allow-origin")).toBe("*");
      const body = await res.json();
      expect(body.summary).toEqual({ success: 1, failure: 0, missed_deadline: 1, maintenance: 0 });
      expect(body.count).toBe(1);
      expect(body.jobs[0]).toMatchObject({
        job_name: "sync_db",
        status: "success",
        elapsed_seconds: 3600,
        warning_ratio: 1,
        approaching_deadline: true,
      });
    });
  });

  describe("GET /health", () => {
    it("reports a healthy store", async () => {
      const res = await app.fetch(new Request(`${ORIGIN}/health`));
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "healthy",
        store: "ok",
        timestamp: "2024-01-15T10:00:00.000Z",
        version: "0.3.0",
      });
    });

    it("answers 503 when the store is down", async () => {
      class BrokenStore extends MemoryJobStore {
        async ping(): Promise<void> {
          throw new Error("ECONNREFUSED");
        }
      }
      const broken: JobStore = new BrokenStore();
      const config = loadConfig({ CRONMETRICS_STORE: "memory" });
      const res = await createApp({ config, store: broken, log: silentLogger }).fetch(new Request(`${ORIGIN}/health`));
      expect(res.status).toBe(503);
      expect((await res.json()).status).toBe("unhealthy");
    });
  });

  describe("routing", () => {
    it("answers 404 for unknown paths", async () => {
      const res = await app.fetch(new Request(`${ORIGIN}/nope`));
      expect(res.status).toBe(404);
    });

    it("answers 405 with the allowed methods", async () => {
      const res = await app.fetch(new Request(`${ORIGIN}/metrics`, { method: "POST" }));
      expect(res.status).toBe(405);
      expect(res.headers.get("allow")).toBe("GET");
    });

    it("reaches every function on each of its declared methods", async () => {
      await register({ job_name: "sync_db", host: "web1" });

      for (const fn of FUNCTIONS) {
        for (const method of fn.config.method) {
          const res = await admin(method, fn.config.path.replace(":id", "1"));
          expect([404, 405], `${method} ${fn.config.path}`).not.toContain(res.status);
        }
      }
    });

    it("serves the OpenAPI document", async () => {
      const res = await app.fetch(new Request(`${ORIGIN}/api/docs?format=json`));
      const doc = await res.json();
      expect(doc.openapi).toBe("3.0.3");
      expect(Object.keys(doc.paths)).toContain("/metrics");
    });
  });
});
