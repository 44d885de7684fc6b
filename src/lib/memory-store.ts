import { ConflictError, NotFoundError } from "./errors.js";
import { DEFAULT_BATCH_SIZE, identityKey, type AppendOutcome, type JobStore, type ListActiveOptions } from "./job-store.js";
import { matchesLabels } from "./labels.js";
import type { Job, JobFilter, JobPatch, JobResult, NewJob, NewJobResult } from "./types.js";

/**
 * In-process job store for dev mode and tests. Each method runs to
 * completion before yielding, so the watermark update is atomic here too.
 */
export class MemoryJobStore implements JobStore {
  private jobs = new Map<number, Job>();
  private results = new Map<number, JobResult[]>();
  private nextJobId = 1;
  private nextResultId = 1;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async get(name: string, host: string): Promise<Job | null> {
    let found: Job | null = null;
    for (const job of this.jobs.values()) {
      if (job.name !== name || job.host !== host) continue;
      if (job.lifecycle !== "retired") return copy(job);
      if (!found || job.id > found.id) found = job;
    }
    return found ? copy(found) : null;
  }

  async getById(id: number): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? copy(job) : null;
  }

  async getByApiKey(apiKey: string): Promise<Job | null> {
    for (const job of this.jobs.values()) {
      if (job.api_key === apiKey) return copy(job);
    }
    return null;
  }

  async *listActive(opts: ListActiveOptions = {}): AsyncIterable<Job[]> {
    const batchSize = opts.batchSize ?? DEFAULT_BATCH_SIZE;
    const active = this.sorted().filter((j) => j.lifecycle !== "retired");
    for (let i = 0; i < active.length; i += batchSize) {
      opts.signal?.throwIfAborted();
      yield active.slice(i, i + batchSize).map(copy);
    }
  }

  async listJobs(filter: JobFilter = {}): Promise<Job[]> {
    return this.sorted()
      .filter((j) => !filter.lifecycle || j.lifecycle === filter.lifecycle)
      .filter((j) => !filter.labels || matchesLabels(j.labels, filter.labels))
      .map(copy);
  }

  async createJob(input: NewJob): Promise<Job> {
    this.assertAvailable(input, null);
    const now = this.clock().toISOString();
    const job: Job = {
      ...input,
      labels: { ...input.labels },
      id: this.nextJobId++,
      last_reported_at: null,
      last_status: null,
      last_duration: null,
      created_at: now,
      updated_at: now,
    };
    this.jobs.set(job.id, job);
    return copy(job);
  }

  async updateJob(id: number, patch: JobPatch): Promise<Job | null> {
    const existing = this.jobs.get(id);
    if (!existing) return null;

    const next: Job = {
      ...existing,
      ...patch,
      labels: { ...(patch.labels ?? existing.labels) },
      updated_at: this.clock().toISOString(),
    };
    this.assertAvailable(next, id);
    this.jobs.set(id, next);
    return copy(next);
  }

  async deleteJob(id: number): Promise<boolean> {
    this.results.delete(id);
    return this.jobs.delete(id);
  }

  async appendResult(jobId: number, input: NewJobResult): Promise<AppendOutcome> {
    const job = this.jobs.get(jobId);
    if (!job) throw new NotFoundError(`job not found with ID: ${jobId}`);

    const result: JobResult = { ...input, labels: { ...input.labels }, id: this.nextResultId++, job_id: jobId };
    const list = this.results.get(jobId) ?? [];
    list.push(result);
    this.results.set(jobId, list);

    const ts = Date.parse(result.timestamp);
    if (job.last_reported_at === null || ts >= Date.parse(job.last_reported_at)) {
      job.last_reported_at = result.timestamp;
      job.last_status = result.status;
      job.last_duration = result.duration;
    }

    return { result: { ...result, labels: { ...result.labels } }, lastReportedAt: job.last_reported_at };
  }

  async latestResult(jobId: number): Promise<JobResult | null> {
    const [latest] = await this.listResults(jobId, 1);
    return latest ?? null;
  }

  async listResults(jobId: number, limit: number): Promise<JobResult[]> {
    return [...(this.results.get(jobId) ?? [])]
      .sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp) || b.id - a.id)
      .slice(0, limit)
      .map((r) => ({ ...r, labels: { ...r.labels } }));
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}

  private sorted(): Job[] {
    return [...this.jobs.values()].sort((a, b) => a.id - b.id);
  }

  private assertAvailable(job: Pick<Job, "name" | "host" | "api_key" | "lifecycle">, selfId: number | null): void {
    for (const other of this.jobs.values()) {
      if (other.id === selfId) continue;
      if (
        job.lifecycle !== "retired" &&
        other.lifecycle !== "retired" &&
        identityKey(other.name, other.host) === identityKey(job.name, job.host)
      ) {
        throw new ConflictError(`job already exists: ${job.name}@${job.host}`);
      }
      if (other.api_key === job.api_key) throw new ConflictError("API key already in use");
    }
  }
}

function copy(job: Job): Job {
  return { ...job, labels: { ...job.labels } };
}
