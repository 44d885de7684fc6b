import type { Job, JobFilter, JobPatch, JobResult, NewJob, NewJobResult } from "./types.js";

export interface AppendOutcome {
  result: JobResult;
  /** Watermark after the append. Unchanged when the result is older than it. */
  lastReportedAt: string;
}

export interface ListActiveOptions {
  batchSize?: number;
  signal?: AbortSignal;
}

/**
 * Persistence boundary for jobs and their results.
 *
 * Implementations raise StoreUnavailableError when the backend fails, and
 * ConflictError/NotFoundError for the documented cases. Everything else is
 * their own business.
 */
export interface JobStore {
  /** Live job holding the identity, else the most recent retired one. */
  get(name: string, host: string): Promise<Job | null>;
  getById(id: number): Promise<Job | null>;
  getByApiKey(apiKey: string): Promise<Job | null>;

  /** Non-retired jobs, ascending by id, one page per iteration. */
  listActive(opts?: ListActiveOptions): AsyncIterable<Job[]>;
  /** Every job including retired ones, ascending by id. */
  listJobs(filter?: JobFilter): Promise<Job[]>;

  createJob(job: NewJob): Promise<Job>;
  updateJob(id: number, patch: JobPatch): Promise<Job | null>;
  deleteJob(id: number): Promise<boolean>;

  /**
   * Stores a result and moves the job's watermark to max(watermark, timestamp)
   * in one atomic step. When the result is at or past the watermark it also
   * becomes the job's last_status/last_duration.
   */
  appendResult(jobId: number, result: NewJobResult): Promise<AppendOutcome>;
  /** Latest result by timestamp; ties go to the later submission. */
  latestResult(jobId: number): Promise<JobResult | null>;
  /** Newest first. */
  listResults(jobId: number, limit: number): Promise<JobResult[]>;

  ping(): Promise<void>;
  close(): Promise<void>;
}

export const DEFAULT_BATCH_SIZE = 500;

export function identityKey(name: string, host: string): string {
  return JSON.stringify([name, host]);
}
